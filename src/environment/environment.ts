/**
 * @fileoverview Where documents live and where blessed documents come from
 */

import * as path from 'path';
import { ConfigError } from '../core/errors.js';

export const DEFAULT_DOCUMENTS_DIR = 'openapi';
export const DEFAULT_UPSTREAM_BRANCH = 'origin/main';

export interface EnvironmentOptions {
  repoRoot: string;
  /** Relative to the repository root. */
  documentsDir?: string;
  upstreamBranch?: string;
  gitRefStorage?: boolean;
}

export interface Environment {
  readonly repoRoot: string;
  /** Absolute path. */
  readonly documentsDir: string;
  /** Same directory relative to the repository root, `/`-separated, as git expects. */
  readonly documentsDirInRepo: string;
  readonly upstreamBranch: string;
  readonly gitRefStorage: boolean;
}

export function createEnvironment(options: EnvironmentOptions): Environment {
  const repoRoot = path.resolve(options.repoRoot);
  const relative = options.documentsDir ?? DEFAULT_DOCUMENTS_DIR;
  if (path.isAbsolute(relative)) {
    throw new ConfigError('documentsDir', `must be relative to the repository root, got ${relative}`);
  }
  const documentsDir = path.resolve(repoRoot, relative);
  const documentsDirInRepo = path.relative(repoRoot, documentsDir).split(path.sep).join('/');
  if (documentsDirInRepo === '' || documentsDirInRepo.startsWith('..')) {
    throw new ConfigError('documentsDir', `must be a subdirectory of ${repoRoot}, got ${relative}`);
  }

  const upstreamBranch =
    options.upstreamBranch ?? (process.env.OPENAPI_WARDEN_UPSTREAM?.trim() || DEFAULT_UPSTREAM_BRANCH);

  return {
    repoRoot,
    documentsDir,
    documentsDirInRepo,
    upstreamBranch,
    gitRefStorage: options.gitRefStorage ?? false,
  };
}

/** Absolute path of a documents-relative, `/`-separated path. */
export function documentPath(env: Environment, relative: string): string {
  return path.join(env.documentsDir, ...relative.split('/'));
}

/** Repository-relative path of a documents-relative path, for git. */
export function repoPathOf(env: Environment, relative: string): string {
  return `${env.documentsDirInRepo}/${relative}`;
}
