/**
 * @fileoverview Local source: documents in the working tree
 *
 * Layout under the documents directory:
 *
 *   <lockstep-ident>.json
 *   <versioned-ident>/<ident>-<semver>-<hash>.json[.gitref]
 *   <versioned-ident>/<ident>-latest.json -> <ident>-<semver>-<hash>.json
 *
 * Files are attributed to the version their name claims. A file whose name
 * is malformed, or that does not hash or declare what its name says, is
 * still recorded (with its defect) so that it can be reported.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { glob } from 'glob';
import type { ManagedApi, ManagedApis } from '../apis/managed_apis.js';
import { SpecFileError } from '../core/errors.js';
import type { Environment } from '../environment/environment.js';
import { parseGitRef, type GitContentCache } from '../git/git.js';
import { logDebug } from '../telemetry/logger.js';
import { errnoCode, getErrorMessage } from '../utils/errors.js';
import { isLatestLinkBasename } from '../versions/api_ident.js';
import type { LatestLink, LocalApiFiles, LocalFile } from './api_files.js';
import { lockstepFileName, parseVersionedBasename, toJsonFileName, type VersionedFileName } from './file_name.js';
import { parseSpecFile } from './spec_file.js';

export interface LocalSnapshot {
  readonly apis: ReadonlyMap<string, LocalApiFiles>;
  readonly warnings: readonly string[];
}

interface MutableApiFiles {
  files: LocalFile[];
  latestLink: LatestLink | undefined;
}

export async function loadLocal(env: Environment, apis: ManagedApis, cache: GitContentCache): Promise<LocalSnapshot> {
  const warnings: string[] = [];
  const byApi = new Map<string, MutableApiFiles>();
  const filesFor = (ident: string): MutableApiFiles => {
    let entry = byApi.get(ident);
    if (!entry) {
      entry = { files: [], latestLink: undefined };
      byApi.set(ident, entry);
    }
    return entry;
  };

  const entries = await glob('**/*', { cwd: env.documentsDir, withFileTypes: true, dot: true });
  const files = entries.filter((entry) => !entry.isDirectory()).sort((a, b) => compareStrings(a.relativePosix(), b.relativePosix()));

  for (const entry of files) {
    const relative = entry.relativePosix();
    const absolute = entry.fullpath();
    const segments = relative.split('/');

    if (segments.length === 1) {
      const [basename = ''] = segments;
      const api = basename.endsWith('.json') ? apis.get(basename.slice(0, -'.json'.length)) : undefined;
      if (!api) {
        warnings.push(`local: ignoring ${relative}: not a document of any managed API`);
      } else if (api.versions.kind !== 'lockstep') {
        warnings.push(`local: ignoring ${relative}: ${api.ident} is versioned`);
      } else {
        filesFor(api.ident).files.push(await readLockstep(api, relative, absolute));
      }
      continue;
    }

    const [ident = '', basename = ''] = segments;
    const api = apis.get(ident);
    if (segments.length !== 2 || !api) {
      warnings.push(`local: ignoring ${relative}: not a document of any managed API`);
      continue;
    }
    if (api.versions.kind === 'lockstep') {
      warnings.push(`local: ignoring ${relative}: ${ident} is lockstep`);
      continue;
    }

    if (isLatestLinkBasename(ident, basename)) {
      filesFor(ident).latestLink = await readLatestLink(relative, absolute, entry.isSymbolicLink());
      continue;
    }

    const parsed = parseVersionedBasename(ident, basename);
    if (parsed.status === 'not-ours') {
      warnings.push(`local: ignoring ${relative}: ${parsed.reason}`);
      continue;
    }
    if (parsed.status === 'malformed') {
      filesFor(ident).files.push({
        path: relative,
        name: undefined,
        version: parsed.version,
        contents: undefined,
        defect: new SpecFileError(relative, 'file-name', parsed.reason),
      });
      continue;
    }
    if (parsed.name.kind === 'lockstep') continue;
    filesFor(ident).files.push(await readVersioned(parsed.name, relative, absolute, cache));
  }

  const apisWithFiles = new Map<string, LocalApiFiles>();
  for (const [ident, entry] of byApi) {
    apisWithFiles.set(ident, { files: entry.files, latestLink: entry.latestLink });
  }
  logDebug(`[local] ${files.length} files under ${env.documentsDir}`, { warnings: warnings.length });
  return { apis: apisWithFiles, warnings };
}

async function readContents(relative: string, absolute: string): Promise<{ contents?: string; defect?: SpecFileError }> {
  try {
    return { contents: await fs.readFile(absolute, 'utf8') };
  } catch (error) {
    return { defect: new SpecFileError(relative, 'io', `cannot read: ${getErrorMessage(error)}`) };
  }
}

async function readLockstep(api: ManagedApi, relative: string, absolute: string): Promise<LocalFile> {
  const version = api.latestVersion;
  const { contents, defect } = await readContents(relative, absolute);
  return { path: relative, name: lockstepFileName(api.ident, version), version, contents, defect };
}

async function readVersioned(
  name: VersionedFileName,
  relative: string,
  absolute: string,
  cache: GitContentCache,
): Promise<LocalFile> {
  const base = { path: relative, name, version: name.version };
  const read = await readContents(relative, absolute);
  if (read.contents === undefined) {
    return { ...base, contents: undefined, defect: read.defect };
  }

  let contents = read.contents;
  if (name.kind === 'versioned-git-ref') {
    const ref = parseGitRef(relative, read.contents);
    if (!ref.ok) return { ...base, contents: undefined, defect: ref.error };
    const target = await cache.resolve(ref.value);
    if (!target.ok) {
      return { ...base, contents: undefined, defect: new SpecFileError(relative, 'git-ref', target.error.message) };
    }
    contents = target.value;
  }

  const checked = parseSpecFile(toJsonFileName(name), contents);
  return { ...base, contents, defect: checked.ok ? undefined : checked.error };
}

async function readLatestLink(relative: string, absolute: string, isSymlink: boolean): Promise<LatestLink> {
  if (!isSymlink) return { path: relative, target: undefined };
  try {
    return { path: relative, target: path.basename(await fs.readlink(absolute)) };
  } catch (error) {
    if (errnoCode(error) === 'EINVAL') return { path: relative, target: undefined };
    throw error;
  }
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
