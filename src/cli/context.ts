/**
 * @fileoverview What every command runs against
 */

import * as path from 'path';
import { minimatch } from 'minimatch';
import type { ManagedApis } from '../apis/managed_apis.js';
import { DEFAULT_CONFIG_FILE, loadConfig } from '../config/config.js';
import { createEnvironment, type Environment, type EnvironmentOptions } from '../environment/environment.js';
import { ExecaGitClient, type GitClient } from '../git/git.js';
import { createError } from './errors.js';

export interface CommandContext {
  readonly env: Environment;
  readonly apis: ManagedApis;
  readonly git: GitClient;
  readonly json: boolean;
  readonly verbose: boolean;
  readonly dryRun: boolean;
}

/** Overrides for embedding the CLI in a program that defines its APIs in code. */
export interface RunCliOptions {
  apis?: ManagedApis;
  environment?: Partial<EnvironmentOptions>;
  git?: GitClient;
  cwd?: string;
}

export interface GlobalOptions {
  workspace: string | undefined;
  config: string | undefined;
  blessedFrom: string | undefined;
  apiGlobs: string[];
  json: boolean;
  verbose: boolean;
  dryRun: boolean;
}

export async function createCommandContext(options: GlobalOptions, run: RunCliOptions): Promise<CommandContext> {
  const cwd = run.cwd ?? process.cwd();
  let apis: ManagedApis;
  let fromConfig: Partial<EnvironmentOptions> = {};

  if (run.apis) {
    apis = run.apis;
  } else {
    const configPath = path.resolve(cwd, options.config ?? path.join(options.workspace ?? '.', DEFAULT_CONFIG_FILE));
    const loaded = await loadConfig(configPath);
    apis = loaded.apis;
    fromConfig = loaded.environment;
  }

  const repoRoot = options.workspace
    ? path.resolve(cwd, options.workspace)
    : (run.environment?.repoRoot ?? fromConfig.repoRoot ?? cwd);
  const env = createEnvironment({
    ...fromConfig,
    ...run.environment,
    repoRoot,
    upstreamBranch: options.blessedFrom ?? run.environment?.upstreamBranch ?? fromConfig.upstreamBranch,
  });

  return {
    env,
    apis: selectApis(apis, options.apiGlobs),
    git: run.git ?? new ExecaGitClient(env.repoRoot),
    json: options.json,
    verbose: options.verbose,
    dryRun: options.dryRun,
  };
}

export function selectApis(apis: ManagedApis, globs: readonly string[]): ManagedApis {
  if (globs.length === 0) return apis;
  const selected = apis.filter((api) => globs.some((pattern) => minimatch(api.ident, pattern)));
  if (selected.size === 0) {
    throw createError('UNKNOWN_API', `no managed API matches ${globs.join(', ')}`, { globs });
  }
  return selected;
}
