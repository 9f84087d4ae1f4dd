/**
 * @fileoverview Loads all three sources for one run
 */

import type { ManagedApis } from '../apis/managed_apis.js';
import type { Environment } from '../environment/environment.js';
import { GitContentCache, type CommitHash, type GitClient } from '../git/git.js';
import type { LoadedSources } from '../resolve/resolver.js';
import { logDebug } from '../telemetry/logger.js';
import { loadBlessedFromGit } from './blessed.js';
import { loadGenerated } from './generated.js';
import { loadLocal } from './local.js';

export interface LoadedRun extends LoadedSources {
  readonly blessedCommit: CommitHash;
}

/**
 * Git failures that prevent reading blessed documents at all (no merge
 * base, missing upstream) reject; failures scoped to one API or one file
 * are recorded in the sources instead.
 */
export async function loadSources(env: Environment, apis: ManagedApis, git: GitClient): Promise<LoadedRun> {
  const cache = new GitContentCache(git);
  const [blessed, generated, local] = await Promise.all([
    loadBlessedFromGit(env, apis, git, cache),
    loadGenerated(apis),
    loadLocal(env, apis, cache),
  ]);
  logDebug(`[load] ${apis.size} APIs, ${cache.size} git objects read`);
  return { blessed: blessed.files, generated, local, blessedCommit: blessed.commit };
}
