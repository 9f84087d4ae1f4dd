/**
 * @fileoverview Blessed source: documents committed upstream
 *
 * Blessed documents are read at the merge base of HEAD and the upstream
 * branch, so that anything merged upstream after this branch was cut does
 * not count against it. Files stored as git refs are followed through the
 * per-run content cache.
 */

import type { ManagedApis } from '../apis/managed_apis.js';
import { GitError, SpecFileError, type WardenError } from '../core/errors.js';
import { Err, Ok, type Result } from '../core/result.js';
import { repoPathOf, type Environment } from '../environment/environment.js';
import { parseGitRef, type CommitHash, type GitClient, type GitContentCache, type GitRef } from '../git/git.js';
import { logDebug } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import { isLatestLinkBasename } from '../versions/api_ident.js';
import { formatSemver } from '../versions/semver.js';
import {
  ApiSpecFilesBuilder,
  type ApiSpecFiles,
  type BlessedDocument,
  type BlessedVersion,
  type FirstCommit,
} from './api_files.js';
import { fileNamePath, parseVersionedBasename, toJsonFileName, type VersionedFileName } from './file_name.js';
import { parseSpecFile } from './spec_file.js';

export interface BlessedSnapshot {
  /** Commit the blessed documents were read from. */
  readonly commit: CommitHash;
  readonly files: ApiSpecFiles<BlessedVersion>;
}

interface BlessedCandidate {
  ident: string;
  name: VersionedFileName;
  /** Documents-relative path as stored in history. */
  path: string;
}

export async function loadBlessedFromGit(
  env: Environment,
  apis: ManagedApis,
  git: GitClient,
  cache: GitContentCache,
): Promise<BlessedSnapshot> {
  const commit = await git.mergeBase('HEAD', env.upstreamBranch);
  logDebug(`[blessed] reading ${env.documentsDirInRepo} at ${commit} (merge base with ${env.upstreamBranch})`);

  const builder = new ApiSpecFilesBuilder<BlessedVersion>('blessed');
  const prefix = `${env.documentsDirInRepo}/`;
  const candidates: BlessedCandidate[] = [];

  for (const repoPath of await git.listFiles(commit, env.documentsDirInRepo)) {
    if (!repoPath.startsWith(prefix)) continue;
    const candidate = classifyBlessedPath(repoPath.slice(prefix.length), apis, builder);
    if (candidate) candidates.push(candidate);
  }

  const loaded = await Promise.all(
    candidates.map(async (candidate) => ({
      candidate,
      entry: await loadCandidate(env, commit, candidate, git, cache),
    })),
  );

  for (const { candidate, entry } of loaded) {
    const { ident, name } = candidate;
    if (builder.set(ident, name.version, entry)) continue;
    const existing = builder.get(ident, name.version);
    if (existing?.status === 'resolved' && entry.status === 'resolved' && existing.document.file.name.hash === name.hash) {
      // The same document stored both as JSON and as a git ref.
      continue;
    }
    builder.replace(ident, name.version, {
      status: 'unresolved',
      path: candidate.path,
      error: new SpecFileError(
        candidate.path,
        'structure',
        `more than one blessed document for ${ident} v${formatSemver(name.version)}`,
      ),
    });
  }

  const files = builder.build();
  logDebug(`[blessed] loaded ${loaded.length} documents`, { warnings: files.warnings.length });
  return { commit, files };
}

function classifyBlessedPath(
  relative: string,
  apis: ManagedApis,
  builder: ApiSpecFilesBuilder<BlessedVersion>,
): BlessedCandidate | undefined {
  const segments = relative.split('/');

  if (segments.length === 1) {
    const [basename = ''] = segments;
    const stem = basename.endsWith('.json') ? basename.slice(0, -'.json'.length) : undefined;
    const api = stem === undefined ? undefined : apis.get(stem);
    if (!api) {
      builder.warn(`ignoring ${relative}: not a document of any managed API`);
    } else if (api.isVersioned) {
      builder.warn(`ignoring ${relative}: ${api.ident} is versioned but this is a lockstep file`);
    }
    // Lockstep documents have no history contract; blessed copies are not used.
    return undefined;
  }

  const [ident = '', basename = ''] = segments;
  const api = apis.get(ident);
  if (segments.length !== 2 || !api) {
    builder.warn(`ignoring ${relative}: not a document of any managed API`);
    return undefined;
  }
  if (!api.isVersioned) {
    builder.warn(`ignoring ${relative}: ${ident} is lockstep but this is a versioned file`);
    return undefined;
  }
  if (isLatestLinkBasename(ident, basename)) return undefined;

  const parsed = parseVersionedBasename(ident, basename);
  if (parsed.status !== 'ok' || parsed.name.kind === 'lockstep') {
    builder.warn(`ignoring ${relative}: ${parsed.status === 'ok' ? 'unexpected name' : parsed.reason}`);
    return undefined;
  }
  return { ident, name: parsed.name, path: relative };
}

async function loadCandidate(
  env: Environment,
  commit: CommitHash,
  candidate: BlessedCandidate,
  git: GitClient,
  cache: GitContentCache,
): Promise<BlessedVersion> {
  const repoPath = repoPathOf(env, candidate.path);
  const stored = await cache.resolve({ commit, path: repoPath });
  if (!stored.ok) return unresolved(candidate, stored.error);

  let contents = stored.value;
  let storedRef: GitRef | undefined;
  if (candidate.name.kind === 'versioned-git-ref') {
    const ref = parseGitRef(candidate.path, stored.value);
    if (!ref.ok) return unresolved(candidate, ref.error);
    const target = await cache.resolve(ref.value);
    if (!target.ok) return unresolved(candidate, target.error);
    contents = target.value;
    storedRef = ref.value;
  }

  const name = toJsonFileName(candidate.name);
  const file = parseSpecFile(name, contents);
  if (!file.ok) return unresolved(candidate, file.error);

  const firstCommit = await findFirstCommit(env, commit, name, storedRef, git);
  if (!firstCommit.ok) return unresolved(candidate, firstCommit.error);

  const document: BlessedDocument = { file: { ...file.value, name }, firstCommit: firstCommit.value };
  return { status: 'resolved', document };
}

async function findFirstCommit(
  env: Environment,
  commit: CommitHash,
  name: VersionedFileName,
  storedRef: GitRef | undefined,
  git: GitClient,
): Promise<Result<FirstCommit, GitError>> {
  if (!env.gitRefStorage) return Ok({ kind: 'not-tracked' });
  // A git ref already records where the JSON file was introduced.
  if (storedRef) return Ok({ kind: 'known', ref: storedRef });

  const repoPath = repoPathOf(env, fileNamePath(name));
  try {
    const first = await git.firstCommitForFile(commit, repoPath);
    return Ok(first ? { kind: 'known', ref: { commit: first, path: repoPath } } : { kind: 'unknown', path: repoPath });
  } catch (error) {
    if (error instanceof GitError) return Err(error);
    return Err(new GitError('log', getErrorMessage(error)));
  }
}

function unresolved(candidate: BlessedCandidate, error: WardenError): BlessedVersion {
  return { status: 'unresolved', path: candidate.path, error };
}
