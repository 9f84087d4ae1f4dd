/**
 * @fileoverview Git plumbing for the blessed source
 *
 * Every command runs with the repository root as its working directory, so
 * paths handed to git are repository-relative regardless of where the CLI
 * was started. `$GIT` overrides the binary.
 */

import { execa } from 'execa';
import { GitError, SpecFileError, type GitOperation } from '../core/errors.js';
import { Err, Ok, type Result } from '../core/result.js';
import { logDebug } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';

// ============================================================================
// TYPES
// ============================================================================

/** Full SHA-1 (40) or SHA-256 (64) object name, lowercase hex. */
export type CommitHash = string;

/** Anything `git rev-parse` understands: a branch, tag or commit. */
export type GitRevision = string;

/** Pointer to a file at a specific commit. */
export interface GitRef {
  readonly commit: CommitHash;
  readonly path: string;
}

/**
 * Read access to history. The execa-backed client is the only production
 * implementation; tests substitute an in-memory one.
 */
export interface GitClient {
  mergeBase(revisionA: GitRevision, revisionB: GitRevision): Promise<CommitHash>;
  /** Files under `dir` at `revision`, as repository-relative paths. */
  listFiles(revision: GitRevision, dir: string): Promise<string[]>;
  /** Contents of `path` at `revision`, or undefined when it does not exist there. */
  readFile(revision: GitRevision, path: string): Promise<string | undefined>;
  /** Commit that added `path`, walking back from `revision`. */
  firstCommitForFile(revision: GitRevision, path: string): Promise<CommitHash | undefined>;
}

// ============================================================================
// COMMIT HASHES AND GIT REFS
// ============================================================================

const COMMIT_HASH_PATTERN = /^([0-9a-f]{40}|[0-9a-f]{64})$/;

export function isCommitHash(text: string): boolean {
  return COMMIT_HASH_PATTERN.test(text);
}

export function parseCommitHash(text: string): Result<CommitHash, GitError> {
  if (!isCommitHash(text)) {
    return Err(new GitError('rev-parse', `${JSON.stringify(text)} is not a full commit hash`));
  }
  return Ok(text);
}

/** Git ref files hold `<commit>:<path>` and a trailing newline. */
export function formatGitRef(ref: GitRef): string {
  return `${ref.commit}:${ref.path}\n`;
}

export function parseGitRef(file: string, text: string): Result<GitRef, SpecFileError> {
  const line = text.endsWith('\n') ? text.slice(0, -1) : text;
  const separator = line.indexOf(':');
  if (separator === -1 || line.includes('\n')) {
    return Err(new SpecFileError(file, 'git-ref', 'expected a single "<commit>:<path>" line'));
  }
  const commit = line.slice(0, separator);
  const refPath = line.slice(separator + 1);
  if (!isCommitHash(commit)) {
    return Err(new SpecFileError(file, 'git-ref', `${JSON.stringify(commit)} is not a full commit hash`));
  }
  if (refPath.length === 0) {
    return Err(new SpecFileError(file, 'git-ref', 'path after the commit is empty'));
  }
  return Ok({ commit, path: refPath });
}

export function gitRefKey(ref: GitRef): string {
  return `${ref.commit}:${ref.path}`;
}

// ============================================================================
// EXECA CLIENT
// ============================================================================

export function gitBinary(): string {
  const fromEnv = process.env.GIT?.trim();
  return fromEnv && fromEnv.length > 0 ? fromEnv : 'git';
}

interface GitRun {
  exitCode: number;
  stdout: string;
  stderr: string;
}

const MISSING_OBJECT_PATTERNS = [
  'does not exist',
  'exists on disk, but not in',
  'Not a valid object name',
  'bad revision',
];

export class ExecaGitClient implements GitClient {
  constructor(readonly repoRoot: string) {}

  private async run(operation: GitOperation, args: string[]): Promise<GitRun> {
    const binary = gitBinary();
    logDebug(`[git] ${binary} ${args.join(' ')}`, { cwd: this.repoRoot });
    try {
      const result = await execa(binary, args, {
        cwd: this.repoRoot,
        reject: false,
        stripFinalNewline: false,
        maxBuffer: 64 * 1024 * 1024,
      });
      return {
        exitCode: result.exitCode ?? 1,
        stdout: String(result.stdout),
        stderr: String(result.stderr),
      };
    } catch (error) {
      throw new GitError(operation, `could not run ${binary}: ${getErrorMessage(error)}`);
    }
  }

  private failed(operation: GitOperation, run: GitRun): GitError {
    const stderr = run.stderr.trim();
    return new GitError(operation, stderr || `exited with code ${run.exitCode}`, stderr);
  }

  async mergeBase(revisionA: GitRevision, revisionB: GitRevision): Promise<CommitHash> {
    const run = await this.run('merge-base', ['merge-base', '--all', revisionA, revisionB]);
    if (run.exitCode !== 0) throw this.failed('merge-base', run);
    const output = run.stdout.trim();
    if (/\s/.test(output)) {
      throw new GitError(
        'merge-base',
        `${revisionA} and ${revisionB} have more than one merge base: ${output.split(/\s+/).join(', ')}`,
      );
    }
    const parsed = parseCommitHash(output);
    if (!parsed.ok) throw parsed.error;
    return parsed.value;
  }

  async listFiles(revision: GitRevision, dir: string): Promise<string[]> {
    const run = await this.run('ls-tree', ['ls-tree', '-r', '-z', '--name-only', '--full-tree', revision, '--', dir]);
    if (run.exitCode !== 0) throw this.failed('ls-tree', run);
    return run.stdout.split('\0').filter((entry) => entry.length > 0);
  }

  async readFile(revision: GitRevision, filePath: string): Promise<string | undefined> {
    const run = await this.run('cat-file', ['cat-file', 'blob', `${revision}:${filePath}`]);
    if (run.exitCode === 0) return run.stdout;
    if (MISSING_OBJECT_PATTERNS.some((pattern) => run.stderr.includes(pattern))) {
      return undefined;
    }
    throw this.failed('cat-file', run);
  }

  async firstCommitForFile(revision: GitRevision, filePath: string): Promise<CommitHash | undefined> {
    const run = await this.run('log', ['log', '--diff-filter=A', '--format=%H', revision, '--', filePath]);
    if (run.exitCode !== 0) throw this.failed('log', run);
    // Newest first; the file was added by the oldest listed commit.
    const commits = run.stdout.split('\n').map((line) => line.trim()).filter((line) => line.length > 0);
    const first = commits[commits.length - 1];
    return first !== undefined && isCommitHash(first) ? first : undefined;
  }
}

// ============================================================================
// PER-RUN CONTENT MEMO
// ============================================================================

/**
 * Resolves git refs to file contents, at most once per ref for the lifetime
 * of one run.
 */
export class GitContentCache {
  private readonly entries = new Map<string, Promise<Result<string, GitError>>>();

  constructor(private readonly git: GitClient) {}

  resolve(ref: GitRef): Promise<Result<string, GitError>> {
    const key = gitRefKey(ref);
    const cached = this.entries.get(key);
    if (cached) return cached;
    const pending = this.load(ref);
    this.entries.set(key, pending);
    return pending;
  }

  get size(): number {
    return this.entries.size;
  }

  private async load(ref: GitRef): Promise<Result<string, GitError>> {
    try {
      const contents = await this.git.readFile(ref.commit, ref.path);
      if (contents === undefined) {
        return Err(new GitError('cat-file', `${gitRefKey(ref)} does not exist`));
      }
      return Ok(contents);
    } catch (error) {
      if (error instanceof GitError) return Err(error);
      return Err(new GitError('cat-file', getErrorMessage(error)));
    }
  }
}
