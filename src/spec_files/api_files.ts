/**
 * @fileoverview What each source knows about each managed API
 *
 * The three loaders (blessed, generated, local) each produce one of the
 * shapes below. The resolution engine only ever sees these values; it never
 * reads files or runs git itself.
 */

import type { WardenError } from '../core/errors.js';
import type { GitRef } from '../git/git.js';
import type { ApiIdent } from '../versions/api_ident.js';
import { formatSemver, type Semver } from '../versions/semver.js';
import type { ApiSpecFileName, VersionedFileName } from './file_name.js';
import type { ApiSpecFile } from './spec_file.js';

// ============================================================================
// BLESSED
// ============================================================================

/**
 * Where a blessed versioned file first entered history. Only tracked when
 * git-ref storage is enabled.
 */
export type FirstCommit =
  | { readonly kind: 'not-tracked' }
  | { readonly kind: 'known'; readonly ref: GitRef }
  | { readonly kind: 'unknown'; readonly path: string };

export interface BlessedDocument {
  /** Always the JSON-kind name, even when history stores a git ref. */
  readonly file: ApiSpecFile & { readonly name: VersionedFileName };
  readonly firstCommit: FirstCommit;
}

export type BlessedVersion =
  | { readonly status: 'resolved'; readonly document: BlessedDocument }
  | { readonly status: 'unresolved'; readonly path: string; readonly error: WardenError };

// ============================================================================
// LOCAL
// ============================================================================

export interface LocalFile {
  /** Relative to the documents directory, `/`-separated. */
  readonly path: string;
  /** Undefined when the file name itself is malformed. */
  readonly name: ApiSpecFileName | undefined;
  readonly version: Semver | undefined;
  /** Document bytes; for git-ref files, the bytes the ref points at. */
  readonly contents: string | undefined;
  /** Why the file does not describe its own contents, if it does not. */
  readonly defect: WardenError | undefined;
}

export interface LatestLink {
  readonly path: string;
  /** Basename the link points at; undefined when the file is not a link. */
  readonly target: string | undefined;
}

export interface LocalApiFiles {
  readonly files: readonly LocalFile[];
  readonly latestLink: LatestLink | undefined;
}

/** A local file whose name, version and contents all agree. */
export type SoundLocalFile = LocalFile & {
  readonly name: ApiSpecFileName;
  readonly version: Semver;
  readonly contents: string;
  readonly defect: undefined;
};

export function isSoundLocalFile(file: LocalFile): file is SoundLocalFile {
  return (
    file.name !== undefined && file.version !== undefined && file.contents !== undefined && file.defect === undefined
  );
}

// ============================================================================
// PER-API SOURCES
// ============================================================================

export type VersionKey = string;

export function versionKey(version: Semver): VersionKey {
  return formatSemver(version);
}

export interface ApiSources {
  readonly blessed: ReadonlyMap<VersionKey, BlessedVersion>;
  readonly generated: ReadonlyMap<VersionKey, ApiSpecFile>;
  readonly local: LocalApiFiles;
}

export const EMPTY_LOCAL_FILES: LocalApiFiles = { files: [], latestLink: undefined };

// ============================================================================
// BUILDER
// ============================================================================

/**
 * Collects per-API, per-version entries while a source is loaded, together
 * with warnings (ignored files) and errors (fatal for one API).
 */
export class ApiSpecFilesBuilder<T> {
  private readonly entries = new Map<ApiIdent, Map<VersionKey, T>>();
  private readonly apiErrors = new Map<ApiIdent, WardenError>();
  readonly warnings: string[] = [];

  constructor(readonly source: 'blessed' | 'generated' | 'local') {}

  /** Returns false, and keeps the first entry, when the version is already set. */
  set(ident: ApiIdent, version: Semver, entry: T): boolean {
    let byVersion = this.entries.get(ident);
    if (!byVersion) {
      byVersion = new Map();
      this.entries.set(ident, byVersion);
    }
    const key = versionKey(version);
    if (byVersion.has(key)) return false;
    byVersion.set(key, entry);
    return true;
  }

  get(ident: ApiIdent, version: Semver): T | undefined {
    return this.entries.get(ident)?.get(versionKey(version));
  }

  replace(ident: ApiIdent, version: Semver, entry: T): void {
    if (!this.set(ident, version, entry)) {
      this.entries.get(ident)?.set(versionKey(version), entry);
    }
  }

  warn(message: string): void {
    this.warnings.push(`${this.source}: ${message}`);
  }

  failApi(ident: ApiIdent, error: WardenError): void {
    if (!this.apiErrors.has(ident)) {
      this.apiErrors.set(ident, error);
    }
  }

  build(): ApiSpecFiles<T> {
    return new ApiSpecFiles(this.source, this.entries, this.apiErrors, [...this.warnings]);
  }
}

export class ApiSpecFiles<T> {
  constructor(
    readonly source: 'blessed' | 'generated' | 'local',
    private readonly entries: ReadonlyMap<ApiIdent, ReadonlyMap<VersionKey, T>>,
    readonly apiErrors: ReadonlyMap<ApiIdent, WardenError>,
    readonly warnings: readonly string[],
  ) {}

  forApi(ident: ApiIdent): ReadonlyMap<VersionKey, T> {
    return this.entries.get(ident) ?? new Map();
  }

  errorFor(ident: ApiIdent): WardenError | undefined {
    return this.apiErrors.get(ident);
  }
}
