/**
 * @fileoverview Canonical names of OpenAPI document files
 *
 * Paths are relative to the documents directory:
 *
 *   lockstep            <ident>.json
 *   versioned           <ident>/<ident>-<semver>-<hash>.json
 *   versioned, git ref  <ident>/<ident>-<semver>-<hash>.json.gitref
 *   latest link         <ident>/<ident>-latest.json
 *
 * A versioned name is content addressed, so two different documents for the
 * same version can never share a name.
 */

import * as path from 'path';
import type { ApiIdent } from '../versions/api_ident.js';
import { formatSemver, tryParseSemver, type Semver } from '../versions/semver.js';
import type { VersionModel } from '../versions/versions.js';
import { hashContents, isContentHash } from './hash.js';

// ============================================================================
// TYPES
// ============================================================================

export type ApiSpecFileName =
  | { readonly kind: 'lockstep'; readonly ident: ApiIdent; readonly version: Semver }
  | {
      readonly kind: 'versioned' | 'versioned-git-ref';
      readonly ident: ApiIdent;
      readonly version: Semver;
      readonly hash: string;
    };

export type VersionedFileName = Extract<ApiSpecFileName, { kind: 'versioned' | 'versioned-git-ref' }>;

export const JSON_SUFFIX = '.json';
export const GIT_REF_SUFFIX = '.gitref';

// ============================================================================
// CONSTRUCTION
// ============================================================================

export function lockstepFileName(ident: ApiIdent, version: Semver): ApiSpecFileName {
  return { kind: 'lockstep', ident, version };
}

export function versionedFileName(
  ident: ApiIdent,
  version: Semver,
  hash: string,
  kind: VersionedFileName['kind'] = 'versioned',
): VersionedFileName {
  return { kind, ident, version, hash };
}

/**
 * The name a document with these exact contents must have. Fixed for
 * lockstep APIs; derived from the contents for versioned ones.
 */
export function nameFor(ident: ApiIdent, model: VersionModel, version: Semver, contents: string): ApiSpecFileName {
  if (model.kind === 'lockstep') {
    return lockstepFileName(ident, version);
  }
  return versionedFileName(ident, version, hashContents(contents));
}

export function toJsonFileName(name: VersionedFileName): VersionedFileName {
  return { ...name, kind: 'versioned' };
}

export function toGitRefFileName(name: VersionedFileName): VersionedFileName {
  return { ...name, kind: 'versioned-git-ref' };
}

// ============================================================================
// RENDERING
// ============================================================================

export function fileNameBasename(name: ApiSpecFileName): string {
  switch (name.kind) {
    case 'lockstep':
      return `${name.ident}${JSON_SUFFIX}`;
    case 'versioned':
      return `${name.ident}-${formatSemver(name.version)}-${name.hash}${JSON_SUFFIX}`;
    case 'versioned-git-ref':
      return `${name.ident}-${formatSemver(name.version)}-${name.hash}${JSON_SUFFIX}${GIT_REF_SUFFIX}`;
  }
}

/** Path relative to the documents directory, always with `/` separators. */
export function fileNamePath(name: ApiSpecFileName): string {
  if (name.kind === 'lockstep') return fileNameBasename(name);
  return path.posix.join(name.ident, fileNameBasename(name));
}

// ============================================================================
// PARSING
// ============================================================================

export type FileNameParse =
  | { readonly status: 'ok'; readonly name: ApiSpecFileName }
  | { readonly status: 'not-ours'; readonly reason: string }
  | { readonly status: 'malformed'; readonly reason: string; readonly version?: Semver };

export function parseLockstepBasename(ident: ApiIdent, version: Semver, basename: string): FileNameParse {
  if (basename !== `${ident}${JSON_SUFFIX}`) {
    return { status: 'not-ours', reason: `expected ${ident}${JSON_SUFFIX}` };
  }
  return { status: 'ok', name: lockstepFileName(ident, version) };
}

/**
 * Parse a file name found in `<ident>/`. Names without the `<ident>-` prefix
 * or a `.json`/`.json.gitref` suffix are not document files at all; names
 * with both but a bad version or hash are malformed document files.
 */
export function parseVersionedBasename(ident: ApiIdent, basename: string): FileNameParse {
  const prefix = `${ident}-`;
  if (!basename.startsWith(prefix)) {
    return { status: 'not-ours', reason: `expected a name starting with "${prefix}"` };
  }

  let kind: VersionedFileName['kind'];
  let stem: string;
  if (basename.endsWith(`${JSON_SUFFIX}${GIT_REF_SUFFIX}`)) {
    kind = 'versioned-git-ref';
    stem = basename.slice(prefix.length, -`${JSON_SUFFIX}${GIT_REF_SUFFIX}`.length);
  } else if (basename.endsWith(JSON_SUFFIX)) {
    kind = 'versioned';
    stem = basename.slice(prefix.length, -JSON_SUFFIX.length);
  } else {
    return { status: 'not-ours', reason: `expected a ${JSON_SUFFIX} or ${JSON_SUFFIX}${GIT_REF_SUFFIX} file` };
  }

  const separator = stem.lastIndexOf('-');
  if (separator === -1) {
    return { status: 'malformed', reason: 'expected "<version>-<hash>" after the API name' };
  }
  const versionText = stem.slice(0, separator);
  const hash = stem.slice(separator + 1);
  const version = tryParseSemver(versionText);
  if (!version) {
    return { status: 'malformed', reason: `${JSON.stringify(versionText)} is not a semver` };
  }
  if (!isContentHash(hash)) {
    return { status: 'malformed', reason: `${JSON.stringify(hash)} is not a content hash`, version };
  }
  return { status: 'ok', name: versionedFileName(ident, version, hash, kind) };
}
