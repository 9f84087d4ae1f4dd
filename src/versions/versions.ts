/**
 * @fileoverview Version model for managed APIs
 *
 * A lockstep API has exactly one current version. A versioned API declares
 * the ordered set of versions it supports at once, newest first, each a
 * whole major number with a constant-style label:
 *
 * ```ts
 * const { supported, latest, constants } = apiVersions([
 *   [3, 'ADD_TOYS'],
 *   [2, 'RENAME_OWNER'],
 *   [1, 'INITIAL'],
 * ]);
 * constants.VERSION_ADD_TOYS; // { major: 3, minor: 0, patch: 0 }
 * ```
 */

import { VersionsError } from '../core/errors.js';
import { compareSemver, formatSemver, parseSemver, semver, type Semver } from './semver.js';

// ============================================================================
// TYPES
// ============================================================================

export interface SupportedVersion {
  readonly major: number;
  readonly label: string;
  readonly semver: Semver;
}

/** Non-empty, strictly descending by major; the first entry is the latest. */
export type SupportedVersions = readonly [SupportedVersion, ...SupportedVersion[]];

export type VersionModel =
  | { readonly kind: 'lockstep'; readonly version: Semver }
  | { readonly kind: 'versioned'; readonly supported: SupportedVersions };

export type VersionEntry = readonly [major: number, label: string];

const LABEL_PATTERN = /^[A-Z][A-Z0-9_]*$/;

// ============================================================================
// CONSTRUCTION
// ============================================================================

export function supportedVersions(entries: readonly VersionEntry[]): SupportedVersions {
  const [first, ...rest] = entries;
  if (first === undefined) {
    throw new VersionsError('supported versions must not be empty');
  }

  const seenMajors = new Set<number>();
  const seenLabels = new Set<string>();
  const checked: SupportedVersion[] = [];
  let previous: number | undefined;

  for (const [major, label] of [first, ...rest]) {
    if (!Number.isSafeInteger(major) || major < 1) {
      throw new VersionsError(`version ${major} (${label}): version numbers must be integers >= 1`);
    }
    if (!LABEL_PATTERN.test(label)) {
      throw new VersionsError(
        `version ${major}: label ${JSON.stringify(label)} must be an uppercase identifier (e.g. ADD_WIDGETS)`,
      );
    }
    if (seenMajors.has(major)) {
      throw new VersionsError(`version ${major} (${label}) is listed more than once`);
    }
    if (seenLabels.has(label)) {
      throw new VersionsError(`label ${label} is used by more than one version`);
    }
    if (previous !== undefined && major > previous) {
      throw new VersionsError(
        `versions must be listed newest first: ${major} (${label}) follows ${previous}`,
      );
    }
    seenMajors.add(major);
    seenLabels.add(label);
    previous = major;
    checked.push({ major, label, semver: semver(major) });
  }

  const [head, ...tail] = checked;
  if (head === undefined) {
    throw new VersionsError('supported versions must not be empty');
  }
  return [head, ...tail];
}

export function lockstep(version: string | Semver): VersionModel {
  return { kind: 'lockstep', version: typeof version === 'string' ? parseSemver(version) : version };
}

export function versioned(entries: readonly VersionEntry[]): VersionModel {
  return { kind: 'versioned', supported: supportedVersions(entries) };
}

export interface ApiVersions {
  supported: SupportedVersions;
  latest: Semver;
  /** `VERSION_<LABEL>` for every entry, for referencing versions in code. */
  constants: Readonly<Record<string, Semver>>;
}

export function apiVersions(entries: readonly VersionEntry[]): ApiVersions {
  const supported = supportedVersions(entries);
  const constants: Record<string, Semver> = {};
  for (const entry of supported) {
    constants[`VERSION_${entry.label}`] = entry.semver;
  }
  return { supported, latest: supported[0].semver, constants };
}

// ============================================================================
// QUERIES
// ============================================================================

/** Lockstep yields its single version; versioned yields newest first. */
export function iterSemvers(model: VersionModel): Semver[] {
  if (model.kind === 'lockstep') return [model.version];
  return model.supported.map((entry) => entry.semver);
}

export function latestSemver(model: VersionModel): Semver {
  return model.kind === 'lockstep' ? model.version : model.supported[0].semver;
}

export function lowestSemver(model: VersionModel): Semver {
  if (model.kind === 'lockstep') return model.version;
  return model.supported[model.supported.length - 1]?.semver ?? model.supported[0].semver;
}

export function isSupported(model: VersionModel, version: Semver): boolean {
  return iterSemvers(model).some((candidate) => compareSemver(candidate, version) === 0);
}

export function labelFor(model: VersionModel, version: Semver): string | undefined {
  if (model.kind === 'lockstep') return undefined;
  return model.supported.find((entry) => compareSemver(entry.semver, version) === 0)?.label;
}

export function describeVersionModel(model: VersionModel): string {
  if (model.kind === 'lockstep') {
    return `lockstep ${formatSemver(model.version)}`;
  }
  return `versioned (${model.supported.map((entry) => `${entry.major}:${entry.label}`).join(', ')})`;
}
