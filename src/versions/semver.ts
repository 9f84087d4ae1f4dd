/**
 * @fileoverview Plain MAJOR.MINOR.PATCH versions
 *
 * Document versions never carry pre-release or build metadata, so the
 * grammar is the three numeric components only.
 */

import { VersionsError } from '../core/errors.js';

export interface Semver {
  readonly major: number;
  readonly minor: number;
  readonly patch: number;
}

const SEMVER_PATTERN = /^(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)$/;

export function tryParseSemver(text: string): Semver | undefined {
  const match = SEMVER_PATTERN.exec(text);
  if (!match) return undefined;
  return { major: Number(match[1]), minor: Number(match[2]), patch: Number(match[3]) };
}

export function parseSemver(text: string): Semver {
  const parsed = tryParseSemver(text);
  if (!parsed) {
    throw new VersionsError(`invalid semver ${JSON.stringify(text)} (expected MAJOR.MINOR.PATCH)`);
  }
  return parsed;
}

export function semver(major: number, minor = 0, patch = 0): Semver {
  for (const component of [major, minor, patch]) {
    if (!Number.isSafeInteger(component) || component < 0) {
      throw new VersionsError(`invalid semver component ${component}`);
    }
  }
  return { major, minor, patch };
}

export function formatSemver(version: Semver): string {
  return `${version.major}.${version.minor}.${version.patch}`;
}

export function compareSemver(a: Semver, b: Semver): number {
  return a.major - b.major || a.minor - b.minor || a.patch - b.patch;
}

export function semverEquals(a: Semver, b: Semver): boolean {
  return compareSemver(a, b) === 0;
}
