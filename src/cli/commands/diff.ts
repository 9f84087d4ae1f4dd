/**
 * @fileoverview diff command - working-tree documents against blessed ones
 *
 * Versions come from both sources, oldest first. A version only present
 * locally is diffed against the newest older blessed version (or against
 * nothing), one only present in blessed history against nothing. Lockstep
 * APIs have no blessed history and are skipped.
 */

import type { ManagedApi } from '../../apis/managed_apis.js';
import { GitContentCache } from '../../git/git.js';
import { EMPTY_LOCAL_FILES, isSoundLocalFile, type SoundLocalFile } from '../../spec_files/api_files.js';
import { loadBlessedFromGit } from '../../spec_files/blessed.js';
import { fileNamePath } from '../../spec_files/file_name.js';
import { loadLocal } from '../../spec_files/local.js';
import { logWarning } from '../../telemetry/logger.js';
import { DEV_NULL, unifiedDiff } from '../../utils/line_diff.js';
import { compareSemver, formatSemver, type Semver } from '../../versions/semver.js';
import type { CommandContext } from '../context.js';

export type DifferenceKind = 'added' | 'removed' | 'modified';

export interface VersionDifference {
  ident: string;
  version: string;
  kind: DifferenceKind;
  oldPath: string;
  newPath: string;
  diff: string[];
}

export interface DocumentSide {
  path: string;
  version: Semver;
  contents: string;
}

const HEADINGS: Record<DifferenceKind, string> = {
  added: 'added (new locally)',
  removed: 'removed (removed locally)',
  modified: 'modified',
};

function localSides(files: readonly SoundLocalFile[]): Map<string, DocumentSide> {
  const sides = new Map<string, DocumentSide>();
  for (const file of files) {
    const key = formatSemver(file.version);
    if (!sides.has(key)) sides.set(key, { path: file.path, version: file.version, contents: file.contents });
  }
  return sides;
}

function difference(
  api: ManagedApi,
  kind: DifferenceKind,
  version: Semver,
  oldSide: DocumentSide | undefined,
  newSide: DocumentSide | undefined,
): VersionDifference {
  const oldPath = oldSide?.path ?? DEV_NULL;
  const newPath = newSide?.path ?? DEV_NULL;
  let diff = unifiedDiff(oldPath, oldSide?.contents ?? '', newPath, newSide?.contents ?? '');
  if (diff.length === 0) {
    diff = [`--- ${oldPath}`, `+++ ${newPath}`, '(only the trailing newline differs)'];
  }
  return { ident: api.ident, version: formatSemver(version), kind, oldPath, newPath, diff };
}

export function diffApi(
  api: ManagedApi,
  blessed: ReadonlyMap<string, DocumentSide>,
  local: ReadonlyMap<string, DocumentSide>,
): VersionDifference[] {
  const byKey = new Map<string, Semver>();
  for (const side of [...blessed.values(), ...local.values()]) {
    byKey.set(formatSemver(side.version), side.version);
  }
  const versions = [...byKey.values()].sort(compareSemver);

  const differences: VersionDifference[] = [];
  for (const version of versions) {
    const key = formatSemver(version);
    const blessedSide = blessed.get(key);
    const localSide = local.get(key);

    if (localSide && !blessedSide) {
      const previous = [...blessed.values()]
        .filter((side) => compareSemver(side.version, version) < 0)
        .sort((a, b) => compareSemver(b.version, a.version))[0];
      if (previous?.contents === localSide.contents) continue;
      differences.push(difference(api, 'added', version, previous, localSide));
    } else if (blessedSide && !localSide) {
      differences.push(difference(api, 'removed', version, blessedSide, undefined));
    } else if (blessedSide && localSide && blessedSide.contents !== localSide.contents) {
      differences.push(difference(api, 'modified', version, blessedSide, localSide));
    }
  }
  return differences;
}

export async function diffCommand(ctx: CommandContext): Promise<number> {
  const cache = new GitContentCache(ctx.git);
  const [blessed, local] = await Promise.all([
    loadBlessedFromGit(ctx.env, ctx.apis, ctx.git, cache),
    loadLocal(ctx.env, ctx.apis, cache),
  ]);
  for (const warning of [...blessed.files.warnings, ...local.warnings]) {
    logWarning(warning);
  }

  const differences: VersionDifference[] = [];
  for (const api of ctx.apis.list()) {
    if (api.versions.kind === 'lockstep') continue;
    const error = blessed.files.errorFor(api.ident);
    if (error) {
      logWarning(`${api.ident}: ${error.message}`);
      continue;
    }

    const blessedSides = new Map<string, DocumentSide>();
    for (const [key, entry] of blessed.files.forApi(api.ident)) {
      if (entry.status === 'unresolved') {
        logWarning(`${api.ident} v${key}: skipping unreadable blessed document ${entry.path}: ${entry.error.message}`);
        continue;
      }
      const { file } = entry.document;
      blessedSides.set(key, { path: fileNamePath(file.name), version: file.name.version, contents: file.contents });
    }
    const { files } = local.apis.get(api.ident) ?? EMPTY_LOCAL_FILES;
    differences.push(...diffApi(api, blessedSides, localSides(files.filter(isSoundLocalFile))));
  }

  if (ctx.json) {
    console.log(JSON.stringify({ blessedCommit: blessed.commit, differences }, null, 2));
    return 0;
  }
  if (differences.length === 0) {
    console.log('No differences from blessed.');
    return 0;
  }

  const lines: string[] = [];
  for (const entry of differences) {
    if (lines.length > 0) lines.push('');
    lines.push(`${entry.ident} v${entry.version}: ${HEADINGS[entry.kind]}`, ...entry.diff);
  }
  console.log(lines.join('\n'));
  return 0;
}
