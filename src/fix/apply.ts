/**
 * @fileoverview Applies a fix plan to the documents directory
 *
 * Fixes run in plan order. Documents are written to a temporary file and
 * renamed into place, so a reader never sees a half-written document. The
 * whole run holds a lock so two generators cannot interleave their writes.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import lockfile from 'proper-lockfile';
import { FixError } from '../core/errors.js';
import { documentPath, type Environment } from '../environment/environment.js';
import { describeFix, type Fix } from '../resolve/fix_planner.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import { getErrorMessage, toError } from '../utils/errors.js';

const LOCK_FILE_NAME = '.openapi-warden.lock';
const LOCK_STALE_TIMEOUT_MS = 30_000;
const LOCK_UPDATE_INTERVAL_MS = 5_000;

export interface ApplyResult {
  readonly applied: readonly Fix[];
}

export async function applyFixes(env: Environment, fixes: readonly Fix[]): Promise<ApplyResult> {
  if (fixes.length === 0) return { applied: [] };

  await fs.mkdir(env.documentsDir, { recursive: true });
  const lockPath = path.join(env.repoRoot, LOCK_FILE_NAME);

  let release: () => Promise<void>;
  try {
    release = await lockfile.lock(env.documentsDir, {
      lockfilePath: lockPath,
      stale: LOCK_STALE_TIMEOUT_MS,
      update: LOCK_UPDATE_INTERVAL_MS,
      onCompromised: (error) => {
        logWarning('documents lock compromised', { path: lockPath, error: error.message });
      },
      retries: { retries: 5, factor: 1.5, minTimeout: 100, maxTimeout: 2_000 },
    });
  } catch (error) {
    throw new FixError('lock', `cannot lock ${env.documentsDir}: ${getErrorMessage(error)}`, toError(error));
  }

  const applied: Fix[] = [];
  try {
    for (const fix of fixes) {
      await applyFix(env, fix);
      applied.push(fix);
      logDebug(`[fix] ${describeFix(fix)}`);
    }
  } finally {
    await release();
  }
  return { applied };
}

async function applyFix(env: Environment, fix: Fix): Promise<void> {
  try {
    switch (fix.kind) {
      case 'write-document':
      case 'write-git-ref':
        await writeAtomically(documentPath(env, fix.path), fix.contents);
        await removeFiles(
          env,
          fix.replaces.filter((replaced) => replaced !== fix.path),
        );
        return;
      case 'delete-files':
        await removeFiles(env, fix.paths);
        return;
      case 'update-latest-link': {
        const linkPath = documentPath(env, fix.linkPath);
        await fs.mkdir(path.dirname(linkPath), { recursive: true });
        await fs.rm(linkPath, { force: true });
        await fs.symlink(fix.target, linkPath);
        return;
      }
    }
  } catch (error) {
    throw new FixError(describeFix(fix), getErrorMessage(error), toError(error));
  }
}

async function writeAtomically(target: string, contents: string): Promise<void> {
  await fs.mkdir(path.dirname(target), { recursive: true });
  const temp = path.join(path.dirname(target), `.${path.basename(target)}.${process.pid}.tmp`);
  await fs.writeFile(temp, contents, 'utf8');
  try {
    await fs.rename(temp, target);
  } catch (error) {
    await fs.rm(temp, { force: true });
    throw error;
  }
}

async function removeFiles(env: Environment, paths: readonly string[]): Promise<void> {
  for (const relative of paths) {
    await fs.rm(documentPath(env, relative), { force: true });
  }
}
