/**
 * @fileoverview check command - report without writing anything
 */

import type { Environment } from '../../environment/environment.js';
import type { GitClient } from '../../git/git.js';
import type { ManagedApis } from '../../apis/managed_apis.js';
import { resolveAll, type Resolved } from '../../resolve/resolver.js';
import { aggregateStatus, EXIT_CODES, type Status } from '../../resolve/status.js';
import { loadSources } from '../../spec_files/load.js';
import { logWarning } from '../../telemetry/logger.js';
import type { CommandContext } from '../context.js';
import { renderReport, reportJson } from '../output.js';

export interface CheckOutcome {
  readonly resolved: Resolved;
  readonly status: Status;
}

/** Load every source, resolve, and compute the aggregate status. */
export async function checkApis(env: Environment, apis: ManagedApis, git: GitClient): Promise<CheckOutcome> {
  const sources = await loadSources(env, apis, git);
  const resolved = resolveAll(apis, sources, { gitRefStorage: env.gitRefStorage });
  for (const warning of resolved.warnings) {
    logWarning(warning);
  }
  return { resolved, status: aggregateStatus(resolved) };
}

export async function checkCommand(ctx: CommandContext): Promise<number> {
  const { resolved, status } = await checkApis(ctx.env, ctx.apis, ctx.git);
  console.log(ctx.json ? reportJson(resolved, status) : renderReport(resolved, status, ctx.verbose));
  return EXIT_CODES[status];
}
