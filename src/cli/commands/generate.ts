/**
 * @fileoverview generate command - apply every fixable change, then re-check
 */

import { applyFixes } from '../../fix/apply.js';
import { describeFix, fixSubject, planFixes } from '../../resolve/fix_planner.js';
import { EXIT_CODES } from '../../resolve/status.js';
import { logInfo } from '../../telemetry/logger.js';
import type { CommandContext } from '../context.js';
import { renderReport, reportJson } from '../output.js';
import { checkApis } from './check.js';

export async function generateCommand(ctx: CommandContext): Promise<number> {
  const before = await checkApis(ctx.env, ctx.apis, ctx.git);
  const fixes = planFixes(before.resolved);
  const planned = fixes.map((fix) => `${fixSubject(fix)}: ${describeFix(fix)}`);

  if (ctx.dryRun) {
    if (ctx.json) {
      console.log(reportJson(before.resolved, before.status, { planned }));
    } else {
      console.log(planned.length === 0 ? 'Nothing to change.' : planned.map((line) => `would ${line}`).join('\n'));
      console.log(renderReport(before.resolved, before.status, ctx.verbose));
    }
    return EXIT_CODES[before.status];
  }

  await applyFixes(ctx.env, fixes);
  for (const line of planned) {
    logInfo(`[generate] ${line}`);
  }

  const after = await checkApis(ctx.env, ctx.apis, ctx.git);
  if (ctx.json) {
    console.log(reportJson(after.resolved, after.status, { applied: planned }));
  } else {
    if (planned.length > 0) {
      console.log(planned.map((line) => `updated ${line}`).join('\n'));
    }
    console.log(renderReport(after.resolved, after.status, ctx.verbose));
  }
  return EXIT_CODES[after.status];
}
