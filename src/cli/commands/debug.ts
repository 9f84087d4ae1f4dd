/**
 * @fileoverview debug command - what each source contains, per API
 */

import { fileNamePath } from '../../spec_files/file_name.js';
import { loadSources, type LoadedRun } from '../../spec_files/load.js';
import { EMPTY_LOCAL_FILES } from '../../spec_files/api_files.js';
import type { ManagedApi } from '../../apis/managed_apis.js';
import type { WardenError } from '../../core/errors.js';
import type { CommandContext } from '../context.js';

interface ApiDebugView {
  ident: string;
  errors: string[];
  blessed: Record<string, string>;
  generated: Record<string, string>;
  local: Record<string, string>;
  latestLink: string | undefined;
}

export function debugView(api: ManagedApi, run: LoadedRun): ApiDebugView {
  const errors = [run.blessed.errorFor(api.ident), run.generated.errorFor(api.ident)]
    .filter((error): error is WardenError => error !== undefined)
    .map((error) => error.message);

  const blessed: Record<string, string> = {};
  for (const [version, entry] of run.blessed.forApi(api.ident)) {
    blessed[version] =
      entry.status === 'resolved'
        ? fileNamePath(entry.document.file.name)
        : `unresolved (${entry.path}): ${entry.error.message}`;
  }

  const generated: Record<string, string> = {};
  for (const [version, file] of run.generated.forApi(api.ident)) {
    generated[version] = fileNamePath(file.name);
  }

  const files = run.local.apis.get(api.ident) ?? EMPTY_LOCAL_FILES;
  const local: Record<string, string> = {};
  for (const file of files.files) {
    local[file.path] = file.defect ? `defect: ${file.defect.message}` : 'ok';
  }

  const link = files.latestLink;
  return {
    ident: api.ident,
    errors,
    blessed,
    generated,
    local,
    latestLink: link ? `${link.path} -> ${link.target ?? '(not a link)'}` : undefined,
  };
}

function section(title: string, entries: Record<string, string>): string[] {
  const keys = Object.keys(entries);
  if (keys.length === 0) return [`  ${title}: (none)`];
  return [`  ${title}:`, ...keys.map((key) => `    ${key}: ${entries[key] ?? ''}`)];
}

export async function debugCommand(ctx: CommandContext): Promise<number> {
  const run = await loadSources(ctx.env, ctx.apis, ctx.git);
  const views = ctx.apis.list().map((api) => debugView(api, run));

  if (ctx.json) {
    console.log(JSON.stringify({ blessedCommit: run.blessedCommit, apis: views }, null, 2));
    return 0;
  }

  const lines = [`blessed documents read at ${run.blessedCommit}`];
  for (const view of views) {
    lines.push(`${view.ident}:`);
    lines.push(...view.errors.map((error) => `  error: ${error}`));
    lines.push(...section('blessed', view.blessed));
    lines.push(...section('generated', view.generated));
    lines.push(...section('local', view.local));
    lines.push(`  latest link: ${view.latestLink ?? '(none)'}`);
  }
  console.log(lines.join('\n'));
  return 0;
}
