/**
 * @fileoverview list command - managed APIs and their versions
 */

import { formatSemver } from '../../versions/semver.js';
import { describeVersionModel } from '../../versions/versions.js';
import type { CommandContext } from '../context.js';

export async function listCommand(ctx: CommandContext): Promise<number> {
  const apis = ctx.apis.list();

  if (ctx.json) {
    const body = apis.map((api) => ({
      ident: api.ident,
      title: api.title,
      description: api.description,
      kind: api.versions.kind,
      versions: api.supportedVersions.map(formatSemver),
      latest: formatSemver(api.latestVersion),
      strictLatest: api.strictLatest,
    }));
    console.log(JSON.stringify(body, null, 2));
    return 0;
  }

  const lines: string[] = [];
  for (const api of apis) {
    lines.push(`${api.ident}: ${api.title} [${describeVersionModel(api.versions)}]`);
    if (!ctx.verbose) continue;
    if (api.description) lines.push(`    ${api.description}`);
    if (api.versions.kind === 'versioned') {
      for (const [index, entry] of api.versions.supported.entries()) {
        lines.push(`    v${formatSemver(entry.semver)} ${entry.label}${index === 0 ? ' (latest)' : ''}`);
      }
    }
  }
  console.log(lines.join('\n'));
  return 0;
}
