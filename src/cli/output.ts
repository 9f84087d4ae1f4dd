/**
 * @fileoverview Report rendering for check and generate
 */

import { isFixable, noteMessage, problemMessage, type Problem } from '../resolve/problems.js';
import { apiProblems, type Resolved, type ResolvedApi } from '../resolve/resolver.js';
import { EXIT_CODES, type Status } from '../resolve/status.js';
import { formatSemver } from '../versions/semver.js';

const INDENT = '    ';

function indentLines(text: string, prefix: string): string {
  return text
    .split('\n')
    .map((line, index) => (index === 0 ? line : `${prefix}${line}`))
    .join('\n');
}

export function formatProblem(problem: Problem): string {
  const tag = isFixable(problem) ? 'fixable' : 'needs attention';
  return `  - [${tag}] ${indentLines(problemMessage(problem), INDENT)}`;
}

export function renderApi(api: ResolvedApi, verbose: boolean): string[] {
  if (api.error) {
    return [`${api.ident}: error: ${api.error.message}`];
  }

  const lines: string[] = [];
  for (const entry of api.versions) {
    const count = entry.problems.length;
    const summary = count === 0 ? 'up to date' : `${count} problem${count === 1 ? '' : 's'}`;
    lines.push(`${api.ident} v${formatSemver(entry.version)} (${entry.kind}): ${summary}`);
    lines.push(...entry.problems.map(formatProblem));
  }
  if (api.orphans.length > 0 || api.latestLink) {
    lines.push(`${api.ident}: other files`);
    lines.push(...api.orphans.map(formatProblem));
    if (api.latestLink) lines.push(formatProblem(api.latestLink));
  }
  if (verbose) {
    lines.push(...api.notes.map((note) => `  note: ${noteMessage(note)}`));
  }
  return lines;
}

export function summarize(resolved: Resolved, status: Status): string {
  const problems = resolved.apis.flatMap(apiProblems);
  const failedApis = resolved.apis.filter((api) => api.error !== undefined).length;
  switch (status) {
    case 'ok':
      return 'All documents are up to date.';
    case 'needs-update':
      return `${problems.length} problem${problems.length === 1 ? '' : 's'} can be fixed: run \`openapi-warden generate\`.`;
    case 'failure': {
      const manual = problems.filter((problem) => !isFixable(problem)).length;
      const parts: string[] = [];
      if (manual > 0) parts.push(`${manual} problem${manual === 1 ? ' needs' : 's need'} manual attention`);
      if (failedApis > 0) parts.push(`${failedApis} API${failedApis === 1 ? '' : 's'} could not be checked`);
      return `${parts.join('; ')}.`;
    }
  }
}

export function renderReport(resolved: Resolved, status: Status, verbose: boolean): string {
  const lines = resolved.apis.flatMap((api) => renderApi(api, verbose));
  lines.push(summarize(resolved, status));
  return lines.join('\n');
}

// ============================================================================
// JSON
// ============================================================================

function problemJson(problem: Problem): Record<string, unknown> {
  return { kind: problem.kind, fixable: isFixable(problem), message: problemMessage(problem) };
}

export function reportJson(resolved: Resolved, status: Status, extra: Record<string, unknown> = {}): string {
  const body = {
    status,
    exitCode: EXIT_CODES[status],
    apis: resolved.apis.map((api) => ({
      ident: api.ident,
      error: api.error?.toJSON(),
      versions: api.versions.map((entry) => ({
        version: formatSemver(entry.version),
        kind: entry.kind,
        problems: entry.problems.map(problemJson),
      })),
      orphans: api.orphans.map(problemJson),
      latestLink: api.latestLink ? problemJson(api.latestLink) : undefined,
      notes: api.notes.map(noteMessage),
    })),
    warnings: resolved.warnings,
    ...extra,
  };
  return JSON.stringify(body, null, 2);
}
