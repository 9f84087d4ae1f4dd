/**
 * @fileoverview Aggregate outcome of a run
 */

import { isFixable } from './problems.js';
import { allProblems, type Resolved } from './resolver.js';

export type Status = 'ok' | 'needs-update' | 'failure';

export const EXIT_CODES: Readonly<Record<Status, number>> = {
  ok: 0,
  'needs-update': 4,
  failure: 100,
};

/**
 * `failure` if any API could not be evaluated or any problem needs a person;
 * otherwise `needs-update` if anything is left to fix; otherwise `ok`.
 */
export function aggregateStatus(resolved: Resolved): Status {
  if (resolved.apis.some((api) => api.error !== undefined)) return 'failure';
  const problems = allProblems(resolved);
  if (problems.some((problem) => !isFixable(problem))) return 'failure';
  return problems.length > 0 ? 'needs-update' : 'ok';
}

export function exitCodeFor(status: Status): number {
  return EXIT_CODES[status];
}
