/**
 * @fileoverview Fix planning
 *
 * Turns resolved problems into an ordered list of filesystem effects. The
 * plan is only ever built from fixable problems; unfixable ones contribute
 * nothing and must be handled by a person.
 */

import type { GitRef } from '../git/git.js';
import type { ApiIdent } from '../versions/api_ident.js';
import { formatSemver, type Semver } from '../versions/semver.js';
import type { Problem } from './problems.js';
import { apiProblems, type Resolved } from './resolver.js';

// ============================================================================
// TYPES
// ============================================================================

export type Fix =
  | {
      readonly kind: 'write-document';
      readonly ident: ApiIdent;
      readonly version: Semver;
      /** Documents-relative path. */
      readonly path: string;
      readonly contents: string;
      /** Files the new document supersedes; deleted after it is written. */
      readonly replaces: readonly string[];
    }
  | {
      readonly kind: 'write-git-ref';
      readonly ident: ApiIdent;
      readonly version: Semver;
      readonly path: string;
      readonly contents: string;
      readonly ref: GitRef;
      readonly replaces: readonly string[];
    }
  | {
      readonly kind: 'delete-files';
      readonly ident: ApiIdent;
      readonly version: Semver | undefined;
      readonly paths: readonly string[];
    }
  | {
      readonly kind: 'update-latest-link';
      readonly ident: ApiIdent;
      readonly linkPath: string;
      /** Basename in the same directory. */
      readonly target: string;
    };

export type FixKind = Fix['kind'];

// ============================================================================
// PLANNING
// ============================================================================

/** The fix for one problem, or undefined when it cannot be fixed automatically. */
export function fixFor(problem: Problem): Fix | undefined {
  switch (problem.kind) {
    case 'lockstep-stale':
      return {
        kind: 'write-document',
        ident: problem.ident,
        version: problem.version,
        path: problem.expected.path,
        contents: problem.expected.contents,
        replaces: [],
      };
    case 'blessed-version-missing-local': {
      const { ident, version, write, staleFiles } = problem;
      return write.storage === 'git-ref'
        ? { kind: 'write-git-ref', ident, version, path: write.path, contents: write.contents, ref: write.ref, replaces: staleFiles }
        : { kind: 'write-document', ident, version, path: write.path, contents: write.contents, replaces: staleFiles };
    }
    case 'blessed-version-extra-local-spec':
    case 'local-version-extra':
      return { kind: 'delete-files', ident: problem.ident, version: problem.version, paths: problem.paths };
    case 'blessed-version-should-be-git-ref':
      return {
        kind: 'write-git-ref',
        ident: problem.ident,
        version: problem.version,
        path: problem.gitRef.path,
        contents: problem.gitRef.contents,
        ref: problem.gitRef.ref,
        replaces: [problem.jsonPath],
      };
    case 'git-ref-should-be-json':
      return {
        kind: 'write-document',
        ident: problem.ident,
        version: problem.version,
        path: problem.json.path,
        contents: problem.json.contents,
        replaces: [problem.gitRefPath],
      };
    case 'duplicate-local-file':
      return { kind: 'delete-files', ident: problem.ident, version: problem.version, paths: [problem.remove] };
    case 'local-version-missing-local':
      return {
        kind: 'write-document',
        ident: problem.ident,
        version: problem.version,
        path: problem.expected.path,
        contents: problem.expected.contents,
        replaces: problem.staleFiles,
      };
    case 'latest-link-missing':
    case 'latest-link-stale':
      return { kind: 'update-latest-link', ident: problem.ident, linkPath: problem.linkPath, target: problem.target };
    case 'generated-validation-error':
    case 'blessed-version-unresolved':
    case 'blessed-version-broken':
    case 'blessed-latest-version-bytewise-mismatch':
    case 'git-ref-first-commit-unknown':
    case 'local-spec-file-orphaned':
      return undefined;
  }
}

/**
 * APIs in ident order; within an API, versions in ascending order and the
 * latest link last, so that the link is only updated once its target exists.
 */
export function planFixes(resolved: Resolved): Fix[] {
  const fixes: Fix[] = [];
  for (const api of resolved.apis) {
    if (api.error) continue;
    for (const problem of apiProblems(api)) {
      const fix = fixFor(problem);
      if (fix) fixes.push(fix);
    }
  }
  return fixes;
}

// ============================================================================
// RENDERING
// ============================================================================

export function describeFix(fix: Fix): string {
  switch (fix.kind) {
    case 'write-document': {
      const suffix = fix.replaces.length > 0 ? ` (replacing ${fix.replaces.join(', ')})` : '';
      return `write ${fix.path}${suffix}`;
    }
    case 'write-git-ref': {
      const suffix = fix.replaces.length > 0 ? ` (replacing ${fix.replaces.join(', ')})` : '';
      return `write ${fix.path} -> ${fix.ref.commit.slice(0, 12)}:${fix.ref.path}${suffix}`;
    }
    case 'delete-files':
      return `delete ${fix.paths.join(', ')}`;
    case 'update-latest-link':
      return `link ${fix.linkPath} -> ${fix.target}`;
  }
}

export function fixSubject(fix: Fix): string {
  if (fix.kind === 'update-latest-link' || fix.version === undefined) return fix.ident;
  return `${fix.ident} v${formatSemver(fix.version)}`;
}
