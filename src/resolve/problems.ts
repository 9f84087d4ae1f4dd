/**
 * @fileoverview Problems found while reconciling the three sources
 *
 * A closed union: every discrepancy the engine can report is one variant,
 * and whether it can be fixed automatically depends only on the variant.
 * Each carries what is needed to render it and, if fixable, to plan its fix.
 */

import { describeChange, type DocumentChange, type Relationship } from '../compatibility/classifier.js';
import type { GitRef } from '../git/git.js';
import { formatFinding, type ValidationFinding } from '../validation/validator.js';
import type { ApiIdent } from '../versions/api_ident.js';
import { formatSemver, type Semver } from '../versions/semver.js';

// ============================================================================
// VARIANTS
// ============================================================================

interface VersionScoped {
  readonly ident: ApiIdent;
  readonly version: Semver;
}

/** A document to write: documents-relative path and exact bytes. */
export interface DocumentWrite {
  readonly path: string;
  readonly contents: string;
}

export type Problem =
  // Lockstep
  | (VersionScoped & {
      readonly kind: 'lockstep-stale';
      readonly reason: 'missing' | 'differs';
      readonly expected: DocumentWrite;
    })
  // Any generated document
  | (VersionScoped & {
      readonly kind: 'generated-validation-error';
      readonly findings: readonly ValidationFinding[];
    })
  // Blessed versions
  | (VersionScoped & {
      readonly kind: 'blessed-version-unresolved';
      readonly path: string;
      readonly error: string;
    })
  | (VersionScoped & {
      readonly kind: 'blessed-version-broken';
      readonly relationship: Exclude<Relationship, 'identical' | 'wire-compatible'>;
      readonly changes: readonly DocumentChange[];
      readonly blessedPath: string;
    })
  | (VersionScoped & {
      readonly kind: 'blessed-latest-version-bytewise-mismatch';
      readonly blessedPath: string;
      readonly generatedPath: string;
    })
  | (VersionScoped & {
      readonly kind: 'blessed-version-missing-local';
      /** What to write: the blessed document itself, or a git ref to it. */
      readonly write: ({ readonly storage: 'json' } | { readonly storage: 'git-ref'; readonly ref: GitRef }) & DocumentWrite;
      /** Local files for this version whose bytes are not the blessed bytes. */
      readonly staleFiles: readonly string[];
    })
  | (VersionScoped & {
      readonly kind: 'blessed-version-extra-local-spec';
      readonly paths: readonly string[];
    })
  | (VersionScoped & {
      readonly kind: 'blessed-version-should-be-git-ref';
      readonly jsonPath: string;
      readonly gitRef: DocumentWrite & { readonly ref: GitRef };
    })
  | (VersionScoped & {
      readonly kind: 'git-ref-should-be-json';
      readonly gitRefPath: string;
      readonly json: DocumentWrite;
    })
  | (VersionScoped & {
      readonly kind: 'duplicate-local-file';
      readonly keep: string;
      readonly remove: string;
    })
  | (VersionScoped & {
      readonly kind: 'git-ref-first-commit-unknown';
      readonly path: string;
    })
  // Versions not yet blessed
  | (VersionScoped & {
      readonly kind: 'local-version-missing-local';
      readonly expected: DocumentWrite;
      /** Local files for this version whose bytes are not the generated bytes. */
      readonly staleFiles: readonly string[];
    })
  | (VersionScoped & {
      readonly kind: 'local-version-extra';
      readonly paths: readonly string[];
    })
  // Files the engine cannot attribute to a supported document
  | {
      readonly kind: 'local-spec-file-orphaned';
      readonly ident: ApiIdent;
      readonly version: Semver | undefined;
      readonly path: string;
      readonly reason: string;
      /** Version is below the lowest supported version. */
      readonly retired: boolean;
    }
  // The latest link, once per versioned API
  | {
      readonly kind: 'latest-link-missing';
      readonly ident: ApiIdent;
      readonly linkPath: string;
      readonly target: string;
    }
  | {
      readonly kind: 'latest-link-stale';
      readonly ident: ApiIdent;
      readonly linkPath: string;
      readonly target: string;
      /** Current target; undefined when the file is not a link. */
      readonly found: string | undefined;
    };

export type ProblemKind = Problem['kind'];

/** Informational findings that never affect the outcome. */
export type Note = {
  readonly kind: 'blessed-version-removed';
  readonly ident: ApiIdent;
  readonly version: Semver;
};

// ============================================================================
// FIXABILITY
// ============================================================================

const FIXABLE: Record<ProblemKind, boolean> = {
  'lockstep-stale': true,
  'generated-validation-error': false,
  'blessed-version-unresolved': false,
  'blessed-version-broken': false,
  'blessed-latest-version-bytewise-mismatch': false,
  'blessed-version-missing-local': true,
  'blessed-version-extra-local-spec': true,
  'blessed-version-should-be-git-ref': true,
  'git-ref-should-be-json': true,
  'duplicate-local-file': true,
  'git-ref-first-commit-unknown': false,
  'local-version-missing-local': true,
  'local-version-extra': true,
  'local-spec-file-orphaned': false,
  'latest-link-missing': true,
  'latest-link-stale': true,
};

export function isFixable(problem: Problem): boolean {
  return FIXABLE[problem.kind];
}

// ============================================================================
// MESSAGES
// ============================================================================

const REGENERATE = 'Run `openapi-warden generate` to fix this.';
const HISTORY_IS_FIXED =
  'Blessed documents cannot be changed: revert the change to the interface, or add a new API version and make the change there.';

function subject(problem: { ident: ApiIdent; version: Semver | undefined }): string {
  return problem.version ? `${problem.ident} v${formatSemver(problem.version)}` : problem.ident;
}

function fileList(paths: readonly string[]): string {
  return paths.join(', ');
}

/** One remediation sentence (or a short paragraph) per problem. */
export function problemMessage(problem: Problem): string {
  switch (problem.kind) {
    case 'lockstep-stale':
      return problem.reason === 'missing'
        ? `${problem.expected.path} is missing. ${REGENERATE}`
        : `${problem.expected.path} does not match the generated document. ${REGENERATE}`;
    case 'generated-validation-error':
      return [
        `The generated document for ${subject(problem)} failed validation. Fix the interface definition; this cannot be fixed automatically.`,
        ...problem.findings.map((finding) => `  - ${formatFinding(finding)}`),
      ].join('\n');
    case 'blessed-version-unresolved':
      return `The blessed document for ${subject(problem)} (${problem.path}) could not be read: ${problem.error}. This needs to be investigated by hand.`;
    case 'blessed-version-broken':
      return [
        `${subject(problem)} is blessed (${problem.blessedPath}), but the generated document is ${problem.relationship} with it rather than wire-compatible. ${HISTORY_IS_FIXED}`,
        ...problem.changes.filter((change) => change.class !== 'trivial').map((change) => `  - ${describeChange(change)}`),
      ].join('\n');
    case 'blessed-latest-version-bytewise-mismatch':
      return `${subject(problem)} is the latest blessed version and must be byte-identical to ${problem.blessedPath}, but the generated document (${problem.generatedPath}) differs. ${HISTORY_IS_FIXED}`;
    case 'blessed-version-missing-local':
      return problem.staleFiles.length === 0
        ? `The blessed document for ${subject(problem)} is missing from the working tree. ${REGENERATE}`
        : `Local files for blessed ${subject(problem)} do not match the blessed document (${fileList(problem.staleFiles)}). ${REGENERATE}`;
    case 'blessed-version-extra-local-spec':
      return `Extra local files for blessed ${subject(problem)}: ${fileList(problem.paths)}. ${REGENERATE}`;
    case 'blessed-version-should-be-git-ref':
      return `${problem.jsonPath} is an older blessed version and should be stored as ${problem.gitRef.path}. ${REGENERATE}`;
    case 'git-ref-should-be-json':
      return `${problem.gitRefPath} should be stored as the full document ${problem.json.path}. ${REGENERATE}`;
    case 'duplicate-local-file':
      return `${subject(problem)} is stored both as ${problem.keep} and ${problem.remove}. ${REGENERATE}`;
    case 'git-ref-first-commit-unknown':
      return `Cannot find the commit that introduced ${problem.path}, so ${subject(problem)} cannot be stored as a git ref. Check that history is not shallow.`;
    case 'local-version-missing-local':
      return problem.staleFiles.length === 0
        ? `${problem.expected.path} is missing for ${subject(problem)}. ${REGENERATE}`
        : `Local files for ${subject(problem)} are stale (${fileList(problem.staleFiles)}). ${REGENERATE}`;
    case 'local-version-extra':
      return `Extra local files for ${subject(problem)}: ${fileList(problem.paths)}. ${REGENERATE}`;
    case 'local-spec-file-orphaned':
      return problem.retired
        ? `${problem.path} belongs to a retired version of ${problem.ident} (${problem.reason}). Delete it by hand once the version is gone for good.`
        : `${problem.path} does not match any supported document of ${problem.ident} (${problem.reason}). Delete or restore it by hand.`;
    case 'latest-link-missing':
      return `${problem.linkPath} is missing; it should point to ${problem.target}. ${REGENERATE}`;
    case 'latest-link-stale':
      return `${problem.linkPath} points to ${problem.found ?? '(not a link)'} instead of ${problem.target}. ${REGENERATE}`;
  }
}

export function noteMessage(note: Note): string {
  return `${note.ident} v${formatSemver(note.version)} was blessed but is no longer supported`;
}
