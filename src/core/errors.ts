/**
 * @fileoverview openapi-warden error hierarchy
 *
 * Internal errors only. Reconciliation findings are never thrown; they are
 * `Problem` values (see resolve/problems.ts).
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  retryable: boolean;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class WardenError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// DEFINITION ERRORS
// ============================================================================

/** Malformed semver or supported-version list. */
export class VersionsError extends WardenError {
  readonly code = 'VERSIONS_ERROR';
  readonly retryable = false;

  constructor(message: string) {
    super(message);
    this.name = 'VersionsError';
  }
}

export class ApiIdentError extends WardenError {
  readonly code = 'API_IDENT_ERROR';
  readonly retryable = false;

  constructor(
    readonly ident: string,
    message: string,
  ) {
    super(`invalid API identifier ${JSON.stringify(ident)}: ${message}`);
    this.name = 'ApiIdentError';
  }

  toJSON(): ErrorJSON {
    return { ...super.toJSON(), details: { ident: this.ident } };
  }
}

export class ManagedApisError extends WardenError {
  readonly code = 'MANAGED_APIS_ERROR';
  readonly retryable = false;

  constructor(message: string) {
    super(message);
    this.name = 'ManagedApisError';
  }
}

export class ConfigError extends WardenError {
  readonly code = 'CONFIG_ERROR';
  readonly retryable = false;

  constructor(
    readonly path: string,
    message: string,
    readonly issues: string[] = [],
  ) {
    super(`${path}: ${message}`);
    this.name = 'ConfigError';
  }

  toJSON(): ErrorJSON {
    return { ...super.toJSON(), details: { path: this.path, issues: this.issues } };
  }
}

// ============================================================================
// SOURCE ERRORS
// ============================================================================

export type GitOperation = 'merge-base' | 'ls-tree' | 'cat-file' | 'log' | 'rev-parse';

export class GitError extends WardenError {
  readonly code = 'GIT_ERROR';
  readonly retryable = false;

  constructor(
    readonly operation: GitOperation,
    message: string,
    readonly stderr?: string,
  ) {
    super(`git ${operation} failed: ${message}`);
    this.name = 'GitError';
  }

  toJSON(): ErrorJSON {
    return { ...super.toJSON(), details: { operation: this.operation, stderr: this.stderr } };
  }
}

export type SpecFileErrorReason =
  | 'file-name'
  | 'json'
  | 'structure'
  | 'version-mismatch'
  | 'hash-mismatch'
  | 'git-ref'
  | 'io';

export class SpecFileError extends WardenError {
  readonly code = 'SPEC_FILE_ERROR';
  readonly retryable = false;

  constructor(
    readonly file: string,
    readonly reason: SpecFileErrorReason,
    readonly detail: string,
  ) {
    super(`${file}: ${detail}`);
    this.name = 'SpecFileError';
  }

  toJSON(): ErrorJSON {
    return { ...super.toJSON(), details: { file: this.file, reason: this.reason } };
  }
}

export class GenerationError extends WardenError {
  readonly code = 'GENERATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly ident: string,
    readonly version: string,
    message: string,
    readonly cause?: Error,
  ) {
    super(`generating ${ident} v${version} failed: ${message}`);
    this.name = 'GenerationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { ident: this.ident, version: this.version, cause: this.cause?.message },
    };
  }
}

// ============================================================================
// EFFECT ERRORS
// ============================================================================

export class FixError extends WardenError {
  readonly code = 'FIX_ERROR';
  readonly retryable = true;

  constructor(
    readonly fix: string,
    message: string,
    readonly cause?: Error,
  ) {
    super(`${fix}: ${message}`);
    this.name = 'FixError';
  }
}

// ============================================================================
// TYPE GUARDS
// ============================================================================

export function isWardenError(error: unknown): error is WardenError {
  return error instanceof WardenError;
}
