/**
 * @fileoverview CLI error handling with helpful suggestions
 */

import { ConfigError, isWardenError } from '../core/errors.js';

export class CliError extends Error {
  constructor(
    message: string,
    public readonly code: CliErrorCode,
    public readonly suggestion?: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CliError';
  }
}

export type CliErrorCode = 'INVALID_ARGUMENT' | 'UNKNOWN_API' | 'CONFIG_ERROR' | 'GIT_ERROR' | 'FIX_FAILED';

export const ERROR_SUGGESTIONS: Record<CliErrorCode, string> = {
  INVALID_ARGUMENT: 'Run `openapi-warden help <command>` for usage information.',
  UNKNOWN_API: 'Run `openapi-warden list` to see the managed APIs.',
  CONFIG_ERROR: 'Check openapi-warden.yaml, or pass --config <path>.',
  GIT_ERROR: 'Check that the upstream branch exists locally (git fetch), or pass --blessed-from <rev>.',
  FIX_FAILED: 'Check permissions on the documents directory and run `openapi-warden generate` again.',
};

/** Exit code for usage errors; runtime failures use the `failure` status code. */
export const USAGE_EXIT_CODE = 2;

export function createError(code: CliErrorCode, message: string, details?: Record<string, unknown>): CliError {
  return new CliError(message, code, ERROR_SUGGESTIONS[code], details);
}

function suggestionFor(error: unknown): string | undefined {
  if (error instanceof CliError) return error.suggestion;
  if (!isWardenError(error)) return undefined;
  switch (error.code) {
    case 'CONFIG_ERROR':
    case 'API_IDENT_ERROR':
    case 'VERSIONS_ERROR':
    case 'MANAGED_APIS_ERROR':
      return ERROR_SUGGESTIONS.CONFIG_ERROR;
    case 'GIT_ERROR':
      return ERROR_SUGGESTIONS.GIT_ERROR;
    case 'FIX_ERROR':
      return ERROR_SUGGESTIONS.FIX_FAILED;
    default:
      return undefined;
  }
}

export function formatError(error: unknown): string {
  let text: string;
  if (error instanceof CliError) {
    text = `Error [${error.code}]: ${error.message}`;
  } else if (isWardenError(error)) {
    text = `Error ${error.toString()}`;
    if (error instanceof ConfigError) {
      text += error.issues.map((issue) => `\n  - ${issue}`).join('');
    }
  } else if (error instanceof Error) {
    text = `Error: ${error.message}`;
  } else {
    text = `Error: ${String(error)}`;
  }

  const suggestion = suggestionFor(error);
  return suggestion ? `${text}\n\nSuggestion: ${suggestion}` : text;
}
