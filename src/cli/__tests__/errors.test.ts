/**
 * @fileoverview Tests for CLI error formatting
 */

import { describe, it, expect } from 'vitest';
import { ConfigError, GitError, SpecFileError } from '../../core/errors.js';
import { CliError, createError, ERROR_SUGGESTIONS, formatError, USAGE_EXIT_CODE } from '../errors.js';

describe('createError', () => {
  it('attaches the suggestion for its code', () => {
    const error = createError('UNKNOWN_API', 'no managed API matches zoo*', { globs: ['zoo*'] });

    expect(error).toBeInstanceOf(CliError);
    expect(error.code).toBe('UNKNOWN_API');
    expect(error.suggestion).toBe(ERROR_SUGGESTIONS.UNKNOWN_API);
    expect(error.details).toEqual({ globs: ['zoo*'] });
  });
});

describe('formatError', () => {
  it('formats CLI errors with their code and suggestion', () => {
    expect(formatError(createError('INVALID_ARGUMENT', 'Unknown command: bless'))).toBe(
      'Error [INVALID_ARGUMENT]: Unknown command: bless\n\nSuggestion: Run `openapi-warden help <command>` for usage information.',
    );
  });

  it('lists configuration issues', () => {
    const error = new ConfigError('openapi-warden.yaml', 'invalid configuration', ['apis: Required']);
    expect(formatError(error)).toBe(
      'Error [CONFIG_ERROR] openapi-warden.yaml: invalid configuration\n  - apis: Required\n\nSuggestion: Check openapi-warden.yaml, or pass --config <path>.',
    );
  });

  it('suggests fetching for git errors', () => {
    expect(formatError(new GitError('merge-base', 'no upstream'))).toBe(
      `Error [GIT_ERROR] git merge-base failed: no upstream\n\nSuggestion: ${ERROR_SUGGESTIONS.GIT_ERROR}`,
    );
  });

  it('has no suggestion for other errors', () => {
    expect(formatError(new SpecFileError('pets/x.json', 'json', 'invalid JSON'))).toBe(
      'Error [SPEC_FILE_ERROR] pets/x.json: invalid JSON',
    );
    expect(formatError(new Error('boom'))).toBe('Error: boom');
    expect(formatError('boom')).toBe('Error: boom');
  });

  it('uses a distinct exit code for usage errors', () => {
    expect(USAGE_EXIT_CODE).toBe(2);
  });
});
