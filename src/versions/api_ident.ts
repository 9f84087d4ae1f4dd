import { ApiIdentError } from '../core/errors.js';

/**
 * Identifier of one managed API. Used as the lockstep file stem, the
 * versioned directory name and the prefix of every versioned file name.
 */
export type ApiIdent = string;

const IDENT_PATTERN = /^[a-z][a-z0-9]*(-[a-z0-9]+)*$/;
const LATEST_SUFFIX = '-latest';

export function parseApiIdent(text: string): ApiIdent {
  if (text.length === 0) {
    throw new ApiIdentError(text, 'must not be empty');
  }
  if (!IDENT_PATTERN.test(text)) {
    throw new ApiIdentError(
      text,
      'use lowercase letters, digits and single hyphens, starting with a letter',
    );
  }
  // `<ident>-latest.json` is reserved for the latest link.
  if (text.endsWith(LATEST_SUFFIX)) {
    throw new ApiIdentError(text, `must not end with "${LATEST_SUFFIX}"`);
  }
  return text;
}

export function latestLinkBasename(ident: ApiIdent): string {
  return `${ident}${LATEST_SUFFIX}.json`;
}

export function isLatestLinkBasename(ident: ApiIdent, basename: string): boolean {
  return basename === latestLinkBasename(ident);
}
