import { createHash } from 'crypto';

export const CONTENT_HASH_LENGTH = 6;

/**
 * Short content address of a document: the first three bytes of the
 * SHA-256 of its exact bytes, as lowercase hex.
 */
export function hashContents(contents: string): string {
  return createHash('sha256').update(contents, 'utf8').digest('hex').slice(0, CONTENT_HASH_LENGTH);
}

export function isContentHash(text: string): boolean {
  return text.length === CONTENT_HASH_LENGTH && /^[0-9a-f]+$/.test(text);
}
