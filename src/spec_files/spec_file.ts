/**
 * @fileoverview Parsed OpenAPI document files
 *
 * A document file is accepted only when its name describes its contents:
 * the embedded `info.version` must be the version in the name, and for
 * versioned files the hash in the name must be the hash of the bytes.
 */

import { SpecFileError } from '../core/errors.js';
import { isJsonObject, parseJson, type JsonObject, type JsonValue } from '../core/json.js';
import { Err, Ok, type Result } from '../core/result.js';
import { getErrorMessage } from '../utils/errors.js';
import { formatSemver, semverEquals, tryParseSemver, type Semver } from '../versions/semver.js';
import { fileNamePath, type ApiSpecFileName } from './file_name.js';
import { hashContents } from './hash.js';

/** Exact bytes of a document plus the parsed value. */
export interface DocumentContent {
  readonly contents: string;
  readonly document: JsonObject;
}

export interface ApiSpecFile extends DocumentContent {
  readonly name: ApiSpecFileName;
}

export function parseDocumentContent(label: string, contents: string): Result<DocumentContent, SpecFileError> {
  let value: JsonValue;
  try {
    value = parseJson(contents);
  } catch (error) {
    return Err(new SpecFileError(label, 'json', `invalid JSON: ${getErrorMessage(error)}`));
  }
  if (!isJsonObject(value)) {
    return Err(new SpecFileError(label, 'structure', 'document must be a JSON object'));
  }
  return Ok({ contents, document: value });
}

/** `info.version` of a document, if it is present and a semver. */
export function documentVersion(document: JsonObject): Semver | undefined {
  const info = document.info;
  if (!isJsonObject(info) || typeof info.version !== 'string') return undefined;
  return tryParseSemver(info.version);
}

export function parseSpecFile(name: ApiSpecFileName, contents: string): Result<ApiSpecFile, SpecFileError> {
  const label = fileNamePath(name);
  const parsed = parseDocumentContent(label, contents);
  if (!parsed.ok) return parsed;

  const { document } = parsed.value;
  if (name.kind !== 'lockstep') {
    const version = documentVersion(document);
    if (!version) {
      return Err(new SpecFileError(label, 'structure', 'document has no semver "info.version"'));
    }
    if (!semverEquals(version, name.version)) {
      return Err(
        new SpecFileError(
          label,
          'version-mismatch',
          `document declares version ${formatSemver(version)} but its name says ${formatSemver(name.version)}`,
        ),
      );
    }
    const actualHash = hashContents(contents);
    if (actualHash !== name.hash) {
      return Err(
        new SpecFileError(label, 'hash-mismatch', `contents hash to ${actualHash}, not ${name.hash} as named`),
      );
    }
  }

  return Ok({ name, contents, document });
}
