/**
 * @fileoverview Small OpenAPI documents and source builders for tests
 */

import { canonicalJson, type JsonObject } from '../../core/json.js';
import { unwrap } from '../../core/result.js';
import type { BlessedVersion, FirstCommit, LocalFile } from '../../spec_files/api_files.js';
import { fileNamePath, nameFor, versionedFileName, type VersionedFileName } from '../../spec_files/file_name.js';
import { hashContents } from '../../spec_files/hash.js';
import { parseSpecFile, type ApiSpecFile } from '../../spec_files/spec_file.js';
import { formatSemver, type Semver } from '../../versions/semver.js';
import type { VersionModel } from '../../versions/versions.js';

const LIST_PETS: JsonObject = {
  get: {
    operationId: 'listPets',
    responses: {
      '200': {
        description: 'all pets',
        content: { 'application/json': { schema: { type: 'array', items: { type: 'string' } } } },
      },
    },
  },
};

const LIST_TOYS: JsonObject = {
  get: {
    operationId: 'listToys',
    responses: { '200': { description: 'all toys' } },
  },
};

export interface PetsDocumentOptions {
  /** Adds `GET /toys`, a wire-visible change. */
  toys?: boolean;
  /** Changes only `info.description`, which is invisible on the wire. */
  description?: string;
}

export function petsDocument(version: Semver | string, options: PetsDocumentOptions = {}): JsonObject {
  const info: JsonObject = { title: 'Pet Store', version: typeof version === 'string' ? version : formatSemver(version) };
  if (options.description !== undefined) info.description = options.description;
  const paths: JsonObject = { '/pets': LIST_PETS };
  if (options.toys) paths['/toys'] = LIST_TOYS;
  return { openapi: '3.0.3', info, paths };
}

export function petsContents(version: Semver | string, options: PetsDocumentOptions = {}): string {
  return canonicalJson(petsDocument(version, options));
}

/** A generated (or blessed) document with the name its contents call for. */
export function specFile(ident: string, model: VersionModel, version: Semver, contents: string): ApiSpecFile {
  return unwrap(parseSpecFile(nameFor(ident, model, version, contents), contents));
}

export function versionedName(ident: string, version: Semver, contents: string): VersionedFileName {
  return versionedFileName(ident, version, hashContents(contents));
}

export function blessedEntry(
  ident: string,
  version: Semver,
  contents: string,
  firstCommit: FirstCommit = { kind: 'not-tracked' },
): BlessedVersion {
  const name = versionedName(ident, version, contents);
  const file = unwrap(parseSpecFile(name, contents));
  return { status: 'resolved', document: { file: { ...file, name }, firstCommit } };
}

/** A well-formed local JSON document for a versioned API. */
export function localJson(ident: string, version: Semver, contents: string): LocalFile {
  const name = versionedName(ident, version, contents);
  return { path: fileNamePath(name), name, version, contents, defect: undefined };
}

/** A well-formed local git ref; `contents` are the bytes it points at. */
export function localGitRef(ident: string, version: Semver, contents: string): LocalFile {
  const name = versionedFileName(ident, version, hashContents(contents), 'versioned-git-ref');
  return { path: fileNamePath(name), name, version, contents, defect: undefined };
}
