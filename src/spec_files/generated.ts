/**
 * @fileoverview Generated source: documents produced from current code
 *
 * Every supported version is generated, not only the latest, because every
 * blessed version must be checked against what the code produces today.
 * A generator failure is fatal for its API only.
 */

import type { ManagedApi, ManagedApis, OpenApiDocument } from '../apis/managed_apis.js';
import { GenerationError } from '../core/errors.js';
import { canonicalJson, isJsonObject, type JsonObject } from '../core/json.js';
import { logDebug } from '../telemetry/logger.js';
import { getErrorMessage, toError } from '../utils/errors.js';
import { formatSemver, semverEquals, tryParseSemver, type Semver } from '../versions/semver.js';
import { ApiSpecFilesBuilder, type ApiSpecFiles } from './api_files.js';
import { nameFor } from './file_name.js';
import { parseDocumentContent, type ApiSpecFile } from './spec_file.js';

export function serializeGenerated(output: OpenApiDocument | string): string {
  return typeof output === 'string' ? output : canonicalJson(output);
}

/** `info.version` must be the version asked for; lockstep documents may omit it. */
function versionMismatch(api: ManagedApi, version: Semver, document: JsonObject): string | undefined {
  const raw = isJsonObject(document.info) ? document.info.version : undefined;
  if (raw === undefined && api.versions.kind === 'lockstep') return undefined;
  if (typeof raw !== 'string') return 'document has no "info.version"';
  const declared = tryParseSemver(raw);
  if (!declared) return `"info.version" ${JSON.stringify(raw)} is not a semver`;
  if (!semverEquals(declared, version)) return `document declares version ${formatSemver(declared)}`;
  return undefined;
}

export async function generateDocument(api: ManagedApi, version: Semver): Promise<ApiSpecFile> {
  let output: OpenApiDocument | string;
  try {
    output = await api.generate(version);
  } catch (error) {
    throw new GenerationError(api.ident, formatSemver(version), getErrorMessage(error), toError(error));
  }

  const contents = serializeGenerated(output);
  const name = nameFor(api.ident, api.versions, version, contents);
  const parsed = parseDocumentContent(`${api.ident} v${formatSemver(version)} (generated)`, contents);
  if (!parsed.ok) {
    throw new GenerationError(api.ident, formatSemver(version), parsed.error.message, parsed.error);
  }
  const mismatch = versionMismatch(api, version, parsed.value.document);
  if (mismatch !== undefined) {
    throw new GenerationError(api.ident, formatSemver(version), mismatch);
  }
  return { name, ...parsed.value };
}

export async function loadGenerated(apis: ManagedApis): Promise<ApiSpecFiles<ApiSpecFile>> {
  const builder = new ApiSpecFilesBuilder<ApiSpecFile>('generated');

  await Promise.all(
    apis.list().map(async (api) => {
      try {
        const files = await Promise.all(
          api.supportedVersions.map(async (version) => ({ version, file: await generateDocument(api, version) })),
        );
        for (const { version, file } of files) {
          builder.set(api.ident, version, file);
        }
        logDebug(`[generated] ${api.ident}: ${files.length} documents`);
      } catch (error) {
        builder.failApi(
          api.ident,
          error instanceof GenerationError
            ? error
            : new GenerationError(api.ident, formatSemver(api.latestVersion), getErrorMessage(error), toError(error)),
        );
      }
    }),
  );

  return builder.build();
}
