/**
 * @fileoverview Registry of the APIs managed in one run
 *
 * Constructed by the caller (in code, or from the configuration file) and
 * passed explicitly to everything that needs it. Immutable once built.
 */

import type { OpenAPIV3, OpenAPIV3_1 } from 'openapi-types';
import { ManagedApisError } from '../core/errors.js';
import { parseApiIdent, type ApiIdent } from '../versions/api_ident.js';
import type { Semver } from '../versions/semver.js';
import { iterSemvers, latestSemver, type VersionModel } from '../versions/versions.js';
import type { ExtraValidator } from '../validation/validator.js';

export type OpenApiDocument = OpenAPIV3.Document | OpenAPIV3_1.Document;

/**
 * Produces the document for one supported version. Returning a string
 * writes those exact bytes; returning an object serializes it with
 * two-space indentation and a trailing newline.
 */
export type DocumentGenerator = (version: Semver) => OpenApiDocument | string | Promise<OpenApiDocument | string>;

export interface ManagedApiConfig {
  ident: string;
  title: string;
  description?: string;
  versions: VersionModel;
  generate: DocumentGenerator;
  /** Require the latest blessed version to be byte-identical, not just wire-compatible. */
  strictLatest?: boolean;
  extraValidation?: ExtraValidator;
}

export class ManagedApi {
  readonly ident: ApiIdent;
  readonly title: string;
  readonly description: string | undefined;
  readonly versions: VersionModel;
  readonly generate: DocumentGenerator;
  readonly strictLatest: boolean;
  readonly extraValidation: ExtraValidator | undefined;

  constructor(config: ManagedApiConfig) {
    this.ident = parseApiIdent(config.ident);
    this.title = config.title;
    this.description = config.description;
    this.versions = config.versions;
    this.generate = config.generate;
    this.strictLatest = config.strictLatest ?? false;
    this.extraValidation = config.extraValidation;
  }

  get isVersioned(): boolean {
    return this.versions.kind === 'versioned';
  }

  get latestVersion(): Semver {
    return latestSemver(this.versions);
  }

  get supportedVersions(): Semver[] {
    return iterSemvers(this.versions);
  }
}

export class ManagedApis {
  private readonly byIdent: ReadonlyMap<ApiIdent, ManagedApi>;

  constructor(
    apis: Iterable<ManagedApi | ManagedApiConfig>,
    readonly globalValidation: ExtraValidator | undefined = undefined,
  ) {
    const byIdent = new Map<ApiIdent, ManagedApi>();
    for (const entry of apis) {
      const api = entry instanceof ManagedApi ? entry : new ManagedApi(entry);
      if (byIdent.has(api.ident)) {
        throw new ManagedApisError(`API "${api.ident}" is defined more than once`);
      }
      byIdent.set(api.ident, api);
    }
    // Iteration order is ident order everywhere: reports and fix plans are
    // stable across runs.
    this.byIdent = new Map([...byIdent.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
  }

  get size(): number {
    return this.byIdent.size;
  }

  get(ident: ApiIdent): ManagedApi | undefined {
    return this.byIdent.get(ident);
  }

  has(ident: ApiIdent): boolean {
    return this.byIdent.has(ident);
  }

  idents(): ApiIdent[] {
    return [...this.byIdent.keys()];
  }

  list(): ManagedApi[] {
    return [...this.byIdent.values()];
  }

  [Symbol.iterator](): Iterator<ManagedApi> {
    return this.byIdent.values();
  }

  filter(predicate: (api: ManagedApi) => boolean): ManagedApis {
    return new ManagedApis(this.list().filter(predicate), this.globalValidation);
  }

  extraValidatorsFor(api: ManagedApi): ExtraValidator[] {
    return [this.globalValidation, api.extraValidation].filter(
      (validator): validator is ExtraValidator => validator !== undefined,
    );
  }
}
