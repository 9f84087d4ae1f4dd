/**
 * @fileoverview Reconciliation engine
 *
 * Given the blessed, generated and local views of one API, decides what
 * kind each supported version is and which problems it has. Pure and
 * synchronous: all I/O happened in the loaders, so the same sources always
 * resolve to the same result, whatever order APIs or versions are visited in.
 *
 * Lockstep APIs compare bytes only; there is no history to protect.
 *
 * Versioned APIs are checked one version at a time, independently:
 *   - blessed versions must still be generated wire-compatibly, and the
 *     working tree must hold exactly the blessed bytes (or a git ref to them);
 *   - versions not blessed yet must be held locally exactly as generated.
 * The latest link is checked last, once every version has been seen.
 */

import type { ManagedApi, ManagedApis } from '../apis/managed_apis.js';
import { classify, isAcceptable } from '../compatibility/classifier.js';
import { GenerationError, isWardenError, SpecFileError, type WardenError } from '../core/errors.js';
import { formatGitRef, type GitRef } from '../git/git.js';
import {
  EMPTY_LOCAL_FILES,
  isSoundLocalFile,
  versionKey,
  type ApiSources,
  type ApiSpecFiles,
  type BlessedDocument,
  type BlessedVersion,
  type SoundLocalFile,
} from '../spec_files/api_files.js';
import {
  fileNameBasename,
  fileNamePath,
  parseVersionedBasename,
  toGitRefFileName,
} from '../spec_files/file_name.js';
import type { LocalSnapshot } from '../spec_files/local.js';
import type { ApiSpecFile } from '../spec_files/spec_file.js';
import { getErrorMessage, toError } from '../utils/errors.js';
import { createValidator, type DocumentValidator } from '../validation/validator.js';
import { latestLinkBasename, type ApiIdent } from '../versions/api_ident.js';
import { compareSemver, formatSemver, semverEquals, tryParseSemver, type Semver } from '../versions/semver.js';
import { isSupported, lowestSemver, type SupportedVersions } from '../versions/versions.js';
import type { Note, Problem } from './problems.js';

// ============================================================================
// RESULT TYPES
// ============================================================================

export type ResolutionKind = 'lockstep' | 'blessed' | 'new-locally';

export interface ResolvedVersion {
  readonly version: Semver;
  readonly kind: ResolutionKind;
  readonly problems: readonly Problem[];
}

export interface ResolvedApi {
  readonly ident: ApiIdent;
  /** In declaration order: newest first. */
  readonly versions: readonly ResolvedVersion[];
  /** Local files that belong to no supported document. */
  readonly orphans: readonly Problem[];
  readonly latestLink: Problem | undefined;
  readonly notes: readonly Note[];
  /** Set when the API could not be evaluated at all. */
  readonly error: WardenError | undefined;
}

export interface Resolved {
  readonly apis: readonly ResolvedApi[];
  readonly warnings: readonly string[];
}

export interface ResolveOptions {
  /** Store older blessed versions as `.gitref` files. */
  gitRefStorage: boolean;
  validator?: DocumentValidator;
}

export interface LoadedSources {
  readonly blessed: ApiSpecFiles<BlessedVersion>;
  readonly generated: ApiSpecFiles<ApiSpecFile>;
  readonly local: LocalSnapshot;
}

// ============================================================================
// ENTRY POINTS
// ============================================================================

/**
 * Resolve every managed API. An internal error in one API is recorded on
 * that API only; the others are still evaluated.
 */
export function resolveAll(apis: ManagedApis, sources: LoadedSources, options: ResolveOptions): Resolved {
  const resolved = apis.list().map((api): ResolvedApi => {
    const loadError = sources.generated.errorFor(api.ident) ?? sources.blessed.errorFor(api.ident);
    if (loadError) return failedApi(api.ident, loadError);
    const apiSources: ApiSources = {
      blessed: sources.blessed.forApi(api.ident),
      generated: sources.generated.forApi(api.ident),
      local: sources.local.apis.get(api.ident) ?? EMPTY_LOCAL_FILES,
    };
    const validator = options.validator ?? createValidator(apis.extraValidatorsFor(api));
    try {
      return resolveApi(api, apiSources, { ...options, validator });
    } catch (error) {
      const failure = isWardenError(error)
        ? error
        : new GenerationError(api.ident, formatSemver(api.latestVersion), getErrorMessage(error), toError(error));
      return failedApi(api.ident, failure);
    }
  });

  return {
    apis: resolved,
    warnings: [...sources.blessed.warnings, ...sources.generated.warnings, ...sources.local.warnings],
  };
}

export function resolveApi(api: ManagedApi, sources: ApiSources, options: ResolveOptions): ResolvedApi {
  const engine = new ApiResolver(api, sources, options.gitRefStorage, options.validator ?? createValidator());
  return engine.resolve();
}

function failedApi(ident: ApiIdent, error: WardenError): ResolvedApi {
  return { ident, versions: [], orphans: [], latestLink: undefined, notes: [], error };
}

// ============================================================================
// PER-API ENGINE
// ============================================================================

class ApiResolver {
  private readonly ident: ApiIdent;
  private readonly soundByVersion = new Map<string, SoundLocalFile[]>();

  constructor(
    private readonly api: ManagedApi,
    private readonly sources: ApiSources,
    private readonly gitRefStorage: boolean,
    private readonly validator: DocumentValidator,
  ) {
    this.ident = api.ident;
    for (const file of sources.local.files) {
      if (!isSoundLocalFile(file)) continue;
      const key = versionKey(file.version);
      const list = this.soundByVersion.get(key) ?? [];
      list.push(file);
      this.soundByVersion.set(key, list);
    }
  }

  resolve(): ResolvedApi {
    const model = this.api.versions;
    if (model.kind === 'lockstep') {
      return {
        ident: this.ident,
        versions: [this.resolveLockstep(model.version)],
        orphans: [],
        latestLink: undefined,
        notes: [],
        error: undefined,
      };
    }

    const supported = model.supported;
    const versions = supported.map((entry, index) => this.resolveVersioned(entry.semver, index === 0, supported));
    return {
      ident: this.ident,
      versions,
      orphans: this.findOrphans(),
      latestLink: this.checkLatestLink(supported),
      notes: this.findRemovedVersions(),
      error: undefined,
    };
  }

  private generated(version: Semver): ApiSpecFile {
    const file = this.sources.generated.get(versionKey(version));
    if (!file) {
      throw new GenerationError(this.ident, formatSemver(version), 'no document was generated for this version');
    }
    return file;
  }

  private validationProblem(version: Semver, document: ApiSpecFile, isLatest: boolean, isBlessed: boolean): Problem | undefined {
    const outcome = this.validator(document.document, { ident: this.ident, version, isLatest, isBlessed });
    if (outcome.ok) return undefined;
    return { kind: 'generated-validation-error', ident: this.ident, version, findings: outcome.findings };
  }

  // --------------------------------------------------------------------------
  // Lockstep
  // --------------------------------------------------------------------------

  private resolveLockstep(version: Semver): ResolvedVersion {
    const generated = this.generated(version);
    const invalid = this.validationProblem(version, generated, true, false);
    if (invalid) return { version, kind: 'lockstep', problems: [invalid] };

    const expected = { path: fileNamePath(generated.name), contents: generated.contents };
    const local = this.sources.local.files.find((file) => file.name?.kind === 'lockstep');
    if (local?.contents === undefined) {
      return { version, kind: 'lockstep', problems: [{ kind: 'lockstep-stale', ident: this.ident, version, reason: 'missing', expected }] };
    }
    if (local.contents !== generated.contents) {
      return { version, kind: 'lockstep', problems: [{ kind: 'lockstep-stale', ident: this.ident, version, reason: 'differs', expected }] };
    }
    return { version, kind: 'lockstep', problems: [] };
  }

  // --------------------------------------------------------------------------
  // Versioned
  // --------------------------------------------------------------------------

  private resolveVersioned(version: Semver, isLatest: boolean, supported: SupportedVersions): ResolvedVersion {
    const blessed = this.sources.blessed.get(versionKey(version));
    if (blessed?.status === 'unresolved') {
      return {
        version,
        kind: 'blessed',
        problems: [
          {
            kind: 'blessed-version-unresolved',
            ident: this.ident,
            version,
            path: blessed.path,
            error: blessed.error instanceof SpecFileError ? blessed.error.detail : blessed.error.message,
          },
        ],
      };
    }

    const generated = this.generated(version);
    const kind: ResolutionKind = blessed ? 'blessed' : 'new-locally';
    const invalid = this.validationProblem(version, generated, isLatest, blessed !== undefined);
    if (invalid) return { version, kind, problems: [invalid] };

    const locals = this.soundByVersion.get(versionKey(version)) ?? [];
    const problems = blessed
      ? this.resolveBlessed(version, isLatest, blessed.document, generated, locals, supported)
      : this.resolveNewLocally(version, generated, locals);
    return { version, kind, problems };
  }

  private resolveBlessed(
    version: Semver,
    isLatest: boolean,
    blessed: BlessedDocument,
    generated: ApiSpecFile,
    locals: readonly SoundLocalFile[],
    supported: SupportedVersions,
  ): Problem[] {
    const problems: Problem[] = [];
    const blessedFile = blessed.file;
    const blessedPath = fileNamePath(blessedFile.name);

    const { relationship, changes } = classify(blessedFile, generated);
    if (!isAcceptable(relationship)) {
      problems.push({ kind: 'blessed-version-broken', ident: this.ident, version, relationship, changes, blessedPath });
    } else if (this.api.strictLatest && isLatest && blessedFile.contents !== generated.contents) {
      problems.push({
        kind: 'blessed-latest-version-bytewise-mismatch',
        ident: this.ident,
        version,
        blessedPath,
        generatedPath: fileNamePath(generated.name),
      });
    }

    const gitRef = this.gitRefStorageFor(version, isLatest, blessed, supported, problems);
    const gitRefPath = fileNamePath(toGitRefFileName(blessedFile.name));

    const matching = locals.filter((file) => file.contents === blessedFile.contents && file.name.kind !== 'lockstep');
    const others = locals.filter((file) => !matching.includes(file));

    if (matching.length === 0) {
      problems.push({
        kind: 'blessed-version-missing-local',
        ident: this.ident,
        version,
        write: gitRef
          ? { storage: 'git-ref', ref: gitRef, path: gitRefPath, contents: formatGitRef(gitRef) }
          : { storage: 'json', path: blessedPath, contents: blessedFile.contents },
        staleFiles: others.map((file) => file.path),
      });
      return problems;
    }

    if (others.length > 0) {
      problems.push({
        kind: 'blessed-version-extra-local-spec',
        ident: this.ident,
        version,
        paths: others.map((file) => file.path),
      });
    }

    const jsonFile = matching.find((file) => file.name.kind === 'versioned');
    const refFile = matching.find((file) => file.name.kind === 'versioned-git-ref');
    if (jsonFile && refFile) {
      problems.push({
        kind: 'duplicate-local-file',
        ident: this.ident,
        version,
        keep: gitRef ? refFile.path : jsonFile.path,
        remove: gitRef ? jsonFile.path : refFile.path,
      });
    } else if (jsonFile && gitRef) {
      problems.push({
        kind: 'blessed-version-should-be-git-ref',
        ident: this.ident,
        version,
        jsonPath: jsonFile.path,
        gitRef: { path: gitRefPath, contents: formatGitRef(gitRef), ref: gitRef },
      });
    } else if (refFile && !gitRef) {
      problems.push({
        kind: 'git-ref-should-be-json',
        ident: this.ident,
        version,
        gitRefPath: refFile.path,
        json: { path: blessedPath, contents: blessedFile.contents },
      });
    }

    return problems;
  }

  /**
   * The ref to store instead of the full document, or undefined to store
   * JSON. Only older versions are stored as refs, and only when they were
   * introduced by a different commit than the latest version: a version
   * added in the same commit as the latest stays JSON so that reviewers see
   * both documents in full.
   */
  private gitRefStorageFor(
    version: Semver,
    isLatest: boolean,
    blessed: BlessedDocument,
    supported: SupportedVersions,
    problems: Problem[],
  ): GitRef | undefined {
    if (!this.gitRefStorage || isLatest) return undefined;

    const first = blessed.firstCommit;
    if (first.kind === 'unknown') {
      problems.push({ kind: 'git-ref-first-commit-unknown', ident: this.ident, version, path: first.path });
      return undefined;
    }
    if (first.kind !== 'known') return undefined;

    const latest = this.sources.blessed.get(versionKey(supported[0].semver));
    if (latest === undefined) return first.ref;
    if (latest.status !== 'resolved') return undefined;
    const latestFirst = latest.document.firstCommit;
    if (latestFirst.kind === 'known' && latestFirst.ref.commit !== first.ref.commit) return first.ref;
    return undefined;
  }

  private resolveNewLocally(version: Semver, generated: ApiSpecFile, locals: readonly SoundLocalFile[]): Problem[] {
    const expected = { path: fileNamePath(generated.name), contents: generated.contents };
    const matching = locals.filter((file) => file.name.kind === 'versioned' && file.contents === generated.contents);
    const others = locals.filter((file) => !matching.includes(file));

    if (matching.length === 0) {
      return [
        {
          kind: 'local-version-missing-local',
          ident: this.ident,
          version,
          expected,
          staleFiles: others.map((file) => file.path),
        },
      ];
    }
    if (others.length > 0) {
      return [{ kind: 'local-version-extra', ident: this.ident, version, paths: others.map((file) => file.path) }];
    }
    return [];
  }

  // --------------------------------------------------------------------------
  // Whole-API checks
  // --------------------------------------------------------------------------

  private findOrphans(): Problem[] {
    const model = this.api.versions;
    const lowest = lowestSemver(model);
    const orphans: Problem[] = [];

    for (const file of this.sources.local.files) {
      let reason: string | undefined;
      if (!isSoundLocalFile(file)) {
        const defect = file.defect;
        reason = defect instanceof SpecFileError ? defect.detail : (defect?.message ?? 'unreadable file');
      } else if (!isSupported(model, file.version)) {
        reason = `v${formatSemver(file.version)} is not a supported version`;
      }
      if (reason === undefined) continue;
      orphans.push({
        kind: 'local-spec-file-orphaned',
        ident: this.ident,
        version: file.version,
        path: file.path,
        reason,
        retired: file.version !== undefined && compareSemver(file.version, lowest) < 0,
      });
    }
    return orphans;
  }

  private findRemovedVersions(): Note[] {
    const notes: Note[] = [];
    for (const key of this.sources.blessed.keys()) {
      const version = tryParseSemver(key);
      if (version && !isSupported(this.api.versions, version)) {
        notes.push({ kind: 'blessed-version-removed', ident: this.ident, version });
      }
    }
    return notes.sort((a, b) => compareSemver(a.version, b.version));
  }

  private checkLatestLink(supported: SupportedVersions): Problem | undefined {
    const head = supported[0].semver;
    const blessed = this.sources.blessed.get(versionKey(head));
    const blessedName = blessed?.status === 'resolved' ? blessed.document.file.name : undefined;
    const target = fileNameBasename(blessedName ?? this.generated(head).name);
    const linkPath = `${this.ident}/${latestLinkBasename(this.ident)}`;

    const link = this.sources.local.latestLink;
    if (!link) {
      return { kind: 'latest-link-missing', ident: this.ident, linkPath, target };
    }
    if (link.target === target) return undefined;

    // A link to any JSON document of a blessed head version is left alone.
    if (blessedName && link.target !== undefined) {
      const current = parseVersionedBasename(this.ident, link.target);
      if (current.status === 'ok' && current.name.kind === 'versioned' && semverEquals(current.name.version, head)) {
        return undefined;
      }
    }
    return { kind: 'latest-link-stale', ident: this.ident, linkPath, target, found: link.target };
  }
}

// ============================================================================
// QUERIES
// ============================================================================

/** Every problem of one API, versions in ascending order, then orphans, then the link. */
export function apiProblems(api: ResolvedApi): Problem[] {
  const ascending = [...api.versions].sort((a, b) => compareSemver(a.version, b.version));
  const problems = ascending.flatMap((entry) => entry.problems);
  problems.push(...api.orphans);
  if (api.latestLink) problems.push(api.latestLink);
  return problems;
}

export function allProblems(resolved: Resolved): Problem[] {
  return resolved.apis.flatMap(apiProblems);
}

export function isFresh(api: ResolvedApi): boolean {
  return api.error === undefined && apiProblems(api).length === 0;
}
