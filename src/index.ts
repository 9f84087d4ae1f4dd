/**
 * @fileoverview openapi-warden public API
 *
 * ```ts
 * import { ManagedApis, apiVersions, runCli, versioned } from 'openapi-warden';
 *
 * const { supported } = apiVersions([[2, 'ADD_TOYS'], [1, 'INITIAL']]);
 * const apis = new ManagedApis([
 *   { ident: 'pets', title: 'Pet Store', versions: { kind: 'versioned', supported }, generate: buildPetsDocument },
 * ]);
 * process.exitCode = await runCli(process.argv.slice(2), { apis });
 * ```
 *
 * @packageDocumentation
 */

export { WARDEN_VERSION } from './version.js';

// Definitions
export {
  ManagedApi,
  ManagedApis,
  type DocumentGenerator,
  type ManagedApiConfig,
  type OpenApiDocument,
} from './apis/managed_apis.js';
export { parseApiIdent, latestLinkBasename, type ApiIdent } from './versions/api_ident.js';
export { compareSemver, formatSemver, parseSemver, semver, tryParseSemver, type Semver } from './versions/semver.js';
export {
  apiVersions,
  describeVersionModel,
  iterSemvers,
  latestSemver,
  lockstep,
  supportedVersions,
  versioned,
  type ApiVersions,
  type SupportedVersion,
  type SupportedVersions,
  type VersionEntry,
  type VersionModel,
} from './versions/versions.js';
export {
  createValidator,
  validateDocument,
  type DocumentValidator,
  type ExtraValidator,
  type ValidationContext,
  type ValidationFinding,
} from './validation/validator.js';

// Environment and sources
export { createEnvironment, type Environment, type EnvironmentOptions } from './environment/environment.js';
export { ExecaGitClient, GitContentCache, type GitClient, type GitRef } from './git/git.js';
export { loadSources, type LoadedRun } from './spec_files/load.js';
export { fileNamePath, type ApiSpecFileName } from './spec_files/file_name.js';

// Reconciliation
export { classify, type Classification, type DocumentChange, type Relationship } from './compatibility/classifier.js';
export { resolveAll, resolveApi, type Resolved, type ResolvedApi, type ResolvedVersion } from './resolve/resolver.js';
export { isFixable, problemMessage, type Note, type Problem, type ProblemKind } from './resolve/problems.js';
export { describeFix, fixFor, planFixes, type Fix } from './resolve/fix_planner.js';
export { aggregateStatus, EXIT_CODES, type Status } from './resolve/status.js';
export { applyFixes } from './fix/apply.js';

// Configuration and CLI
export { loadConfig, parseConfig, type LoadedConfig } from './config/config.js';
export { checkApis } from './cli/commands/check.js';
export { runCli } from './cli/run.js';
export type { RunCliOptions } from './cli/context.js';

// Errors
export {
  ConfigError,
  FixError,
  GenerationError,
  GitError,
  SpecFileError,
  WardenError,
  isWardenError,
} from './core/errors.js';
export { configureLogging, type LogLevel } from './telemetry/logger.js';
