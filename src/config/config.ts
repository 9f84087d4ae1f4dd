/**
 * @fileoverview Project configuration file
 *
 * `openapi-warden.yaml` at the repository root declares the managed APIs
 * for projects that do not build a `ManagedApis` registry in code:
 *
 * ```yaml
 * documentsDir: openapi
 * upstreamBranch: origin/main
 * gitRefStorage: true
 * apis:
 *   - ident: inventory
 *     title: Inventory API
 *     lockstep: 1.0.0
 *     generate: ./scripts/openapi inventory
 *   - ident: pets
 *     title: Pet Store API
 *     versions:
 *       - { major: 2, label: ADD_TOYS }
 *       - { major: 1, label: INITIAL }
 *     generate: ./scripts/openapi pets --version {version}
 * ```
 *
 * A generator command is run through the shell from the repository root;
 * `{version}` is replaced with the semver being generated and whatever the
 * command prints on stdout is the document.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { execa } from 'execa';
import yaml from 'yaml';
import { z } from 'zod';
import { ManagedApis, type DocumentGenerator, type ManagedApiConfig } from '../apis/managed_apis.js';
import { ConfigError, isWardenError } from '../core/errors.js';
import type { EnvironmentOptions } from '../environment/environment.js';
import { errnoCode, getErrorMessage } from '../utils/errors.js';
import { formatSemver } from '../versions/semver.js';
import { lockstep, versioned } from '../versions/versions.js';

export const DEFAULT_CONFIG_FILE = 'openapi-warden.yaml';

// ============================================================================
// SCHEMA
// ============================================================================

const VersionEntrySchema = z
  .object({
    major: z.number().int().min(1),
    label: z.string().min(1),
  })
  .strict();

export const ApiConfigSchema = z
  .object({
    ident: z.string().min(1),
    title: z.string().min(1),
    description: z.string().optional(),
    lockstep: z.string().min(1).optional(),
    versions: z.array(VersionEntrySchema).min(1).optional(),
    generate: z.string().min(1),
    strictLatest: z.boolean().optional(),
  })
  .strict()
  .refine((api) => (api.lockstep === undefined) !== (api.versions === undefined), {
    message: 'exactly one of "lockstep" and "versions" must be given',
  });

export const ConfigFileSchema = z
  .object({
    documentsDir: z.string().min(1).optional(),
    upstreamBranch: z.string().min(1).optional(),
    gitRefStorage: z.boolean().optional(),
    apis: z.array(ApiConfigSchema).min(1),
  })
  .strict();

export type ApiConfigFile = z.infer<typeof ApiConfigSchema>;
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface LoadedConfig {
  readonly path: string;
  readonly environment: EnvironmentOptions;
  readonly apis: ManagedApis;
}

// ============================================================================
// GENERATOR COMMANDS
// ============================================================================

export function commandGenerator(command: string, cwd: string): DocumentGenerator {
  return async (version) => {
    const rendered = command.split('{version}').join(formatSemver(version));
    const result = await execa(rendered, { shell: true, cwd, reject: false, stripFinalNewline: false });
    if (result.exitCode !== 0) {
      const stderr = String(result.stderr).trim();
      throw new Error(`\`${rendered}\` exited with code ${result.exitCode ?? 'unknown'}${stderr ? `: ${stderr}` : ''}`);
    }
    return String(result.stdout);
  };
}

// ============================================================================
// LOADING
// ============================================================================

export function parseConfig(configPath: string, raw: string): ConfigFile {
  let parsed: unknown;
  try {
    parsed = yaml.parse(raw);
  } catch (error) {
    throw new ConfigError(configPath, `invalid YAML: ${getErrorMessage(error)}`);
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(configPath, 'invalid configuration', issues);
  }
  return result.data;
}

function toManagedApiConfig(api: ApiConfigFile, repoRoot: string): ManagedApiConfig {
  const versions =
    api.versions !== undefined
      ? versioned(api.versions.map((entry) => [entry.major, entry.label] as const))
      : lockstep(api.lockstep ?? '');
  return {
    ident: api.ident,
    title: api.title,
    description: api.description,
    versions,
    generate: commandGenerator(api.generate, repoRoot),
    strictLatest: api.strictLatest,
  };
}

export function configToApis(configPath: string, config: ConfigFile, repoRoot: string): ManagedApis {
  try {
    return new ManagedApis(config.apis.map((api) => toManagedApiConfig(api, repoRoot)));
  } catch (error) {
    if (isWardenError(error)) throw new ConfigError(configPath, error.message);
    throw error;
  }
}

/** Reads the configuration file. The repository root is the file's directory. */
export async function loadConfig(configPath: string): Promise<LoadedConfig> {
  const absolute = path.resolve(configPath);
  let raw: string;
  try {
    raw = await fs.readFile(absolute, 'utf8');
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      throw new ConfigError(absolute, 'configuration file not found');
    }
    throw new ConfigError(absolute, `cannot read: ${getErrorMessage(error)}`);
  }

  const config = parseConfig(absolute, raw);
  const repoRoot = path.dirname(absolute);
  return {
    path: absolute,
    environment: {
      repoRoot,
      documentsDir: config.documentsDir,
      upstreamBranch: config.upstreamBranch,
      gitRefStorage: config.gitRefStorage,
    },
    apis: configToApis(absolute, config, repoRoot),
  };
}
