import * as path from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { execa } from 'execa';
import { ConfigError } from '../../core/errors.js';
import { semver } from '../../versions/semver.js';
import { cleanupWorkspace, createTempWorkspace, writeWorkspaceFiles } from '../../__tests__/helpers/index.js';
import { commandGenerator, configToApis, loadConfig, parseConfig } from '../config.js';

vi.mock('execa', () => ({ execa: vi.fn() }));

const execaMock = vi.mocked(execa);

function buildExecaResult(options: { exitCode: number; stdout?: string; stderr?: string }) {
  return {
    exitCode: options.exitCode,
    stdout: options.stdout ?? '',
    stderr: options.stderr ?? '',
  } as unknown as Awaited<ReturnType<typeof execa>>;
}

const VALID = `
documentsDir: docs/openapi
gitRefStorage: true
apis:
  - ident: inventory
    title: Inventory API
    lockstep: 1.0.0
    generate: ./gen inventory
  - ident: pets
    title: Pet Store API
    versions:
      - { major: 2, label: ADD_TOYS }
      - { major: 1, label: INITIAL }
    generate: ./gen pets --version {version}
`;

afterEach(() => {
  execaMock.mockReset();
});

describe('parseConfig', () => {
  it('accepts a complete configuration', () => {
    const config = parseConfig('openapi-warden.yaml', VALID);
    expect(config.documentsDir).toBe('docs/openapi');
    expect(config.gitRefStorage).toBe(true);
    expect(config.upstreamBranch).toBeUndefined();
    expect(config.apis.map((api) => api.ident)).toEqual(['inventory', 'pets']);
    expect(config.apis[1]?.versions).toEqual([
      { major: 2, label: 'ADD_TOYS' },
      { major: 1, label: 'INITIAL' },
    ]);
  });

  it('reports invalid YAML', () => {
    expect(() => parseConfig('openapi-warden.yaml', 'apis: [')).toThrow(/^openapi-warden\.yaml: invalid YAML: /);
  });

  it('requires exactly one version model per API', () => {
    const raw = 'apis:\n  - ident: pets\n    title: Pets\n    generate: ./gen\n';
    try {
      parseConfig('openapi-warden.yaml', raw);
      expect.unreachable('parseConfig should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.message).toBe('openapi-warden.yaml: invalid configuration');
        expect(error.issues).toEqual(['apis.0: exactly one of "lockstep" and "versions" must be given']);
      }
    }
  });

  it('rejects unknown keys and an empty API list', () => {
    try {
      parseConfig('openapi-warden.yaml', 'apis: []\nextra: 1\n');
      expect.unreachable('parseConfig should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      const issues = error instanceof ConfigError ? error.issues : [];
      expect(issues).toHaveLength(2);
      expect(issues.some((issue) => issue.startsWith('apis: '))).toBe(true);
      expect(issues.some((issue) => issue.startsWith('(root): ') && issue.includes('extra'))).toBe(true);
    }
  });
});

describe('configToApis', () => {
  it('builds the registry with command generators', () => {
    const apis = configToApis('openapi-warden.yaml', parseConfig('openapi-warden.yaml', VALID), '/repo');
    expect(apis.idents()).toEqual(['inventory', 'pets']);
    expect(apis.get('inventory')?.versions).toEqual({ kind: 'lockstep', version: semver(1) });
    expect(apis.get('pets')?.supportedVersions).toEqual([semver(2), semver(1)]);
  });

  it('wraps definition errors as configuration errors', () => {
    const config = parseConfig(
      'openapi-warden.yaml',
      'apis:\n  - ident: pets\n    title: Pets\n    generate: ./gen\n    versions:\n      - { major: 1, label: initial }\n',
    );
    expect(() => configToApis('openapi-warden.yaml', config, '/repo')).toThrow(ConfigError);
    expect(() => configToApis('openapi-warden.yaml', config, '/repo')).toThrow(
      'openapi-warden.yaml: version 1: label "initial" must be an uppercase identifier (e.g. ADD_WIDGETS)',
    );
  });
});

describe('commandGenerator', () => {
  it('substitutes the version and returns stdout unchanged', async () => {
    execaMock.mockResolvedValueOnce(buildExecaResult({ exitCode: 0, stdout: '{"openapi":"3.0.3"}\n' }));

    const generate = commandGenerator('./gen pets --version {version}', '/repo');

    await expect(generate(semver(2))).resolves.toBe('{"openapi":"3.0.3"}\n');
    expect(execaMock).toHaveBeenCalledWith('./gen pets --version 2.0.0', {
      shell: true,
      cwd: '/repo',
      reject: false,
      stripFinalNewline: false,
    });
  });

  it('fails when the command exits nonzero', async () => {
    execaMock.mockResolvedValueOnce(buildExecaResult({ exitCode: 3, stderr: 'boom\n' }));

    await expect(commandGenerator('./gen', '/repo')(semver(1))).rejects.toThrow('`./gen` exited with code 3: boom');
  });
});

describe('loadConfig', () => {
  let workspace: string | undefined;

  afterEach(async () => {
    if (workspace) await cleanupWorkspace(workspace);
    workspace = undefined;
  });

  it('uses the directory of the file as the repository root', async () => {
    workspace = await createTempWorkspace();
    await writeWorkspaceFiles(workspace, { 'openapi-warden.yaml': VALID });

    const loaded = await loadConfig(path.join(workspace, 'openapi-warden.yaml'));

    expect(loaded.environment).toEqual({
      repoRoot: workspace,
      documentsDir: 'docs/openapi',
      upstreamBranch: undefined,
      gitRefStorage: true,
    });
    expect(loaded.apis.size).toBe(2);
  });

  it('reports a missing file', async () => {
    workspace = await createTempWorkspace();
    const missing = path.join(workspace, 'openapi-warden.yaml');
    await expect(loadConfig(missing)).rejects.toThrow(`${missing}: configuration file not found`);
  });
});
