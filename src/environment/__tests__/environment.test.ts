import * as path from 'node:path';
import { describe, expect, it } from 'vitest';
import { ConfigError } from '../../core/errors.js';
import { createEnvironment, documentPath, repoPathOf } from '../environment.js';

describe('createEnvironment', () => {
  const repoRoot = path.resolve('/work/repo');

  it('defaults the documents directory and upstream branch', () => {
    const env = createEnvironment({ repoRoot });
    expect(env.documentsDir).toBe(path.join(repoRoot, 'openapi'));
    expect(env.documentsDirInRepo).toBe('openapi');
    expect(env.upstreamBranch).toBe('origin/main');
    expect(env.gitRefStorage).toBe(false);
  });

  it('takes the upstream branch from the environment', () => {
    process.env.OPENAPI_WARDEN_UPSTREAM = 'upstream/trunk';
    expect(createEnvironment({ repoRoot }).upstreamBranch).toBe('upstream/trunk');
    expect(createEnvironment({ repoRoot, upstreamBranch: 'origin/release' }).upstreamBranch).toBe('origin/release');
  });

  it('keeps nested documents directories repository-relative', () => {
    const env = createEnvironment({ repoRoot, documentsDir: 'docs/openapi' });
    expect(env.documentsDirInRepo).toBe('docs/openapi');
    expect(repoPathOf(env, 'pets/pets-1.0.0-abc123.json')).toBe('docs/openapi/pets/pets-1.0.0-abc123.json');
    expect(documentPath(env, 'pets/pets-latest.json')).toBe(path.join(repoRoot, 'docs', 'openapi', 'pets', 'pets-latest.json'));
  });

  it('rejects directories outside the repository', () => {
    expect(() => createEnvironment({ repoRoot, documentsDir: '../elsewhere' })).toThrow(ConfigError);
    expect(() => createEnvironment({ repoRoot, documentsDir: '.' })).toThrow(ConfigError);
    expect(() => createEnvironment({ repoRoot, documentsDir: path.resolve('/abs') })).toThrow(
      'must be relative to the repository root',
    );
  });
});
