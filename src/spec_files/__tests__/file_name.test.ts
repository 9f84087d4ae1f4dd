import { describe, expect, it } from 'vitest';
import { semver } from '../../versions/semver.js';
import { lockstep, versioned } from '../../versions/versions.js';
import {
  fileNameBasename,
  fileNamePath,
  nameFor,
  parseLockstepBasename,
  parseVersionedBasename,
  toGitRefFileName,
  versionedFileName,
} from '../file_name.js';
import { hashContents, isContentHash } from '../hash.js';

describe('content hash', () => {
  it('is the first three bytes of the SHA-256, in hex', () => {
    // sha256("") = e3b0c442...
    expect(hashContents('')).toBe('e3b0c4');
    expect(isContentHash('e3b0c4')).toBe(true);
    expect(isContentHash('E3B0C4')).toBe(false);
    expect(isContentHash('e3b0c')).toBe(false);
  });
});

describe('file names', () => {
  it('renders lockstep and versioned names', () => {
    expect(fileNamePath(nameFor('inventory', lockstep('1.0.0'), semver(1), '{}'))).toBe('inventory.json');

    const name = versionedFileName('pets', semver(2), 'abc123');
    expect(fileNamePath(name)).toBe('pets/pets-2.0.0-abc123.json');
    expect(fileNameBasename(toGitRefFileName(name))).toBe('pets-2.0.0-abc123.json.gitref');
  });

  it('derives a versioned name from the contents', () => {
    const model = versioned([[1, 'INITIAL']]);
    expect(fileNamePath(nameFor('pets', model, semver(1), ''))).toBe('pets/pets-1.0.0-e3b0c4.json');
  });

  it('parses what it renders', () => {
    expect(parseVersionedBasename('pets', 'pets-2.0.0-abc123.json')).toEqual({
      status: 'ok',
      name: { kind: 'versioned', ident: 'pets', version: semver(2), hash: 'abc123' },
    });
    expect(parseVersionedBasename('pets', 'pets-2.0.0-abc123.json.gitref')).toEqual({
      status: 'ok',
      name: { kind: 'versioned-git-ref', ident: 'pets', version: semver(2), hash: 'abc123' },
    });
    expect(parseLockstepBasename('inventory', semver(1), 'inventory.json')).toEqual({
      status: 'ok',
      name: { kind: 'lockstep', ident: 'inventory', version: semver(1) },
    });
  });

  it('tells foreign files from malformed document names', () => {
    expect(parseVersionedBasename('pets', 'README.md').status).toBe('not-ours');
    expect(parseVersionedBasename('pets', 'pets-notes.txt').status).toBe('not-ours');
    expect(parseVersionedBasename('pets', 'pets-2.0.0.json')).toEqual({
      status: 'malformed',
      reason: 'expected "<version>-<hash>" after the API name',
    });
    expect(parseVersionedBasename('pets', 'pets-2.0-abc123.json')).toEqual({
      status: 'malformed',
      reason: '"2.0" is not a semver',
    });
    expect(parseVersionedBasename('pets', 'pets-2.0.0-xyz.json')).toEqual({
      status: 'malformed',
      reason: '"xyz" is not a content hash',
      version: semver(2),
    });
  });
});
