import { describe, expect, it } from 'vitest';
import { ApiIdentError, ManagedApisError } from '../../core/errors.js';
import { semver } from '../../versions/semver.js';
import { lockstep, versioned } from '../../versions/versions.js';
import { ManagedApis, type ManagedApiConfig } from '../managed_apis.js';

function config(ident: string, overrides: Partial<ManagedApiConfig> = {}): ManagedApiConfig {
  return {
    ident,
    title: ident,
    versions: lockstep('1.0.0'),
    generate: () => '{}',
    ...overrides,
  };
}

describe('ManagedApis', () => {
  it('iterates in ident order', () => {
    const apis = new ManagedApis([config('zoo'), config('pets'), config('inventory')]);
    expect(apis.idents()).toEqual(['inventory', 'pets', 'zoo']);
    expect([...apis].map((api) => api.ident)).toEqual(['inventory', 'pets', 'zoo']);
  });

  it('rejects duplicate idents', () => {
    expect(() => new ManagedApis([config('pets'), config('pets')])).toThrow(ManagedApisError);
  });

  it('validates idents', () => {
    expect(() => new ManagedApis([config('Pets')])).toThrow(ApiIdentError);
  });

  it('describes each API version model', () => {
    const apis = new ManagedApis([
      config('pets', {
        versions: versioned([
          [2, 'ADD_TOYS'],
          [1, 'INITIAL'],
        ]),
      }),
    ]);
    const pets = apis.get('pets');
    expect(pets?.isVersioned).toBe(true);
    expect(pets?.latestVersion).toEqual(semver(2));
    expect(pets?.supportedVersions).toEqual([semver(2), semver(1)]);
    expect(pets?.strictLatest).toBe(false);
  });

  it('combines global and per-API validators', () => {
    const global = () => undefined;
    const local = () => undefined;
    const apis = new ManagedApis([config('pets', { extraValidation: local }), config('zoo')], global);

    const [pets, zoo] = apis.list();
    expect(pets && apis.extraValidatorsFor(pets)).toEqual([global, local]);
    expect(zoo && apis.extraValidatorsFor(zoo)).toEqual([global]);
    expect(apis.filter((api) => api.ident === 'zoo').globalValidation).toBe(global);
  });
});
