import { describe, expect, it } from 'vitest';
import { ManagedApi, ManagedApis, type DocumentGenerator } from '../../apis/managed_apis.js';
import { GenerationError } from '../../core/errors.js';
import { canonicalJson } from '../../core/json.js';
import { formatSemver, semver } from '../../versions/semver.js';
import { lockstep, versioned } from '../../versions/versions.js';
import { petsContents, versionedName } from '../../__tests__/helpers/index.js';
import { generateDocument, loadGenerated } from '../generated.js';

const MODEL = versioned([
  [2, 'ADD_X'],
  [1, 'INITIAL'],
]);

function petsApi(generate: DocumentGenerator): ManagedApi {
  return new ManagedApi({ ident: 'pets', title: 'Pet Store', versions: MODEL, generate });
}

function inventoryApi(contents: string): ManagedApi {
  return new ManagedApi({ ident: 'inventory', title: 'Inventory', versions: lockstep('1.0.0'), generate: () => contents });
}

async function generationFailure(api: ManagedApi, major: number): Promise<unknown> {
  return generateDocument(api, semver(major)).catch((caught: unknown) => caught);
}

describe('generateDocument', () => {
  it('serializes documents and names them by their contents', async () => {
    const api = petsApi((version) => ({
      openapi: '3.0.3',
      info: { title: 'Pet Store', version: formatSemver(version) },
      paths: {},
    }));

    const file = await generateDocument(api, semver(2));

    const expected = canonicalJson({ openapi: '3.0.3', info: { title: 'Pet Store', version: '2.0.0' }, paths: {} });
    expect(file.contents).toBe(expected);
    expect(file.name).toEqual(versionedName('pets', semver(2), expected));
  });

  it('rejects a document that declares another version', async () => {
    const error = await generationFailure(petsApi(() => petsContents('0.9.0')), 1);
    expect(error).toBeInstanceOf(GenerationError);
    expect(error instanceof GenerationError && error.message).toBe(
      'generating pets v1.0.0 failed: document declares version 0.9.0',
    );
  });

  it('requires a semver info.version for versioned APIs', async () => {
    const missing = await generationFailure(petsApi(() => '{"openapi":"3.0.3","paths":{}}'), 1);
    expect(missing instanceof GenerationError && missing.message).toBe(
      'generating pets v1.0.0 failed: document has no "info.version"',
    );

    const partial = await generationFailure(
      petsApi(() => '{"openapi":"3.0.3","info":{"title":"Pet Store","version":"1.0"},"paths":{}}'),
      1,
    );
    expect(partial instanceof GenerationError && partial.message).toBe(
      'generating pets v1.0.0 failed: "info.version" "1.0" is not a semver',
    );
  });

  it('lets lockstep documents omit info.version but not contradict it', async () => {
    const bare = await generateDocument(inventoryApi('{"openapi":"3.0","paths":{}}'), semver(1));
    expect(bare.contents).toBe('{"openapi":"3.0","paths":{}}');

    const error = await generationFailure(inventoryApi(petsContents('2.0.0')), 1);
    expect(error instanceof GenerationError && error.message).toBe(
      'generating inventory v1.0.0 failed: document declares version 2.0.0',
    );
  });
});

describe('loadGenerated', () => {
  it('fails only the API whose generator misreports its version', async () => {
    const pets = petsApi((version) => (version.major === 1 ? petsContents('0.9.0') : petsContents(version)));
    const inventory = inventoryApi('{"openapi":"3.0","paths":{}}');

    const generated = await loadGenerated(new ManagedApis([pets, inventory]));

    expect(generated.apiErrors.get('pets')?.message).toBe('generating pets v1.0.0 failed: document declares version 0.9.0');
    expect(generated.forApi('pets').size).toBe(0);
    expect(generated.apiErrors.has('inventory')).toBe(false);
    expect(generated.forApi('inventory').size).toBe(1);
  });
});
