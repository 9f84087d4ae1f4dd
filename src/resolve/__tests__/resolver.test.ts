import { describe, expect, it } from 'vitest';
import { ManagedApi, ManagedApis, type ManagedApiConfig } from '../../apis/managed_apis.js';
import { GenerationError, SpecFileError } from '../../core/errors.js';
import { formatGitRef } from '../../git/git.js';
import {
  ApiSpecFiles,
  ApiSpecFilesBuilder,
  type ApiSources,
  type BlessedVersion,
  type LatestLink,
  type LocalApiFiles,
  type LocalFile,
} from '../../spec_files/api_files.js';
import { fileNameBasename, fileNamePath, toGitRefFileName } from '../../spec_files/file_name.js';
import { loadGenerated } from '../../spec_files/generated.js';
import type { ApiSpecFile } from '../../spec_files/spec_file.js';
import type { DocumentValidator } from '../../validation/validator.js';
import { semver, type Semver } from '../../versions/semver.js';
import { lockstep, versioned } from '../../versions/versions.js';
import {
  blessedEntry,
  COMMIT_1,
  COMMIT_2,
  localGitRef,
  localJson,
  petsContents,
  specFile,
  versionedName,
} from '../../__tests__/helpers/index.js';
import { apiProblems, isFresh, resolveAll, resolveApi } from '../resolver.js';

const MODEL = versioned([
  [2, 'ADD_X'],
  [1, 'INITIAL'],
]);
const V1 = petsContents('1.0.0');
const V2 = petsContents('2.0.0', { toys: true });
const LINK_PATH = 'pets/pets-latest.json';

const acceptAll: DocumentValidator = () => ({ ok: true });

function petsApi(overrides: Partial<ManagedApiConfig> = {}): ManagedApi {
  return new ManagedApi({
    ident: 'pets',
    title: 'Pet Store',
    versions: MODEL,
    generate: (version) => (version.major === 2 ? V2 : V1),
    ...overrides,
  });
}

function generatedFiles(): Map<string, ApiSpecFile> {
  return new Map([
    ['2.0.0', specFile('pets', MODEL, semver(2), V2)],
    ['1.0.0', specFile('pets', MODEL, semver(1), V1)],
  ]);
}

function pathOf(version: Semver, contents: string): string {
  return fileNamePath(versionedName('pets', version, contents));
}

const v2Basename = fileNameBasename(versionedName('pets', semver(2), V2));
const freshLink: LatestLink = { path: LINK_PATH, target: v2Basename };

interface SourceParts {
  blessed?: Array<[string, BlessedVersion]>;
  local?: LocalFile[];
  latestLink?: LatestLink;
  generated?: Map<string, ApiSpecFile>;
}

function sources(parts: SourceParts): ApiSources {
  return {
    blessed: new Map(parts.blessed ?? []),
    generated: parts.generated ?? generatedFiles(),
    local: { files: parts.local ?? [], latestLink: parts.latestLink },
  };
}

function resolvePets(parts: SourceParts, options: { gitRefStorage?: boolean; api?: ManagedApi } = {}) {
  return resolveApi(options.api ?? petsApi(), sources(parts), { gitRefStorage: options.gitRefStorage ?? false });
}

function problemsOf(parts: SourceParts, version: 1 | 2, options: { gitRefStorage?: boolean; api?: ManagedApi } = {}) {
  const resolved = resolvePets(parts, options);
  return resolved.versions.find((entry) => entry.version.major === version)?.problems;
}

describe('resolveApi (lockstep)', () => {
  const contents = '{"openapi":"3.0","paths":{}}';
  const model = lockstep('1.0.0');
  const api = new ManagedApi({ ident: 'inventory', title: 'Inventory', versions: model, generate: () => contents });
  const generated = new Map([['1.0.0', specFile('inventory', model, semver(1), contents)]]);
  const resolve = (local: LocalFile[]) =>
    resolveApi(api, { blessed: new Map(), generated, local: { files: local, latestLink: undefined } }, {
      gitRefStorage: false,
      validator: acceptAll,
    });
  const localFile = (text: string): LocalFile => ({
    path: 'inventory.json',
    name: { kind: 'lockstep', ident: 'inventory', version: semver(1) },
    version: semver(1),
    contents: text,
    defect: undefined,
  });

  it('asks for the exact generated bytes when the file is absent', () => {
    const resolved = resolve([]);
    expect(resolved.versions).toEqual([
      {
        version: semver(1),
        kind: 'lockstep',
        problems: [
          {
            kind: 'lockstep-stale',
            ident: 'inventory',
            version: semver(1),
            reason: 'missing',
            expected: { path: 'inventory.json', contents },
          },
        ],
      },
    ]);
    expect(resolved.latestLink).toBeUndefined();
  });

  it('reports different bytes as stale', () => {
    const [entry] = resolve([localFile('{}')]).versions;
    expect(entry?.problems.map((problem) => (problem.kind === 'lockstep-stale' ? problem.reason : problem.kind))).toEqual([
      'differs',
    ]);
  });

  it('is fresh when the bytes match', () => {
    expect(isFresh(resolve([localFile(contents)]))).toBe(true);
  });
});

describe('resolveApi (versioned)', () => {
  it('is fresh when every version is held as expected', () => {
    const resolved = resolvePets({
      blessed: [['1.0.0', blessedEntry('pets', semver(1), V1)]],
      local: [localJson('pets', semver(1), V1), localJson('pets', semver(2), V2)],
      latestLink: freshLink,
    });

    expect(resolved.versions).toEqual([
      { version: semver(2), kind: 'new-locally', problems: [] },
      { version: semver(1), kind: 'blessed', problems: [] },
    ]);
    expect(resolved.orphans).toEqual([]);
    expect(resolved.notes).toEqual([]);
    expect(isFresh(resolved)).toBe(true);
  });

  it('asks for every missing document and the latest link', () => {
    const resolved = resolvePets({});

    expect(resolved.versions.map((entry) => entry.problems)).toEqual([
      [
        {
          kind: 'local-version-missing-local',
          ident: 'pets',
          version: semver(2),
          expected: { path: pathOf(semver(2), V2), contents: V2 },
          staleFiles: [],
        },
      ],
      [
        {
          kind: 'local-version-missing-local',
          ident: 'pets',
          version: semver(1),
          expected: { path: pathOf(semver(1), V1), contents: V1 },
          staleFiles: [],
        },
      ],
    ]);
    expect(resolved.latestLink).toEqual({ kind: 'latest-link-missing', ident: 'pets', linkPath: LINK_PATH, target: v2Basename });
  });

  it('replaces a stale document for a version that is not blessed', () => {
    const stale = petsContents('2.0.0');
    const problems = problemsOf({ local: [localJson('pets', semver(2), stale)], latestLink: freshLink }, 2);
    expect(problems).toEqual([
      {
        kind: 'local-version-missing-local',
        ident: 'pets',
        version: semver(2),
        expected: { path: pathOf(semver(2), V2), contents: V2 },
        staleFiles: [pathOf(semver(2), stale)],
      },
    ]);
  });

  it('restores the blessed bytes when the local copy differs', () => {
    const edited = petsContents('1.0.0', { description: 'edited' });
    const problems = problemsOf(
      {
        blessed: [['1.0.0', blessedEntry('pets', semver(1), V1)]],
        local: [localJson('pets', semver(1), edited)],
      },
      1,
    );
    expect(problems).toEqual([
      {
        kind: 'blessed-version-missing-local',
        ident: 'pets',
        version: semver(1),
        write: { storage: 'json', path: pathOf(semver(1), V1), contents: V1 },
        staleFiles: [pathOf(semver(1), edited)],
      },
    ]);
  });

  it('reports extra local files next to the blessed document', () => {
    const edited = petsContents('1.0.0', { description: 'edited' });
    const problems = problemsOf(
      {
        blessed: [['1.0.0', blessedEntry('pets', semver(1), V1)]],
        local: [localJson('pets', semver(1), V1), localJson('pets', semver(1), edited)],
      },
      1,
    );
    expect(problems).toEqual([
      { kind: 'blessed-version-extra-local-spec', ident: 'pets', version: semver(1), paths: [pathOf(semver(1), edited)] },
    ]);
  });

  it('reports a blessed version the code no longer generates compatibly', () => {
    const blessed = petsContents('1.0.0', { toys: true });
    const problems = problemsOf(
      {
        blessed: [['1.0.0', blessedEntry('pets', semver(1), blessed)]],
        local: [localJson('pets', semver(1), blessed)],
      },
      1,
    );
    expect(problems).toEqual([
      {
        kind: 'blessed-version-broken',
        ident: 'pets',
        version: semver(1),
        relationship: 'forward-compatible',
        changes: [{ class: 'backward-incompatible', path: 'GET /toys', message: 'operation removed' }],
        blessedPath: pathOf(semver(1), blessed),
      },
    ]);
  });

  it('accepts wire-compatible changes to a blessed version', () => {
    const blessed = petsContents('1.0.0', { description: 'old words' });
    expect(
      problemsOf(
        {
          blessed: [['1.0.0', blessedEntry('pets', semver(1), blessed)]],
          local: [localJson('pets', semver(1), blessed)],
        },
        1,
      ),
    ).toEqual([]);
  });

  it('requires the latest blessed version to match byte for byte when strict', () => {
    const blessed = petsContents('2.0.0', { toys: true, description: 'old words' });
    const problems = problemsOf(
      {
        blessed: [['2.0.0', blessedEntry('pets', semver(2), blessed)]],
        local: [localJson('pets', semver(2), blessed)],
      },
      2,
      { api: petsApi({ strictLatest: true }) },
    );
    expect(problems).toEqual([
      {
        kind: 'blessed-latest-version-bytewise-mismatch',
        ident: 'pets',
        version: semver(2),
        blessedPath: pathOf(semver(2), blessed),
        generatedPath: pathOf(semver(2), V2),
      },
    ]);
  });

  it('reports a blessed document that could not be read', () => {
    const problems = problemsOf(
      {
        blessed: [
          [
            '1.0.0',
            {
              status: 'unresolved',
              path: 'pets/pets-1.0.0-abcdef.json',
              error: new SpecFileError('pets/pets-1.0.0-abcdef.json', 'json', 'invalid JSON: boom'),
            },
          ],
        ],
      },
      1,
    );
    expect(problems).toEqual([
      {
        kind: 'blessed-version-unresolved',
        ident: 'pets',
        version: semver(1),
        path: 'pets/pets-1.0.0-abcdef.json',
        error: 'invalid JSON: boom',
      },
    ]);
  });

  it('stops at validation failures', () => {
    const validator: DocumentValidator = (_document, target) =>
      target.isLatest ? { ok: false, findings: [{ path: 'paths', message: 'too many toys' }] } : { ok: true };
    const resolved = resolveApi(petsApi(), sources({ latestLink: freshLink }), { gitRefStorage: false, validator });
    expect(resolved.versions[0]?.problems).toEqual([
      {
        kind: 'generated-validation-error',
        ident: 'pets',
        version: semver(2),
        findings: [{ path: 'paths', message: 'too many toys' }],
      },
    ]);
  });
});

describe('resolveApi (git-ref storage)', () => {
  const v1RepoPath = `openapi/${pathOf(semver(1), V1)}`;
  const v1Ref = { commit: COMMIT_1, path: v1RepoPath };
  const v2Ref = { commit: COMMIT_2, path: `openapi/${pathOf(semver(2), V2)}` };
  const gitRefPath = fileNamePath(toGitRefFileName(versionedName('pets', semver(1), V1)));
  const blessedBoth = (v1First = v1Ref): Array<[string, BlessedVersion]> => [
    ['2.0.0', blessedEntry('pets', semver(2), V2, { kind: 'known', ref: v2Ref })],
    ['1.0.0', blessedEntry('pets', semver(1), V1, { kind: 'known', ref: v1First })],
  ];

  it('asks to store an older blessed version as a git ref', () => {
    const problems = problemsOf(
      { blessed: blessedBoth(), local: [localJson('pets', semver(1), V1), localJson('pets', semver(2), V2)] },
      1,
      { gitRefStorage: true },
    );
    expect(problems).toEqual([
      {
        kind: 'blessed-version-should-be-git-ref',
        ident: 'pets',
        version: semver(1),
        jsonPath: pathOf(semver(1), V1),
        gitRef: { path: gitRefPath, contents: formatGitRef(v1Ref), ref: v1Ref },
      },
    ]);
  });

  it('keeps JSON for a version introduced in the same commit as the latest', () => {
    const problems = problemsOf(
      {
        blessed: blessedBoth({ commit: COMMIT_2, path: v1RepoPath }),
        local: [localJson('pets', semver(1), V1)],
      },
      1,
      { gitRefStorage: true },
    );
    expect(problems).toEqual([]);
  });

  it('writes a git ref when the older version is missing', () => {
    const problems = problemsOf({ blessed: blessedBoth() }, 1, { gitRefStorage: true });
    expect(problems).toEqual([
      {
        kind: 'blessed-version-missing-local',
        ident: 'pets',
        version: semver(1),
        write: { storage: 'git-ref', ref: v1Ref, path: gitRefPath, contents: formatGitRef(v1Ref) },
        staleFiles: [],
      },
    ]);
  });

  it('keeps one copy when a version is stored both ways', () => {
    const local = [localJson('pets', semver(1), V1), localGitRef('pets', semver(1), V1)];
    expect(problemsOf({ blessed: blessedBoth(), local }, 1, { gitRefStorage: true })).toEqual([
      { kind: 'duplicate-local-file', ident: 'pets', version: semver(1), keep: gitRefPath, remove: pathOf(semver(1), V1) },
    ]);
    expect(problemsOf({ blessed: blessedBoth(), local }, 1)).toEqual([
      { kind: 'duplicate-local-file', ident: 'pets', version: semver(1), keep: pathOf(semver(1), V1), remove: gitRefPath },
    ]);
  });

  it('converts git refs back to JSON when storage is off', () => {
    expect(problemsOf({ blessed: blessedBoth(), local: [localGitRef('pets', semver(1), V1)] }, 1)).toEqual([
      {
        kind: 'git-ref-should-be-json',
        ident: 'pets',
        version: semver(1),
        gitRefPath,
        json: { path: pathOf(semver(1), V1), contents: V1 },
      },
    ]);
  });

  it('reports an unknown first commit', () => {
    const blessed: Array<[string, BlessedVersion]> = [
      ['2.0.0', blessedEntry('pets', semver(2), V2, { kind: 'known', ref: v2Ref })],
      ['1.0.0', blessedEntry('pets', semver(1), V1, { kind: 'unknown', path: v1RepoPath })],
    ];
    expect(problemsOf({ blessed, local: [localJson('pets', semver(1), V1)] }, 1, { gitRefStorage: true })).toEqual([
      { kind: 'git-ref-first-commit-unknown', ident: 'pets', version: semver(1), path: v1RepoPath },
    ]);
  });
});

describe('resolveApi (whole API)', () => {
  it('reports local files that match no supported document', () => {
    const v3 = petsContents('3.0.0');
    const v0 = petsContents('0.1.0');
    const malformed: LocalFile = {
      path: 'pets/pets-2.0.0.json',
      name: undefined,
      version: undefined,
      contents: undefined,
      defect: new SpecFileError('pets/pets-2.0.0.json', 'file-name', 'expected "<version>-<hash>" after the API name'),
    };
    const resolved = resolvePets({
      local: [localJson('pets', semver(0, 1, 0), v0), malformed, localJson('pets', semver(3), v3)],
    });

    expect(resolved.orphans).toEqual([
      {
        kind: 'local-spec-file-orphaned',
        ident: 'pets',
        version: semver(0, 1, 0),
        path: fileNamePath(versionedName('pets', semver(0, 1, 0), v0)),
        reason: 'v0.1.0 is not a supported version',
        retired: true,
      },
      {
        kind: 'local-spec-file-orphaned',
        ident: 'pets',
        version: undefined,
        path: 'pets/pets-2.0.0.json',
        reason: 'expected "<version>-<hash>" after the API name',
        retired: false,
      },
      {
        kind: 'local-spec-file-orphaned',
        ident: 'pets',
        version: semver(3),
        path: pathOf(semver(3), v3),
        reason: 'v3.0.0 is not a supported version',
        retired: false,
      },
    ]);
  });

  it('notes blessed versions that are no longer supported', () => {
    const resolved = resolvePets({ blessed: [['3.0.0', blessedEntry('pets', semver(3), petsContents('3.0.0'))]] });
    expect(resolved.notes).toEqual([{ kind: 'blessed-version-removed', ident: 'pets', version: semver(3) }]);
  });

  it('reports a latest link pointing at the wrong document', () => {
    const resolved = resolvePets({ latestLink: { path: LINK_PATH, target: 'pets-1.0.0-abcdef.json' } });
    expect(resolved.latestLink).toEqual({
      kind: 'latest-link-stale',
      ident: 'pets',
      linkPath: LINK_PATH,
      target: v2Basename,
      found: 'pets-1.0.0-abcdef.json',
    });
  });

  it('reports a latest file that is not a link', () => {
    const resolved = resolvePets({ latestLink: { path: LINK_PATH, target: undefined } });
    expect(resolved.latestLink).toMatchObject({ kind: 'latest-link-stale', found: undefined });
  });

  it('leaves a link to another document of a blessed latest version alone', () => {
    const other = fileNameBasename(versionedName('pets', semver(2), 'other'));
    const resolved = resolvePets({
      blessed: [['2.0.0', blessedEntry('pets', semver(2), V2)]],
      latestLink: { path: LINK_PATH, target: other },
    });
    expect(resolved.latestLink).toBeUndefined();
  });

  it('orders problems by ascending version, then orphans, then the link', () => {
    const v3 = petsContents('3.0.0');
    const resolved = resolvePets({ local: [localJson('pets', semver(3), v3)] });
    expect(apiProblems(resolved).map((problem) => [problem.kind, 'version' in problem ? problem.version?.major : undefined])).toEqual([
      ['local-version-missing-local', 1],
      ['local-version-missing-local', 2],
      ['local-spec-file-orphaned', 3],
      ['latest-link-missing', undefined],
    ]);
  });
});

describe('resolveAll', () => {
  const otherApi: ManagedApiConfig = {
    ident: 'zoo',
    title: 'Zoo',
    versions: lockstep('1.0.0'),
    generate: () => '{}',
  };

  function loaded(generated: ApiSpecFilesBuilder<ApiSpecFile> | ApiSpecFiles<ApiSpecFile>) {
    const blessed = new ApiSpecFilesBuilder<BlessedVersion>('blessed');
    blessed.warn('ignoring README.md: not a document of any managed API');
    return {
      blessed: blessed.build(),
      generated: generated instanceof ApiSpecFiles ? generated : generated.build(),
      local: { apis: new Map<string, LocalApiFiles>(), warnings: ['local: ignoring notes.txt: not a document of any managed API'] },
    };
  }

  it('records a generation failure on its API only', () => {
    const generated = new ApiSpecFilesBuilder<ApiSpecFile>('generated');
    generated.failApi('pets', new GenerationError('pets', '2.0.0', 'boom'));
    generated.set('zoo', semver(1), specFile('zoo', lockstep('1.0.0'), semver(1), '{}'));

    const resolved = resolveAll(new ManagedApis([petsApi(), otherApi]), loaded(generated), {
      gitRefStorage: false,
      validator: acceptAll,
    });

    expect(resolved.apis.map((api) => [api.ident, api.error?.message])).toEqual([
      ['pets', 'generating pets v2.0.0 failed: boom'],
      ['zoo', undefined],
    ]);
    expect(resolved.apis[1]?.versions[0]?.problems.map((problem) => problem.kind)).toEqual(['lockstep-stale']);
    expect(resolved.warnings).toEqual([
      'blessed: ignoring README.md: not a document of any managed API',
      'local: ignoring notes.txt: not a document of any managed API',
    ]);
  });

  it('fails an API whose generator declares the wrong version', async () => {
    const misreporting = petsApi({ generate: (version) => (version.major === 1 ? petsContents('0.9.0') : V2) });
    const apis = new ManagedApis([misreporting, otherApi]);

    const resolved = resolveAll(apis, loaded(await loadGenerated(apis)), { gitRefStorage: false, validator: acceptAll });

    expect(resolved.apis.map((api) => [api.ident, api.error?.message])).toEqual([
      ['pets', 'generating pets v1.0.0 failed: document declares version 0.9.0'],
      ['zoo', undefined],
    ]);
    expect(resolved.apis[0]?.versions).toEqual([]);
  });

  it('turns a missing generated version into an API error', () => {
    const generated = new ApiSpecFilesBuilder<ApiSpecFile>('generated');
    generated.set('pets', semver(2), specFile('pets', MODEL, semver(2), V2));

    const resolved = resolveAll(new ManagedApis([petsApi()]), loaded(generated), { gitRefStorage: false });

    expect(resolved.apis[0]?.error?.message).toBe(
      'generating pets v1.0.0 failed: no document was generated for this version',
    );
  });
});
