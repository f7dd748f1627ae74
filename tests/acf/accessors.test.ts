import { describe, it, expect } from 'vitest';
import { parseAcf } from '../../src/acf/parser.js';
import {
  gameBasePath,
  getBlock,
  getString,
  installedAppIds,
  libraryPaths,
  loginUserField,
  manifestField,
  readAppManifest,
  readLoginUser,
} from '../../src/acf/accessors.js';
import type { AcfBlock } from '../../src/types/index.js';

function tree(text: string): AcfBlock {
  const result = parseAcf(text);
  if (!result.ok) throw new Error(`fixture did not parse: ${result.error.expected}`);
  return result.data;
}

const LIBRARIES = tree(`
"libraryfolders"
{
  "1"
  {
    "path"    "/mnt/games/SteamLibrary"
    "label"   "Games"
    "apps"    { "100" "0" }
  }
  "0"
  {
    "path"    "/home/test/.steam/steam"
    "apps"    { "200" "0" "201" "0" }
  }
  "2"
  {
    "path"    "/mnt/empty"
  }
}
`);

const MANIFEST = tree(`
"AppState"
{
  "appid"       "881100"
  "name"        "Noita"
  "installdir"  "Noita"
}
`);

const LOGIN_USERS = tree(`
"users"
{
  "76561190000000001"
  {
    "AccountName"   "test_account"
    "PersonaName"   "Test Persona"
    "MostRecent"    "1"
  }
  "76561190000000002"
  {
    "AccountName"   "second_account"
  }
}
`);

describe('node helpers', () => {
  it('distinguishes blocks from leaves', () => {
    const root = getBlock(MANIFEST, 'AppState');
    expect(root).toBeDefined();
    expect(getBlock(MANIFEST, 'missing')).toBeUndefined();
    if (root) {
      expect(getString(root, 'name')).toBe('Noita');
      expect(getBlock(root, 'name')).toBeUndefined();
    }
  });
});

describe('installedAppIds', () => {
  it('maps every library key to its app ids', () => {
    const result = installedAppIds(LIBRARIES);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.data).toEqual(
        new Map([
          ['1', new Set(['100'])],
          ['0', new Set(['200', '201'])],
          ['2', new Set<string>()],
        ]),
      );
    }
  });

  it('requires the libraryfolders root', () => {
    expect(installedAppIds(MANIFEST)).toEqual({
      ok: false,
      error: { kind: 'schema-mismatch', expectedRootKey: 'libraryfolders' },
    });
  });
});

describe('gameBasePath', () => {
  it('returns the path of the library containing the app', () => {
    expect(gameBasePath(LIBRARIES, '200')).toEqual({ ok: true, data: '/home/test/.steam/steam' });
    expect(gameBasePath(LIBRARIES, '100')).toEqual({ ok: true, data: '/mnt/games/SteamLibrary' });
  });

  it('fails with not-found for an unknown app id', () => {
    expect(gameBasePath(LIBRARIES, '999')).toEqual({
      ok: false,
      error: { kind: 'not-found', what: 'app', key: '999' },
    });
  });

  it('fails with schema-mismatch on a manifest tree', () => {
    const result = gameBasePath(MANIFEST, '881100');
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe('schema-mismatch');
  });
});

describe('libraryPaths', () => {
  it('lists each library with its label when present', () => {
    expect(libraryPaths(LIBRARIES)).toEqual({
      ok: true,
      data: [
        { key: '1', path: '/mnt/games/SteamLibrary', label: 'Games' },
        { key: '0', path: '/home/test/.steam/steam' },
        { key: '2', path: '/mnt/empty' },
      ],
    });
  });
});

describe('manifestField', () => {
  it('returns AppState fields', () => {
    expect(manifestField(MANIFEST, 'name')).toEqual({ ok: true, data: 'Noita' });
    expect(manifestField(MANIFEST, 'appid')).toEqual({ ok: true, data: '881100' });
  });

  it('fails with not-found for a missing field', () => {
    expect(manifestField(MANIFEST, 'missing')).toEqual({
      ok: false,
      error: { kind: 'not-found', what: 'field', key: 'missing' },
    });
  });

  it('fails with schema-mismatch on a library tree', () => {
    expect(manifestField(LIBRARIES, 'name')).toEqual({
      ok: false,
      error: { kind: 'schema-mismatch', expectedRootKey: 'AppState' },
    });
  });

  it('reads the whole manifest record', () => {
    expect(readAppManifest(MANIFEST)).toEqual({
      ok: true,
      data: { appId: '881100', name: 'Noita', installDir: 'Noita' },
    });
  });

  it('reports the first missing manifest field', () => {
    const partial = tree('"AppState" { "appid" "1" "installdir" "X" }');
    expect(readAppManifest(partial)).toEqual({
      ok: false,
      error: { kind: 'not-found', what: 'field', key: 'name' },
    });
  });
});

describe('login users', () => {
  it('reads fields of the first user', () => {
    expect(loginUserField(LOGIN_USERS, 'PersonaName')).toEqual({ ok: true, data: 'Test Persona' });
    expect(loginUserField(LOGIN_USERS, 'AccountName')).toEqual({ ok: true, data: 'test_account' });
  });

  it('fails when the first user lacks the field', () => {
    expect(loginUserField(LOGIN_USERS, 'Timestamp')).toEqual({
      ok: false,
      error: { kind: 'not-found', what: 'field', key: 'Timestamp' },
    });
  });

  it('fails when there are no users', () => {
    expect(loginUserField(tree('"users" { }'), 'PersonaName')).toEqual({
      ok: false,
      error: { kind: 'not-found', what: 'user' },
    });
  });

  it('reads the first user record', () => {
    expect(readLoginUser(LOGIN_USERS)).toEqual({
      ok: true,
      data: {
        steamId: '76561190000000001',
        accountName: 'test_account',
        personaName: 'Test Persona',
      },
    });
  });

  it('falls back to the account name when the persona is missing', () => {
    const single = tree('"users" { "1" { "AccountName" "only_account" } }');
    expect(readLoginUser(single)).toEqual({
      ok: true,
      data: { steamId: '1', accountName: 'only_account', personaName: 'only_account' },
    });
  });
});
