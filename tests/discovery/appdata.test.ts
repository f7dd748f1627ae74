import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { appDataCandidates, getGameAppDataPath } from '../../src/discovery/appdata.js';
import { manifestPath } from '../../src/discovery/library.js';
import type { DiscoveryContext } from '../../src/types/index.js';

const tempRoots: string[] = [];

afterEach(() => {
  while (tempRoots.length > 0) {
    const next = tempRoots.pop();
    if (!next) continue;
    fs.rmSync(next, { recursive: true, force: true });
  }
});

function write(file: string, content: string): void {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, content, 'utf-8');
}

function protonDir(steam: string, appId: string, kind: 'Local' | 'LocalLow', installDir: string): string {
  return path.join(
    steam, 'steamapps', 'compatdata', appId, 'pfx', 'drive_c', 'users', 'steamuser', 'AppData', kind, installDir,
  );
}

describe('getGameAppDataPath', () => {
  let root: string;
  let steam: string;
  let ctx: DiscoveryContext;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'acf-locate-appdata-'));
    tempRoots.push(root);
    steam = path.join(root, 'steam');

    write(
      path.join(steam, 'steamapps', 'libraryfolders.vdf'),
      `"libraryfolders" { "0" { "path" "${steam}" "apps" { "881100" "1" "722060" "1" } } }`,
    );
    write(manifestPath(steam, '881100'), '"AppState" { "appid" "881100" "name" "Noita" "installdir" "Noita" }');
    write(
      manifestPath(steam, '722060'),
      '"AppState" { "appid" "722060" "name" "Dominions 5" "installdir" "Dominions5" }',
    );

    ctx = { steamPath: steam, platform: 'linux', home: path.join(root, 'home'), env: {}, readRegistry: async () => null };
  });

  it('finds the Proton LocalLow directory', async () => {
    const expected = protonDir(steam, '881100', 'LocalLow', 'Noita');
    fs.mkdirSync(expected, { recursive: true });
    expect(await getGameAppDataPath(ctx, '881100')).toEqual({ ok: true, data: expected });
  });

  it('prefers Proton Local over LocalLow', async () => {
    const local = protonDir(steam, '881100', 'Local', 'Noita');
    fs.mkdirSync(local, { recursive: true });
    fs.mkdirSync(protonDir(steam, '881100', 'LocalLow', 'Noita'), { recursive: true });
    expect(await getGameAppDataPath(ctx, '881100')).toEqual({ ok: true, data: local });
  });

  it('falls back to native LOCALAPPDATA', async () => {
    const localAppData = path.join(root, 'win', 'AppData', 'Local');
    fs.mkdirSync(path.join(localAppData, 'Dominions5'), { recursive: true });
    const result = await getGameAppDataPath({ ...ctx, env: { LOCALAPPDATA: localAppData } }, '722060');
    expect(result).toEqual({ ok: true, data: path.join(localAppData, 'Dominions5') });
  });

  it('uses the install dir override and the LocalLow sibling of LOCALAPPDATA', async () => {
    const localAppData = path.join(root, 'win', 'AppData', 'Local');
    const localLow = path.join(root, 'win', 'AppData', 'LocalLow', 'Other');
    fs.mkdirSync(localLow, { recursive: true });
    const result = await getGameAppDataPath({ ...ctx, env: { LOCALAPPDATA: localAppData } }, '722060', 'Other');
    expect(result).toEqual({ ok: true, data: localLow });
  });

  it('reports not-found when no candidate exists', async () => {
    expect(await getGameAppDataPath(ctx, '722060')).toEqual({
      ok: false,
      error: { kind: 'not-found', what: 'appdata', key: '722060' },
    });
  });

  it('only adds Windows candidates when the variables are set', () => {
    expect(appDataCandidates(ctx, '/lib', '1', 'Game')).toEqual([
      protonDir('/lib', '1', 'Local', 'Game'),
      protonDir('/lib', '1', 'LocalLow', 'Game'),
    ]);

    const withEnv = { ...ctx, env: { LOCALAPPDATA: '/w/AppData/Local', APPDATA: '/w/AppData/Roaming' } };
    expect(appDataCandidates(withEnv, '/lib', '1', 'Game').slice(2)).toEqual([
      path.join('/w/AppData/Local', 'Game'),
      path.join('/w/AppData/Roaming', 'Game'),
      path.join('/w/AppData', 'LocalLow', 'Game'),
    ]);
  });
});
