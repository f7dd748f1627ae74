// ============================================================
// Steam Client — Install Path Discovery
// ============================================================
// Install locations:
//   Linux:   ~/.var/app/com.valvesoftware.Steam/.steam/steam (Flatpak)
//            ~/.steam/steam
//            ~/.local/share/Steam
//   Windows: HKLM\SOFTWARE\Wow6432Node\Valve\Steam  InstallPath
//            HKCU\Software\Valve\Steam              SteamPath
//   macOS:   ~/Library/Application Support/Steam

import { existsSync } from 'fs';
import { join } from 'path';
import { isSupportedPlatform } from './utils.js';
import type { DiscoveryContext, Result } from '../types/index.js';

const REGISTRY_LOCATIONS: ReadonlyArray<{ key: string; value: string }> = [
  { key: 'HKEY_LOCAL_MACHINE\\SOFTWARE\\Wow6432Node\\Valve\\Steam', value: 'InstallPath' },
  { key: 'HKEY_CURRENT_USER\\Software\\Valve\\Steam', value: 'SteamPath' },
];

/** Candidate install directories for linux and macOS, most specific first */
export function candidateClientPaths(plat: 'darwin' | 'linux', home: string): string[] {
  switch (plat) {
    case 'linux':
      return [
        join(home, '.var', 'app', 'com.valvesoftware.Steam', '.steam', 'steam'),
        join(home, '.steam', 'steam'),
        join(home, '.local', 'share', 'Steam'),
      ];
    case 'darwin':
      return [join(home, 'Library', 'Application Support', 'Steam')];
  }
}

/**
 * Find the Steam client's install directory.
 */
export async function resolveClientPath(ctx: DiscoveryContext): Promise<Result<string>> {
  if (ctx.steamPath) {
    return { ok: true, data: ctx.steamPath };
  }

  const plat = ctx.platform;
  if (!isSupportedPlatform(plat)) {
    return { ok: false, error: { kind: 'unsupported', platform: plat } };
  }

  if (plat === 'win32') {
    for (const { key, value } of REGISTRY_LOCATIONS) {
      const found = await ctx.readRegistry(key, value);
      if (found) return { ok: true, data: found };
    }
  } else {
    const found = candidateClientPaths(plat, ctx.home).find((p) => existsSync(p));
    if (found) return { ok: true, data: found };
  }

  return { ok: false, error: { kind: 'not-found', what: 'client' } };
}
