// ============================================================
// Steam Games — Save-Data Directory Discovery
// ============================================================
// Probe order:
//   1. Proton prefix:  <library>/steamapps/compatdata/<appid>/pfx/drive_c/
//                      users/steamuser/AppData/Local/<installdir>
//   2. Proton prefix, LocalLow instead of Local
//   3. %LOCALAPPDATA%\<installdir>
//   4. %APPDATA%\<installdir>
//   5. %LOCALAPPDATA%\..\LocalLow\<installdir>

import { existsSync } from 'fs';
import { dirname, join } from 'path';
import { locateApp } from './library.js';
import type { DiscoveryContext, Result } from '../types/index.js';

const PROTON_USER_DIR = ['pfx', 'drive_c', 'users', 'steamuser', 'AppData'];

/**
 * Every save-data location worth checking, in probe order.
 */
export function appDataCandidates(
  ctx: DiscoveryContext,
  basePath: string,
  appId: string,
  installDir: string,
): string[] {
  const prefix = join(basePath, 'steamapps', 'compatdata', appId, ...PROTON_USER_DIR);
  const candidates = [join(prefix, 'Local', installDir), join(prefix, 'LocalLow', installDir)];

  // Native Windows locations only when the variables are actually set
  const localAppData = ctx.env.LOCALAPPDATA;
  const appData = ctx.env.APPDATA;
  if (localAppData) candidates.push(join(localAppData, installDir));
  if (appData) candidates.push(join(appData, installDir));
  if (localAppData) candidates.push(join(dirname(localAppData), 'LocalLow', installDir));

  return candidates;
}

/**
 * Find the directory a game keeps its saves in.
 * `installDirOverride` replaces the manifest's installdir when it is wrong.
 */
export async function getGameAppDataPath(
  ctx: DiscoveryContext,
  appId: string,
  installDirOverride?: string,
): Promise<Result<string>> {
  const located = await locateApp(ctx, appId);
  if (!located.ok) return located;

  const { basePath, manifest } = located.data;
  const installDir = installDirOverride || manifest.installDir;

  const found = appDataCandidates(ctx, basePath, appId, installDir).find((p) => existsSync(p));
  if (!found) {
    return { ok: false, error: { kind: 'not-found', what: 'appdata', key: appId } };
  }
  return { ok: true, data: found };
}
