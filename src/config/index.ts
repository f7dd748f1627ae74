// ============================================================
// acf-locate — Configuration
// ============================================================
// Steam path resolution priority:
//   1. --steam-path flag
//   2. ACF_LOCATE_STEAM_PATH environment variable
//   3. ~/.acf-locate/config.json ({ "steamPath": "..." })
//
// ACF_LOCATE_CONFIG points at a different config file.

import { readFile } from 'fs/promises';
import { join } from 'path';
import { homedir } from 'os';

export const STEAM_PATH_ENV = 'ACF_LOCATE_STEAM_PATH';
export const CONFIG_PATH_ENV = 'ACF_LOCATE_CONFIG';

export interface AcfLocateConfig {
  steamPath?: string;
}

/** Location of the config file */
export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env, home: string = homedir()): string {
  const override = env[CONFIG_PATH_ENV];
  if (override && override.length > 0) return override;
  return join(home, '.acf-locate', 'config.json');
}

/**
 * Load the config file. A missing or invalid file is an empty config.
 */
export async function loadConfig(configPath: string): Promise<AcfLocateConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch {
    return {};
  }

  try {
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed !== 'object' || parsed === null) return {};
    const steamPath: unknown = Reflect.get(parsed, 'steamPath');
    return typeof steamPath === 'string' && steamPath.length > 0 ? { steamPath } : {};
  } catch {
    return {};
  }
}

/**
 * Resolve the Steam path override, if any.
 * Returns undefined when OS lookup should be used.
 */
export async function resolveSteamPathOverride(
  flag: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
  home: string = homedir(),
): Promise<string | undefined> {
  if (flag && flag.length > 0) return flag;

  const envPath = env[STEAM_PATH_ENV];
  if (envPath && envPath.length > 0) return envPath;

  const config = await loadConfig(resolveConfigPath(env, home));
  return config.steamPath;
}
