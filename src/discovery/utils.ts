// ============================================================
// acf-locate — Discovery Utilities
// ============================================================

import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { execFile } from 'child_process';
import { promisify } from 'util';
import { homedir, platform } from 'os';
import { parseAcf } from '../acf/index.js';
import type {
  AcfBlock,
  DiscoveryContext,
  RegistryReader,
  Result,
  SupportedPlatform,
} from '../types/index.js';

const execFileAsync = promisify(execFile);
const REGISTRY_TIMEOUT_MS = 4000;

const SUPPORTED_PLATFORMS: readonly string[] = ['darwin', 'win32', 'linux'];

export function isSupportedPlatform(plat: string): plat is SupportedPlatform {
  return SUPPORTED_PLATFORMS.includes(plat);
}

/**
 * Read a REG_SZ value with `reg query`.
 * Returns null when the key or value does not exist.
 */
export const queryRegistry: RegistryReader = async (key, value) => {
  try {
    const { stdout } = await execFileAsync('reg', ['query', key, '/v', value], {
      timeout: REGISTRY_TIMEOUT_MS,
      windowsHide: true,
    });
    return parseRegQueryOutput(stdout, value);
  } catch {
    // reg exits non-zero when the key is missing
    return null;
  }
};

/** Extract `<value>    REG_SZ    <data>` from reg.exe output */
export function parseRegQueryOutput(stdout: string, value: string): string | null {
  for (const line of stdout.split(/\r?\n/)) {
    const match = line.trim().match(/^(\S+)\s+REG_(?:EXPAND_)?SZ\s+(.+)$/);
    if (match && match[1].toLowerCase() === value.toLowerCase()) {
      return match[2].trim();
    }
  }
  return null;
}

/** Build a context for the current process */
export function createDiscoveryContext(steamPath?: string): DiscoveryContext {
  return {
    steamPath,
    platform: platform(),
    home: homedir(),
    env: process.env,
    readRegistry: queryRegistry,
  };
}

/**
 * Read and parse an ACF/VDF file.
 */
export async function readAcfFile(path: string): Promise<Result<AcfBlock>> {
  if (!existsSync(path)) {
    return { ok: false, error: { kind: 'not-found', what: 'file', key: path } };
  }

  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err) {
    return {
      ok: false,
      error: { kind: 'io-error', path, message: err instanceof Error ? err.message : String(err) },
    };
  }

  return parseAcf(text, { source: path });
}
