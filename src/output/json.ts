// ============================================================
// acf-locate — JSON Output Formatter
// ============================================================
// Structured output for scripts and piping to other tools.

import { formatError } from '../acf/errors.js';
import type { AcfError, InstalledGamesResult } from '../types/index.js';

/**
 * Format any value as indented JSON.
 */
export function formatJSON(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

/**
 * Installed games as `{ games: { name: appid }, ... }`, names sorted.
 */
export function formatInstalledGamesJSON(result: InstalledGamesResult): string {
  const games: Record<string, string> = {};
  for (const name of [...result.games.keys()].sort((a, b) => a.localeCompare(b))) {
    games[name] = result.games.get(name) ?? '';
  }

  return formatJSON({
    games,
    librariesChecked: result.librariesChecked,
    manifestsRead: result.manifestsRead,
    errors: result.errors,
  });
}

/**
 * An error as `{ error: { ...fields, message } }`.
 */
export function formatErrorJSON(error: AcfError): string {
  return formatJSON({ error: { ...error, message: formatError(error) } });
}
