// ============================================================
// acf-locate — Terminal Output Formatter
// ============================================================
// Pretty-prints discovery results for humans. Machine output
// goes through ./json.ts instead.

import chalk from 'chalk';
import { formatError } from '../acf/errors.js';
import type { AcfError, InstalledGamesResult } from '../types/index.js';

/** Print the banner */
export function printBanner(version: string): void {
  console.log('');
  console.log(chalk.bold.cyan('  acf-locate') + chalk.gray(` v${version}`));
  console.log(chalk.gray('  Steam library & save-data locator'));
  console.log('');
}

/** Print the installed games table */
export function printInstalledGames(result: InstalledGamesResult, verbose: boolean): void {
  const names = [...result.games.keys()].sort((a, b) => a.localeCompare(b));

  if (names.length === 0) {
    printNoGamesFound();
  } else {
    const width = Math.max(...names.map((n) => n.length));
    for (const name of names) {
      const appId = result.games.get(name) ?? '';
      console.log(`  ${chalk.bold(name.padEnd(width))}  ${chalk.cyan(appId)}`);
    }
    console.log('');
    console.log(
      chalk.gray(
        `  ${names.length} game(s) from ${result.manifestsRead} manifest(s) in ${result.librariesChecked} librar${result.librariesChecked === 1 ? 'y' : 'ies'}`,
      ),
    );
  }

  if (result.errors.length > 0) {
    console.log(chalk.yellow(`  ${result.errors.length} file(s) could not be read`));
    if (verbose) {
      for (const { path, error } of result.errors) {
        console.log(chalk.gray(`    ${path}: ${error}`));
      }
    }
  }
  console.log('');
}

/** Print "no games found" message */
export function printNoGamesFound(): void {
  console.log(chalk.yellow('  No installed games found.'));
  console.log('');
  console.log(chalk.gray('  If Steam is installed somewhere unusual, use:'));
  console.log(chalk.cyan('    acf-locate --steam-path /path/to/Steam games'));
  console.log(chalk.gray('  or set ACF_LOCATE_STEAM_PATH.'));
}

/** Print an error; absence answers are yellow, failures red */
export function printError(error: AcfError, absence: boolean): void {
  const color = absence ? chalk.yellow : chalk.red;
  console.error(color(`  ${formatError(error)}`));
}

/** Gray diagnostic line, shown with --verbose */
export function printDebug(message: string): void {
  console.error(chalk.gray(`  ${message}`));
}
