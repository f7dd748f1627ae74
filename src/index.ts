#!/usr/bin/env node
// ============================================================
// acf-locate — Main Entry Point
// ============================================================
// Usage: acf-locate [options] <command>
//
// Finds the Steam client on this machine, reads its ACF/VDF
// metadata files, and reports where games are installed and
// where they keep their save data.

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { isAbsence, toPlainObject } from './acf/index.js';
import {
  createDiscoveryContext,
  getAccountName,
  getAllInstalledGames,
  getAppIdByName,
  getGameAppDataPath,
  getGameInstallPath,
  getPersonaName,
  readAcfFile,
  resolveClientPath,
} from './discovery/index.js';
import { resolveSteamPathOverride } from './config/index.js';
import {
  printBanner,
  printDebug,
  printError,
  printInstalledGames,
} from './output/terminal.js';
import { formatErrorJSON, formatInstalledGamesJSON, formatJSON } from './output/json.js';
import type { AcfError, DiscoveryContext, GlobalOptions, Result } from './types/index.js';

const VERSION = '1.0.0';

/** Exit code for "not installed" style answers */
const EXIT_ABSENT = 2;

const program = new Command();

program
  .name('acf-locate')
  .description('Locate Steam game install and save-data directories from the client\'s ACF/VDF files')
  .version(VERSION)
  .option('--steam-path <path>', 'Steam install directory (skips OS lookup)')
  .option('-j, --json', 'Output results as JSON')
  .option('-v, --verbose', 'Show resolved paths and unreadable files');

// ============================================================
// Shared helpers
// ============================================================

async function buildContext(opts: GlobalOptions): Promise<DiscoveryContext> {
  const override = await resolveSteamPathOverride(opts.steamPath);
  const ctx = createDiscoveryContext(override);

  if (opts.verbose && !opts.json) {
    const client = await resolveClientPath(ctx);
    printDebug(client.ok ? `Steam client: ${client.data}` : `Steam client: ${chalk.yellow('not found')}`);
  }
  return ctx;
}

function fail(error: AcfError, opts: GlobalOptions): never {
  const absence = isAbsence(error);
  if (opts.json) {
    console.log(formatErrorJSON(error));
  } else {
    printError(error, absence);
  }
  process.exit(absence ? EXIT_ABSENT : 1);
}

/** Print a single string result under `label`, or fail */
function report(result: Result<string>, label: string, opts: GlobalOptions): void {
  if (!result.ok) fail(result.error, opts);

  if (opts.json) {
    console.log(formatJSON({ [label]: result.data }));
  } else {
    console.log(result.data);
  }
}

// ============================================================
// Commands
// ============================================================

program
  .command('client')
  .description('Print the Steam client install directory')
  .action(async (_options: unknown, cmd: Command) => {
    const opts = cmd.optsWithGlobals<GlobalOptions>();
    const ctx = await buildContext(opts);
    report(await resolveClientPath(ctx), 'clientPath', opts);
  });

program
  .command('games')
  .description('List installed games and their app ids')
  .action(async (_options: unknown, cmd: Command) => {
    const opts = cmd.optsWithGlobals<GlobalOptions>();
    const isJSON = opts.json ?? false;
    const ctx = await buildContext(opts);

    if (!isJSON) printBanner(VERSION);

    const spinner = isJSON ? null : ora('Reading Steam libraries...').start();
    const installed = await getAllInstalledGames(ctx);

    if (!installed.ok) {
      spinner?.fail('Could not read Steam libraries');
      fail(installed.error, opts);
    }

    spinner?.succeed(`Found ${installed.data.games.size} installed game(s)`);

    if (isJSON) {
      console.log(formatInstalledGamesJSON(installed.data));
    } else {
      console.log('');
      printInstalledGames(installed.data, opts.verbose ?? false);
    }
  });

program
  .command('appid')
  .description('Find the app id of an installed game by its exact name')
  .argument('<name>', 'Game name as shown in Steam, e.g. "Noita"')
  .action(async (name: string, _options: unknown, cmd: Command) => {
    const opts = cmd.optsWithGlobals<GlobalOptions>();
    const ctx = await buildContext(opts);
    report(await getAppIdByName(ctx, name), 'appId', opts);
  });

program
  .command('install-path')
  .description('Print the install directory of a game')
  .argument('<appid>', 'Steam app id')
  .action(async (appId: string, _options: unknown, cmd: Command) => {
    const opts = cmd.optsWithGlobals<GlobalOptions>();
    const ctx = await buildContext(opts);
    report(await getGameInstallPath(ctx, appId), 'installPath', opts);
  });

program
  .command('appdata')
  .description('Print the save-data directory of a game (Proton prefix or native AppData)')
  .argument('<appid>', 'Steam app id')
  .option('--install-dir <name>', 'Folder name to look for when the manifest\'s installdir is wrong')
  .action(async (appId: string, options: { installDir?: string }, cmd: Command) => {
    const opts = cmd.optsWithGlobals<GlobalOptions>();
    const ctx = await buildContext(opts);
    report(await getGameAppDataPath(ctx, appId, options.installDir), 'appDataPath', opts);
  });

program
  .command('user')
  .description('Print the most recent Steam account')
  .option('--field <field>', 'persona or account', 'persona')
  .action(async (options: { field: string }, cmd: Command) => {
    const opts = cmd.optsWithGlobals<GlobalOptions>();
    const ctx = await buildContext(opts);

    if (options.field === 'account') {
      report(await getAccountName(ctx), 'accountName', opts);
    } else if (options.field === 'persona') {
      report(await getPersonaName(ctx), 'personaName', opts);
    } else {
      console.error(chalk.red(`  Unknown field "${options.field}". Use persona or account.`));
      process.exit(1);
    }
  });

program
  .command('parse')
  .description('Parse any ACF/VDF file and print it as JSON')
  .argument('<file>', 'Path to a .acf or .vdf file')
  .action(async (file: string, _options: unknown, cmd: Command) => {
    const opts = cmd.optsWithGlobals<GlobalOptions>();
    const tree = await readAcfFile(file);
    if (!tree.ok) fail(tree.error, opts);

    console.log(formatJSON(toPlainObject(tree.data)));
  });

program.parseAsync().catch((err: unknown) => {
  console.error(chalk.red(`  ${err instanceof Error ? err.message : String(err)}`));
  process.exit(1);
});
