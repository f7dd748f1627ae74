// ============================================================
// Steam Libraries — Game & Manifest Discovery
// ============================================================
// File locations:
//   <client>/steamapps/libraryfolders.vdf
//   <library>/steamapps/appmanifest_<appid>.acf
//   <library>/steamapps/common/<installdir>
//   <client>/config/loginusers.vdf

import { join } from 'path';
import { glob } from 'glob';
import { resolveClientPath } from './client-path.js';
import { readAcfFile } from './utils.js';
import {
  gameBasePath,
  libraryPaths,
  loginUserField,
  readAppManifest,
} from '../acf/index.js';
import { formatError } from '../acf/errors.js';
import type {
  AcfBlock,
  AppManifest,
  DiscoveryContext,
  InstalledGamesResult,
  Result,
} from '../types/index.js';

export function libraryFoldersPath(clientPath: string): string {
  return join(clientPath, 'steamapps', 'libraryfolders.vdf');
}

export function manifestPath(libraryPath: string, appId: string): string {
  return join(libraryPath, 'steamapps', `appmanifest_${appId}.acf`);
}

export function loginUsersPath(clientPath: string): string {
  return join(clientPath, 'config', 'loginusers.vdf');
}

/** Resolve the client and parse its libraryfolders.vdf */
export async function loadLibraryFolders(ctx: DiscoveryContext): Promise<Result<AcfBlock>> {
  const clientPath = await resolveClientPath(ctx);
  if (!clientPath.ok) return clientPath;
  return readAcfFile(libraryFoldersPath(clientPath.data));
}

/**
 * Read every app manifest in every library.
 * Broken libraries and manifests are collected in `errors`, not thrown.
 */
export async function getAllInstalledGames(ctx: DiscoveryContext): Promise<Result<InstalledGamesResult>> {
  const tree = await loadLibraryFolders(ctx);
  if (!tree.ok) return tree;

  const folders = libraryPaths(tree.data);
  if (!folders.ok) return folders;

  const result: InstalledGamesResult = {
    games: new Map(),
    librariesChecked: 0,
    manifestsRead: 0,
    errors: [],
  };

  for (const folder of folders.data) {
    result.librariesChecked++;
    const steamappsDir = join(folder.path, 'steamapps');

    let manifestFiles: string[];
    try {
      manifestFiles = (await glob('appmanifest_*.acf', { cwd: steamappsDir, absolute: true })).sort();
    } catch (err) {
      result.errors.push({
        path: steamappsDir,
        error: err instanceof Error ? err.message : String(err),
      });
      continue;
    }

    for (const file of manifestFiles) {
      const manifest = await readManifestFile(file);
      if (!manifest.ok) {
        result.errors.push({ path: file, error: formatError(manifest.error) });
        continue;
      }
      result.manifestsRead++;
      result.games.set(manifest.data.name, manifest.data.appId);
    }
  }

  return { ok: true, data: result };
}

async function readManifestFile(path: string): Promise<Result<AppManifest>> {
  const tree = await readAcfFile(path);
  if (!tree.ok) return tree;
  return readAppManifest(tree.data);
}

/**
 * Look up a game's app id by its exact name.
 */
export async function getAppIdByName(ctx: DiscoveryContext, name: string): Promise<Result<string>> {
  const installed = await getAllInstalledGames(ctx);
  if (!installed.ok) return installed;

  const appId = installed.data.games.get(name);
  if (appId === undefined) {
    return { ok: false, error: { kind: 'not-found', what: 'game', key: name } };
  }
  return { ok: true, data: appId };
}

/**
 * The library path containing `appId`, plus its parsed manifest.
 */
export async function locateApp(
  ctx: DiscoveryContext,
  appId: string,
): Promise<Result<{ basePath: string; manifest: AppManifest }>> {
  const tree = await loadLibraryFolders(ctx);
  if (!tree.ok) return tree;

  const basePath = gameBasePath(tree.data, appId);
  if (!basePath.ok) return basePath;

  const manifest = await readManifestFile(manifestPath(basePath.data, appId));
  if (!manifest.ok) return manifest;

  return { ok: true, data: { basePath: basePath.data, manifest: manifest.data } };
}

/**
 * <library>/steamapps/common/<installdir>
 */
export async function getGameInstallPath(ctx: DiscoveryContext, appId: string): Promise<Result<string>> {
  const located = await locateApp(ctx, appId);
  if (!located.ok) return located;

  const { basePath, manifest } = located.data;
  return { ok: true, data: join(basePath, 'steamapps', 'common', manifest.installDir) };
}

// ──────────────────────────────────────────────────────────
// loginusers.vdf
// ──────────────────────────────────────────────────────────

async function readLoginUserField(ctx: DiscoveryContext, field: string): Promise<Result<string>> {
  const clientPath = await resolveClientPath(ctx);
  if (!clientPath.ok) return clientPath;

  const tree = await readAcfFile(loginUsersPath(clientPath.data));
  if (!tree.ok) return tree;

  return loginUserField(tree.data, field);
}

/** Display name of the most recent account */
export function getPersonaName(ctx: DiscoveryContext): Promise<Result<string>> {
  return readLoginUserField(ctx, 'PersonaName');
}

/** Login name of the most recent account */
export function getAccountName(ctx: DiscoveryContext): Promise<Result<string>> {
  return readLoginUserField(ctx, 'AccountName');
}
