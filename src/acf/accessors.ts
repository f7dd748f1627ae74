// ============================================================
// acf-locate — Tree Accessors
// ============================================================
// Typed reads over the three schemas Steam writes:
//   libraryfolders.vdf        { libraryfolders: { "0": { path, apps: {...} } } }
//   appmanifest_<appid>.acf   { AppState: { appid, name, installdir, ... } }
//   loginusers.vdf            { users: { <steamid>: { AccountName, PersonaName } } }

import type {
  AcfBlock,
  AcfNode,
  AcfPlainObject,
  AppManifest,
  LibraryFolder,
  LoginUser,
  Result,
} from '../types/index.js';

export const LIBRARY_ROOT_KEY = 'libraryfolders';
export const MANIFEST_ROOT_KEY = 'AppState';
export const LOGIN_USERS_ROOT_KEY = 'users';

// ──────────────────────────────────────────────────────────
// Node helpers
// ──────────────────────────────────────────────────────────

/** Child block under `key`, or undefined if absent or a leaf */
export function getBlock(block: AcfBlock, key: string): AcfBlock | undefined {
  const node = block.entries.get(key);
  return node?.kind === 'block' ? node : undefined;
}

/** Leaf string under `key`, or undefined if absent or a block */
export function getString(block: AcfBlock, key: string): string | undefined {
  const node = block.entries.get(key);
  return node?.kind === 'leaf' ? node.value : undefined;
}

/** Convert a block to nested plain objects for JSON output */
export function toPlainObject(block: AcfBlock): AcfPlainObject {
  const out: AcfPlainObject = {};
  for (const [key, node] of block.entries) {
    out[key] = nodeToPlain(node);
  }
  return out;
}

function nodeToPlain(node: AcfNode): string | AcfPlainObject {
  return node.kind === 'leaf' ? node.value : toPlainObject(node);
}

function requireRoot(tree: AcfBlock, rootKey: string): Result<AcfBlock> {
  const root = getBlock(tree, rootKey);
  if (!root) {
    return { ok: false, error: { kind: 'schema-mismatch', expectedRootKey: rootKey } };
  }
  return { ok: true, data: root };
}

/** Child blocks in document order, skipping leaf siblings */
function childBlocks(root: AcfBlock): Array<[string, AcfBlock]> {
  const entries: Array<[string, AcfBlock]> = [];
  for (const [key, node] of root.entries) {
    if (node.kind === 'block') entries.push([key, node]);
  }
  return entries;
}

// ──────────────────────────────────────────────────────────
// libraryfolders.vdf
// ──────────────────────────────────────────────────────────

/**
 * App ids installed in each library, keyed by the library's index key.
 */
export function installedAppIds(libraryTree: AcfBlock): Result<Map<string, Set<string>>> {
  const root = requireRoot(libraryTree, LIBRARY_ROOT_KEY);
  if (!root.ok) return root;

  const byLibrary = new Map<string, Set<string>>();
  for (const [libraryKey, entry] of childBlocks(root.data)) {
    const apps = getBlock(entry, 'apps');
    byLibrary.set(libraryKey, new Set<string>(apps ? apps.entries.keys() : []));
  }

  return { ok: true, data: byLibrary };
}

/**
 * The `path` of the first library whose `apps` block lists `appId`.
 */
export function gameBasePath(libraryTree: AcfBlock, appId: string): Result<string> {
  const root = requireRoot(libraryTree, LIBRARY_ROOT_KEY);
  if (!root.ok) return root;

  for (const [, entry] of childBlocks(root.data)) {
    const apps = getBlock(entry, 'apps');
    if (!apps?.entries.has(appId)) continue;

    const path = getString(entry, 'path');
    if (path !== undefined) {
      return { ok: true, data: path };
    }
  }

  return { ok: false, error: { kind: 'not-found', what: 'app', key: appId } };
}

/**
 * Every library folder with a usable path.
 */
export function libraryPaths(libraryTree: AcfBlock): Result<LibraryFolder[]> {
  const root = requireRoot(libraryTree, LIBRARY_ROOT_KEY);
  if (!root.ok) return root;

  const folders: LibraryFolder[] = [];
  for (const [key, entry] of childBlocks(root.data)) {
    const path = getString(entry, 'path');
    if (path === undefined) continue;

    const label = getString(entry, 'label');
    folders.push(label ? { key, path, label } : { key, path });
  }

  return { ok: true, data: folders };
}

// ──────────────────────────────────────────────────────────
// appmanifest_<appid>.acf
// ──────────────────────────────────────────────────────────

export function manifestField(manifestTree: AcfBlock, field: string): Result<string> {
  const root = requireRoot(manifestTree, MANIFEST_ROOT_KEY);
  if (!root.ok) return root;

  const value = getString(root.data, field);
  if (value === undefined) {
    return { ok: false, error: { kind: 'not-found', what: 'field', key: field } };
  }
  return { ok: true, data: value };
}

export function readAppManifest(manifestTree: AcfBlock): Result<AppManifest> {
  const appId = manifestField(manifestTree, 'appid');
  if (!appId.ok) return appId;
  const name = manifestField(manifestTree, 'name');
  if (!name.ok) return name;
  const installDir = manifestField(manifestTree, 'installdir');
  if (!installDir.ok) return installDir;

  return {
    ok: true,
    data: { appId: appId.data, name: name.data, installDir: installDir.data },
  };
}

// ──────────────────────────────────────────────────────────
// loginusers.vdf
// ──────────────────────────────────────────────────────────

function firstUser(loginTree: AcfBlock): Result<[string, AcfBlock]> {
  const root = requireRoot(loginTree, LOGIN_USERS_ROOT_KEY);
  if (!root.ok) return root;

  const [first] = childBlocks(root.data);
  if (!first) {
    return { ok: false, error: { kind: 'not-found', what: 'user' } };
  }
  return { ok: true, data: first };
}

/**
 * A field of the first user record, e.g. "PersonaName".
 */
export function loginUserField(loginTree: AcfBlock, field: string): Result<string> {
  const user = firstUser(loginTree);
  if (!user.ok) return user;

  const value = getString(user.data[1], field);
  if (value === undefined) {
    return { ok: false, error: { kind: 'not-found', what: 'field', key: field } };
  }
  return { ok: true, data: value };
}

export function readLoginUser(loginTree: AcfBlock): Result<LoginUser> {
  const user = firstUser(loginTree);
  if (!user.ok) return user;

  const [steamId, record] = user.data;
  const accountName = getString(record, 'AccountName');
  if (accountName === undefined) {
    return { ok: false, error: { kind: 'not-found', what: 'field', key: 'AccountName' } };
  }

  return {
    ok: true,
    data: {
      steamId,
      accountName,
      personaName: getString(record, 'PersonaName') ?? accountName,
    },
  };
}
