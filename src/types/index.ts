// ============================================================
// acf-locate — Type Definitions
// ============================================================

// ──────────────────────────────────────────────────────────
// Parsed tree
// ──────────────────────────────────────────────────────────

/** A terminal string value */
export interface AcfLeaf {
  readonly kind: 'leaf';
  readonly value: string;
}

/** A `{ ... }` group, or the document root */
export interface AcfBlock {
  readonly kind: 'block';
  readonly entries: ReadonlyMap<string, AcfNode>;
}

export type AcfNode = AcfLeaf | AcfBlock;

/** Plain-object view of a block, used for JSON output */
export interface AcfPlainObject {
  [key: string]: string | AcfPlainObject;
}

// ──────────────────────────────────────────────────────────
// Errors
// ──────────────────────────────────────────────────────────

/** Grammar violation while parsing */
export interface MalformedDocument {
  kind: 'malformed-document';
  /** Index of the offending fragment in the whole document */
  position: number;
  expected: string;
  found: string;
  /** File the text was read from, when known */
  source?: string;
}

/** Well-formed tree with the wrong root for the accessor */
export interface SchemaMismatch {
  kind: 'schema-mismatch';
  expectedRootKey: string;
}

export type NotFoundSubject =
  | 'app'
  | 'field'
  | 'user'
  | 'game'
  | 'file'
  | 'client'
  | 'appdata';

export interface NotFound {
  kind: 'not-found';
  what: NotFoundSubject;
  key?: string;
}

export interface IoError {
  kind: 'io-error';
  path: string;
  message: string;
}

export interface Unsupported {
  kind: 'unsupported';
  platform: string;
}

export type AcfError =
  | MalformedDocument
  | SchemaMismatch
  | NotFound
  | IoError
  | Unsupported;

/**
 * Every fallible operation returns a discriminated union:
 *   { ok: true, data: T } | { ok: false, error: E }
 */
export type Result<T, E = AcfError> =
  | { ok: true; data: T }
  | { ok: false; error: E };

// ──────────────────────────────────────────────────────────
// Schema records
// ──────────────────────────────────────────────────────────

/** One entry of libraryfolders.vdf */
export interface LibraryFolder {
  /** Index key of the entry ("0", "1", ...) */
  key: string;
  path: string;
  label?: string;
}

/** The fields of appmanifest_<appid>.acf that callers use */
export interface AppManifest {
  appId: string;
  name: string;
  installDir: string;
}

/** First record of loginusers.vdf */
export interface LoginUser {
  steamId: string;
  accountName: string;
  personaName: string;
}

// ──────────────────────────────────────────────────────────
// Discovery
// ──────────────────────────────────────────────────────────

export type SupportedPlatform = 'darwin' | 'win32' | 'linux';

/** Reads a string value from the Windows registry, or null if absent */
export type RegistryReader = (key: string, value: string) => Promise<string | null>;

/** Everything discovery needs to know about the machine it runs on */
export interface DiscoveryContext {
  /** Explicit client install path; skips OS lookup when set */
  steamPath?: string;
  platform: string;
  home: string;
  env: NodeJS.ProcessEnv;
  readRegistry: RegistryReader;
}

export interface InstalledGamesResult {
  /** Game name → app id */
  games: Map<string, string>;
  librariesChecked: number;
  manifestsRead: number;
  errors: Array<{ path: string; error: string }>;
}

/** CLI options shared by every command */
export type GlobalOptions = {
  steamPath?: string;
  json?: boolean;
  verbose?: boolean;
};
