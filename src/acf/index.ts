// ============================================================
// acf-locate — ACF/VDF Module Exports
// ============================================================

export { tokenize } from './tokenizer.js';
export { parseAcf, parseFragments, DEFAULT_MAX_DEPTH, DEFAULT_MAX_FRAGMENTS } from './parser.js';
export type { ParseOptions } from './parser.js';
export {
  getBlock,
  getString,
  toPlainObject,
  installedAppIds,
  gameBasePath,
  libraryPaths,
  manifestField,
  readAppManifest,
  loginUserField,
  readLoginUser,
} from './accessors.js';
export { formatError, isAbsence } from './errors.js';
