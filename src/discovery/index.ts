// ============================================================
// acf-locate — Discovery Exports
// ============================================================
// Finds the Steam client on the user's machine and answers
// questions about installed games. Supports macOS, Windows, Linux.

export { resolveClientPath, candidateClientPaths } from './client-path.js';
export {
  libraryFoldersPath,
  manifestPath,
  loginUsersPath,
  loadLibraryFolders,
  getAllInstalledGames,
  getAppIdByName,
  locateApp,
  getGameInstallPath,
  getPersonaName,
  getAccountName,
} from './library.js';
export { getGameAppDataPath, appDataCandidates } from './appdata.js';
export { createDiscoveryContext, readAcfFile, queryRegistry } from './utils.js';
