/**
 * Modpack download and installation.
 *
 * @module download
 */

export {
  CurseForgeClient,
  CurseForgeApiError,
  DistributionBlockedError,
  selectLatestFile,
  CURSEFORGE_API_BASE,
  MINECRAFT_GAME_ID,
  MODPACK_CLASS_ID,
  type CurseForgeClientOptions,
  type CurseForgeFile,
  type CurseForgeMod,
  type UpdateCheck,
} from './curseforge.js';

export {
  installModpack,
  readManifest,
  isSafeRelative,
  type InstallOptions,
  type InstallResult,
} from './installer.js';
