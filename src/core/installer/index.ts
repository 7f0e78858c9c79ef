export {
  createInstallConfig,
  DEFAULT_INSTALL_SHELL,
  INSTALL_DATA_PATH,
  INSTALL_SCRIPT_DIR,
  INSTALL_SCRIPT_NAME,
  INSTALL_SCRIPT_PATH,
  type InstallInput,
  installMarkerPath,
  wrapInstallScript,
} from './script.js';
export { VERSION_HASH_LENGTH, versionHash } from './version.js';
