export { renderConfigMap, renderSecret } from './config.js';
export {
  configMapData,
  containerEnv,
  FILE_MANAGER_PASSWORD_KEY,
  FILE_MANAGER_USERNAME_KEY,
  RESERVED_ENV_KEYS,
  resolveStartupCommand,
  resourcesBlock,
  secretData,
  splitEnv,
  STARTUP_KEY,
} from './environment.js';
export {
  INSTALLER_BACKOFF_LIMIT,
  renderInstallerConfigMap,
  renderInstallerJob,
  renderWaitForInstallContainer,
  WAIT_FOR_INSTALL_CONTAINER_NAME,
  WAIT_FOR_INSTALL_IMAGE,
} from './installer.js';
export {
  labels,
  MANAGED_BY,
  MANIFEST_FILES,
  MAX_APP_NAME_LENGTH,
  ownershipLabels,
  resourceNames,
  selectorLabels,
} from './names.js';
export { renderFileManagerService, renderService } from './networking.js';
export { findManifest, renderAll, renderKustomization } from './render-all.js';
export { renderFileManagerConfigPvc, renderNamespace, renderPvc } from './storage.js';
export { renderDeployment, renderFileManagerDeployment } from './workloads.js';
