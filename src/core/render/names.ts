/**
 * Resource names, filenames and labels
 *
 * Every name in the manifest set derives from the app name (and, for the
 * installer, the script version hash), so documents can reference each other
 * without a lookup table.
 */

import { VERSION_HASH_LENGTH } from '../installer/version.js';
import type { Configuration } from '../types/index.js';
import { MAX_RESOURCE_NAME_LENGTH } from '../../utils/index.js';

export const MANAGED_BY = 'kubeegg';

export const LABEL_NAME = 'app.kubernetes.io/name';
export const LABEL_MANAGED_BY = 'app.kubernetes.io/managed-by';
export const LABEL_COMPONENT = 'app.kubernetes.io/component';

export type Component = 'game' | 'file-manager' | 'installer';

export const MANIFEST_FILES = {
  namespace: 'namespace.yaml',
  pvc: 'pvc.yaml',
  fileManagerConfigPvc: 'fm-config-pvc.yaml',
  configMap: 'configmap.yaml',
  secret: 'secret.yaml',
  sopsSecret: 'secrets.sops.yaml',
  installerConfigMap: 'installer-configmap.yaml',
  installerJob: 'installer-job.yaml',
  deployment: 'deployment.yaml',
  fileManagerDeployment: 'ftp-deployment.yaml',
  service: 'service.yaml',
  fileManagerService: 'ftp-service.yaml',
  kustomization: 'kustomization.yaml',
} as const;

const INSTALLER_INFIX = '-installer-';

/** Longest app name whose derived names (the installer's is longest) stay valid */
export const MAX_APP_NAME_LENGTH =
  MAX_RESOURCE_NAME_LENGTH - INSTALLER_INFIX.length - VERSION_HASH_LENGTH;

export const resourceNames = {
  app: (config: Configuration): string => config.appName,
  configMap: (config: Configuration): string => `${config.appName}-config`,
  secret: (config: Configuration): string => `${config.appName}-secret`,
  fileManager: (config: Configuration): string => `${config.appName}-ftp`,
  fileManagerConfig: (config: Configuration): string => `${config.appName}-fm-config`,
  installer: (config: Configuration, hash: string): string => `${config.appName}${INSTALLER_INFIX}${hash}`,
};

/**
 * The two labels stamped on every resource and on the kustomization
 */
export function ownershipLabels(appName: string): Record<string, string> {
  return {
    [LABEL_NAME]: appName,
    [LABEL_MANAGED_BY]: MANAGED_BY,
  };
}

export function labels(appName: string, component?: Component): Record<string, string> {
  return {
    ...ownershipLabels(appName),
    ...(component && { [LABEL_COMPONENT]: component }),
  };
}

export function selectorLabels(appName: string, component: Component): Record<string, string> {
  return {
    [LABEL_NAME]: appName,
    [LABEL_COMPONENT]: component,
  };
}
