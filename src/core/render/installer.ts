/**
 * Installer Job and its guard
 *
 * The Job and its script ConfigMap are named after the script's version hash.
 * An unchanged script renders identical names, so re-applying is a no-op; a
 * changed script renders a new Job that runs once against the existing data.
 * The game Deployment waits on the same per-version marker file.
 */

import type { V1ConfigMap, V1Container, V1Job } from '@kubernetes/client-node';
import { configMap, job } from '../../factories/kubernetes/index.js';
import {
  DEFAULT_INSTALL_SHELL,
  INSTALL_DATA_PATH,
  INSTALL_SCRIPT_DIR,
  INSTALL_SCRIPT_NAME,
  INSTALL_SCRIPT_PATH,
  installMarkerPath,
  wrapInstallScript,
} from '../installer/index.js';
import type { Configuration, InstallConfig, KubernetesManifest } from '../types/index.js';
import { containerEnv, restrictedSecurityContext } from './environment.js';
import { labels, resourceNames } from './names.js';

export const INSTALLER_BACKOFF_LIMIT = 3;
export const INSTALLER_CONTAINER_NAME = 'installer';
export const INSTALLER_SCRIPT_VOLUME = 'installer';
export const WAIT_FOR_INSTALL_CONTAINER_NAME = 'wait-for-install';
export const WAIT_FOR_INSTALL_IMAGE = 'busybox:1.36';
const SCRIPT_FILE_MODE = 0o755;

export function renderInstallerConfigMap(
  config: Configuration,
  install: InstallConfig
): KubernetesManifest<V1ConfigMap> {
  return configMap({
    metadata: {
      name: resourceNames.installer(config, install.versionHash),
      namespace: config.namespace,
      labels: labels(config.appName, 'installer'),
    },
    data: {
      [INSTALL_SCRIPT_NAME]: wrapInstallScript(install.script, install.versionHash),
    },
  });
}

export function renderInstallerJob(
  config: Configuration,
  install: InstallConfig
): KubernetesManifest<V1Job> {
  const name = resourceNames.installer(config, install.versionHash);
  const podLabels = labels(config.appName, 'installer');

  return job({
    metadata: {
      name,
      namespace: config.namespace,
      labels: podLabels,
    },
    spec: {
      backoffLimit: INSTALLER_BACKOFF_LIMIT,
      template: {
        metadata: { labels: podLabels },
        spec: {
          restartPolicy: 'OnFailure',
          securityContext: { seccompProfile: { type: 'RuntimeDefault' } },
          containers: [
            {
              name: INSTALLER_CONTAINER_NAME,
              image: install.image,
              command: [install.entrypoint ?? DEFAULT_INSTALL_SHELL, INSTALL_SCRIPT_PATH],
              ...containerEnv(config),
              volumeMounts: [
                { name: 'data', mountPath: INSTALL_DATA_PATH },
                { name: INSTALLER_SCRIPT_VOLUME, mountPath: INSTALL_SCRIPT_DIR },
              ],
              securityContext: restrictedSecurityContext(),
            },
          ],
          volumes: [
            { name: 'data', persistentVolumeClaim: { claimName: config.pvc.name } },
            {
              name: INSTALLER_SCRIPT_VOLUME,
              configMap: { name, defaultMode: SCRIPT_FILE_MODE },
            },
          ],
        },
      },
    },
  });
}

/**
 * Init container that blocks the game container until the installer Job for
 * this script version has written its marker.
 */
export function renderWaitForInstallContainer(hash: string): V1Container {
  const marker = installMarkerPath(hash);
  return {
    name: WAIT_FOR_INSTALL_CONTAINER_NAME,
    image: WAIT_FOR_INSTALL_IMAGE,
    command: [
      'sh',
      '-c',
      `until [ -f ${marker} ]; do echo "Waiting for installer ${hash}"; sleep 5; done`,
    ],
    volumeMounts: [{ name: 'data', mountPath: INSTALL_DATA_PATH }],
    securityContext: restrictedSecurityContext(),
  };
}
