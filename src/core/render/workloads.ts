/**
 * Game server and file manager Deployments
 */

import type { V1Container, V1Deployment, V1EnvVar, V1PodSecurityContext } from '@kubernetes/client-node';
import { deployment } from '../../factories/kubernetes/index.js';
import type { Configuration, KubernetesManifest } from '../types/index.js';
import { normalizePortName } from '../../utils/index.js';
import {
  containerEnv,
  FILE_MANAGER_PASSWORD_KEY,
  FILE_MANAGER_USERNAME_KEY,
  resourcesBlock,
  restrictedSecurityContext,
} from './environment.js';
import { renderWaitForInstallContainer } from './installer.js';
import { labels, resourceNames, selectorLabels } from './names.js';

export const APP_CONTAINER_NAME = 'app';
export const FILE_MANAGER_CONTAINER_NAME = 'file-manager';
export const DATA_VOLUME = 'data';
export const FILE_MANAGER_CONFIG_VOLUME = 'config';
export const FILE_MANAGER_ROOT = '/data';
export const FILE_MANAGER_STATE_DIR = '/config';
export const FILE_MANAGER_PORT_NAME = normalizePortName('file-ui');
const FILE_MANAGER_UID = 1000;

export function renderDeployment(config: Configuration): KubernetesManifest<V1Deployment> {
  const podLabels = labels(config.appName, 'game');
  const resources = resourcesBlock(config);

  const container: V1Container = {
    name: APP_CONTAINER_NAME,
    image: config.image,
    volumeMounts: [{ name: DATA_VOLUME, mountPath: config.pvc.mountPath }],
    securityContext: restrictedSecurityContext(),
    ...(config.ports.length > 0 && {
      ports: config.ports.map((port) => ({
        containerPort: port.containerPort,
        protocol: port.protocol,
        name: port.name,
      })),
    }),
    ...(resources && { resources }),
    ...containerEnv(config),
  };

  return deployment({
    metadata: {
      name: resourceNames.app(config),
      namespace: config.namespace,
      labels: podLabels,
    },
    spec: {
      replicas: 1,
      selector: { matchLabels: selectorLabels(config.appName, 'game') },
      template: {
        metadata: { labels: podLabels },
        spec: {
          securityContext: { seccompProfile: { type: 'RuntimeDefault' } },
          ...(config.install && {
            initContainers: [renderWaitForInstallContainer(config.install.versionHash)],
          }),
          containers: [container],
          volumes: [{ name: DATA_VOLUME, persistentVolumeClaim: { claimName: config.pvc.name } }],
        },
      },
    },
  });
}

function fileManagerEnv(config: Configuration): V1EnvVar[] {
  const secretName = resourceNames.secret(config);
  return [
    {
      name: FILE_MANAGER_USERNAME_KEY,
      valueFrom: { secretKeyRef: { name: secretName, key: FILE_MANAGER_USERNAME_KEY } },
    },
    {
      name: FILE_MANAGER_PASSWORD_KEY,
      valueFrom: { secretKeyRef: { name: secretName, key: FILE_MANAGER_PASSWORD_KEY } },
    },
    { name: 'FB_ROOT', value: FILE_MANAGER_ROOT },
    { name: 'FB_ADDRESS', value: '0.0.0.0' },
    { name: 'FB_PORT', value: String(config.fileManager.port) },
    { name: 'FB_DATABASE', value: `${FILE_MANAGER_STATE_DIR}/filebrowser.db` },
  ];
}

/**
 * File browser sidecar sharing the game data volume
 */
export function renderFileManagerDeployment(config: Configuration): KubernetesManifest<V1Deployment> {
  const podLabels = labels(config.appName, 'file-manager');
  const podSecurityContext: V1PodSecurityContext = {
    seccompProfile: { type: 'RuntimeDefault' },
    runAsNonRoot: true,
    runAsUser: FILE_MANAGER_UID,
    runAsGroup: FILE_MANAGER_UID,
    fsGroup: FILE_MANAGER_UID,
  };

  return deployment({
    metadata: {
      name: resourceNames.fileManager(config),
      namespace: config.namespace,
      labels: podLabels,
    },
    spec: {
      replicas: 1,
      selector: { matchLabels: selectorLabels(config.appName, 'file-manager') },
      template: {
        metadata: { labels: podLabels },
        spec: {
          securityContext: podSecurityContext,
          containers: [
            {
              name: FILE_MANAGER_CONTAINER_NAME,
              image: config.fileManager.image,
              env: fileManagerEnv(config),
              ports: [
                {
                  containerPort: config.fileManager.port,
                  protocol: 'TCP',
                  name: FILE_MANAGER_PORT_NAME,
                },
              ],
              volumeMounts: [
                { name: DATA_VOLUME, mountPath: FILE_MANAGER_ROOT },
                { name: FILE_MANAGER_CONFIG_VOLUME, mountPath: FILE_MANAGER_STATE_DIR },
              ],
              securityContext: restrictedSecurityContext({ runAsNonRoot: true }),
            },
          ],
          volumes: [
            { name: DATA_VOLUME, persistentVolumeClaim: { claimName: config.pvc.name } },
            {
              name: FILE_MANAGER_CONFIG_VOLUME,
              persistentVolumeClaim: { claimName: resourceNames.fileManagerConfig(config) },
            },
          ],
        },
      },
    },
  });
}
