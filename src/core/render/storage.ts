import type { V1Namespace, V1PersistentVolumeClaim } from '@kubernetes/client-node';
import { namespace, persistentVolumeClaim } from '../../factories/kubernetes/index.js';
import type { Configuration, KubernetesManifest } from '../types/index.js';
import { labels, resourceNames } from './names.js';

export const FILE_MANAGER_CONFIG_SIZE = '1Gi';

export function renderNamespace(config: Configuration): KubernetesManifest<V1Namespace> {
  return namespace({
    metadata: {
      name: config.namespace,
      labels: labels(config.appName),
    },
  });
}

export function renderPvc(config: Configuration): KubernetesManifest<V1PersistentVolumeClaim> {
  return persistentVolumeClaim({
    metadata: {
      name: config.pvc.name,
      namespace: config.namespace,
      labels: labels(config.appName),
    },
    spec: {
      accessModes: [...config.pvc.accessModes],
      resources: { requests: { storage: config.pvc.size } },
      ...(config.pvc.storageClassName && { storageClassName: config.pvc.storageClassName }),
    },
  });
}

/**
 * Small dedicated claim for the file manager's own database
 */
export function renderFileManagerConfigPvc(
  config: Configuration
): KubernetesManifest<V1PersistentVolumeClaim> {
  return persistentVolumeClaim({
    metadata: {
      name: resourceNames.fileManagerConfig(config),
      namespace: config.namespace,
      labels: labels(config.appName, 'file-manager'),
    },
    spec: {
      accessModes: ['ReadWriteOnce'],
      resources: { requests: { storage: FILE_MANAGER_CONFIG_SIZE } },
      ...(config.pvc.storageClassName && { storageClassName: config.pvc.storageClassName }),
    },
  });
}
