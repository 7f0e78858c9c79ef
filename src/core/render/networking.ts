import type { V1Service } from '@kubernetes/client-node';
import { service } from '../../factories/kubernetes/index.js';
import type { Configuration, KubernetesManifest } from '../types/index.js';
import { labels, resourceNames, selectorLabels } from './names.js';
import { FILE_MANAGER_PORT_NAME } from './workloads.js';

export function renderService(config: Configuration): KubernetesManifest<V1Service> {
  return service({
    metadata: {
      name: resourceNames.app(config),
      namespace: config.namespace,
      labels: labels(config.appName, 'game'),
    },
    spec: {
      type: 'ClusterIP',
      selector: selectorLabels(config.appName, 'game'),
      ports: config.ports.map((port) => ({
        name: port.name,
        port: port.containerPort,
        targetPort: port.containerPort,
        protocol: port.protocol,
      })),
    },
  });
}

export function renderFileManagerService(config: Configuration): KubernetesManifest<V1Service> {
  return service({
    metadata: {
      name: resourceNames.fileManager(config),
      namespace: config.namespace,
      labels: labels(config.appName, 'file-manager'),
    },
    spec: {
      type: 'ClusterIP',
      selector: selectorLabels(config.appName, 'file-manager'),
      ports: [
        {
          name: FILE_MANAGER_PORT_NAME,
          port: config.fileManager.port,
          targetPort: config.fileManager.port,
          protocol: 'TCP',
        },
      ],
    },
  });
}
