import type { V1ConfigMap, V1Secret } from '@kubernetes/client-node';
import { configMap, secret } from '../../factories/kubernetes/index.js';
import type { Configuration, KubernetesManifest } from '../types/index.js';
import { labels, resourceNames } from './names.js';

export function renderConfigMap(
  config: Configuration,
  data: Record<string, string>
): KubernetesManifest<V1ConfigMap> {
  return configMap({
    metadata: {
      name: resourceNames.configMap(config),
      namespace: config.namespace,
      labels: labels(config.appName),
    },
    data,
  });
}

export function renderSecret(
  config: Configuration,
  stringData: Record<string, string>
): KubernetesManifest<V1Secret> {
  return secret({
    metadata: {
      name: resourceNames.secret(config),
      namespace: config.namespace,
      labels: labels(config.appName),
    },
    type: 'Opaque',
    stringData,
  });
}
