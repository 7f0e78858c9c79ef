import type { V1ConfigMap } from '@kubernetes/client-node';
import type { KubernetesManifest, ResourceInput } from '../types.js';

// ConfigMaps have no spec: data sits at the root of the object.
export function configMap(resource: ResourceInput<V1ConfigMap>): KubernetesManifest<V1ConfigMap> {
  return {
    apiVersion: 'v1',
    kind: 'ConfigMap',
    ...resource,
  };
}
