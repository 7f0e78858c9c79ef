import type { V1PersistentVolumeClaim } from '@kubernetes/client-node';
import type { KubernetesManifest, ResourceInput } from '../types.js';

export function persistentVolumeClaim(
  resource: ResourceInput<V1PersistentVolumeClaim>
): KubernetesManifest<V1PersistentVolumeClaim> {
  return {
    apiVersion: 'v1',
    kind: 'PersistentVolumeClaim',
    ...resource,
  };
}
