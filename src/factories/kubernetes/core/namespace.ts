import type { V1Namespace } from '@kubernetes/client-node';
import type { KubernetesManifest, ResourceInput } from '../types.js';

export function namespace(resource: ResourceInput<V1Namespace>): KubernetesManifest<V1Namespace> {
  return {
    apiVersion: 'v1',
    kind: 'Namespace',
    ...resource,
  };
}
