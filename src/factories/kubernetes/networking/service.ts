import type { V1Service } from '@kubernetes/client-node';
import type { KubernetesManifest, ResourceInput } from '../types.js';

export function service(resource: ResourceInput<V1Service>): KubernetesManifest<V1Service> {
  return {
    apiVersion: 'v1',
    kind: 'Service',
    ...resource,
  };
}
