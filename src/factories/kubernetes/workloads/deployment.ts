import type { V1Deployment } from '@kubernetes/client-node';
import type { KubernetesManifest, ResourceInput } from '../types.js';

export function deployment(resource: ResourceInput<V1Deployment>): KubernetesManifest<V1Deployment> {
  return {
    apiVersion: 'apps/v1',
    kind: 'Deployment',
    ...resource,
  };
}
