import type { V1Job } from '@kubernetes/client-node';
import type { KubernetesManifest, ResourceInput } from '../types.js';

export function job(resource: ResourceInput<V1Job>): KubernetesManifest<V1Job> {
  return {
    apiVersion: 'batch/v1',
    kind: 'Job',
    ...resource,
  };
}
