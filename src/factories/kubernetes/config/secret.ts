import type { V1Secret } from '@kubernetes/client-node';
import type { KubernetesManifest, ResourceInput } from '../types.js';

/**
 * Secret with plain-text `stringData`. The values stay readable in the
 * rendered YAML so the file can be encrypted with SOPS before committing.
 */
export function secret(resource: ResourceInput<V1Secret>): KubernetesManifest<V1Secret> {
  return {
    apiVersion: 'v1',
    kind: 'Secret',
    ...resource,
  };
}
