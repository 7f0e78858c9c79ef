/**
 * Kubernetes Factory Type Definitions
 */

import type { V1ObjectMeta } from '@kubernetes/client-node';

export type NamedMetadata = V1ObjectMeta & { name: string };

/**
 * Factory input: the model type minus the fields the factory stamps itself
 */
export type ResourceInput<T> = Omit<T, 'apiVersion' | 'kind' | 'metadata'> & {
  metadata: NamedMetadata;
};

export type { KubernetesManifest } from '../../core/types/index.js';
