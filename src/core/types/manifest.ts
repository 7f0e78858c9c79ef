/**
 * Rendered manifest types
 */

import type { KubernetesObject, V1ObjectMeta } from '@kubernetes/client-node';

/**
 * A Kubernetes object with the fields every rendered document carries
 */
export type KubernetesManifest<T extends KubernetesObject = KubernetesObject> = T & {
  apiVersion: string;
  kind: string;
  metadata: V1ObjectMeta & { name: string };
};

export interface RenderedManifest {
  readonly filename: string;
  readonly manifest: KubernetesManifest;
}

/**
 * Manifests in emission order; the order is part of the output contract
 */
export type ManifestSet = readonly RenderedManifest[];

export interface KustomizationDocument {
  apiVersion: 'kustomize.config.k8s.io/v1beta1';
  kind: 'Kustomization';
  resources: string[];
  labels: Array<{ pairs: Record<string, string> }>;
}

export interface RenderedFile {
  readonly filename: string;
  readonly content: string;
}
