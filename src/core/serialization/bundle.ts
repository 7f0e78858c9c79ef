/**
 * Bundle assembly: the manifest set plus its kustomization, serialized
 */

import { MANIFEST_FILES, renderAll, renderKustomization } from '../render/index.js';
import type { Configuration, RenderedFile } from '../types/index.js';
import type { BundleOptions } from './types.js';
import { toYaml } from './yaml.js';

export function secretFilenameFor(options?: BundleOptions): string {
  return options?.sops ? MANIFEST_FILES.sopsSecret : MANIFEST_FILES.secret;
}

/**
 * Render and serialize everything the CLI writes. The kustomization comes
 * first and lists the remaining files in order.
 */
export function renderBundle(config: Configuration, options?: BundleOptions): RenderedFile[] {
  const manifests = renderAll(config, secretFilenameFor(options));
  const filenames = manifests.map((entry) => entry.filename);

  return [
    {
      filename: MANIFEST_FILES.kustomization,
      content: toYaml(renderKustomization(config, filenames), options),
    },
    ...manifests.map((entry) => ({
      filename: entry.filename,
      content: toYaml(entry.manifest, options),
    })),
  ];
}
