/**
 * YAML output for manifests
 */

import * as yaml from 'js-yaml';
import type { SerializationOptions } from './types.js';

/**
 * Dump one document. Keys keep insertion order, so the same input always
 * produces the same bytes.
 */
export function toYaml(document: unknown, options?: SerializationOptions): string {
  return yaml.dump(document, {
    indent: options?.indent ?? 2,
    lineWidth: options?.lineWidth ?? -1,
    noRefs: options?.noRefs ?? true,
    sortKeys: false,
    quotingType: '"',
    forceQuotes: false,
  });
}

/**
 * Parse YAML written by `toYaml`; used to read back bundles
 */
export function fromYaml(text: string): unknown {
  return yaml.load(text);
}
