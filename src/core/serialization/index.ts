export { renderBundle, secretFilenameFor } from './bundle.js';
export type { BundleOptions, SerializationOptions } from './types.js';
export { fromYaml, toYaml } from './yaml.js';
