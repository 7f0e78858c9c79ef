/**
 * Kubernetes resource factories
 *
 * Each factory stamps `apiVersion` and `kind` onto a typed model from
 * `@kubernetes/client-node`, keeping them first in the rendered document.
 */

export { configMap } from './config/config-map.js';
export { secret } from './config/secret.js';
export { namespace } from './core/namespace.js';
export { service } from './networking/service.js';
export { persistentVolumeClaim } from './storage/persistent-volume-claim.js';
export type { KubernetesManifest, ResourceInput } from './types.js';
export { deployment } from './workloads/deployment.js';
export { job } from './workloads/job.js';
