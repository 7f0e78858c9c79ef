/**
 * Environment and container-level helpers shared by the game Deployment and
 * the installer Job.
 */

import type {
  V1Container,
  V1EnvFromSource,
  V1EnvVar,
  V1ResourceRequirements,
  V1SecurityContext,
} from '@kubernetes/client-node';
import type { Configuration, EnvSelection } from '../types/index.js';
import { memoryQuantityToMB, SERVER_MEMORY_TOKEN } from '../../utils/index.js';
import { resourceNames } from './names.js';

export const STARTUP_KEY = 'STARTUP';
export const FILE_MANAGER_USERNAME_KEY = 'FB_USERNAME';
export const FILE_MANAGER_PASSWORD_KEY = 'FB_PASSWORD';

/** Keys the renderer writes itself; operator env entries may not use them */
export const RESERVED_ENV_KEYS: ReadonlySet<string> = new Set([
  STARTUP_KEY,
  FILE_MANAGER_USERNAME_KEY,
  FILE_MANAGER_PASSWORD_KEY,
]);

export interface EnvSplit {
  /** Non-sensitive values, destined for the ConfigMap */
  plain: Record<string, string>;
  /** Sensitive values, destined for the Secret */
  sensitive: Record<string, string>;
}

export function splitEnv(env: readonly EnvSelection[]): EnvSplit {
  const split: EnvSplit = { plain: {}, sensitive: {} };
  for (const item of env) {
    (item.sensitive ? split.sensitive : split.plain)[item.key] = item.value;
  }
  return split;
}

/**
 * Startup command with `{{SERVER_MEMORY}}` replaced by the memory limit in MB,
 * when a limit is set and converts to a positive number.
 */
export function resolveStartupCommand(config: Configuration): string | undefined {
  const startup = config.startupCommand;
  if (!startup) {
    return undefined;
  }
  const limit = config.resources?.limitsMemory;
  if (!limit || !startup.includes(SERVER_MEMORY_TOKEN)) {
    return startup;
  }
  const megabytes = memoryQuantityToMB(limit);
  return megabytes ? startup.split(SERVER_MEMORY_TOKEN).join(String(megabytes)) : startup;
}

/**
 * ConfigMap data: non-sensitive env followed by `STARTUP`
 */
export function configMapData(config: Configuration): Record<string, string> {
  const data = { ...splitEnv(config.env).plain };
  const startup = resolveStartupCommand(config);
  if (startup !== undefined) {
    data[STARTUP_KEY] = startup;
  }
  return data;
}

/**
 * Secret data: file-manager credentials followed by sensitive env
 */
export function secretData(config: Configuration): Record<string, string> {
  return {
    [FILE_MANAGER_USERNAME_KEY]: config.fileManager.username,
    [FILE_MANAGER_PASSWORD_KEY]: config.fileManager.credential,
    ...splitEnv(config.env).sensitive,
  };
}

export function resourcesBlock(config: Configuration): V1ResourceRequirements | undefined {
  const values = config.resources;
  if (!values) {
    return undefined;
  }

  const requests: Record<string, string> = {
    ...(values.requestsCpu && { cpu: values.requestsCpu }),
    ...(values.requestsMemory && { memory: values.requestsMemory }),
  };
  const limits: Record<string, string> = {
    ...(values.limitsCpu && { cpu: values.limitsCpu }),
    ...(values.limitsMemory && { memory: values.limitsMemory }),
  };
  const hasRequests = Object.keys(requests).length > 0;
  const hasLimits = Object.keys(limits).length > 0;
  if (!hasRequests && !hasLimits) {
    return undefined;
  }
  return {
    ...(hasRequests && { requests }),
    ...(hasLimits && { limits }),
  };
}

/**
 * How a container receives the app's environment.
 *
 * Sensitive values are referenced key by key instead of through a bulk
 * `secretRef`, so the file-manager credentials in the same Secret never leak
 * into the game process.
 */
export function containerEnv(
  config: Configuration
): Pick<V1Container, 'env' | 'envFrom'> {
  const env: V1EnvVar[] = Object.keys(splitEnv(config.env).sensitive).map((key) => ({
    name: key,
    valueFrom: { secretKeyRef: { name: resourceNames.secret(config), key } },
  }));
  const envFrom: V1EnvFromSource[] =
    Object.keys(configMapData(config)).length > 0
      ? [{ configMapRef: { name: resourceNames.configMap(config) } }]
      : [];

  return {
    ...(env.length > 0 && { env }),
    ...(envFrom.length > 0 && { envFrom }),
  };
}

export function restrictedSecurityContext(extra?: V1SecurityContext): V1SecurityContext {
  return {
    allowPrivilegeEscalation: false,
    capabilities: { drop: ['ALL'] },
    ...extra,
  };
}
