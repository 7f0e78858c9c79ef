/**
 * Utilities Module
 *
 * Pure helpers shared by the parser, the renderer and the configurator.
 */

export {
  ENV_VAR_PATTERN,
  isValidEnvVar,
  isValidResourceName,
  MAX_RESOURCE_NAME_LENGTH,
  normalizeEnvVar,
  normalizePortName,
  normalizeResourceName,
  RESOURCE_NAME_PATTERN,
} from './normalize.js';
export { isValidPort, MAX_PORT, MIN_PORT, parsePortList, sortPorts } from './ports.js';
export { memoryQuantityToMB } from './quantity.js';
export { extractStartupVars, SERVER_MEMORY_TOKEN, STARTUP_BUILTIN_VARS } from './startup.js';
export { generatePassword } from './strings.js';
export {
  hasOwn,
  isJsonObject,
  isNonEmptyString,
  isScalar,
  type JsonObject,
} from './type-guards.js';
