/**
 * kubeegg - turn panel game-server eggs into Kubernetes manifests.
 */

// =============================================================================
// EGG PARSING
// =============================================================================
export { descriptorToJson, EGG_FIELD_KEYS, parseEgg, VARIABLE_FIELD_KEYS } from './core/egg/index.js';
export { type EggSource, githubBlobToRaw, isUrl, type LoadEggOptions, loadEggJson } from './core/source/index.js';

// =============================================================================
// CONFIGURATION
// =============================================================================
export {
  configure,
  type ConfigureOptions,
  askValid,
  isSensitiveDefault,
  missingStartupVars,
  portsFromEnv,
  type Prompter,
  ReadlinePrompter,
} from './core/configure/index.js';
export {
  createConfiguration,
  normalizeCpu,
  normalizeMemory,
  normalizePvcSize,
  validateConfiguration,
  validateImage,
  validatePort,
  validateProtocol,
  validateResourceName,
  type ValidationResult,
} from './core/validation/index.js';
export { DEFAULT_RUNTIME_SETTINGS, getRuntimeSettings, type RuntimeSettings } from './core/config/index.js';

// =============================================================================
// RENDERING
// =============================================================================
export { createInstallConfig, installMarkerPath, versionHash, wrapInstallScript } from './core/installer/index.js';
export { findManifest, MANIFEST_FILES, renderAll, renderKustomization } from './core/render/index.js';
export { renderBundle, toYaml } from './core/serialization/index.js';

// =============================================================================
// ERRORS AND LOGGING
// =============================================================================
export {
  FetchError,
  FormatError,
  formatErrorForDisplay,
  isKubeEggError,
  KubeEggError,
  OutputError,
  ValidationError,
  type ValidationProblem,
} from './core/errors.js';
export { createLogger, getComponentLogger, type KubeEggLogger } from './core/logging/index.js';

// =============================================================================
// TYPES AND UTILITIES
// =============================================================================
export type * from './core/types/index.js';
export {
  extractStartupVars,
  memoryQuantityToMB,
  normalizeEnvVar,
  normalizePortName,
  normalizeResourceName,
  parsePortList,
} from './utils/index.js';
