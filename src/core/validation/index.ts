export { createConfiguration, validateConfiguration } from './configuration.js';
export { fail, ok, type ValidationResult } from './result.js';
export { configurationSchema } from './schema.js';
export {
  DEFAULT_PVC_SIZE,
  isValidQuantity,
  normalizeCpu,
  normalizeMemory,
  normalizePvcSize,
  QUANTITY_PATTERN,
  validateEnvKey,
  validateImage,
  validatePort,
  validateProtocol,
  validateRequiredValue,
  validateResourceName,
} from './validators.js';
