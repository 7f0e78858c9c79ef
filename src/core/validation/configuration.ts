import { type } from 'arktype';
import { formatArktypeErrors, ValidationError, type ValidationProblem } from '../errors.js';
import { versionHash } from '../installer/version.js';
import { RESERVED_ENV_KEYS } from '../render/environment.js';
import { MAX_APP_NAME_LENGTH } from '../render/names.js';
import type { Configuration } from '../types/index.js';
import { isValidEnvVar, isValidResourceName } from '../../utils/index.js';
import { getComponentLogger } from '../logging/index.js';
import { configurationSchema } from './schema.js';
import { isValidQuantity } from './validators.js';

const logger = getComponentLogger('configuration');

function checkResourceName(problems: ValidationProblem[], field: string, value: string): void {
  if (!isValidResourceName(value)) {
    problems.push({
      field,
      message: `'${value}' is not a valid Kubernetes resource name (lowercase alphanumerics and '-', at most 63 characters)`,
    });
  }
}

function checkQuantity(problems: ValidationProblem[], field: string, value: string | undefined): void {
  if (value !== undefined && !isValidQuantity(value)) {
    problems.push({ field, message: `'${value}' is not a valid resource quantity` });
  }
}

function crossFieldProblems(config: Configuration): ValidationProblem[] {
  const problems: ValidationProblem[] = [];

  checkResourceName(problems, 'appName', config.appName);
  if (config.appName.length > MAX_APP_NAME_LENGTH) {
    problems.push({
      field: 'appName',
      message: `App name must be at most ${MAX_APP_NAME_LENGTH} characters`,
    });
  }
  checkResourceName(problems, 'namespace', config.namespace);
  checkResourceName(problems, 'pvc.name', config.pvc.name);
  checkQuantity(problems, 'pvc.size', config.pvc.size);
  if (!config.pvc.mountPath.startsWith('/')) {
    problems.push({ field: 'pvc.mountPath', message: 'Mount path must be absolute' });
  }

  const seenKeys = new Set<string>();
  config.env.forEach((entry, index) => {
    const field = `env.${index}.key`;
    if (!isValidEnvVar(entry.key)) {
      problems.push({ field, message: `'${entry.key}' is not a valid environment variable name` });
    }
    if (RESERVED_ENV_KEYS.has(entry.key)) {
      problems.push({ field, message: `'${entry.key}' is reserved` });
    }
    if (seenKeys.has(entry.key)) {
      problems.push({ field, message: `Duplicate environment variable '${entry.key}'` });
    }
    seenKeys.add(entry.key);
  });

  const seenNames = new Set<string>();
  const seenBindings = new Set<string>();
  config.ports.forEach((port, index) => {
    const binding = `${port.containerPort}/${port.protocol}`;
    if (!isValidResourceName(port.name)) {
      problems.push({ field: `ports.${index}.name`, message: `'${port.name}' is not a valid port name` });
    }
    if (seenNames.has(port.name)) {
      problems.push({ field: `ports.${index}.name`, message: `Duplicate port name '${port.name}'` });
    }
    if (seenBindings.has(binding)) {
      problems.push({ field: `ports.${index}`, message: `Duplicate port ${binding}` });
    }
    seenNames.add(port.name);
    seenBindings.add(binding);
  });

  const resources = config.resources;
  if (resources) {
    checkQuantity(problems, 'resources.requestsCpu', resources.requestsCpu);
    checkQuantity(problems, 'resources.requestsMemory', resources.requestsMemory);
    checkQuantity(problems, 'resources.limitsCpu', resources.limitsCpu);
    checkQuantity(problems, 'resources.limitsMemory', resources.limitsMemory);
  }

  if (config.install && config.install.versionHash !== versionHash(config.install.script)) {
    problems.push({
      field: 'install.versionHash',
      message: 'Version hash does not match the install script',
    });
  }

  return problems;
}

/**
 * Check a configuration against its shape and every cross-field invariant,
 * throwing one ValidationError that lists all problems found
 */
export function validateConfiguration(value: unknown): Configuration {
  const shaped = configurationSchema(value);
  if (shaped instanceof type.errors) {
    throw ValidationError.fromProblems('configuration', formatArktypeErrors(shaped));
  }
  const problems = crossFieldProblems(shaped);
  if (problems.length > 0) {
    throw ValidationError.fromProblems('configuration', problems);
  }
  return shaped;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Validate a configuration and return a frozen copy of it
 */
export function createConfiguration(input: Configuration): Configuration {
  const config = deepFreeze(structuredClone(validateConfiguration(input)));
  logger.debug('Configuration created', {
    appName: config.appName,
    namespace: config.namespace,
    ports: config.ports.length,
    env: config.env.length,
    install: config.install !== undefined,
  });
  return config;
}
