/**
 * Egg descriptor parser
 *
 * Turns an arbitrary JSON value into an `EggDescriptor`. Only a document that
 * is not a JSON object is rejected; every malformed field degrades to absent
 * or empty.
 */

import { FormatError } from '../errors.js';
import { getComponentLogger } from '../logging/index.js';
import type { EggDescriptor, EggVariable } from '../types/index.js';
import { isJsonObject, isValidPort, sortPorts, type JsonObject } from '../../utils/index.js';
import {
  asArray,
  asNonEmptyArray,
  asNonEmptyObject,
  asNonEmptyString,
  asNonEmptyText,
  asObject,
  asText,
  coerceBoolean,
  EGG_FIELD_KEYS,
  readFirst,
  readFirstPresent,
  VARIABLE_FIELD_KEYS,
} from './fields.js';

const logger = getComponentLogger('egg-parser');

const DEFAULT_IMAGE_LABEL = 'default';

function extractImages(data: JsonObject): Map<string, string> {
  const images = new Map<string, string>();
  const declared = readFirst<JsonObject | unknown[]>(
    data,
    EGG_FIELD_KEYS.images,
    (value) => asNonEmptyObject(value) ?? asNonEmptyArray(value)
  );

  if (Array.isArray(declared)) {
    declared.forEach((image, index) => {
      if (typeof image === 'string' && image) {
        images.set(`image-${index + 1}`, image);
      }
    });
  } else if (declared) {
    for (const [label, image] of Object.entries(declared)) {
      if (typeof image === 'string' && image) {
        images.set(label, image);
      }
    }
  }

  // A single top-level image only fills the "default" slot when the images
  // mapping left it empty; an explicit mapping entry always wins.
  const single = readFirst(data, EGG_FIELD_KEYS.defaultImage, asNonEmptyString);
  if (single !== undefined && !images.has(DEFAULT_IMAGE_LABEL)) {
    images.set(DEFAULT_IMAGE_LABEL, single);
  }

  return images;
}

function parseVariable(item: JsonObject): EggVariable {
  const envVariable = readFirst(item, VARIABLE_FIELD_KEYS.envVariable, asNonEmptyText);
  const name = readFirst(item, VARIABLE_FIELD_KEYS.name, asNonEmptyText) ?? '';
  const description = readFirst(item, VARIABLE_FIELD_KEYS.description, asText);
  const defaultValue = readFirst(item, VARIABLE_FIELD_KEYS.defaultValue, asText);
  const required = readFirstPresent(item, VARIABLE_FIELD_KEYS.required);

  return {
    name,
    ...(envVariable !== undefined && { envVariable }),
    ...(description !== undefined && { description }),
    ...(defaultValue !== undefined && { defaultValue }),
    required: required.found ? coerceBoolean(required.value) : false,
  };
}

function extractVariables(data: JsonObject): EggVariable[] {
  const declared = readFirst(data, EGG_FIELD_KEYS.variables, asArray);
  if (declared) {
    return declared.filter(isJsonObject).map(parseVariable);
  }

  const environment = readFirst(data, EGG_FIELD_KEYS.environment, asObject);
  if (!environment) {
    return [];
  }
  return Object.entries(environment).map(([key, value]) => {
    const defaultValue = asText(value);
    return {
      name: key,
      envVariable: key,
      ...(defaultValue !== undefined && { defaultValue }),
      required: false,
    };
  });
}

function isBlank(value: unknown): boolean {
  if (Array.isArray(value)) return value.length === 0;
  if (isJsonObject(value)) return Object.keys(value).length === 0;
  return value === null || value === undefined || value === false || value === 0 || value === '';
}

function toPort(value: unknown): number | undefined {
  let port: number | undefined;
  if (typeof value === 'number' && Number.isInteger(value)) {
    port = value;
  } else if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
    port = Number.parseInt(value.trim(), 10);
  }
  return port !== undefined && isValidPort(port) ? port : undefined;
}

function collectPorts(value: unknown, into: Set<number>): void {
  const values = Array.isArray(value) ? value : [value];
  for (const item of values) {
    const port = toPort(item);
    if (port !== undefined) into.add(port);
  }
}

function extractPorts(data: JsonObject, variables: readonly EggVariable[]): number[] {
  const ports = new Set<number>();

  const config = readFirst(data, ['config'], asObject);
  if (config) {
    const configPorts = readFirst(config, EGG_FIELD_KEYS.configPorts, (value) =>
      isBlank(value) ? undefined : value
    );
    collectPorts(configPorts, ports);
  }

  const topLevel = readFirst(data, EGG_FIELD_KEYS.ports, asArray);
  if (topLevel) {
    collectPorts(topLevel, ports);
  }

  for (const variable of variables) {
    if (!variable.envVariable?.toUpperCase().includes('PORT')) continue;
    if (variable.defaultValue && /^\d+$/.test(variable.defaultValue)) {
      collectPorts(variable.defaultValue, ports);
    }
  }

  return sortPorts(ports);
}

interface Installation {
  installScript?: string;
  installImage?: string;
  installEntrypoint?: string;
}

function extractInstallation(data: JsonObject): Installation {
  const scripts = readFirst(data, ['scripts'], asObject);
  const installation = scripts && readFirst(scripts, ['installation'], asObject);
  if (!installation) {
    return {};
  }

  const script = readFirst(installation, ['script'], (value) =>
    typeof value === 'string' ? value.replace(/\r\n/g, '\n') : undefined
  );
  const image = readFirst(installation, ['container'], asNonEmptyText);
  const entrypoint = readFirst(installation, ['entrypoint'], asNonEmptyText);

  // An install script without an image to run it in is unusable, and vice versa.
  if (script === undefined || image === undefined) {
    return {};
  }
  return {
    installScript: script,
    installImage: image,
    ...(entrypoint !== undefined && { installEntrypoint: entrypoint }),
  };
}

/**
 * Parse an egg document into a normalized descriptor.
 *
 * @throws FormatError when `data` is not a JSON object
 */
export function parseEgg(data: unknown): EggDescriptor {
  if (!isJsonObject(data)) {
    throw FormatError.notAnObject(data);
  }

  const name = readFirst(data, EGG_FIELD_KEYS.name, asNonEmptyText);
  const description = readFirst(data, EGG_FIELD_KEYS.description, asText);
  const startup = readFirst(data, EGG_FIELD_KEYS.startup, asText);
  const dockerImages = extractImages(data);
  const variables = extractVariables(data);
  const ports = extractPorts(data, variables);
  const installation = extractInstallation(data);

  logger.debug('Parsed egg', {
    name,
    images: dockerImages.size,
    variables: variables.length,
    ports,
    installer: installation.installScript !== undefined,
  });

  return {
    ...(name !== undefined && { name }),
    ...(description !== undefined && { description }),
    ...(startup !== undefined && { startup }),
    dockerImages,
    variables,
    ports,
    ...installation,
  };
}
