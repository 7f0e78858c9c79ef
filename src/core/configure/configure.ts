/**
 * Interactive configurator
 *
 * Walks the operator through every choice the renderer needs, starting from
 * the parsed egg. Each answer goes through a pure validator; retries happen
 * here and nowhere else.
 */

import { createInstallConfig } from '../installer/index.js';
import { getComponentLogger } from '../logging/index.js';
import { FILE_MANAGER_PASSWORD_KEY, MAX_APP_NAME_LENGTH, RESERVED_ENV_KEYS } from '../render/index.js';
import type {
  Configuration,
  EggDescriptor,
  EggVariable,
  EnvSelection,
  FileManagerConfig,
  InstallConfig,
  PortSpec,
  PvcSpec,
  ResourceValues,
} from '../types/index.js';
import {
  createConfiguration,
  fail,
  normalizeCpu,
  normalizeMemory,
  normalizePvcSize,
  ok,
  validateEnvKey,
  validateImage,
  validatePort,
  validateProtocol,
  validateRequiredValue,
  validateResourceName,
  type ValidationResult,
} from '../validation/index.js';
import {
  generatePassword,
  normalizeEnvVar,
  normalizePortName,
  normalizeResourceName,
  parsePortList,
  sortPorts,
} from '../../utils/index.js';
import { isForcedSecret, isSensitiveDefault, missingStartupVars, portsFromEnv } from './env.js';
import { askValid, type AskOptions, type Prompter } from './prompter.js';

const logger = getComponentLogger('configurator');

export const DEFAULT_APP_NAME = 'game-server';
export const DEFAULT_MOUNT_PATH = '/home/container';
export const FILE_MANAGER_IMAGE = 'hurlenko/filebrowser:latest';
export const FILE_MANAGER_DEFAULT_PORT = 8080;
export const FILE_MANAGER_DEFAULT_USERNAME = 'admin';

export interface ConfigureOptions {
  /** Source of the generated file manager password */
  generatePassword?: () => string;
}

function withDefault(value: string | undefined): AskOptions {
  return value ? { default: value } : {};
}

export async function promptIdentity(
  prompter: Prompter,
  eggName: string | undefined
): Promise<{ appName: string; namespace: string }> {
  const appName = await askValid(
    prompter,
    'App name',
    (answer) => validateResourceName(answer, 'appName', MAX_APP_NAME_LENGTH),
    { default: normalizeResourceName(eggName || DEFAULT_APP_NAME, MAX_APP_NAME_LENGTH) }
  );
  const namespace = await askValid(
    prompter,
    'Namespace',
    (answer) => validateResourceName(answer, 'namespace'),
    { default: appName }
  );
  return { appName, namespace };
}

export async function promptImage(
  prompter: Prompter,
  images: ReadonlyMap<string, string>
): Promise<string> {
  const entries = [...images];
  if (entries.length === 0) {
    return askValid(prompter, 'Container image', validateImage);
  }

  prompter.print('Detected images:');
  entries.forEach(([label, image], index) => prompter.print(`  ${index + 1}. ${label}: ${image}`));
  const otherIndex = entries.length + 1;
  prompter.print(`  ${otherIndex}. Other image`);

  const selection = await askValid(
    prompter,
    'Select image number',
    (answer): ValidationResult<number> => {
      const text = answer.trim();
      if (!/^\d+$/.test(text)) {
        return fail('image', 'Enter a number from the list.');
      }
      const index = Number.parseInt(text, 10);
      return index >= 1 && index <= otherIndex ? ok(index) : fail('image', 'Selection out of range.');
    },
    { default: '1' }
  );

  const chosen = entries[selection - 1];
  if (chosen) {
    return chosen[1];
  }
  return askValid(prompter, 'Container image', validateImage);
}

export async function promptPvc(prompter: Prompter, appName: string): Promise<PvcSpec> {
  const name = await askValid(prompter, 'PVC name', (answer) => validateResourceName(answer, 'pvc.name'), {
    default: `${appName}-data`,
  });
  const size = await askValid(prompter, 'PVC size (GB)', normalizePvcSize, { default: '10' });
  const mountPath = await askValid(
    prompter,
    'PVC mount path',
    (answer) => {
      const path = answer.trim();
      return path.startsWith('/') ? ok(path) : fail('pvc.mountPath', 'Mount path must be absolute');
    },
    { default: DEFAULT_MOUNT_PATH }
  );
  const storageClassName = (await prompter.ask('storageClassName (optional)')).trim();

  return {
    name,
    size,
    mountPath,
    accessModes: ['ReadWriteMany'],
    ...(storageClassName && { storageClassName }),
  };
}

function printVariable(prompter: Prompter, key: string, variable: EggVariable): void {
  prompter.print(key);
  if (variable.description) {
    prompter.print(variable.description);
  }
  if (variable.defaultValue !== undefined) {
    prompter.print(`Default: ${variable.defaultValue}`);
  }
  prompter.print(`Required: ${variable.required ? 'yes' : 'no'}`);
}

export async function promptEnvVars(
  prompter: Prompter,
  variables: readonly EggVariable[]
): Promise<EnvSelection[]> {
  const selections: EnvSelection[] = [];
  if (variables.length === 0) {
    return selections;
  }

  prompter.print();
  prompter.print('Environment variables:');
  for (const variable of variables) {
    let key = normalizeEnvVar(variable.envVariable || variable.name);
    printVariable(prompter, key, variable);
    if (!variable.envVariable) {
      key = await askValid(prompter, 'Env var name', validateEnvKey, { default: key });
    }
    if (RESERVED_ENV_KEYS.has(key)) {
      prompter.print(`Skipping ${key}: the name is reserved by kubeegg.`);
      continue;
    }
    if (selections.some((selection) => selection.key === key)) {
      prompter.print(`Skipping ${key}: already configured.`);
      continue;
    }

    const defaultValue = variable.defaultValue ?? '';
    let value = await prompter.ask(
      variable.required ? 'Value' : 'Value (leave blank to skip)',
      withDefault(defaultValue)
    );
    if (!value && !variable.required) {
      continue;
    }
    while (!value) {
      value = await prompter.ask('Value', withDefault(defaultValue));
    }

    let sensitive: boolean;
    if (isForcedSecret(key)) {
      sensitive = true;
    } else if (defaultValue !== '' && value === defaultValue) {
      sensitive = isSensitiveDefault(key);
    } else {
      sensitive = await prompter.confirm('Is this value sensitive?', isSensitiveDefault(key));
    }
    selections.push({ key, value, sensitive });
    prompter.print();
  }
  return selections;
}

export async function promptStartup(
  prompter: Prompter,
  startup: string | undefined
): Promise<string | undefined> {
  if (startup && (await prompter.confirm('Use detected startup command?', true))) {
    return startup;
  }
  const custom = (await prompter.ask('Startup command (leave blank to skip)')).trim();
  return custom || undefined;
}

export async function promptMissingStartupVars(
  prompter: Prompter,
  startup: string,
  env: readonly EnvSelection[]
): Promise<EnvSelection[]> {
  const missing = missingStartupVars(startup, env);
  if (missing.length === 0) {
    return [];
  }

  prompter.print();
  prompter.print('The startup command references variables not yet configured:');
  missing.forEach((name) => prompter.print(`  - ${name}`));

  const additions: EnvSelection[] = [];
  for (const key of missing) {
    prompter.print();
    prompter.print(`${key} (referenced in startup command)`);
    const value = await prompter.ask(`Value for ${key}`);
    const sensitive =
      isForcedSecret(key) || (await prompter.confirm('Is this value sensitive?', isSensitiveDefault(key)));
    additions.push({ key, value, sensitive });
  }
  return additions;
}

async function selectPorts(prompter: Prompter, detected: readonly number[]): Promise<number[]> {
  for (;;) {
    let ports: number[] = [];
    if (detected.length > 0 && (await prompter.confirm(`Use detected ports [${detected.join(', ')}]?`, true))) {
      ports = [...detected];
    }
    if (ports.length === 0) {
      const raw = await prompter.ask('Container ports to expose (comma-separated, empty to skip)');
      ports = parsePortList(raw);
    }
    if (ports.length > 0) {
      const extra = await prompter.ask('Additional ports to expose (comma-separated, empty to skip)');
      for (const port of parsePortList(extra)) {
        if (!ports.includes(port)) ports.push(port);
      }
      return ports;
    }
    if (await prompter.confirm('No ports selected. Continue without a game Service?', false)) {
      return [];
    }
  }
}

export async function promptPorts(
  prompter: Prompter,
  detected: readonly number[],
  envNames: ReadonlyMap<number, string> = new Map()
): Promise<PortSpec[]> {
  const specs: PortSpec[] = [];
  for (const containerPort of await selectPorts(prompter, detected)) {
    const protocol = await askValid(prompter, `Protocol for port ${containerPort}`, validateProtocol, {
      default: 'TCP',
    });
    const name = await askValid(
      prompter,
      `Service port name for ${containerPort}`,
      (answer): ValidationResult<string> => {
        const candidate = normalizePortName(answer);
        return specs.some((spec) => spec.name === candidate)
          ? fail('ports.name', `Port name '${candidate}' is already used`)
          : ok(candidate);
      },
      { default: normalizePortName(envNames.get(containerPort) ?? `game-${containerPort}`) }
    );
    specs.push({ containerPort, protocol, name });
  }
  return specs;
}

export async function promptFileManager(
  prompter: Prompter,
  options: ConfigureOptions = {}
): Promise<FileManagerConfig> {
  prompter.print();
  prompter.print('File manager sidecar:');
  prompter.print('File manager root directory: /data');

  const image = await askValid(prompter, 'File manager image', validateImage, { default: FILE_MANAGER_IMAGE });
  const port = await askValid(prompter, 'File manager web UI port', (answer) => validatePort(answer, 'fileManager.port'), {
    default: String(FILE_MANAGER_DEFAULT_PORT),
  });
  const username = await askValid(
    prompter,
    'File manager username',
    (answer) => validateRequiredValue(answer.trim(), 'fileManager.username'),
    { default: FILE_MANAGER_DEFAULT_USERNAME }
  );

  let credential: string;
  if (await prompter.confirm('Generate a file manager password?', true)) {
    credential = (options.generatePassword ?? generatePassword)();
    prompter.print(`Generated password stored in the Secret under ${FILE_MANAGER_PASSWORD_KEY}.`);
  } else {
    credential = await askValid(prompter, 'File manager password', (answer) =>
      validateRequiredValue(answer, 'fileManager.credential')
    );
  }

  return { image, port, username, credential };
}

export async function promptInstall(
  prompter: Prompter,
  descriptor: EggDescriptor
): Promise<InstallConfig | undefined> {
  const { installScript, installImage, installEntrypoint } = descriptor;
  if (!installScript || !installImage) {
    return undefined;
  }
  prompter.print();
  prompter.print('Installer script detected.');
  if (!(await prompter.confirm('Run the installer Job before the first start?', true))) {
    return undefined;
  }
  return createInstallConfig({
    image: installImage,
    script: installScript,
    ...(installEntrypoint && { entrypoint: installEntrypoint }),
  });
}

export async function promptResources(prompter: Prompter): Promise<ResourceValues | undefined> {
  if (!(await prompter.confirm('Configure CPU/memory requests & limits?', false))) {
    return undefined;
  }
  const requestsCpu = await askValid(prompter, 'CPU request (m, optional)', normalizeCpu);
  const requestsMemory = await askValid(prompter, 'Memory request (GB, optional)', normalizeMemory);
  const limitsCpu = await askValid(prompter, 'CPU limit (m, optional)', normalizeCpu);
  const limitsMemory = await askValid(prompter, 'Memory limit (GB, optional)', normalizeMemory);
  return {
    ...(requestsCpu && { requestsCpu }),
    ...(requestsMemory && { requestsMemory }),
    ...(limitsCpu && { limitsCpu }),
    ...(limitsMemory && { limitsMemory }),
  };
}

/**
 * Build a validated, frozen configuration by prompting the operator
 */
export async function configure(
  descriptor: EggDescriptor,
  prompter: Prompter,
  options: ConfigureOptions = {}
): Promise<Configuration> {
  const { appName, namespace } = await promptIdentity(prompter, descriptor.name);
  const image = await promptImage(prompter, descriptor.dockerImages);
  const pvc = await promptPvc(prompter, appName);
  const env = await promptEnvVars(prompter, descriptor.variables);

  const startupCommand = await promptStartup(prompter, descriptor.startup);
  if (startupCommand) {
    env.push(...(await promptMissingStartupVars(prompter, startupCommand, env)));
  }

  const envPorts = portsFromEnv(env);
  const ports = await promptPorts(prompter, sortPorts([...descriptor.ports, ...envPorts.ports]), envPorts.names);
  const fileManager = await promptFileManager(prompter, options);
  const install = await promptInstall(prompter, descriptor);
  const resources = await promptResources(prompter);

  logger.debug('Operator choices collected', { appName, namespace, env: env.length, ports: ports.length });

  return createConfiguration({
    appName,
    namespace,
    image,
    pvc,
    env,
    ports,
    fileManager,
    ...(startupCommand && { startupCommand }),
    ...(install && { install }),
    ...(resources && { resources }),
  });
}
