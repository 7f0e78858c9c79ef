import { describe, expect, it } from 'vitest';
import { ValidationError } from '../../src/core/errors.js';
import {
  createConfiguration,
  isValidQuantity,
  normalizeCpu,
  normalizeMemory,
  normalizePvcSize,
  validateConfiguration,
  validateImage,
  validatePort,
  validateProtocol,
  validateResourceName,
  type ValidationResult,
} from '../../src/core/validation/index.js';
import { baseConfig, installConfig } from '../utils/fixtures.js';

function valueOf<T>(result: ValidationResult<T>): T | undefined {
  return result.ok ? result.value : undefined;
}

function errorOf<T>(result: ValidationResult<T>): string | undefined {
  return result.ok ? undefined : result.error.message;
}

describe('field validators', () => {
  it('normalizes resource names and rejects blanks', () => {
    expect(valueOf(validateResourceName('My Server'))).toBe('my-server');
    expect(errorOf(validateResourceName('   '))).toBe('Name cannot be empty');
  });

  it('trims images and rejects blanks or embedded whitespace', () => {
    expect(valueOf(validateImage('  java:21 '))).toBe('java:21');
    expect(errorOf(validateImage(''))).toBe('Image cannot be empty.');
    expect(validateImage('java 21').ok).toBe(false);
  });

  it('accepts ports in range only', () => {
    expect(valueOf(validatePort(' 25565 '))).toBe(25565);
    expect(errorOf(validatePort('0'))).toBe('Port must be between 1 and 65535');
    expect(validatePort('65536').ok).toBe(false);
    expect(validatePort('80a').ok).toBe(false);
  });

  it('reads protocols case-insensitively and defaults to TCP', () => {
    expect(valueOf(validateProtocol('udp'))).toBe('UDP');
    expect(valueOf(validateProtocol(''))).toBe('TCP');
    expect(validateProtocol('sctp').ok).toBe(false);
  });

  it.each([
    ['10', '10Gi'],
    ['10g', '10Gi'],
    ['10GB', '10Gi'],
    ['20Gi', '20Gi'],
    ['', '10Gi'],
    ['500Mi', '500Mi'],
    ['10gi', '10Gi'],
    ['10GI', '10Gi'],
    ['10 Gi', '10Gi'],
  ])('normalizes PVC size %j to %s', (input, expected) => {
    expect(valueOf(normalizePvcSize(input))).toBe(expected);
  });

  it('rejects PVC sizes that are not quantities', () => {
    expect(errorOf(normalizePvcSize('big'))).toBe('Invalid size: big');
    expect(errorOf(normalizePvcSize('lotsgi'))).toBe('Invalid size: lotsgi');
  });

  it('only accepts PVC sizes that the configuration schema accepts', () => {
    for (const input of ['10gi', '10GI', 'lotsgi', '10 Gi', '1.5g', '2Ti', 'ten', '10 G']) {
      const result = normalizePvcSize(input);
      if (result.ok) {
        expect(isValidQuantity(result.value)).toBe(true);
      }
    }
  });

  it('normalizes CPU to millicores', () => {
    expect(valueOf(normalizeCpu('500'))).toBe('500m');
    expect(valueOf(normalizeCpu('250m'))).toBe('250m');
    expect(valueOf(normalizeCpu(''))).toBeUndefined();
    expect(errorOf(normalizeCpu('two'))).toBe('Enter CPU in millicores (m), e.g. 500 or 250m.');
  });

  it('normalizes memory to GiB', () => {
    for (const input of ['2', '2g', '2gb', '2gi', '2G']) {
      expect(valueOf(normalizeMemory(input))).toBe('2Gi');
    }
    expect(valueOf(normalizeMemory('0.5'))).toBe('0.5Gi');
    expect(valueOf(normalizeMemory(''))).toBeUndefined();
    expect(errorOf(normalizeMemory('lots'))).toBe('Enter memory in GB, e.g. 2 or 0.5.');
  });
});

describe('validateConfiguration', () => {
  it('accepts a complete configuration', () => {
    const config = baseConfig({
      env: [{ key: 'MAX_PLAYERS', value: '20', sensitive: false }],
      ports: [{ containerPort: 25565, protocol: 'TCP', name: 'server-port' }],
      install: installConfig(),
      resources: { requestsCpu: '500m', limitsMemory: '6Gi' },
    });
    expect(validateConfiguration(config)).toEqual(config);
  });

  it('rejects values of the wrong shape', () => {
    expect(() => validateConfiguration({ ...baseConfig(), ports: [{ containerPort: 0, protocol: 'TCP', name: 'x' }] })).toThrow(
      ValidationError
    );
    expect(() => validateConfiguration('paper')).toThrow(ValidationError);
  });

  it('reports every cross-field problem at once', () => {
    const config = baseConfig({
      appName: 'Paper Server',
      env: [
        { key: 'STARTUP', value: 'x', sensitive: false },
        { key: 'lower', value: 'x', sensitive: false },
        { key: 'MOTD', value: 'a', sensitive: false },
        { key: 'MOTD', value: 'b', sensitive: false },
      ],
      ports: [
        { containerPort: 25565, protocol: 'TCP', name: 'game' },
        { containerPort: 25566, protocol: 'TCP', name: 'game' },
      ],
    });

    let caught: unknown;
    try {
      validateConfiguration(config);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    if (!(caught instanceof ValidationError)) return;

    expect(caught.problems.map((problem) => problem.field)).toEqual([
      'appName',
      'env.0.key',
      'env.1.key',
      'env.3.key',
      'ports.1.name',
    ]);
    expect(caught.message.startsWith("Invalid configuration at field 'appName'")).toBe(true);
  });

  it('limits app names so the installer Job name stays within 63 characters', () => {
    expect(validateConfiguration(baseConfig({ appName: 'a'.repeat(44) })).appName).toHaveLength(44);

    let caught: unknown;
    try {
      validateConfiguration(baseConfig({ appName: 'a'.repeat(45) }));
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    if (!(caught instanceof ValidationError)) return;
    expect(caught.problems).toEqual([{ field: 'appName', message: 'App name must be at most 44 characters' }]);
  });

  it('rejects an install whose hash does not match its script', () => {
    const install = { ...installConfig(), versionHash: '00000000' };
    expect(() => validateConfiguration(baseConfig({ install }))).toThrow(
      'Version hash does not match the install script'
    );
  });

  it('rejects malformed quantities and relative mount paths', () => {
    const config = baseConfig({
      pvc: { name: 'paper-data', size: 'ten', mountPath: 'data', accessModes: ['ReadWriteMany'] },
      resources: { limitsCpu: 'fast' },
    });
    let fields: string[] = [];
    try {
      validateConfiguration(config);
    } catch (error) {
      if (error instanceof ValidationError) fields = error.problems.map((problem) => problem.field);
    }
    expect(fields).toEqual(['pvc.size', 'pvc.mountPath', 'resources.limitsCpu']);
  });
});

describe('createConfiguration', () => {
  it('returns a deeply frozen copy', () => {
    const input = baseConfig({ env: [{ key: 'MOTD', value: 'hi', sensitive: false }] });
    const config = createConfiguration(input);

    expect(config).toEqual(input);
    expect(config).not.toBe(input);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.pvc)).toBe(true);
    expect(Object.isFrozen(config.env[0])).toBe(true);
    expect(Object.isFrozen(input)).toBe(false);
  });

  it('throws instead of returning an invalid configuration', () => {
    expect(() => createConfiguration(baseConfig({ namespace: '' }))).toThrow(ValidationError);
  });
});
