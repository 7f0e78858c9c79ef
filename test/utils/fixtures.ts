import { createInstallConfig } from '../../src/core/installer/index.js';
import type { Configuration, InstallConfig } from '../../src/core/types/index.js';

export const INSTALL_SCRIPT = [
  '#!/bin/bash',
  'cd /mnt/server',
  'curl -sSL -o server.jar https://example.test/server.jar',
].join('\n');

export function installConfig(script: string = INSTALL_SCRIPT): InstallConfig {
  return createInstallConfig({ image: 'ghcr.io/example/installer:debian', entrypoint: 'bash', script });
}

/**
 * Smallest valid configuration; tests override what they care about
 */
export function baseConfig(overrides: Partial<Configuration> = {}): Configuration {
  return {
    appName: 'paper',
    namespace: 'games',
    image: 'ghcr.io/example/java:21',
    pvc: {
      name: 'paper-data',
      size: '10Gi',
      mountPath: '/home/container',
      accessModes: ['ReadWriteMany'],
    },
    env: [],
    ports: [],
    fileManager: {
      image: 'hurlenko/filebrowser:latest',
      username: 'admin',
      credential: 'test-secret',
      port: 8080,
    },
    ...overrides,
  };
}
