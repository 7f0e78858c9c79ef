/**
 * Installer script wrapping
 */

import type { InstallConfig } from '../types/index.js';
import { versionHash } from './version.js';

/** Where the game data volume is mounted inside installer containers */
export const INSTALL_DATA_PATH = '/mnt/server';
/** Where the wrapped script is mounted inside the installer container */
export const INSTALL_SCRIPT_DIR = '/kubeegg-installer';
export const INSTALL_SCRIPT_NAME = 'install.sh';
export const INSTALL_SCRIPT_PATH = `${INSTALL_SCRIPT_DIR}/${INSTALL_SCRIPT_NAME}`;
export const DEFAULT_INSTALL_SHELL = 'sh';

export function installMarkerPath(hash: string): string {
  return `${INSTALL_DATA_PATH}/.kubeegg_installed_${hash}`;
}

/**
 * Guard an egg install script so it runs at most once per script version.
 *
 * The wrapper does not `set -e`: in egg scripts an exit status of 1 from
 * `grep` and similar checks means "no match", not failure.
 */
export function wrapInstallScript(script: string, hash: string): string {
  return [
    '#!/bin/sh',
    '# set -e is omitted: egg scripts use pattern checks that exit 1 on no match.',
    `MARKER=${installMarkerPath(hash)}`,
    'if [ -f "$MARKER" ]; then',
    '  echo "Installer already completed."',
    '  exit 0',
    'fi',
    script.trim(),
    'touch "$MARKER"',
  ].join('\n');
}

export interface InstallInput {
  image: string;
  entrypoint?: string;
  script: string;
}

export function createInstallConfig(input: InstallInput): InstallConfig {
  return {
    image: input.image,
    ...(input.entrypoint && { entrypoint: input.entrypoint }),
    script: input.script,
    versionHash: versionHash(input.script),
  };
}
