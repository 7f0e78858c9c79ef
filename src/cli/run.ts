/**
 * kubeegg command line
 *
 * kubeegg <egg> [-o|--out <dir>] [--force] [-s|--sops]
 */

import { access, stat, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { parseArgs } from 'node:util';
import { getRuntimeSettings } from '../core/config/index.js';
import { configure, type ConfigureOptions, type Prompter, ReadlinePrompter } from '../core/configure/index.js';
import { parseEgg } from '../core/egg/index.js';
import { formatErrorForDisplay, isKubeEggError, OutputError } from '../core/errors.js';
import { getAppLogger, getComponentLogger } from '../core/logging/index.js';
import { renderBundle } from '../core/serialization/index.js';
import { type EggSource, type LoadEggOptions, loadEggJson } from '../core/source/index.js';
import type { Configuration, RenderedFile } from '../core/types/index.js';

const logger = getComponentLogger('cli');

export const USAGE = 'Usage: kubeegg <egg> [-o|--out <dir>] [--force] [-s|--sops]';

export interface CliOptions {
  egg: string;
  out: string;
  force: boolean;
  sops: boolean;
}

export interface CliDependencies {
  /** Defaults to a readline prompter on stdin/stdout, closed on exit */
  prompter?: Prompter;
  loadEgg?: (source: string, options: LoadEggOptions) => Promise<EggSource>;
  configureOptions?: ConfigureOptions;
  /** Source of `KUBEEGG_*` runtime settings; defaults to `process.env` */
  env?: NodeJS.ProcessEnv;
  writeError?: (message: string) => void;
}

export function parseCliArgs(argv: readonly string[]): CliOptions {
  const { values, positionals } = parseArgs({
    args: [...argv],
    allowPositionals: true,
    options: {
      out: { type: 'string', short: 'o', default: '.' },
      force: { type: 'boolean', default: false },
      sops: { type: 'boolean', short: 's', default: false },
    },
  });

  const [egg, ...extra] = positionals;
  if (!egg || extra.length > 0) {
    throw new OutputError(`Expected exactly one egg path or URL\n${USAGE}`, values.out);
  }
  return { egg, out: values.out, force: values.force, sops: values.sops };
}

export async function ensureOutputDir(outputDir: string): Promise<void> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(outputDir)).isDirectory();
  } catch {
    throw OutputError.missingDirectory(outputDir);
  }
  if (!isDirectory) {
    throw OutputError.notADirectory(outputDir);
  }
}

async function exists(file: string): Promise<boolean> {
  try {
    await access(file);
    return true;
  } catch {
    return false;
  }
}

function printSummary(prompter: Prompter, config: Configuration): void {
  prompter.print();
  prompter.print('Summary:');
  prompter.print(`App name: ${config.appName}`);
  prompter.print(`Namespace: ${config.namespace}`);
  prompter.print(`Image: ${config.image}`);
}

/**
 * Write every file, asking before replacing existing ones unless `force`
 */
export async function writeBundle(
  prompter: Prompter,
  outputDir: string,
  files: readonly RenderedFile[],
  force: boolean
): Promise<void> {
  const existing: string[] = [];
  for (const file of files) {
    if (await exists(path.join(outputDir, file.filename))) {
      existing.push(file.filename);
    }
  }

  if (existing.length > 0 && !force) {
    prompter.print('The following files already exist:');
    existing.forEach((filename) => prompter.print(`  - ${filename}`));
    const choice = await prompter.choose('overwrite or abort', ['overwrite', 'abort'], 'abort');
    if (choice !== 'overwrite') {
      throw OutputError.aborted(outputDir);
    }
  }

  for (const file of files) {
    await writeFile(path.join(outputDir, file.filename), file.content, 'utf-8');
  }
}

async function execute(options: CliOptions, prompter: Prompter, deps: CliDependencies): Promise<void> {
  const settings = getRuntimeSettings(deps.env);
  await ensureOutputDir(options.out);

  const loadEgg = deps.loadEgg ?? loadEggJson;
  const source = await loadEgg(options.egg, { timeoutMs: settings.fetchTimeoutMs });
  const descriptor = parseEgg(source.data);

  const config = await configure(descriptor, prompter, deps.configureOptions);
  printSummary(prompter, config);

  const files = renderBundle(config, { sops: options.sops });
  await writeBundle(prompter, options.out, files, options.force);
  getAppLogger(config.appName, config.namespace).debug('Manifests written', {
    outputDir: options.out,
    files: files.map((file) => file.filename),
  });

  prompter.print();
  prompter.print('Generated:');
  files.forEach((file) => prompter.print(`  - ${file.filename}`));
}

/**
 * Run the CLI and return its exit code
 */
export async function run(argv: readonly string[], deps: CliDependencies = {}): Promise<number> {
  const writeError = deps.writeError ?? ((message: string) => process.stderr.write(`${message}\n`));

  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    writeError(error instanceof Error ? error.message : String(error));
    if (!isKubeEggError(error)) writeError(USAGE);
    return 1;
  }

  let prompter: Prompter;
  let ownPrompter: ReadlinePrompter | undefined;
  if (deps.prompter) {
    prompter = deps.prompter;
  } else {
    ownPrompter = new ReadlinePrompter();
    prompter = ownPrompter;
  }

  try {
    await execute(options, prompter, deps);
    return 0;
  } catch (error) {
    if (!isKubeEggError(error)) {
      logger.error('Unexpected failure', error instanceof Error ? error : new Error(String(error)));
    }
    writeError(formatErrorForDisplay(error));
    return 1;
  } finally {
    ownPrompter?.close();
  }
}
