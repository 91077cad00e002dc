/**
 * CLI runner
 *
 * Exit codes: 0 on success (document on stdout), 1 on any usage, access,
 * configuration or expansion failure (message on stderr, stdout untouched).
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { ConfigError, loadConfig, type ExpanderConfig, type ExpanderSettings } from '../base/config/index.js';
import { logger } from '../base/utils/logger.js';
import { Expander } from '../expander/expander.js';
import { isExpansionError } from '../expander/errors.js';
import type { DiagnosticsSink } from '../expander/types.js';
import { parseArgs } from './args.js';
import { formatError, formatUsage, formatWarning } from './ui.js';

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: NodeJS.ProcessEnv;
}

export const processIO: CliIO = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
  env: process.env,
};

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export async function readVersion(): Promise<string> {
  // Same relative location from src/cli and dist/cli
  const manifest = path.join(__dirname, '..', '..', 'package.json');
  const data: unknown = JSON.parse(await fs.readFile(manifest, 'utf-8'));
  if (typeof data === 'object' && data !== null && 'version' in data && typeof data.version === 'string') {
    return data.version;
  }
  return 'unknown';
}

/**
 * Run the CLI against the given arguments (without node and script path)
 *
 * @returns Process exit code
 */
export async function runCli(argv: string[], io: CliIO = processIO): Promise<number> {
  const args = parseArgs(argv);

  if (args.help) {
    io.stdout(formatUsage());
    return 0;
  }

  if (args.version) {
    io.stdout(`${await readVersion()}\n`);
    return 0;
  }

  if (args.errors.length > 0) {
    io.stderr(formatUsage());
    for (const message of args.errors) {
      io.stderr(formatError(message));
    }
    return 1;
  }

  if (args.positionals.length !== 1) {
    io.stderr(formatUsage());
    io.stderr(formatError('A single directory path must be provided as an argument.'));
    return 1;
  }

  const rootDir = args.positionals[0];

  try {
    const stat = await fs.stat(rootDir);
    if (!stat.isDirectory()) {
      io.stderr(formatError(`The provided path '${rootDir}' is not a directory.`));
      return 1;
    }
  } catch (error) {
    io.stderr(formatError(`Cannot access directory '${rootDir}': ${errorMessage(error)}`));
    return 1;
  }

  const overrides: ExpanderSettings = {};
  if (args.template !== undefined) {
    overrides.templateFilename = args.template;
  }
  if (!args.cycleCheck) {
    overrides.cycleDetection = false;
  }

  let config: ExpanderConfig;
  try {
    config = await loadConfig({ cwd: rootDir, env: io.env, overrides });
  } catch (error) {
    if (error instanceof ConfigError) {
      io.stderr(formatError(error.message));
      return 1;
    }
    throw error;
  }

  const templatePath = path.join(rootDir, config.templateFilename);
  try {
    await fs.stat(templatePath);
  } catch (error) {
    io.stderr(
      formatError(`'${config.templateFilename}' not found in directory '${rootDir}': ${errorMessage(error)}`)
    );
    return 1;
  }

  const diagnostics: DiagnosticsSink = {
    warn: (message) => io.stderr(formatWarning(message)),
  };

  const expander = new Expander({
    directive: config.directive,
    cycleDetection: config.cycleDetection,
    diagnostics,
  });

  logger.debug('CLI', 'Expanding template', { template: templatePath });

  let output: string;
  try {
    output = await expander.expand(templatePath, rootDir, true);
  } catch (error) {
    if (isExpansionError(error)) {
      io.stderr(formatError(`Failed to expand ${config.templateFilename}: ${error.message}`));
      return 1;
    }
    throw error;
  }

  io.stdout(output);
  return 0;
}
