/**
 * Configuration Loader - Load settings from file, environment and CLI
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { logger } from '../utils/logger.js';
import { isVerboseDebugEnabled } from '../utils/debug.js';
import { validateConfig } from '../utils/config-validator.js';
import {
  ConfigError,
  ExpanderConfigSchema,
  SETTINGS_FILE_NAME,
  type ConfigSource,
  type ExpanderConfig,
  type ExpanderSettings,
  type LoadConfigOptions,
} from './types.js';

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Load the settings file from a directory
 *
 * @returns null when the directory has no settings file
 */
export async function loadSettingsFile(dir: string): Promise<ConfigSource | null> {
  const filePath = path.join(dir, SETTINGS_FILE_NAME);

  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw new ConfigError(`Cannot read ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Invalid JSON in ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  const partial = ExpanderConfigSchema.partial();
  const result = validateConfig(partial, data, filePath);
  if (!result.valid || !result.data) {
    throw new ConfigError(`Invalid configuration in ${filePath}`, result.errors);
  }

  return { name: 'file', path: filePath, settings: stripUndefined(result.data) };
}

function parseBoolean(name: string, value: string): boolean {
  switch (value.trim().toLowerCase()) {
    case '1':
    case 'true':
    case 'yes':
      return true;
    case '0':
    case 'false':
    case 'no':
      return false;
    default:
      throw new ConfigError(`Invalid boolean in ${name}`, [`expected 1/0/true/false, got "${value}"`]);
  }
}

/**
 * Read EXPANDER_* environment variables
 */
export function readEnvSettings(env: NodeJS.ProcessEnv): ExpanderSettings {
  const settings: ExpanderSettings = {};

  if (env.EXPANDER_TEMPLATE) {
    settings.templateFilename = env.EXPANDER_TEMPLATE;
  }
  if (env.EXPANDER_DIRECTIVE) {
    settings.directive = env.EXPANDER_DIRECTIVE;
  }
  if (env.EXPANDER_CYCLE_DETECTION) {
    settings.cycleDetection = parseBoolean('EXPANDER_CYCLE_DETECTION', env.EXPANDER_CYCLE_DETECTION);
  }

  return settings;
}

function stripUndefined(settings: ExpanderSettings): ExpanderSettings {
  const result: ExpanderSettings = {};
  if (settings.templateFilename !== undefined) result.templateFilename = settings.templateFilename;
  if (settings.directive !== undefined) result.directive = settings.directive;
  if (settings.cycleDetection !== undefined) result.cycleDetection = settings.cycleDetection;
  return result;
}

/**
 * Merge sources in priority order (later wins) and validate the result
 */
export function mergeSources(sources: ConfigSource[]): ExpanderConfig {
  const merged = sources.reduce<ExpanderSettings>(
    (acc, source) => ({ ...acc, ...stripUndefined(source.settings) }),
    {}
  );

  const result = validateConfig(ExpanderConfigSchema, merged, 'merged configuration');
  if (!result.valid || !result.data) {
    throw new ConfigError('Invalid configuration', result.errors);
  }
  return result.data;
}

/**
 * Load the effective configuration
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<ExpanderConfig> {
  const sources: ConfigSource[] = [];

  if (options.cwd) {
    const fileSource = await loadSettingsFile(options.cwd);
    if (fileSource) {
      sources.push(fileSource);
    }
  }

  sources.push({ name: 'env', settings: readEnvSettings(options.env ?? process.env) });

  if (options.overrides) {
    sources.push({ name: 'cli', settings: options.overrides });
  }

  if (isVerboseDebugEnabled('config')) {
    logger.debug('Config', 'Configuration sources', {
      sources: sources.map((s) => ({ name: s.name, path: s.path, settings: s.settings })),
    });
  }

  return mergeSources(sources);
}
