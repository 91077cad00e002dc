/**
 * Configuration Module
 */

export type {
  ExpanderConfig,
  ExpanderSettings,
  ConfigSource,
  ConfigSourceName,
  LoadConfigOptions,
} from './types.js';

export {
  ConfigError,
  ExpanderConfigSchema,
  SETTINGS_FILE_NAME,
  DEFAULT_TEMPLATE_FILENAME,
} from './types.js';

export { loadConfig, loadSettingsFile, readEnvSettings, mergeSources } from './loader.js';
