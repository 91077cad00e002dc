/**
 * Configuration Types
 *
 * Sources, lowest priority first:
 * - built-in defaults
 * - .include-expander.json in the template directory
 * - EXPANDER_* environment variables
 * - CLI flags
 */

import { z } from 'zod';

export const SETTINGS_FILE_NAME = '.include-expander.json';
export const DEFAULT_TEMPLATE_FILENAME = 'cloud-init.tmpl.yaml';

export const ExpanderConfigSchema = z
  .object({
    templateFilename: z
      .string()
      .min(1, 'Template filename cannot be empty')
      .refine((name) => !/[\\/]/.test(name), 'Template filename must not contain path separators')
      .default(DEFAULT_TEMPLATE_FILENAME)
      .describe('Root template file name inside the target directory'),
    directive: z
      .string()
      .min(1, 'Directive prefix cannot be empty')
      .default('#include:')
      .describe('Prefix that marks an include line'),
    cycleDetection: z.boolean().default(true).describe('Fail on cyclic includes'),
  })
  .strict();

export type ExpanderConfig = z.infer<typeof ExpanderConfigSchema>;

/**
 * Partial settings as found in any one source
 */
export type ExpanderSettings = z.input<typeof ExpanderConfigSchema>;

export type ConfigSourceName = 'file' | 'env' | 'cli';

export interface ConfigSource {
  name: ConfigSourceName;
  path?: string;
  settings: ExpanderSettings;
}

export interface LoadConfigOptions {
  /** Directory searched for the settings file; skipped when omitted */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ExpanderSettings;
}

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
  }
}
