/**
 * Configuration Validator
 *
 * Validates settings objects against Zod schemas and reports issues as
 * `path: message` strings.
 */

import { z } from 'zod';
import { logger } from './logger.js';

export interface ValidationResult<T> {
  valid: boolean;
  data?: T;
  errors?: string[];
}

/**
 * Validate configuration data against a Zod schema
 *
 * @param context - Context for error messages (e.g., file path)
 */
export function validateConfig<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  context: string
): ValidationResult<T> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { valid: true, data: result.data };
  }

  const errors = result.error.issues.map((issue: z.ZodIssue) => {
    const issuePath = issue.path.join('.');
    return issuePath ? `${issuePath}: ${issue.message}` : issue.message;
  });

  logger.debug('Config', `Invalid configuration in ${context}`, { errors });

  return { valid: false, errors };
}
