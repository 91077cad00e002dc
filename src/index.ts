/**
 * include-expander - library entry point
 */

export * from './expander/index.js';
export * from './base/config/index.js';
export { runCli, type CliIO } from './cli/run.js';
