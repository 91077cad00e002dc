#!/usr/bin/env node
/**
 * include-expander CLI entry point
 */

import 'dotenv/config';
import { runCli } from './run.js';

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2));
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
