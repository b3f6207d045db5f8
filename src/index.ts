#!/usr/bin/env node

import { Command } from 'commander';
import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { logger } from './utils/logger.js';
import { getVersion } from './utils/package.js';
import { isUsageRequest, printUsage } from './utils/usage.js';
import { setupRunExampleCommand } from './commands/run-example.js';

/**
 * run-example CLI - Main entry point
 *
 * Resolves an example bundled in a multi-module build and submits it
 * to the data-processing runtime.
 */

export function createProgram(): Command {
  const program = new Command();

  program
    .name('run-example')
    .description('Resolve and submit a bundled example program')
    .version(getVersion(), '-V, --version', 'print the tool version');

  setupRunExampleCommand(program);
  return program;
}

// === GLOBAL ERROR HANDLING ===

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('❌ An unexpected error occurred. Re-run with --verbose for details.');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason: String(reason) });
  console.error('❌ An unexpected error occurred. Re-run with --verbose for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(argv: string[] = process.argv.slice(2)): Promise<void> {
  // No arguments or a leading -h/--help: usage and a failing status, whatever follows
  if (isUsageRequest(argv)) {
    printUsage();
    process.exit(1);
  }

  try {
    await createProgram().parseAsync(argv, { from: 'user' });
  } catch (error) {
    logger.error('CLI execution failed', { error });
    console.error('❌ Command execution failed. Use --help for usage information.');
    process.exit(1);
  }
}

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

// Run when executed directly, including through the npm bin symlink
if (isMainModule()) {
  run().catch((error) => {
    logger.error('Fatal error in main execution', { error });
    console.error('❌ Fatal error occurred. Exiting.');
    process.exit(1);
  });
}
