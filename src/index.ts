#!/usr/bin/env node

import { Command } from 'commander';
import { logger } from './utils/logger.js';
import { getVersion } from './utils/package.js';

import { setupEvalCommand } from './commands/eval.js';
import { setupInstallCommand } from './commands/install.js';
import { setupPlanCommand } from './commands/plan.js';

/**
 * Quiver CLI - Main entry point
 *
 * Installs developer tools from declarative recipes through verified,
 * reproducible installation plans.
 */

const program = new Command();

program
  .name('quiver')
  .description('Quiver - reproducible tool installs from declarative recipes')
  .version(getVersion())
  // `eval --version <constraint>` must not reach the root --version flag
  .enablePositionalOptions()
  .configureHelp({ sortSubcommands: true });

setupEvalCommand(program);
setupInstallCommand(program);
setupPlanCommand(program);

// === GLOBAL ERROR HANDLING ===

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('✗ An unexpected error occurred. Set QUIVER_VERBOSE=1 for details.');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('✗ An unexpected error occurred. Set QUIVER_VERBOSE=1 for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(): Promise<void> {
  if (process.argv.length <= 2) {
    program.outputHelp();
    return;
  }
  await program.parseAsync();
}

if (process.argv[1] && (
    process.argv[1].endsWith('index.js') ||
    process.argv[1].endsWith('index.ts') ||
    process.argv[1].endsWith('quiver')
  )) {
  run().catch((error) => {
    logger.error('Fatal error in main execution', { error });
    console.error('✗ Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

export { program };
