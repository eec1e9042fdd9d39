#!/usr/bin/env node
/**
 * bulkline CLI
 *
 * Reads commands from stdin, one per line, and prints/persists them in bulks.
 *
 *   bulkline 3 < commands.txt
 */

import { program } from 'commander';
import { loadConfig } from './src/config';
import type { CliOptions } from './src/cli/run';
import { run, toOverrides } from './src/cli/run';

// Colors for status output (bulks on stdout stay plain)
const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
};

program
  .name('bulkline')
  .description('Group commands from stdin into bulks')
  .version('1.0.0')
  .argument('[bulk-size]', 'commands per bulk (default: $BULK_SIZE or 3)')
  .option('-d, --log-dir <dir>', 'directory for bulk files')
  .option('-c, --max-concurrency <n>', 'max consumers processing at once')
  .option('--strict-blocks', 'fail on "}" without a matching "{"')
  .option('--no-files', 'do not write bulk files')
  .option('--debug', 'log flush decisions')
  .action(async (bulkSize: string | undefined, options: CliOptions) => {
    const config = loadConfig(toOverrides(bulkSize, options));

    const summary = await run(config, {
      input: process.stdin,
      output: process.stdout,
    });

    if (config.debug) {
      console.error(
        `${colors.dim}[bulkline] ${summary.commands} command(s), ${summary.flushes} bulk(s), ${summary.failures} failure(s)${colors.reset}`
      );
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`${colors.red}Error: ${message}${colors.reset}`);
  process.exit(1);
});
