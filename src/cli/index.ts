#!/usr/bin/env node

import { Command } from 'commander';
import { loadConfig } from '../config.js';
import { logger } from '../util/logger.js';
import { runExtraction } from './run.js';

const program = new Command();

program
  .name('page-extract')
  .description('Split HTML pages into search index records')
  .version('1.0.0')
  .argument('[files...]', 'HTML files to read (standard input when omitted)')
  .option('-x, --xpath <expr>', 'Fallback region selector, or the region to clean with --clean')
  .option('--clean', 'Print normalized text of the region instead of page records')
  .option('-u, --url <url>', 'Base URL of the page')
  .option('-l, --log-level <level>', 'debug, info, warn or error')
  .action(async (files: string[], options: Record<string, unknown>) => {
    await runExtraction(files, options, loadConfig());
  });

program.parseAsync().catch((error: unknown) => {
  logger.error('[CLI] Extraction failed:', error);
  if (error instanceof Error && error.cause) {
    logger.error('[CLI] Caused by:', error.cause);
  }
  process.exit(1);
});
