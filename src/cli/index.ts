#!/usr/bin/env node
/**
 * docscan CLI
 * Extracts function documentation records from annotated source files
 */

import * as fs from 'fs';
import { Command, InvalidArgumentError } from 'commander';
import { extractCommand, type ExtractOptions } from './commands/extract.js';
import { logger } from './utils/logger.js';
import { describeError } from '../utils/error-utils.js';

function readVersion(): string {
  try {
    const pkg: unknown = JSON.parse(fs.readFileSync(new URL('../../package.json', import.meta.url), 'utf8'));
    if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch (error) {
    logger.debug(`Could not read package version: ${describeError(error).join(' ')}`);
  }
  return '0.0.0-dev';
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

const program = new Command();

program
  .name('docscan')
  .description('Extract function documentation from annotation comments')
  .version(readVersion(), '-v, --version', 'Output the current version');

program.configureOutput({
  writeErr: (str) => {
    const trimmed = str.replace(/^error:\s*/i, '').trimEnd();
    if (trimmed) {
      logger.error(trimmed);
    }
  },
  writeOut: (str) => process.stdout.write(str),
});

// Extract command
program
  .command('extract <input>')
  .description('Extract documented functions from a file, directory or glob as JSON')
  .option('-o, --output <file>', 'Write the JSON document to a file instead of stdout')
  .option('--out-dir <dir>', 'Write one JSON file per source file')
  .option('-c, --config <path>', 'Config file (default: docscan.config.yaml in the working directory)')
  .option('--private-prefix <prefix>', 'Name prefix marking private functions (default: __)')
  .option('--lookahead <n>', 'Lines searched for a definition after a comment block (default: 10)', parseInteger)
  .option('--default-return <type>', 'Return type used when none is annotated (default: any)')
  .option('--include <pattern>', 'Glob used inside directory inputs (default: **/*.lua)')
  .option('--sort <mode>', 'Record order: source (default) or hierarchical')
  .option('-q, --quiet', 'Only report errors', false)
  .action(async (input: string, options: ExtractOptions) => {
    try {
      await extractCommand(input, options);
    } catch (error) {
      for (const line of describeError(error)) {
        logger.error(line);
      }
      process.exit(1);
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  for (const line of describeError(error)) {
    logger.error(line);
  }
  process.exit(1);
});
