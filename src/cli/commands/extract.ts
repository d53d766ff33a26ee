/**
 * Extract command - reads annotated source files and emits the function
 * records as a JSON document
 */

import * as fs from 'fs';
import * as path from 'path';
import { glob } from 'glob';
import { extractFunctionsFromText } from '../../annotations/extract.js';
import type { FunctionRecord } from '../../annotations/types.js';
import { loadConfig, type DocscanConfig } from '../../config/loader.js';
import { sortRecords } from '../../sorting/hierarchical.js';
import { getErrorMessage } from '../../utils/error-utils.js';
import { logger } from '../utils/logger.js';

export interface ExtractOptions {
  /** Write the whole document to this file instead of stdout */
  output?: string;
  /** Write one `<name>.json` per source file under this directory */
  outDir?: string;
  config?: string;
  privatePrefix?: string;
  lookahead?: number;
  defaultReturn?: string;
  include?: string;
  sort?: string;
  quiet?: boolean;
  /** Base directory for relative inputs and reported paths */
  cwd?: string;
}

export interface FileExtraction {
  /** Path relative to the working directory, with forward slashes */
  file: string;
  functions: FunctionRecord[];
}

export interface ExtractionDocument {
  files: FileExtraction[];
}

function toPosix(filePath: string): string {
  return filePath.split(path.sep).join('/');
}

/**
 * Expand a file, directory or glob into a sorted list of absolute file paths.
 */
export async function resolveInputFiles(input: string, include: string, cwd: string): Promise<string[]> {
  const absoluteInput = path.resolve(cwd, input);

  // If input is a directory, expand with the include pattern
  let pattern = toPosix(input);
  try {
    if (fs.existsSync(absoluteInput) && fs.statSync(absoluteInput).isDirectory()) {
      pattern = `${toPosix(input).replace(/\/+$/, '')}/${include}`;
    }
  } catch (error) {
    logger.debug(`Could not stat ${input}: ${getErrorMessage(error)}`);
  }

  const matches = await glob(pattern, { cwd, absolute: true, nodir: true });
  return [...matches].sort();
}

export async function extractFile(filePath: string, config: DocscanConfig): Promise<FunctionRecord[]> {
  const text = await fs.promises.readFile(filePath, 'utf8');
  return sortRecords(extractFunctionsFromText(text, config.engine), config.sort);
}

async function writeJson(filePath: string, value: unknown): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  await fs.promises.writeFile(filePath, JSON.stringify(value, null, 2) + '\n', 'utf8');
}

export async function extractCommand(input: string, options: ExtractOptions = {}): Promise<ExtractionDocument> {
  const cwd = options.cwd ?? process.cwd();
  logger.setQuiet(options.quiet ?? false);

  const config = await loadConfig(
    {
      privatePrefix: options.privatePrefix,
      lookahead: options.lookahead,
      defaultReturn: options.defaultReturn,
      include: options.include,
      sort: options.sort,
    },
    { configPath: options.config, cwd }
  );

  const files = await resolveInputFiles(input, config.include, cwd);
  if (files.length === 0) {
    throw new Error(`No files found matching pattern: ${input}`);
  }

  logger.section('Extracting Annotations');
  logger.info(`Found ${files.length} file(s)`);

  const document: ExtractionDocument = { files: [] };
  const failed: string[] = [];

  for (let i = 0; i < files.length; i++) {
    const file = files[i];
    const relative = toPosix(path.relative(cwd, file));
    logger.progress(i + 1, files.length, relative);

    try {
      const functions = await extractFile(file, config);
      logger.debug(`  ${functions.length} function(s) in ${relative}`);
      document.files.push({ file: relative, functions });
    } catch (error) {
      logger.error(`Failed to read ${relative}: ${getErrorMessage(error)}`);
      failed.push(relative);
    }
  }

  if (options.outDir) {
    const outDir = path.resolve(cwd, options.outDir);
    for (const entry of document.files) {
      const target = path.join(outDir, entry.file.replace(/\.[^./]+$/, '') + '.json');
      await writeJson(target, entry);
    }
    logger.success(`Wrote ${document.files.length} file(s) to ${options.outDir}`);
  }

  if (options.output) {
    await writeJson(path.resolve(cwd, options.output), document);
    logger.success(`Wrote ${options.output}`);
  } else if (!options.outDir) {
    process.stdout.write(JSON.stringify(document, null, 2) + '\n');
  }

  const total = document.files.reduce((sum, entry) => sum + entry.functions.length, 0);
  logger.info(`Extracted ${total} function(s) from ${document.files.length} file(s)`);

  if (failed.length > 0) {
    throw new Error(`${failed.length} file(s) could not be read: ${failed.join(', ')}`);
  }

  return document;
}
