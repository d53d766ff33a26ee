/**
 * Configuration loader
 *
 * Loads configuration from files, environment variables, and CLI arguments,
 * merging them in order of precedence.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as YAML from 'js-yaml';
import { z } from 'zod';
import { ConfigurationError } from './ConfigurationError.js';
import { formatIssues, resolveEngineConfig, type EngineConfig } from './engine-config.js';
import { SORT_MODES, type SortMode } from '../sorting/hierarchical.js';
import { getErrorMessage } from '../utils/error-utils.js';

/**
 * Configuration file names to search for
 */
export const CONFIG_FILE_NAMES = ['docscan.config.yaml', 'docscan.config.yml', 'docscan.config.json'];

/**
 * Environment variable prefix
 */
const ENV_PREFIX = 'DOCSCAN_';

export const DEFAULT_INCLUDE = '**/*.lua';
export const DEFAULT_SORT: SortMode = 'source';

export interface DocscanConfig {
  engine: EngineConfig;
  /** Glob applied inside a directory input */
  include: string;
  sort: SortMode;
}

export const fileConfigSchema = z
  .object({
    privatePrefix: z.string(),
    lookahead: z.number(),
    defaultReturnType: z.string(),
    defaultParamType: z.string(),
    defaultCodeLang: z.string(),
    include: z.string().min(1, 'include must not be empty'),
    sort: z.enum(SORT_MODES),
  })
  .partial()
  .strict();

export interface CliConfigOverrides {
  privatePrefix?: string;
  lookahead?: number;
  defaultReturn?: string;
  include?: string;
  sort?: string;
}

export interface LoadConfigOptions {
  /** Explicit config file; an error if it does not exist */
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load configuration with the following precedence (highest to lowest):
 * 1. CLI arguments
 * 2. Environment variables
 * 3. Config file
 * 4. Default values
 *
 * @throws ConfigurationError for unreadable files or invalid values
 */
export async function loadConfig(
  cliOverrides: CliConfigOverrides = {},
  options: LoadConfigOptions = {}
): Promise<DocscanConfig> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  const fileConfig = await loadConfigFile(cwd, options.configPath);
  const merged: Record<string, unknown> = {
    ...fileConfig,
    ...loadEnvConfig(env),
    ...convertCliOverrides(cliOverrides),
  };

  return validateConfig(merged, options.configPath);
}

/**
 * Validate a merged, still untyped configuration object.
 */
export function validateConfig(merged: Record<string, unknown>, source?: string): DocscanConfig {
  const parsed = fileConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, issues, source);
  }

  const { include, sort, ...engineOptions } = parsed.data;
  return {
    engine: resolveEngineConfig(engineOptions),
    include: include ?? DEFAULT_INCLUDE,
    sort: sort ?? DEFAULT_SORT,
  };
}

/**
 * Load configuration from file
 */
async function loadConfigFile(cwd: string, configPath?: string): Promise<Record<string, unknown>> {
  // If a specific path is provided, it must exist
  if (configPath) {
    const absolutePath = path.resolve(cwd, configPath);
    if (!fs.existsSync(absolutePath)) {
      throw new ConfigurationError(`Config file not found: ${configPath}`, [], configPath);
    }
    return loadConfigFromPath(absolutePath);
  }

  // Search for config file in the working directory
  for (const fileName of CONFIG_FILE_NAMES) {
    const configFilePath = path.join(cwd, fileName);
    if (fs.existsSync(configFilePath)) {
      return loadConfigFromPath(configFilePath);
    }
  }

  return {};
}

/**
 * Load configuration from a specific file path
 */
async function loadConfigFromPath(filePath: string): Promise<Record<string, unknown>> {
  let content: unknown;
  try {
    const text = await fs.promises.readFile(filePath, 'utf8');
    content = path.extname(filePath) === '.json' ? JSON.parse(text) : YAML.load(text);
  } catch (error) {
    throw new ConfigurationError(`Failed to read config file ${filePath}: ${getErrorMessage(error)}`, [], filePath);
  }

  // An empty YAML document loads as undefined
  if (content === undefined || content === null) {
    return {};
  }
  if (typeof content !== 'object' || Array.isArray(content)) {
    throw new ConfigurationError(`Config file ${filePath} must contain a mapping`, [], filePath);
  }
  return { ...content };
}

/**
 * Load configuration from environment variables
 */
function loadEnvConfig(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  const privatePrefix = env[`${ENV_PREFIX}PRIVATE_PREFIX`];
  const lookahead = env[`${ENV_PREFIX}LOOKAHEAD`];
  const defaultReturn = env[`${ENV_PREFIX}DEFAULT_RETURN`];
  const include = env[`${ENV_PREFIX}INCLUDE`];
  const sort = env[`${ENV_PREFIX}SORT`];

  if (privatePrefix) config.privatePrefix = privatePrefix;
  if (lookahead) config.lookahead = Number(lookahead);
  if (defaultReturn) config.defaultReturnType = defaultReturn;
  if (include) config.include = include;
  if (sort) config.sort = sort;

  return config;
}

/**
 * Convert CLI overrides to config format
 */
function convertCliOverrides(overrides: CliConfigOverrides): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  if (overrides.privatePrefix !== undefined) config.privatePrefix = overrides.privatePrefix;
  if (overrides.lookahead !== undefined) config.lookahead = overrides.lookahead;
  if (overrides.defaultReturn !== undefined) config.defaultReturnType = overrides.defaultReturn;
  if (overrides.include !== undefined) config.include = overrides.include;
  if (overrides.sort !== undefined) config.sort = overrides.sort;

  return config;
}
