/**
 * @module config/engine-config
 *
 * Options accepted by the annotation engine, their defaults, and the
 * validation that runs before any parsing.
 */

import { z } from 'zod';
import { ConfigurationError } from './ConfigurationError.js';

export const DEFAULT_PRIVATE_PREFIX = '__';
export const DEFAULT_LOOKAHEAD = 10;
export const DEFAULT_RETURN_TYPE = 'any';
export const DEFAULT_PARAM_TYPE = 'any';
export const DEFAULT_CODE_LANG = 'lua';

export const engineConfigSchema = z.object({
  privatePrefix: z.string().min(1, 'privatePrefix must not be empty'),
  lookahead: z
    .number()
    .int('lookahead must be an integer')
    .nonnegative('lookahead must not be negative'),
  defaultReturnType: z.string().trim().min(1, 'defaultReturnType must not be empty'),
  defaultParamType: z.string().trim().min(1, 'defaultParamType must not be empty'),
  defaultCodeLang: z
    .string()
    .regex(/^\w+$/, 'defaultCodeLang must be a single word'),
});

export type EngineConfig = Readonly<z.infer<typeof engineConfigSchema>>;

export type EngineOptions = Partial<EngineConfig>;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = Object.freeze({
  privatePrefix: DEFAULT_PRIVATE_PREFIX,
  lookahead: DEFAULT_LOOKAHEAD,
  defaultReturnType: DEFAULT_RETURN_TYPE,
  defaultParamType: DEFAULT_PARAM_TYPE,
  defaultCodeLang: DEFAULT_CODE_LANG,
});

/**
 * Format zod issues as `path: message` lines.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

/**
 * Merge `options` over the defaults and validate the result.
 *
 * @throws ConfigurationError when any option is out of range
 */
export function resolveEngineConfig(options: EngineOptions = {}): EngineConfig {
  const defined = Object.fromEntries(
    Object.entries(options).filter(([, value]) => value !== undefined)
  );
  const parsed = engineConfigSchema.safeParse({ ...DEFAULT_ENGINE_CONFIG, ...defined });
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigurationError(`Invalid engine configuration: ${issues.join('; ')}`, issues);
  }
  return Object.freeze(parsed.data);
}
