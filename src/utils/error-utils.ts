/**
 * Helpers for turning unknown thrown values into messages.
 */

import { ConfigurationError } from '../config/ConfigurationError.js';

/**
 * Extracts a string message from any error value.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Message lines for display: configuration errors list each issue.
 */
export function describeError(error: unknown): string[] {
  if (ConfigurationError.isConfigurationError(error) && error.issues.length > 1) {
    return [error.message.split(':')[0], ...error.issues.map((issue) => `  - ${issue}`)];
  }
  return [getErrorMessage(error)];
}
