/**
 * Error thrown when engine or CLI configuration is invalid.
 * Raised before any parsing begins; the engine raises nothing else.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
    public readonly source?: string
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }

  static isConfigurationError(error: unknown): error is ConfigurationError {
    return (
      error instanceof ConfigurationError ||
      (error instanceof Error &&
        error.name === 'ConfigurationError' &&
        'issues' in error &&
        Array.isArray(error.issues))
    );
  }
}
