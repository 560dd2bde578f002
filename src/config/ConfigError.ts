/**
 * Thrown when a configuration file cannot be read or does not match the schema.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
    public readonly filePath?: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }

  static isConfigError(error: unknown): error is ConfigError {
    return error instanceof ConfigError || (error instanceof Error && error.name === 'ConfigError');
  }
}
