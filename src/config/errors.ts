/**
 * Configuration error classes
 *
 * These are the only failures that end a run; everything that goes wrong
 * with an individual manifest becomes an outcome instead.
 */

/**
 * Base error class for configuration failures
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }

  /**
   * Get a user-friendly formatted error message
   */
  toUserMessage(): string {
    let msg = `Error: ${this.message}`;
    if (this.suggestion) {
      msg += `\n\nSuggestion: ${this.suggestion}`;
    }
    return msg;
  }
}

/**
 * Error thrown when the addons root or feed root does not exist
 */
export class RootNotFoundError extends ConfigError {
  constructor(
    public readonly root: 'addons' | 'feed',
    public readonly path: string
  ) {
    const flag = root === 'addons' ? '--addons-root' : '--feed-root';
    super(
      `${root === 'addons' ? 'Addons' : 'Feed'} root not found: ${path}`,
      'ROOT_NOT_FOUND',
      `Check the path or pass ${flag} <dir>`
    );
    this.name = 'RootNotFoundError';
  }
}

/**
 * Error thrown when the destination root cannot be created in apply mode
 */
export class DestinationRootError extends ConfigError {
  constructor(
    public readonly path: string,
    public readonly cause?: Error
  ) {
    super(
      `Could not create destination root ${path}${cause ? `: ${cause.message}` : ''}`,
      'DEST_ROOT_UNAVAILABLE',
      'Check permissions on the destination drive or pass --dest-root <dir>'
    );
    this.name = 'DestinationRootError';
  }
}

/**
 * Error thrown when a setting has an unusable value
 */
export class InvalidSettingError extends ConfigError {
  constructor(
    public readonly setting: string,
    public readonly value: unknown,
    reason: string
  ) {
    super(`Invalid value for ${setting}: ${JSON.stringify(value)} (${reason})`, 'INVALID_SETTING');
    this.name = 'InvalidSettingError';
  }
}

/**
 * Error thrown when the YAML config file cannot be read or parsed
 */
export class ConfigFileError extends ConfigError {
  constructor(
    public readonly path: string,
    public readonly cause?: Error
  ) {
    super(
      `Failed to load config file ${path}${cause ? `: ${cause.message}` : ''}`,
      'CONFIG_FILE_ERROR',
      'Ensure the file exists and is a YAML mapping'
    );
    this.name = 'ConfigFileError';
  }
}

/**
 * Type guard to check if an error is a ConfigError
 */
export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

/**
 * Format any error into a user-friendly message
 */
export function formatError(error: unknown): string {
  if (isConfigError(error)) {
    return error.toUserMessage();
  }
  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }
  return `Error: ${String(error)}`;
}
