/**
 * Configuration Error Classes
 */

/**
 * Base class for every failure while loading server configuration
 */
export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/**
 * The file could not be found, read or parsed, or an environment variable it
 * needs is missing
 */
export class ConfigLoadError extends ConfigError {
  constructor(message: string, public readonly path?: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ConfigLoadError';
    Object.setPrototypeOf(this, ConfigLoadError.prototype);
  }
}

/**
 * A value is present but unusable; `field` is its dotted path
 */
export class ConfigValidationError extends ConfigError {
  constructor(
    message: string,
    public readonly field: string,
    public readonly value: unknown,
    public readonly expectedType?: string
  ) {
    super(message);
    this.name = 'ConfigValidationError';
    Object.setPrototypeOf(this, ConfigValidationError.prototype);
  }
}
