import { isErrorType } from './isErrorType.js';

/**
 * Error raised at construction when client settings are invalid.
 * The {@link ValidationError} listing the offending settings is kept as `cause`.
 */
export class ConfigError extends Error {
  /** ConfigError error-name */
  override name = 'ConfigError';
}

/**
 * Type guard for {@link ConfigError}.
 */
export function isConfigError(error: unknown): error is ConfigError {
  return isErrorType(ConfigError, error);
}
