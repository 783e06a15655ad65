/**
 * Custom error classes for better error handling
 */

/**
 * Base error class for application-specific errors
 */
export class AppError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Configuration-related errors (env vars, CLI overrides)
 */
export class ConfigError extends AppError {
  constructor(message: string) {
    super(`Configuration error: ${message}`);
  }
}

/**
 * Network/RPC-related errors
 */
export class NetworkError extends AppError {
  constructor(message: string, public readonly cause?: Error) {
    super(message);
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * Invalid user input
 */
export class ValidationError extends AppError {}

/**
 * No watchlist entry matched the given account and subscriber
 */
export class NotFoundError extends AppError {
  constructor(public readonly accountId: string) {
    super(`Account ${accountId} not found`);
  }
}

export class DuplicateEntryError extends AppError {
  constructor(public readonly accountId: string) {
    super(`Account ${accountId} is already being monitored`);
  }
}
