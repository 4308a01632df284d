/**
 * Login failed or a call was made without a session. Fatal to the run.
 */
export class AuthenticationError extends Error {
  constructor(message: string = "Failed to authenticate with Garmin Connect") {
    super(message);
    this.name = "AuthenticationError";
  }
}

/**
 * Invalid command-line or environment input
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * The persisted store exists but cannot be read back
 */
export class StoreError extends Error {
  readonly filePath: string;

  constructor(filePath: string, message: string) {
    super(`${filePath}: ${message}`);
    this.name = "StoreError";
    this.filePath = filePath;
  }
}

export function isAuthenticationError(error: unknown): error is AuthenticationError {
  return error instanceof AuthenticationError;
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  return new Error(String(error));
}
