/**
 * @module @asset-session/contracts/errors
 *
 * Error types shared by hosts, the session runtime and manager plugins.
 */

/**
 * Error codes enum for type safety
 */
export const ErrorCode = {
  INVALID_INPUT: 'INVALID_INPUT',
  MANAGER_ERROR: 'MANAGER_ERROR',
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Serialized error, e.g. for reporting back to a host UI
 */
export interface SerializedError {
  name: string;
  message: string;
  code: ErrorCodeType;
  details?: Record<string, unknown>;
  stack?: string;
}

/**
 * Base session error class
 */
export class SessionError extends Error {
  /**
   * Error code for programmatic handling
   */
  public readonly code: ErrorCodeType;

  /**
   * Additional error details
   */
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: ErrorCodeType, details?: Record<string, unknown>) {
    super(message);
    this.name = 'SessionError';
    this.code = code;
    this.details = details;

    // Ensure prototype chain is correct
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): SerializedError {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
      stack: this.stack,
    };
  }
}

/**
 * Malformed arguments, e.g. a host that does not satisfy HostInterface
 */
export class InvalidInputError extends SessionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCode.INVALID_INPUT, details);
    this.name = 'InvalidInputError';
  }
}

/**
 * Requested manager is not known to the factory
 */
export class ManagerError extends SessionError {
  readonly identifier?: string;

  constructor(message: string, identifier?: string) {
    super(message, ErrorCode.MANAGER_ERROR, identifier === undefined ? undefined : { identifier });
    this.name = 'ManagerError';
    this.identifier = identifier;
  }
}

/**
 * Manager or default-config setup is unusable
 */
export class ConfigurationError extends SessionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCode.CONFIGURATION_ERROR, details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Check if an error is a SessionError
 */
export function isSessionError(error: unknown): error is SessionError {
  return error instanceof SessionError;
}
