/**
 * Error codes for different error scenarios
 */
export enum ErrorCode {
  // Credential source errors
  IO_ERROR = 'IO_ERROR',
  FORMAT_ERROR = 'FORMAT_ERROR',
  EMPTY_RESULT = 'EMPTY_RESULT',

  // Authentication errors
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  AUTH_APPLY_FAILED = 'AUTH_APPLY_FAILED',

  // File system errors
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',
  PERMISSION_DENIED = 'PERMISSION_DENIED',

  // Generic
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

export type ErrorDetails = Record<string, string | number | boolean | undefined>;

/**
 * Custom application error class with error codes and recovery hints
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: ErrorCode,
    public details?: ErrorDetails
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert to user-friendly message
   */
  toUserMessage(): string {
    switch (this.code) {
      case ErrorCode.IO_ERROR:
        return `Could not read credential file: ${this.details?.path ?? 'unknown'}`;

      case ErrorCode.FORMAT_ERROR:
      case ErrorCode.EMPTY_RESULT:
      case ErrorCode.VALIDATION_ERROR:
        return this.message;

      case ErrorCode.AUTH_APPLY_FAILED:
        return `Could not authenticate request: ${this.message}`;

      case ErrorCode.FILE_NOT_FOUND:
        return `File not found: ${this.details?.path ?? 'unknown'}`;

      case ErrorCode.PERMISSION_DENIED:
        return `Permission denied: ${this.details?.path ?? 'unknown'}`;

      case ErrorCode.INVALID_ARGUMENT:
        return this.message || 'Invalid argument. Please check your input.';

      default:
        return this.message || 'An unknown error occurred.';
    }
  }

  /**
   * Get recovery suggestion for the error
   */
  getRecoverySuggestion(): string | null {
    switch (this.code) {
      case ErrorCode.IO_ERROR:
      case ErrorCode.FILE_NOT_FOUND:
        return 'Check that the file path is correct and readable';

      case ErrorCode.PERMISSION_DENIED:
        return 'Check file permissions or try running with appropriate privileges';

      case ErrorCode.FORMAT_ERROR:
        return this.details?.path
          ? 'Headers files use "Name: value" lines, cookies files use "name=value" lines'
          : null;

      case ErrorCode.EMPTY_RESULT:
        return 'Add at least one entry, or drop the file option';

      case ErrorCode.VALIDATION_ERROR:
        return 'Use only one of --auth-bearer, --auth-basic, --auth-header and make sure its value is not empty';

      default:
        return null;
    }
  }
}

/**
 * Credential file could not be opened or read
 */
export class CredentialIOError extends AppError {
  public readonly path: string;

  constructor(path: string, cause: string) {
    super(`failed to read ${path}: ${cause}`, ErrorCode.IO_ERROR, { path, cause });
    this.name = 'CredentialIOError';
    this.path = path;
  }
}

/**
 * A line (or a whole inline string) violates its credential grammar
 */
export class CredentialFormatError extends AppError {
  public readonly line?: number;

  constructor(message: string, options: { path?: string; line?: number; text?: string } = {}) {
    super(message, ErrorCode.FORMAT_ERROR, { ...options });
    this.name = 'CredentialFormatError';
    this.line = options.line;
  }
}

/**
 * A credential file parsed cleanly but yielded no entries
 */
export class EmptyCredentialsError extends AppError {
  constructor(message: string, path: string) {
    super(message, ErrorCode.EMPTY_RESULT, { path });
    this.name = 'EmptyCredentialsError';
  }
}

/**
 * Auth configuration is inconsistent with its declared type
 */
export class AuthValidationError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, ErrorCode.VALIDATION_ERROR, details);
    this.name = 'AuthValidationError';
  }
}
