/**
 * Pastebin error types.
 *
 * Every failure raised by the client is a {@link PastebinError}. Subclasses
 * separate transport failures from service-level rejections so callers can
 * branch on `instanceof` or on {@link PastebinErrorCode}.
 */

/**
 * Error codes for Pastebin errors.
 */
export enum PastebinErrorCode {
  Transport = 'TRANSPORT_ERROR',
  Authentication = 'AUTHENTICATION_ERROR',
  Validation = 'VALIDATION_ERROR',
  Api = 'API_ERROR',
  Parse = 'PARSE_ERROR',
  Configuration = 'CONFIGURATION_ERROR',
}

/**
 * Prefix the service puts in front of every plain-text error body.
 */
export const BAD_API_REQUEST_PREFIX = 'Bad API request';

/**
 * Base Pastebin error class.
 */
export class PastebinError extends Error {
  /** Error code */
  readonly code: PastebinErrorCode;
  /** HTTP status code (if applicable) */
  readonly statusCode?: number;
  /** Additional error details */
  readonly details?: Record<string, unknown>;

  constructor(options: {
    code: PastebinErrorCode;
    message: string;
    statusCode?: number;
    details?: Record<string, unknown>;
    cause?: unknown;
  }) {
    super(options.message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'PastebinError';
    this.code = options.code;
    this.statusCode = options.statusCode;
    this.details = options.details;
  }

  /**
   * Creates a JSON representation of the error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      details: this.details,
    };
  }
}

// ============================================================================
// Transport Errors
// ============================================================================

/**
 * Non-2xx HTTP status, connection failure or timeout.
 */
export class TransportError extends PastebinError {
  constructor(
    message: string,
    options: { statusCode?: number; body?: string; cause?: unknown } = {}
  ) {
    super({
      code: PastebinErrorCode.Transport,
      message,
      statusCode: options.statusCode,
      details: options.body !== undefined ? { body: options.body } : undefined,
      cause: options.cause,
    });
    this.name = 'TransportError';
  }

  /**
   * Builds the error for an unsuccessful HTTP status.
   */
  static fromStatus(operation: string, statusCode: number, body: string): TransportError {
    return new TransportError(`${operation} failed: HTTP ${statusCode} - ${body.trim()}`, {
      statusCode,
      body,
    });
  }
}

// ============================================================================
// Service Errors
// ============================================================================

/**
 * Login rejected by the service, or no user session key available.
 */
export class AuthenticationError extends PastebinError {
  constructor(message: string) {
    super({
      code: PastebinErrorCode.Authentication,
      message,
    });
    this.name = 'AuthenticationError';
  }
}

/**
 * The service answered with a text body that signals failure.
 */
export class ApiError extends PastebinError {
  /** Operation that received the body */
  readonly operation: string;
  /** Raw response body */
  readonly body: string;

  constructor(operation: string, body: string, message?: string) {
    super({
      code: PastebinErrorCode.Api,
      message: message ?? `${operation} failed: ${body.trim()}`,
      details: { operation, body },
    });
    this.name = 'ApiError';
    this.operation = operation;
    this.body = body;
  }
}

/**
 * XML was expected but the body is malformed or lacks required elements.
 */
export class ParseError extends PastebinError {
  constructor(message: string, cause?: unknown) {
    super({
      code: PastebinErrorCode.Parse,
      message,
      cause,
    });
    this.name = 'ParseError';
  }
}

// ============================================================================
// Caller Errors
// ============================================================================

/**
 * Caller-supplied value outside its allowed set. Raised before any request.
 */
export class ValidationError extends PastebinError {
  /** Offending field */
  readonly field: string;

  constructor(field: string, message: string, details?: Record<string, unknown>) {
    super({
      code: PastebinErrorCode.Validation,
      message,
      details: { field, ...details },
    });
    this.name = 'ValidationError';
    this.field = field;
  }

  /**
   * Builds the error for a value missing from an enumeration.
   */
  static notAllowed(field: string, value: unknown): ValidationError {
    return new ValidationError(field, `Invalid ${field}: ${String(value)}`, { value });
  }
}

/**
 * Invalid client configuration.
 */
export class ConfigurationError extends PastebinError {
  constructor(message: string, issues?: string[]) {
    super({
      code: PastebinErrorCode.Configuration,
      message: `Configuration error: ${message}`,
      details: issues ? { issues } : undefined,
    });
    this.name = 'ConfigurationError';
  }
}

// ============================================================================
// Utilities
// ============================================================================

/**
 * Checks if an error is a Pastebin error.
 */
export function isPastebinError(error: unknown): error is PastebinError {
  return error instanceof PastebinError;
}

/**
 * Checks whether a response body is one of the service's error messages.
 */
export function isBadApiRequest(body: string): boolean {
  return body.trimStart().startsWith(BAD_API_REQUEST_PREFIX);
}
