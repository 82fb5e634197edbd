/**
 * Defines the severity levels for restricted string errors.
 */
export enum ErrorSeverity {
  /** The caller can correct the input and try again */
  Recoverable = 'recoverable',
  /** The operation cannot continue */
  Fatal = 'fatal',
  /** Informational message, not strictly an error */
  Info = 'info',
  /** Warning message */
  Warning = 'warning',
}

/**
 * Base interface for error details.
 * Specific error types should extend this.
 */
export interface BaseErrorDetails {
  [key: string]: unknown;
}

/**
 * Options for creating an OsStringError instance.
 */
export interface OsStringErrorOptions {
  code: string;
  severity: ErrorSeverity;
  details?: BaseErrorDetails;
  cause?: unknown;
}

/**
 * Base class for all restricted string errors.
 * Provides structure for error codes, severity and details.
 */
export class OsStringError extends Error {
  /** A unique code identifying the type of error */
  public readonly code: string;
  /** The severity level of the error */
  public readonly severity: ErrorSeverity;
  /** Additional context-specific details about the error */
  public readonly details?: BaseErrorDetails;

  constructor(message: string, options: OsStringErrorOptions) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.code = options.code;
    this.severity = options.severity;
    this.details = options.details;

    // Standard way to maintain stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Recoverable errors and explicit warnings can be reported as warnings.
   */
  public canBeWarning(): boolean {
    return (
      this.severity === ErrorSeverity.Recoverable ||
      this.severity === ErrorSeverity.Warning
    );
  }

  /**
   * Provides a string representation including code and severity.
   */
  public toString(): string {
    return `[${this.code}] ${this.message} (Severity: ${this.severity})`;
  }

  public toJSON(): Record<string, unknown> {
    const result: Record<string, unknown> = {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.severity,
    };

    if (this.details) {
      result.details = this.details;
    }

    return result;
  }
}
