/**
 * Defines the severity levels for recscope errors.
 */
export enum ErrorSeverity {
  /** The operation can potentially continue */
  Recoverable = 'recoverable',
  /** The operation cannot continue */
  Fatal = 'fatal',
  /** Informational message, not strictly an error */
  Info = 'info',
  /** Warning message */
  Warning = 'warning',
}

import type { SourceLocation, LoadContext } from '@core/types';
import { formatLocationForError, formatLoadContext } from '@core/utils/locationFormatter';

/**
 * Base shape for error details. Specific error types add their own keys.
 */
export type BaseErrorDetails = Record<string, unknown>;

/**
 * Options for creating a RecscopeError instance.
 */
export interface RecscopeErrorOptions {
  code: string;
  severity: ErrorSeverity;
  details?: BaseErrorDetails;
  sourceLocation?: SourceLocation;
  /** Load-context chain active where the error occurred */
  context?: readonly LoadContext[];
  cause?: unknown;
}

/**
 * Base class for all custom recscope errors.
 * Provides structure for error codes, severity, details, and source location.
 */
export class RecscopeError extends Error {
  /** A unique code identifying the type of error */
  public readonly code: string;
  /** The severity level of the error */
  public readonly severity: ErrorSeverity;
  /** Additional context-specific details about the error */
  public readonly details?: BaseErrorDetails;
  /** Optional source location where the error occurred */
  public readonly sourceLocation?: SourceLocation;
  /** Optional chain of scripts leading to the failing line */
  public readonly context?: readonly LoadContext[];

  constructor(message: string, options: RecscopeErrorOptions) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name; // Set the error name to the class name
    this.code = options.code;
    this.severity = options.severity;
    this.details = options.details;
    this.sourceLocation = options.sourceLocation;
    this.context = options.context;

    // Standard way to maintain stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Provides a string representation including code and severity.
   */
  public toString(): string {
    let result = `[${this.code}] ${this.message}`;

    if (this.context && this.context.length > 1) {
      result += ` at ${formatLoadContext(this.context)}`;
    } else if (this.sourceLocation) {
      result += ` at ${formatLocationForError(this.sourceLocation)}`;
    }

    result += ` (Severity: ${this.severity})`;
    return result;
  }

  /**
   * Serializes the error to JSON with formatted location string.
   */
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

    if (this.sourceLocation) {
      result.sourceLocation = formatLocationForError(this.sourceLocation);
      result.macros = this.sourceLocation.macros;
    }

    if (this.context) {
      result.context = formatLoadContext(this.context);
    }

    return result;
  }
}
