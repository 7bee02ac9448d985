/**
 * Application Error Types
 *
 * Centralized error handling with typed error codes and safe messages.
 * Safe messages are user-facing and are returned verbatim by the API routes.
 */

export type AppErrorCode =
  | 'INVALID_INPUT'
  | 'DUPLICATE_NAME'
  | 'INVALID_TYPE'
  | 'INVALID_FIELD'
  | 'DUPLICATE_ITEM'
  | 'NOT_FOUND'
  | 'WRONG_TYPE'
  | 'UNKNOWN_ITEM'
  | 'CIRCULAR_DEPENDENCY'
  | 'QUANTITY_OVERFLOW'
  | 'VALIDATION_ERROR'
  | 'INTERNAL_ERROR';

/**
 * Application Error
 *
 * Extends Error with a typed error code and safe user-facing message.
 */
export class AppError extends Error {
  public readonly code: AppErrorCode;
  public readonly safeMessage: string;
  /** Optional payload for callers (e.g. the offending item name or the cycle path) */
  public readonly details?: Record<string, unknown>;

  constructor(
    code: AppErrorCode,
    safeMessage: string,
    causeOrDetails?: unknown,
  ) {
    super(safeMessage);
    this.name = 'AppError';
    this.code = code;
    this.safeMessage = safeMessage;

    if (causeOrDetails instanceof Error) {
      // Preserve original error as cause (for debugging)
      this.cause = causeOrDetails;
    } else if (isPlainRecord(causeOrDetails)) {
      this.details = causeOrDetails;
    } else if (causeOrDetails !== undefined && causeOrDetails !== null) {
      this.cause = new Error(String(causeOrDetails));
    }
  }

  /**
   * Convert to a plain object for serialization
   */
  toJSON(): {
    code: AppErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      code: this.code,
      message: this.safeMessage,
      ...(this.details && { details: this.details }),
    };
  }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
