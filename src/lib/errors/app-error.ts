/**
 * Application Error Types
 *
 * Centralized error handling with typed error codes and safe messages.
 * Safe messages are user-facing and do not expose sensitive data
 * (API keys, prompts, stored user facts).
 */

export type AppErrorCode =
  | 'VALIDATION_ERROR'
  | 'CONFIG_ERROR'
  | 'ONTOLOGY_INVALID'
  | 'STORE_ERROR'
  | 'LLM_ERROR'
  | 'TIMEOUT'
  | 'CONSTRAINTS_UNAVAILABLE'
  | 'OVERRIDE_CHECK_FAILED';

/**
 * Application Error
 *
 * Extends Error with a typed error code and safe user-facing message.
 */
export class AppError extends Error {
  public readonly code: AppErrorCode;
  public readonly safeMessage: string;
  /** Optional payload for observability (e.g. timeoutMs, namespace) */
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
    } else if (
      causeOrDetails &&
      typeof causeOrDetails === 'object' &&
      !Array.isArray(causeOrDetails)
    ) {
      this.details = { ...causeOrDetails };
    } else if (causeOrDetails) {
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

/**
 * Normalize anything thrown into a message string for logs
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
