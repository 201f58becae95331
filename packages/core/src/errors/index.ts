import { CritiqueErrorCode } from './codes.js';

// Re-export for consumers
export { CritiqueErrorCode } from './codes.js';

/**
 * Base error class for all Critique-specific errors
 */
export class CritiqueError extends Error {
  constructor(
    message: string,
    public readonly code: CritiqueErrorCode,
    public readonly context?: Record<string, unknown>,
    public readonly recoverable: boolean = false,
  ) {
    super(message);
    this.name = 'CritiqueError';

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for CLI output
   */
  toJSON() {
    return {
      error: this.message,
      code: this.code,
      recoverable: this.recoverable,
      context: this.context,
    };
  }
}

/**
 * Input rejected before pre-analysis (oversized, unsupported language)
 */
export class InputInvalidError extends CritiqueError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, CritiqueErrorCode.INPUT_INVALID, context, false);
    this.name = 'InputInvalidError';
  }
}

/**
 * The LLM collaborator timed out or failed in transport/auth
 */
export class AIUnavailableError extends CritiqueError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, CritiqueErrorCode.AI_UNAVAILABLE, context, false);
    this.name = 'AIUnavailableError';
  }
}

/**
 * The LLM answered but nothing structured could be recovered from the answer
 */
export class AIResponseMalformedError extends CritiqueError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, CritiqueErrorCode.AI_RESPONSE_MALFORMED, context, true);
    this.name = 'AIResponseMalformedError';
  }
}

/**
 * Configuration-related errors (values, files)
 */
export class ConfigError extends CritiqueError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, CritiqueErrorCode.CONFIG_INVALID, context, false);
    this.name = 'ConfigError';
  }
}

/**
 * Type guard to check if an error is a CritiqueError
 */
export function isCritiqueError(error: unknown): error is CritiqueError {
  return error instanceof CritiqueError;
}

/**
 * Extract error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
