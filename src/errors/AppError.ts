/**
 * Error categories for the application.
 * These categories provide actionable classification of errors.
 */
export type ErrorCategory =
  | 'OPENAI'
  | 'CATALOG'
  | 'VALIDATION'
  | 'NOT_FOUND'
  | 'TIMEOUT'
  | 'INTERNAL';

/**
 * Error codes for more specific error identification.
 * Format: CATEGORY_SPECIFIC_ERROR
 */
export type ErrorCode =
  | 'OPENAI_API_ERROR'
  | 'OPENAI_RATE_LIMIT'
  | 'OPENAI_EMPTY_RESPONSE'
  | 'OPENAI_TIMEOUT'
  | 'CATALOG_LOAD_FAILED'
  | 'VALIDATION_REQUEST_INVALID'
  | 'VALIDATION_QUESTION_TOO_SHORT'
  | 'VALIDATION_QUESTION_TOO_LONG'
  | 'NOT_FOUND_PHONE'
  | 'TIMEOUT_OPERATION'
  | 'INTERNAL_ERROR';

/**
 * Options for creating an AppError.
 */
export interface AppErrorOptions {
  category: ErrorCategory;
  code: ErrorCode;
  httpStatus: number;
  safeMessage: string;
  details?: Record<string, unknown>;
  cause?: Error;
}

/**
 * Structured error response payload for API responses.
 */
export interface ErrorPayload {
  error: {
    category: ErrorCategory;
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
  requestId?: string;
}

/**
 * AppError is the base error class for all application errors.
 * It provides structured error information with category, code, HTTP status,
 * and a safe message suitable for client responses.
 */
export class AppError extends Error {
  readonly category: ErrorCategory;
  readonly code: ErrorCode;
  readonly httpStatus: number;
  readonly safeMessage: string;
  readonly details?: Record<string, unknown>;
  override readonly cause?: Error;

  constructor(options: AppErrorOptions) {
    super(options.safeMessage);
    this.name = 'AppError';
    this.category = options.category;
    this.code = options.code;
    this.httpStatus = options.httpStatus;
    this.safeMessage = options.safeMessage;
    this.details = options.details;
    this.cause = options.cause;

    Object.setPrototypeOf(this, AppError.prototype);
  }

  /**
   * Convert the error to a structured payload for API responses.
   */
  toPayload(requestId?: string): ErrorPayload {
    const payload: ErrorPayload = {
      error: {
        category: this.category,
        code: this.code,
        message: this.safeMessage,
      },
    };

    if (this.details && Object.keys(this.details).length > 0) {
      payload.error.details = this.details;
    }

    if (requestId) {
      payload.requestId = requestId;
    }

    return payload;
  }

  /**
   * Create a validation error for invalid request data.
   */
  static validation(
    message: string,
    details?: Record<string, unknown>,
    cause?: Error
  ): AppError {
    return new AppError({
      category: 'VALIDATION',
      code: 'VALIDATION_REQUEST_INVALID',
      httpStatus: 400,
      safeMessage: message,
      details,
      cause,
    });
  }

  static questionTooShort(minChars: number, actualChars: number): AppError {
    return new AppError({
      category: 'VALIDATION',
      code: 'VALIDATION_QUESTION_TOO_SHORT',
      httpStatus: 400,
      safeMessage: `Question must be at least ${minChars} characters`,
      details: { minChars, actualChars },
    });
  }

  static questionTooLong(maxChars: number, actualChars: number): AppError {
    return new AppError({
      category: 'VALIDATION',
      code: 'VALIDATION_QUESTION_TOO_LONG',
      httpStatus: 413,
      safeMessage: 'Question too long',
      details: { maxChars, actualChars },
    });
  }

  /**
   * Create a not-found error for a phone lookup by name.
   */
  static phoneNotFound(modelName: string): AppError {
    return new AppError({
      category: 'NOT_FOUND',
      code: 'NOT_FOUND_PHONE',
      httpStatus: 404,
      safeMessage: `Phone '${modelName}' not found`,
      details: { modelName },
    });
  }

  /**
   * Create a catalog error for a seed file or database that cannot be read.
   */
  static catalogLoad(source: string, message: string, cause?: Error): AppError {
    return new AppError({
      category: 'CATALOG',
      code: 'CATALOG_LOAD_FAILED',
      httpStatus: 503,
      safeMessage: 'The phone catalog is not available.',
      details: { source, originalMessage: message },
      cause,
    });
  }

  /**
   * Create an OpenAI API error.
   */
  static openai(
    message: string,
    details?: Record<string, unknown>,
    cause?: Error
  ): AppError {
    return new AppError({
      category: 'OPENAI',
      code: 'OPENAI_API_ERROR',
      httpStatus: 503,
      safeMessage: 'The AI service is temporarily unavailable. Please try again later.',
      details: { originalMessage: message, ...details },
      cause,
    });
  }

  /**
   * Create an OpenAI rate limit error.
   */
  static openaiRateLimit(cause?: Error): AppError {
    return new AppError({
      category: 'OPENAI',
      code: 'OPENAI_RATE_LIMIT',
      httpStatus: 429,
      safeMessage: 'The AI service is currently busy. Please try again in a moment.',
      cause,
    });
  }

  /**
   * Create an error for a completion that carried no text.
   */
  static openaiEmptyResponse(model: string): AppError {
    return new AppError({
      category: 'OPENAI',
      code: 'OPENAI_EMPTY_RESPONSE',
      httpStatus: 502,
      safeMessage: 'The AI service returned an empty answer.',
      details: { model },
    });
  }

  /**
   * Create an OpenAI timeout error.
   * Used when OpenAI API requests time out (APIConnectionTimeoutError or APITimeoutError).
   */
  static openaiTimeout(
    details?: { elapsedMs?: number; timeoutMs?: number },
    cause?: Error
  ): AppError {
    return new AppError({
      category: 'OPENAI',
      code: 'OPENAI_TIMEOUT',
      httpStatus: 504,
      safeMessage: 'Model took too long to respond. Please retry.',
      details,
      cause,
    });
  }

  /**
   * Create a timeout error for operation timeouts.
   */
  static timeout(operation: string, timeoutMs: number, cause?: Error): AppError {
    return new AppError({
      category: 'TIMEOUT',
      code: 'TIMEOUT_OPERATION',
      httpStatus: 504,
      safeMessage: 'The request took too long to complete. Please try again.',
      details: { operation, timeoutMs },
      cause,
    });
  }

  /**
   * Create an internal error for unexpected failures.
   */
  static internal(message: string, cause?: Error): AppError {
    return new AppError({
      category: 'INTERNAL',
      code: 'INTERNAL_ERROR',
      httpStatus: 500,
      safeMessage: 'An unexpected error occurred. Please try again later.',
      details: { originalMessage: message },
      cause,
    });
  }
}
