import { z } from 'zod';
import { AppError } from './AppError.js';

function errorCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

/**
 * Check if an error is an OpenAI API error.
 * OpenAI SDK errors have specific properties we can check.
 */
function isOpenAiError(error: unknown): error is Error & {
  status?: number;
  code?: string | null;
  type?: string;
} {
  if (!(error instanceof Error)) return false;
  const name = error.name;
  return (
    name === 'APIError' ||
    name === 'BadRequestError' ||
    name === 'AuthenticationError' ||
    name === 'PermissionDeniedError' ||
    name === 'NotFoundError' ||
    name === 'ConflictError' ||
    name === 'UnprocessableEntityError' ||
    name === 'RateLimitError' ||
    name === 'InternalServerError' ||
    name === 'APIConnectionError' ||
    name === 'APITimeoutError' ||
    name === 'APIConnectionTimeoutError' ||
    name === 'APIUserAbortError'
  );
}

/**
 * Check if an error is an abort error (from AbortController).
 */
export function isAbortError(error: unknown): boolean {
  if (error instanceof Error) {
    const code = errorCode(error);
    return (
      error.name === 'AbortError' ||
      error.name === 'TimeoutError' ||
      code === 'ABORT_ERR' ||
      code === 'ERR_ABORTED'
    );
  }
  return false;
}

/**
 * Map an unknown error to an AppError.
 * This function handles errors from various sources:
 * - Zod validation errors
 * - OpenAI SDK errors
 * - Timeout/abort errors
 * - Generic errors
 */
export function mapError(error: unknown): AppError {
  // Already an AppError - return as-is
  if (error instanceof AppError) {
    return error;
  }

  // Zod validation errors
  if (error instanceof z.ZodError) {
    const messages = error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    );
    return AppError.validation(messages.join(', '), {
      issues: error.issues.map((issue) => ({
        path: issue.path,
        message: issue.message,
        code: issue.code,
      })),
    }, error);
  }

  // Handle non-Error objects
  if (!(error instanceof Error)) {
    const message = typeof error === 'string' ? error : 'Unknown error';
    return AppError.internal(message);
  }

  // OpenAI SDK errors
  if (isOpenAiError(error)) {
    const status = error.status;
    const code = error.code;

    if (error.name === 'RateLimitError' || status === 429) {
      return AppError.openaiRateLimit(error);
    }

    // APITimeoutError is thrown when the request times out,
    // APIUserAbortError when our own AbortSignal fired
    if (
      error.name === 'APITimeoutError' ||
      error.name === 'APIConnectionTimeoutError' ||
      error.name === 'APIUserAbortError'
    ) {
      return AppError.openaiTimeout(undefined, error);
    }

    if (error.name === 'APIConnectionError') {
      const message = error.message.toLowerCase();
      if (message.includes('timed out') || message.includes('timeout')) {
        return AppError.openaiTimeout(undefined, error);
      }
      return AppError.openai('Connection to OpenAI failed', { code }, error);
    }

    if (error.name === 'AuthenticationError' || status === 401) {
      return AppError.openai('OpenAI authentication failed', { status, code }, error);
    }

    if (error.name === 'InternalServerError' || (status && status >= 500)) {
      return AppError.openai('OpenAI service error', { status, code }, error);
    }

    return AppError.openai(error.message, { status, code, type: error.type }, error);
  }

  // Abort/timeout errors
  if (isAbortError(error)) {
    return AppError.timeout('request', 0, error);
  }

  // Generic error fallback
  return AppError.internal(error.message, error);
}

/**
 * Sanitize error details for logging.
 * Removes sensitive information like tokens and secrets.
 */
export function sanitizeForLogging(
  details: Record<string, unknown> | undefined
): Record<string, unknown> | undefined {
  if (!details) return undefined;

  const sanitized: Record<string, unknown> = {};
  const sensitiveKeys = [
    'token',
    'secret',
    'password',
    'apikey',
    'api_key',
    'authorization',
    'bearer',
    'credential',
  ];

  for (const [key, value] of Object.entries(details)) {
    const lowerKey = key.toLowerCase();
    const isSensitive = sensitiveKeys.some((sk) => lowerKey.includes(sk));

    if (isSensitive) {
      sanitized[key] = '[REDACTED]';
    } else if (typeof value === 'string' && value.length > 500) {
      sanitized[key] = value.substring(0, 500) + '...[truncated]';
    } else if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
      sanitized[key] = sanitizeForLogging(toRecord(value));
    } else {
      sanitized[key] = value;
    }
  }

  return sanitized;
}

function toRecord(value: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value));
}
