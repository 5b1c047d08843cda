/**
 * Error envelope for client-safe, consistent error responses.
 * Clients use error.category + retryable to decide "retry vs rephrase".
 */

import { z } from 'zod';
import type { AppError, ErrorCategory } from '../errors/AppError.js';

export type ErrorEnvelopeCategory = 'validation' | 'not_found' | 'upstream' | 'internal';

/**
 * Zod schema for the error envelope.
 * This is the stable contract for error responses.
 */
export const errorEnvelopeSchema = z.object({
  category: z.enum(['validation', 'not_found', 'upstream', 'internal']),
  code: z.string(),
  message: z.string(),
  retryable: z.boolean(),
  requestId: z.string().optional(),
  details: z.record(z.string(), z.unknown()).optional(),
});

export type ErrorEnvelope = z.infer<typeof errorEnvelopeSchema>;

/**
 * Maps internal ErrorCategory to the client-facing ErrorEnvelopeCategory.
 *
 * Mapping:
 * - VALIDATION -> validation (rephrase)
 * - NOT_FOUND -> not_found
 * - OPENAI, CATALOG, TIMEOUT -> upstream
 * - INTERNAL -> internal
 */
export function mapCategoryToEnvelope(category: ErrorCategory): ErrorEnvelopeCategory {
  switch (category) {
    case 'VALIDATION':
      return 'validation';
    case 'NOT_FOUND':
      return 'not_found';
    case 'OPENAI':
    case 'CATALOG':
    case 'TIMEOUT':
      return 'upstream';
    case 'INTERNAL':
    default:
      return 'internal';
  }
}

export function isRetryable(category: ErrorCategory, code: string): boolean {
  switch (category) {
    case 'TIMEOUT':
    case 'CATALOG':
      return true;
    case 'OPENAI':
      return code === 'OPENAI_RATE_LIMIT' || code === 'OPENAI_TIMEOUT';
    case 'VALIDATION':
    case 'NOT_FOUND':
    case 'INTERNAL':
    default:
      return false;
  }
}

const SENSITIVE_PATTERNS = [
  /token/i,
  /secret/i,
  /password/i,
  /apikey/i,
  /api_key/i,
  /authorization/i,
  /bearer/i,
  /credential/i,
];

/**
 * Ensures a message is safe for client consumption.
 * Messages mentioning anything secret-like are replaced by a generic one.
 */
export function ensureSafeMessage(message: string): string {
  for (const pattern of SENSITIVE_PATTERNS) {
    if (pattern.test(message)) {
      return 'An error occurred. Please try again.';
    }
  }

  if (message.length > 500) {
    return message.substring(0, 497) + '...';
  }

  return message;
}

/**
 * Sanitizes details object for client consumption.
 * Removes sensitive fields and truncates long values.
 */
export function sanitizeDetails(
  details: Record<string, unknown> | undefined,
  includeDetails: boolean
): Record<string, unknown> | undefined {
  if (!details || !includeDetails) {
    return undefined;
  }

  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(details)) {
    const isSensitive = SENSITIVE_PATTERNS.some(pattern => pattern.test(key));
    if (isSensitive) {
      continue;
    }

    if (typeof value === 'string' && value.length > 200) {
      sanitized[key] = value.substring(0, 197) + '...';
    } else if (typeof value === 'object' && value !== null) {
      // Shallow: nested objects are not forwarded
      sanitized[key] = '[object]';
    } else {
      sanitized[key] = value;
    }
  }

  return Object.keys(sanitized).length > 0 ? sanitized : undefined;
}

/**
 * Converts an AppError to a client-safe ErrorEnvelope.
 *
 * @param includeDetails - Whether to include details (typically only in debug mode)
 */
export function appErrorToEnvelope(
  appError: AppError,
  requestId?: string,
  includeDetails = false
): ErrorEnvelope {
  const envelope: ErrorEnvelope = {
    category: mapCategoryToEnvelope(appError.category),
    code: appError.code,
    message: ensureSafeMessage(appError.safeMessage),
    retryable: isRetryable(appError.category, appError.code),
  };

  if (requestId) {
    envelope.requestId = requestId;
  }

  const details = sanitizeDetails(appError.details, includeDetails);
  if (details) {
    envelope.details = details;
  }

  return envelope;
}
