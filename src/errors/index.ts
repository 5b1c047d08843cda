export { AppError, type ErrorCategory, type ErrorCode, type ErrorPayload, type AppErrorOptions } from './AppError.js';
export { mapError, sanitizeForLogging, isAbortError } from './mapError.js';
