import { AppError } from '../errors/AppError.js';

/**
 * Wraps an async function with a timeout using AbortController.
 * 
 * The function receives an AbortSignal that should be passed to the SDK call
 * so the request is cancelled when the timeout fires.
 * 
 * @param fn - Async function that receives an AbortSignal and returns a Promise
 * @param ms - Timeout in milliseconds
 * @param label - Label for the operation (used in error messages)
 * @throws AppError with category TIMEOUT if the operation times out
 * 
 * @example
 * ```ts
 * const text = await withTimeout(
 *   (signal) => strategy.generate(context, signal),
 *   15000,
 *   'answer generation'
 * );
 * ```
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  ms: number,
  label: string
): Promise<T> {
  const controller = new AbortController();
  const { signal } = controller;

  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  // Rejects even when fn ignores the signal
  const timeout = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      controller.abort();
      reject(AppError.timeout(label, ms));
    }, ms);
  });

  try {
    return await Promise.race([fn(signal), timeout]);
  } catch (error) {
    // Check if this was an abort due to our timeout
    if (signal.aborted) {
      throw AppError.timeout(label, ms, error instanceof Error ? error : undefined);
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}
