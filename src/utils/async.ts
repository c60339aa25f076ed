/**
 * Async utilities for the intake engine
 */

import { TimeoutError } from "./errors.js";

/**
 * Wrap a promise with a timeout
 *
 * The wrapped promise keeps running after the timeout fires; callers that
 * cannot cancel the underlying work only stop waiting for it.
 */
export async function timeout<T>(
  promise: Promise<T>,
  ms: number,
  operation: string = "Operation",
): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(
        new TimeoutError(`${operation} timed out after ${ms}ms`, {
          timeoutMs: ms,
          operation,
        }),
      );
    }, ms);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}

