/**
 * Shared async utilities.
 * @module
 */

/** Largest delay setTimeout/setInterval honour; longer ones fire after 1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Race `promise` against a timer. On expiry the returned promise resolves to
 * `onTimeout()` instead of rejecting; the timer is always cleared.
 *
 * The original promise is not cancelled. If it rejects after the timer has
 * already won, the error goes to `onLateRejection` (when given) and is
 * otherwise discarded together with any late result.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: () => T,
  onLateRejection?: (error: unknown) => void,
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  let timedOut = false;

  const timeout = new Promise<T>((resolve) => {
    timer = setTimeout(() => {
      timedOut = true;
      resolve(onTimeout());
    }, timeoutMs);
  });

  promise.catch((error: unknown) => {
    if (timedOut) onLateRejection?.(error);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    if (timer !== undefined) clearTimeout(timer);
  }
}
