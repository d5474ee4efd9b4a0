import { JobTimeoutError } from "../errors";

/** Largest delay `setTimeout` holds; longer ones fire almost at once. */
export const MAX_TIMER_MS = 2 ** 31 - 1;

/**
 * Races `operation` against a timer. When the timer wins, the signal handed to `operation` is
 * aborted and the returned promise rejects with a {@link JobTimeoutError}; whatever `operation`
 * eventually settles with is ignored.
 */
export async function withDeadline<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  message?: string,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const expiry = new Promise<never>((_, reject) => {
    const arm = (remainingMs: number) => {
      if (remainingMs > MAX_TIMER_MS) {
        timer = setTimeout(() => arm(remainingMs - MAX_TIMER_MS), MAX_TIMER_MS);
        return;
      }
      timer = setTimeout(
        () => {
          const error = new JobTimeoutError(timeoutMs, message);
          controller.abort(error);
          reject(error);
        },
        Math.max(0, remainingMs),
      );
    };
    arm(timeoutMs);
  });
  try {
    return await Promise.race([operation(controller.signal), expiry]);
  } finally {
    clearTimeout(timer);
  }
}
