/** Longest delay a single Node timer honours; larger values fire after 1ms. */
export const MAX_TIMER_DELAY = 2_147_483_647;

/**
 * Sleep that can be cancelled via an AbortSignal.
 * If the signal is already aborted, rejects immediately.
 * If the signal fires during the sleep, the timer is cleared and the
 * promise rejects with the signal's reason.
 * A zero delay settles without scheduling a timer. Delays past
 * {@link MAX_TIMER_DELAY} are slept in consecutive chunks.
 */
export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      return reject(signal.reason);
    }
    if (ms <= 0) {
      return resolve();
    }

    let remaining = ms;
    let timer: ReturnType<typeof setTimeout> | undefined;

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const arm = (): void => {
      const chunk = Math.min(remaining, MAX_TIMER_DELAY);
      timer = setTimeout(() => {
        remaining -= chunk;
        if (remaining > 0) {
          arm();
          return;
        }
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, chunk);
    };

    arm();
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
