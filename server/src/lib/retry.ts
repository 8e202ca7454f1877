/**
 * Bounded, fixed-delay retry around a single request operation.
 */

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export type RetryOptions = {
  /** Overall deadline: stops further attempts and cuts a pending delay short. */
  signal?: AbortSignal;
  sleep?: Sleep;
};

export type RetryOutcome<R> = {
  /** Last response received; undefined only when no attempt was made. */
  response: R | undefined;
  attempts: number;
  aborted: boolean;
};

export const sleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

/**
 * Calls `request` up to `maxAttempts` times, returning as soon as a response
 * reports `ok`. Waits `delayMs` between failed attempts (not after the last).
 * `maxAttempts` below 1 means no attempt at all.
 */
export async function retryRequest<R extends { ok: boolean }>(
  maxAttempts: number,
  delayMs: number,
  request: (attempt: number) => Promise<R>,
  options: RetryOptions = {}
): Promise<RetryOutcome<R>> {
  const limit = maxAttempts < 1 ? 0 : Math.floor(maxAttempts);
  const wait = options.sleep ?? sleep;
  const signal = options.signal;

  let response: R | undefined;
  let attempts = 0;

  for (let i = 0; i < limit; i += 1) {
    if (signal?.aborted) {
      return { response, attempts, aborted: true };
    }

    attempts += 1;
    response = await request(attempts);
    if (response.ok) {
      return { response, attempts, aborted: false };
    }

    if (i < limit - 1) {
      await wait(Math.max(0, delayMs), signal);
    }
  }

  return { response, attempts, aborted: signal?.aborted ?? false };
}
