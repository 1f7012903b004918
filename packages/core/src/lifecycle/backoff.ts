export interface BackoffOptions {
  /** Delay before the first retry. */
  baseDelayMs: number;
  /** Upper bound for the exponential part. */
  maxDelayMs: number;
  /** Random jitter in [0, maxJitterMs) added on top. */
  maxJitterMs: number;
}

/**
 * Exponential backoff with jitter: base * 2^attempt, capped, plus a random
 * spread so that many clients do not reconnect in lockstep.
 */
export function computeBackoffDelay(
  attempt: number,
  options: BackoffOptions,
  random: () => number = Math.random,
): number {
  const exponential = options.baseDelayMs * Math.pow(2, attempt);
  const capped = Math.min(exponential, options.maxDelayMs);
  const jitter = random() * options.maxJitterMs;
  return capped + jitter;
}

/** Wait for delayMs, rejecting with the signal's reason if it aborts first. */
export function sleep(delayMs: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, delayMs);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
