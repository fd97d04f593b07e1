/** Configuration for exponential backoff with symmetric jitter. */
export interface BackoffOptions {
    /** Delay in ms for attempt 0. */
    baseDelayMs: number;
    /** Maximum delay cap in ms (applied before jitter). */
    maxDelayMs: number;
    /** Multiplier applied per attempt. @default 2 */
    backoffFactor?: number;
    /** Fraction of the delay used as ± jitter. @default 0.2 */
    jitterRatio?: number;
}

/**
 * Delay before the next attempt after `attempts` failures:
 * `min(base * factor^attempts, max)` plus a uniform jitter of ±`jitterRatio`.
 *
 * @example
 * ```ts
 * computeBackoffDelay(3, { baseDelayMs: 5_000, maxDelayMs: 300_000 }); // 32_000..48_000
 * ```
 */
export function computeBackoffDelay(
    attempts: number,
    options: BackoffOptions,
    random: () => number = Math.random,
): number {
    const factor = options.backoffFactor ?? 2;
    const jitterRatio = options.jitterRatio ?? 0.2;
    const delay = Math.min(options.baseDelayMs * factor ** Math.max(0, attempts), options.maxDelayMs);
    const jitter = delay * jitterRatio * (2 * random() - 1);
    return Math.max(0, delay + jitter);
}

/** Sleep for `ms`, resolving early when `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
        return Promise.resolve();
    }

    return new Promise((resolve) => {
        const onAbort = (): void => {
            clearTimeout(timer);
            resolve();
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, Math.max(0, ms));
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}
