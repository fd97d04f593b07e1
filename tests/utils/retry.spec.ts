import { afterEach, describe, expect, it, vi } from 'vitest';
import { computeBackoffDelay, sleep } from '../../src/utils/retry.js';

const options = { baseDelayMs: 5_000, maxDelayMs: 300_000 };

describe('computeBackoffDelay', () => {
  it('doubles the base delay per attempt without jitter at the midpoint', () => {
    const midpoint = (): number => 0.5;

    expect(computeBackoffDelay(0, options, midpoint)).toBe(5_000);
    expect(computeBackoffDelay(1, options, midpoint)).toBe(10_000);
    expect(computeBackoffDelay(3, options, midpoint)).toBe(40_000);
  });

  it('caps the delay before jitter is applied', () => {
    expect(computeBackoffDelay(10, options, () => 0.5)).toBe(300_000);
    expect(computeBackoffDelay(10, options, () => 1)).toBe(360_000);
  });

  it('applies up to twenty percent of jitter in either direction', () => {
    expect(computeBackoffDelay(2, options, () => 0)).toBe(16_000);
    expect(computeBackoffDelay(2, options, () => 1)).toBe(24_000);
  });

  it('honours a custom factor and jitter ratio', () => {
    expect(computeBackoffDelay(2, { ...options, backoffFactor: 3, jitterRatio: 0 }, () => 0)).toBe(45_000);
  });
});

describe('sleep', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves after the given delay', async () => {
    vi.useFakeTimers();
    let done = false;
    const pending = sleep(1_000).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(999);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toBe(true);
  });

  it('resolves early when the signal aborts', async () => {
    vi.useFakeTimers();
    const controller = new AbortController();
    const pending = sleep(60_000, controller.signal);

    controller.abort();
    await expect(pending).resolves.toBeUndefined();
  });

  it('resolves immediately for an already-aborted signal', async () => {
    await expect(sleep(60_000, AbortSignal.abort())).resolves.toBeUndefined();
  });
});
