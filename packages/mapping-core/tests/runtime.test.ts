import { describe, expect, it, vi } from 'vitest';
import { CircuitBreaker } from '../src/runtime/circuit-breaker.js';
import { withRetries } from '../src/runtime/retry.js';
import type { RetryContext } from '../src/runtime/retry.js';
import { Semaphore } from '../src/runtime/semaphore.js';
import { TimeoutError, withTimeout } from '../src/runtime/timeout.js';

describe('Semaphore', () => {
  it('rejects a non-positive limit', () => {
    expect(() => new Semaphore(0)).toThrow('Semaphore maxConcurrency must be >= 1 (got 0)');
  });

  it('queues acquirers beyond the limit', async () => {
    const semaphore = new Semaphore(2);
    const first = await semaphore.acquire();
    await semaphore.acquire();
    const third = semaphore.acquire();

    expect(semaphore.inFlight).toBe(2);
    expect(semaphore.queueDepth).toBe(1);

    first();
    first();
    await third;

    expect(semaphore.inFlight).toBe(2);
    expect(semaphore.queueDepth).toBe(0);
  });

  it('releases the slot when a task throws', async () => {
    const semaphore = new Semaphore(1);

    await expect(
      semaphore.run(async () => {
        throw new Error('task failed');
      })
    ).rejects.toThrow('task failed');
    expect(semaphore.inFlight).toBe(0);
  });
});

describe('withTimeout', () => {
  it('rejects with a TimeoutError when the timer wins', async () => {
    const never = new Promise<string>(() => undefined);

    await expect(withTimeout(never, 10)).rejects.toBeInstanceOf(TimeoutError);
  });

  it('uses the provided error factory', async () => {
    const never = new Promise<string>(() => undefined);

    await expect(withTimeout(never, 10, () => new Error('sink too slow'))).rejects.toThrow('sink too slow');
  });

  it('passes the value through when no timeout is set', async () => {
    await expect(withTimeout(Promise.resolve('done'), 0)).resolves.toBe('done');
    await expect(withTimeout(Promise.resolve('done'), undefined)).resolves.toBe('done');
  });
});

describe('withRetries', () => {
  it('retries until an attempt succeeds', async () => {
    const seen: RetryContext[] = [];
    let calls = 0;

    const value = await withRetries(
      async () => {
        calls++;
        if (calls < 3) throw new Error(`attempt ${calls} failed`);
        return 'loaded';
      },
      { attempts: 3, baseDelayMs: 0, jitter: 0 },
      { onRetry: (_err, ctx) => seen.push(ctx) }
    );

    expect(value).toBe('loaded');
    expect(seen.map((ctx) => ctx.attempt)).toEqual([1, 2]);
  });

  it('rethrows the last error', async () => {
    const fn = vi.fn(async () => {
      throw new Error('still down');
    });

    await expect(withRetries(fn, { attempts: 2, baseDelayMs: 0 })).rejects.toThrow('still down');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('stops at a non-retryable error', async () => {
    const fn = vi.fn(async () => {
      throw new Error('bad glossary');
    });

    await expect(withRetries(fn, { attempts: 5 }, { isRetryable: () => false })).rejects.toThrow('bad glossary');
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe('CircuitBreaker', () => {
  it('opens after consecutive failures and probes once the window passes', () => {
    let now = 0;
    const breaker = new CircuitBreaker({ failureThreshold: 2, openMs: 100, clock: () => now });

    breaker.onFailure();
    expect(breaker.getSnapshot()).toEqual({ mode: 'closed', failures: 1 });
    breaker.onFailure();
    expect(breaker.mode).toBe('open');

    now = 50;
    expect(breaker.canRequest()).toBe(false);
    expect(breaker.getSnapshot()).toEqual({ mode: 'open', openForMs: 50 });

    now = 100;
    expect(breaker.canRequest()).toBe(true);
    breaker.onStart();
    expect(breaker.mode).toBe('half_open');
    expect(breaker.canRequest()).toBe(false);

    breaker.onSuccess();
    expect(breaker.getSnapshot()).toEqual({ mode: 'closed', failures: 0 });
  });

  it('reopens when the probe fails', () => {
    let now = 0;
    const breaker = new CircuitBreaker({ failureThreshold: 1, openMs: 10, clock: () => now });

    breaker.onFailure();
    now = 10;
    breaker.canRequest();
    breaker.onStart();
    breaker.onFailure();

    expect(breaker.mode).toBe('open');
    expect(breaker.canRequest()).toBe(false);
  });

  it('is disabled only when asked', () => {
    expect(CircuitBreaker.fromConfig({ enabled: false })).toBeNull();
    expect(CircuitBreaker.fromConfig()).toBeInstanceOf(CircuitBreaker);
  });
});
