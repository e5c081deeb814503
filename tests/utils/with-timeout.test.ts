import { afterEach, describe, expect, it, vi } from 'vitest';
import { TimeoutError } from '@/lib/errors';
import { delay, withTimeout } from '@/lib/utils/with-timeout';

describe('withTimeout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('passes through a result that arrives in time and clears its timer', async () => {
    vi.useFakeTimers();
    await expect(withTimeout(Promise.resolve(7), 100, 'lookup')).resolves.toBe(7);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('passes through a failure that arrives in time', async () => {
    await expect(withTimeout(Promise.reject(new Error('boom')), 100, 'lookup')).rejects.toThrow('boom');
  });

  it('rejects with a TimeoutError once the bound passes', async () => {
    vi.useFakeTimers();
    const result = withTimeout(new Promise<never>(() => undefined), 100, 'lookup').catch((error: unknown) => error);

    await vi.advanceTimersByTimeAsync(100);

    const error = await result;
    expect(error).toBeInstanceOf(TimeoutError);
    expect(error).toMatchObject({ code: 'TIMEOUT', timeoutMs: 100, message: 'lookup timed out after 100ms' });
  });
});

describe('delay', () => {
  it('resolves after the given time', async () => {
    vi.useFakeTimers();
    const done = vi.fn();
    const waiting = delay(200).then(done);

    await vi.advanceTimersByTimeAsync(199);
    expect(done).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(1);
    await waiting;
    expect(done).toHaveBeenCalledTimes(1);
    vi.useRealTimers();
  });
});
