import { describe, it, expect, vi, afterEach } from 'vitest';
import { TimeoutError, withTimeout } from '../async.js';
import { KeyedMutex } from '../keyed_mutex.js';

afterEach(() => {
  vi.useRealTimers();
});

describe('withTimeout', () => {
  it('resolves with the task value when it settles in time', async () => {
    await expect(withTimeout(async () => 42, 1000)).resolves.toBe(42);
  });

  it('surfaces synchronous throws as rejections', async () => {
    await expect(
      withTimeout(() => {
        throw new Error('sync failure');
      }, 1000)
    ).rejects.toThrow('sync failure');
  });

  it('rejects with TimeoutError when the task is too slow', async () => {
    vi.useFakeTimers();
    const pending = withTimeout(() => new Promise<number>(() => {}), 50, 'genre query');
    const assertion = expect(pending).rejects.toBeInstanceOf(TimeoutError);

    await vi.advanceTimersByTimeAsync(50);
    await assertion;
  });

  it('names the context in the timeout message', async () => {
    vi.useFakeTimers();
    const pending = withTimeout(() => new Promise<number>(() => {}), 10, 'verification');
    const assertion = expect(pending).rejects.toThrow('Timeout after 10ms: verification');

    await vi.advanceTimersByTimeAsync(10);
    await assertion;
  });

  it('waits without limit for a non-positive timeout', async () => {
    await expect(withTimeout(async () => 'done', 0)).resolves.toBe('done');
  });
});

describe('KeyedMutex', () => {
  it('tracks held keys and frees them after the task', async () => {
    const mutex = new KeyedMutex();
    let observed = false;

    await mutex.runExclusive('a', () => {
      observed = mutex.isLocked('a');
    });

    expect(observed).toBe(true);
    expect(mutex.isLocked('a')).toBe(false);
    expect(mutex.activeKeys).toBe(0);
  });

  it('runs queued tasks for one key in arrival order', async () => {
    const mutex = new KeyedMutex();
    const order: number[] = [];

    await Promise.all(
      [1, 2, 3].map((n) =>
        mutex.runExclusive('k', async () => {
          await Promise.resolve();
          order.push(n);
        })
      )
    );

    expect(order).toEqual([1, 2, 3]);
  });
});
