import { describe, it, expect, vi, afterEach } from 'vitest';
import { TimeoutError, withTimeout } from '../../src/utils/timeout.js';

describe('withTimeout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should resolve with the wrapped value', async () => {
    await expect(withTimeout(Promise.resolve('done'), 1000, 'operation')).resolves.toBe('done');
  });

  it('should pass through rejections', async () => {
    await expect(withTimeout(Promise.reject(new Error('boom')), 1000, 'operation')).rejects.toThrow('boom');
  });

  it('should reject with a TimeoutError when the promise does not settle', async () => {
    vi.useFakeTimers();
    const pending = withTimeout(new Promise<string>(() => undefined), 100, 'set_tempo (happy-path)');
    const assertion = expect(pending).rejects.toThrow(new TimeoutError('set_tempo (happy-path)', 100));

    await vi.advanceTimersByTimeAsync(100);
    await assertion;
  });

  it('should clear its timer once settled', async () => {
    vi.useFakeTimers();
    await withTimeout(Promise.resolve('done'), 1000, 'operation');
    expect(vi.getTimerCount()).toBe(0);
  });
});
