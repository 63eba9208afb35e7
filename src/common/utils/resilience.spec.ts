import { withRetry } from './resilience';

describe('withRetry', () => {
  it('returns the first successful result', async () => {
    const fn = jest
      .fn<Promise<string>, []>()
      .mockRejectedValueOnce(new Error('flaky'))
      .mockRejectedValueOnce(new Error('flaky'))
      .mockResolvedValue('done');

    await expect(withRetry(fn, { baseDelayMs: 1 })).resolves.toBe('done');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('rethrows the last error once attempts run out', async () => {
    const fn = jest
      .fn<Promise<string>, []>()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'));

    await expect(withRetry(fn, { maxAttempts: 2, baseDelayMs: 1 })).rejects.toThrow('second');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('stops at once when shouldRetry says no', async () => {
    const fn = jest.fn<Promise<string>, []>().mockRejectedValue(new Error('fatal'));

    await expect(
      withRetry(fn, { baseDelayMs: 1, shouldRetry: () => false }),
    ).rejects.toThrow('fatal');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('reports the backoff delay, or the one delayFor picks', async () => {
    const delays: number[] = [];
    const fn = jest
      .fn<Promise<number>, []>()
      .mockRejectedValueOnce(new Error('a'))
      .mockRejectedValueOnce(new Error('b'))
      .mockResolvedValue(1);

    await withRetry(fn, {
      baseDelayMs: 2,
      delayFor: (_err, attempt) => (attempt === 2 ? 0 : undefined),
      onRetry: (_err, _attempt, delayMs) => delays.push(delayMs),
    });

    expect(delays).toEqual([2, 0]);
  });
});
