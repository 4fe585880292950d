import { describe, it, expect } from '@jest/globals';
import { withRetry } from '../shared/retry.js';

describe('withRetry', () => {
  it('returns the first success', async () => {
    const attempts: number[] = [];
    const value = await withRetry(
      async (attempt) => {
        attempts.push(attempt);
        if (attempt < 3) throw new Error('flaky');
        return 'done';
      },
      { attempts: 3, retryIntervalMillis: 0, label: 'op' },
    );
    expect(value).toBe('done');
    expect(attempts).toEqual([1, 2, 3]);
  });

  it('rethrows the last error once attempts are exhausted', async () => {
    let calls = 0;
    await expect(
      withRetry(
        async () => {
          calls++;
          throw new Error(`failure ${calls}`);
        },
        { attempts: 2, retryIntervalMillis: 0, label: 'op' },
      ),
    ).rejects.toThrow('failure 2');
    expect(calls).toBe(2);
  });

  it('stops at once when shouldRetry says no', async () => {
    let calls = 0;
    await expect(
      withRetry(
        async () => {
          calls++;
          throw new Error('rejected');
        },
        { attempts: 5, retryIntervalMillis: 0, shouldRetry: () => false, label: 'op' },
      ),
    ).rejects.toThrow('rejected');
    expect(calls).toBe(1);
  });

  it('stops waiting when the signal aborts', async () => {
    const controller = new AbortController();
    const pending = withRetry(
      async () => {
        throw new Error('down');
      },
      { attempts: 3, retryIntervalMillis: 60_000, signal: controller.signal, label: 'op' },
    );
    setTimeout(() => controller.abort(new Error('deadline')), 5);
    await expect(pending).rejects.toThrow('deadline');
  });
});
