import { describe, it, expect } from '@jest/globals';
import { withTimeout } from '../../../src/shared/async';
import { ErrorCodes, TimeoutError } from '../../../src/lib/errors';

const never = (signal: AbortSignal): Promise<string> =>
  new Promise((_, reject) => {
    signal.addEventListener('abort', () => reject(new Error('inner aborted')));
  });

describe('withTimeout', () => {
  it('resolves with the operation result', async () => {
    await expect(withTimeout(async () => 'done', { timeoutMs: 1000 })).resolves.toBe('done');
  });

  it('rejects with a TimeoutError and aborts the inner signal', async () => {
    let inner: AbortSignal | undefined;

    const pending = withTimeout(
      (signal) => {
        inner = signal;
        return never(signal);
      },
      { timeoutMs: 20, errorMessage: 'GET release' },
    );

    await expect(pending).rejects.toBeInstanceOf(TimeoutError);
    await expect(pending).rejects.toThrow('GET release after 20ms');
    expect(inner?.aborted).toBe(true);
  });

  it('rejects as aborted when the outer signal fires', async () => {
    const outer = new AbortController();
    setTimeout(() => outer.abort(), 10);

    await expect(withTimeout(never, { timeoutMs: 5000, signal: outer.signal })).rejects.toMatchObject({
      code: ErrorCodes.ABORTED,
    });
  });

  it('rejects immediately for an already aborted signal', async () => {
    const outer = new AbortController();
    outer.abort();

    await expect(withTimeout(never, { timeoutMs: 5000, signal: outer.signal })).rejects.toMatchObject({
      code: ErrorCodes.ABORTED,
    });
  });
});
