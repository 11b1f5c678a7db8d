/**
 * Async utilities for timeouts and cancellation
 */

import { TimeoutError, ProvisioningError, ErrorCodes } from '../lib/errors';

export interface TimeoutOptions {
  timeoutMs: number;
  errorMessage?: string;
  /** Outer signal; aborting it cancels the operation as well */
  signal?: AbortSignal;
}

/**
 * Run `fn` with a signal that aborts after `timeoutMs` or when the outer
 * signal aborts, whichever comes first. The timer is always cleared.
 * Our rejection settles before the inner signal aborts, so callers see the
 * timeout or abort error rather than the operation's own abort error.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  options: TimeoutOptions,
): Promise<T> {
  const { timeoutMs, errorMessage = 'Operation timed out', signal } = options;
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let detach: (() => void) | undefined;

  const cancelled = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new TimeoutError(`${errorMessage} after ${timeoutMs}ms`));
      controller.abort();
    }, timeoutMs);

    if (signal) {
      const onAbort = (): void => {
        reject(new ProvisioningError('Operation aborted', ErrorCodes.ABORTED));
        controller.abort();
      };
      if (signal.aborted) {
        onAbort();
      } else {
        signal.addEventListener('abort', onAbort, { once: true });
        detach = () => signal.removeEventListener('abort', onAbort);
      }
    }
  });

  try {
    return await Promise.race([fn(controller.signal), cancelled]);
  } finally {
    clearTimeout(timer);
    detach?.();
  }
}
