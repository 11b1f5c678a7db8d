/**
 * Scoped acquisition of a resource or process-wide mode with guaranteed
 * release on every exit path, including thrown errors.
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

export interface Scope<R> {
  acquire: () => R | Promise<R>;
  release: (resource: R) => void | Promise<void>;
}

export async function using<R, T>(scope: Scope<R>, body: (resource: R) => Promise<T>): Promise<T> {
  const resource = await scope.acquire();
  try {
    return await body(resource);
  } finally {
    await scope.release(resource);
  }
}

/**
 * Abort controller wired to process termination signals for the duration
 * of the scope. Previous listeners are left untouched; ours are removed on exit.
 */
export function signalScope(
  signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'],
): Scope<{ controller: AbortController; detach: () => void }> {
  return {
    acquire: () => {
      const controller = new AbortController();
      const onSignal = (signal: NodeJS.Signals): void => {
        controller.abort(new Error(`Received ${signal}`));
      };
      for (const signal of signals) {
        process.on(signal, onSignal);
      }
      return {
        controller,
        detach: () => {
          for (const signal of signals) {
            process.off(signal, onSignal);
          }
        },
      };
    },
    release: ({ detach }) => detach(),
  };
}

/**
 * Private temporary directory removed recursively when the scope ends.
 */
export function tempDirScope(prefix: string, parent: string = tmpdir()): Scope<string> {
  return {
    acquire: () => mkdtemp(join(parent, prefix)),
    release: (dir) => rm(dir, { recursive: true, force: true }),
  };
}
