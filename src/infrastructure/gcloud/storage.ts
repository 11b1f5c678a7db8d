/**
 * Cloud Storage Client
 *
 * Bucket create and recursive delete through gsutil. Conflict and
 * not-found answers are mapped to outcomes instead of failures.
 */

import type { Logger } from 'pino';
import {
  Success,
  Failure,
  type DeletionOutcome,
  type Result,
  type StoreLocation,
  type StoreOutcome,
} from '../../domain/types';
import { describeCommand, executeCommand, failureReason, type CommandRunner } from '../command-executor';

export interface StorageClient {
  makeBucket: (
    location: StoreLocation,
    options: { timeout: number; signal?: AbortSignal },
  ) => Promise<Result<StoreOutcome>>;
  removeBucket: (
    location: StoreLocation,
    options: { timeout: number; signal?: AbortSignal },
  ) => Promise<Result<Exclude<DeletionOutcome, 'failed'>>>;
}

const GSUTIL = 'gsutil';

const ALREADY_EXISTS = [/already exists/i, /\b409\b/];
const NOT_FOUND = [/BucketNotFoundException/, /No URLs matched/i, /\b404\b/];

const matchesAny = (output: string, patterns: RegExp[]): boolean =>
  patterns.some((pattern) => pattern.test(output));

export const createStorageClient = (runner: CommandRunner, logger: Logger): StorageClient => ({
  async makeBucket(location, { timeout, signal }) {
    const args = ['mb', '-p', location.projectId, location.uri];
    const result = await executeCommand(runner, GSUTIL, args, { timeout, signal, echo: true });

    if (result.exitCode === 0) {
      return Success('created');
    }
    if (!result.timedOut && !result.aborted && matchesAny(result.stderr, ALREADY_EXISTS)) {
      logger.debug({ uri: location.uri }, 'Bucket create reported a conflict');
      return Success('already-exists');
    }
    return Failure(`${describeCommand(GSUTIL, args)}: ${failureReason(result)}`);
  },

  async removeBucket(location, { timeout, signal }) {
    const args = ['-m', 'rm', '-r', location.uri];
    const result = await executeCommand(runner, GSUTIL, args, { timeout, signal, echo: true });

    if (result.exitCode === 0) {
      return Success('deleted');
    }
    if (!result.timedOut && !result.aborted && matchesAny(result.stderr, NOT_FOUND)) {
      logger.debug({ uri: location.uri }, 'Bucket remove reported not found');
      return Success('already-absent');
    }
    return Failure(`${describeCommand(GSUTIL, args)}: ${failureReason(result)}`);
  },
});
