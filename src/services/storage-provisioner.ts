/**
 * Storage Provisioner
 *
 * Idempotent create and tolerant delete of the cluster state bucket.
 */

import type { Logger } from 'pino';
import type { DeletionReport, StoreLocation, StoreOutcome } from '../domain/types';
import type { StorageClient } from '../infrastructure/gcloud/storage';
import { ErrorCodes, ProvisioningError } from '../lib/errors';

export interface StorageProvisioner {
  ensureStore: (location: StoreLocation, signal?: AbortSignal) => Promise<StoreOutcome>;
  removeStore: (location: StoreLocation, signal?: AbortSignal) => Promise<DeletionReport>;
}

export const createStorageProvisioner = (
  storage: StorageClient,
  logger: Logger,
  timeout: number,
): StorageProvisioner => ({
  async ensureStore(location, signal) {
    const result = await storage.makeBucket(location, { timeout, signal });
    if (!result.ok) {
      throw new ProvisioningError(result.error, ErrorCodes.STORE_CREATE_FAILED, {
        step: 'ensure-store',
        command: `gsutil mb ${location.uri}`,
      });
    }

    if (result.value === 'already-exists') {
      logger.info({ uri: location.uri }, 'State store already exists, reusing it');
    } else {
      logger.info({ uri: location.uri }, 'State store created');
    }
    return result.value;
  },

  async removeStore(location, signal) {
    const result = await storage.removeBucket(location, { timeout, signal });
    if (!result.ok) {
      logger.error({ uri: location.uri, error: result.error }, 'State store removal failed');
      return { target: location.uri, outcome: 'failed', error: result.error };
    }

    if (result.value === 'already-absent') {
      logger.info({ uri: location.uri }, 'State store already absent');
    } else {
      logger.info({ uri: location.uri }, 'State store removed');
    }
    return { target: location.uri, outcome: result.value };
  },
});
