/**
 * Credential Gate
 *
 * Obtains application-default credentials before any cloud call unless the
 * caller asserts they are already provisioned.
 */

import type { Logger } from 'pino';
import type { AppConfig } from '../config/app-config';
import type { CloudClient } from '../infrastructure/gcloud/client';
import { LOGIN_ARGS } from '../infrastructure/gcloud/client';
import { describeCommand } from '../infrastructure/command-executor';
import { ErrorCodes, ProvisioningError } from '../lib/errors';

export type CredentialOutcome = 'obtained' | 'skipped';

export async function ensureCredentials(
  config: Pick<AppConfig, 'skipCredentials' | 'timeouts'>,
  cloud: CloudClient,
  logger: Logger,
  signal?: AbortSignal,
): Promise<CredentialOutcome> {
  if (config.skipCredentials) {
    logger.info('Skipping credential login; credentials are assumed to be provisioned');
    return 'skipped';
  }

  logger.info('Requesting application-default credentials');
  const result = await cloud.login({ timeout: config.timeouts.login, signal });
  if (!result.ok) {
    throw new ProvisioningError(result.error, ErrorCodes.CREDENTIALS_FAILED, {
      step: 'ensure-credentials',
      command: describeCommand('gcloud', LOGIN_ARGS),
    });
  }
  return 'obtained';
}
