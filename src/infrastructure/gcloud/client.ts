/**
 * gcloud Client
 *
 * Credential login and reads of the active gcloud configuration.
 */

import type { Logger } from 'pino';
import { Success, Failure, type Result } from '../../domain/types';
import { describeCommand, executeCommand, failureReason, type CommandRunner } from '../command-executor';

export interface CloudClient {
  /** Interactive application-default login; blocks until the flow ends */
  login: (options: { timeout: number; signal?: AbortSignal }) => Promise<Result<void>>;
  /** Value of a gcloud config property, or undefined when unset */
  getConfigValue: (
    key: string,
    options: { timeout: number; signal?: AbortSignal },
  ) => Promise<Result<string | undefined>>;
}

const GCLOUD = 'gcloud';

export const LOGIN_ARGS = ['auth', 'application-default', 'login'];

export const createCloudClient = (runner: CommandRunner, logger: Logger): CloudClient => ({
  async login({ timeout, signal }) {
    const result = await executeCommand(runner, GCLOUD, LOGIN_ARGS, { timeout, signal, echo: true });
    if (result.exitCode !== 0) {
      return Failure(`${describeCommand(GCLOUD, LOGIN_ARGS)}: ${failureReason(result)}`);
    }
    logger.debug('Application-default credentials obtained');
    return Success(undefined);
  },

  async getConfigValue(key, { timeout, signal }) {
    const args = ['config', 'get-value', key];
    const result = await executeCommand(runner, GCLOUD, args, { timeout, signal });
    if (result.exitCode !== 0) {
      return Failure(`${describeCommand(GCLOUD, args)}: ${failureReason(result)}`);
    }
    const value = result.stdout.trim();
    if (!value || value === '(unset)') {
      logger.debug({ key }, 'gcloud property is unset');
      return Success(undefined);
    }
    return Success(value);
  },
});
