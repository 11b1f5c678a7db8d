/**
 * Unit Tests: Credential Gate
 */

import { describe, it, expect } from '@jest/globals';
import { ensureCredentials } from '../../../src/services/credentials';
import { createCloudClient } from '../../../src/infrastructure/gcloud/client';
import { ErrorCodes } from '../../../src/lib/errors';
import { DEFAULT_TIMEOUTS } from '../../../src/config/defaults';
import { createFakeRunner, createMockLogger, describeCall } from '../../__support__/utilities/mock-infrastructure';

const timeouts = { ...DEFAULT_TIMEOUTS };

describe('ensureCredentials', () => {
  it('runs the application-default login when not skipped', async () => {
    const { runner, calls } = createFakeRunner();
    const logger = createMockLogger();

    const outcome = await ensureCredentials(
      { skipCredentials: false, timeouts },
      createCloudClient(runner, logger),
      logger,
    );

    expect(outcome).toBe('obtained');
    expect(calls.map(describeCall)).toEqual(['gcloud auth application-default login']);
    expect(calls[0]?.options.timeout).toBe(DEFAULT_TIMEOUTS.login);
    expect(calls[0]?.options.echo).toBe(true);
  });

  it('is a no-op when skipCredentials is set', async () => {
    const { runner, calls } = createFakeRunner();
    const logger = createMockLogger();

    const outcome = await ensureCredentials(
      { skipCredentials: true, timeouts },
      createCloudClient(runner, logger),
      logger,
    );

    expect(outcome).toBe('skipped');
    expect(calls).toHaveLength(0);
  });

  it('aborts the run when the login fails', async () => {
    const { runner } = createFakeRunner(() => ({ exitCode: 1, stderr: 'ERROR: (gcloud.auth) login cancelled' }));
    const logger = createMockLogger();

    await expect(
      ensureCredentials({ skipCredentials: false, timeouts }, createCloudClient(runner, logger), logger),
    ).rejects.toMatchObject({
      code: ErrorCodes.CREDENTIALS_FAILED,
      step: 'ensure-credentials',
      command: 'gcloud auth application-default login',
      message: 'gcloud auth application-default login: ERROR: (gcloud.auth) login cancelled',
    });
  });
});
