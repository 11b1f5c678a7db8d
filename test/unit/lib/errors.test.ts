import { describe, it, expect } from '@jest/globals';
import { ErrorCodes, ProvisioningError, UsageError, formatFatal } from '../../../src/lib/errors';

describe('formatFatal', () => {
  it('names the step and the collaborator command', () => {
    const error = new ProvisioningError('gsutil mb -p p1 gs://p1-kops-state: AccessDeniedException: 403', ErrorCodes.STORE_CREATE_FAILED, {
      step: 'ensure-store',
      command: 'gsutil mb',
    });

    expect(formatFatal(error)).toBe(
      'ERROR: ensure-store failed (gsutil mb): gsutil mb -p p1 gs://p1-kops-state: AccessDeniedException: 403',
    );
  });

  it('omits the command when there is none', () => {
    const error = new ProvisioningError('compute zone is required', ErrorCodes.INVALID_CONFIGURATION, {
      step: 'install',
    });

    expect(formatFatal(error)).toBe('ERROR: install failed: compute zone is required');
  });

  it('prints usage errors as-is', () => {
    expect(formatFatal(new UsageError('command not supplied', ErrorCodes.COMMAND_NOT_SUPPLIED))).toBe(
      'ERROR: command not supplied',
    );
  });

  it('handles unexpected errors', () => {
    expect(formatFatal(new Error('EACCES: permission denied'))).toBe('ERROR: run failed: EACCES: permission denied');
    expect(formatFatal('boom')).toBe('ERROR: run failed: boom');
  });
});

describe('ProvisioningError', () => {
  it('serializes for structured logs', () => {
    const error = new ProvisioningError('download failed', ErrorCodes.BINARY_DOWNLOAD_FAILED, {
      step: 'ensure-binary',
      details: { url: 'https://example.test/kops' },
    });

    expect(error.toJSON()).toMatchObject({
      name: 'ProvisioningError',
      message: 'download failed',
      code: 'BINARY_DOWNLOAD_FAILED',
      step: 'ensure-binary',
      details: { url: 'https://example.test/kops' },
    });
  });
});
