/**
 * Binary Provisioner
 *
 * Ensures the kops binary is present in the work directory, fetching the
 * latest release for the host platform when it is missing. No version
 * pinning or refresh: an existing binary is used as-is.
 */

import { access, chmod, mkdir, rename } from 'node:fs/promises';
import { constants } from 'node:fs';
import { join } from 'node:path';
import type { Logger } from 'pino';
import type { Platform } from '../domain/types';
import { KOPS_RELEASES } from '../config/defaults';
import type { ReleaseClient } from '../infrastructure/releases/client';
import { artifactName } from '../infrastructure/releases/client';
import { ErrorCodes, ProvisioningError } from '../lib/errors';
import { createTimer } from '../lib/logger';
import { tempDirScope, using } from '../shared/scope';

export interface BinaryOutcome {
  path: string;
  platform: Platform;
  fetched: boolean;
  /** Known only when the binary was fetched in this run */
  version?: string;
}

export function binaryPath(binDir: string): string {
  return join(binDir, KOPS_RELEASES.binaryName);
}

export async function binaryExists(binDir: string): Promise<boolean> {
  try {
    await access(binaryPath(binDir), constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

export interface BinaryProvisioner {
  ensureBinary: (binDir: string, platform: Platform, signal?: AbortSignal) => Promise<BinaryOutcome>;
}

export const createBinaryProvisioner = (
  releases: ReleaseClient,
  logger: Logger,
  timeout: number,
): BinaryProvisioner => ({
  async ensureBinary(binDir, platform, signal) {
    const path = binaryPath(binDir);

    if (await binaryExists(binDir)) {
      logger.debug({ path }, 'kops binary already present');
      return { path, platform, fetched: false };
    }

    const fatal = (message: string): ProvisioningError =>
      new ProvisioningError(message, ErrorCodes.BINARY_DOWNLOAD_FAILED, {
        step: 'ensure-binary',
        command: `download ${artifactName(platform)}`,
      });

    const versionResult = await releases.latestVersion({ timeout, signal });
    if (!versionResult.ok) {
      throw fatal(versionResult.error);
    }
    const version = versionResult.value;

    const timer = createTimer(logger, 'download-kops', { version, platform });
    await mkdir(binDir, { recursive: true });

    // staging directory lives in binDir so the final rename stays on one filesystem
    await using(tempDirScope('.download-', binDir), async (staging) => {
      const staged = join(staging, artifactName(platform));
      const download = await releases.download(version, platform, staged, { timeout, signal });
      if (!download.ok) {
        timer.error(download.error);
        throw fatal(download.error);
      }
      await chmod(staged, 0o755);
      await rename(staged, path);
      timer.end({ bytes: download.value.bytes });
    });

    logger.info({ version, platform, path }, 'kops binary installed');
    return { path, platform, fetched: true, version };
  },
});
