/**
 * Platform Detector
 *
 * Maps the host OS identifier (and the Cloud Shell signal) to the platform
 * whose kops artifact must be fetched. Pure; no I/O.
 */

import type { Platform } from '../domain/types';
import { ErrorCodes, ProvisioningError } from '../lib/errors';

export interface HostSignals {
  /** `process.platform` or a shell OSTYPE such as `linux-gnu` / `darwin21` */
  osType: string;
  /** Running inside Google Cloud Shell */
  managedShell: boolean;
  override?: Platform;
}

export function detectPlatform({ osType, managedShell, override }: HostSignals): Platform {
  if (override) {
    return override;
  }

  const os = osType.toLowerCase();
  if (os.startsWith('darwin')) {
    return 'mac';
  }
  if (os.startsWith('linux')) {
    return managedShell ? 'cloudshell' : 'linux';
  }

  throw new ProvisioningError(`unsupported operating system '${osType}'`, ErrorCodes.UNSUPPORTED_PLATFORM, {
    step: 'detect-platform',
  });
}
