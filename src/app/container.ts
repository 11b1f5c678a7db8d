/**
 * Dependency Container
 *
 * Wires collaborator clients and provisioning services from one immutable
 * AppConfig. Every seam can be overridden, which is how tests swap the
 * process runner, the HTTP layer and the Kubernetes API for fakes.
 */

import type { Logger } from 'pino';
import type { AppConfig } from '../config/app-config';
import { createLogger } from '../lib/logger';
import { LOG_LEVELS } from '../config/defaults';
import { CommandExecutor, type CommandRunner } from '../infrastructure/command-executor';
import { createCloudClient, type CloudClient } from '../infrastructure/gcloud/client';
import { createStorageClient } from '../infrastructure/gcloud/storage';
import { createClusterTool, type ClusterTool } from '../infrastructure/kops/client';
import { createClusterAccess, type ClusterAccess } from '../infrastructure/kubernetes/client';
import { createReleaseClient, type FetchLike } from '../infrastructure/releases/client';
import { binaryPath, createBinaryProvisioner, type BinaryProvisioner } from '../services/binary-provisioner';
import { createContextManager, type ContextManager } from '../services/context-manager';
import { createStorageProvisioner, type StorageProvisioner } from '../services/storage-provisioner';
import { createClusterLifecycle, type ClusterLifecycle } from '../services/cluster-lifecycle';

/**
 * Seams that exist before configuration is known: logging, process
 * execution and the gcloud client used to read ambient defaults.
 */
export interface Bootstrap {
  logger: Logger;
  runner: CommandRunner;
  cloud: CloudClient;
}

export interface BootstrapOverrides {
  logger?: Logger;
  runner?: CommandRunner;
}

const isLogLevel = (value: string | undefined): value is (typeof LOG_LEVELS)[number] =>
  LOG_LEVELS.some((level) => level === value);

/**
 * An unknown level falls back to the default here; config validation
 * reports it once the run configuration is built.
 */
export function createBootstrap(overrides: BootstrapOverrides = {}, level?: string): Bootstrap {
  const logger = overrides.logger ?? createLogger(isLogLevel(level) ? { level } : {});
  const runner = overrides.runner ?? new CommandExecutor(logger.child({ component: 'exec' }));
  return { logger, runner, cloud: createCloudClient(runner, logger.child({ component: 'gcloud' })) };
}

export interface Deps extends Bootstrap {
  config: AppConfig;
  storage: StorageProvisioner;
  binaries: BinaryProvisioner;
  clusterTool: ClusterTool;
  contexts: ContextManager;
  lifecycle: ClusterLifecycle;
}

export interface DepsOverrides {
  fetch?: FetchLike;
  clusterAccess?: ClusterAccess;
  signal?: AbortSignal;
}

export function createContainer(
  config: AppConfig,
  bootstrap: Bootstrap,
  overrides: DepsOverrides = {},
): Deps {
  const { logger, runner, cloud } = bootstrap;
  const { workDir, timeouts } = config;

  const storage = createStorageProvisioner(
    createStorageClient(runner, logger.child({ component: 'gsutil' })),
    logger.child({ component: 'storage' }),
    timeouts.command,
  );

  const binaries = createBinaryProvisioner(
    createReleaseClient(logger.child({ component: 'releases' }), overrides.fetch),
    logger.child({ component: 'binary' }),
    timeouts.download,
  );

  const clusterTool = createClusterTool(runner, logger.child({ component: 'kops' }), {
    binaryPath: binaryPath(workDir.binDir),
    kubeconfigPath: workDir.kubeconfigPath,
  });

  const contexts = createContextManager(
    overrides.clusterAccess ?? createClusterAccess(logger.child({ component: 'kubernetes' }), workDir.kubeconfigPath),
    logger.child({ component: 'context' }),
    { kubeconfigPath: workDir.kubeconfigPath, timeout: timeouts.command },
  );

  const lifecycle = createClusterLifecycle({
    config,
    logger,
    cloud,
    storage,
    binaries,
    clusterTool,
    contexts,
    signal: overrides.signal,
  });

  logger.debug(
    {
      cluster: config.identity.fullyQualifiedName,
      store: config.store.uri,
      workDir: workDir.root,
    },
    'Dependency container created',
  );

  return { ...bootstrap, config, storage, binaries, clusterTool, contexts, lifecycle };
}
