/**
 * Cluster Lifecycle Controller
 *
 * Drives the fixed install pipeline (creating -> validating -> ready) and its
 * inverse (destroying -> destroyed). State is never persisted: each run asks
 * kops and the state store what exists and acts on that.
 *
 * @example
 * ```typescript
 * const lifecycle = createClusterLifecycle(dependencies);
 * const report = await lifecycle.install();
 * logger.info({ context: report.context }, 'Cluster ready');
 * ```
 */

import { access, mkdir, rename, rm } from 'node:fs/promises';
import type { Logger } from 'pino';
import type { ClusterState, DeletionReport, Platform, StoreOutcome } from '../domain/types';
import type { AppConfig } from '../config/app-config';
import { DEFAULT_TIMEOUTS, DEFAULT_WORKDIR } from '../config/defaults';
import type { CloudClient } from '../infrastructure/gcloud/client';
import type { ClusterTool } from '../infrastructure/kops/client';
import { ErrorCodes, ProvisioningError, errorMessage } from '../lib/errors';
import { createTimer } from '../lib/logger';
import type { BinaryProvisioner } from './binary-provisioner';
import type { ContextManager } from './context-manager';
import { ensureCredentials } from './credentials';
import { detectPlatform } from './platform';
import type { StorageProvisioner } from './storage-provisioner';

export interface LifecycleDependencies {
  config: AppConfig;
  logger: Logger;
  cloud: CloudClient;
  storage: StorageProvisioner;
  binaries: BinaryProvisioner;
  clusterTool: ClusterTool;
  contexts: ContextManager;
  signal?: AbortSignal;
}

export interface InstallReport {
  cluster: string;
  store: string;
  storeOutcome: StoreOutcome;
  platform: Platform;
  created: boolean;
  /** Path the previous kubeconfig was moved to, when there was one */
  archivedKubeconfig?: string;
  context: string;
}

export interface ValidateReport {
  cluster: string;
  ready: true;
}

export interface DestroyReport {
  cluster: string;
  deletions: DeletionReport[];
}

export interface ClusterLifecycle {
  install: () => Promise<InstallReport>;
  validate: () => Promise<ValidateReport>;
  destroy: () => Promise<DestroyReport>;
  readonly state: ClusterState;
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Move an existing kubeconfig aside to `<path>.old`; never deletes
 */
export async function archiveKubeconfig(kubeconfigPath: string): Promise<string | undefined> {
  if (!(await pathExists(kubeconfigPath))) {
    return undefined;
  }
  const archived = `${kubeconfigPath}${DEFAULT_WORKDIR.archiveSuffix}`;
  await rename(kubeconfigPath, archived);
  return archived;
}

export const createClusterLifecycle = (deps: LifecycleDependencies): ClusterLifecycle => {
  const { config, cloud, storage, binaries, clusterTool, contexts, signal } = deps;
  const logger = deps.logger.child({ component: 'lifecycle', cluster: config.identity.fullyQualifiedName });
  const { identity, store, workDir, timeouts } = config;
  const invocation = { timeout: timeouts.command, signal };

  let state: ClusterState = 'unknown';

  const transition = (next: ClusterState): void => {
    logger.info({ from: state, to: next }, `Cluster state: ${next}`);
    state = next;
  };

  const validateCluster = async (): Promise<void> => {
    const timer = createTimer(logger, 'validate-cluster', { waitMs: timeouts.validate });
    const result = await clusterTool.validate(identity, store, {
      waitMs: timeouts.validate,
      timeout: timeouts.validate + DEFAULT_TIMEOUTS.validateGrace,
      signal,
    });
    if (!result.ok) {
      timer.error(result.error);
      throw new ProvisioningError(
        `cluster ${identity.fullyQualifiedName} did not become ready: ${result.error}`,
        ErrorCodes.CLUSTER_NOT_READY,
        { step: 'validate-cluster', command: 'kops validate cluster' },
      );
    }
    timer.end();
  };

  const removeWorkDir = async (): Promise<DeletionReport> => {
    const target = workDir.root;
    // the kubeconfig and binary are still needed if the cluster delete was interrupted
    if (signal?.aborted) {
      logger.warn({ path: target }, 'Run aborted, keeping work directory');
      return { target, outcome: 'failed', error: 'run aborted before the work directory was removed' };
    }
    try {
      if (!(await pathExists(target))) {
        logger.info({ path: target }, 'Work directory already absent');
        return { target, outcome: 'already-absent' };
      }
      await rm(target, { recursive: true, force: true });
      logger.info({ path: target }, 'Work directory removed');
      return { target, outcome: 'deleted' };
    } catch (error) {
      logger.error({ path: target, error: errorMessage(error) }, 'Work directory removal failed');
      return { target, outcome: 'failed', error: errorMessage(error) };
    }
  };

  return {
    get state() {
      return state;
    },

    async install() {
      const platform = detectPlatform(config.platform);
      logger.info({ platform }, 'Detected platform');

      await ensureCredentials(config, cloud, logger, signal);
      const storeOutcome = await storage.ensureStore(store, signal);
      await binaries.ensureBinary(workDir.binDir, platform, signal);

      const zone = config.cluster.zone;
      if (!zone) {
        throw new ProvisioningError(
          'compute zone is required (pass --zone or set a gcloud default compute/zone)',
          ErrorCodes.INVALID_CONFIGURATION,
          { step: 'install' },
        );
      }

      const existing = await clusterTool.exists(identity, store, invocation);
      if (!existing.ok) {
        throw new ProvisioningError(existing.error, ErrorCodes.CLUSTER_QUERY_FAILED, {
          step: 'query-cluster',
          command: 'kops get cluster',
        });
      }

      await mkdir(workDir.root, { recursive: true });
      const archivedKubeconfig = await archiveKubeconfig(workDir.kubeconfigPath);
      if (archivedKubeconfig) {
        logger.info({ archived: archivedKubeconfig }, 'Archived previous kubeconfig');
      }

      if (existing.value) {
        logger.info('Cluster already exists in the state store, skipping create');
      } else {
        transition('creating');
        const timer = createTimer(logger, 'create-cluster');
        const created = await clusterTool.create(
          {
            identity,
            store,
            zone,
            projectId: config.cluster.projectId,
            nodeCount: config.cluster.nodeCount,
            nodeSize: config.cluster.nodeSize,
            apiLoadBalancerType: config.cluster.apiLoadBalancerType,
          },
          { timeout: timeouts.create, signal },
        );
        if (!created.ok) {
          timer.error(created.error);
          throw new ProvisioningError(created.error, ErrorCodes.CLUSTER_CREATE_FAILED, {
            step: 'create-cluster',
            command: 'kops create cluster',
          });
        }
        timer.end();
      }

      const exported = await clusterTool.exportKubeconfig(identity, store, invocation);
      if (!exported.ok) {
        throw new ProvisioningError(exported.error, ErrorCodes.KUBECONFIG_FAILED, {
          step: 'export-kubeconfig',
          command: 'kops export kubecfg',
        });
      }

      transition('validating');
      await validateCluster();

      await contexts.renameContext(identity.fullyQualifiedName, identity.nameBase);

      const account = await cloud.getConfigValue('account', invocation);
      if (!account.ok || !account.value) {
        throw new ProvisioningError(
          account.ok ? 'no active gcloud account to grant cluster-admin to' : account.error,
          ErrorCodes.RBAC_FAILED,
          { step: 'grant-cluster-admin', command: 'gcloud config get-value account' },
        );
      }
      await contexts.grantClusterAdmin(account.value, signal);

      transition('ready');
      return {
        cluster: identity.fullyQualifiedName,
        store: store.uri,
        storeOutcome,
        platform,
        created: !existing.value,
        archivedKubeconfig,
        context: identity.nameBase,
      };
    },

    async validate() {
      const platform = detectPlatform(config.platform);
      await binaries.ensureBinary(workDir.binDir, platform, signal);

      transition('validating');
      await validateCluster();
      transition('ready');

      return { cluster: identity.fullyQualifiedName, ready: true };
    },

    async destroy() {
      const platform = detectPlatform(config.platform);
      const binary = await binaries.ensureBinary(workDir.binDir, platform, signal);
      if (binary.fetched) {
        logger.info({ path: binary.path }, 'kops binary was missing and has been fetched again');
      }

      transition('destroying');

      const deletions: DeletionReport[] = [];

      const cluster = await clusterTool.delete(identity, store, { timeout: timeouts.delete, signal });
      if (cluster.ok) {
        logger.info({ outcome: cluster.value }, 'Cluster deletion finished');
        deletions.push({ target: identity.fullyQualifiedName, outcome: cluster.value });
      } else {
        logger.error({ error: cluster.error }, 'Cluster deletion failed');
        deletions.push({ target: identity.fullyQualifiedName, outcome: 'failed', error: cluster.error });
      }

      deletions.push(await storage.removeStore(store, signal));
      deletions.push(await removeWorkDir());

      const failed = deletions.filter((deletion) => deletion.outcome === 'failed');
      if (failed.length > 0) {
        throw new ProvisioningError(
          `could not remove ${failed.map((deletion) => deletion.target).join(', ')}`,
          ErrorCodes.CLUSTER_DESTROY_FAILED,
          { step: 'destroy', details: { deletions } },
        );
      }

      transition('destroyed');
      return { cluster: identity.fullyQualifiedName, deletions };
    },
  };
};
