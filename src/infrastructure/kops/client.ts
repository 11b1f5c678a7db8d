/**
 * kops Client
 *
 * Typed wrapper over the kops binary provisioned into the work directory.
 * Every call runs against an explicit state store and kubeconfig path.
 */

import type { Logger } from 'pino';
import {
  Success,
  Failure,
  type ClusterIdentity,
  type DeletionOutcome,
  type Result,
  type StoreLocation,
} from '../../domain/types';
import { KOPS_RELEASES } from '../../config/defaults';
import { describeCommand, executeCommand, failureReason, type CommandRunner } from '../command-executor';

export interface ClusterSpec {
  identity: ClusterIdentity;
  store: StoreLocation;
  zone: string;
  projectId: string;
  nodeCount: number;
  nodeSize: string;
  apiLoadBalancerType: 'public' | 'internal';
}

export interface InvocationOptions {
  timeout: number;
  signal?: AbortSignal;
}

export interface ClusterTool {
  exists: (
    identity: ClusterIdentity,
    store: StoreLocation,
    options: InvocationOptions,
  ) => Promise<Result<boolean>>;
  create: (spec: ClusterSpec, options: InvocationOptions) => Promise<Result<void>>;
  exportKubeconfig: (
    identity: ClusterIdentity,
    store: StoreLocation,
    options: InvocationOptions,
  ) => Promise<Result<void>>;
  validate: (
    identity: ClusterIdentity,
    store: StoreLocation,
    options: InvocationOptions & { waitMs: number },
  ) => Promise<Result<void>>;
  delete: (
    identity: ClusterIdentity,
    store: StoreLocation,
    options: InvocationOptions,
  ) => Promise<Result<Exclude<DeletionOutcome, 'failed'>>>;
}

export interface ClusterToolConfig {
  binaryPath: string;
  kubeconfigPath: string;
}

const NOT_FOUND = /not found/i;

/**
 * Render milliseconds as a Go duration string accepted by --wait
 */
export function toGoDuration(ms: number): string {
  if (ms % 60000 === 0) return `${ms / 60000}m`;
  return `${Math.ceil(ms / 1000)}s`;
}

const target = (identity: ClusterIdentity, store: StoreLocation): string[] => [
  '--name',
  identity.fullyQualifiedName,
  '--state',
  store.uri,
];

export const createClusterTool = (
  runner: CommandRunner,
  logger: Logger,
  { binaryPath, kubeconfigPath }: ClusterToolConfig,
): ClusterTool => {
  const env = {
    KUBECONFIG: kubeconfigPath,
    KOPS_FEATURE_FLAGS: KOPS_RELEASES.featureFlags,
  };

  const describe = (args: string[]): string => describeCommand(KOPS_RELEASES.binaryName, args);

  return {
    async exists(identity, store, { timeout, signal }) {
      const args = ['get', 'cluster', ...target(identity, store)];
      const result = await executeCommand(runner, binaryPath, args, { env, timeout, signal });

      if (result.exitCode === 0) {
        return Success(true);
      }
      if (!result.timedOut && !result.aborted && NOT_FOUND.test(result.stderr)) {
        return Success(false);
      }
      return Failure(`${describe(args)}: ${failureReason(result)}`);
    },

    async create(spec, { timeout, signal }) {
      const args = [
        'create',
        'cluster',
        spec.identity.fullyQualifiedName,
        '--zones',
        spec.zone,
        '--state',
        spec.store.uri,
        '--project',
        spec.projectId,
        '--node-count',
        String(spec.nodeCount),
        '--node-size',
        spec.nodeSize,
        '--api-loadbalancer-type',
        spec.apiLoadBalancerType,
        '--yes',
      ];
      logger.info({ cluster: spec.identity.fullyQualifiedName, zone: spec.zone }, 'Creating cluster');
      const result = await executeCommand(runner, binaryPath, args, { env, timeout, signal, echo: true });
      if (result.exitCode !== 0) {
        return Failure(`${describe(args)}: ${failureReason(result)}`);
      }
      return Success(undefined);
    },

    async exportKubeconfig(identity, store, { timeout, signal }) {
      const args = ['export', 'kubecfg', ...target(identity, store), '--admin'];
      const result = await executeCommand(runner, binaryPath, args, { env, timeout, signal, echo: true });
      if (result.exitCode !== 0) {
        return Failure(`${describe(args)}: ${failureReason(result)}`);
      }
      return Success(undefined);
    },

    async validate(identity, store, { timeout, signal, waitMs }) {
      const args = ['validate', 'cluster', ...target(identity, store), '--wait', toGoDuration(waitMs)];
      const result = await executeCommand(runner, binaryPath, args, { env, timeout, signal, echo: true });
      if (result.exitCode !== 0) {
        return Failure(`${describe(args)}: ${failureReason(result)}`);
      }
      return Success(undefined);
    },

    async delete(identity, store, { timeout, signal }) {
      const args = ['delete', 'cluster', ...target(identity, store), '--yes'];
      const result = await executeCommand(runner, binaryPath, args, { env, timeout, signal, echo: true });

      if (result.exitCode === 0) {
        return Success('deleted');
      }
      if (!result.timedOut && !result.aborted && NOT_FOUND.test(result.stderr)) {
        return Success('already-absent');
      }
      return Failure(`${describe(args)}: ${failureReason(result)}`);
    },
  };
};
