/**
 * Context Manager
 *
 * Aliases the context kops writes (named after the fully qualified cluster
 * name) to the short identity name, makes it current, and grants the
 * operator cluster-admin inside the new cluster.
 */

import type { Logger } from 'pino';
import { loadKubeconfig, saveKubeconfig, type ClusterAccess } from '../infrastructure/kubernetes/client';
import { ErrorCodes, ProvisioningError, errorMessage } from '../lib/errors';

export interface ContextManager {
  renameContext: (oldName: string, newName: string) => Promise<void>;
  grantClusterAdmin: (account: string, signal?: AbortSignal) => Promise<void>;
}

export interface ContextManagerOptions {
  kubeconfigPath: string;
  timeout: number;
}

export const createContextManager = (
  access: ClusterAccess,
  logger: Logger,
  { kubeconfigPath, timeout }: ContextManagerOptions,
): ContextManager => ({
  async renameContext(oldName, newName) {
    const kc = await loadKubeconfig(kubeconfigPath).catch((error: unknown) => {
      throw new ProvisioningError(
        `cannot read kubeconfig ${kubeconfigPath}: ${errorMessage(error)}`,
        ErrorCodes.KUBECONFIG_FAILED,
        { step: 'rename-context' },
      );
    });

    const source = kc.getContextObject(oldName);
    if (!source) {
      throw new ProvisioningError(
        `context '${oldName}' not found in ${kubeconfigPath}`,
        ErrorCodes.CONTEXT_NOT_FOUND,
        { step: 'rename-context' },
      );
    }

    // The alias replaces any previous context of the same name; the source stays.
    const contexts = kc.getContexts().filter((context) => context.name !== newName);
    kc.loadFromOptions({
      clusters: kc.getClusters(),
      users: kc.getUsers(),
      contexts: [...contexts, { ...source, name: newName }],
      currentContext: newName,
    });

    try {
      await saveKubeconfig(kubeconfigPath, kc);
    } catch (error) {
      throw new ProvisioningError(
        `cannot write kubeconfig ${kubeconfigPath}: ${errorMessage(error)}`,
        ErrorCodes.KUBECONFIG_FAILED,
        { step: 'rename-context' },
      );
    }

    logger.info({ from: oldName, to: newName }, 'Context aliased and activated');
  },

  async grantClusterAdmin(account, signal) {
    const result = await access.grantClusterAdmin(account, { timeout, signal });
    if (!result.ok) {
      throw new ProvisioningError(result.error, ErrorCodes.RBAC_FAILED, {
        step: 'grant-cluster-admin',
        command: `create clusterrolebinding --user ${account}`,
      });
    }

    if (result.value === 'already-exists') {
      logger.info({ account }, 'cluster-admin binding already exists');
    } else {
      logger.info({ account }, 'Granted cluster-admin');
    }
  },
});
