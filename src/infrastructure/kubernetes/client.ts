/**
 * Kubernetes Client - Direct k8s API Access
 *
 * Kubeconfig load/save against an explicit file and the RBAC call that
 * grants the operator cluster-admin, using @kubernetes/client-node.
 */

import * as k8s from '@kubernetes/client-node';
import { readFile, writeFile } from 'node:fs/promises';
import { dump } from 'js-yaml';
import type { Logger } from 'pino';
import { Success, Failure, type Result } from '../../domain/types';
import { errorMessage } from '../../lib/errors';
import { withTimeout } from '../../shared/async';

export const CLUSTER_ADMIN_BINDING = 'cluster-admin-binding';
const RBAC_GROUP = 'rbac.authorization.k8s.io';

/**
 * Load a kubeconfig file without consulting KUBECONFIG or ~/.kube
 */
export async function loadKubeconfig(path: string): Promise<k8s.KubeConfig> {
  const kc = new k8s.KubeConfig();
  kc.loadFromString(await readFile(path, 'utf-8'));
  return kc;
}

/**
 * Serialise a kubeconfig back to YAML in kubectl's field naming
 */
export async function saveKubeconfig(path: string, kc: k8s.KubeConfig): Promise<void> {
  const document: unknown = JSON.parse(kc.exportConfig());
  await writeFile(path, dump(document), { mode: 0o600 });
}

export function clusterAdminBinding(account: string): k8s.V1ClusterRoleBinding {
  return {
    apiVersion: `${RBAC_GROUP}/v1`,
    kind: 'ClusterRoleBinding',
    metadata: { name: CLUSTER_ADMIN_BINDING },
    roleRef: { apiGroup: RBAC_GROUP, kind: 'ClusterRole', name: 'cluster-admin' },
    subjects: [{ apiGroup: RBAC_GROUP, kind: 'User', name: account }],
  };
}

const isConflict = (error: unknown): boolean =>
  error instanceof k8s.HttpError && error.statusCode === 409;

export interface ClusterAccess {
  /** Bind `account` to cluster-admin; an existing binding counts as success */
  grantClusterAdmin: (
    account: string,
    options: { timeout: number; signal?: AbortSignal },
  ) => Promise<Result<'created' | 'already-exists'>>;
}

/**
 * Create an RBAC client bound to the current context of `kubeconfigPath`
 */
export const createClusterAccess = (logger: Logger, kubeconfigPath: string): ClusterAccess => ({
  async grantClusterAdmin(account, { timeout, signal }) {
    try {
      const kc = await loadKubeconfig(kubeconfigPath);
      const rbacApi = kc.makeApiClient(k8s.RbacAuthorizationV1Api);

      await withTimeout(() => rbacApi.createClusterRoleBinding(clusterAdminBinding(account)), {
        timeoutMs: timeout,
        errorMessage: 'create ClusterRoleBinding timed out',
        signal,
      });

      logger.debug({ account, context: kc.getCurrentContext() }, 'ClusterRoleBinding created');
      return Success('created');
    } catch (error) {
      if (isConflict(error)) {
        return Success('already-exists');
      }
      return Failure(`Failed to create ClusterRoleBinding ${CLUSTER_ADMIN_BINDING}: ${errorMessage(error)}`);
    }
  },
});
