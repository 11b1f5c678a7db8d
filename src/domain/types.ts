/**
 * Core type definitions for the kops-gce orchestrator.
 * Provides the Result type used at collaborator boundaries and the
 * domain entities shared by every provisioning step.
 */

/**
 * Result type for functional error handling
 *
 * @example
 * ```typescript
 * const result = await storage.makeBucket(location);
 * if (!result.ok) {
 *   logger.error(result.error);
 *   return Failure('Store creation failed');
 * }
 * return Success(result.value);
 * ```
 */
export type Result<T> = { ok: true; value: T } | { ok: false; error: string };

export const Success = <T>(value: T): Result<T> => ({ ok: true, value });

export const Failure = <T>(error: string): Result<T> => ({ ok: false, error });

// ===== CLUSTER DOMAIN =====

/**
 * Logical name under which a cluster's resources, store and context are addressed.
 * Both names must be DNS-label safe; callers are responsible for that.
 */
export interface ClusterIdentity {
  nameBase: string;
  fullyQualifiedName: string;
}

/** Durable remote bucket holding the cluster's declarative state */
export interface StoreLocation {
  uri: string;
  projectId: string;
}

export interface WorkDir {
  root: string;
  binDir: string;
  kubeconfigPath: string;
}

export const PLATFORMS = ['linux', 'mac', 'cloudshell'] as const;

export type Platform = (typeof PLATFORMS)[number];

/**
 * Lifecycle states. Never persisted; each run re-derives what it needs
 * from the cluster tool and the remote store.
 */
export type ClusterState =
  | 'unknown'
  | 'creating'
  | 'validating'
  | 'ready'
  | 'destroying'
  | 'destroyed';

export type StoreOutcome = 'created' | 'already-exists';

export type DeletionOutcome = 'deleted' | 'already-absent' | 'failed';

export interface DeletionReport {
  target: string;
  outcome: DeletionOutcome;
  error?: string;
}
