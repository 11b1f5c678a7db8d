/**
 * Library entry point: the orchestrator's services, clients and types for
 * embedding the install/destroy pipeline in other tooling.
 */

export * from './domain/types';
export * from './lib/errors';
export { createLogger, createTimer, type Logger, type Timer } from './lib/logger';
export {
  createAppConfig,
  clusterIdentity,
  storeLocation,
  workDirLayout,
  type AppConfig,
  type CliOptions,
} from './config/app-config';
export { createBootstrap, createContainer, type Deps } from './app/container';
export { CommandExecutor, type CommandRunner, type CommandResult } from './infrastructure/command-executor';
export { detectPlatform } from './services/platform';
export { ensureCredentials } from './services/credentials';
export { createStorageProvisioner, type StorageProvisioner } from './services/storage-provisioner';
export { createBinaryProvisioner, type BinaryProvisioner } from './services/binary-provisioner';
export { createContextManager, type ContextManager } from './services/context-manager';
export {
  createClusterLifecycle,
  type ClusterLifecycle,
  type InstallReport,
  type DestroyReport,
} from './services/cluster-lifecycle';
export { run } from './cli/cli';
