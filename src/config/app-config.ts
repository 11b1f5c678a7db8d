/**
 * Unified Application Configuration
 *
 * Built once at startup from CLI options, environment and the ambient gcloud
 * configuration, validated with Zod, then frozen and passed explicitly to
 * every component. Nothing downstream reads process.env.
 */

import { z } from 'zod';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { PLATFORMS, type ClusterIdentity, type StoreLocation, type WorkDir } from '../domain/types';
import { ErrorCodes, ProvisioningError } from '../lib/errors';
import {
  DEFAULT_CLUSTER,
  DEFAULT_STORE,
  DEFAULT_TIMEOUTS,
  DEFAULT_WORKDIR,
  LOG_LEVELS,
} from './defaults';

const BooleanFlagSchema = z
  .union([z.boolean(), z.string()])
  .transform((value) => (typeof value === 'boolean' ? value : ['true', '1', 'yes'].includes(value.toLowerCase())));

const TimeoutSchema = (fallback: number): z.ZodDefault<z.ZodNumber> =>
  z.coerce.number().int().positive().default(fallback);

const AppConfigSchema = z.object({
  cluster: z.object({
    nameBase: z.string().min(1),
    zone: z.string().min(1).optional(),
    projectId: z.string().min(1, 'project id is required (pass --project-id or set a gcloud default project)'),
    nodeCount: z.coerce.number().int().positive().default(DEFAULT_CLUSTER.nodeCount),
    nodeSize: z.string().min(1).default(DEFAULT_CLUSTER.nodeSize),
    apiLoadBalancerType: z.enum(['public', 'internal']).default(DEFAULT_CLUSTER.apiLoadBalancerType),
  }),
  workDirRoot: z.string().min(1),
  platform: z.object({
    osType: z.string(),
    managedShell: z.boolean(),
    override: z.enum(PLATFORMS).optional(),
  }),
  skipCredentials: BooleanFlagSchema.default(false),
  logLevel: z.enum(LOG_LEVELS).default('info'),
  timeouts: z.object({
    command: TimeoutSchema(DEFAULT_TIMEOUTS.command),
    login: TimeoutSchema(DEFAULT_TIMEOUTS.login),
    create: TimeoutSchema(DEFAULT_TIMEOUTS.create),
    validate: TimeoutSchema(DEFAULT_TIMEOUTS.validate),
    delete: TimeoutSchema(DEFAULT_TIMEOUTS.delete),
    download: TimeoutSchema(DEFAULT_TIMEOUTS.download),
  }),
});

type ParsedConfig = z.infer<typeof AppConfigSchema>;

export interface AppConfig {
  readonly identity: Readonly<ClusterIdentity>;
  readonly store: Readonly<StoreLocation>;
  readonly workDir: Readonly<WorkDir>;
  readonly cluster: Readonly<ParsedConfig['cluster']>;
  readonly platform: Readonly<ParsedConfig['platform']>;
  readonly skipCredentials: boolean;
  readonly logLevel: ParsedConfig['logLevel'];
  readonly timeouts: Readonly<ParsedConfig['timeouts']>;
}

/** Options accepted on the command line */
export type CliOptions = {
  clusterName?: string;
  zone?: string;
  projectId?: string;
  skipCredentials?: boolean;
  workDir?: string;
  logLevel?: string;
};

/** Values read from the active gcloud configuration */
export interface AmbientDefaults {
  projectId?: string;
  zone?: string;
}

export interface ConfigSources {
  options: CliOptions;
  env: NodeJS.ProcessEnv;
  ambient?: AmbientDefaults;
  osType: string;
  homeDir?: string;
}

export function clusterIdentity(nameBase: string): ClusterIdentity {
  return { nameBase, fullyQualifiedName: `${nameBase}${DEFAULT_CLUSTER.domainSuffix}` };
}

export function storeLocation(projectId: string, nameBase: string): StoreLocation {
  return {
    uri: `${DEFAULT_STORE.scheme}${projectId}-${nameBase}${DEFAULT_STORE.suffix}`,
    projectId,
  };
}

export function workDirLayout(root: string): WorkDir {
  return {
    root,
    binDir: join(root, DEFAULT_WORKDIR.binDirName),
    kubeconfigPath: join(root, DEFAULT_WORKDIR.kubeconfigName),
  };
}

/**
 * Name base from CLI options without touching the ambient configuration.
 * The CLI needs it before gcloud defaults are resolved.
 */
export function resolveNameBase(options: CliOptions): string {
  return options.clusterName ?? DEFAULT_CLUSTER.nameBase;
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const nested of Object.values(value)) {
    if (nested !== null && typeof nested === 'object' && !Object.isFrozen(nested)) {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}

/**
 * Create the immutable run configuration. CLI options win over the
 * environment, which wins over ambient gcloud values and built-in defaults.
 */
export function createAppConfig(sources: ConfigSources): AppConfig {
  const { options, env, ambient = {}, osType } = sources;
  const nameBase = resolveNameBase(options);
  const homeDir = sources.homeDir ?? homedir();

  const rawConfig = {
    cluster: {
      nameBase,
      zone: options.zone ?? ambient.zone,
      projectId: options.projectId ?? ambient.projectId ?? '',
      nodeCount: env.KOPS_GCE_NODE_COUNT,
      nodeSize: env.KOPS_GCE_NODE_SIZE,
    },
    workDirRoot: options.workDir ?? env.KOPS_GCE_WORK_DIR ?? join(homeDir, DEFAULT_WORKDIR.rootName, nameBase),
    platform: {
      osType,
      managedShell: env.CLOUD_SHELL === 'true',
      override: env.KOPS_GCE_PLATFORM || undefined,
    },
    skipCredentials: options.skipCredentials || env.KOPS_GCE_SKIP_CREDENTIALS,
    logLevel: options.logLevel ?? env.LOG_LEVEL,
    timeouts: {
      command: env.KOPS_GCE_COMMAND_TIMEOUT_MS,
      create: env.KOPS_GCE_CREATE_TIMEOUT_MS,
    },
  };

  const result = AppConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ProvisioningError(
      `Configuration validation failed: ${issues.join('; ')}`,
      ErrorCodes.INVALID_CONFIGURATION,
      { step: 'load-configuration' },
    );
  }

  const parsed = result.data;

  return deepFreeze({
    identity: clusterIdentity(parsed.cluster.nameBase),
    store: storeLocation(parsed.cluster.projectId, parsed.cluster.nameBase),
    workDir: workDirLayout(parsed.workDirRoot),
    cluster: parsed.cluster,
    platform: parsed.platform,
    skipCredentials: parsed.skipCredentials,
    logLevel: parsed.logLevel,
    timeouts: parsed.timeouts,
  });
}
