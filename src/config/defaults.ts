/**
 * Centralized Configuration Defaults
 *
 * Single source of truth for the constants the orchestrator composes
 * names, paths and invocations from.
 */

export const DEFAULT_CLUSTER = {
  nameBase: 'kops',
  /** Gossip-based DNS suffix; clusters ending in .k8s.local need no hosted zone */
  domainSuffix: '.k8s.local',
  nodeCount: 4,
  nodeSize: 'n1-standard-2',
  apiLoadBalancerType: 'public',
} as const;

export const DEFAULT_STORE = {
  scheme: 'gs://',
  suffix: '-state',
} as const;

export const DEFAULT_WORKDIR = {
  rootName: '.kops-gce',
  binDirName: 'bin',
  kubeconfigName: 'kubeconfig',
  archiveSuffix: '.old',
} as const;

export const KOPS_RELEASES = {
  binaryName: 'kops',
  latestReleaseUrl: 'https://api.github.com/repos/kubernetes/kops/releases/latest',
  downloadBaseUrl: 'https://github.com/kubernetes/kops/releases/download',
  featureFlags: 'AlphaAllowGCE',
} as const;

/**
 * Default timeout values in milliseconds
 */
export const DEFAULT_TIMEOUTS = {
  command: 120000, // 2 minutes
  ambientLookup: 30000, // gcloud config reads before the config exists
  login: 600000, // 10 minutes, interactive browser flow
  create: 1800000, // 30 minutes
  validate: 600000, // 10 minutes, passed to kops as --wait
  validateGrace: 60000, // local slack on top of the kops wait budget
  delete: 1800000, // 30 minutes
  download: 300000, // 5 minutes
} as const;

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
