/**
 * Structured Error Classes for kops-gce
 *
 * Every fatal condition in a run is a ProvisioningError carrying the
 * high-level step that failed and the collaborator command behind it.
 */

/**
 * Error codes for standardized error handling
 */
export const ErrorCodes = {
  // Invocation errors
  COMMAND_NOT_SUPPLIED: 'COMMAND_NOT_SUPPLIED',
  INVALID_COMMAND: 'INVALID_COMMAND',
  INVALID_CONFIGURATION: 'INVALID_CONFIGURATION',

  // Host errors
  UNSUPPORTED_PLATFORM: 'UNSUPPORTED_PLATFORM',

  // Provisioning errors
  CREDENTIALS_FAILED: 'CREDENTIALS_FAILED',
  STORE_CREATE_FAILED: 'STORE_CREATE_FAILED',
  BINARY_DOWNLOAD_FAILED: 'BINARY_DOWNLOAD_FAILED',

  // Cluster errors
  CLUSTER_QUERY_FAILED: 'CLUSTER_QUERY_FAILED',
  CLUSTER_CREATE_FAILED: 'CLUSTER_CREATE_FAILED',
  CLUSTER_NOT_READY: 'CLUSTER_NOT_READY',
  CLUSTER_DESTROY_FAILED: 'CLUSTER_DESTROY_FAILED',

  // Kubernetes client errors
  CONTEXT_NOT_FOUND: 'CONTEXT_NOT_FOUND',
  KUBECONFIG_FAILED: 'KUBECONFIG_FAILED',
  RBAC_FAILED: 'RBAC_FAILED',

  // Generic errors
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  TIMEOUT: 'TIMEOUT',
  ABORTED: 'ABORTED',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export interface ErrorContext {
  /** High-level step that failed, e.g. "install" or "ensure-store" */
  step?: string;
  /** Collaborator command line behind the failure */
  command?: string;
  details?: Record<string, unknown>;
}

/**
 * Base error class for every fatal provisioning condition
 */
export class ProvisioningError extends Error {
  public readonly code: ErrorCode;
  public readonly step: string | undefined;
  public readonly command: string | undefined;
  public readonly details: Record<string, unknown>;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: ErrorCode = ErrorCodes.INTERNAL_ERROR,
    context: ErrorContext = {},
  ) {
    super(message);
    this.name = 'ProvisioningError';
    this.code = code;
    this.step = context.step;
    this.command = context.command;
    this.details = context.details ?? {};
    this.timestamp = new Date();

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert to plain object for structured logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      step: this.step,
      command: this.command,
      details: this.details,
      timestamp: this.timestamp,
    };
  }
}

/**
 * Raised when an external invocation exceeds its local time budget
 */
export class TimeoutError extends ProvisioningError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, ErrorCodes.TIMEOUT, context);
    this.name = 'TimeoutError';
  }
}

/**
 * Raised for bad invocations: missing or unknown command, invalid flags
 */
export class UsageError extends ProvisioningError {
  constructor(message: string, code: ErrorCode = ErrorCodes.INVALID_COMMAND) {
    super(message, code, { step: 'parse-arguments' });
    this.name = 'UsageError';
  }
}

export function isProvisioningError(error: unknown): error is ProvisioningError {
  return error instanceof ProvisioningError;
}

/**
 * Single-line fatal message shown to the operator:
 * `ERROR: <step> failed (<command>): <message>`
 */
export function formatFatal(error: unknown): string {
  if (error instanceof UsageError) {
    return `ERROR: ${error.message}`;
  }
  if (isProvisioningError(error)) {
    const step = error.step ?? 'run';
    const command = error.command ? ` (${error.command})` : '';
    return `ERROR: ${step} failed${command}: ${error.message}`;
  }
  const message = error instanceof Error ? error.message : String(error);
  return `ERROR: run failed: ${message}`;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
