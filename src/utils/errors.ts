import { DeploymentError } from '../types/index.js';

export type ErrorCategory =
  | 'precondition'
  | 'configuration'
  | 'authentication'
  | 'transient'
  | 'apply'
  | 'command';

/**
 * Base class for every failure the pipeline reports. Carries a stable code
 * and a remediation hint that end up in the deployment result.
 */
export class DeploymentStageError extends Error {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly remediation?: string;

  constructor(
    category: ErrorCategory,
    code: string,
    message: string,
    options: { remediation?: string; cause?: unknown } = {}
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.category = category;
    this.code = code;
    this.remediation = options.remediation;
  }

  toDeploymentError(): DeploymentError {
    return {
      code: this.code,
      message: this.message,
      remediation: this.remediation,
      details: this.cause instanceof Error ? this.cause.message : undefined
    };
  }
}

export class PreconditionError extends DeploymentStageError {
  constructor(message: string, options: { remediation?: string; cause?: unknown } = {}) {
    super('precondition', 'PRECONDITION_FAILED', message, options);
  }
}

export class ConfigurationError extends DeploymentStageError {
  constructor(message: string, options: { remediation?: string; cause?: unknown } = {}) {
    super('configuration', 'CONFIGURATION_INVALID', message, options);
  }
}

export class AuthenticationError extends DeploymentStageError {
  constructor(message: string, options: { remediation?: string; cause?: unknown } = {}) {
    super('authentication', 'AUTHENTICATION_FAILED', message, {
      remediation: 'Check the service principal credentials stored in the CI secret store',
      ...options
    });
  }
}

export class TransientError extends DeploymentStageError {
  constructor(message: string, options: { remediation?: string; cause?: unknown } = {}) {
    super('transient', 'TRANSIENT_FAILURE', message, options);
  }
}

export class ApplyError extends DeploymentStageError {
  readonly appliedBeforeFailure: string[];

  constructor(message: string, appliedBeforeFailure: string[], options: { cause?: unknown } = {}) {
    super('apply', 'APPLY_FAILED', message, {
      remediation: appliedBeforeFailure.length > 0
        ? `Manifests already applied (${appliedBeforeFailure.join(', ')}) were left in place; fix the failing manifest and re-run`
        : 'Inspect the pod logs collected below and re-run once the manifest is fixed',
      cause: options.cause
    });
    this.appliedBeforeFailure = appliedBeforeFailure;
  }
}

export interface CommandFailure {
  command: string;
  exitCode?: number;
  stderr: string;
  timedOut: boolean;
}

const TRANSIENT_PATTERNS = [
  /timed? ?out/i,
  /throttl/i,
  /too many requests/i,
  /\b429\b/,
  /\b50[234]\b/,
  /connection (reset|refused)/i,
  /ECONNRESET|ETIMEDOUT|EAI_AGAIN/,
  /temporarily unavailable/i
];

/**
 * A failed external command (az, kubectl, gh). The rendered command line
 * has secret arguments already redacted.
 */
export class CommandError extends DeploymentStageError {
  readonly failure: CommandFailure;

  constructor(failure: CommandFailure) {
    const reason = failure.timedOut
      ? 'timed out'
      : `exited with code ${failure.exitCode ?? 'unknown'}`;
    const detail = failure.stderr.trim();
    super('command', 'COMMAND_FAILED', `${failure.command} ${reason}${detail ? `: ${detail}` : ''}`);
    this.failure = failure;
  }

  get transient(): boolean {
    return this.failure.timedOut || TRANSIENT_PATTERNS.some(pattern => pattern.test(this.failure.stderr));
  }
}

export function isTransient(error: unknown): boolean {
  if (error instanceof TransientError) {
    return true;
  }
  if (error instanceof CommandError) {
    return error.transient;
  }
  return false;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toDeploymentError(error: unknown): DeploymentError {
  if (error instanceof DeploymentStageError) {
    return error.toDeploymentError();
  }
  return {
    code: 'DEPLOYMENT_FAILED',
    message: error instanceof Error ? error.message : 'Unknown deployment error',
    details: error
  };
}
