/**
 * Error taxonomy surfaced to callers.
 *
 * Every error carries a stable `code` and, where the user can act on it, a
 * `remediation` hint the CLI prints underneath the message.
 */
export type ErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'COMPILE_ERROR'
  | 'USER_DENIED'
  | 'DEPLOYMENT_FAILED'
  | 'DEPLOYMENT_TIMEOUT'
  | 'DEPLOYMENT_NOT_FOUND'
  | 'NO_DEPLOYMENTS_FOUND'
  | 'RESOURCE_NOT_FOUND'
  | 'RESOURCE_OPERATION_FAILED'
  | 'OPERATION_CANCELLED';

export class ProvisionError extends Error {
  readonly code: ErrorCode;
  readonly remediation?: string;

  constructor(code: ErrorCode, message: string, options: { cause?: unknown; remediation?: string } = {}) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.remediation = options.remediation;
  }
}

/** Cycles, unknown references, invalid defaults, unsupported types, missing settings */
export class ConfigurationError extends ProvisionError {
  constructor(message: string, options: { cause?: unknown; remediation?: string } = {}) {
    super('CONFIGURATION_ERROR', message, options);
  }
}

export class CompileError extends ProvisionError {
  readonly modulePath: string;

  constructor(modulePath: string, message: string, cause?: unknown) {
    super('COMPILE_ERROR', `Failed to compile ${modulePath}: ${message}`, { cause });
    this.modulePath = modulePath;
  }
}

export class UserDeniedError extends ProvisionError {
  constructor(message: string) {
    super('USER_DENIED', message);
  }
}

export class DeploymentFailedError extends ProvisionError {
  readonly deploymentName: string;

  constructor(deploymentName: string, cause: unknown) {
    super('DEPLOYMENT_FAILED', `Deployment ${deploymentName} failed: ${describeError(cause)}`, {
      cause,
      remediation: 'Inspect the deployment operations in the portal for the failing resource'
    });
    this.deploymentName = deploymentName;
  }
}

export class DeploymentTimeoutError extends ProvisionError {
  readonly attempts: number;

  constructor(deploymentName: string, attempts: number, cause?: unknown) {
    super('DEPLOYMENT_TIMEOUT', `Timed out waiting for deployment ${deploymentName} after ${attempts} attempts`, {
      cause
    });
    this.attempts = attempts;
  }
}

/** Raised by control planes when a deployment does not (yet) exist */
export class DeploymentNotFoundError extends ProvisionError {
  constructor(deploymentName: string, cause?: unknown) {
    super('DEPLOYMENT_NOT_FOUND', `Deployment ${deploymentName} not found`, { cause });
  }
}

export class NoDeploymentsFoundError extends ProvisionError {
  constructor(environmentName: string) {
    super('NO_DEPLOYMENTS_FOUND', `No deployments found for environment ${environmentName}`, {
      remediation: 'Run provision first, or check the selected subscription and resource group'
    });
  }
}

/** Raised by control planes on a 404 for anything other than a deployment */
export class ResourceNotFoundError extends ProvisionError {
  constructor(resource: string, cause?: unknown) {
    super('RESOURCE_NOT_FOUND', `${resource} not found`, { cause });
  }
}

export class ResourceOperationError extends ProvisionError {
  readonly resourceType: string;
  readonly resourceName: string;

  constructor(operation: string, resourceType: string, resourceName: string, cause: unknown) {
    super(
      'RESOURCE_OPERATION_FAILED',
      `${operation} ${resourceType} ${resourceName} failed: ${describeError(cause)}`,
      { cause }
    );
    this.resourceType = resourceType;
    this.resourceName = resourceName;
  }
}

export class OperationCancelledError extends ProvisionError {
  constructor(message = 'Operation cancelled', cause?: unknown) {
    super('OPERATION_CANCELLED', message, { cause });
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isProvisionError(error: unknown): error is ProvisionError {
  return error instanceof ProvisionError;
}
