/**
 * Typed error model for machine-actionable error handling.
 *
 * Errors are returned as typed values on results and events rather than
 * thrown, so operators (and the HTTP surface) can tell "didn't run" from
 * "ran and failed" without parsing messages.
 */

/** Top-level error domain namespaces. */
export type ErrorDomain =
  | 'INVALID_COMBINATION'
  | 'ENVIRONMENT'
  | 'BUILD'
  | 'SCHEDULER'
  | 'PUBLISH'
  | 'RUN'
  | 'PIPELINE'
  | 'VALIDATION'
  | 'SYSTEM';

/** Typed suggested fix that operators or tooling can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure returned in API responses and events. */
export interface TypedError {
  /** Namespaced error code (e.g., "BUILD.FAILED"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  /** Associated build job if applicable. */
  jobId?: string;
  /** Associated pipeline run if applicable. */
  runId?: string;
  /**
   * Whether the same operation is expected to succeed without changes.
   * Nothing in the orchestrator retries on its own; this is advice for callers.
   */
  retryable: boolean;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
  /** Machine-actionable remediation suggestions. */
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  jobId?: string;
  runId?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    jobId: params.jobId,
    runId: params.runId,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

// --- Common error factory functions ---

export function validationError(message: string, details?: Record<string, unknown>, fixes?: SuggestedFix[]): TypedError {
  return createTypedError({
    code: 'VALIDATION.SCHEMA',
    message,
    details,
    suggestedFixes: fixes,
  });
}

export function notFoundError(resourceType: string, resourceId: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.NOT_FOUND',
    message: `${resourceType} not found: ${resourceId}`,
  });
}

export function environmentAcquisitionError(jobId: string, message: string): TypedError {
  return createTypedError({
    code: 'ENVIRONMENT.ACQUISITION_FAILED',
    message: `Could not acquire build environment: ${message}`,
    jobId,
  });
}

export function toolInstallError(jobId: string, tool: string, message: string): TypedError {
  return createTypedError({
    code: 'ENVIRONMENT.INSTALL_FAILED',
    message: `Failed to install ${tool}: ${message}`,
    jobId,
    details: { tool },
    suggestedFixes: [
      { type: 'CHECK_TOOLCHAIN_PACKAGES', params: { tool }, description: `Verify that "${tool}" is installable on this host` },
    ],
  });
}

export function buildFailedError(jobId: string, exitCode: number | null, diagnostics: string): TypedError {
  return createTypedError({
    code: 'BUILD.FAILED',
    message: exitCode === null ? 'Build terminated without an exit code' : `Build exited with code ${exitCode}`,
    jobId,
    details: { exitCode, diagnostics },
  });
}

export function buildTimeoutError(jobId: string, timeoutMs: number): TypedError {
  return createTypedError({
    code: 'BUILD.TIMEOUT',
    message: `Build exceeded timeout of ${timeoutMs}ms`,
    jobId,
    details: { timeoutMs },
    suggestedFixes: [
      { type: 'INCREASE_TIMEOUT', params: { timeoutMs: timeoutMs * 2 } },
    ],
  });
}

export function canceledBySchedulerError(jobId: string, reason: string): TypedError {
  return createTypedError({
    code: 'SCHEDULER.CANCELED',
    message: `Job not run: ${reason}`,
    jobId,
    details: { reason },
  });
}

export function publishAuthError(registry: string, message: string): TypedError {
  return createTypedError({
    code: 'PUBLISH.AUTH_FAILED',
    message: `Registry authentication rejected for ${registry}: ${message}`,
    details: { registry },
    suggestedFixes: [
      { type: 'PROVIDE_CREDENTIALS', params: { registry }, description: 'Provide registry credentials with push permission' },
    ],
  });
}

export function publishContextError(message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'PUBLISH.CONTEXT_INVALID',
    message,
    details,
  });
}

export function platformBuildError(platform: string, message: string, diagnostics?: string): TypedError {
  return createTypedError({
    code: 'PUBLISH.PLATFORM_BUILD_FAILED',
    message: `Build for ${platform} failed: ${message}`,
    details: { platform, diagnostics },
  });
}

export function manifestAssemblyError(message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'PUBLISH.MANIFEST_ASSEMBLY_FAILED',
    message,
    details,
  });
}

/**
 * Mask a secret value, preserving only the last 4 characters for
 * identification. Secrets shorter than 8 characters are fully masked.
 */
export function maskSecret(secret: string): string {
  if (!secret || secret.length < 8) return '****';
  return '*'.repeat(secret.length - 4) + secret.slice(-4);
}

/**
 * Replace every occurrence of the given secrets in a message with its
 * masked form. Registry tokens end up in process output and HTTP errors.
 */
export function maskSecretsInMessage(message: string, secrets: string[]): string {
  let result = message;
  for (const secret of secrets) {
    if (secret && secret.length > 0) {
      // split/join avoids regex escaping of the secret
      result = result.split(secret).join(maskSecret(secret));
    }
  }
  return result;
}

// --- RUN error factory functions ---

export function runNotFoundError(runId: string): TypedError {
  return createTypedError({
    code: 'RUN.NOT_FOUND',
    message: `Run not found: ${runId}`,
    runId,
  });
}

export function runCanceledError(runId: string, reason?: string): TypedError {
  return createTypedError({
    code: 'RUN.CANCELED',
    message: reason ? `Run canceled: ${reason}` : 'Run canceled',
    runId,
    details: reason ? { reason } : undefined,
  });
}

/** Extract a message from an unknown thrown value. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  return 'Unknown error';
}

/** Wrapper for typed errors that have to cross a throwing boundary. */
export class OrchestratorError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'OrchestratorError';
  }
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: TypedError;
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}
