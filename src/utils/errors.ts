/**
 * @fileoverview Standardized error handling utilities.
 *
 * Provides consistent error patterns across the codebase:
 * - AppError: Base class for application-specific errors
 * - Credential lifecycle errors: one class per failure kind, each with a
 *   stable code the HTTP layer can map to a status
 * - withTimeout: Bounds any async operation
 */

/**
 * Base class for application-specific errors.
 * Includes error code, recoverability flag, and optional context.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly recoverable: boolean = false,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/**
 * Authorization code was rejected (invalid, expired or already used).
 * Surfaced to the interactive caller; never retried.
 */
export class AuthExchangeFailedError extends AppError {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly upstreamBody?: string
  ) {
    super(message, 'AUTH_EXCHANGE_FAILED', false, { status });
    this.name = 'AuthExchangeFailedError';
  }
}

/** Transient refresh failure (network, timeout, 5xx). Retried once. */
export class RefreshFailedError extends AppError {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly upstreamBody?: string
  ) {
    super(message, 'REFRESH_FAILED', true, { status });
    this.name = 'RefreshFailedError';
  }
}

/** The authorization server no longer accepts the stored refresh token. */
export class RefreshTokenInvalidError extends AppError {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly upstreamBody?: string
  ) {
    super(message, 'REFRESH_TOKEN_INVALID', false, { status });
    this.name = 'RefreshTokenInvalidError';
  }
}

export type ReauthorizationReason = 'not_connected' | 'refresh_token_invalid';

/**
 * The realm must go through the interactive authorization flow again.
 */
export class ReauthorizationRequiredError extends AppError {
  constructor(
    public readonly realmId: string,
    public readonly reason: ReauthorizationReason
  ) {
    super(`QuickBooks authorization required for realm ${realmId}`, 'REAUTHORIZATION_REQUIRED', false, {
      realmId,
      reason,
    });
    this.name = 'ReauthorizationRequiredError';
  }
}

/** A single persistence backend could not be reached or initialized. */
export class BackendUnavailableError extends AppError {
  constructor(
    public readonly backend: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'BACKEND_UNAVAILABLE', true, { backend });
    this.name = 'BackendUnavailableError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/** Every persistence backend failed. */
export class StorageUnavailableError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'STORAGE_UNAVAILABLE', true, context);
    this.name = 'StorageUnavailableError';
  }
}

/** Stored credential payload could not be parsed into a usable record. */
export class CorruptRecordError extends AppError {
  constructor(
    public readonly backend: string,
    public readonly realmId: string | undefined,
    message: string
  ) {
    super(message, 'CORRUPT_RECORD', false, { backend, realmId });
    this.name = 'CorruptRecordError';
  }
}

/** An operation did not settle within its time bound. */
export class OperationTimeoutError extends AppError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`, 'TIMEOUT', true, { operation, timeoutMs });
    this.name = 'OperationTimeoutError';
  }
}

/**
 * Reject with OperationTimeoutError if `promise` has not settled in time.
 * The underlying work is not cancelled.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation: string
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new OperationTimeoutError(operation, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/** Message of an unknown thrown value. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
