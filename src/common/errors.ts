/**
 * Base error class for all failover engine errors.
 */
export class FailoverError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'FailoverError';
  }
}

/**
 * Thrown when a cloud actuator call fails.
 */
export class ActuationError extends FailoverError {
  readonly originalCause?: Error;

  constructor(operation: 'acquire' | 'release', ipId: string, instanceId: string, cause?: Error) {
    super(
      `Failed to ${operation} ${ipId} for ${instanceId}${cause ? `: ${cause.message}` : ''}`,
      'ACTUATION_FAILED',
      { operation, ipId, instanceId, cause: cause?.message }
    );
    this.name = 'ActuationError';
    this.originalCause = cause;
  }
}

/**
 * Thrown when a single actuator call exceeds its time budget.
 */
export class ActuationTimeoutError extends FailoverError {
  constructor(operation: string, timeoutMs: number) {
    super(`Actuation timed out after ${timeoutMs}ms: ${operation}`, 'ACTUATION_TIMEOUT', {
      operation,
      timeoutMs
    });
    this.name = 'ActuationTimeoutError';
  }
}

/**
 * Thrown when the configuration file is missing required fields.
 */
export class ConfigurationError extends FailoverError {
  constructor(message: string, source?: string) {
    super(message, 'INVALID_CONFIGURATION', { source });
    this.name = 'ConfigurationError';
  }
}

/**
 * Thrown when the membership layer cannot produce a full listing.
 */
export class MembershipQueryError extends FailoverError {
  constructor(message: string, cause?: Error) {
    super(message, 'MEMBERSHIP_QUERY_FAILED', { cause: cause?.message });
    this.name = 'MembershipQueryError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
