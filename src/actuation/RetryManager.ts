import { EventEmitter } from 'events';
import { Logger, createLogger } from '../common/logger';
import { ActuationTimeoutError, toError } from '../common/errors';

export interface RetryOptions {
  maxRetries?: number;
  baseDelay?: number;
  maxDelay?: number;
  backoffFactor?: number;
  jitter?: boolean;
  jitterRange?: number;
  /** Budget for a single attempt (ms) */
  attemptTimeout?: number;
  /** Budget for all attempts together (ms) */
  timeout?: number;
  retryCondition?: (error: Error, attempt: number) => boolean;
  name?: string;
}

export interface RetryAttempt {
  attempt: number;
  delay: number;
  error?: Error;
  timestamp: number;
  totalElapsed: number;
}

interface RetryOutcome {
  attempts: RetryAttempt[];
  totalTime: number;
  finalAttempt: number;
}

export type RetryResult<T> = RetryOutcome & ({ success: true; result: T } | { success: false; error: Error });

/**
 * Retry manager with exponential backoff, jitter and per-attempt timeouts
 */
export class RetryManager extends EventEmitter {
  private activeRetries = new Map<string, RetryAttempt[]>();
  private readonly options: Required<RetryOptions>;
  private operationCounter = 0;

  constructor(options: RetryOptions = {}, private readonly logger: Logger = createLogger()) {
    super();

    this.options = {
      maxRetries: options.maxRetries ?? 3,
      baseDelay: options.baseDelay ?? 1000,
      maxDelay: options.maxDelay ?? 30000,
      backoffFactor: options.backoffFactor ?? 2,
      jitter: options.jitter !== false,
      jitterRange: options.jitterRange ?? 0.1,
      attemptTimeout: options.attemptTimeout ?? 10000,
      timeout: options.timeout ?? 60000,
      retryCondition: options.retryCondition ?? isTransientError,
      name: options.name ?? 'retry-manager'
    };
  }

  /**
   * Execute operation with retry logic, throwing the last error on exhaustion
   */
  async execute<T>(operation: () => Promise<T>, operationId?: string, customOptions?: Partial<RetryOptions>): Promise<T> {
    const outcome = await this.run(operation, operationId, customOptions);
    if (!outcome.success) {
      throw outcome.error;
    }
    return outcome.result;
  }

  /**
   * Execute operation with retry logic and report every attempt instead of throwing
   */
  async run<T>(
    operation: () => Promise<T>,
    operationId?: string,
    customOptions?: Partial<RetryOptions>
  ): Promise<RetryResult<T>> {
    const opts: Required<RetryOptions> = { ...this.options, ...stripUndefined(customOptions) };
    const id = operationId ?? this.generateOperationId();
    const startTime = Date.now();
    const attempts: RetryAttempt[] = [];
    let lastError: Error | undefined;

    this.activeRetries.set(id, attempts);

    try {
      for (let attempt = 1; attempt <= opts.maxRetries + 1; attempt++) {
        const attemptStart = Date.now();
        const totalElapsed = attemptStart - startTime;

        if (totalElapsed >= opts.timeout) {
          lastError = new ActuationTimeoutError(id, opts.timeout);
          break;
        }

        const attemptInfo: RetryAttempt = { attempt, delay: 0, timestamp: attemptStart, totalElapsed };

        try {
          this.emit('attempt-start', { operationId: id, attempt, totalElapsed });
          const result = await this.withTimeout(operation, id, opts.attemptTimeout);
          attemptInfo.delay = Date.now() - attemptStart;
          attempts.push(attemptInfo);

          this.emit('operation-success', { operationId: id, attempts: attempts.length });
          return { success: true, result, attempts, totalTime: Date.now() - startTime, finalAttempt: attempt };
        } catch (error) {
          lastError = toError(error);
          attemptInfo.error = lastError;
          attemptInfo.delay = Date.now() - attemptStart;
          attempts.push(attemptInfo);

          const willRetry = attempt <= opts.maxRetries && opts.retryCondition(lastError, attempt);
          this.emit('attempt-failure', { operationId: id, attempt, error: lastError, willRetry });
          if (!willRetry) {
            break;
          }

          const wait = this.calculateDelay(attempt, opts);
          this.logger.actuation(`[${opts.name}] ${id} attempt ${attempt} failed (${lastError.message}), retrying in ${wait}ms`);
          this.emit('retry-scheduled', { operationId: id, attempt, delay: wait, error: lastError });
          await this.sleep(wait);
        }
      }
    } finally {
      this.activeRetries.delete(id);
    }

    const error = lastError ?? new Error('Operation failed with unknown error');
    this.emit('operation-failed', { operationId: id, error, attempts: attempts.length });
    return {
      success: false,
      error,
      attempts,
      totalTime: Date.now() - startTime,
      finalAttempt: attempts.length
    };
  }

  /**
   * Calculate delay with backoff and jitter
   */
  calculateDelay(attempt: number, options: Required<RetryOptions> = this.options): number {
    let delay = options.baseDelay * Math.pow(options.backoffFactor, attempt - 1);

    // Apply maximum delay cap
    delay = Math.min(delay, options.maxDelay);

    // Apply jitter if enabled
    if (options.jitter) {
      const jitterAmount = delay * options.jitterRange;
      const jitter = (Math.random() - 0.5) * 2 * jitterAmount;
      delay = Math.max(0, delay + jitter);
    }

    return Math.round(delay);
  }

  /**
   * Get active retry operations
   */
  getActiveRetries(): Array<{ operationId: string; attempts: RetryAttempt[] }> {
    return Array.from(this.activeRetries.entries()).map(([id, attempts]) => ({
      operationId: id,
      attempts
    }));
  }

  /**
   * Cleanup resources
   */
  destroy(): void {
    this.activeRetries.clear();
    this.removeAllListeners();
  }

  private withTimeout<T>(operation: () => Promise<T>, id: string, timeoutMs: number): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => reject(new ActuationTimeoutError(id, timeoutMs)), timeoutMs);
      timer.unref(); // Prevent Jest hanging

      operation().then(
        value => {
          clearTimeout(timer);
          resolve(value);
        },
        (error: unknown) => {
          clearTimeout(timer);
          reject(toError(error));
        }
      );
    });
  }

  private generateOperationId(): string {
    this.operationCounter++;
    return `${this.options.name}-${Date.now()}-${this.operationCounter}`;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => {
      const timer = setTimeout(resolve, ms);
      timer.unref(); // Prevent Jest hanging
    });
  }
}

/**
 * Programming errors are not worth retrying; everything else might be transient
 */
export function isTransientError(error: Error): boolean {
  return error.name !== 'SyntaxError' && error.name !== 'TypeError';
}

function stripUndefined(options: Partial<RetryOptions> | undefined): Partial<RetryOptions> {
  const clean: Partial<RetryOptions> = {};
  if (!options) {
    return clean;
  }
  for (const [key, value] of Object.entries(options)) {
    if (value !== undefined) {
      Object.assign(clean, { [key]: value });
    }
  }
  return clean;
}
