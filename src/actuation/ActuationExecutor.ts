import { FailoverAction, FloatingIpId } from '../types';
import { ActuationResult } from '../failover/FailoverDecisionEngine';
import { Logger, createLogger } from '../common/logger';
import { ActuationError } from '../common/errors';
import { RetryManager } from './RetryManager';
import { ActuationOptions, CloudIpActuator, DEFAULT_ACTUATION_OPTIONS } from './types';

/**
 * Runs engine actions against a CloudIpActuator.
 *
 * Acquires are retried with exponential backoff up to `maxAttempts`.
 * Releases get a single attempt: the instance losing the address is often the
 * one that just died, and the following acquire re-associates regardless.
 * `perform` never rejects; failures come back as results.
 */
export class ActuationExecutor {
  private readonly options: ActuationOptions;
  private readonly retryManager: RetryManager;

  constructor(
    private readonly actuator: CloudIpActuator,
    options: Partial<ActuationOptions> = {},
    private readonly logger: Logger = createLogger()
  ) {
    this.options = { ...DEFAULT_ACTUATION_OPTIONS, ...options };
    this.retryManager = new RetryManager(
      {
        maxRetries: Math.max(0, this.options.maxAttempts - 1),
        baseDelay: this.options.baseDelay,
        maxDelay: this.options.maxDelay,
        jitter: this.options.jitter,
        attemptTimeout: this.options.timeout,
        timeout: (this.options.timeout + this.options.maxDelay) * this.options.maxAttempts,
        name: 'actuation'
      },
      logger
    );
  }

  async perform(action: FailoverAction): Promise<ActuationResult> {
    const operationId = `${action.kind}:${action.ipId}:${action.instanceId}`;
    this.logger.actuation(`${action.kind} ${action.ipId} → ${action.instanceId} (${action.reason})`);

    const outcome = action.kind === 'acquire'
      ? await this.retryManager.run(() => this.actuator.acquire(action.ipId, action.instanceId), operationId)
      : await this.retryManager.run(() => this.actuator.release(action.ipId, action.instanceId), operationId, {
          maxRetries: 0
        });

    if (outcome.success) {
      return { action, ok: true, attempts: outcome.attempts.length, at: Date.now() };
    }

    const error = new ActuationError(action.kind, action.ipId, action.instanceId, outcome.error);
    if (action.kind === 'release') {
      this.logger.actuation(`Release of ${action.ipId} from ${action.instanceId} failed, continuing: ${outcome.error.message}`);
    } else {
      this.logger.error(error.message);
    }
    return { action, ok: false, attempts: outcome.attempts.length, at: Date.now(), error: error.message };
  }

  /**
   * Run actions for one IP strictly in order, reporting each result as it lands
   */
  async performSequence(actions: FailoverAction[], onResult: (result: ActuationResult) => void): Promise<void> {
    for (const action of actions) {
      onResult(await this.perform(action));
    }
  }

  destroy(): void {
    this.retryManager.destroy();
  }
}

/**
 * Split a plan into per-IP sequences, keeping the order within each IP
 */
export function groupByIp(actions: FailoverAction[]): Map<FloatingIpId, FailoverAction[]> {
  const groups = new Map<FloatingIpId, FailoverAction[]>();
  for (const action of actions) {
    const group = groups.get(action.ipId);
    if (group) {
      group.push(action);
    } else {
      groups.set(action.ipId, [action]);
    }
  }
  return groups;
}
