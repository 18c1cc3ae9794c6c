import { FloatingIpId, InstanceId } from '../types';

/**
 * Adapter over the cloud provider's floating IP API.
 *
 * Both calls must be idempotent at the provider. `acquire` is a forced
 * re-association: the previous holder is usually dead and cannot hand the
 * address over, so associating it with the new instance has to steal it.
 * `release` may be a no-op when the instance is unreachable.
 */
export interface CloudIpActuator {
  acquire(ipId: FloatingIpId, instanceId: InstanceId): Promise<void>;
  release(ipId: FloatingIpId, instanceId: InstanceId): Promise<void>;
  /** Current associations as the provider sees them, when it can say */
  describeAssignments?(): Promise<Map<FloatingIpId, InstanceId>>;
}

export interface ActuationOptions {
  /** Timeout of a single provider call (ms) */
  timeout: number;
  /** Attempts per acquire before giving up */
  maxAttempts: number;
  baseDelay: number;
  maxDelay: number;
  jitter: boolean;
}

export const DEFAULT_ACTUATION_OPTIONS: ActuationOptions = {
  timeout: 5000,
  maxAttempts: 5,
  baseDelay: 500,
  maxDelay: 10000,
  jitter: true
};
