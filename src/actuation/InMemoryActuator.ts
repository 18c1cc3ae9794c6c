import { EventEmitter } from 'eventemitter3';
import { FloatingIpId, InstanceId } from '../types';
import { delay } from '../common/utils';
import { CloudIpActuator } from './types';

export interface ActuatorCall {
  kind: 'acquire' | 'release';
  ipId: FloatingIpId;
  instanceId: InstanceId;
  ok: boolean;
}

interface ActuatorEvents {
  associated: [FloatingIpId, InstanceId];
  disassociated: [FloatingIpId, InstanceId];
}

/**
 * In-memory floating IP provider for testing and development.
 * Associations live in a local map; calls can be delayed or made to fail so
 * retry and race handling can be exercised without a cloud account.
 */
export class InMemoryActuator extends EventEmitter<ActuatorEvents> implements CloudIpActuator {
  private associations = new Map<FloatingIpId, InstanceId>();
  private pendingFailures = 0;
  private failingIps = new Set<FloatingIpId>();
  private readonly log: ActuatorCall[] = [];

  constructor(private latencyMs = 0) {
    super();
  }

  async acquire(ipId: FloatingIpId, instanceId: InstanceId): Promise<void> {
    await this.simulateLatency();
    if (this.shouldFail(ipId)) {
      this.log.push({ kind: 'acquire', ipId, instanceId, ok: false });
      throw new Error(`Simulated provider error associating ${ipId}`);
    }

    // Re-association steals the address from whoever had it
    this.associations.set(ipId, instanceId);
    this.log.push({ kind: 'acquire', ipId, instanceId, ok: true });
    this.emit('associated', ipId, instanceId);
  }

  async release(ipId: FloatingIpId, instanceId: InstanceId): Promise<void> {
    await this.simulateLatency();
    if (this.shouldFail(ipId)) {
      this.log.push({ kind: 'release', ipId, instanceId, ok: false });
      throw new Error(`Simulated provider error disassociating ${ipId}`);
    }

    // Only the current holder can lose the address; anything else is a no-op
    if (this.associations.get(ipId) === instanceId) {
      this.associations.delete(ipId);
      this.emit('disassociated', ipId, instanceId);
    }
    this.log.push({ kind: 'release', ipId, instanceId, ok: true });
  }

  async describeAssignments(): Promise<Map<FloatingIpId, InstanceId>> {
    return new Map(this.associations);
  }

  /**
   * Make the next `count` calls fail, whatever they are
   */
  failNext(count: number): void {
    this.pendingFailures = count;
  }

  /**
   * Make every call touching `ipId` fail until `recover` is called
   */
  failFor(ipId: FloatingIpId): void {
    this.failingIps.add(ipId);
  }

  recover(ipId?: FloatingIpId): void {
    if (ipId === undefined) {
      this.failingIps.clear();
      this.pendingFailures = 0;
    } else {
      this.failingIps.delete(ipId);
    }
  }

  setLatency(ms: number): void {
    this.latencyMs = ms;
  }

  /**
   * Seed an association without going through acquire
   */
  associate(ipId: FloatingIpId, instanceId: InstanceId): void {
    this.associations.set(ipId, instanceId);
  }

  holderOf(ipId: FloatingIpId): InstanceId | undefined {
    return this.associations.get(ipId);
  }

  getCalls(): ActuatorCall[] {
    return this.log.slice();
  }

  clearCalls(): void {
    this.log.length = 0;
  }

  private shouldFail(ipId: FloatingIpId): boolean {
    if (this.failingIps.has(ipId)) {
      return true;
    }
    if (this.pendingFailures > 0) {
      this.pendingFailures--;
      return true;
    }
    return false;
  }

  private async simulateLatency(): Promise<void> {
    if (this.latencyMs > 0) {
      await delay(this.latencyMs);
    }
  }
}
