/**
 * Shared type definitions for the floating IP failover engine
 */

export type InstanceId = string;
export type FloatingIpId = string;

export type Liveness = 'alive' | 'failed' | 'left' | 'unknown';

export interface InstanceRecord {
  id: InstanceId;
  liveness: Liveness;
  defaultIp?: FloatingIpId;
  address?: string;
  zone?: string;
}

export type AssignmentState =
  | 'unassigned'
  | 'assigned-default'
  | 'assigned-failover'
  | 'assignment-in-flight';

export interface ActuationFailure {
  instanceId: InstanceId;
  message: string;
  attempts: number;
  at: number;
}

export interface FloatingIpRecord {
  ipId: FloatingIpId;
  state: AssignmentState;
  defaultOwner?: InstanceId;
  holder?: InstanceId;
  // Instance an in-flight acquire is aimed at
  target?: InstanceId;
  failure?: ActuationFailure;
}

/**
 * Metadata a member advertises through the gossip layer
 */
export interface MemberMetadata {
  defaultFloatingIP?: string;
  zone?: string;
  address?: string;
}

export type RawEventType = 'join' | 'leave' | 'fail' | 'update';

/**
 * Event as delivered by the membership layer. Delivery is at-least-once and
 * unordered, so fields are untrusted until classified.
 */
export interface RawMembershipEvent {
  type: RawEventType | string;
  instanceId?: string;
  metadata?: MemberMetadata;
}

/**
 * Result of a full membership query
 */
export interface FullMembershipListing {
  totalSize: number;
  aliveInstanceIds: InstanceId[];
  metadata?: Record<InstanceId, MemberMetadata>;
}

export interface InstanceJoined {
  kind: 'instance-joined';
  id: InstanceId;
  defaultIp?: FloatingIpId;
  address?: string;
  zone?: string;
}

export interface SelfJoined {
  kind: 'self-joined';
  id: InstanceId;
  defaultIp?: FloatingIpId;
  address?: string;
  zone?: string;
}

export interface InstanceLeft {
  kind: 'instance-left';
  id: InstanceId;
}

export interface InstanceFailed {
  kind: 'instance-failed';
  id: InstanceId;
}

export type Intent = InstanceJoined | SelfJoined | InstanceLeft | InstanceFailed;

export type ActionReason =
  | 'default-owner-join'
  | 'default-owner-reclaim'
  | 'failover'
  | 'retry'
  | 'corrective';

export interface AcquireAction {
  kind: 'acquire';
  ipId: FloatingIpId;
  instanceId: InstanceId;
  reason: ActionReason;
}

export interface ReleaseAction {
  kind: 'release';
  ipId: FloatingIpId;
  instanceId: InstanceId;
  reason: ActionReason;
}

export type FailoverAction = AcquireAction | ReleaseAction;

export type WarningKind =
  | 'malformed-event'
  | 'no-eligible-holder'
  | 'default-owner-conflict'
  | 'actuation-failed'
  | 'stale-actuation'
  | 'false-positive'
  | 'quorum-lost';

export interface FailoverWarning {
  kind: WarningKind;
  message: string;
  ipId?: FloatingIpId;
  instanceId?: InstanceId;
}

export type ActuationScope = 'cluster' | 'self';

export interface FailoverPolicy {
  /** Upper bound of floating IPs one instance may serve at once */
  maxIpsPerInstance: number;
}

export const DEFAULT_POLICY: FailoverPolicy = {
  maxIpsPerInstance: 2
};
