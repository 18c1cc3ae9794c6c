import { DEFAULT_POLICY, FailoverPolicy, FullMembershipListing, InstanceId, MemberMetadata } from '../../src/types';
import {
  Decision,
  EngineState,
  PoolEntry,
  applyActuationResult,
  createEngineState,
  decideListing
} from '../../src/failover/FailoverDecisionEngine';

/** Default IPs of the four-instance test cluster */
export const IPS = {
  A: '10.0.0.2',
  B: '10.0.0.3',
  C: '10.0.0.5',
  D: '10.0.0.6'
} as const;

export const FOUR_NODE_POOL: PoolEntry[] = [
  { ipId: IPS.A, defaultOwner: 'A' },
  { ipId: IPS.B, defaultOwner: 'B' },
  { ipId: IPS.C, defaultOwner: 'C' },
  { ipId: IPS.D, defaultOwner: 'D' }
];

export function listing(
  alive: InstanceId[],
  totalSize: number = alive.length,
  metadata?: Record<InstanceId, MemberMetadata>
): FullMembershipListing {
  return metadata ? { totalSize, aliveInstanceIds: alive, metadata } : { totalSize, aliveInstanceIds: alive };
}

/**
 * Report every action of a decision as successful, following up on whatever
 * the engine asks for next, until nothing is left to do
 */
export function settle(decision: Decision, policy: FailoverPolicy = DEFAULT_POLICY): EngineState {
  let state = decision.state;
  const pending = [...decision.actions];
  let action = pending.shift();
  while (action !== undefined) {
    const next = applyActuationResult(state, { action, ok: true, attempts: 1, at: 0 }, policy);
    state = next.state;
    pending.push(...next.actions);
    action = pending.shift();
  }
  return state;
}

/**
 * Four alive instances A-D, each serving its own default IP
 */
export function fourNodeCluster(selfId: InstanceId = 'A', policy: FailoverPolicy = DEFAULT_POLICY): EngineState {
  const state = createEngineState(selfId, { expectedSize: 4, pool: FOUR_NODE_POOL });
  return settle(decideListing(state, listing(['A', 'B', 'C', 'D']), policy), policy);
}
