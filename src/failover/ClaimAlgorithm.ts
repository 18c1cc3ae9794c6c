import { FailoverPolicy, FloatingIpId, InstanceId } from '../types';
import { MembershipSnapshot, aliveIds, isAlive } from '../cluster/membership/MembershipSnapshot';
import { OwnershipTable } from './OwnershipTable';

/**
 * Choose who takes over a vacated floating IP.
 *
 * Candidates are the alive instances minus `excluded`. An instance serving no
 * IP at all wins over one that already serves something; within each group the
 * lexicographically smallest id wins. Instances at `maxIpsPerInstance` are
 * never picked.
 */
export function pickHolder(
  snapshot: MembershipSnapshot,
  holds: ReadonlyMap<InstanceId, number>,
  policy: FailoverPolicy,
  excluded: ReadonlySet<InstanceId> = new Set()
): InstanceId | undefined {
  const candidates = aliveIds(snapshot).filter(id => !excluded.has(id));
  const count = (id: InstanceId): number => holds.get(id) ?? 0;

  const free = candidates.find(id => count(id) === 0);
  if (free !== undefined) {
    return free;
  }

  return candidates.find(id => count(id) < policy.maxIpsPerInstance);
}

/**
 * Who should serve each floating IP, derived from scratch.
 *
 * Alive default owners keep their own IPs. The remaining IPs are handed out in
 * id order through `pickHolder`, counting only default-owner holds and picks
 * made earlier in the same pass. Current holders play no part, so every engine
 * that sees the same alive set and default owners computes the same plan
 * whatever order the events arrived in. `undefined` means nobody has room.
 */
export function planAssignments(
  snapshot: MembershipSnapshot,
  table: OwnershipTable,
  policy: FailoverPolicy
): Map<FloatingIpId, InstanceId | undefined> {
  const plan = new Map<FloatingIpId, InstanceId | undefined>();
  const holds = new Map<InstanceId, number>();
  const orphaned: FloatingIpId[] = [];

  for (const ipId of table.ipIds()) {
    const owner = table.get(ipId)?.defaultOwner;
    if (owner !== undefined && isAlive(snapshot, owner)) {
      plan.set(ipId, owner);
      holds.set(owner, (holds.get(owner) ?? 0) + 1);
    } else {
      orphaned.push(ipId);
    }
  }

  for (const ipId of orphaned) {
    const next = pickHolder(snapshot, holds, policy);
    plan.set(ipId, next);
    if (next !== undefined) {
      holds.set(next, (holds.get(next) ?? 0) + 1);
    }
  }

  return plan;
}
