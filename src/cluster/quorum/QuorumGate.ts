import { MembershipSnapshot, aliveCount } from '../membership/MembershipSnapshot';
import { QuorumResult } from './types';

/**
 * Whether the local instance may change IP ownership.
 *
 * Holds when at least half of the best known cluster is alive, self included.
 * Exactly half counts, so a two-instance cluster keeps serving after losing one
 * member.
 */
export function hasQuorum(snapshot: MembershipSnapshot): boolean {
  return aliveCount(snapshot) * 2 >= snapshot.totalSize;
}

/**
 * Quorum status with the counts behind it, for the status surface
 */
export function evaluateQuorum(snapshot: MembershipSnapshot): QuorumResult {
  const currentCount = aliveCount(snapshot);
  return {
    hasQuorum: currentCount * 2 >= snapshot.totalSize,
    requiredCount: Math.ceil(snapshot.totalSize / 2),
    currentCount,
    totalCount: snapshot.totalSize,
    strategy: 'majority'
  };
}
