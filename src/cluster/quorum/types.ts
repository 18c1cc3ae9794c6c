/**
 * Result of a quorum evaluation
 */
export interface QuorumResult {
  hasQuorum: boolean;
  requiredCount: number;
  currentCount: number;
  totalCount: number;
  strategy: 'majority';
}
