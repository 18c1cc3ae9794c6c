// Main entry point for the eip-failover library

// Types
export * from './types';

// Membership snapshot and quorum
export * from './cluster/membership/MembershipSnapshot';
export * from './cluster/quorum/QuorumGate';
export type { QuorumResult } from './cluster/quorum/types';

// Failover engine
export * from './failover/OwnershipTable';
export * from './failover/EventClassifier';
export * from './failover/ClaimAlgorithm';
export * from './failover/FailoverDecisionEngine';
export * from './failover/FailoverCoordinator';

// Membership sources
export * from './membership/types';
export * from './membership/InMemoryMembershipSource';
export * from './membership/SerfEventParser';
export * from './membership/SerfMembershipSource';
export * from './membership/PeerProbe';

// Cloud actuation
export * from './actuation/types';
export * from './actuation/RetryManager';
export * from './actuation/ActuationExecutor';
export * from './actuation/InMemoryActuator';

// Configuration and status
export * from './config/FailoverConfiguration';
export * from './status/StatusServer';

// Common
export * from './common/errors';
export * from './common/logger';
export { delay, compareIds } from './common/utils';
