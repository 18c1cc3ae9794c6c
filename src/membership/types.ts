import { FullMembershipListing } from '../types';

/**
 * Receives raw events exactly as the membership layer produced them
 */
export type MembershipListener = (event: unknown) => void;

/**
 * The gossip layer as the engine consumes it: an event feed plus an on-demand
 * full listing used for cold start and resynchronization.
 */
export interface MembershipSource {
  subscribe(listener: MembershipListener): () => void;
  fetchFullMembership(): Promise<FullMembershipListing>;
}
