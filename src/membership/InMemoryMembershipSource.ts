import { FullMembershipListing } from '../types';
import { MembershipQueryError } from '../common/errors';
import { MembershipListener, MembershipSource } from './types';

/**
 * In-process membership feed for testing and for embedding the engine behind
 * a gossip library that is already running in the same process.
 */
export class InMemoryMembershipSource implements MembershipSource {
  private listeners = new Set<MembershipListener>();
  private listing: FullMembershipListing;
  private failingQueries = 0;
  private queryCount = 0;
  private held?: { promise: Promise<void>; release: () => void };

  constructor(listing: FullMembershipListing = { totalSize: 0, aliveInstanceIds: [] }) {
    this.listing = listing;
  }

  subscribe(listener: MembershipListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async fetchFullMembership(): Promise<FullMembershipListing> {
    this.queryCount++;
    if (this.held) {
      await this.held.promise;
    }
    if (this.failingQueries > 0) {
      this.failingQueries--;
      throw new MembershipQueryError('Simulated membership query failure');
    }
    return {
      totalSize: this.listing.totalSize,
      aliveInstanceIds: [...this.listing.aliveInstanceIds],
      metadata: this.listing.metadata ? { ...this.listing.metadata } : undefined
    };
  }

  /**
   * Deliver an event to every subscriber. Accepts anything, since real feeds
   * can hand over malformed payloads too.
   */
  publish(event: unknown): void {
    for (const listener of Array.from(this.listeners)) {
      listener(event);
    }
  }

  setListing(listing: FullMembershipListing): void {
    this.listing = listing;
  }

  failNextQueries(count: number): void {
    this.failingQueries = count;
  }

  /**
   * Keep every full-membership query pending until `releaseQueries()`
   */
  holdQueries(): void {
    let release = (): void => undefined;
    const promise = new Promise<void>(resolve => {
      release = resolve;
    });
    this.held = { promise, release };
  }

  releaseQueries(): void {
    const held = this.held;
    this.held = undefined;
    held?.release();
  }

  getQueryCount(): number {
    return this.queryCount;
  }

  get subscriberCount(): number {
    return this.listeners.size;
  }
}
