import { InMemoryMembershipSource } from '../../../src/membership/InMemoryMembershipSource';
import { MembershipQueryError } from '../../../src/common/errors';

describe('InMemoryMembershipSource', () => {
  it('should publish events to subscribers until they unsubscribe', () => {
    const source = new InMemoryMembershipSource();
    const received: unknown[] = [];
    const unsubscribe = source.subscribe(event => received.push(event));

    source.publish({ type: 'join', instanceId: 'B' });
    unsubscribe();
    source.publish({ type: 'join', instanceId: 'C' });

    expect(received).toEqual([{ type: 'join', instanceId: 'B' }]);
    expect(source.subscriberCount).toBe(0);
  });

  it('should return copies of the listing', async () => {
    const source = new InMemoryMembershipSource({ totalSize: 2, aliveInstanceIds: ['A', 'B'] });

    const listing = await source.fetchFullMembership();
    listing.aliveInstanceIds.push('Z');

    expect((await source.fetchFullMembership()).aliveInstanceIds).toEqual(['A', 'B']);
    expect(source.getQueryCount()).toBe(2);
  });

  it('should fail the requested number of queries', async () => {
    const source = new InMemoryMembershipSource();
    source.failNextQueries(1);

    await expect(source.fetchFullMembership()).rejects.toBeInstanceOf(MembershipQueryError);
    await expect(source.fetchFullMembership()).resolves.toEqual({
      totalSize: 0,
      aliveInstanceIds: [],
      metadata: undefined
    });
  });

  it('should keep held queries pending until released', async () => {
    const source = new InMemoryMembershipSource({ totalSize: 1, aliveInstanceIds: ['A'] });
    source.holdQueries();

    let settled = false;
    const pending = source.fetchFullMembership().then(listing => {
      settled = true;
      return listing;
    });
    await Promise.resolve();
    expect(settled).toBe(false);

    source.setListing({ totalSize: 2, aliveInstanceIds: ['A', 'B'] });
    source.releaseQueries();

    await expect(pending).resolves.toEqual({ totalSize: 2, aliveInstanceIds: ['A', 'B'], metadata: undefined });
  });
});
