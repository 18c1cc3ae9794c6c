import { FailoverCoordinator, FailoverCoordinatorOptions } from '../../src/failover/FailoverCoordinator';
import { InMemoryMembershipSource } from '../../src/membership/InMemoryMembershipSource';
import { InMemoryActuator } from '../../src/actuation/InMemoryActuator';
import { PeerProbe } from '../../src/membership/PeerProbe';
import { FailoverWarning, InstanceRecord } from '../../src/types';
import { delay } from '../../src/common/utils';
import { SpyLogger } from '../helpers/spyLogger';

const POOL = [
  { ipId: 'ip-a', defaultOwner: 'A' },
  { ipId: 'ip-b', defaultOwner: 'B' },
  { ipId: 'ip-c', defaultOwner: 'C' }
];

async function waitFor(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error('Condition not met in time');
    }
    await delay(5);
  }
}

describe('FailoverCoordinator Integration', () => {
  let source: InMemoryMembershipSource;
  let actuator: InMemoryActuator;
  let logger: SpyLogger;
  let coordinator: FailoverCoordinator;
  let warnings: FailoverWarning[];

  const build = (overrides: Partial<FailoverCoordinatorOptions> = {}): FailoverCoordinator => {
    coordinator = new FailoverCoordinator(source, actuator, {
      selfId: 'A',
      expectedSize: 3,
      pool: POOL,
      resyncIntervalMs: 0,
      actuation: { maxAttempts: 3, baseDelay: 1, maxDelay: 2, jitter: false, timeout: 200 },
      startupRetry: { maxRetries: 0 },
      logger,
      ...overrides
    });
    coordinator.on('warning', warning => warnings.push(warning));
    return coordinator;
  };

  const startCluster = async (overrides: Partial<FailoverCoordinatorOptions> = {}): Promise<FailoverCoordinator> => {
    const started = build(overrides);
    await started.start();
    await started.idle();
    return started;
  };

  beforeEach(() => {
    source = new InMemoryMembershipSource({ totalSize: 3, aliveInstanceIds: ['A', 'B', 'C'] });
    actuator = new InMemoryActuator();
    logger = new SpyLogger();
    warnings = [];
  });

  afterEach(async () => {
    await coordinator.stop();
  });

  describe('cold start', () => {
    it('should claim every default IP once the full listing is in', async () => {
      const ready = jest.fn();
      build().on('ready', ready);

      await coordinator.start();
      await coordinator.idle();

      expect(ready).toHaveBeenCalledTimes(1);
      expect(actuator.holderOf('ip-a')).toBe('A');
      expect(actuator.holderOf('ip-b')).toBe('B');
      expect(actuator.holderOf('ip-c')).toBe('C');

      const status = coordinator.getStatus();
      expect(status.ready).toBe(true);
      expect(status.inFlight).toBe(0);
      expect(status.quorum.hasQuorum).toBe(true);
      expect(status.ips.map(ip => [ip.ipId, ip.state, ip.holder])).toEqual([
        ['ip-a', 'assigned-default', 'A'],
        ['ip-b', 'assigned-default', 'B'],
        ['ip-c', 'assigned-default', 'C']
      ]);
    });

    it('should report the cluster name in status and logs', async () => {
      await startCluster({ clusterName: 'edge-proxies' });

      expect(coordinator.getStatus().clusterName).toBe('edge-proxies');
      expect(logger.messages('engine')).toContain('Cold start complete for A in edge-proxies: 3/3 alive');
    });

    it('should adopt associations the provider already has', async () => {
      actuator.associate('ip-a', 'A');
      actuator.associate('ip-b', 'B');
      actuator.associate('ip-c', 'C');

      await startCluster();

      expect(actuator.getCalls()).toEqual([]);
      expect(coordinator.getStatus().ips.every(ip => ip.state === 'assigned-default')).toBe(true);
    });

    it('should hold events until a failed cold start is retried', async () => {
      source.failNextQueries(1);
      build();

      await coordinator.start();
      source.publish({ type: 'fail', instanceId: 'C' });
      await coordinator.idle();

      expect(coordinator.isReady()).toBe(false);
      expect(actuator.getCalls()).toEqual([]);
      expect(logger.messages('error')).toEqual([
        'Cold start: full membership unavailable, actuation stays disabled: Simulated membership query failure'
      ]);

      await coordinator.resync();
      await coordinator.idle();

      expect(coordinator.isReady()).toBe(true);
      expect(actuator.holderOf('ip-c')).toBe('A');
      expect(coordinator.getStatus().ips.find(ip => ip.ipId === 'ip-c')).toEqual({
        ipId: 'ip-c',
        state: 'assigned-failover',
        defaultOwner: 'C',
        holder: 'A'
      });
    });
  });

  describe('failover', () => {
    it('should move a failed instance\'s IP to a survivor', async () => {
      await startCluster();
      actuator.clearCalls();

      source.publish({ type: 'fail', instanceId: 'C' });
      await coordinator.idle();

      expect(actuator.getCalls()).toEqual([
        { kind: 'release', ipId: 'ip-c', instanceId: 'C', ok: true },
        { kind: 'acquire', ipId: 'ip-c', instanceId: 'A', ok: true }
      ]);
      expect(actuator.holderOf('ip-c')).toBe('A');
    });

    it('should give the IP back when the owner rejoins', async () => {
      await startCluster();
      source.publish({ type: 'fail', instanceId: 'C' });
      await coordinator.idle();

      source.publish({ type: 'join', instanceId: 'C' });
      await coordinator.idle();

      expect(actuator.holderOf('ip-c')).toBe('C');
      expect(coordinator.getStatus().ips.find(ip => ip.ipId === 'ip-c')?.state).toBe('assigned-default');
    });

    it('should ignore duplicate failure events', async () => {
      await startCluster();
      source.publish({ type: 'fail', instanceId: 'C' });
      source.publish({ type: 'fail', instanceId: 'C' });
      await coordinator.idle();
      source.publish({ type: 'fail', instanceId: 'C' });
      await coordinator.idle();

      expect(actuator.getCalls().filter(call => call.ipId === 'ip-c')).toEqual([
        { kind: 'acquire', ipId: 'ip-c', instanceId: 'C', ok: true },
        { kind: 'release', ipId: 'ip-c', instanceId: 'C', ok: true },
        { kind: 'acquire', ipId: 'ip-c', instanceId: 'A', ok: true }
      ]);
    });

    it('should warn about malformed events and carry on', async () => {
      await startCluster();

      source.publish('garbage');
      source.publish({ type: 'fail' });
      await coordinator.idle();

      expect(warnings).toEqual([
        { kind: 'malformed-event', message: 'Dropped membership event: event is not an object' },
        { kind: 'malformed-event', message: 'Dropped membership event: missing instance id' }
      ]);
      expect(coordinator.isReady()).toBe(true);
    });
  });

  describe('quorum', () => {
    it('should stop moving IPs when quorum is lost and resume when it returns', async () => {
      const lost = jest.fn();
      const restored = jest.fn();
      await startCluster();
      coordinator.on('quorum-lost', lost);
      coordinator.on('quorum-restored', restored);

      source.publish({ type: 'fail', instanceId: 'B' });
      await coordinator.idle();
      expect(actuator.holderOf('ip-b')).toBe('A');

      actuator.clearCalls();
      source.publish({ type: 'fail', instanceId: 'C' });
      await coordinator.idle();

      expect(actuator.getCalls()).toEqual([]);
      expect(actuator.holderOf('ip-c')).toBe('C');
      expect(lost).toHaveBeenCalledWith({
        hasQuorum: false,
        requiredCount: 2,
        currentCount: 1,
        totalCount: 3,
        strategy: 'majority'
      });
      expect(warnings).toContainEqual({ kind: 'quorum-lost', message: 'No quorum: 1 of 3 alive, 2 required' });

      source.publish({ type: 'join', instanceId: 'B' });
      await coordinator.idle();

      expect(restored).toHaveBeenCalledTimes(1);
      expect(actuator.holderOf('ip-b')).toBe('B');
      expect(actuator.holderOf('ip-c')).toBe('A');
    });
  });

  describe('actuation failures', () => {
    it('should record an exhausted acquire and retry it on resync', async () => {
      await startCluster();
      actuator.failFor('ip-c');
      source.setListing({ totalSize: 3, aliveInstanceIds: ['A', 'B'] });

      source.publish({ type: 'fail', instanceId: 'C' });
      await coordinator.idle();

      expect(warnings).toEqual([
        {
          kind: 'actuation-failed',
          message:
            'Giving up on ip-c → A after 3 attempt(s): Failed to acquire ip-c for A: Simulated provider error associating ip-c',
          ipId: 'ip-c',
          instanceId: 'A'
        }
      ]);
      expect(coordinator.getStatus().ips.find(ip => ip.ipId === 'ip-c')?.failure?.instanceId).toBe('A');

      actuator.recover();
      await coordinator.resync();
      await coordinator.idle();

      expect(actuator.holderOf('ip-c')).toBe('A');
      expect(coordinator.getStatus().ips.find(ip => ip.ipId === 'ip-c')).toEqual({
        ipId: 'ip-c',
        state: 'assigned-failover',
        defaultOwner: 'C',
        holder: 'A'
      });
    });
  });

  describe('failure confirmation', () => {
    it('should drop failure reports for peers that still answer', async () => {
      const isReachable = jest.fn<Promise<boolean>, [Readonly<InstanceRecord>]>().mockResolvedValue(true);
      const probe: PeerProbe = { isReachable };
      await startCluster({ probe });
      actuator.clearCalls();

      source.publish({ type: 'fail', instanceId: 'C' });
      await coordinator.idle();

      expect(isReachable).toHaveBeenCalledWith(expect.objectContaining({ id: 'C', liveness: 'alive' }));
      expect(warnings).toEqual([
        { kind: 'false-positive', message: 'C reported failed but is reachable, ignoring', instanceId: 'C' }
      ]);
      expect(actuator.getCalls()).toEqual([]);
    });

    it('should act on failures the probe confirms', async () => {
      const probe: PeerProbe = { isReachable: () => Promise.resolve(false) };
      await startCluster({ probe });

      source.publish({ type: 'fail', instanceId: 'C' });
      await coordinator.idle();

      expect(actuator.holderOf('ip-c')).toBe('A');
    });
  });

  describe('actuation scope', () => {
    it('should only call the provider for its own instance in self scope', async () => {
      await startCluster({ actuationScope: 'self' });

      expect(actuator.getCalls()).toEqual([{ kind: 'acquire', ipId: 'ip-a', instanceId: 'A', ok: true }]);
      expect(coordinator.getStatus().ips.map(ip => ip.holder)).toEqual(['A', 'B', 'C']);

      actuator.clearCalls();
      source.publish({ type: 'fail', instanceId: 'C' });
      await coordinator.idle();

      expect(actuator.getCalls()).toEqual([{ kind: 'acquire', ipId: 'ip-c', instanceId: 'A', ok: true }]);
    });
  });

  describe('resync', () => {
    it('should heal missed failure events from the periodic listing', async () => {
      await startCluster({ resyncIntervalMs: 10 });

      source.setListing({ totalSize: 3, aliveInstanceIds: ['A', 'B'] });
      await waitFor(() => actuator.holderOf('ip-c') === 'A');
      await coordinator.idle();

      expect(coordinator.getStatus().instances.find(instance => instance.id === 'C')?.liveness).toBe('failed');
    });
  });

  describe('stop', () => {
    it('should unsubscribe and stop processing', async () => {
      const stopped = jest.fn();
      await startCluster();
      coordinator.on('stopped', stopped);

      await coordinator.stop();
      source.publish({ type: 'fail', instanceId: 'C' });

      expect(stopped).toHaveBeenCalledTimes(1);
      expect(source.subscriberCount).toBe(0);
      expect(coordinator.isReady()).toBe(false);
      expect(actuator.holderOf('ip-c')).toBe('C');
    });

    it('should not act on a cold start that completes after stop', async () => {
      const ready = jest.fn();
      source.holdQueries();
      build().on('ready', ready);

      const starting = coordinator.start();
      const stopping = coordinator.stop();
      source.releaseQueries();
      await stopping;
      await starting;

      expect(actuator.getCalls()).toEqual([]);
      expect(coordinator.isReady()).toBe(false);
      expect(ready).not.toHaveBeenCalled();
      expect(coordinator.getStatus().ips.every(ip => ip.state === 'unassigned')).toBe(true);
    });

    it('should ignore resync once stopped', async () => {
      await startCluster();
      await coordinator.stop();
      source.setListing({ totalSize: 3, aliveInstanceIds: ['A', 'B'] });
      const queries = source.getQueryCount();

      await coordinator.resync();
      await coordinator.idle();

      expect(source.getQueryCount()).toBe(queries);
      expect(coordinator.isReady()).toBe(false);
      expect(actuator.holderOf('ip-c')).toBe('C');
    });
  });
});
