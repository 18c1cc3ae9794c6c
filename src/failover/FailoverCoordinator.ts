import { EventEmitter } from 'eventemitter3';
import {
  ActuationScope,
  DEFAULT_POLICY,
  FailoverAction,
  FailoverPolicy,
  FailoverWarning,
  FloatingIpId,
  FloatingIpRecord,
  FullMembershipListing,
  InstanceId,
  InstanceRecord
} from '../types';
import { Logger, createLogger } from '../common/logger';
import { toError } from '../common/errors';
import { compareIds } from '../common/utils';
import { evaluateQuorum } from '../cluster/quorum/QuorumGate';
import { QuorumResult } from '../cluster/quorum/types';
import { MembershipSource } from '../membership/types';
import { PeerProbe } from '../membership/PeerProbe';
import { CloudIpActuator, ActuationOptions } from '../actuation/types';
import { ActuationExecutor, groupByIp } from '../actuation/ActuationExecutor';
import { RetryManager, RetryOptions, isTransientError } from '../actuation/RetryManager';
import { EventClassifier } from './EventClassifier';
import {
  ActuationResult,
  Decision,
  EngineState,
  PoolEntry,
  applyActuationResult,
  createEngineState,
  decide,
  decideListing,
  seedAssignments
} from './FailoverDecisionEngine';

export interface FailoverCoordinatorOptions {
  selfId: InstanceId;
  /** Reported in status and logs */
  clusterName?: string;
  /** Default floating IP of this instance, from local configuration */
  selfDefaultIp?: FloatingIpId;
  zoneIps?: Record<string, FloatingIpId>;
  /** Cluster size the operator expects; quorum is never computed against less */
  expectedSize?: number;
  /** Floating IPs known up front, with their default owners when configured */
  pool?: PoolEntry[];
  policy?: Partial<FailoverPolicy>;
  actuationScope?: ActuationScope;
  /** Full membership resync period (ms); 0 disables it */
  resyncIntervalMs?: number;
  actuation?: Partial<ActuationOptions>;
  /** Retry behaviour of the cold-start membership query */
  startupRetry?: Partial<RetryOptions>;
  /** Confirms fail events before they are acted upon */
  probe?: PeerProbe;
  logger?: Logger;
}

export interface FailoverStatus {
  selfId: InstanceId;
  clusterName?: string;
  ready: boolean;
  quorum: QuorumResult;
  snapshotVersion: number;
  tableVersion: number;
  instances: InstanceRecord[];
  ips: FloatingIpRecord[];
  inFlight: number;
}

export interface FailoverCoordinatorEvents {
  ready: [FailoverStatus];
  decision: [Decision];
  warning: [FailoverWarning];
  'quorum-lost': [QuorumResult];
  'quorum-restored': [QuorumResult];
  'actuation-completed': [ActuationResult];
  stopped: [];
}

type LoopMessage =
  | { kind: 'event'; raw: unknown }
  | { kind: 'listing'; listing: FullMembershipListing }
  | { kind: 'actuation-result'; result: ActuationResult };

export const DEFAULT_RESYNC_INTERVAL_MS = 60000;

/**
 * Event-processing loop around the decision engine.
 *
 * Membership events, resync listings and actuator results all go through one
 * mailbox and are processed one at a time, which makes this class the only
 * writer of the engine state. Actuator calls run outside the loop, concurrently
 * per IP, and report back through the mailbox.
 *
 * Nothing is processed until a full membership listing has been merged (cold
 * start); events that arrive earlier wait in the mailbox.
 */
export class FailoverCoordinator extends EventEmitter<FailoverCoordinatorEvents> {
  private state: EngineState;
  private readonly policy: FailoverPolicy;
  private readonly classifier: EventClassifier;
  private readonly executor: ActuationExecutor;
  private readonly startupRetry: RetryManager;
  private readonly logger: Logger;
  private readonly scope: ActuationScope;
  private readonly resyncIntervalMs: number;

  private mailbox: LoopMessage[] = [];
  private drainPromise?: Promise<void>;
  private coldStartPromise?: Promise<void>;
  private inFlight = new Set<Promise<void>>();
  private ready = false;
  private started = false;
  private resyncing = false;
  private lastQuorum?: boolean;
  private unsubscribe?: () => void;
  private resyncTimer?: NodeJS.Timeout;

  constructor(
    private readonly source: MembershipSource,
    private readonly actuator: CloudIpActuator,
    private readonly options: FailoverCoordinatorOptions
  ) {
    super();
    this.logger = options.logger ?? createLogger();
    this.policy = { ...DEFAULT_POLICY, ...options.policy };
    this.scope = options.actuationScope ?? 'cluster';
    this.resyncIntervalMs = options.resyncIntervalMs ?? DEFAULT_RESYNC_INTERVAL_MS;
    this.state = createEngineState(options.selfId, {
      expectedSize: options.expectedSize,
      pool: options.pool
    });
    this.classifier = new EventClassifier({
      selfId: options.selfId,
      selfDefaultIp: options.selfDefaultIp,
      zoneIps: options.zoneIps
    });
    this.executor = new ActuationExecutor(actuator, options.actuation, this.logger);
    this.startupRetry = new RetryManager(
      { maxRetries: 5, baseDelay: 500, maxDelay: 5000, name: 'cold-start', ...options.startupRetry },
      this.logger
    );
  }

  get selfId(): InstanceId {
    return this.options.selfId;
  }

  isReady(): boolean {
    return this.ready;
  }

  /**
   * Subscribe to the feed, then block actuation until the full listing is in.
   * A failed cold start is retried on every resync tick.
   */
  async start(): Promise<void> {
    if (this.started) {
      return;
    }
    this.started = true;

    this.unsubscribe = this.source.subscribe(raw => this.enqueue({ kind: 'event', raw }));

    if (this.resyncIntervalMs > 0) {
      this.resyncTimer = setInterval(() => {
        this.resync().catch((error: unknown) => {
          this.logger.error(`Resync failed: ${toError(error).message}`);
        });
      }, this.resyncIntervalMs);
      this.resyncTimer.unref(); // Prevent Jest hanging
    }

    await this.coldStart();
  }

  /**
   * Stop consuming events and wait for in-flight actuations to settle
   */
  async stop(): Promise<void> {
    if (!this.started) {
      return;
    }
    this.started = false;

    this.unsubscribe?.();
    this.unsubscribe = undefined;
    if (this.resyncTimer) {
      clearInterval(this.resyncTimer);
      this.resyncTimer = undefined;
    }

    if (this.coldStartPromise) {
      await Promise.allSettled([this.coldStartPromise]);
    }
    await this.idle();
    this.ready = false;
    this.mailbox = [];
    this.executor.destroy();
    this.startupRetry.destroy();
    this.emit('stopped');
  }

  /**
   * Fetch a fresh full listing and merge it through the loop
   */
  async resync(): Promise<void> {
    if (!this.started || this.resyncing) {
      return;
    }
    this.resyncing = true;
    try {
      if (!this.ready) {
        await this.coldStart();
        return;
      }
      const listing = await this.source.fetchFullMembership();
      if (this.started) {
        this.enqueue({ kind: 'listing', listing });
      }
    } finally {
      this.resyncing = false;
    }
  }

  /**
   * Resolves once the mailbox is empty and no actuator call is outstanding
   */
  async idle(): Promise<void> {
    for (;;) {
      if (this.drainPromise) {
        await this.drainPromise;
        continue;
      }
      if (this.inFlight.size > 0) {
        await Promise.allSettled(Array.from(this.inFlight));
        continue;
      }
      if (this.ready && this.mailbox.length > 0) {
        this.kick();
        continue;
      }
      return;
    }
  }

  /**
   * Read-only copy of the current state for monitoring
   */
  getStatus(): FailoverStatus {
    const { snapshot, table } = this.state;
    const instances = Array.from(snapshot.instances.values())
      .map(record => ({ ...record }))
      .sort((a, b) => compareIds(a.id, b.id));

    const status: FailoverStatus = {
      selfId: this.options.selfId,
      ready: this.ready,
      quorum: evaluateQuorum(snapshot),
      snapshotVersion: snapshot.version,
      tableVersion: table.version,
      instances,
      ips: table.records(),
      inFlight: this.inFlight.size
    };
    if (this.options.clusterName !== undefined) {
      status.clusterName = this.options.clusterName;
    }
    return status;
  }

  getState(): EngineState {
    return this.state;
  }

  private describeSelf(): string {
    const { selfId, clusterName } = this.options;
    return clusterName === undefined ? selfId : `${selfId} in ${clusterName}`;
  }

  private coldStart(): Promise<void> {
    if (!this.coldStartPromise) {
      this.coldStartPromise = this.runColdStart().finally(() => {
        this.coldStartPromise = undefined;
      });
    }
    return this.coldStartPromise;
  }

  private async runColdStart(): Promise<void> {
    let listing: FullMembershipListing;
    try {
      listing = await this.startupRetry.execute(() => this.source.fetchFullMembership(), 'full-membership', {
        retryCondition: error => this.started && isTransientError(error)
      });
    } catch (error) {
      if (this.started) {
        this.logger.error(`Cold start: full membership unavailable, actuation stays disabled: ${toError(error).message}`);
      } else {
        this.logger.engine(`Cold start abandoned after stop: ${toError(error).message}`);
      }
      return;
    }

    if (!this.started) {
      this.logger.engine('Cold start abandoned: coordinator stopped');
      return;
    }

    if (this.actuator.describeAssignments) {
      try {
        const assignments = await this.actuator.describeAssignments();
        this.state = seedAssignments(this.state, assignments);
      } catch (error) {
        this.logger.warn(`Cold start: could not read current associations: ${toError(error).message}`);
      }
    }

    if (!this.started) {
      this.logger.engine('Cold start abandoned: coordinator stopped');
      return;
    }

    const decision = decideListing(this.state, this.classifier.resolveListing(listing), this.policy);
    this.ready = true;
    this.logger.engine(
      `Cold start complete for ${this.describeSelf()}: ${listing.aliveInstanceIds.length}/${decision.state.snapshot.totalSize} alive`
    );
    this.commit(decision);
    this.emit('ready', this.getStatus());
    this.kick();
  }

  private enqueue(message: LoopMessage): void {
    this.mailbox.push(message);
    this.kick();
  }

  private kick(): void {
    if (this.drainPromise !== undefined || !this.ready) {
      return;
    }
    // Never drain re-entrantly from inside commit() or a listener
    this.drainPromise = Promise.resolve().then(() => this.drain());
  }

  private async drain(): Promise<void> {
    try {
      let message = this.mailbox.shift();
      while (message !== undefined) {
        try {
          await this.process(message);
        } catch (error) {
          this.logger.error(`Failed to process ${message.kind} message: ${toError(error).message}`);
        }
        message = this.ready ? this.mailbox.shift() : undefined;
      }
    } finally {
      this.drainPromise = undefined;
    }
  }

  private async process(message: LoopMessage): Promise<void> {
    switch (message.kind) {
      case 'event':
        await this.processEvent(message.raw);
        return;
      case 'listing':
        this.commit(decideListing(this.state, this.classifier.resolveListing(message.listing), this.policy));
        return;
      case 'actuation-result':
        this.commit(applyActuationResult(this.state, message.result, this.policy));
        this.emit('actuation-completed', message.result);
        return;
    }
  }

  private async processEvent(raw: unknown): Promise<void> {
    const classified = this.classifier.classify(raw);
    if (!classified.ok) {
      this.report({ kind: 'malformed-event', message: `Dropped membership event: ${classified.reason}` });
      return;
    }

    const { intent } = classified;
    this.logger.membership(`${intent.kind} ${intent.id}`);

    if (intent.kind === 'instance-failed' && this.options.probe) {
      const known = this.state.snapshot.instances.get(intent.id);
      const reachable = await this.options.probe.isReachable(known ?? { id: intent.id, liveness: 'unknown' });
      if (reachable) {
        this.report({
          kind: 'false-positive',
          message: `${intent.id} reported failed but is reachable, ignoring`,
          instanceId: intent.id
        });
        return;
      }
    }

    this.commit(decide(this.state, intent, this.policy));
  }

  private commit(decision: Decision): void {
    this.state = decision.state;

    for (const warning of decision.warnings) {
      this.report(warning);
    }

    const hasQuorum = decision.quorum.hasQuorum;
    if (this.lastQuorum !== hasQuorum) {
      if (!hasQuorum) {
        this.report({
          kind: 'quorum-lost',
          message: `No quorum: ${decision.quorum.currentCount} of ${decision.quorum.totalCount} alive, ${decision.quorum.requiredCount} required`
        });
        this.emit('quorum-lost', decision.quorum);
      } else if (this.lastQuorum === false) {
        this.logger.engine(`Quorum restored: ${decision.quorum.currentCount} of ${decision.quorum.totalCount} alive`);
        this.emit('quorum-restored', decision.quorum);
      }
      this.lastQuorum = hasQuorum;
    }

    if (decision.withheld.length > 0) {
      this.logger.engine(`Withholding ${decision.withheld.length} action(s) until quorum and full membership are in place`);
    }

    this.dispatch(decision.actions);
    this.emit('decision', decision);
  }

  private dispatch(actions: FailoverAction[]): void {
    for (const [ipId, sequence] of groupByIp(actions)) {
      const local = this.scope === 'cluster'
        ? sequence
        : sequence.filter(action => action.instanceId === this.options.selfId);

      if (this.scope === 'self') {
        // Acquires for peers are carried out by the peer's own engine
        for (const action of sequence) {
          if (action.kind === 'acquire' && action.instanceId !== this.options.selfId) {
            this.enqueue({ kind: 'actuation-result', result: { action, ok: true, attempts: 0, at: Date.now() } });
          }
        }
      }

      if (local.length === 0) {
        continue;
      }

      const task: Promise<void> = this.executor
        .performSequence(local, result => this.enqueue({ kind: 'actuation-result', result }))
        .catch((error: unknown) => {
          this.logger.error(`Actuation for ${ipId} aborted: ${toError(error).message}`);
        })
        .finally(() => {
          this.inFlight.delete(task);
        });
      this.inFlight.add(task);
    }
  }

  private report(warning: FailoverWarning): void {
    this.logger.warn(warning.message);
    this.emit('warning', warning);
  }
}
