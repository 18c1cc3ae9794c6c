import {
  ActionReason,
  DEFAULT_POLICY,
  FailoverAction,
  FailoverPolicy,
  FailoverWarning,
  FloatingIpId,
  FloatingIpRecord,
  FullMembershipListing,
  InstanceId,
  Intent
} from '../types';
import {
  MembershipSnapshot,
  SnapshotOptions,
  createSnapshot,
  isAlive,
  observe,
  observeListing
} from '../cluster/membership/MembershipSnapshot';
import { evaluateQuorum } from '../cluster/quorum/QuorumGate';
import { QuorumResult } from '../cluster/quorum/types';
import { OwnershipTable } from './OwnershipTable';
import { planAssignments } from './ClaimAlgorithm';

export interface EngineState {
  snapshot: MembershipSnapshot;
  table: OwnershipTable;
}

export interface Decision {
  state: EngineState;
  /** Actions to hand to the actuator, in order */
  actions: FailoverAction[];
  /** Actions computed but held back by the quorum or cold-start gate */
  withheld: FailoverAction[];
  warnings: FailoverWarning[];
  quorum: QuorumResult;
}

export interface ActuationResult {
  action: FailoverAction;
  ok: boolean;
  attempts: number;
  at: number;
  error?: string;
}

export interface PoolEntry {
  ipId: FloatingIpId;
  defaultOwner?: InstanceId;
}

export interface EngineStateOptions extends SnapshotOptions {
  pool?: PoolEntry[];
}

interface SweepOptions {
  retryFailed: boolean;
  trigger?: Intent;
}

interface SweepResult {
  table: OwnershipTable;
  actions: FailoverAction[];
  warnings: FailoverWarning[];
}

export function createEngineState(selfId: InstanceId, options: EngineStateOptions = {}): EngineState {
  const pool = (options.pool ?? []).map((entry): FloatingIpRecord => {
    const record: FloatingIpRecord = { ipId: entry.ipId, state: 'unassigned' };
    if (entry.defaultOwner !== undefined) {
      record.defaultOwner = entry.defaultOwner;
    }
    return record;
  });

  return {
    snapshot: createSnapshot(selfId, options),
    table: OwnershipTable.fromRecords(pool)
  };
}

/**
 * Apply one classified membership event.
 *
 * Liveness and default-owner bookkeeping always happen. Holder changes only
 * happen once a full listing has been merged and quorum holds; otherwise the
 * would-be actions come back as `withheld` and every holder field is left as
 * it was.
 */
export function decide(state: EngineState, intent: Intent, policy: FailoverPolicy = DEFAULT_POLICY): Decision {
  const snapshot = observe(state.snapshot, intent);
  let table = state.table;
  const warnings: FailoverWarning[] = [];

  if (intent.kind === 'instance-joined' || intent.kind === 'self-joined') {
    const declared = snapshot.instances.get(intent.id)?.defaultIp;
    if (declared !== undefined) {
      const registered = registerDefaultOwner(table, snapshot, intent.id, declared);
      table = registered.table;
      warnings.push(...registered.warnings);
    }
  }

  return gate({ snapshot, table }, policy, warnings, { retryFailed: true, trigger: intent });
}

/**
 * Merge a full membership listing, then re-derive ownership from it
 */
export function decideListing(
  state: EngineState,
  listing: FullMembershipListing,
  policy: FailoverPolicy = DEFAULT_POLICY
): Decision {
  const snapshot = observeListing(state.snapshot, listing);
  let table = state.table;
  const warnings: FailoverWarning[] = [];

  for (const id of listing.aliveInstanceIds) {
    const declared = snapshot.instances.get(id)?.defaultIp;
    if (declared !== undefined) {
      const registered = registerDefaultOwner(table, snapshot, id, declared);
      table = registered.table;
      warnings.push(...registered.warnings);
    }
  }

  return gate({ snapshot, table }, policy, warnings, { retryFailed: true });
}

/**
 * Sweep without an event: used after cold start and on resync
 */
export function reconcile(
  state: EngineState,
  policy: FailoverPolicy = DEFAULT_POLICY,
  retryFailed = true
): Decision {
  return gate(state, policy, [], { retryFailed });
}

/**
 * Record what the provider reports as current associations. Used at cold
 * start so the first sweep starts from reality instead of an empty table.
 * Records with an acquire in flight are left alone.
 */
export function seedAssignments(state: EngineState, assignments: ReadonlyMap<FloatingIpId, InstanceId>): EngineState {
  let table = state.table;
  for (const [ipId, instanceId] of assignments) {
    const record = table.get(ipId) ?? { ipId, state: 'unassigned' as const };
    if (record.state === 'assignment-in-flight') {
      continue;
    }
    table = table.put(assigned(record, instanceId));
  }
  return { snapshot: state.snapshot, table };
}

/**
 * Fold an actuator outcome back into the table.
 *
 * A success for the instance the record still targets completes the
 * assignment. A success for anyone else means the call was overtaken by a
 * newer decision and finished late; the provider may now point at the wrong
 * instance, so a corrective acquire for the current owner is issued. An
 * exhausted failure is recorded and left for the next event or resync.
 */
export function applyActuationResult(
  state: EngineState,
  result: ActuationResult,
  policy: FailoverPolicy = DEFAULT_POLICY
): Decision {
  const { action } = result;
  let table = state.table;
  const warnings: FailoverWarning[] = [];
  const corrective: FailoverAction[] = [];
  const record = table.get(action.ipId);

  if (action.kind === 'acquire' && record) {
    const current = record.target ?? record.holder;
    if (record.state === 'assignment-in-flight' && record.target === action.instanceId) {
      table = result.ok
        ? table.put(assigned(record, action.instanceId))
        : table.put(failed(record, action.instanceId, result));
      if (!result.ok) {
        warnings.push({
          kind: 'actuation-failed',
          message: `Giving up on ${action.ipId} → ${action.instanceId} after ${result.attempts} attempt(s): ${result.error ?? 'unknown error'}`,
          ipId: action.ipId,
          instanceId: action.instanceId
        });
      }
    } else if (result.ok && current !== undefined && current !== action.instanceId) {
      warnings.push({
        kind: 'stale-actuation',
        message: `${action.ipId} was associated with ${action.instanceId} after ownership moved to ${current}`,
        ipId: action.ipId,
        instanceId: action.instanceId
      });
      corrective.push({ kind: 'acquire', ipId: action.ipId, instanceId: current, reason: 'corrective' });
    } else if (result.ok && current === undefined) {
      // Nobody else is expected to hold it, so take the provider's word
      table = table.put(assigned(record, action.instanceId));
    }
  }

  const decision = gate({ snapshot: state.snapshot, table }, policy, warnings, { retryFailed: false });
  if (corrective.length === 0) {
    return decision;
  }
  if (!canAct(decision)) {
    return { ...decision, withheld: [...corrective, ...decision.withheld] };
  }
  return { ...decision, actions: [...corrective, ...decision.actions] };
}

function canAct(decision: Decision): boolean {
  return decision.state.snapshot.complete && decision.quorum.hasQuorum;
}

function gate(
  state: EngineState,
  policy: FailoverPolicy,
  warnings: FailoverWarning[],
  options: SweepOptions
): Decision {
  const quorum = evaluateQuorum(state.snapshot);
  const planned = sweep(state.snapshot, state.table, policy, options);

  if (!state.snapshot.complete || !quorum.hasQuorum) {
    return { state, actions: [], withheld: planned.actions, warnings, quorum };
  }

  return {
    state: { snapshot: state.snapshot, table: planned.table },
    actions: planned.actions,
    withheld: [],
    warnings: [...warnings, ...planned.warnings],
    quorum
  };
}

/**
 * Derive the actions that bring the table in line with the snapshot.
 *
 * The target holder of every IP comes from `planAssignments`, which looks only
 * at the alive set and the default owners. Any record whose holder or
 * in-flight target differs from the plan is moved. IPs are visited in id
 * order.
 */
function sweep(
  snapshot: MembershipSnapshot,
  initial: OwnershipTable,
  policy: FailoverPolicy,
  options: SweepOptions
): SweepResult {
  let table = initial;
  const actions: FailoverAction[] = [];
  const warnings: FailoverWarning[] = [];
  const plan = planAssignments(snapshot, initial, policy);

  for (const ipId of initial.ipIds()) {
    const record = initial.get(ipId);
    if (!record) {
      continue;
    }
    if (record.failure && !options.retryFailed) {
      continue;
    }

    const next = plan.get(ipId);
    if (next === undefined) {
      const vacated = record.holder !== undefined || record.target !== undefined || record.state !== 'unassigned';
      if (vacated) {
        warnings.push({
          kind: 'no-eligible-holder',
          message: `No alive instance can take over ${ipId}; leaving it unassigned`,
          ipId
        });
      }
      const current = record.holder ?? record.target;
      if (current !== undefined && isAlive(snapshot, current)) {
        actions.push({ kind: 'release', ipId, instanceId: current, reason: 'failover' });
      }
      table = table.put(unassigned(record));
      continue;
    }

    if (record.holder === next || record.target === next) {
      continue;
    }

    actions.push(...moveActions(record, next, moveReason(record, next, options.trigger)));
    table = table.put(inFlight(record, next));
  }

  return { table, actions, warnings };
}

function moveReason(record: Readonly<FloatingIpRecord>, next: InstanceId, trigger: Intent | undefined): ActionReason {
  if (record.failure) {
    return 'retry';
  }
  if (next !== record.defaultOwner) {
    return 'failover';
  }
  const joined = trigger !== undefined &&
    (trigger.kind === 'instance-joined' || trigger.kind === 'self-joined') &&
    trigger.id === next;
  return joined ? 'default-owner-join' : 'default-owner-reclaim';
}

function registerDefaultOwner(
  table: OwnershipTable,
  snapshot: MembershipSnapshot,
  instanceId: InstanceId,
  ipId: FloatingIpId
): { table: OwnershipTable; warnings: FailoverWarning[] } {
  const warnings: FailoverWarning[] = [];
  let next = table;

  // An instance declares one default IP; drop ownership of any previous one
  for (const otherId of table.ipIds()) {
    const other = table.get(otherId);
    if (other && otherId !== ipId && other.defaultOwner === instanceId) {
      const { defaultOwner: _dropped, ...rest } = other;
      next = next.put(rest);
    }
  }

  const record = next.get(ipId);
  if (!record) {
    return { table: next.put({ ipId, state: 'unassigned', defaultOwner: instanceId }), warnings };
  }
  if (record.defaultOwner === instanceId) {
    return { table: next, warnings };
  }
  if (record.defaultOwner !== undefined && isAlive(snapshot, record.defaultOwner)) {
    warnings.push({
      kind: 'default-owner-conflict',
      message: `${instanceId} declares ${ipId} as its default IP, but ${record.defaultOwner} already owns it`,
      ipId,
      instanceId
    });
    return { table: next, warnings };
  }
  return { table: next.put({ ...record, defaultOwner: instanceId }), warnings };
}

function moveActions(record: Readonly<FloatingIpRecord>, next: InstanceId, reason: ActionReason): FailoverAction[] {
  const actions: FailoverAction[] = [];
  const previous = record.holder ?? record.target;
  if (previous !== undefined && previous !== next) {
    actions.push({ kind: 'release', ipId: record.ipId, instanceId: previous, reason });
  }
  actions.push({ kind: 'acquire', ipId: record.ipId, instanceId: next, reason });
  return actions;
}

function base(record: Readonly<FloatingIpRecord>): FloatingIpRecord {
  const next: FloatingIpRecord = { ipId: record.ipId, state: record.state };
  if (record.defaultOwner !== undefined) {
    next.defaultOwner = record.defaultOwner;
  }
  return next;
}

function inFlight(record: Readonly<FloatingIpRecord>, target: InstanceId): FloatingIpRecord {
  return { ...base(record), state: 'assignment-in-flight', target };
}

function assigned(record: Readonly<FloatingIpRecord>, holder: InstanceId): FloatingIpRecord {
  return {
    ...base(record),
    state: holder === record.defaultOwner ? 'assigned-default' : 'assigned-failover',
    holder
  };
}

function unassigned(record: Readonly<FloatingIpRecord>): FloatingIpRecord {
  return { ...base(record), state: 'unassigned' };
}

function failed(record: Readonly<FloatingIpRecord>, instanceId: InstanceId, result: ActuationResult): FloatingIpRecord {
  return {
    ...base(record),
    state: 'assignment-in-flight',
    failure: {
      instanceId,
      message: result.error ?? 'unknown error',
      attempts: result.attempts,
      at: result.at
    }
  };
}
