import {
  FullMembershipListing,
  InstanceId,
  InstanceRecord,
  Intent,
  Liveness,
  MemberMetadata
} from '../../types';
import { compareIds, nonBlank } from '../../common/utils';

/**
 * Immutable view of the cluster as this engine last saw it.
 * Every transition returns a new frozen object; a transition that changes
 * nothing returns the very same object so callers can compare by reference.
 */
export interface MembershipSnapshot {
  readonly selfId: InstanceId;
  readonly version: number;
  /** Best known cluster size N */
  readonly totalSize: number;
  /** Size the operator declared up front (0 when not configured) */
  readonly expectedSize: number;
  /** Size reported by the last full membership listing */
  readonly reportedSize: number;
  /** True once a full listing has been merged */
  readonly complete: boolean;
  readonly instances: ReadonlyMap<InstanceId, Readonly<InstanceRecord>>;
}

export interface SnapshotOptions {
  expectedSize?: number;
}

export function createSnapshot(selfId: InstanceId, options: SnapshotOptions = {}): MembershipSnapshot {
  const expectedSize = sanitizeSize(options.expectedSize);
  return Object.freeze({
    selfId,
    version: 0,
    totalSize: expectedSize,
    expectedSize,
    reportedSize: 0,
    complete: false,
    instances: new Map<InstanceId, Readonly<InstanceRecord>>()
  });
}

/**
 * Apply one classified event to the snapshot
 */
export function observe(snapshot: MembershipSnapshot, intent: Intent): MembershipSnapshot {
  const existing = snapshot.instances.get(intent.id);
  let next: InstanceRecord;

  switch (intent.kind) {
    case 'instance-joined':
    case 'self-joined':
      next = buildRecord(intent.id, 'alive', existing, {
        defaultFloatingIP: intent.defaultIp,
        address: intent.address,
        zone: intent.zone
      });
      break;
    case 'instance-failed':
      next = buildRecord(intent.id, 'failed', existing);
      break;
    case 'instance-left':
      next = buildRecord(intent.id, 'left', existing);
      break;
  }

  if (existing && sameRecord(existing, next)) {
    return snapshot;
  }

  const instances = new Map(snapshot.instances);
  instances.set(next.id, Object.freeze(next));
  return rebuild(snapshot, instances, { complete: snapshot.complete, reportedSize: snapshot.reportedSize });
}

/**
 * Merge a full membership listing. Listed instances become alive; known
 * instances that were alive but are missing from the listing are marked failed,
 * which heals fail events the feed never delivered.
 */
export function observeListing(snapshot: MembershipSnapshot, listing: FullMembershipListing): MembershipSnapshot {
  const aliveIds = new Set<InstanceId>();
  for (const id of listing.aliveInstanceIds) {
    const clean = nonBlank(id);
    if (clean) {
      aliveIds.add(clean);
    }
  }

  const instances = new Map<InstanceId, Readonly<InstanceRecord>>();
  let changed = false;

  for (const [id, existing] of snapshot.instances) {
    let next: InstanceRecord;
    if (aliveIds.has(id)) {
      next = buildRecord(id, 'alive', existing, listing.metadata?.[id]);
    } else if (existing.liveness === 'alive') {
      next = buildRecord(id, 'failed', existing);
    } else {
      next = existing;
    }

    if (sameRecord(existing, next)) {
      instances.set(id, existing);
    } else {
      instances.set(id, Object.freeze(next));
      changed = true;
    }
  }

  for (const id of aliveIds) {
    if (!instances.has(id)) {
      instances.set(id, Object.freeze(buildRecord(id, 'alive', undefined, listing.metadata?.[id])));
      changed = true;
    }
  }

  const reportedSize = sanitizeSize(listing.totalSize);
  if (!changed && snapshot.complete && reportedSize === snapshot.reportedSize) {
    return snapshot;
  }

  return rebuild(snapshot, instances, { complete: true, reportedSize });
}

export function isAlive(snapshot: MembershipSnapshot, id: InstanceId | undefined): boolean {
  if (id === undefined) {
    return false;
  }
  return snapshot.instances.get(id)?.liveness === 'alive';
}

/**
 * Alive instance ids in the order every engine agrees on
 */
export function aliveIds(snapshot: MembershipSnapshot): InstanceId[] {
  const ids: InstanceId[] = [];
  for (const record of snapshot.instances.values()) {
    if (record.liveness === 'alive') {
      ids.push(record.id);
    }
  }
  return ids.sort(compareIds);
}

export function aliveCount(snapshot: MembershipSnapshot): number {
  let count = 0;
  for (const record of snapshot.instances.values()) {
    if (record.liveness === 'alive') count++;
  }
  return count;
}

export function getInstance(snapshot: MembershipSnapshot, id: InstanceId): Readonly<InstanceRecord> | undefined {
  return snapshot.instances.get(id);
}

function rebuild(
  previous: MembershipSnapshot,
  instances: Map<InstanceId, Readonly<InstanceRecord>>,
  fields: { complete: boolean; reportedSize: number }
): MembershipSnapshot {
  let known = 0;
  for (const record of instances.values()) {
    // unknown instances never count towards N
    if (record.liveness !== 'unknown') known++;
  }

  return Object.freeze({
    selfId: previous.selfId,
    version: previous.version + 1,
    totalSize: Math.max(previous.expectedSize, fields.reportedSize, known),
    expectedSize: previous.expectedSize,
    reportedSize: fields.reportedSize,
    complete: fields.complete,
    instances
  });
}

function buildRecord(
  id: InstanceId,
  liveness: Liveness,
  existing: Readonly<InstanceRecord> | undefined,
  metadata: MemberMetadata = {}
): InstanceRecord {
  const record: InstanceRecord = { id, liveness };
  const defaultIp = nonBlank(metadata.defaultFloatingIP) ?? existing?.defaultIp;
  const address = nonBlank(metadata.address) ?? existing?.address;
  const zone = nonBlank(metadata.zone) ?? existing?.zone;
  if (defaultIp !== undefined) record.defaultIp = defaultIp;
  if (address !== undefined) record.address = address;
  if (zone !== undefined) record.zone = zone;
  return record;
}

function sameRecord(a: Readonly<InstanceRecord>, b: Readonly<InstanceRecord>): boolean {
  return a.id === b.id &&
    a.liveness === b.liveness &&
    a.defaultIp === b.defaultIp &&
    a.address === b.address &&
    a.zone === b.zone;
}

function sanitizeSize(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value) || value < 0) {
    return 0;
  }
  return Math.floor(value);
}
