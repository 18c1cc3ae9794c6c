import { FloatingIpId, FloatingIpRecord } from '../types';
import { compareIds } from '../common/utils';

/**
 * Versioned mapping of floating IP → ownership record.
 *
 * The table is a value: `put` returns a new table and leaves the receiver
 * untouched, so the event loop is its only writer while any reader can hold on
 * to the instance it was handed. Writing a record equal to the stored one
 * returns the same table with the same version.
 */
export class OwnershipTable {
  private constructor(
    private readonly entries: ReadonlyMap<FloatingIpId, Readonly<FloatingIpRecord>>,
    readonly version: number
  ) {}

  static empty(): OwnershipTable {
    return new OwnershipTable(new Map(), 0);
  }

  static fromRecords(records: FloatingIpRecord[]): OwnershipTable {
    const entries = new Map<FloatingIpId, Readonly<FloatingIpRecord>>();
    for (const record of records) {
      entries.set(record.ipId, freezeRecord(record));
    }
    return new OwnershipTable(entries, entries.size > 0 ? 1 : 0);
  }

  get size(): number {
    return this.entries.size;
  }

  get(ipId: FloatingIpId): Readonly<FloatingIpRecord> | undefined {
    return this.entries.get(ipId);
  }

  has(ipId: FloatingIpId): boolean {
    return this.entries.has(ipId);
  }

  ipIds(): FloatingIpId[] {
    return Array.from(this.entries.keys()).sort(compareIds);
  }

  put(record: FloatingIpRecord): OwnershipTable {
    const existing = this.entries.get(record.ipId);
    if (existing && sameRecord(existing, record)) {
      return this;
    }
    const entries = new Map(this.entries);
    entries.set(record.ipId, freezeRecord(record));
    return new OwnershipTable(entries, this.version + 1);
  }

  /**
   * Consistent copy for readers, ordered by IP id
   */
  records(): FloatingIpRecord[] {
    return this.ipIds().map(ipId => {
      const record = this.entries.get(ipId);
      return record ? copyRecord(record) : { ipId, state: 'unassigned' };
    });
  }

  toJSON(): { version: number; records: FloatingIpRecord[] } {
    return { version: this.version, records: this.records() };
  }
}

function copyRecord(record: Readonly<FloatingIpRecord>): FloatingIpRecord {
  const copy: FloatingIpRecord = { ...record };
  if (record.failure) {
    copy.failure = { ...record.failure };
  }
  return copy;
}

function freezeRecord(record: FloatingIpRecord): Readonly<FloatingIpRecord> {
  const copy = copyRecord(record);
  if (copy.failure) {
    Object.freeze(copy.failure);
  }
  return Object.freeze(copy);
}

function sameRecord(a: Readonly<FloatingIpRecord>, b: Readonly<FloatingIpRecord>): boolean {
  if (
    a.ipId !== b.ipId ||
    a.state !== b.state ||
    a.defaultOwner !== b.defaultOwner ||
    a.holder !== b.holder ||
    a.target !== b.target
  ) {
    return false;
  }
  if (!a.failure || !b.failure) {
    return a.failure === b.failure;
  }
  return a.failure.instanceId === b.failure.instanceId &&
    a.failure.message === b.failure.message &&
    a.failure.attempts === b.failure.attempts &&
    a.failure.at === b.failure.at;
}
