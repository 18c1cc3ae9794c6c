import { FullMembershipListing, MemberMetadata, RawEventType, RawMembershipEvent } from '../types';
import { isRecord, nonBlank } from '../common/utils';

export interface SerfParseOptions {
  /** Only members carrying this role take part in failover */
  role: string;
  /** Tag holding the availability zone */
  zoneTag?: string;
  /** Tag holding an explicitly declared default floating IP */
  ipTag?: string;
}

export interface SerfMember {
  name: string;
  address: string;
  role: string;
  tags: Record<string, string>;
}

const SERF_EVENT_TYPES = new Map<string, RawEventType>([
  ['member-join', 'join'],
  ['member-leave', 'leave'],
  ['member-failed', 'fail'],
  ['member-update', 'update'],
  ['member-reap', 'leave']
]);

/**
 * Parse a tag string as Serf hands it to event handlers: `a=b,c=d`
 */
export function parseSerfTags(tagString: string): Record<string, string> {
  const tags: Record<string, string> = {};
  for (const pair of tagString.split(',')) {
    const separator = pair.indexOf('=');
    if (separator <= 0) continue;
    tags[pair.slice(0, separator).trim()] = pair.slice(separator + 1).trim();
  }
  return tags;
}

/**
 * Parse one `name\taddress\trole\ttags` line from handler stdin
 */
export function parseSerfMemberLine(line: string): SerfMember | undefined {
  const columns = line.replace(/\r$/, '').split('\t');
  const name = nonBlank(columns[0]);
  if (!name) {
    return undefined;
  }
  return {
    name,
    address: columns[1]?.trim() ?? '',
    role: columns[2]?.trim() ?? '',
    tags: parseSerfTags(columns[3] ?? '')
  };
}

/**
 * Turn one Serf event handler invocation into raw membership events.
 * Events other than member events (user events, queries) yield nothing.
 */
export function parseSerfHandlerInput(eventName: string, stdin: string, options: SerfParseOptions): RawMembershipEvent[] {
  const type = SERF_EVENT_TYPES.get(eventName.trim());
  if (!type) {
    return [];
  }

  const events: RawMembershipEvent[] = [];
  for (const line of stdin.split('\n')) {
    if (line.trim().length === 0) continue;
    const member = parseSerfMemberLine(line);
    if (!member || !hasRole(member.role, member.tags, options.role)) continue;

    events.push({
      type,
      instanceId: member.name,
      metadata: toMetadata(member.address, member.tags, options)
    });
  }
  return events;
}

/**
 * Convert `serf members -format json` output into a full listing.
 * Every member with the role counts towards the cluster size whatever its
 * status; only `alive` ones are listed as alive.
 */
export function parseSerfMembers(json: string, options: SerfParseOptions): FullMembershipListing {
  const parsed: unknown = JSON.parse(json);
  const members = isRecord(parsed) && Array.isArray(parsed.members) ? parsed.members : [];

  let totalSize = 0;
  const aliveInstanceIds: string[] = [];
  const metadata: Record<string, MemberMetadata> = {};

  for (const entry of members) {
    if (!isRecord(entry)) continue;
    const name = nonBlank(entry.name);
    if (!name) continue;

    const tags = stringTags(entry.tags);
    if (!hasRole(tags.role ?? '', tags, options.role)) continue;

    totalSize++;
    if (entry.status === 'alive') {
      aliveInstanceIds.push(name);
      metadata[name] = toMetadata(stripPort(typeof entry.addr === 'string' ? entry.addr : ''), tags, options);
    }
  }

  return { totalSize, aliveInstanceIds, metadata };
}

function hasRole(roleColumn: string, tags: Record<string, string>, role: string): boolean {
  return roleColumn === role || tags.role === role;
}

function toMetadata(address: string, tags: Record<string, string>, options: SerfParseOptions): MemberMetadata {
  const metadata: MemberMetadata = {};
  const zone = nonBlank(tags[options.zoneTag ?? 'az']);
  const ip = nonBlank(tags[options.ipTag ?? 'eip']);
  const addr = nonBlank(address);
  if (zone) metadata.zone = zone;
  if (ip) metadata.defaultFloatingIP = ip;
  if (addr) metadata.address = addr;
  return metadata;
}

function stringTags(value: unknown): Record<string, string> {
  const tags: Record<string, string> = {};
  if (!isRecord(value)) {
    return tags;
  }
  for (const [key, tag] of Object.entries(value)) {
    if (typeof tag === 'string') {
      tags[key] = tag;
    }
  }
  return tags;
}

function stripPort(address: string): string {
  const match = /^(\d{1,3}(?:\.\d{1,3}){3}):\d+$/.exec(address);
  return match ? match[1] : address;
}
