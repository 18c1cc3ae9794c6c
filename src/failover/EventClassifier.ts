import {
  FloatingIpId,
  FullMembershipListing,
  InstanceId,
  Intent,
  MemberMetadata
} from '../types';
import { isRecord, nonBlank } from '../common/utils';

export interface ClassifierContext {
  selfId: InstanceId;
  /** Default floating IP from the local configuration */
  selfDefaultIp?: FloatingIpId;
  /** Zone → floating IP, used when a member only advertises its zone */
  zoneIps?: Record<string, FloatingIpId>;
}

export type ClassificationResult =
  | { ok: true; intent: Intent }
  | { ok: false; reason: string; eventType?: string };

/**
 * Maps raw membership events onto engine intents.
 *
 * Input comes straight from the gossip layer, so nothing about its shape is
 * trusted: anything without a usable instance id or with an unknown type is
 * rejected with a reason instead of throwing.
 */
export class EventClassifier {
  constructor(private readonly context: ClassifierContext) {}

  get selfId(): InstanceId {
    return this.context.selfId;
  }

  classify(raw: unknown): ClassificationResult {
    if (!isRecord(raw)) {
      return { ok: false, reason: 'event is not an object' };
    }

    const eventType = nonBlank(raw.type);
    if (!eventType) {
      return { ok: false, reason: 'missing event type' };
    }

    const id = nonBlank(raw.instanceId);
    if (!id) {
      return { ok: false, reason: 'missing instance id', eventType };
    }

    switch (eventType) {
      case 'join':
      case 'update': {
        const metadata = parseMetadata(raw.metadata);
        const joined = {
          id,
          defaultIp: this.resolveDefaultIp(id, metadata),
          address: metadata.address,
          zone: metadata.zone
        };
        return {
          ok: true,
          intent: id === this.context.selfId
            ? { kind: 'self-joined', ...joined }
            : { kind: 'instance-joined', ...joined }
        };
      }
      case 'leave':
        return { ok: true, intent: { kind: 'instance-left', id } };
      case 'fail':
        return { ok: true, intent: { kind: 'instance-failed', id } };
      default:
        return { ok: false, reason: `unknown event type "${eventType}"`, eventType };
    }
  }

  /**
   * Declared default IP: explicit metadata first, then the IP configured for
   * the member's zone, then the local configuration when the member is us.
   */
  resolveDefaultIp(id: InstanceId, metadata: MemberMetadata = {}): FloatingIpId | undefined {
    const explicit = nonBlank(metadata.defaultFloatingIP);
    if (explicit) {
      return explicit;
    }
    const zone = nonBlank(metadata.zone);
    if (zone && this.context.zoneIps && Object.prototype.hasOwnProperty.call(this.context.zoneIps, zone)) {
      return this.context.zoneIps[zone];
    }
    if (id === this.context.selfId) {
      return this.context.selfDefaultIp;
    }
    return undefined;
  }

  /**
   * Fill in default IPs on a full listing the same way events get them
   */
  resolveListing(listing: FullMembershipListing): FullMembershipListing {
    const metadata: Record<InstanceId, MemberMetadata> = {};
    for (const rawId of listing.aliveInstanceIds) {
      const id = nonBlank(rawId);
      if (!id) continue;
      const declared = parseMetadata(listing.metadata?.[id]);
      const defaultIp = this.resolveDefaultIp(id, declared);
      metadata[id] = defaultIp !== undefined ? { ...declared, defaultFloatingIP: defaultIp } : declared;
    }
    return {
      totalSize: listing.totalSize,
      aliveInstanceIds: listing.aliveInstanceIds,
      metadata
    };
  }
}

function parseMetadata(value: unknown): MemberMetadata {
  if (!isRecord(value)) {
    return {};
  }
  const metadata: MemberMetadata = {};
  const defaultFloatingIP = nonBlank(value.defaultFloatingIP);
  const zone = nonBlank(value.zone);
  const address = nonBlank(value.address);
  if (defaultFloatingIP) metadata.defaultFloatingIP = defaultFloatingIP;
  if (zone) metadata.zone = zone;
  if (address) metadata.address = address;
  return metadata;
}
