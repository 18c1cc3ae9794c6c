import { EventClassifier } from '../../../src/failover/EventClassifier';

describe('EventClassifier', () => {
  const classifier = new EventClassifier({
    selfId: 'A',
    selfDefaultIp: 'ip-a',
    zoneIps: { 'zone-b': 'ip-b', 'zone-c': 'ip-c' }
  });

  describe('classify()', () => {
    it('should map a join for another instance to instance-joined', () => {
      expect(
        classifier.classify({
          type: 'join',
          instanceId: 'B',
          metadata: { defaultFloatingIP: 'ip-x', address: '10.1.0.2', zone: 'zone-b' }
        })
      ).toEqual({
        ok: true,
        intent: { kind: 'instance-joined', id: 'B', defaultIp: 'ip-x', address: '10.1.0.2', zone: 'zone-b' }
      });
    });

    it('should map a join for the local instance to self-joined with the configured IP', () => {
      expect(classifier.classify({ type: 'join', instanceId: 'A' })).toEqual({
        ok: true,
        intent: { kind: 'self-joined', id: 'A', defaultIp: 'ip-a', address: undefined, zone: undefined }
      });
    });

    it('should treat update like join', () => {
      const result = classifier.classify({ type: 'update', instanceId: 'C', metadata: { zone: 'zone-c' } });
      expect(result).toEqual({
        ok: true,
        intent: { kind: 'instance-joined', id: 'C', defaultIp: 'ip-c', address: undefined, zone: 'zone-c' }
      });
    });

    it('should map leave and fail', () => {
      expect(classifier.classify({ type: 'leave', instanceId: 'B' })).toEqual({
        ok: true,
        intent: { kind: 'instance-left', id: 'B' }
      });
      expect(classifier.classify({ type: 'fail', instanceId: 'B' })).toEqual({
        ok: true,
        intent: { kind: 'instance-failed', id: 'B' }
      });
    });

    it('should trim instance ids', () => {
      expect(classifier.classify({ type: 'fail', instanceId: '  B ' })).toEqual({
        ok: true,
        intent: { kind: 'instance-failed', id: 'B' }
      });
    });

    it('should reject events without an instance id', () => {
      expect(classifier.classify({ type: 'fail' })).toEqual({
        ok: false,
        reason: 'missing instance id',
        eventType: 'fail'
      });
      expect(classifier.classify({ type: 'join', instanceId: '' })).toEqual({
        ok: false,
        reason: 'missing instance id',
        eventType: 'join'
      });
    });

    it('should reject unknown event types', () => {
      expect(classifier.classify({ type: 'reboot', instanceId: 'B' })).toEqual({
        ok: false,
        reason: 'unknown event type "reboot"',
        eventType: 'reboot'
      });
    });

    it('should reject values that are not events', () => {
      expect(classifier.classify(null)).toEqual({ ok: false, reason: 'event is not an object' });
      expect(classifier.classify(['join', 'B'])).toEqual({ ok: false, reason: 'event is not an object' });
      expect(classifier.classify({ instanceId: 'B' })).toEqual({ ok: false, reason: 'missing event type' });
    });

    it('should ignore malformed metadata', () => {
      const result = classifier.classify({ type: 'join', instanceId: 'B', metadata: 'zone-b' });
      expect(result).toEqual({
        ok: true,
        intent: { kind: 'instance-joined', id: 'B', defaultIp: undefined, address: undefined, zone: undefined }
      });
    });
  });

  describe('resolveDefaultIp()', () => {
    it('should prefer explicit metadata over the zone map', () => {
      expect(classifier.resolveDefaultIp('B', { defaultFloatingIP: 'ip-x', zone: 'zone-b' })).toBe('ip-x');
    });

    it('should not resolve inherited object keys as zones', () => {
      expect(classifier.resolveDefaultIp('B', { zone: 'constructor' })).toBeUndefined();
    });

    it('should only use the local IP for the local instance', () => {
      expect(classifier.resolveDefaultIp('A')).toBe('ip-a');
      expect(classifier.resolveDefaultIp('B')).toBeUndefined();
    });
  });

  describe('resolveListing()', () => {
    it('should fill in default IPs for listed instances', () => {
      const resolved = classifier.resolveListing({
        totalSize: 3,
        aliveInstanceIds: ['A', 'B', 'D'],
        metadata: { B: { zone: 'zone-b' } }
      });

      expect(resolved).toEqual({
        totalSize: 3,
        aliveInstanceIds: ['A', 'B', 'D'],
        metadata: {
          A: { defaultFloatingIP: 'ip-a' },
          B: { zone: 'zone-b', defaultFloatingIP: 'ip-b' },
          D: {}
        }
      });
    });
  });
});
