/**
 * Bridge Session Service Tests
 * Session registry and bridge-wide metrics
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { BridgeSessionServiceClass } from '@/modules/bridge/services/bridge-session.service';
import { BridgeFaultType } from '@/modules/bridge/types';
import { logger } from '@/shared/utils';

describe('BridgeSessionService', () => {
  let service: BridgeSessionServiceClass;

  beforeEach(() => {
    service = new BridgeSessionServiceClass();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('Session lifecycle', () => {
    it('should register and end sessions', () => {
      const session = service.createSession(undefined, 'session-1');

      expect(session.id).toBe('session-1');
      expect(service.hasSession('session-1')).toBe(true);
      expect(service.getSession('session-1')).toBe(session);
      expect(service.getSessionCount()).toBe(1);

      service.endSession('session-1');

      expect(service.hasSession('session-1')).toBe(false);
      expect(service.getSessionCount()).toBe(0);
    });

    it('should ignore ending an unknown session', () => {
      service.createSession();

      service.endSession('missing');

      expect(service.getSessionCount()).toBe(1);
    });

    it('should track totals and peak concurrency', () => {
      const first = service.createSession();
      const second = service.createSession();
      service.endSession(first.id);
      service.endSession(second.id);
      service.createSession();

      expect(service.getMetrics()).toMatchObject({
        activeSessions: 1,
        totalSessions: 3,
        peakConcurrentSessions: 2,
      });
    });

    it('should clear sessions on shutdown', () => {
      service.createSession();
      service.createSession();

      service.shutdown();

      expect(service.getSessionCount()).toBe(0);
    });
  });

  describe('Metrics', () => {
    it('should count blocks, suppressed blocks and calls across sessions', () => {
      const first = service.createSession();
      first.push('<|channel|>analysis<|message|>plan<|end|>');
      first.push('<|start|>assistant<|channel|>commentary to=functions.run<|message|>{}<|call|>');

      const second = service.createSession();
      second.push('<|channel|>final<|message|>ok<|return|>');

      expect(service.getMetrics()).toMatchObject({
        blocksCompleted: 3,
        blocksSuppressed: 1,
        callsEmitted: 1,
      });
    });

    it('should count session faults by type', () => {
      const session = service.createSession();
      session.push('<|channel|>commentary to=functions.x<|message|>{bad<|call|>');
      session.push('<|channel|>final<|message|>a<|channel|>final<|message|>b');
      session.finish();

      const { faults, callsEmitted } = service.getMetrics();

      expect(faults).toEqual({
        [BridgeFaultType.FRAMING]: 1,
        [BridgeFaultType.PAYLOAD]: 1,
        [BridgeFaultType.ROUTING]: 0,
        [BridgeFaultType.TRANSPORT]: 0,
      });
      expect(callsEmitted).toBe(1);
    });

    it('should log recorded faults with their metadata', () => {
      const warn = vi.spyOn(logger, 'warn').mockImplementation(() => undefined);

      service.recordFault({
        type: BridgeFaultType.TRANSPORT,
        message: 'Upstream stream failed',
        sessionId: 'session-1',
        meta: { requestId: 'request-1' },
      });

      expect(warn).toHaveBeenCalledWith('Upstream stream failed', {
        sessionId: 'session-1',
        faultType: 'transport',
        requestId: 'request-1',
      });
      expect(service.getMetrics().faults[BridgeFaultType.TRANSPORT]).toBe(1);
    });

    it('should reset registry and metrics', () => {
      const session = service.createSession();
      session.push('<|channel|>analysis<|message|>x<|end|>');

      service.reset();

      expect(service.getMetrics()).toEqual({
        activeSessions: 0,
        totalSessions: 0,
        peakConcurrentSessions: 0,
        blocksCompleted: 0,
        blocksSuppressed: 0,
        callsEmitted: 0,
        faults: {
          [BridgeFaultType.FRAMING]: 0,
          [BridgeFaultType.PAYLOAD]: 0,
          [BridgeFaultType.ROUTING]: 0,
          [BridgeFaultType.TRANSPORT]: 0,
        },
      });
    });
  });
});
