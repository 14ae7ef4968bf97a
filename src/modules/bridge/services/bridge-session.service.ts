/**
 * Bridge Session Service
 * Registry of open stream sessions plus bridge-wide metrics
 * Stateful singleton, sessions themselves share no mutable state
 */

import { logger } from '@/shared/utils';
import { bridgeConfig } from '../config/bridge.config';
import type { BlockRoute, BridgeFault, BridgeMetrics, SessionOptions } from '../types';
import { BridgeFaultType } from '../types';
import { StreamSession } from './stream-session.service';

function emptyFaultCounts(): Record<BridgeFaultType, number> {
  return {
    [BridgeFaultType.FRAMING]: 0,
    [BridgeFaultType.PAYLOAD]: 0,
    [BridgeFaultType.ROUTING]: 0,
    [BridgeFaultType.TRANSPORT]: 0,
  };
}

export class BridgeSessionServiceClass {
  private sessions = new Map<string, StreamSession>();

  // Metrics
  private totalSessions = 0;
  private peakConcurrentSessions = 0;
  private blocksCompleted = 0;
  private blocksSuppressed = 0;
  private callsEmitted = 0;
  private faults = emptyFaultCounts();

  /**
   * Open a session for one response stream
   */
  createSession(options: SessionOptions = bridgeConfig.sessionOptions(), id?: string): StreamSession {
    const session = new StreamSession(
      options,
      {
        onBlockCompleted: (_block, route) => this.onBlockCompleted(route),
        onCall: () => {
          this.callsEmitted++;
        },
        onFault: (fault) => this.recordFault(fault),
      },
      id
    );

    this.sessions.set(session.id, session);
    this.totalSessions++;
    if (this.sessions.size > this.peakConcurrentSessions) {
      this.peakConcurrentSessions = this.sessions.size;
    }

    logger.debug('Bridge session created', {
      sessionId: session.id,
      markers: options.markers.name,
      activeSessions: this.sessions.size,
    });

    return session;
  }

  /**
   * Drop a session once its response has ended
   */
  endSession(sessionId: string): void {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return;
    }
    this.sessions.delete(sessionId);

    logger.debug('Bridge session ended', {
      sessionId,
      ...session.stats,
      activeSessions: this.sessions.size,
    });
  }

  getSession(sessionId: string): StreamSession | undefined {
    return this.sessions.get(sessionId);
  }

  hasSession(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  getSessionCount(): number {
    return this.sessions.size;
  }

  /**
   * Log a recoverable fault and count it. Never throws.
   */
  recordFault(fault: BridgeFault): void {
    this.faults[fault.type]++;
    logger.warn(fault.message, {
      sessionId: fault.sessionId,
      faultType: fault.type,
      ...fault.meta,
    });
  }

  getMetrics(): BridgeMetrics {
    return {
      activeSessions: this.sessions.size,
      totalSessions: this.totalSessions,
      peakConcurrentSessions: this.peakConcurrentSessions,
      blocksCompleted: this.blocksCompleted,
      blocksSuppressed: this.blocksSuppressed,
      callsEmitted: this.callsEmitted,
      faults: { ...this.faults },
    };
  }

  /**
   * Graceful shutdown
   */
  shutdown(): void {
    logger.info('Bridge session service shutdown', { activeSessions: this.sessions.size });
    this.sessions.clear();
  }

  /**
   * Reset registry and metrics (tests)
   */
  reset(): void {
    this.sessions.clear();
    this.totalSessions = 0;
    this.peakConcurrentSessions = 0;
    this.blocksCompleted = 0;
    this.blocksSuppressed = 0;
    this.callsEmitted = 0;
    this.faults = emptyFaultCounts();
  }

  private onBlockCompleted(route: BlockRoute): void {
    this.blocksCompleted++;
    if (route === 'suppress') {
      this.blocksSuppressed++;
    }
  }
}

// Export singleton instance
export const bridgeSessionService = new BridgeSessionServiceClass();
