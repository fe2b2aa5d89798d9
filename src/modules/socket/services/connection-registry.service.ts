/**
 * Connection Registry
 * Live session table plus the idle reaper.
 */

import { logger } from '@/shared/utils';
import { websocketCloseCodes } from '@/shared/config';
import type { CancelReason } from '@/modules/streaming/types';
import { SessionState, type SessionConfig, type SessionStats } from '../types';
import { sessionConfig } from '../config';
import type { RequestHandle, StreamSession } from './stream-session';

export class ConnectionRegistry {
  private sessions: Map<string, StreamSession> = new Map();
  private config: SessionConfig;
  private cleanupIntervalId?: NodeJS.Timeout;

  constructor(config: Partial<SessionConfig> = {}) {
    this.config = { ...sessionConfig, ...config };
  }

  register(session: StreamSession): boolean {
    if (this.sessions.has(session.id)) {
      logger.warn('Session already registered', { sessionId: session.id });
      return false;
    }

    this.sessions.set(session.id, session);
    logger.info('Session registered', {
      sessionId: session.id,
      total: this.sessions.size,
    });
    return true;
  }

  /**
   * Remove a session. With `expected`, only removes the entry if it still
   * holds that instance.
   */
  unregister(id: string, expected?: StreamSession): boolean {
    const current = this.sessions.get(id);
    if (!current) {
      return false;
    }
    if (expected && current !== expected) {
      logger.debug('Skipping stale unregister', { sessionId: id });
      return false;
    }

    this.sessions.delete(id);
    logger.info('Session unregistered', {
      sessionId: id,
      duration: current.getDuration(),
      total: this.sessions.size,
    });
    return true;
  }

  get(id: string): StreamSession | undefined {
    return this.sessions.get(id);
  }

  list(): StreamSession[] {
    return Array.from(this.sessions.values());
  }

  count(): number {
    return this.sessions.size;
  }

  countByState(state: SessionState): number {
    let total = 0;
    for (const session of this.sessions.values()) {
      if (session.state === state) total++;
    }
    return total;
  }

  getStats(): SessionStats {
    const sessions = this.list();
    const stats: SessionStats = {
      total: sessions.length,
      idle: 0,
      streaming: 0,
      closing: 0,
      avgDuration: 0,
    };

    if (sessions.length === 0) {
      return stats;
    }

    let totalDuration = 0;
    for (const session of sessions) {
      switch (session.state) {
        case SessionState.IDLE:
          stats.idle++;
          break;
        case SessionState.STREAMING:
          stats.streaming++;
          break;
        case SessionState.CLOSING:
          stats.closing++;
          break;
      }
      totalDuration += session.getDuration();
    }

    stats.avgDuration = Math.floor(totalDuration / sessions.length);
    return stats;
  }

  private isExpired(session: StreamSession, now: number): boolean {
    return (
      now - session.lastActivity > this.config.idleTimeout ||
      now - session.createdAt > this.config.maxSessionDuration
    );
  }

  /**
   * Evict sessions past the idle timeout or maximum age
   */
  reapIdleSessions(now: number = Date.now()): number {
    const expired = this.list().filter(
      (session) => !session.isClosing && this.isExpired(session, now)
    );

    for (const session of expired) {
      void this.evict(session, 'idle_timeout', 'Session idle timeout');
    }

    if (expired.length > 0) {
      logger.info('Reaped idle sessions', { count: expired.length });
    }

    return expired.length;
  }

  startReaper(): void {
    if (this.cleanupIntervalId) {
      return;
    }

    this.cleanupIntervalId = setInterval(() => {
      this.reapIdleSessions();
    }, this.config.cleanupInterval);
    this.cleanupIntervalId.unref();

    logger.debug('Session reaper started', {
      interval: this.config.cleanupInterval,
      idleTimeout: this.config.idleTimeout,
    });
  }

  stopReaper(): void {
    if (this.cleanupIntervalId) {
      clearInterval(this.cleanupIntervalId);
      this.cleanupIntervalId = undefined;
      logger.debug('Session reaper stopped');
    }
  }

  /**
   * Close every session (graceful shutdown)
   */
  async closeAll(): Promise<void> {
    this.stopReaper();
    const sessions = this.list();

    await Promise.allSettled(
      sessions.map((session) => this.evict(session, 'shutdown', 'Server shutting down'))
    );

    logger.info('All sessions closed', { count: sessions.length });
  }

  /**
   * Cancel the session's request and give the client its `done{cancelled}`
   * (bounded by `evictionGrace`), then close with 1001 and unregister
   */
  private async evict(session: StreamSession, reason: CancelReason, closeReason: string): Promise<void> {
    logger.info('Evicting session', { sessionId: session.id, reason });

    try {
      const request = session.activeRequest;
      if (request && session.cancelActiveRequest(reason)) {
        await this.awaitAcknowledgment(session, request);
      }

      session.closeTransport(websocketCloseCodes.GOING_AWAY, closeReason);
      await session.close();
      this.unregister(session.id, session);
    } catch (error) {
      logger.error('Error evicting session', { sessionId: session.id, error });
    }
  }

  private async awaitAcknowledgment(session: StreamSession, request: RequestHandle): Promise<void> {
    let timer: NodeJS.Timeout | undefined;
    const grace = new Promise<void>((resolve) => {
      timer = setTimeout(() => {
        logger.warn('Cancel acknowledgment not delivered before eviction', {
          sessionId: session.id,
          requestId: request.requestId,
        });
        resolve();
      }, this.config.evictionGrace);
    });

    try {
      await Promise.race([request.completion.then(() => session.outbound.flush()), grace]);
    } finally {
      clearTimeout(timer);
    }
  }
}

// Export singleton instance
export const connectionRegistry = new ConnectionRegistry();
