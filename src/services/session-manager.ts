/**
 * Session Manager
 * Registry of simulation sessions with capacity eviction and idle expiry.
 *
 * Registry mutations are synchronous, so each create/get/list/close step
 * runs to completion on the event loop without interleaving.
 */

import { randomUUID } from 'node:crypto';
import type { EngineModel, SessionInfo } from '../types.js';
import { SESSION_CONFIG } from '../constants.js';
import { errorMessage } from '../errors/index.js';
import { logger, type SessionEndReason } from '../utils/logger.js';
import { metrics, MetricNames } from '../utils/metrics.js';
import { Session, monotonicClock, type Clock } from './session.js';

export interface SessionManagerOptions {
  capacity?: number;
  ttlMs?: number;
  // 0 disables the background sweep
  sweepIntervalMs?: number;
  clock?: Clock;
  idGenerator?: () => string;
}

export class SessionManager {
  private sessions: Map<string, Session> = new Map();
  private pendingDisposals: Set<Promise<void>> = new Set();
  private sweepTimer: NodeJS.Timeout | null = null;
  private readonly capacity: number;
  private readonly ttlMs: number;
  private readonly clock: Clock;
  private readonly generateId: () => string;

  constructor(options: SessionManagerOptions = {}) {
    this.capacity = options.capacity ?? SESSION_CONFIG.MAX_SESSIONS;
    this.ttlMs = options.ttlMs ?? SESSION_CONFIG.TIMEOUT_MS;
    this.clock = options.clock ?? monotonicClock;
    this.generateId = options.idGenerator ?? randomUUID;

    if (!Number.isInteger(this.capacity) || this.capacity < 1) {
      throw new RangeError(`Session capacity must be a positive integer, got ${this.capacity}`);
    }

    const sweepIntervalMs = options.sweepIntervalMs ?? SESSION_CONFIG.SWEEP_INTERVAL_MS;
    if (sweepIntervalMs > 0) {
      this.sweepTimer = setInterval(() => {
        this.sweepExpired();
      }, sweepIntervalMs);
      this.sweepTimer.unref();
    }

    logger.info('SessionManager initialized', {
      capacity: this.capacity,
      ttlMs: this.ttlMs,
      sweepIntervalMs
    });
  }

  /**
   * Register a loaded model and return its new session id.
   * Expired sessions are swept first; at capacity the least recently
   * accessed session is evicted.
   */
  create(model: EngineModel, sourcePath: string): string {
    this.sweepExpired();

    if (this.sessions.size >= this.capacity) {
      this.evictOldest();
    }

    const sessionId = this.generateId();
    this.sessions.set(sessionId, new Session(sessionId, model, sourcePath, this.clock()));

    metrics.increment(MetricNames.SESSIONS_CREATED);
    metrics.gauge(MetricNames.ACTIVE_SESSIONS, this.sessions.size);
    logger.sessionCreated(sessionId, sourcePath);

    return sessionId;
  }

  /**
   * Look up a session and mark it accessed. Expired sessions are removed
   * and reported as missing.
   */
  get(sessionId: string): Session | undefined {
    const session = this.sessions.get(sessionId);
    if (!session) return undefined;

    const now = this.clock();
    if (session.isExpired(now, this.ttlMs)) {
      this.remove(session, 'expired');
      return undefined;
    }

    session.touch(now);
    return session;
  }

  /**
   * Remove a session and release its model. The id stops resolving
   * immediately; the returned promise settles after any in-flight engine
   * call has finished and the model is released.
   */
  async close(sessionId: string): Promise<boolean> {
    const session = this.sessions.get(sessionId);
    if (!session) return false;

    if (session.isExpired(this.clock(), this.ttlMs)) {
      this.remove(session, 'expired');
      return false;
    }

    this.sessions.delete(sessionId);
    metrics.increment(MetricNames.SESSIONS_CLOSED);
    metrics.gauge(MetricNames.ACTIVE_SESSIONS, this.sessions.size);
    logger.sessionDestroyed(sessionId, 'closed');

    await session.dispose();
    return true;
  }

  list(): SessionInfo[] {
    this.sweepExpired();
    return Array.from(this.sessions.values(), session => session.info());
  }

  /**
   * Remove every expired session. Returns how many were removed.
   */
  sweepExpired(): number {
    const now = this.clock();
    const expired = Array.from(this.sessions.values())
      .filter(session => session.isExpired(now, this.ttlMs));

    for (const session of expired) {
      this.remove(session, 'expired');
    }

    if (expired.length > 0) {
      logger.debug('Expired sessions cleaned', { count: expired.length });
    }
    return expired.length;
  }

  get size(): number {
    return this.sessions.size;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  getStats(): Record<string, unknown> {
    return {
      totalSessions: this.sessions.size,
      capacity: this.capacity,
      ttlMs: this.ttlMs,
      pendingReleases: this.pendingDisposals.size,
      sessions: Array.from(this.sessions.values(), session => ({
        id: session.id,
        sourcePath: session.sourcePath,
        createdAt: new Date(session.createdAt).toISOString(),
        lastAccessedAt: new Date(session.lastAccessedAt).toISOString()
      }))
    };
  }

  /**
   * Drop every session, release every model and stop the sweep timer.
   */
  async shutdown(): Promise<void> {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }

    for (const session of Array.from(this.sessions.values())) {
      this.remove(session, 'shutdown');
    }

    await Promise.all(Array.from(this.pendingDisposals));
    logger.info('SessionManager shut down');
  }

  // Oldest lastAccessedAt wins; among equal timestamps the earliest inserted.
  private evictOldest(): void {
    let oldest: Session | undefined;
    for (const session of this.sessions.values()) {
      if (!oldest || session.lastAccessedAt < oldest.lastAccessedAt) {
        oldest = session;
      }
    }

    if (oldest) {
      this.remove(oldest, 'evicted');
    }
  }

  private remove(session: Session, reason: Exclude<SessionEndReason, 'closed'>): void {
    this.sessions.delete(session.id);

    if (reason === 'evicted') {
      metrics.increment(MetricNames.SESSIONS_EVICTED);
    } else if (reason === 'expired') {
      metrics.increment(MetricNames.SESSIONS_EXPIRED);
    }
    metrics.gauge(MetricNames.ACTIVE_SESSIONS, this.sessions.size);
    logger.sessionDestroyed(session.id, reason);

    const disposal = session.dispose()
      .catch((error: unknown) => {
        logger.error('Failed to release engine model', {
          sessionId: session.id,
          reason,
          error: errorMessage(error)
        });
      })
      .finally(() => {
        this.pendingDisposals.delete(disposal);
      });
    this.pendingDisposals.add(disposal);
  }
}
