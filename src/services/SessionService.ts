import {
  ClientInfo,
  Session,
  SessionCapabilities,
  SessionSnapshot,
  SessionStoreOptions
} from '../types/index.js';
import { generateSessionId, SESSION_ID_PATTERN } from '../utils/index.js';
import { logger, shortId } from '../utils/logger.js';
import { metrics } from '../utils/metrics.js';

/**
 * In-memory session store for the Streamable HTTP transport.
 *
 * Every method is synchronous, so each call runs to completion on the event
 * loop and is the only writer of the map while it runs. Absence is a normal
 * result: nothing here throws for an unknown or expired id.
 */
export class SessionService {
  private readonly sessions = new Map<string, Session>();
  private readonly timeoutMs: number;
  private readonly sweepIntervalMs: number;
  private readonly now: () => number;
  private readonly log = logger.child({ component: 'session-store' });
  private lastSweepAt: number;

  constructor(options: SessionStoreOptions) {
    this.timeoutMs = options.timeoutMs;
    this.sweepIntervalMs = options.sweepIntervalMs;
    this.now = options.now ?? Date.now;
    this.lastSweepAt = this.now();

    this.log.info('Session store initialized', {
      timeoutMs: this.timeoutMs,
      sweepIntervalMs: this.sweepIntervalMs
    });
  }

  /**
   * Create a session with a fresh id
   */
  create(clientInfo: ClientInfo = {}, capabilities: SessionCapabilities = {}): Session {
    const timestamp = this.now();
    const session: Session = {
      id: generateSessionId(),
      createdAt: timestamp,
      lastAccessedAt: timestamp,
      clientInfo: { ...clientInfo },
      capabilities: { ...capabilities },
      context: {}
    };

    this.sessions.set(session.id, session);
    metrics.incrementCounter('toolstream_sessions_created_total');
    this.log.info('Created session', { sessionId: shortId(session.id) });

    // Opportunistic sweep, at most once per interval
    if (timestamp - this.lastSweepAt >= this.sweepIntervalMs) {
      this.sweep();
    }

    return session;
  }

  /**
   * Look up a live session and refresh its access time.
   * An expired record is deleted before returning undefined.
   */
  get(sessionId: string | undefined): Session | undefined {
    if (!sessionId) {
      return undefined;
    }
    if (!SESSION_ID_PATTERN.test(sessionId)) {
      this.log.debug('Rejected malformed session id', { length: sessionId.length });
      return undefined;
    }

    const session = this.sessions.get(sessionId);
    if (!session) {
      this.log.debug('Session not found', { sessionId: shortId(sessionId) });
      return undefined;
    }

    const timestamp = this.now();
    if (this.isExpired(session, timestamp)) {
      this.sessions.delete(sessionId);
      this.recordExpired(1);
      this.log.info('Session expired, removing', { sessionId: shortId(sessionId) });
      return undefined;
    }

    session.lastAccessedAt = timestamp;
    return session;
  }

  /**
   * Delete a session regardless of its state
   */
  remove(sessionId: string): boolean {
    const existed = this.sessions.delete(sessionId);
    if (existed) {
      this.log.info('Removed session', { sessionId: shortId(sessionId) });
    } else {
      this.log.debug('Session not found for removal', { sessionId: shortId(sessionId) });
    }
    return existed;
  }

  /**
   * Merge a patch into a live session's context
   */
  updateContext(sessionId: string, patch: Record<string, unknown>): boolean {
    const session = this.get(sessionId);
    if (!session) {
      return false;
    }

    Object.assign(session.context, patch);
    this.log.debug('Updated session context', { sessionId: shortId(sessionId) });
    return true;
  }

  /**
   * Merge client metadata into a live session on re-initialization
   */
  mergeClientInfo(
    sessionId: string,
    clientInfo: ClientInfo,
    capabilities?: SessionCapabilities
  ): Session | undefined {
    const session = this.get(sessionId);
    if (!session) {
      return undefined;
    }

    Object.assign(session.clientInfo, clientInfo);
    if (capabilities) {
      session.capabilities = { ...capabilities };
    }
    return session;
  }

  /**
   * Number of records held, including expired ones not yet swept
   */
  count(): number {
    return this.sessions.size;
  }

  /**
   * Number of live sessions. Expired records are skipped, not deleted.
   */
  liveCount(): number {
    const timestamp = this.now();
    let live = 0;
    for (const session of this.sessions.values()) {
      if (!this.isExpired(session, timestamp)) {
        live++;
      }
    }
    return live;
  }

  /**
   * Remove every expired record
   */
  sweep(): number {
    const timestamp = this.now();
    let removed = 0;

    for (const [sessionId, session] of this.sessions) {
      if (this.isExpired(session, timestamp)) {
        this.sessions.delete(sessionId);
        removed++;
        this.log.debug('Swept expired session', { sessionId: shortId(sessionId) });
      }
    }

    this.lastSweepAt = timestamp;
    if (removed > 0) {
      this.recordExpired(removed);
      this.log.info(`Cleaned up ${removed} expired sessions`, { removed });
    }
    return removed;
  }

  /**
   * Copies of all live sessions, for monitoring
   */
  list(): SessionSnapshot[] {
    const timestamp = this.now();
    return [...this.sessions.values()]
      .filter(session => !this.isExpired(session, timestamp))
      .map(session => ({
        ...session,
        clientInfo: { ...session.clientInfo },
        capabilities: { ...session.capabilities },
        context: { ...session.context }
      }));
  }

  private isExpired(session: Session, timestamp: number): boolean {
    return timestamp - session.lastAccessedAt >= this.timeoutMs;
  }

  private recordExpired(count: number): void {
    metrics.incrementCounter('toolstream_sessions_expired_total', undefined, count);
  }
}
