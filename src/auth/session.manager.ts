/**
 * Session Manager
 *
 * Issues, validates and renews login sessions. Validation renews a session
 * that is close to expiry, so callers never renew explicitly.
 */

import { v4 as uuidv4 } from 'uuid';

import { createServiceLogger, sessionValidationsTotal, trackActiveSessions } from '../observability';
import { AccountId } from '../services/ledger/ledger.types';
import {
  Clock,
  Session,
  SessionManagerOptions,
  SessionStore,
  SessionValidation,
} from './session.types';

const log = createServiceLogger('session-manager');

export const DEFAULT_SESSION_TTL_MS = 10 * 60 * 1000;
export const DEFAULT_RENEW_THRESHOLD_MS = 60 * 1000;

export class SessionManager {
  private readonly store: SessionStore;
  private readonly ttlMs: number;
  private readonly renewThresholdMs: number;
  private readonly now: Clock;
  private readonly generateId: () => string;
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(options: SessionManagerOptions) {
    this.store = options.store;
    this.ttlMs = options.ttlMs ?? DEFAULT_SESSION_TTL_MS;
    this.renewThresholdMs = options.renewThresholdMs ?? DEFAULT_RENEW_THRESHOLD_MS;
    this.now = options.now ?? Date.now;
    this.generateId = options.generateId ?? uuidv4;

    if (this.ttlMs <= 0) {
      throw new Error('Session TTL must be positive');
    }
    if (this.renewThresholdMs < 0 || this.renewThresholdMs >= this.ttlMs) {
      throw new Error('Session renew threshold must be between 0 and the TTL');
    }

    trackActiveSessions(() => this.activeSessionCount());
  }

  /**
   * Start a new session for an account that has already been authenticated
   */
  createSession(accountId: AccountId): Session {
    let id = this.generateId();
    while (this.store.get(id)) {
      id = this.generateId();
    }

    const now = this.now();
    const session: Session = {
      id,
      accountId,
      createdAt: new Date(now),
      expiresAt: new Date(now + this.ttlMs),
    };

    this.store.set(session);
    log.info({ accountId, expiresAt: session.expiresAt.toISOString() }, 'Session created');

    return session;
  }

  /**
   * Classify a presented session id.
   *
   * The expiry check and the renewal share one reading of the clock and run
   * without yielding, so a session that is already expired is never renewed.
   */
  validate(sessionId: string): SessionValidation {
    const session = this.store.get(sessionId);
    if (!session) {
      sessionValidationsTotal.inc({ result: 'not_found' });
      return { status: 'not_found' };
    }

    const now = this.now();
    const expiresAt = session.expiresAt.getTime();

    if (now >= expiresAt) {
      sessionValidationsTotal.inc({ result: 'expired' });
      return { status: 'expired', session };
    }

    if (expiresAt - now < this.renewThresholdMs) {
      const renewed = this.extend(session, now);
      sessionValidationsTotal.inc({ result: 'renewed' });
      log.debug(
        { accountId: renewed.accountId, expiresAt: renewed.expiresAt.toISOString() },
        'Session auto-renewed'
      );
      return { status: 'valid', session: renewed, renewed: true };
    }

    sessionValidationsTotal.inc({ result: 'valid' });
    return { status: 'valid', session, renewed: false };
  }

  /**
   * Push the expiry to now + TTL, whatever its current value
   */
  renew(session: Session): Session {
    return this.extend(session, this.now());
  }

  /**
   * Drop sessions whose expiry has passed. Returns the number removed.
   */
  sweepExpired(): number {
    const now = this.now();
    const expired: string[] = [];

    for (const session of this.store.values()) {
      if (now >= session.expiresAt.getTime()) {
        expired.push(session.id);
      }
    }

    for (const id of expired) {
      this.store.delete(id);
    }

    if (expired.length > 0) {
      log.debug({ removed: expired.length, remaining: this.store.size }, 'Expired sessions swept');
    }

    return expired.length;
  }

  activeSessionCount(): number {
    const now = this.now();
    let count = 0;
    for (const session of this.store.values()) {
      if (now < session.expiresAt.getTime()) count++;
    }
    return count;
  }

  startSweeper(intervalMs: number): void {
    if (intervalMs <= 0 || this.sweepTimer) {
      return;
    }

    this.sweepTimer = setInterval(() => this.sweepExpired(), intervalMs);
    this.sweepTimer.unref();
    log.info({ intervalMs }, 'Session sweeper started');
  }

  stopSweeper(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  private extend(session: Session, now: number): Session {
    const renewed: Session = { ...session, expiresAt: new Date(now + this.ttlMs) };
    this.store.set(renewed);
    return renewed;
  }
}
