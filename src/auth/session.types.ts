import { AccountId } from '../services/ledger/ledger.types';

/**
 * A time-bounded proof of a successful login.
 * Only expiresAt ever changes, and only by renewal.
 */
export interface Session {
  readonly id: string;
  readonly accountId: AccountId;
  readonly createdAt: Date;
  readonly expiresAt: Date;
}

export type SessionValidation =
  | { status: 'valid'; session: Session; renewed: boolean }
  | { status: 'not_found' }
  | { status: 'expired'; session: Session };

/**
 * Milliseconds since the epoch
 */
export type Clock = () => number;

export interface SessionManagerOptions {
  store: SessionStore;
  /** Lifetime of a session after creation or renewal (default: 10 minutes) */
  ttlMs?: number;
  /** Validation renews a session with less than this remaining (default: 1 minute) */
  renewThresholdMs?: number;
  now?: Clock;
  generateId?: () => string;
}

/**
 * Backing map for sessions. Every call is synchronous, so on Node's event
 * loop each call is atomic with respect to concurrent requests.
 */
export interface SessionStore {
  get(id: string): Session | undefined;
  set(session: Session): void;
  delete(id: string): boolean;
  values(): IterableIterator<Session>;
  readonly size: number;
}
