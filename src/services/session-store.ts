import type { SessionRecord, SessionSource } from '../types/messaging.js';

export interface SessionStoreOptions {
  /** Maximum number of tracked sessions; the least recently active is evicted first. */
  capacity: number;
  /** Idle time after which a session is dropped. `0` disables expiry. */
  ttlMs: number;
  now?: () => Date;
}

export const DEFAULT_SESSION_CAPACITY = 1000;
export const DEFAULT_SESSION_TTL_MS = 30 * 60 * 1000;

/**
 * Web session table bounded by both count and idle time.
 *
 * Entries are kept in least-recently-active order (Map insertion order), so
 * capacity eviction and TTL pruning both only ever look at the head.
 */
export class SessionStore implements SessionSource {
  readonly #capacity: number;
  readonly #ttlMs: number;
  readonly #now: () => Date;
  readonly #sessions: Map<string, SessionRecord> = new Map();

  constructor(options: Partial<SessionStoreOptions> = {}) {
    this.#capacity = Math.max(1, Math.floor(options.capacity ?? DEFAULT_SESSION_CAPACITY));
    this.#ttlMs = Math.max(0, Math.floor(options.ttlMs ?? DEFAULT_SESSION_TTL_MS));
    this.#now = options.now ?? (() => new Date());
  }

  get capacity(): number {
    return this.#capacity;
  }

  get ttlMs(): number {
    return this.#ttlMs;
  }

  get activeSessionCount(): number {
    this.prune();
    return this.#sessions.size;
  }

  /** Create or refresh a session. A different user on the same id simply wins. */
  touch(sessionId: string, userId: string, at: Date = this.#now()): SessionRecord {
    this.prune();

    const existing = this.#sessions.get(sessionId);
    const record: SessionRecord = {
      userId,
      createdAt: existing?.createdAt ?? at,
      lastActivity: at,
    };

    // Re-insert so the entry moves to the most-recently-active end.
    this.#sessions.delete(sessionId);
    this.#sessions.set(sessionId, record);

    while (this.#sessions.size > this.#capacity) {
      const oldest = this.#sessions.keys().next();
      if (oldest.done) break;
      this.#sessions.delete(oldest.value);
    }

    return { ...record };
  }

  get(sessionId: string): SessionRecord | undefined {
    this.prune();
    const record = this.#sessions.get(sessionId);
    return record ? { ...record } : undefined;
  }

  entries(): Array<[string, SessionRecord]> {
    this.prune();
    return [...this.#sessions.entries()].map(([id, record]) => [id, { ...record }]);
  }

  /** Drop sessions idle for longer than the TTL. Returns how many were removed. */
  prune(): number {
    if (this.#ttlMs === 0) return 0;

    const cutoff = this.#now().getTime() - this.#ttlMs;
    let removed = 0;
    for (const [sessionId, record] of this.#sessions) {
      if (record.lastActivity.getTime() > cutoff) break;
      this.#sessions.delete(sessionId);
      removed += 1;
    }
    return removed;
  }

  clear(): void {
    this.#sessions.clear();
  }
}
