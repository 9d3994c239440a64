/**
 * Session Store
 *
 * Explicit replacement for cookie-keyed ambient session storage. Records carry
 * an absolute expiry and are treated as absent once it passes, whether or not
 * they were cleared.
 *
 * `take()` is the atomic check-and-remove used to promote a pending
 * authentication: of two racing callers, only one receives the record.
 */

export interface SessionStore<T> {
  get(sessionId: string): Promise<T | undefined>;

  put(sessionId: string, state: T, ttlMs: number): Promise<void>;

  delete(sessionId: string): Promise<void>;

  /**
   * Remove and return the record if it exists, is not expired and satisfies
   * `predicate`. The check and the removal happen as one step.
   */
  take(sessionId: string, predicate: (state: T) => boolean): Promise<T | undefined>;
}

interface StoredEntry<T> {
  state: T;
  expiresAt: number;
}

export interface InMemorySessionStoreOptions {
  /** Interval for sweeping expired entries (default: 60000ms, 0 disables) */
  cleanupIntervalMs?: number;
  /** Clock, for tests */
  now?: () => number;
}

/**
 * Process-local store. Every operation completes synchronously before its
 * promise resolves, so no other request can interleave inside `take()`.
 */
export class InMemorySessionStore<T> implements SessionStore<T> {
  private entries: Map<string, StoredEntry<T>> = new Map();
  private cleanupInterval?: NodeJS.Timeout;
  private readonly now: () => number;

  constructor(options: InMemorySessionStoreOptions = {}) {
    this.now = options.now ?? Date.now;
    const interval = options.cleanupIntervalMs ?? 60000;
    if (interval > 0) {
      this.cleanupInterval = setInterval(() => this.cleanupExpired(), interval);
      this.cleanupInterval.unref();
    }
  }

  async get(sessionId: string): Promise<T | undefined> {
    return this.read(sessionId)?.state;
  }

  async put(sessionId: string, state: T, ttlMs: number): Promise<void> {
    this.entries.set(sessionId, { state, expiresAt: this.now() + ttlMs });
  }

  async delete(sessionId: string): Promise<void> {
    this.entries.delete(sessionId);
  }

  async take(sessionId: string, predicate: (state: T) => boolean): Promise<T | undefined> {
    const entry = this.read(sessionId);
    if (!entry || !predicate(entry.state)) {
      return undefined;
    }
    this.entries.delete(sessionId);
    return entry.state;
  }

  /** States of all live entries. */
  liveStates(): T[] {
    const states: T[] = [];
    for (const sessionId of [...this.entries.keys()]) {
      const entry = this.read(sessionId);
      if (entry) {
        states.push(entry.state);
      }
    }
    return states;
  }

  cleanupExpired(): number {
    const now = this.now();
    let removed = 0;
    for (const [sessionId, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(sessionId);
        removed++;
      }
    }
    return removed;
  }

  destroy(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = undefined;
    }
    this.entries.clear();
  }

  private read(sessionId: string): StoredEntry<T> | undefined {
    const entry = this.entries.get(sessionId);
    if (!entry) {
      return undefined;
    }
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(sessionId);
      return undefined;
    }
    return entry;
  }
}
