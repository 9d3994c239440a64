/**
 * Audit trail for login and routing decisions
 *
 * A disabled service accepts entries and drops them, so callers log
 * unconditionally. Severity defaults from the outcome; callers raise it to
 * `critical` for attempts outside a subject's authorization.
 */

import type { AuditEntry, AuditSeverity } from './types.js';

export interface AuditServiceConfig {
  /** Default: false */
  enabled?: boolean;

  /** Default: ConsoleAuditStorage */
  storage?: AuditStorage;
}

export interface AuditStorage {
  log(entry: AuditEntry): Promise<void> | void;
}

export interface AuditQuery {
  source?: string;
  userId?: string;
  severity?: AuditSeverity;
}

/**
 * Writes one `[Audit]` line per entry. Critical entries go to stderr.
 */
export class ConsoleAuditStorage implements AuditStorage {
  log(entry: AuditEntry): void {
    const line = [
      `[Audit] ${entry.severity ?? 'info'} ${entry.source} ${entry.action}`,
      `user=${entry.userId ?? 'unknown'}`,
      `success=${entry.success}`,
      entry.reason ? `reason=${entry.reason}` : undefined,
    ]
      .filter((part) => part !== undefined)
      .join(' ');

    if (entry.severity === 'critical') {
      console.error(line);
    } else if (entry.severity === 'warning') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}

/**
 * Keeps the most recent `capacity` entries.
 */
export class InMemoryAuditStorage implements AuditStorage {
  private entries: AuditEntry[] = [];

  constructor(private readonly capacity: number = 10000) {}

  log(entry: AuditEntry): void {
    this.entries.push(entry);
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }
  }

  getEntries(query: AuditQuery = {}): AuditEntry[] {
    return this.entries.filter(
      (entry) =>
        (query.source === undefined || entry.source === query.source) &&
        (query.userId === undefined || entry.userId === query.userId) &&
        (query.severity === undefined || entry.severity === query.severity)
    );
  }
}

export class AuditService {
  private readonly enabled: boolean;
  private readonly storage: AuditStorage;

  constructor(config: AuditServiceConfig = {}) {
    this.enabled = config.enabled ?? false;
    this.storage = config.storage ?? new ConsoleAuditStorage();
  }

  /**
   * @throws Error when the entry names no source
   */
  async log(entry: AuditEntry): Promise<void> {
    if (!this.enabled) {
      return;
    }

    if (!entry.source) {
      throw new Error(`Audit entry for "${entry.action}" has no source`);
    }

    await this.storage.log({ ...entry, severity: entry.severity ?? (entry.success ? 'info' : 'warning') });
  }

  isEnabled(): boolean {
    return this.enabled;
  }
}
