import { randomUUID } from 'node:crypto';

import type { ErrorKind } from '../errors.js';

export type AuditResult = 'success' | 'error' | 'rejected';

export interface AuditEntry {
  id: string;
  timestamp: string;
  tool: string;
  result: AuditResult;
  durationMs?: number;
  serial?: string;
  limitType?: number;
  limitValue?: number;
  persistent?: boolean;
  errorKind?: ErrorKind;
  message?: string;
}

export interface AuditQuery {
  tool?: string;
  result?: AuditResult;
  serial?: string;
  persistent?: boolean;
  since?: string;
  limit?: number;
}

export class AuditStore {
  private readonly entries: AuditEntry[] = [];

  constructor(
    private readonly maxEntries: number,
    private readonly now: () => Date = () => new Date()
  ) {}

  record(entry: Omit<AuditEntry, 'id' | 'timestamp'>): AuditEntry {
    const created: AuditEntry = {
      id: randomUUID(),
      timestamp: this.now().toISOString(),
      ...entry
    };

    this.entries.push(created);
    if (this.entries.length > this.maxEntries) {
      this.entries.splice(0, this.entries.length - this.maxEntries);
    }

    return created;
  }

  query(query: AuditQuery = {}): AuditEntry[] {
    const sinceMs = query.since ? Date.parse(query.since) : Number.NaN;
    const limit = query.limit && Number.isFinite(query.limit) ? Math.max(1, query.limit) : 100;

    const filtered = this.entries.filter((entry) => {
      if (query.tool && entry.tool !== query.tool) {
        return false;
      }
      if (query.result && entry.result !== query.result) {
        return false;
      }
      if (query.serial && entry.serial !== query.serial) {
        return false;
      }
      if (query.persistent !== undefined && entry.persistent !== query.persistent) {
        return false;
      }
      if (Number.isFinite(sinceMs) && Date.parse(entry.timestamp) < sinceMs) {
        return false;
      }
      return true;
    });

    return filtered.slice(-limit).reverse();
  }

  /**
   * Applied persistent limit writes for `serial` within the last `windowSec` seconds.
   */
  countPersistentWrites(serial: string, windowSec: number): number {
    const since = new Date(this.now().getTime() - windowSec * 1000).toISOString();
    return this.query({
      tool: 'opendtu_set_limit',
      result: 'success',
      serial,
      persistent: true,
      since,
      limit: this.maxEntries
    }).length;
  }
}
