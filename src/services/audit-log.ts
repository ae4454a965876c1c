import { v4 as uuidv4 } from 'uuid';
import type {
  AuditEntry,
  AuditQuery,
  AuditRecord,
  IAuditLog
} from '../interfaces/index.js';
import { frozenCopy } from '../utils/freeze.js';

/**
 * Build a complete, frozen entry from a record
 */
export function createAuditEntry(record: AuditRecord): AuditEntry {
  const entry: AuditEntry = {
    ...record,
    id: uuidv4(),
    timestamp: new Date().toISOString()
  };
  return frozenCopy(entry);
}

/**
 * Apply the non-indexed query filters plus offset/limit, preserving append order
 */
export function filterAuditEntries(entries: Iterable<AuditEntry>, query: AuditQuery): AuditEntry[] {
  const results: AuditEntry[] = [];
  for (const entry of entries) {
    if (query.actor && entry.actor !== query.actor) continue;
    if (query.action && entry.action !== query.action) continue;
    if (query.outcome && entry.outcome !== query.outcome) continue;
    if (query.runId && entry.runId !== query.runId) continue;
    if (query.stepId && entry.stepId !== query.stepId) continue;
    results.push(entry);
  }

  const offset = query.offset ?? 0;
  return query.limit === undefined
    ? results.slice(offset)
    : results.slice(offset, offset + query.limit);
}

/**
 * In-memory Audit Log implementation
 * Append-only: entries are frozen on insert and never replaced
 */
export class InMemoryAuditLog implements IAuditLog {
  private entries: AuditEntry[] = [];
  private entriesByRun: Map<string, AuditEntry[]> = new Map();

  append(record: AuditRecord): AuditEntry {
    const entry = createAuditEntry(record);
    this.entries.push(entry);

    if (entry.runId) {
      const runEntries = this.entriesByRun.get(entry.runId) ?? [];
      runEntries.push(entry);
      this.entriesByRun.set(entry.runId, runEntries);
    }

    return entry;
  }

  query(query: AuditQuery): AuditEntry[] {
    const candidates = query.runId ? this.entriesByRun.get(query.runId) ?? [] : this.entries;
    return filterAuditEntries(candidates, query);
  }

  getAll(): AuditEntry[] {
    return [...this.entries];
  }

  count(): number {
    return this.entries.length;
  }
}
