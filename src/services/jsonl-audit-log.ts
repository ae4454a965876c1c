import { appendFileSync, existsSync, mkdirSync, readFileSync } from 'fs';
import { dirname } from 'path';
import type {
  AuditEntry,
  AuditQuery,
  AuditRecord,
  IAuditLog
} from '../interfaces/index.js';
import { deepFreeze } from '../utils/freeze.js';
import { createAuditEntry, filterAuditEntries } from './audit-log.js';
import { StructuredLogger, logger as rootLogger } from './structured-logger.js';

/**
 * JSON-lines Audit Log
 * One JSON record per line; the file is only ever appended to.
 * Entries already in the file are loaded on construction; lines that do not
 * parse as entries (a torn final write) are skipped and counted.
 */
export class JsonLinesAuditLog implements IAuditLog {
  private entries: AuditEntry[] = [];
  private skipped = 0;
  private logger: StructuredLogger;

  constructor(private filePath: string, options: { logger?: StructuredLogger } = {}) {
    this.logger = (options.logger ?? rootLogger).child({ component: 'jsonl-audit-log' });
    mkdirSync(dirname(filePath), { recursive: true });
    if (existsSync(filePath)) {
      this.load(readFileSync(filePath, 'utf-8'));
    }
  }

  /**
   * Lines found unreadable when the file was opened
   */
  get skippedLines(): number {
    return this.skipped;
  }

  append(record: AuditRecord): AuditEntry {
    const entry = createAuditEntry(record);
    appendFileSync(this.filePath, `${JSON.stringify(entry)}\n`, 'utf-8');
    this.entries.push(entry);
    return entry;
  }

  query(query: AuditQuery): AuditEntry[] {
    return filterAuditEntries(this.entries, query);
  }

  getAll(): AuditEntry[] {
    return [...this.entries];
  }

  count(): number {
    return this.entries.length;
  }

  private load(content: string): void {
    content.split('\n').forEach((line, index) => {
      if (!line.trim()) return;

      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch (error) {
        this.skipLine(index, error instanceof Error ? error.message : String(error));
        return;
      }

      if (isAuditEntry(parsed)) {
        this.entries.push(deepFreeze(parsed));
      } else {
        this.skipLine(index, 'not an audit entry');
      }
    });

    // Terminate a torn final line so the next append starts on its own line
    if (content.length > 0 && !content.endsWith('\n')) {
      appendFileSync(this.filePath, '\n', 'utf-8');
    }
  }

  private skipLine(index: number, reason: string): void {
    this.skipped++;
    this.logger.warn('Skipping unreadable audit line', { file: this.filePath, line: index + 1, reason });
  }
}


export function isAuditEntry(value: unknown): value is AuditEntry {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'id' in value && typeof value.id === 'string' &&
    'timestamp' in value && typeof value.timestamp === 'string' &&
    'actor' in value && typeof value.actor === 'string' &&
    'action' in value && typeof value.action === 'string' &&
    'outcome' in value && typeof value.outcome === 'string'
  );
}
