import { mkdirSync } from 'fs';
import { dirname } from 'path';
import Database, { type Database as DatabaseType } from 'better-sqlite3';
import type {
  AuditEntry,
  AuditQuery,
  AuditRecord,
  IAuditLog
} from '../interfaces/index.js';
import { createAuditEntry } from './audit-log.js';
import { isAuditEntry } from './jsonl-audit-log.js';

interface InsertParams {
  id: string;
  timestamp: string;
  actor: string;
  action: string;
  outcome: string;
  runId: string | null;
  stepId: string | null;
  data: string;
}

interface DataRow {
  data: string;
}

/**
 * SQLite-backed Audit Log
 * Persistent append-only storage; rows are inserted and never updated
 */
export class SQLiteAuditLog implements IAuditLog {
  private db: DatabaseType;
  private insertStmt: Database.Statement<[InsertParams], unknown>;
  private countStmt: Database.Statement<[], { count: number }>;

  constructor(dbPath: string = ':memory:') {
    if (dbPath !== ':memory:') {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.initSchema();

    this.insertStmt = this.db.prepare<[InsertParams], unknown>(`
      INSERT INTO audit_entries (id, timestamp, actor, action, outcome, run_id, step_id, data)
      VALUES (@id, @timestamp, @actor, @action, @outcome, @runId, @stepId, @data)
    `);

    this.countStmt = this.db.prepare<[], { count: number }>(
      'SELECT COUNT(*) as count FROM audit_entries'
    );
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS audit_entries (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        id TEXT NOT NULL UNIQUE,
        timestamp TEXT NOT NULL,
        actor TEXT NOT NULL,
        action TEXT NOT NULL,
        outcome TEXT NOT NULL,
        run_id TEXT,
        step_id TEXT,
        data TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_audit_actor ON audit_entries(actor);
      CREATE INDEX IF NOT EXISTS idx_audit_action ON audit_entries(action);
      CREATE INDEX IF NOT EXISTS idx_audit_run ON audit_entries(run_id);

      CREATE TRIGGER IF NOT EXISTS audit_entries_no_update
      BEFORE UPDATE ON audit_entries
      BEGIN
        SELECT RAISE(ABORT, 'audit entries are append-only');
      END;

      CREATE TRIGGER IF NOT EXISTS audit_entries_no_delete
      BEFORE DELETE ON audit_entries
      BEGIN
        SELECT RAISE(ABORT, 'audit entries are append-only');
      END;
    `);
  }

  append(record: AuditRecord): AuditEntry {
    const entry = createAuditEntry(record);
    this.insertStmt.run({
      id: entry.id,
      timestamp: entry.timestamp,
      actor: entry.actor,
      action: entry.action,
      outcome: entry.outcome,
      runId: entry.runId ?? null,
      stepId: entry.stepId ?? null,
      data: JSON.stringify(entry)
    });
    return entry;
  }

  query(query: AuditQuery): AuditEntry[] {
    const conditions: string[] = ['1=1'];
    const params: Record<string, string | number> = {};

    if (query.actor) {
      conditions.push('actor = @actor');
      params.actor = query.actor;
    }
    if (query.action) {
      conditions.push('action = @action');
      params.action = query.action;
    }
    if (query.outcome) {
      conditions.push('outcome = @outcome');
      params.outcome = query.outcome;
    }
    if (query.runId) {
      conditions.push('run_id = @runId');
      params.runId = query.runId;
    }
    if (query.stepId) {
      conditions.push('step_id = @stepId');
      params.stepId = query.stepId;
    }

    // SQLite treats a negative LIMIT as unbounded
    params.limit = query.limit ?? -1;
    params.offset = query.offset ?? 0;

    const stmt = this.db.prepare<[Record<string, string | number>], DataRow>(`
      SELECT data FROM audit_entries
      WHERE ${conditions.join(' AND ')}
      ORDER BY seq ASC
      LIMIT @limit OFFSET @offset
    `);

    return parseRows(stmt.all(params));
  }

  getAll(): AuditEntry[] {
    const rows = this.db
      .prepare<[], DataRow>('SELECT data FROM audit_entries ORDER BY seq ASC')
      .all();
    return parseRows(rows);
  }

  count(): number {
    return this.countStmt.get()?.count ?? 0;
  }

  close(): void {
    this.db.close();
  }
}

function parseRows(rows: DataRow[]): AuditEntry[] {
  const entries: AuditEntry[] = [];
  for (const row of rows) {
    const parsed: unknown = JSON.parse(row.data);
    if (isAuditEntry(parsed)) {
      entries.push(Object.freeze(parsed));
    }
  }
  return entries;
}
