/**
 * Audit Log Tests
 * The same behaviour is expected of every backend
 */

import { describe, it, expect, afterEach } from 'vitest';
import { appendFileSync, readFileSync } from 'fs';
import { join } from 'path';
import { InMemoryAuditLog } from '../../src/services/audit-log.js';
import { JsonLinesAuditLog } from '../../src/services/jsonl-audit-log.js';
import { SQLiteAuditLog } from '../../src/services/sqlite-audit-log.js';
import type { IAuditLog } from '../../src/interfaces/index.js';
import { quietLogger, tempProject } from '../helpers.js';

const projects: Array<ReturnType<typeof tempProject>> = [];
const sqliteLogs: SQLiteAuditLog[] = [];

afterEach(() => {
  for (const log of sqliteLogs.splice(0)) log.close();
  for (const project of projects.splice(0)) project.cleanup();
});

function freshProject(): string {
  const project = tempProject('audit-test-');
  projects.push(project);
  return project.root;
}

const backends: Array<[string, () => IAuditLog]> = [
  ['InMemoryAuditLog', () => new InMemoryAuditLog()],
  ['JsonLinesAuditLog', () => new JsonLinesAuditLog(join(freshProject(), 'logs', 'audit.jsonl'))],
  ['SQLiteAuditLog', () => {
    const log = new SQLiteAuditLog(':memory:');
    sqliteLogs.push(log);
    return log;
  }]
];

describe.each(backends)('%s', (_name, create) => {
  it('should assign an id and timestamp to each entry', () => {
    const log = create();
    const entry = log.append({ actor: 'coordinator', action: 'workflow.start', outcome: 'info', runId: 'run-1' });

    expect(entry.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(Number.isNaN(Date.parse(entry.timestamp))).toBe(false);
    expect(entry.actor).toBe('coordinator');
    expect(log.count()).toBe(1);
  });

  it('should return entries in append order', () => {
    const log = create();
    log.append({ actor: 'a', action: 'first', outcome: 'info' });
    log.append({ actor: 'b', action: 'second', outcome: 'info' });
    log.append({ actor: 'c', action: 'third', outcome: 'info' });

    expect(log.getAll().map(e => e.action)).toEqual(['first', 'second', 'third']);
  });

  it('should filter by every query field', () => {
    const log = create();
    log.append({ actor: 'scanner', action: 'permission.check', outcome: 'allow', runId: 'run-1', stepId: 's1' });
    log.append({ actor: 'scanner', action: 'permission.check', outcome: 'deny', runId: 'run-1', stepId: 's1' });
    log.append({ actor: 'writer', action: 'permission.check', outcome: 'allow', runId: 'run-2', stepId: 's2' });
    log.append({ actor: 'writer', action: 'agent.invoke', outcome: 'success', runId: 'run-2', stepId: 's2' });

    expect(log.query({ actor: 'scanner' })).toHaveLength(2);
    expect(log.query({ action: 'agent.invoke' }).map(e => e.actor)).toEqual(['writer']);
    expect(log.query({ outcome: 'deny' }).map(e => e.actor)).toEqual(['scanner']);
    expect(log.query({ runId: 'run-2' }).map(e => e.action)).toEqual(['permission.check', 'agent.invoke']);
    expect(log.query({ stepId: 's1', outcome: 'allow' })).toHaveLength(1);
    expect(log.query({ runId: 'run-3' })).toEqual([]);
  });

  it('should page with offset and limit', () => {
    const log = create();
    for (const action of ['a', 'b', 'c', 'd', 'e']) {
      log.append({ actor: 'x', action, outcome: 'info' });
    }

    expect(log.query({ offset: 1, limit: 2 }).map(e => e.action)).toEqual(['b', 'c']);
    expect(log.query({ offset: 3 }).map(e => e.action)).toEqual(['d', 'e']);
  });

  it('should keep structured details and permission decisions', () => {
    const log = create();
    log.append({
      actor: 'writer',
      action: 'permission.check',
      outcome: 'deny',
      attempt: 2,
      permission: { decision: 'deny', operation: 'write', path: 'src/a.ts' },
      details: { violation: 'permission_denied' }
    });

    const [entry] = log.query({ actor: 'writer' });
    expect(entry.attempt).toBe(2);
    expect(entry.permission).toEqual({ decision: 'deny', operation: 'write', path: 'src/a.ts' });
    expect(entry.details).toEqual({ violation: 'permission_denied' });
  });

  it('should hand out immutable entries', () => {
    const log = create();
    log.append({ actor: 'x', action: 'y', outcome: 'info', details: { nested: { value: 1 } } });

    const [entry] = log.getAll();
    expect(Object.isFrozen(entry)).toBe(true);
    expect(() => {
      Object.assign(entry, { actor: 'tampered' });
    }).toThrow(TypeError);
    expect(log.getAll()[0].actor).toBe('x');
  });
});

describe('JsonLinesAuditLog persistence', () => {
  it('should write one JSON line per entry and reload them', () => {
    const file = join(freshProject(), 'audit.jsonl');
    const first = new JsonLinesAuditLog(file);
    first.append({ actor: 'a', action: 'one', outcome: 'info' });
    first.append({ actor: 'b', action: 'two', outcome: 'info' });

    const lines = readFileSync(file, 'utf-8').trim().split('\n');
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[1]).action).toBe('two');

    const reopened = new JsonLinesAuditLog(file);
    expect(reopened.count()).toBe(2);
    reopened.append({ actor: 'c', action: 'three', outcome: 'info' });
    expect(readFileSync(file, 'utf-8').trim().split('\n')).toHaveLength(3);
  });

  it('should skip a torn final line and keep appending on a fresh line', () => {
    const file = join(freshProject(), 'audit.jsonl');
    const first = new JsonLinesAuditLog(file, { logger: quietLogger() });
    first.append({ actor: 'a', action: 'one', outcome: 'info' });
    appendFileSync(file, '{"id":"abc","timest');

    const logger = quietLogger();
    const reopened = new JsonLinesAuditLog(file, { logger });
    expect(reopened.count()).toBe(1);
    expect(reopened.skippedLines).toBe(1);
    const warnings = logger.getRecentLogs({ level: 'warn' });
    expect(warnings).toHaveLength(1);
    expect(warnings[0].message).toBe('Skipping unreadable audit line');
    expect(warnings[0].line).toBe(2);

    reopened.append({ actor: 'b', action: 'two', outcome: 'info' });
    const third = new JsonLinesAuditLog(file, { logger: quietLogger() });
    expect(third.getAll().map(entry => entry.action)).toEqual(['one', 'two']);
    expect(third.skippedLines).toBe(1);
  });
});

describe('SQLiteAuditLog persistence', () => {
  it('should survive reopening the database file', () => {
    const file = join(freshProject(), 'nested', 'audit.db');
    const first = new SQLiteAuditLog(file);
    first.append({ actor: 'a', action: 'one', outcome: 'info', runId: 'run-1' });
    first.close();

    const reopened = new SQLiteAuditLog(file);
    sqliteLogs.push(reopened);
    expect(reopened.query({ runId: 'run-1' }).map(e => e.action)).toEqual(['one']);
  });
});
