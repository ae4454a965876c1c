/**
 * Structured Logger Tests
 */

import { describe, it, expect } from 'vitest';
import { StructuredLogger, parseLogLevel, type LogEntry } from '../../src/services/structured-logger.js';

describe('StructuredLogger', () => {
  it('should drop entries below the configured level', () => {
    const log = new StructuredLogger({ output: 'none', level: 'warn' });
    log.info('ignored');
    log.warn('kept');

    expect(log.getRecentLogs().map(e => e.message)).toEqual(['kept']);
  });

  it('should forward child entries to the parent with their context', () => {
    const root = new StructuredLogger({ output: 'none', level: 'debug' });
    const seen: LogEntry[] = [];
    root.on('log', (entry: LogEntry) => seen.push(entry));

    const child = root.child({ component: 'workflow-engine' }).child({ runId: 'run-1' });
    child.info('Wave 0 started', { steps: ['a'] });

    expect(seen).toHaveLength(1);
    expect(seen[0]).toMatchObject({
      component: 'workflow-engine',
      runId: 'run-1',
      level: 'info',
      message: 'Wave 0 started',
      steps: ['a']
    });
    expect(root.getRecentLogs({ component: 'workflow-engine', runId: 'run-1' })).toHaveLength(1);
  });

  it('should redact secret-looking fields', () => {
    const log = new StructuredLogger({ output: 'none', level: 'debug' });
    log.info('configured', { password: 'test-secret', nested: { apiKey: 'test-key' }, count: 3 });

    const [entry] = log.getRecentLogs();
    expect(entry.password).toBe('[REDACTED]');
    expect(entry.nested).toEqual({ apiKey: '[REDACTED]' });
    expect(entry.count).toBe(3);
  });

  it('should describe errors', () => {
    const log = new StructuredLogger({ output: 'none', level: 'debug', includeStack: false });
    log.error('failed', new TypeError('bad input'), { stepId: 's1' });
    log.error('failed again', 'plain string');

    const [first, second] = log.getRecentLogs({ level: 'error' });
    expect(first.error).toEqual({ name: 'TypeError', message: 'bad input', stack: undefined });
    expect(first.stepId).toBe('s1');
    expect(second.error).toEqual({ name: 'Error', message: 'plain string' });
  });
});

describe('parseLogLevel', () => {
  it('should accept known levels and fall back otherwise', () => {
    expect(parseLogLevel(' DEBUG ')).toBe('debug');
    expect(parseLogLevel('verbose', 'warn')).toBe('warn');
    expect(parseLogLevel(undefined)).toBe('info');
  });
});
