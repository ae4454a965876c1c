/**
 * Structured Logger Service
 *
 * JSON-based structured logging with log levels, component context and run correlation.
 */

import { EventEmitter } from 'events';
import { appendFileSync } from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  component?: string;
  runId?: string;
  stepId?: string;
  agent?: string;
  duration?: number;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
  [key: string]: unknown;
}

export interface LoggerConfig {
  level: LogLevel;
  prettyPrint: boolean;
  includeTimestamp: boolean;
  includeStack: boolean;
  redactPaths: string[];
  output: 'console' | 'file' | 'both' | 'none';
  filePath?: string;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4
};

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const normalized = value?.toLowerCase().trim();
  switch (normalized) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
    case 'fatal':
      return normalized;
    default:
      return fallback;
  }
}

export class StructuredLogger extends EventEmitter {
  private config: LoggerConfig;
  private context: Record<string, unknown> = {};
  private buffer: LogEntry[] = [];
  private maxBufferSize = 1000;

  constructor(config?: Partial<LoggerConfig>) {
    super();
    this.config = {
      level: parseLogLevel(process.env.LOG_LEVEL),
      prettyPrint: process.env.LOG_FORMAT !== 'json' && process.env.NODE_ENV !== 'production',
      includeTimestamp: true,
      includeStack: process.env.NODE_ENV !== 'production',
      redactPaths: ['password', 'token', 'secret', 'apiKey', 'privateKey'],
      output: 'console',
      ...config
    };
  }

  /**
   * Set global context that's included in all logs
   */
  setContext(context: Record<string, unknown>): void {
    this.context = { ...this.context, ...context };
  }

  /**
   * Create a child logger with additional context
   */
  child(context: Record<string, unknown>): StructuredLogger {
    const child = new StructuredLogger(this.config);
    child.setContext({ ...this.context, ...context });
    // Children report through the parent so buffers and listeners stay in one place
    child.on('log', (entry: LogEntry) => this.record(entry));
    return child;
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.log('debug', message, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.log('info', message, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.log('warn', message, metadata);
  }

  error(message: string, error?: unknown, metadata?: Record<string, unknown>): void {
    this.log('error', message, { ...metadata, ...this.describeError(error) });
  }

  fatal(message: string, error?: unknown, metadata?: Record<string, unknown>): void {
    this.log('fatal', message, { ...metadata, ...this.describeError(error) });
  }

  /**
   * Get recent logs from buffer
   */
  getRecentLogs(options: {
    level?: LogLevel;
    component?: string;
    runId?: string;
    limit?: number;
  } = {}): LogEntry[] {
    let logs = [...this.buffer];

    if (options.level) {
      const minLevel = LOG_LEVELS[options.level];
      logs = logs.filter(l => LOG_LEVELS[l.level] >= minLevel);
    }

    if (options.component) {
      logs = logs.filter(l => l.component === options.component);
    }

    if (options.runId) {
      logs = logs.filter(l => l.runId === options.runId);
    }

    return logs.slice(-(options.limit || 100));
  }

  /**
   * Flush buffer (for graceful shutdown)
   */
  flush(): void {
    this.buffer = [];
  }

  private describeError(error: unknown): Record<string, unknown> {
    if (!(error instanceof Error)) {
      return error === undefined ? {} : { error: { name: 'Error', message: String(error) } };
    }
    return {
      error: {
        name: error.name,
        message: error.message,
        stack: this.config.includeStack ? error.stack : undefined
      }
    };
  }

  private log(level: LogLevel, message: string, metadata?: Record<string, unknown>): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.config.level]) {
      return;
    }

    const entry: LogEntry = {
      ...this.context,
      ...this.redact(metadata || {}),
      timestamp: this.config.includeTimestamp ? new Date().toISOString() : '',
      level,
      message
    };

    this.output(entry);
    this.record(entry);
  }

  private record(entry: LogEntry): void {
    this.buffer.push(entry);
    if (this.buffer.length > this.maxBufferSize) {
      this.buffer.shift();
    }

    // Emit for external handlers
    this.emit('log', entry);

    if (entry.level === 'fatal') {
      this.emit('fatal', entry);
    }
  }

  private output(entry: LogEntry): void {
    const { output } = this.config;
    if (output === 'console' || output === 'both') {
      if (this.config.prettyPrint) {
        this.prettyOutput(entry);
      } else {
        console.log(JSON.stringify(entry));
      }
    }

    if ((output === 'file' || output === 'both') && this.config.filePath) {
      appendFileSync(this.config.filePath, `${JSON.stringify(entry)}\n`, 'utf-8');
    }
  }

  private prettyOutput(entry: LogEntry): void {
    const colors = {
      debug: '\x1b[36m',  // Cyan
      info: '\x1b[32m',   // Green
      warn: '\x1b[33m',   // Yellow
      error: '\x1b[31m',  // Red
      fatal: '\x1b[35m',  // Magenta
      reset: '\x1b[0m'
    };

    const { timestamp, level, message, component, duration, error, ...rest } = entry;
    const color = colors[level] || colors.reset;
    const levelStr = level.toUpperCase().padEnd(5);
    const componentStr = component ? `[${component}]` : '';

    let line = `${timestamp} ${color}${levelStr}${colors.reset} ${componentStr} ${message}`;

    if (duration !== undefined) {
      line += ` (${duration}ms)`;
    }

    if (Object.keys(rest).length > 0) {
      line += ` ${JSON.stringify(rest)}`;
    }

    console.log(line);

    if (error?.stack) {
      console.log(error.stack);
    }
  }

  private redact(obj: Record<string, unknown>): Record<string, unknown> {
    const redactValue = (value: unknown, path: string): unknown => {
      if (value === null || value === undefined) {
        return value;
      }

      if (Array.isArray(value)) {
        return value.map((item, idx) => redactValue(item, `${path}[${idx}]`));
      }

      if (typeof value === 'object') {
        const result: Record<string, unknown> = {};
        for (const [key, val] of Object.entries(value)) {
          const currentPath = path ? `${path}.${key}` : key;
          result[key] = redactValue(val, currentPath);
        }
        return result;
      }

      // Check if this path should be redacted
      const pathParts = path.toLowerCase().split('.');
      const shouldRedact = this.config.redactPaths.some(redactPath =>
        pathParts.some(part => part.includes(redactPath.toLowerCase()))
      );

      if (shouldRedact && typeof value === 'string') {
        return '[REDACTED]';
      }

      return value;
    };

    const result: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(obj)) {
      result[key] = redactValue(val, key);
    }
    return result;
  }
}

// Singleton instance for convenience
export const logger = new StructuredLogger();
