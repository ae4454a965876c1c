import { resolve } from 'path';
import { ConfigError } from '../errors.js';
import type { IAuditLog } from '../interfaces/index.js';
import { InMemoryAuditLog } from '../services/audit-log.js';
import { JsonLinesAuditLog } from '../services/jsonl-audit-log.js';
import { SQLiteAuditLog } from '../services/sqlite-audit-log.js';
import type { StructuredLogger } from '../services/structured-logger.js';
import { loadEnvFromFile } from './env.js';

export type AuditBackend = 'memory' | 'jsonl' | 'sqlite';

export interface CoordinatorConfig {
  projectRoot: string;
  agentsDir: string;
  workflowsDir: string;
  maxConcurrent: number;
  defaultTimeoutSeconds: number;
  audit: {
    backend: AuditBackend;
    path?: string;
  };
}

/**
 * Build coordinator configuration from COORDINATOR_* variables, after
 * loading an optional .env file.
 *
 * COORDINATOR_PROJECT_ROOT   sandbox root (default: cwd)
 * COORDINATOR_AGENTS_DIR     agent manifests (default: <root>/config/agents)
 * COORDINATOR_WORKFLOWS_DIR  workflow definitions (default: <root>/config/workflows)
 * COORDINATOR_MAX_CONCURRENT steps per wave in flight (default: 5)
 * COORDINATOR_TIMEOUT_SECONDS default per-invocation timeout (default: 300)
 * COORDINATOR_AUDIT_BACKEND  memory | jsonl | sqlite (default: memory)
 * COORDINATOR_AUDIT_PATH     file for jsonl/sqlite
 */
export function resolveCoordinatorConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  options: { envFile?: string | false } = {}
): CoordinatorConfig {
  if (options.envFile !== false) {
    loadEnvFromFile(options.envFile ?? '.env', env);
  }

  const projectRoot = resolve(env.COORDINATOR_PROJECT_ROOT ?? process.cwd());
  const backend = parseBackend(env.COORDINATOR_AUDIT_BACKEND);
  const auditPath = env.COORDINATOR_AUDIT_PATH
    ? resolve(projectRoot, env.COORDINATOR_AUDIT_PATH)
    : defaultAuditPath(projectRoot, backend);

  return {
    projectRoot,
    agentsDir: resolve(projectRoot, env.COORDINATOR_AGENTS_DIR ?? 'config/agents'),
    workflowsDir: resolve(projectRoot, env.COORDINATOR_WORKFLOWS_DIR ?? 'config/workflows'),
    maxConcurrent: parsePositiveInteger('COORDINATOR_MAX_CONCURRENT', env.COORDINATOR_MAX_CONCURRENT, 5),
    defaultTimeoutSeconds: parsePositiveInteger('COORDINATOR_TIMEOUT_SECONDS', env.COORDINATOR_TIMEOUT_SECONDS, 300),
    audit: { backend, path: auditPath }
  };
}

export function createAuditLog(audit: CoordinatorConfig['audit'], logger?: StructuredLogger): IAuditLog {
  switch (audit.backend) {
    case 'memory':
      return new InMemoryAuditLog();
    case 'jsonl':
      if (!audit.path) throw new ConfigError('The jsonl audit backend needs a path');
      return new JsonLinesAuditLog(audit.path, { logger });
    case 'sqlite':
      return new SQLiteAuditLog(audit.path ?? ':memory:');
  }
}

function parseBackend(value: string | undefined): AuditBackend {
  const normalized = value?.trim().toLowerCase() || 'memory';
  if (normalized === 'memory' || normalized === 'jsonl' || normalized === 'sqlite') {
    return normalized;
  }
  throw new ConfigError(`Unknown audit backend '${value}'`, ['expected one of memory, jsonl, sqlite']);
}

function defaultAuditPath(projectRoot: string, backend: AuditBackend): string | undefined {
  if (backend === 'jsonl') return resolve(projectRoot, 'logs', 'audit.jsonl');
  if (backend === 'sqlite') return resolve(projectRoot, 'logs', 'audit.db');
  return undefined;
}

function parsePositiveInteger(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigError(`${name} must be a positive integer, got '${value}'`);
  }
  return parsed;
}
