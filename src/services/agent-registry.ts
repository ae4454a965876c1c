import { readFileSync, readdirSync, existsSync } from 'fs';
import { join, extname } from 'path';
import { parse as parseYaml } from 'yaml';
import { ConfigError, NotFoundError } from '../errors.js';
import {
  PRIORITY_RANK,
  COORDINATOR_ACTOR,
  type AgentDescriptor,
  type AgentHealth,
  type AgentManifest,
  type AgentStatusReport,
  type IAuditLog
} from '../interfaces/index.js';
import { SchemaValidatorService } from './schema-validator.js';
import { StructuredLogger, logger as rootLogger } from './structured-logger.js';

const DEFAULT_MAX_OPERATIONS = 50;
const UNAVAILABLE_AFTER_FAILURES = 3;
const MANIFEST_KEYS = new Set([
  'name',
  'capabilities',
  'priority',
  'permissions',
  'timeout_seconds',
  'version',
  'description',
  'status',
  'max_operations',
  'compatible_agents'
]);

interface AgentHealthRecord {
  lastRunAt: string | null;
  lastOutcome: 'success' | 'failure' | null;
  successCount: number;
  failureCount: number;
  consecutiveFailures: number;
}

export interface RegisterOptions {
  /** Explicitly replace an already-registered agent of the same name */
  replace?: boolean;
}

export interface LoadDirectoryResult {
  loaded: string[];
  failed: Array<{ file: string; error: string }>;
}

/**
 * Agent Registry - Loads and validates agent manifests
 * Exposes lookup by name and by capability tag
 */
export class AgentRegistry {
  private agents: Map<string, AgentDescriptor> = new Map();
  private health: Map<string, AgentHealthRecord> = new Map();
  private validator: SchemaValidatorService;
  private logger: StructuredLogger;
  private auditLog?: IAuditLog;

  constructor(options: {
    validator?: SchemaValidatorService;
    logger?: StructuredLogger;
    auditLog?: IAuditLog;
  } = {}) {
    this.validator = options.validator ?? new SchemaValidatorService();
    this.logger = (options.logger ?? rootLogger).child({ component: 'agent-registry' });
    this.auditLog = options.auditLog;
  }

  /**
   * Register an agent from its manifest
   */
  register(manifest: unknown, options: RegisterOptions = {}): AgentDescriptor {
    const valid = this.validator.assertAgentManifest(manifest);
    const name = valid.name.trim();

    if (this.agents.has(name) && !options.replace) {
      throw new ConfigError(`Agent '${name}' is already registered`);
    }

    const unknownKeys = Object.keys(valid).filter(key => !MANIFEST_KEYS.has(key));
    if (unknownKeys.length > 0) {
      this.logger.warn('Ignoring unknown manifest keys', { agent: name, keys: unknownKeys });
    }

    const descriptor = toDescriptor(valid, name);
    // Map preserves first-insertion order; a replacement keeps its original slot
    this.agents.set(name, descriptor);
    if (!this.health.has(name)) {
      this.health.set(name, emptyHealth());
    }

    this.auditLog?.append({
      actor: COORDINATOR_ACTOR,
      action: 'agent.register',
      outcome: 'success',
      details: { agent: name, replaced: options.replace === true, priority: descriptor.priority }
    });
    this.logger.debug('Registered agent', { agent: name, capabilities: descriptor.capabilities });

    return descriptor;
  }

  /**
   * Load every YAML/JSON manifest in a directory.
   * Invalid files are reported and skipped; valid ones still load.
   */
  loadFromDirectory(dir: string, options: RegisterOptions = {}): LoadDirectoryResult {
    const result: LoadDirectoryResult = { loaded: [], failed: [] };

    if (!existsSync(dir)) {
      this.logger.warn('Agent configuration directory does not exist', { dir });
      return result;
    }

    const files = readdirSync(dir)
      .filter(f => ['.yaml', '.yml', '.json'].includes(extname(f)))
      .filter(f => !f.includes('template'))
      .sort();

    for (const file of files) {
      try {
        const content = readFileSync(join(dir, file), 'utf-8');
        const data: unknown = extname(file) === '.json' ? JSON.parse(content) : parseYaml(content);
        const descriptor = this.register(data, options);
        result.loaded.push(descriptor.name);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.error(`Failed to load agent manifest ${file}`, error);
        result.failed.push({ file, error: message });
      }
    }

    return result;
  }

  /**
   * Get an agent by name
   */
  lookup(name: string): AgentDescriptor {
    const descriptor = this.agents.get(name);
    if (!descriptor) {
      throw new NotFoundError(`Agent '${name}' is not registered`, { details: { agent: name } });
    }
    return descriptor;
  }

  has(name: string): boolean {
    return this.agents.has(name);
  }

  /**
   * All agents carrying a capability tag, high priority first, then registration order
   */
  findByCapability(tag: string): AgentDescriptor[] {
    return this.list()
      .map((descriptor, order) => ({ descriptor, order }))
      .filter(({ descriptor }) => descriptor.capabilities.includes(tag))
      .sort((a, b) =>
        PRIORITY_RANK[a.descriptor.priority] - PRIORITY_RANK[b.descriptor.priority] || a.order - b.order
      )
      .map(({ descriptor }) => descriptor);
  }

  /**
   * All agents in registration order
   */
  list(): AgentDescriptor[] {
    return Array.from(this.agents.values());
  }

  listActive(): AgentDescriptor[] {
    return this.list().filter(a => a.status === 'active');
  }

  /**
   * Two agents are compatible if either lists the other
   */
  areCompatible(first: string, second: string): boolean {
    const a = this.agents.get(first);
    const b = this.agents.get(second);
    if (!a || !b) return false;
    return a.compatibleAgents.includes(second) || b.compatibleAgents.includes(first);
  }

  /**
   * Record the outcome of an invocation for health reporting
   */
  recordHealth(name: string, outcome: 'success' | 'failure', at: string = new Date().toISOString()): void {
    const record = this.health.get(name);
    if (!record) return;

    record.lastRunAt = at;
    record.lastOutcome = outcome;
    if (outcome === 'success') {
      record.successCount++;
      record.consecutiveFailures = 0;
    } else {
      record.failureCount++;
      record.consecutiveFailures++;
    }
  }

  /**
   * Last-known health and availability of an agent
   */
  getStatus(name: string, handlerBound = true): AgentStatusReport {
    const descriptor = this.lookup(name);
    const record = this.health.get(name) ?? emptyHealth();

    return {
      name,
      status: descriptor.status,
      health: deriveHealth(descriptor, record, handlerBound),
      handlerBound,
      ...record
    };
  }
}

function toDescriptor(manifest: AgentManifest, name: string): AgentDescriptor {
  const allowRead = [...(manifest.permissions.allow_read ?? [])];
  const allowWrite = [...(manifest.permissions.allow_write ?? [])];
  const operations = manifest.permissions.operations
    ? [...manifest.permissions.operations]
    : defaultOperations(allowRead, allowWrite);

  const descriptor: AgentDescriptor = {
    name,
    capabilities: Object.freeze([...manifest.capabilities]),
    priority: manifest.priority ?? 'normal',
    permissions: Object.freeze({
      allowRead: Object.freeze(allowRead),
      allowWrite: Object.freeze(allowWrite),
      deny: Object.freeze([...(manifest.permissions.deny ?? [])]),
      operations: Object.freeze(operations)
    }),
    timeoutSeconds: manifest.timeout_seconds,
    version: manifest.version ?? '1.0.0',
    description: manifest.description,
    status: manifest.status ?? 'active',
    maxOperations: manifest.max_operations ?? DEFAULT_MAX_OPERATIONS,
    compatibleAgents: Object.freeze([...(manifest.compatible_agents ?? [])]),
    registeredAt: new Date().toISOString()
  };

  return Object.freeze(descriptor);
}

function defaultOperations(allowRead: string[], allowWrite: string[]): string[] {
  const operations: string[] = [];
  if (allowRead.length > 0) operations.push('read');
  if (allowWrite.length > 0) operations.push('write');
  return operations;
}

function emptyHealth(): AgentHealthRecord {
  return {
    lastRunAt: null,
    lastOutcome: null,
    successCount: 0,
    failureCount: 0,
    consecutiveFailures: 0
  };
}

function deriveHealth(descriptor: AgentDescriptor, record: AgentHealthRecord, handlerBound: boolean): AgentHealth {
  if (descriptor.status !== 'active' || !handlerBound) return 'unavailable';
  if (record.consecutiveFailures >= UNAVAILABLE_AFTER_FAILURES) return 'unavailable';
  if (record.consecutiveFailures > 0) return 'degraded';
  if (record.lastRunAt === null) return 'unknown';
  return 'available';
}
