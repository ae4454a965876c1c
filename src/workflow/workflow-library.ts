import { existsSync, readFileSync, readdirSync } from 'fs';
import { extname, join } from 'path';
import { parse as parseYaml } from 'yaml';
import { NotFoundError, ConfigError } from '../errors.js';
import type { WorkflowDefinition, WorkflowDocument } from '../interfaces/index.js';
import { SchemaValidatorService } from '../services/schema-validator.js';
import { StructuredLogger, logger as rootLogger } from '../services/structured-logger.js';
import { planWorkflow } from './workflow-planner.js';

export const DEFAULT_WORKFLOW_VERSION = '1.0.0';

export interface WorkflowSummary {
  name: string;
  version: string;
  description?: string;
  steps: number;
  versions: string[];
}

/**
 * Convert a validated on-disk document into a definition with every default applied
 */
export function normalizeWorkflow(document: WorkflowDocument): WorkflowDefinition {
  return {
    name: document.name,
    version: document.version ?? DEFAULT_WORKFLOW_VERSION,
    description: document.description,
    context: { ...(document.context ?? {}) },
    execution: {
      maxConcurrent: document.execution?.max_concurrent
    },
    steps: document.steps.map(step => ({
      id: step.id,
      agent: step.agent,
      action: step.action,
      inputs: { ...(step.inputs ?? {}) },
      dependsOn: [...(step.depends_on ?? [])],
      guard: step.guard,
      outputKey: step.output_key ?? step.id,
      required: step.required ?? true,
      retry: step.retry
        ? { count: step.retry.count, backoffSeconds: step.retry.backoff_seconds ?? 0 }
        : undefined,
      inputFrom: [...(step.input_from ?? [])],
      writes: step.writes ? [...step.writes] : undefined
    }))
  };
}

/**
 * Compare dotted numeric versions
 */
export function compareVersions(a: string, b: string): number {
  const pa = a.split('.').map(Number);
  const pb = b.split('.').map(Number);
  for (let i = 0; i < Math.max(pa.length, pb.length); i++) {
    const diff = (pa[i] ?? 0) - (pb[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

/**
 * Workflow Library - Named, versioned workflow definitions
 * Every definition is planned once when registered so a broken DAG surfaces at load time.
 */
export class WorkflowLibrary {
  private workflows: Map<string, Map<string, WorkflowDefinition>> = new Map();
  private validator: SchemaValidatorService;
  private logger: StructuredLogger;

  constructor(options: { validator?: SchemaValidatorService; logger?: StructuredLogger } = {}) {
    this.validator = options.validator ?? new SchemaValidatorService();
    this.logger = (options.logger ?? rootLogger).child({ component: 'workflow-library' });
  }

  /**
   * Register a definition or a raw document
   * @throws ConfigError if invalid or if that name and version already exist
   */
  register(input: unknown, options: { replace?: boolean } = {}): WorkflowDefinition {
    const definition = isWorkflowDefinition(input)
      ? input
      : normalizeWorkflow(this.validator.assertWorkflowDocument(input));

    planWorkflow(definition);

    const versions = this.workflows.get(definition.name) ?? new Map<string, WorkflowDefinition>();
    if (versions.has(definition.version) && !options.replace) {
      throw new ConfigError(`Workflow '${definition.name}' version ${definition.version} is already registered`);
    }
    versions.set(definition.version, definition);
    this.workflows.set(definition.name, versions);

    this.logger.debug('Registered workflow', { workflow: definition.name, version: definition.version });
    return definition;
  }

  /**
   * A named workflow; the highest version unless one is given
   */
  get(name: string, version?: string): WorkflowDefinition {
    const versions = this.workflows.get(name);
    if (!versions || versions.size === 0) {
      throw new NotFoundError(`Workflow '${name}' is not registered`);
    }

    if (version !== undefined) {
      const definition = versions.get(version);
      if (!definition) {
        throw new NotFoundError(`Workflow '${name}' has no version ${version}`);
      }
      return definition;
    }

    const [latest] = this.versions(name).slice(-1);
    const definition = versions.get(latest);
    if (!definition) {
      throw new NotFoundError(`Workflow '${name}' is not registered`);
    }
    return definition;
  }

  has(name: string): boolean {
    return this.workflows.has(name);
  }

  /**
   * Registered versions of a workflow, oldest first
   */
  versions(name: string): string[] {
    return Array.from(this.workflows.get(name)?.keys() ?? []).sort(compareVersions);
  }

  list(): WorkflowSummary[] {
    return Array.from(this.workflows.keys())
      .sort()
      .map(name => {
        const latest = this.get(name);
        return {
          name,
          version: latest.version,
          description: latest.description,
          steps: latest.steps.length,
          versions: this.versions(name)
        };
      });
  }

  /**
   * Load every YAML/JSON workflow in a directory. Invalid files are logged and skipped.
   */
  loadFromDirectory(dir: string): { loaded: string[]; failed: Array<{ file: string; error: string }> } {
    const result: { loaded: string[]; failed: Array<{ file: string; error: string }> } = { loaded: [], failed: [] };

    if (!existsSync(dir)) {
      this.logger.warn('Workflow directory does not exist', { dir });
      return result;
    }

    const files = readdirSync(dir)
      .filter(f => ['.yaml', '.yml', '.json'].includes(extname(f)))
      .sort();

    for (const file of files) {
      try {
        const content = readFileSync(join(dir, file), 'utf-8');
        const data: unknown = extname(file) === '.json' ? JSON.parse(content) : parseYaml(content);
        const definition = this.register(
          normalizeWorkflow(this.validator.assertWorkflowDocument(data, `workflow ${file}`))
        );
        result.loaded.push(`${definition.name}@${definition.version}`);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.error(`Failed to load workflow ${file}`, error);
        result.failed.push({ file, error: message });
      }
    }

    return result;
  }
}

/**
 * Already-normalized definitions carry every field, with camelCase step keys
 */
export function isWorkflowDefinition(value: unknown): value is WorkflowDefinition {
  if (!isRecord(value)) return false;
  if (typeof value.name !== 'string' || typeof value.version !== 'string') return false;
  if (value.description !== undefined && typeof value.description !== 'string') return false;
  if (!isRecord(value.context) || !isRecord(value.execution)) return false;
  const { maxConcurrent } = value.execution;
  if (maxConcurrent !== undefined && typeof maxConcurrent !== 'number') return false;
  return Array.isArray(value.steps) && value.steps.every(isWorkflowStep);
}

function isWorkflowStep(value: unknown): boolean {
  if (!isRecord(value)) return false;
  return (
    typeof value.id === 'string' &&
    typeof value.agent === 'string' &&
    typeof value.action === 'string' &&
    isRecord(value.inputs) &&
    isStringArray(value.dependsOn) &&
    typeof value.outputKey === 'string' &&
    typeof value.required === 'boolean' &&
    isStringArray(value.inputFrom) &&
    (value.guard === undefined || typeof value.guard === 'string') &&
    (value.writes === undefined || isStringArray(value.writes)) &&
    (value.retry === undefined || isRetryPolicy(value.retry))
  );
}

function isRetryPolicy(value: unknown): boolean {
  return isRecord(value) && typeof value.count === 'number' && typeof value.backoffSeconds === 'number';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}
