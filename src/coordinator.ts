import { ConfigError } from './errors.js';
import type {
  AgentDescriptor,
  AgentHandler,
  AgentResult,
  AgentStatusReport,
  AgentSummary,
  AuditEntry,
  IAuditLog,
  WorkflowDefinition,
  WorkflowResult
} from './interfaces/index.js';
import { ExecutionUnit } from './agents/execution-unit.js';
import { AgentRegistry, type RegisterOptions } from './services/agent-registry.js';
import { InMemoryAuditLog } from './services/audit-log.js';
import { CoordinationHub } from './services/coordination-hub.js';
import { PermissionSandbox } from './services/permission-sandbox.js';
import { SchemaValidatorService } from './services/schema-validator.js';
import { StructuredLogger, logger as rootLogger } from './services/structured-logger.js';
import { createAuditLog, resolveCoordinatorConfigFromEnv, type CoordinatorConfig } from './utils/config.js';
import { WorkflowEngine, type RunOptions } from './workflow/workflow-engine.js';
import { WorkflowLibrary, type WorkflowSummary } from './workflow/workflow-library.js';

export interface CoordinatorOptions {
  projectRoot?: string;
  agentsDir?: string;
  workflowsDir?: string;
  maxConcurrent?: number;
  defaultTimeoutSeconds?: number;
  auditLog?: IAuditLog;
  logger?: StructuredLogger;
  schemaDir?: string;
}

export interface ExecutionHistoryEntry {
  runId: string;
  workflowName: string;
  workflowVersion: string;
  state: WorkflowResult['state'];
  failedStep?: string;
  startedAt: string;
  completedAt: string;
  durationMs: number;
}

export interface StartReport {
  agents: string[];
  workflows: string[];
  failed: Array<{ file: string; error: string }>;
}

/**
 * Coordinator - Wires the registry, sandbox, hub, execution unit and engine
 * together and exposes the surface a command-line front end calls.
 */
export class Coordinator {
  readonly auditLog: IAuditLog;
  readonly registry: AgentRegistry;
  readonly sandbox: PermissionSandbox;
  readonly hub: CoordinationHub;
  readonly executionUnit: ExecutionUnit;
  readonly engine: WorkflowEngine;
  readonly workflows: WorkflowLibrary;

  private history: ExecutionHistoryEntry[] = [];
  private logger: StructuredLogger;

  constructor(private options: CoordinatorOptions = {}) {
    const logger = options.logger ?? rootLogger;
    this.logger = logger.child({ component: 'coordinator' });
    this.auditLog = options.auditLog ?? new InMemoryAuditLog();

    const validator = new SchemaValidatorService(options.schemaDir);
    this.registry = new AgentRegistry({ validator, logger, auditLog: this.auditLog });
    this.sandbox = new PermissionSandbox(this.auditLog, { projectRoot: options.projectRoot, logger });
    this.hub = new CoordinationHub(this.auditLog, { logger });
    this.executionUnit = new ExecutionUnit(this.sandbox, this.hub, this.auditLog, {
      defaultTimeoutSeconds: options.defaultTimeoutSeconds,
      logger
    });
    this.engine = new WorkflowEngine(
      {
        registry: this.registry,
        sandbox: this.sandbox,
        hub: this.hub,
        executionUnit: this.executionUnit,
        auditLog: this.auditLog
      },
      { maxConcurrent: options.maxConcurrent, logger }
    );
    this.workflows = new WorkflowLibrary({ validator, logger });
  }

  /**
   * Build a coordinator from COORDINATOR_* environment variables
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env, logger?: StructuredLogger): Coordinator {
    const config: CoordinatorConfig = resolveCoordinatorConfigFromEnv(env);
    return new Coordinator({
      projectRoot: config.projectRoot,
      agentsDir: config.agentsDir,
      workflowsDir: config.workflowsDir,
      maxConcurrent: config.maxConcurrent,
      defaultTimeoutSeconds: config.defaultTimeoutSeconds,
      auditLog: createAuditLog(config.audit, logger),
      logger
    });
  }

  registerAgent(manifest: unknown, options?: RegisterOptions): AgentDescriptor {
    return this.registry.register(manifest, options);
  }

  bindHandler(agentName: string, handler: AgentHandler, options?: { replace?: boolean }): void {
    this.executionUnit.bind(agentName, handler, options);
  }

  registerWorkflow(definition: unknown): WorkflowDefinition {
    return this.workflows.register(definition);
  }

  /**
   * Load configured agent and workflow directories, then check that every
   * active agent has a bound handler.
   * @throws ConfigError listing the agents without one
   */
  start(): StartReport {
    const report: StartReport = { agents: [], workflows: [], failed: [] };

    if (this.options.agentsDir) {
      const agents = this.registry.loadFromDirectory(this.options.agentsDir);
      report.agents.push(...agents.loaded);
      report.failed.push(...agents.failed);
    }
    if (this.options.workflowsDir) {
      const workflows = this.workflows.loadFromDirectory(this.options.workflowsDir);
      report.workflows.push(...workflows.loaded);
      report.failed.push(...workflows.failed);
    }

    const unbound = this.registry
      .listActive()
      .map(agent => agent.name)
      .filter(name => !this.executionUnit.hasHandler(name));
    if (unbound.length > 0) {
      throw new ConfigError(
        'Active agents have no bound handler',
        unbound.map(name => `agent '${name}' has no handler`)
      );
    }

    this.logger.info('Coordinator started', {
      agents: this.registry.list().length,
      workflows: this.workflows.list().length,
      failed: report.failed.length
    });
    return report;
  }

  /**
   * Active agents in registration order
   */
  listAgents(): AgentSummary[] {
    return this.registry.listActive().map(agent => ({
      name: agent.name,
      capabilities: [...agent.capabilities],
      priority: agent.priority
    }));
  }

  /**
   * Run one agent action as a single-step workflow
   */
  async runAgent(
    name: string,
    action: string,
    target?: string | Record<string, unknown>,
    options: RunOptions = {}
  ): Promise<AgentResult> {
    this.registry.lookup(name);
    const inputs = typeof target === 'string' ? { target } : { ...(target ?? {}) };

    const result = await this.runWorkflow({
      name: `${name}:${action}`,
      version: '1.0.0',
      context: {},
      execution: { maxConcurrent: 1 },
      steps: [{
        id: action,
        agent: name,
        action,
        inputs,
        dependsOn: [],
        outputKey: action,
        required: true,
        inputFrom: []
      }]
    }, options);

    const [outcome] = result.steps;
    return outcome.result ?? {
      status: 'skipped',
      payload: null,
      durationMs: 0,
      sideEffects: []
    };
  }

  /**
   * Run a registered workflow by name (latest version unless given) or an ad hoc definition
   * @throws ConfigError if the workflow cannot be planned
   * @throws NotFoundError if a named workflow is not registered
   */
  async runWorkflow(
    workflow: string | WorkflowDefinition,
    options: RunOptions & { version?: string } = {}
  ): Promise<WorkflowResult> {
    const definition = typeof workflow === 'string'
      ? this.workflows.get(workflow, options.version)
      : workflow;

    const result = await this.engine.run(definition, options);
    this.history.push({
      runId: result.runId,
      workflowName: result.workflowName,
      workflowVersion: result.workflowVersion,
      state: result.state,
      failedStep: result.failedStep,
      startedAt: result.startedAt,
      completedAt: result.completedAt,
      durationMs: result.durationMs
    });
    return result;
  }

  agentStatus(name: string): AgentStatusReport {
    return this.registry.getStatus(name, this.executionUnit.hasHandler(name));
  }

  listWorkflows(): WorkflowSummary[] {
    return this.workflows.list();
  }

  cancel(runId: string): boolean {
    return this.engine.cancel(runId);
  }

  /**
   * Finished runs, most recent last
   */
  getExecutionHistory(limit?: number): ExecutionHistoryEntry[] {
    return limit === undefined ? [...this.history] : this.history.slice(-limit);
  }

  getAuditTrail(runId: string): AuditEntry[] {
    return this.auditLog.query({ runId });
  }
}
