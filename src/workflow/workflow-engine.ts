import { setTimeout as sleep } from 'timers/promises';
import { v4 as uuidv4 } from 'uuid';
import { EventEmitter } from 'eventemitter3';
import {
  ConfigError,
  NotFoundError,
  ResourceConflict,
  isRetryableKind,
  type CoordinationError
} from '../errors.js';
import {
  PRIORITY_RANK,
  COORDINATOR_ACTOR,
  type AgentDescriptor,
  type AgentResult,
  type IAuditLog,
  type StepOutcome,
  type StepState,
  type WorkflowDefinition,
  type WorkflowResult,
  type WorkflowState
} from '../interfaces/index.js';
import type { ExecutionUnit } from '../agents/execution-unit.js';
import type { AgentRegistry } from '../services/agent-registry.js';
import type { CoordinationHub, ExecutionContext, WriteRequest } from '../services/coordination-hub.js';
import type { PermissionSandbox } from '../services/permission-sandbox.js';
import { StructuredLogger, logger as rootLogger } from '../services/structured-logger.js';
import { evaluateGuard } from './guard-expression.js';
import { bindInputs, planWorkflow, type PlannedStep, type WorkflowPlan } from './workflow-planner.js';

export const DEFAULT_MAX_CONCURRENT = 5;

/**
 * Workflow Engine Events
 */
export interface WorkflowEngineEvents {
  'workflow:started': (runId: string, workflowName: string) => void;
  'workflow:state': (runId: string, state: WorkflowState) => void;
  'workflow:completed': (runId: string, result: WorkflowResult) => void;
  'workflow:failed': (runId: string, result: WorkflowResult) => void;
  'workflow:cancelled': (runId: string, result: WorkflowResult) => void;
  'wave:started': (runId: string, wave: number, stepIds: string[]) => void;
  'wave:completed': (runId: string, wave: number) => void;
  'step:started': (runId: string, stepId: string, attempt: number) => void;
  'step:retry': (runId: string, stepId: string, attempt: number, errorKind: string) => void;
  'step:finished': (runId: string, outcome: StepOutcome) => void;
}

export interface RunOptions {
  runId?: string;
  /** Aborting cancels the run */
  signal?: AbortSignal;
  /** Overrides the workflow's own max_concurrent */
  maxConcurrent?: number;
  /** Merged over the workflow's initial context */
  context?: Record<string, unknown>;
}

export interface WorkflowEngineDependencies {
  registry: AgentRegistry;
  sandbox: PermissionSandbox;
  hub: CoordinationHub;
  executionUnit: ExecutionUnit;
  auditLog: IAuditLog;
}

interface RunRecord {
  runId: string;
  definition: WorkflowDefinition;
  plan: WorkflowPlan;
  state: WorkflowState;
  context: ExecutionContext;
  outcomes: Map<string, StepOutcome>;
  waves: string[][];
  maxConcurrent: number;
  failedStep?: string;
  cancelRequested: boolean;
  /** Aborted on cancellation to cut retry backoffs short */
  cancellation: AbortController;
  startedAt: Date;
}

interface DispatchItem {
  planned: PlannedStep;
  descriptor?: AgentDescriptor;
  /** Set when the step must fail without being invoked */
  preempted?: CoordinationError;
}

/**
 * Workflow Engine
 *
 * Plans a workflow's DAG and runs it wave by wave. A wave is every step whose
 * dependencies have reached a terminal state and whose guard holds against
 * the context published by earlier waves. Steps within a wave run
 * concurrently up to maxConcurrent; waves run strictly one after another.
 */
export class WorkflowEngine extends EventEmitter<WorkflowEngineEvents> {
  private runs: Map<string, RunRecord> = new Map();
  private defaultMaxConcurrent: number;
  private logger: StructuredLogger;

  constructor(
    private deps: WorkflowEngineDependencies,
    options: { maxConcurrent?: number; logger?: StructuredLogger } = {}
  ) {
    super();
    this.defaultMaxConcurrent = options.maxConcurrent ?? DEFAULT_MAX_CONCURRENT;
    this.logger = (options.logger ?? rootLogger).child({ component: 'workflow-engine' });
  }

  /**
   * Validate a workflow without running it
   * @throws ConfigError
   */
  plan(definition: WorkflowDefinition): WorkflowPlan {
    const plan = planWorkflow(definition);
    for (const warning of plan.warnings) {
      this.logger.warn(`Workflow '${definition.name}': ${warning}`);
    }
    return plan;
  }

  /**
   * Run a workflow to a terminal state. Step failures are reported in the
   * result; only a ConfigError from planning is thrown.
   */
  async run(definition: WorkflowDefinition, options: RunOptions = {}): Promise<WorkflowResult> {
    const runId = options.runId ?? uuidv4();
    const log = this.logger.child({ runId, workflow: definition.name });
    const { auditLog, hub } = this.deps;

    auditLog.append({
      actor: COORDINATOR_ACTOR,
      action: 'workflow.plan',
      outcome: 'info',
      runId,
      details: { workflow: definition.name, version: definition.version }
    });

    let plan: WorkflowPlan;
    try {
      plan = this.plan(definition);
    } catch (error) {
      if (error instanceof ConfigError) {
        auditLog.append({
          actor: COORDINATOR_ACTOR,
          action: 'workflow.plan',
          outcome: 'failure',
          runId,
          details: { workflow: definition.name, problems: error.problems }
        });
        log.error('Workflow rejected during planning', error);
      }
      throw error;
    }

    const maxConcurrent = options.maxConcurrent ?? definition.execution.maxConcurrent ?? this.defaultMaxConcurrent;
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new ConfigError(`Invalid max concurrency ${maxConcurrent} for workflow '${definition.name}'`);
    }

    const record: RunRecord = {
      runId,
      definition,
      plan,
      state: 'planning',
      context: hub.createContext(runId, { ...definition.context, ...options.context }),
      outcomes: new Map(),
      waves: [],
      maxConcurrent,
      cancelRequested: false,
      cancellation: new AbortController(),
      startedAt: new Date()
    };
    this.runs.set(runId, record);

    const onAbort = (): void => {
      this.cancel(runId);
    };
    options.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      this.transition(record, 'running');
      this.emit('workflow:started', runId, definition.name);
      auditLog.append({
        actor: COORDINATOR_ACTOR,
        action: 'workflow.start',
        outcome: 'info',
        runId,
        details: { workflow: definition.name, version: definition.version, maxConcurrent }
      });
      log.info('Workflow started', { steps: definition.steps.length, maxConcurrent });

      if (options.signal?.aborted) {
        this.cancel(runId);
      }

      await this.drive(record, log);
      return this.finish(record, log);
    } finally {
      options.signal?.removeEventListener('abort', onAbort);
      this.runs.delete(runId);
    }
  }

  /**
   * Request cancellation. In-flight steps finish; nothing new is dispatched.
   * False if the run is unknown or already failing or finished.
   */
  cancel(runId: string): boolean {
    const record = this.runs.get(runId);
    if (!record || record.failedStep !== undefined) return false;
    if (record.state !== 'running' && record.state !== 'planning') return false;
    if (record.cancelRequested) return true;

    record.cancelRequested = true;
    record.cancellation.abort();
    this.deps.auditLog.append({
      actor: COORDINATOR_ACTOR,
      action: 'workflow.cancel',
      outcome: 'info',
      runId
    });
    this.logger.info('Cancellation requested', { runId });
    return true;
  }

  getRunState(runId: string): WorkflowState | undefined {
    return this.runs.get(runId)?.state;
  }

  activeRuns(): string[] {
    return Array.from(this.runs.keys());
  }

  private async drive(record: RunRecord, log: StructuredLogger): Promise<void> {
    const { plan, outcomes } = record;

    while (!record.cancelRequested && record.failedStep === undefined) {
      const pending = plan.order.filter(id => !outcomes.has(id));
      if (pending.length === 0) return;

      // Context as published by every earlier wave
      const snapshot = record.context.snapshot();
      const ready: PlannedStep[] = [];
      let settled = 0;

      for (const id of pending) {
        const planned = this.planned(plan, id);
        if (!planned.dependencies.every(dep => outcomes.has(dep))) continue;

        const missing = planned.step.inputFrom.find(dep => outcomes.get(dep)?.state !== 'completed');
        if (missing !== undefined) {
          this.skip(record, planned, 'skipped', `required output of step '${missing}' is absent`);
          settled++;
          continue;
        }

        if (planned.guard && !evaluateGuard(planned.guard.ast, snapshot)) {
          this.skip(record, planned, 'skipped', `guard '${planned.guard.source}' evaluated false`);
          settled++;
          continue;
        }

        ready.push(planned);
      }

      if (ready.length > 0) {
        await this.runWave(record, ready, snapshot, log);
      } else if (settled === 0) {
        throw new Error(`Workflow run ${record.runId} cannot make progress`);
      }
    }
  }

  private async runWave(
    record: RunRecord,
    ready: PlannedStep[],
    snapshot: Readonly<Record<string, unknown>>,
    log: StructuredLogger
  ): Promise<void> {
    const { registry, hub } = this.deps;
    const wave = record.waves.length;

    const items: DispatchItem[] = ready.map(planned => {
      const { step } = planned;
      if (!registry.has(step.agent)) {
        return { planned, preempted: new NotFoundError(`Agent '${step.agent}' is not registered`) };
      }
      const descriptor = registry.lookup(step.agent);
      if (descriptor.status !== 'active') {
        return { planned, descriptor, preempted: new NotFoundError(`Agent '${step.agent}' is ${descriptor.status}`) };
      }
      return { planned, descriptor };
    });

    items.sort((a, b) =>
      rank(a) - rank(b) || a.planned.index - b.planned.index
    );

    const ids = items.map(item => item.planned.step.id);
    record.waves.push(ids);
    this.emit('wave:started', record.runId, wave, ids);
    log.info(`Wave ${wave} started`, { steps: ids });

    const requests: WriteRequest[] = [];
    for (const item of items) {
      if (item.preempted || !item.descriptor) continue;
      const targets = item.planned.step.writes ?? item.descriptor.permissions.allowWrite;
      if (targets.length === 0) continue;
      requests.push({
        stepId: item.planned.step.id,
        agent: item.descriptor.name,
        priority: item.descriptor.priority,
        order: item.planned.index,
        targets
      });
    }

    if (requests.length > 1) {
      const { rejected } = hub.resolveWaveConflicts(requests, record.runId);
      for (const { request, resolution } of rejected) {
        const item = items.find(i => i.planned.step.id === request.stepId);
        if (item) {
          item.preempted = new ResourceConflict(
            `Write target '${resolution.path}' is granted to step '${resolution.winner.stepId}'`,
            { details: { path: resolution.path, winner: resolution.winner.stepId } }
          );
        }
      }
    }

    const queue = [...items];
    const worker = async (): Promise<void> => {
      for (let item = queue.shift(); item; item = queue.shift()) {
        if (record.failedStep !== undefined) {
          this.skip(record, item.planned, 'skipped', `not started: workflow failed at step '${record.failedStep}'`, wave);
        } else if (record.cancelRequested) {
          this.skip(record, item.planned, 'cancelled', 'workflow cancelled before the step started', wave);
        } else {
          await this.executeStep(record, item, wave, snapshot);
        }
      }
    };

    const workers = Array.from({ length: Math.min(record.maxConcurrent, queue.length) }, () => worker());
    try {
      await Promise.all(workers);
    } finally {
      // Files written in this wave stay with their first writer until the wave ends
      for (const id of ids) {
        hub.releaseLocks(waveLockHolder(record.runId, id));
      }
    }

    this.emit('wave:completed', record.runId, wave);
  }

  private async executeStep(
    record: RunRecord,
    item: DispatchItem,
    wave: number,
    snapshot: Readonly<Record<string, unknown>>
  ): Promise<void> {
    const { step } = item.planned;
    const startedAt = new Date().toISOString();
    let attempts = 0;
    let interrupted = false;
    let result: AgentResult;

    if (item.preempted || !item.descriptor) {
      const error = item.preempted ?? new NotFoundError(`Agent '${step.agent}' is not registered`);
      result = {
        status: 'failure',
        payload: null,
        durationMs: 0,
        sideEffects: [],
        error: { kind: error.kind, message: error.message }
      };
    } else {
      ({ result, attempts, interrupted } = await this.invokeWithRetry(record, item.planned, item.descriptor, snapshot));
    }

    await this.deps.hub.publish(record.context, step.id, step.outputKey, result);

    let state: StepState;
    let reason: string;
    if (result.status === 'success') {
      state = 'completed';
      reason = 'completed';
    } else if (interrupted) {
      state = 'cancelled';
      reason = `workflow cancelled before retry attempt ${attempts + 1} (${describeError(result)})`;
    } else if (step.required) {
      state = 'failed';
      reason = describeError(result);
      record.failedStep ??= step.id;
    } else {
      state = 'skipped_with_warning';
      reason = `optional step failed: ${describeError(result)}`;
      this.logger.warn('Optional step failed', { runId: record.runId, stepId: step.id, reason });
    }

    this.settle(record, {
      stepId: step.id,
      agent: step.agent,
      action: step.action,
      state,
      reason,
      errorKind: result.error?.kind,
      attempts,
      wave,
      result,
      startedAt,
      completedAt: new Date().toISOString()
    });
  }

  /**
   * Invoke a step, retrying retryable failures with a fresh session each time.
   * `interrupted` is set when cancellation stopped a retry that was still due.
   */
  private async invokeWithRetry(
    record: RunRecord,
    planned: PlannedStep,
    descriptor: AgentDescriptor,
    snapshot: Readonly<Record<string, unknown>>
  ): Promise<{ result: AgentResult; attempts: number; interrupted: boolean }> {
    const { step } = planned;
    const { registry, auditLog } = this.deps;
    const inputs = this.stepInputs(record.plan, planned, snapshot);
    const retry = step.retry ?? { count: 0, backoffSeconds: 0 };

    for (let attempt = 1; ; attempt++) {
      this.emit('step:started', record.runId, step.id, attempt);
      const result = await this.invokeOnce(record, step.id, descriptor, step.action, inputs, attempt, snapshot);
      registry.recordHealth(descriptor.name, result.status === 'success' ? 'success' : 'failure');

      const kind = result.error?.kind;
      if (result.status === 'success' || !kind || !isRetryableKind(kind) || attempt > retry.count) {
        return { result, attempts: attempt, interrupted: false };
      }
      if (record.cancelRequested) {
        return { result, attempts: attempt, interrupted: true };
      }

      auditLog.append({
        actor: COORDINATOR_ACTOR,
        action: 'step.retry',
        outcome: 'info',
        runId: record.runId,
        stepId: step.id,
        attempt: attempt + 1,
        details: { errorKind: kind, backoffSeconds: retry.backoffSeconds }
      });
      this.emit('step:retry', record.runId, step.id, attempt + 1, kind);
      this.logger.warn('Retrying step', {
        runId: record.runId,
        stepId: step.id,
        attempt: attempt + 1,
        errorKind: kind
      });

      if (retry.backoffSeconds > 0) {
        const { signal } = record.cancellation;
        await sleep(retry.backoffSeconds * 1000, undefined, { signal }).catch((error: unknown) => {
          if (!signal.aborted) throw error;
        });
      }
      if (record.cancelRequested) {
        return { result, attempts: attempt, interrupted: true };
      }
    }
  }

  private async invokeOnce(
    record: RunRecord,
    stepId: string,
    descriptor: AgentDescriptor,
    action: string,
    inputs: Record<string, unknown>,
    attempt: number,
    snapshot: Readonly<Record<string, unknown>>
  ): Promise<AgentResult> {
    const { sandbox, executionUnit } = this.deps;
    const session = sandbox.openSession(descriptor, { runId: record.runId, stepId, attempt });
    try {
      return await executionUnit.invoke(descriptor, action, inputs, session, {
        runId: record.runId,
        stepId,
        attempt,
        context: snapshot,
        lockHolder: waveLockHolder(record.runId, stepId)
      });
    } finally {
      sandbox.closeSession(session);
    }
  }

  /**
   * Inputs after `${key}` binding, plus the outputs of `inputFrom` steps under their keys
   */
  private stepInputs(
    plan: WorkflowPlan,
    planned: PlannedStep,
    snapshot: Readonly<Record<string, unknown>>
  ): Record<string, unknown> {
    const inputs = bindInputs(planned.step.inputs, snapshot);
    for (const upstream of planned.step.inputFrom) {
      const key = this.planned(plan, upstream).step.outputKey;
      if (!Object.hasOwn(inputs, key)) {
        inputs[key] = snapshot[key];
      }
    }
    return inputs;
  }

  private skip(record: RunRecord, planned: PlannedStep, state: StepState, reason: string, wave: number | null = null): void {
    const { step } = planned;
    this.settle(record, {
      stepId: step.id,
      agent: step.agent,
      action: step.action,
      state,
      reason,
      attempts: 0,
      wave,
      result: { status: 'skipped', payload: null, durationMs: 0, sideEffects: [] }
    });
  }

  private settle(record: RunRecord, outcome: StepOutcome): void {
    record.outcomes.set(outcome.stepId, outcome);

    const auditOutcome = outcome.state === 'completed'
      ? 'success'
      : outcome.state === 'failed' || outcome.state === 'skipped_with_warning' ? 'failure' : 'skipped';
    this.deps.auditLog.append({
      actor: COORDINATOR_ACTOR,
      action: 'step.finish',
      outcome: auditOutcome,
      runId: record.runId,
      stepId: outcome.stepId,
      details: {
        state: outcome.state,
        reason: outcome.reason,
        attempts: outcome.attempts,
        wave: outcome.wave,
        errorKind: outcome.errorKind
      }
    });
    this.emit('step:finished', record.runId, outcome);
  }

  private finish(record: RunRecord, log: StructuredLogger): WorkflowResult {
    const remaining = record.plan.order.filter(id => !record.outcomes.has(id));
    let state: WorkflowResult['state'];

    if (record.failedStep !== undefined) {
      state = 'failed';
      for (const id of remaining) {
        this.skip(record, this.planned(record.plan, id), 'skipped', `not started: workflow failed at step '${record.failedStep}'`);
      }
    } else if (record.cancelRequested) {
      state = 'cancelled';
      for (const id of remaining) {
        this.skip(record, this.planned(record.plan, id), 'cancelled', 'workflow cancelled before the step started');
      }
    } else {
      state = 'completed';
    }

    this.transition(record, state);
    const result = this.deps.hub.aggregate({
      runId: record.runId,
      workflow: record.definition,
      state,
      outcomes: record.outcomes,
      waves: record.waves,
      context: record.context,
      failedStep: record.failedStep,
      startedAt: record.startedAt
    });

    this.deps.auditLog.append({
      actor: COORDINATOR_ACTOR,
      action: 'workflow.finish',
      outcome: state === 'completed' ? 'success' : state === 'failed' ? 'failure' : 'info',
      runId: record.runId,
      details: { state, failedStep: record.failedStep, waves: record.waves.length, durationMs: result.durationMs }
    });

    if (state === 'completed') {
      log.info('Workflow completed', { duration: result.durationMs, waves: record.waves.length });
      this.emit('workflow:completed', record.runId, result);
    } else if (state === 'failed') {
      log.warn('Workflow failed', { failedStep: record.failedStep, duration: result.durationMs });
      this.emit('workflow:failed', record.runId, result);
    } else {
      log.info('Workflow cancelled', { duration: result.durationMs });
      this.emit('workflow:cancelled', record.runId, result);
    }

    return result;
  }

  private transition(record: RunRecord, state: WorkflowState): void {
    record.state = state;
    this.emit('workflow:state', record.runId, state);
  }

  private planned(plan: WorkflowPlan, id: string): PlannedStep {
    const planned = plan.steps.get(id);
    if (!planned) {
      throw new Error(`Step '${id}' is not part of the plan for '${plan.definition.name}'`);
    }
    return planned;
  }
}

function waveLockHolder(runId: string, stepId: string): string {
  return `${runId}:${stepId}`;
}

function rank(item: DispatchItem): number {
  return PRIORITY_RANK[item.descriptor?.priority ?? 'normal'];
}

function describeError(result: AgentResult): string {
  return result.error ? `${result.error.kind}: ${result.error.message}` : `agent returned ${result.status}`;
}
