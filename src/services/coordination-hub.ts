import { EventEmitter } from 'eventemitter3';
import micromatch from 'micromatch';
import {
  PRIORITY_RANK,
  COORDINATOR_ACTOR,
  type AgentResult,
  type IAuditLog,
  type PriorityTier,
  type StepOutcome,
  type WorkflowDefinition,
  type WorkflowResult
} from '../interfaces/index.js';
import { ConfigError } from '../errors.js';
import { frozenCopy } from '../utils/freeze.js';
import { StructuredLogger, logger as rootLogger } from './structured-logger.js';

// Only this module can reach a context's storage
const contextData = new WeakMap<ExecutionContext, Map<string, unknown>>();

/**
 * Run-scoped key/value store. Readable by anyone holding it, writable only
 * through the CoordinationHub.
 */
export class ExecutionContext {
  constructor(readonly runId: string) {
    contextData.set(this, new Map());
  }

  get(key: string): unknown {
    return storage(this).get(key);
  }

  has(key: string): boolean {
    return storage(this).has(key);
  }

  keys(): string[] {
    return Array.from(storage(this).keys());
  }

  /**
   * Frozen point-in-time copy
   */
  snapshot(): Readonly<Record<string, unknown>> {
    return Object.freeze(Object.fromEntries(storage(this)));
  }
}

function storage(context: ExecutionContext): Map<string, unknown> {
  const data = contextData.get(context);
  if (!data) {
    throw new Error(`Execution context for run ${context.runId} has no storage`);
  }
  return data;
}

export interface WriteRequest {
  stepId: string;
  agent: string;
  priority: PriorityTier;
  /** Declaration index of the step in its workflow */
  order: number;
  targets: readonly string[];
}

export interface ConflictResolution {
  path: string;
  winner: WriteRequest;
  losers: WriteRequest[];
}

export interface WaveConflictResult {
  admitted: WriteRequest[];
  rejected: Array<{ request: WriteRequest; resolution: ConflictResolution }>;
}

export interface RunSummary {
  runId: string;
  workflow: WorkflowDefinition;
  state: WorkflowResult['state'];
  outcomes: ReadonlyMap<string, StepOutcome>;
  waves: string[][];
  context: ExecutionContext;
  failedStep?: string;
  startedAt: Date;
}

export interface CoordinationHubEvents {
  'step-published': (runId: string, stepId: string, outputKey: string, published: boolean) => void;
  'conflict-resolved': (runId: string | undefined, resolution: ConflictResolution) => void;
}

/**
 * Coordination Hub
 *
 * Single writer of every execution context. Resolves overlapping write
 * targets by priority and aggregates step outcomes into a run result.
 */
export class CoordinationHub extends EventEmitter<CoordinationHubEvents> {
  private writeChain: Promise<void> = Promise.resolve();
  private writeLocks: Map<string, string> = new Map();
  private logger: StructuredLogger;

  constructor(private auditLog: IAuditLog, options: { logger?: StructuredLogger } = {}) {
    super();
    this.logger = (options.logger ?? rootLogger).child({ component: 'coordination-hub' });
  }

  /**
   * Create a run's context, seeded with the workflow's initial values
   */
  createContext(runId: string, initial: Record<string, unknown> = {}): ExecutionContext {
    const context = new ExecutionContext(runId);
    const data = storage(context);
    for (const [key, value] of Object.entries(initial)) {
      try {
        data.set(key, frozenCopy(value));
      } catch (error) {
        throw new ConfigError(
          `Context value '${key}' cannot be copied into run ${runId}`,
          [error instanceof Error ? error.message : String(error)],
          { cause: error }
        );
      }
    }

    if (data.size > 0) {
      this.auditLog.append({
        actor: COORDINATOR_ACTOR,
        action: 'context.seed',
        outcome: 'info',
        runId,
        details: { keys: Array.from(data.keys()) }
      });
    }
    return context;
  }

  /**
   * Publish a step's result under its output key. Writes are applied one at a
   * time in call order; a non-success result leaves the key absent.
   */
  publish(context: ExecutionContext, stepId: string, outputKey: string, result: AgentResult): Promise<void> {
    const apply = (): void => {
      const published = result.status === 'success';
      if (published) {
        storage(context).set(outputKey, frozenCopy(result.payload));
      }

      this.auditLog.append({
        actor: COORDINATOR_ACTOR,
        action: 'context.publish',
        outcome: published ? 'success' : 'skipped',
        runId: context.runId,
        stepId,
        details: { outputKey, resultStatus: result.status }
      });
      this.emit('step-published', context.runId, stepId, outputKey, published);
    };

    const next = this.writeChain.then(apply);
    // The caller observes a failed write through `next`; the chain itself keeps going
    this.writeChain = next.then(
      () => undefined,
      (error: unknown) => this.logger.error('Context publish failed', error, { runId: context.runId, stepId })
    );
    return next;
  }

  /**
   * Resolve one contended write target: highest priority wins, ties go to the
   * earlier-declared step.
   */
  resolveConflict(path: string, requests: readonly WriteRequest[], runId?: string): ConflictResolution {
    if (requests.length === 0) {
      throw new Error(`No write requests to resolve for '${path}'`);
    }

    const [winner, ...losers] = sortRequests(requests);
    const resolution: ConflictResolution = { path, winner, losers };

    this.auditLog.append({
      actor: COORDINATOR_ACTOR,
      action: 'conflict.resolve',
      outcome: 'info',
      runId,
      stepId: winner.stepId,
      details: {
        path,
        winner: winner.stepId,
        winnerPriority: winner.priority,
        losers: losers.map(l => l.stepId)
      }
    });
    this.emit('conflict-resolved', runId, resolution);
    this.logger.info('Resolved write conflict', {
      runId,
      path,
      winner: winner.stepId,
      losers: losers.map(l => l.stepId)
    });

    return resolution;
  }

  /**
   * Admit at most one writer per overlapping target among one wave's requests
   */
  resolveWaveConflicts(requests: readonly WriteRequest[], runId?: string): WaveConflictResult {
    const admitted: WriteRequest[] = [];
    const blocked = new Map<string, { path: string; winner: WriteRequest; losers: WriteRequest[] }>();

    for (const request of sortRequests(requests)) {
      const clash = findClash(request, admitted);
      if (!clash) {
        admitted.push(request);
        continue;
      }

      const key = `${clash.winner.stepId}\u0000${clash.path}`;
      const group = blocked.get(key) ?? { path: clash.path, winner: clash.winner, losers: [] };
      group.losers.push(request);
      blocked.set(key, group);
    }

    const rejected: WaveConflictResult['rejected'] = [];
    for (const group of blocked.values()) {
      const resolution = this.resolveConflict(group.path, [group.winner, ...group.losers], runId);
      for (const loser of resolution.losers) {
        rejected.push({ request: loser, resolution });
      }
    }

    return { admitted, rejected };
  }

  /**
   * Take the single-writer lock for a concrete file path.
   * Re-entrant for the same holder; false if another holder has it.
   */
  acquireWriteLock(path: string, holder: string): boolean {
    const current = this.writeLocks.get(path);
    if (current !== undefined && current !== holder) {
      this.logger.warn('Write lock contention', { path, holder, heldBy: current });
      return false;
    }
    this.writeLocks.set(path, holder);
    return true;
  }

  releaseLocks(holder: string): number {
    let released = 0;
    for (const [path, current] of this.writeLocks) {
      if (current === holder) {
        this.writeLocks.delete(path);
        released++;
      }
    }
    return released;
  }

  lockHolder(path: string): string | undefined {
    return this.writeLocks.get(path);
  }

  /**
   * Build the final result of a run, steps in declaration order
   */
  aggregate(run: RunSummary): WorkflowResult {
    const completedAt = new Date();
    const steps = run.workflow.steps.map((step): StepOutcome => {
      const outcome = run.outcomes.get(step.id);
      if (outcome) return outcome;
      // Never reached a terminal state; only possible if the run aborted early
      return {
        stepId: step.id,
        agent: step.agent,
        action: step.action,
        state: 'cancelled',
        reason: 'run ended before the step was scheduled',
        attempts: 0,
        wave: null
      };
    });

    return {
      runId: run.runId,
      workflowName: run.workflow.name,
      workflowVersion: run.workflow.version,
      state: run.state,
      steps,
      waves: run.waves.map(wave => [...wave]),
      context: { ...run.context.snapshot() },
      failedStep: run.failedStep,
      startedAt: run.startedAt.toISOString(),
      completedAt: completedAt.toISOString(),
      durationMs: completedAt.getTime() - run.startedAt.getTime()
    };
  }
}

/**
 * Two write targets overlap if some path could match both. A literal path is
 * tested against the other target; two globs overlap unless their static bases
 * are disjoint or their literal suffixes cannot both end one path.
 */
export function targetsOverlap(a: string, b: string): boolean {
  if (a === b) return true;

  const left = micromatch.scan(a);
  const right = micromatch.scan(b);
  if (!left.isGlob || !right.isGlob) {
    return micromatch.isMatch(a, b, { dot: true }) || micromatch.isMatch(b, a, { dot: true });
  }

  if (!containsPath(left.base, right.base) && !containsPath(right.base, left.base)) {
    return false;
  }

  const leftSuffix = literalSuffix(left.glob);
  const rightSuffix = literalSuffix(right.glob);
  return leftSuffix.endsWith(rightSuffix) || rightSuffix.endsWith(leftSuffix);
}

function containsPath(base: string, path: string): boolean {
  return base === '' || path === base || path.startsWith(`${base}/`);
}

/**
 * Literal text every match must end with, e.g. `.md` for `*.md`. Empty when
 * the last segment ends in a wildcard or uses glob syntax after its last `*`.
 */
function literalSuffix(glob: string): string {
  const lastSegment = glob.slice(glob.lastIndexOf('/') + 1);
  const tail = lastSegment.slice(lastSegment.lastIndexOf('*') + 1);
  return /[?[\]{}()!+@\\]/.test(tail) ? '' : tail;
}

function findClash(
  request: WriteRequest,
  admitted: readonly WriteRequest[]
): { path: string; winner: WriteRequest } | undefined {
  for (const target of request.targets) {
    for (const other of admitted) {
      if (other.targets.some(t => targetsOverlap(t, target))) {
        return { path: target, winner: other };
      }
    }
  }
  return undefined;
}

function sortRequests(requests: readonly WriteRequest[]): WriteRequest[] {
  return [...requests].sort((a, b) =>
    PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority] || a.order - b.order
  );
}
