import {
  AgentInternalError,
  ConfigError,
  NotFoundError,
  PermissionViolation,
  TimeoutError,
  classifyError,
  type CoordinationError
} from '../errors.js';
import type {
  AgentAction,
  AgentActionContext,
  AgentDescriptor,
  AgentHandler,
  AgentResult,
  IAuditLog,
  Session
} from '../interfaces/index.js';
import type { CoordinationHub } from '../services/coordination-hub.js';
import type { PermissionSandbox } from '../services/permission-sandbox.js';
import { StructuredLogger, logger as rootLogger } from '../services/structured-logger.js';
import { SandboxedFileAccess } from './sandboxed-files.js';

export const DEFAULT_TIMEOUT_SECONDS = 300;

export interface InvocationOptions {
  runId?: string;
  stepId?: string;
  attempt?: number;
  /** Context view handed to the action */
  context?: Readonly<Record<string, unknown>>;
  /** Overrides the descriptor's timeout */
  timeoutMs?: number;
  /**
   * Write-lock owner supplied by the caller, who then releases the locks.
   * Without one, locks are released when the invocation ends.
   */
  lockHolder?: string;
}

/**
 * ExecutionUnit - Invokes one agent action inside one sandbox session
 *
 * Agent domain logic is bound at runtime by agent name. An invocation never
 * throws: every failure comes back as an AgentResult with a classified error.
 */
export class ExecutionUnit {
  private handlers: Map<string, AgentHandler> = new Map();
  private defaultTimeoutSeconds: number;
  private logger: StructuredLogger;

  constructor(
    private sandbox: PermissionSandbox,
    private hub: CoordinationHub,
    private auditLog: IAuditLog,
    options: { defaultTimeoutSeconds?: number; logger?: StructuredLogger } = {}
  ) {
    this.defaultTimeoutSeconds = options.defaultTimeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS;
    this.logger = (options.logger ?? rootLogger).child({ component: 'execution-unit' });
  }

  /**
   * Bind an agent's domain logic to its registry name
   */
  bind(agentName: string, handler: AgentHandler, options: { replace?: boolean } = {}): void {
    if (this.handlers.has(agentName) && !options.replace) {
      throw new ConfigError(`A handler is already bound for agent '${agentName}'`);
    }
    this.handlers.set(agentName, handler);
  }

  hasHandler(agentName: string): boolean {
    return this.handlers.has(agentName);
  }

  boundAgents(): string[] {
    return Array.from(this.handlers.keys());
  }

  /**
   * Run one action. The caller owns the session and closes it afterwards;
   * a timeout closes it here as well.
   */
  async invoke(
    descriptor: AgentDescriptor,
    action: string,
    inputs: Record<string, unknown>,
    session: Session,
    options: InvocationOptions = {}
  ): Promise<AgentResult> {
    const startTime = Date.now();
    const log = this.logger.child({
      agent: descriptor.name,
      action,
      runId: options.runId,
      stepId: options.stepId
    });

    const fn = resolveAction(this.handlers.get(descriptor.name), action);
    if (!fn) {
      const error = this.handlers.has(descriptor.name)
        ? new NotFoundError(`Agent '${descriptor.name}' has no action '${action}'`)
        : new NotFoundError(`No handler bound for agent '${descriptor.name}'`);
      return this.finish(descriptor, action, options, failure(error, startTime, []));
    }

    const lockHolder = options.lockHolder ?? `${options.runId ?? 'direct'}:${options.stepId ?? session.token}`;
    const files = new SandboxedFileAccess(this.sandbox, this.hub, session, lockHolder);
    const controller = new AbortController();
    const timeoutMs = options.timeoutMs ?? (descriptor.timeoutSeconds ?? this.defaultTimeoutSeconds) * 1000;

    const ctx: AgentActionContext = {
      agent: descriptor,
      action,
      inputs: Object.freeze({ ...inputs }),
      context: options.context ?? Object.freeze({}),
      files,
      signal: controller.signal,
      logger: log,
      declareSideEffect: effect => files.record(effect)
    };

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new TimeoutError(`Agent '${descriptor.name}' timed out after ${timeoutMs}ms`, {
          details: { agent: descriptor.name, action, timeoutMs }
        }));
      }, timeoutMs);
    });

    const run = Promise.resolve().then(() => fn(ctx));
    let result: AgentResult;

    try {
      const payload = await Promise.race([run, timeout]);
      const violation = this.violationDuring(session);
      result = violation
        ? failure(violation, startTime, files.sideEffects())
        : {
            status: 'success',
            payload: ownedCopy(payload, descriptor.name),
            durationMs: Date.now() - startTime,
            sideEffects: files.sideEffects()
          };
    } catch (error) {
      const classified = this.violationDuring(session) ?? classifyError(error);

      if (classified instanceof TimeoutError) {
        controller.abort(classified);
        this.sandbox.closeSession(session);
        run.catch((late: unknown) => {
          log.debug('Action settled after timeout', { error: late instanceof Error ? late.message : String(late) });
        });
      } else {
        log.warn('Action failed', { errorKind: classified.kind, error: classified.message });
      }

      result = failure(classified, startTime, files.sideEffects());
    } finally {
      clearTimeout(timer);
      if (options.lockHolder === undefined) {
        this.hub.releaseLocks(lockHolder);
      }
    }

    return this.finish(descriptor, action, options, result);
  }

  private violationDuring(session: Session): PermissionViolation | undefined {
    const [violation] = this.sandbox.getViolations({ sessionToken: session.token });
    if (!violation) return undefined;
    return new PermissionViolation(
      `Agent '${session.agentName}' violated its permissions: ${violation.type} on '${violation.path}'`,
      { details: { ...violation } }
    );
  }

  private finish(
    descriptor: AgentDescriptor,
    action: string,
    options: InvocationOptions,
    result: AgentResult
  ): AgentResult {
    this.auditLog.append({
      actor: descriptor.name,
      action: 'agent.invoke',
      outcome: result.status === 'success' ? 'success' : 'failure',
      runId: options.runId,
      stepId: options.stepId,
      attempt: options.attempt,
      details: {
        action,
        durationMs: result.durationMs,
        sideEffects: result.sideEffects.length,
        errorKind: result.error?.kind
      }
    });
    return result;
  }
}

function resolveAction(handler: AgentHandler | undefined, action: string): AgentAction | undefined {
  if (!handler || !Object.hasOwn(handler.actions, action)) return undefined;
  return handler.actions[action];
}

/**
 * The result keeps its own copy so the handler may go on mutating what it returned
 */
function ownedCopy(payload: unknown, agent: string): unknown {
  try {
    return structuredClone(payload);
  } catch (error) {
    throw new AgentInternalError(`Agent '${agent}' returned a payload that cannot be copied`, { cause: error });
  }
}

function failure(error: CoordinationError, startTime: number, sideEffects: AgentResult['sideEffects']): AgentResult {
  return {
    status: 'failure',
    payload: null,
    durationMs: Date.now() - startTime,
    sideEffects,
    error: { kind: error.kind, message: error.message }
  };
}
