import { isAbsolute, relative, resolve, sep } from 'path';
import micromatch from 'micromatch';
import { v4 as uuidv4 } from 'uuid';
import { PermissionViolation, SessionExpired } from '../errors.js';
import type {
  AgentDescriptor,
  FileOperation,
  IAuditLog,
  PermissionDecision,
  Session
} from '../interfaces/index.js';
import { StructuredLogger, logger as rootLogger } from './structured-logger.js';

export type ViolationType =
  | 'operation_limit_exceeded'
  | 'path_traversal_attempt'
  | 'operation_not_permitted'
  | 'deny_rule_matched'
  | 'permission_denied';

export interface ViolationRecord {
  agent: string;
  type: ViolationType;
  operation: FileOperation;
  path: string;
  timestamp: string;
  sessionToken: string;
  runId?: string;
  stepId?: string;
  rule?: string;
}

export interface SessionScope {
  runId?: string;
  stepId?: string;
  attempt?: number;
}

export interface SandboxReport {
  activeSessions: number;
  totalViolations: number;
  violationsByType: Partial<Record<ViolationType, number>>;
  violationsByAgent: Record<string, number>;
}

interface SessionState {
  session: Session;
  scope: SessionScope;
  operationCount: number;
  filesAccessed: Set<string>;
  active: boolean;
}

const GLOB_OPTIONS = { dot: true };

/**
 * Permission Sandbox
 *
 * Issues sessions encoding an agent's permission manifest and checks every
 * file operation against it. Deny globs win over allow globs; anything not
 * explicitly allowed is denied. A denial revokes the session.
 */
export class PermissionSandbox {
  private sessions: Map<string, SessionState> = new Map();
  private violations: ViolationRecord[] = [];
  private projectRoot: string;
  private logger: StructuredLogger;

  constructor(
    private auditLog: IAuditLog,
    options: { projectRoot?: string; logger?: StructuredLogger } = {}
  ) {
    this.projectRoot = resolve(options.projectRoot ?? process.cwd());
    this.logger = (options.logger ?? rootLogger).child({ component: 'permission-sandbox' });
  }

  getProjectRoot(): string {
    return this.projectRoot;
  }

  /**
   * Open a session for one invocation of an agent
   */
  openSession(descriptor: AgentDescriptor, scope: SessionScope = {}): Session {
    const session: Session = Object.freeze({
      token: uuidv4(),
      agentName: descriptor.name,
      permissions: descriptor.permissions,
      maxOperations: descriptor.maxOperations,
      openedAt: new Date().toISOString()
    });

    this.sessions.set(session.token, {
      session,
      scope,
      operationCount: 0,
      filesAccessed: new Set(),
      active: true
    });

    this.auditLog.append({
      actor: descriptor.name,
      action: 'session.open',
      outcome: 'info',
      runId: scope.runId,
      stepId: scope.stepId,
      attempt: scope.attempt,
      details: { session: session.token }
    });

    return session;
  }

  /**
   * Check one operation. Returns the allow decision or throws.
   * @throws SessionExpired if the session is closed or revoked
   * @throws PermissionViolation on any denial
   */
  check(session: Session, operation: FileOperation, path: string): PermissionDecision {
    const state = this.sessions.get(session.token);

    if (!state || !state.active) {
      this.auditLog.append({
        actor: session.agentName,
        action: 'permission.check',
        outcome: 'deny',
        runId: state?.scope.runId,
        stepId: state?.scope.stepId,
        permission: { decision: 'deny', operation, path },
        details: { reason: 'session_expired' }
      });
      throw new SessionExpired(`Session for agent '${session.agentName}' is no longer active`, {
        details: { agent: session.agentName, operation, path }
      });
    }

    state.operationCount++;
    if (state.operationCount > session.maxOperations) {
      return this.deny(state, 'operation_limit_exceeded', operation, path,
        `exceeded max operations limit of ${session.maxOperations}`);
    }

    const relativePath = this.toProjectPath(path);
    if (relativePath === null) {
      return this.deny(state, 'path_traversal_attempt', operation, path,
        'path resolves outside the project root');
    }

    const { permissions } = session;
    if (!permissions.operations.includes(operation)) {
      return this.deny(state, 'operation_not_permitted', operation, relativePath,
        `operation '${operation}' is not granted`);
    }

    const denyRule = permissions.deny.find(pattern => micromatch.isMatch(relativePath, pattern, GLOB_OPTIONS));
    if (denyRule !== undefined) {
      return this.deny(state, 'deny_rule_matched', operation, relativePath,
        `path matches deny rule '${denyRule}'`, denyRule);
    }

    // execute is scoped by the read globs
    const allowPatterns = operation === 'write' ? permissions.allowWrite : permissions.allowRead;
    const allowRule = allowPatterns.find(pattern => micromatch.isMatch(relativePath, pattern, GLOB_OPTIONS));
    if (allowRule === undefined) {
      return this.deny(state, 'permission_denied', operation, relativePath,
        `no ${operation} permission for this path`);
    }

    state.filesAccessed.add(relativePath);
    const decision: PermissionDecision = { decision: 'allow', operation, path: relativePath, rule: allowRule };
    this.auditLog.append({
      actor: session.agentName,
      action: 'permission.check',
      outcome: 'allow',
      runId: state.scope.runId,
      stepId: state.scope.stepId,
      attempt: state.scope.attempt,
      permission: decision
    });
    return decision;
  }

  /**
   * Close a session. Idempotent.
   */
  closeSession(session: Session): void {
    const state = this.sessions.get(session.token);
    if (!state) return;

    const wasActive = state.active;
    state.active = false;
    this.sessions.delete(session.token);

    this.auditLog.append({
      actor: session.agentName,
      action: 'session.close',
      outcome: 'info',
      runId: state.scope.runId,
      stepId: state.scope.stepId,
      attempt: state.scope.attempt,
      details: {
        session: session.token,
        revoked: !wasActive,
        operations: state.operationCount,
        filesAccessed: state.filesAccessed.size
      }
    });
  }

  isActive(session: Session): boolean {
    return this.sessions.get(session.token)?.active === true;
  }

  getViolations(filter: { agent?: string; sessionToken?: string; runId?: string } = {}): ViolationRecord[] {
    return this.violations.filter(v =>
      (filter.agent === undefined || v.agent === filter.agent) &&
      (filter.sessionToken === undefined || v.sessionToken === filter.sessionToken) &&
      (filter.runId === undefined || v.runId === filter.runId)
    );
  }

  getReport(): SandboxReport {
    const violationsByType: Partial<Record<ViolationType, number>> = {};
    const violationsByAgent: Record<string, number> = {};
    for (const v of this.violations) {
      violationsByType[v.type] = (violationsByType[v.type] ?? 0) + 1;
      violationsByAgent[v.agent] = (violationsByAgent[v.agent] ?? 0) + 1;
    }

    let activeSessions = 0;
    for (const state of this.sessions.values()) {
      if (state.active) activeSessions++;
    }

    return {
      activeSessions,
      totalViolations: this.violations.length,
      violationsByType,
      violationsByAgent
    };
  }

  /**
   * Resolve a path against the project root; null if it escapes the root
   */
  toProjectPath(path: string): string | null {
    const full = resolve(this.projectRoot, path);
    const rel = relative(this.projectRoot, full);
    if (rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
      return null;
    }
    return rel === '' ? '.' : rel.split(sep).join('/');
  }

  private deny(
    state: SessionState,
    type: ViolationType,
    operation: FileOperation,
    path: string,
    reason: string,
    rule?: string
  ): never {
    const { session, scope } = state;
    state.active = false;

    const violation: ViolationRecord = {
      agent: session.agentName,
      type,
      operation,
      path,
      timestamp: new Date().toISOString(),
      sessionToken: session.token,
      runId: scope.runId,
      stepId: scope.stepId,
      rule
    };
    this.violations.push(violation);

    this.auditLog.append({
      actor: session.agentName,
      action: 'permission.check',
      outcome: 'deny',
      runId: scope.runId,
      stepId: scope.stepId,
      attempt: scope.attempt,
      permission: { decision: 'deny', operation, path, rule },
      details: { violation: type, reason }
    });
    this.logger.warn('Permission denied', {
      agent: session.agentName,
      operation,
      path,
      violation: type,
      runId: scope.runId,
      stepId: scope.stepId
    });

    throw new PermissionViolation(`Agent '${session.agentName}' denied ${operation} on '${path}': ${reason}`, {
      details: { agent: session.agentName, operation, path, violation: type }
    });
  }
}
