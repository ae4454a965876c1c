/**
 * Core interfaces for the agent workflow coordinator
 * These interfaces define the contracts between system components
 */

import type { ErrorKind } from '../errors.js';
import type { StructuredLogger } from '../services/structured-logger.js';

// =============================================================================
// Agents
// =============================================================================

export type PriorityTier = 'high' | 'normal' | 'low';

/** Lower rank is scheduled first */
export const PRIORITY_RANK: Readonly<Record<PriorityTier, number>> = {
  high: 0,
  normal: 1,
  low: 2
};

export type AgentLifecycleStatus = 'active' | 'inactive' | 'deprecated';

export type FileOperation = 'read' | 'write' | 'execute';

export interface PermissionManifest {
  allowRead: readonly string[];
  allowWrite: readonly string[];
  deny: readonly string[];
  /** Operation verbs the agent may perform at all */
  operations: readonly string[];
}

/**
 * Agent configuration manifest as written on disk (YAML or JSON)
 */
export interface AgentManifest {
  name: string;
  capabilities: string[];
  priority?: PriorityTier;
  permissions: {
    allow_read?: string[];
    allow_write?: string[];
    deny?: string[];
    operations?: string[];
  };
  timeout_seconds?: number;
  version?: string;
  description?: string;
  status?: AgentLifecycleStatus;
  max_operations?: number;
  compatible_agents?: string[];
}

export interface AgentDescriptor {
  readonly name: string;
  readonly capabilities: readonly string[];
  readonly priority: PriorityTier;
  readonly permissions: Readonly<PermissionManifest>;
  readonly timeoutSeconds?: number;
  readonly version: string;
  readonly description?: string;
  readonly status: AgentLifecycleStatus;
  readonly maxOperations: number;
  readonly compatibleAgents: readonly string[];
  readonly registeredAt: string;
}

export type AgentHealth = 'available' | 'degraded' | 'unavailable' | 'unknown';

export interface AgentStatusReport {
  name: string;
  status: AgentLifecycleStatus;
  health: AgentHealth;
  handlerBound: boolean;
  lastRunAt: string | null;
  lastOutcome: 'success' | 'failure' | null;
  successCount: number;
  failureCount: number;
  consecutiveFailures: number;
}

export interface AgentSummary {
  name: string;
  capabilities: string[];
  priority: PriorityTier;
}

// =============================================================================
// Sessions & results
// =============================================================================

export interface Session {
  readonly token: string;
  readonly agentName: string;
  readonly permissions: Readonly<PermissionManifest>;
  readonly maxOperations: number;
  readonly openedAt: string;
}

export interface PermissionDecision {
  decision: 'allow' | 'deny';
  operation: FileOperation;
  /** Path relative to the project root, forward slashes */
  path: string;
  rule?: string;
}

export interface SideEffect {
  operation: FileOperation;
  path: string;
}

export type AgentResultStatus = 'success' | 'failure' | 'skipped';

export interface AgentResult {
  status: AgentResultStatus;
  payload: unknown;
  durationMs: number;
  sideEffects: SideEffect[];
  error?: {
    kind: ErrorKind;
    message: string;
  };
}

/**
 * File access handed to an agent action. Every call goes through the
 * Permission Sandbox with the invocation's session.
 */
export interface SandboxedFiles {
  readFile(path: string): Promise<string>;
  writeFile(path: string, content: string): Promise<void>;
  exists(path: string): Promise<boolean>;
  list(dir: string): Promise<string[]>;
  authorizeExecute(path: string): void;
}

export interface AgentActionContext {
  readonly agent: AgentDescriptor;
  readonly action: string;
  readonly inputs: Readonly<Record<string, unknown>>;
  /** Context as of the start of the step's wave */
  readonly context: Readonly<Record<string, unknown>>;
  readonly files: SandboxedFiles;
  readonly signal: AbortSignal;
  readonly logger: StructuredLogger;
  declareSideEffect(effect: SideEffect): void;
}

export type AgentAction = (ctx: AgentActionContext) => Promise<unknown>;

/**
 * Domain logic of one agent, bound to its registry name
 */
export interface AgentHandler {
  readonly actions: Readonly<Record<string, AgentAction>>;
}

// =============================================================================
// Workflows
// =============================================================================

export interface RetryPolicy {
  count: number;
  backoffSeconds: number;
}

/**
 * Workflow definition as written on disk (YAML or JSON)
 */
export interface WorkflowDocument {
  name: string;
  version?: string;
  description?: string;
  context?: Record<string, unknown>;
  execution?: {
    max_concurrent?: number;
  };
  steps: Array<{
    id: string;
    agent: string;
    action: string;
    inputs?: Record<string, unknown>;
    depends_on?: string[];
    guard?: string;
    output_key?: string;
    required?: boolean;
    retry?: { count: number; backoff_seconds?: number };
    input_from?: string[];
    writes?: string[];
  }>;
}

export interface WorkflowStep {
  id: string;
  agent: string;
  action: string;
  inputs: Record<string, unknown>;
  dependsOn: string[];
  guard?: string;
  outputKey: string;
  required: boolean;
  retry?: RetryPolicy;
  /** Upstream steps whose outputs this step cannot run without */
  inputFrom: string[];
  /** Declared write targets; defaults to the agent's allowWrite globs */
  writes?: string[];
}

export interface WorkflowDefinition {
  name: string;
  version: string;
  description?: string;
  context: Record<string, unknown>;
  execution: {
    maxConcurrent?: number;
  };
  steps: WorkflowStep[];
}

export type WorkflowState = 'pending' | 'planning' | 'running' | 'completed' | 'failed' | 'cancelled';

export type StepState =
  | 'pending'
  | 'running'
  | 'completed'
  | 'failed'
  | 'skipped'
  | 'skipped_with_warning'
  | 'cancelled';

export interface StepOutcome {
  stepId: string;
  agent: string;
  action: string;
  state: StepState;
  reason: string;
  errorKind?: ErrorKind;
  attempts: number;
  wave: number | null;
  result?: AgentResult;
  startedAt?: string;
  completedAt?: string;
}

export interface WorkflowResult {
  runId: string;
  workflowName: string;
  workflowVersion: string;
  state: 'completed' | 'failed' | 'cancelled';
  steps: StepOutcome[];
  waves: string[][];
  context: Record<string, unknown>;
  failedStep?: string;
  startedAt: string;
  completedAt: string;
  durationMs: number;
}

// =============================================================================
// Audit
// =============================================================================

export type AuditOutcome = 'success' | 'failure' | 'allow' | 'deny' | 'skipped' | 'info';

export interface AuditEntry {
  id: string;
  timestamp: string;
  /** Agent name, or 'coordinator' for engine/hub decisions */
  actor: string;
  action: string;
  outcome: AuditOutcome;
  runId?: string;
  stepId?: string;
  attempt?: number;
  permission?: PermissionDecision;
  details?: Record<string, unknown>;
}

export type AuditRecord = Omit<AuditEntry, 'id' | 'timestamp'>;

export interface AuditQuery {
  actor?: string;
  action?: string;
  outcome?: AuditOutcome;
  runId?: string;
  stepId?: string;
  offset?: number;
  limit?: number;
}

/**
 * Append-only audit trail. Entries are never updated or removed.
 */
export interface IAuditLog {
  append(record: AuditRecord): AuditEntry;
  query(query: AuditQuery): AuditEntry[];
  getAll(): AuditEntry[];
  count(): number;
}

export const COORDINATOR_ACTOR = 'coordinator';
