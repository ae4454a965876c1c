export * from './errors.js';
export * from './interfaces/index.js';
export { Coordinator, type CoordinatorOptions, type ExecutionHistoryEntry, type StartReport } from './coordinator.js';
export { AgentRegistry, type RegisterOptions, type LoadDirectoryResult } from './services/agent-registry.js';
export { PermissionSandbox, type ViolationRecord, type ViolationType, type SandboxReport, type SessionScope } from './services/permission-sandbox.js';
export {
  CoordinationHub,
  ExecutionContext,
  targetsOverlap,
  type WriteRequest,
  type ConflictResolution,
  type WaveConflictResult,
  type CoordinationHubEvents
} from './services/coordination-hub.js';
export { InMemoryAuditLog } from './services/audit-log.js';
export { JsonLinesAuditLog } from './services/jsonl-audit-log.js';
export { SQLiteAuditLog } from './services/sqlite-audit-log.js';
export { SchemaValidatorService } from './services/schema-validator.js';
export { StructuredLogger, logger, parseLogLevel, type LogLevel, type LogEntry, type LoggerConfig } from './services/structured-logger.js';
export { ExecutionUnit, DEFAULT_TIMEOUT_SECONDS, type InvocationOptions } from './agents/execution-unit.js';
export { SandboxedFileAccess } from './agents/sandboxed-files.js';
export { WorkflowEngine, DEFAULT_MAX_CONCURRENT, type RunOptions, type WorkflowEngineEvents } from './workflow/workflow-engine.js';
export { planWorkflow, bindInputs, type WorkflowPlan, type PlannedStep } from './workflow/workflow-planner.js';
export { compileGuard, parseGuard, evaluateGuard, type GuardNode, type CompiledGuard } from './workflow/guard-expression.js';
export { WorkflowLibrary, normalizeWorkflow, compareVersions, type WorkflowSummary } from './workflow/workflow-library.js';
export { resolveCoordinatorConfigFromEnv, createAuditLog, type CoordinatorConfig, type AuditBackend } from './utils/config.js';
export { loadEnvFromFile } from './utils/env.js';
