/**
 * Error taxonomy for the coordination core.
 *
 * Every failure that crosses a component boundary is one of these kinds.
 * Step-level errors are contained by the Workflow Engine; only ConfigError
 * prevents a run from starting.
 */

export type ErrorKind =
  | 'ConfigError'
  | 'NotFoundError'
  | 'PermissionViolation'
  | 'SessionExpired'
  | 'ResourceConflict'
  | 'Timeout'
  | 'AgentInternalError';

export interface CoordinationErrorOptions {
  cause?: unknown;
  details?: Record<string, unknown>;
}

export abstract class CoordinationError extends Error {
  abstract readonly kind: ErrorKind;
  readonly details: Record<string, unknown>;

  constructor(message: string, options: CoordinationErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.details = options.details ?? {};
  }

  /**
   * Whether a step that failed with this error may be re-invoked
   */
  get retryable(): boolean {
    return isRetryableKind(this.kind);
  }
}

export class ConfigError extends CoordinationError {
  readonly kind = 'ConfigError' as const;
  readonly problems: string[];

  constructor(message: string, problems: string[] = [], options?: CoordinationErrorOptions) {
    super(problems.length > 0 ? `${message}: ${problems.join('; ')}` : message, options);
    this.problems = problems;
  }
}

export class NotFoundError extends CoordinationError {
  readonly kind = 'NotFoundError' as const;
}

export class PermissionViolation extends CoordinationError {
  readonly kind = 'PermissionViolation' as const;
}

export class SessionExpired extends CoordinationError {
  readonly kind = 'SessionExpired' as const;
}

export class ResourceConflict extends CoordinationError {
  readonly kind = 'ResourceConflict' as const;
}

export class TimeoutError extends CoordinationError {
  readonly kind = 'Timeout' as const;
}

export class AgentInternalError extends CoordinationError {
  readonly kind = 'AgentInternalError' as const;
}

// PermissionViolation and ResourceConflict are deterministic; a fresh
// attempt would fail the same way.
const RETRYABLE_KINDS: ReadonlySet<ErrorKind> = new Set<ErrorKind>([
  'Timeout',
  'AgentInternalError',
  'SessionExpired'
]);

export function isRetryableKind(kind: ErrorKind): boolean {
  return RETRYABLE_KINDS.has(kind);
}

export function isCoordinationError(error: unknown): error is CoordinationError {
  return error instanceof CoordinationError;
}

/**
 * Map anything thrown by an agent action onto the taxonomy
 */
export function classifyError(error: unknown): CoordinationError {
  if (isCoordinationError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return new AgentInternalError(message, { cause: error });
}
