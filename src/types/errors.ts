import type { GuardrailVerdict } from './Guardrail.js';
import type { TaskError, TaskErrorKind } from './Task.js';

export type WardenErrorCode =
  | 'INVALID_TASK_TYPE'
  | 'NOT_CLAIMED'
  | 'SECURITY_VIOLATION'
  | 'INVALID_TRANSITION'
  | 'EXTERNAL_SERVICE_ERROR'
  | 'STORAGE_ERROR'
  | 'STALE_UPDATE'
  | 'NOT_FOUND';

/**
 * Base class for every error the core raises on purpose.
 */
export class WardenError extends Error {
  constructor(
    message: string,
    public readonly code: WardenErrorCode
  ) {
    super(message);
    this.name = 'WardenError';
  }
}

export class InvalidTaskTypeError extends WardenError {
  constructor(public readonly taskType: string) {
    super(`Invalid task type: ${taskType}`, 'INVALID_TASK_TYPE');
    this.name = 'InvalidTaskTypeError';
  }
}

export class NotClaimedError extends WardenError {
  constructor(
    public readonly taskId: string,
    public readonly workerId: string,
    reason?: string
  ) {
    super(
      `Task ${taskId} is not claimed by worker ${workerId}${reason ? `: ${reason}` : ''}`,
      'NOT_CLAIMED'
    );
    this.name = 'NotClaimedError';
  }
}

export class SecurityViolationError extends WardenError {
  constructor(
    message: string,
    public readonly verdict: GuardrailVerdict
  ) {
    super(message, 'SECURITY_VIOLATION');
    this.name = 'SecurityViolationError';
  }

  /**
   * First blocking rule, the one reported to operators.
   */
  get rule(): string | undefined {
    return this.verdict.violations.find(v => v.severity === 'block')?.ruleName;
  }
}

export class InvalidTransitionError extends WardenError {
  constructor(message: string) {
    super(message, 'INVALID_TRANSITION');
    this.name = 'InvalidTransitionError';
  }
}

export class ExternalServiceError extends WardenError {
  constructor(
    message: string,
    public readonly timedOut: boolean = false
  ) {
    super(message, 'EXTERNAL_SERVICE_ERROR');
    this.name = 'ExternalServiceError';
  }
}

export class StorageError extends WardenError {
  constructor(message: string) {
    super(message, 'STORAGE_ERROR');
    this.name = 'StorageError';
  }
}

export class StaleUpdateError extends WardenError {
  constructor(
    public readonly updateId: string,
    public readonly targetPath: string
  ) {
    super(`Target ${targetPath} has been modified since update ${updateId} was proposed`, 'STALE_UPDATE');
    this.name = 'StaleUpdateError';
  }
}

export class NotFoundError extends WardenError {
  constructor(entity: string, id: string) {
    super(`${entity} ${id} not found`, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export function isWardenError(error: unknown): error is WardenError {
  return error instanceof WardenError;
}

const RETRYABLE_KINDS: readonly TaskErrorKind[] = ['ExternalServiceError', 'StorageError', 'LeaseExpired'];

/**
 * Blocked tasks are deterministic failures and never retried; transport
 * and storage failures are.
 */
export function isRetryable(kind: TaskErrorKind): boolean {
  return RETRYABLE_KINDS.includes(kind);
}

/**
 * Map any thrown value onto the record persisted with a failed task.
 */
export function toTaskError(error: unknown): TaskError {
  if (error instanceof SecurityViolationError) {
    return {
      kind: 'SecurityViolation',
      message: error.message,
      rule: error.rule,
      violations: error.verdict.violations.filter(v => v.severity === 'block'),
    };
  }
  if (error instanceof ExternalServiceError) {
    return { kind: 'ExternalServiceError', message: error.message };
  }
  if (error instanceof StorageError) {
    return { kind: 'StorageError', message: error.message };
  }
  if (error instanceof StaleUpdateError) {
    return { kind: 'StaleUpdate', message: error.message };
  }
  if (error instanceof Error) {
    return { kind: 'InternalError', message: error.message };
  }
  return { kind: 'InternalError', message: String(error) };
}
