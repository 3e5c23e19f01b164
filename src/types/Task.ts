import type { GuardrailVerdict, GuardrailViolation } from './Guardrail.js';

/**
 * Closed set of task types. Adding a type is a code change: the allowlist
 * rule, the Joi schema and the prompt strategies all key off this list.
 */
export const TASK_TYPES = [
  'write_tests',
  'translate_code',
  'debug_error',
  'format_code',
  'generate_docs',
  'refactor_function',
  'general',
] as const;

export type TaskType = typeof TASK_TYPES[number];

export function isTaskType(value: unknown): value is TaskType {
  return TASK_TYPES.some(type => type === value);
}

// Lowest first; the index doubles as the priority rank.
export const TASK_PRIORITIES = ['low', 'normal', 'high', 'urgent'] as const;

export type TaskPriority = typeof TASK_PRIORITIES[number];

export function priorityRank(priority: TaskPriority): number {
  return TASK_PRIORITIES.indexOf(priority);
}

export type TaskStatus =
  | 'pending'
  | 'claimed'
  | 'running'
  | 'completed'
  | 'failed'
  | 'retrying'
  | 'cancelled';

export const TERMINAL_STATUSES: readonly TaskStatus[] = ['completed', 'failed', 'cancelled'];

export type TargetScope = 'workspace' | 'agent';

export interface TaskTarget {
  scope: TargetScope;
  path: string;  // Relative to the scope root
}

export interface TaskPayload {
  description: string;
  code?: string;
  language?: string;
  filePath?: string;  // Input file, relative to the workspace root
  target?: TaskTarget;  // Where the generated output goes, if anywhere
}

export type TaskErrorKind =
  | 'SecurityViolation'
  | 'ExternalServiceError'
  | 'StorageError'
  | 'LeaseExpired'
  | 'StaleUpdate'
  | 'InternalError';

export interface TaskError {
  kind: TaskErrorKind;
  message: string;
  rule?: string;  // Triggering guardrail rule, for violations
  violations?: GuardrailViolation[];
  blockedOutput?: string;  // Generated text the post-check refused
}

export interface TaskResult {
  output: string;
  writtenTo?: string;
  updateId?: string;
  updateStatus?: string;
  durationMs?: number;
}

export interface TaskVerdicts {
  pre?: GuardrailVerdict;
  post?: GuardrailVerdict;
}

export interface Task {
  id: string;
  sequence: number;  // Submission order, FIFO tie-break within a priority
  type: TaskType;
  priority: TaskPriority;
  payload: TaskPayload;
  status: TaskStatus;
  attemptCount: number;
  maxAttempts: number;
  claimedBy?: string;  // Worker holding the lease
  cancelRequested: boolean;
  createdAt: Date;
  updatedAt: Date;
  claimedAt?: Date;
  leaseExpiresAt?: Date;
  retryAt?: Date;  // Earliest time a retrying task becomes claimable again
  completedAt?: Date;
  result: TaskResult | null;
  error: TaskError | null;
  verdicts: TaskVerdicts;
}

export interface TaskCreateInput {
  type: TaskType;
  priority: TaskPriority;
  payload: TaskPayload;
  maxAttempts: number;
  verdicts?: TaskVerdicts;
}

export interface SubmitOptions {
  maxAttempts?: number;
}

export interface TaskFilters {
  status?: TaskStatus;
  limit?: number;
  offset?: number;
}

export interface RetryBackoff {
  baseDelayMs: number;
  maxDelayMs: number;
}

/**
 * Delay before attempt `attemptCount + 1`, doubling per consumed attempt.
 * Storage providers must compute the same value (the Redis Lua scripts
 * mirror this formula).
 */
export function retryDelayMs(attemptCount: number, backoff: RetryBackoff): number {
  const exponent = Math.max(0, attemptCount - 1);
  return Math.min(backoff.maxDelayMs, backoff.baseDelayMs * Math.pow(2, exponent));
}

export interface TaskFailInput {
  error: TaskError;
  canRetry: boolean;
  backoff: RetryBackoff;
  verdicts?: TaskVerdicts;
}

export interface TaskCompleteInput {
  result: TaskResult;
  verdicts?: TaskVerdicts;
}

export interface ReapResult {
  requeued: Task[];
  failed: Task[];
  cancelled: Task[];
}
