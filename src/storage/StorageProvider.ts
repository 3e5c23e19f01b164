import {
  Task,
  TaskCreateInput,
  TaskFilters,
  TaskCompleteInput,
  TaskFailInput,
  ReapResult,
  PendingUpdate,
  UpdateCreateInput,
  UpdateFilters,
  UpdateStatus,
  UpdateTransition,
  Backup,
  ActivityEntry,
  ActivityCreateInput,
  ActivityFilters,
  HealthStatus,
} from '../types/index.js';

/**
 * Storage provider interface for Warden.
 * Claim, ack, fail, reap and update transitions MUST be atomic in every
 * implementation: concurrent callers may never observe or produce a
 * half-applied state.
 */
export interface StorageProvider {
  // Lifecycle
  initialize(): Promise<void>;
  close(): Promise<void>;

  // Task operations
  createTask(input: TaskCreateInput, now: Date): Promise<Task>;
  getTask(taskId: string): Promise<Task | null>;
  listTasks(filters?: TaskFilters): Promise<Task[]>;

  // CRITICAL: lease-based claiming (atomic operations)
  claimTask(workerId: string, leaseMs: number, now: Date): Promise<Task | null>;
  startTask(taskId: string, workerId: string, now: Date): Promise<Task>;
  completeTask(taskId: string, workerId: string, input: TaskCompleteInput, now: Date): Promise<Task>;
  failTask(taskId: string, workerId: string, input: TaskFailInput, now: Date): Promise<Task>;
  extendLease(taskId: string, workerId: string, extraMs: number, now: Date): Promise<Task>;
  cancelTask(taskId: string, now: Date): Promise<Task>;
  reapExpiredLeases(now: Date): Promise<ReapResult>;

  // Self-update records
  createUpdate(input: UpdateCreateInput, now: Date): Promise<PendingUpdate>;
  getUpdate(updateId: string): Promise<PendingUpdate | null>;
  listUpdates(filters?: UpdateFilters): Promise<PendingUpdate[]>;
  transitionUpdate(
    updateId: string,
    expected: readonly UpdateStatus[],
    patch: UpdateTransition,
    now: Date
  ): Promise<PendingUpdate>;

  // Backups are insert-only
  saveBackup(backup: Backup): Promise<void>;
  getBackup(backupId: string): Promise<Backup | null>;
  listBackups(): Promise<Backup[]>;
  deleteBackup(backupId: string): Promise<void>;

  // Activity log is append-only
  appendActivity(input: ActivityCreateInput, now: Date): Promise<ActivityEntry>;
  listActivity(filters?: ActivityFilters): Promise<ActivityEntry[]>;

  // Health and metrics
  healthCheck(): Promise<HealthStatus>;
  getMetrics(): Promise<Record<string, number>>;
}

/**
 * Base class for storage providers with common functionality
 */
export abstract class BaseStorageProvider implements StorageProvider {
  protected initialized = false;

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }
    await this.doInitialize();
    this.initialized = true;
  }

  async close(): Promise<void> {
    if (!this.initialized) {
      return;
    }
    await this.doClose();
    this.initialized = false;
  }

  protected ensureInitialized(): void {
    if (!this.initialized) {
      throw new Error('Storage provider not initialized. Call initialize() first.');
    }
  }

  protected abstract doInitialize(): Promise<void>;
  protected abstract doClose(): Promise<void>;

  abstract createTask(input: TaskCreateInput, now: Date): Promise<Task>;
  abstract getTask(taskId: string): Promise<Task | null>;
  abstract listTasks(filters?: TaskFilters): Promise<Task[]>;

  abstract claimTask(workerId: string, leaseMs: number, now: Date): Promise<Task | null>;
  abstract startTask(taskId: string, workerId: string, now: Date): Promise<Task>;
  abstract completeTask(taskId: string, workerId: string, input: TaskCompleteInput, now: Date): Promise<Task>;
  abstract failTask(taskId: string, workerId: string, input: TaskFailInput, now: Date): Promise<Task>;
  abstract extendLease(taskId: string, workerId: string, extraMs: number, now: Date): Promise<Task>;
  abstract cancelTask(taskId: string, now: Date): Promise<Task>;
  abstract reapExpiredLeases(now: Date): Promise<ReapResult>;

  abstract createUpdate(input: UpdateCreateInput, now: Date): Promise<PendingUpdate>;
  abstract getUpdate(updateId: string): Promise<PendingUpdate | null>;
  abstract listUpdates(filters?: UpdateFilters): Promise<PendingUpdate[]>;
  abstract transitionUpdate(
    updateId: string,
    expected: readonly UpdateStatus[],
    patch: UpdateTransition,
    now: Date
  ): Promise<PendingUpdate>;

  abstract saveBackup(backup: Backup): Promise<void>;
  abstract getBackup(backupId: string): Promise<Backup | null>;
  abstract listBackups(): Promise<Backup[]>;
  abstract deleteBackup(backupId: string): Promise<void>;

  abstract appendActivity(input: ActivityCreateInput, now: Date): Promise<ActivityEntry>;
  abstract listActivity(filters?: ActivityFilters): Promise<ActivityEntry[]>;

  abstract healthCheck(): Promise<HealthStatus>;
  abstract getMetrics(): Promise<Record<string, number>>;
}

/**
 * Shared helpers for the listing semantics both backends follow.
 */
export function pageTasks(tasks: Task[], filters?: TaskFilters): Task[] {
  const filtered = filters?.status ? tasks.filter(task => task.status === filters.status) : tasks;
  const offset = filters?.offset ?? 0;
  const limit = filters?.limit;
  return limit === undefined ? filtered.slice(offset) : filtered.slice(offset, offset + limit);
}

/**
 * Entries come back in log order; a limit keeps the most recent ones.
 */
export function filterActivity(entries: ActivityEntry[], filters?: ActivityFilters): ActivityEntry[] {
  const matching = entries.filter(
    entry =>
      (!filters?.subjectId || entry.subjectId === filters.subjectId) &&
      (!filters?.kind || entry.kind === filters.kind)
  );
  const limit = filters?.limit;
  return limit === undefined ? matching : matching.slice(Math.max(0, matching.length - limit));
}

export function applyUpdateTransition(update: PendingUpdate, patch: UpdateTransition, now: Date): PendingUpdate {
  return {
    ...update,
    ...patch,
    backupRef: patch.backupRef ?? update.backupRef,
    updatedAt: now,
  };
}

export function unexpectedStatusMessage(updateId: string, actual: string, expected: readonly UpdateStatus[]): string {
  return `Update ${updateId} is ${actual}, expected ${expected.join(' or ')}`;
}

/**
 * Assembles a new update record from its create input.
 */
export function newUpdate(id: string, input: UpdateCreateInput, now: Date): PendingUpdate {
  return {
    id,
    ...input,
    status: 'pending_approval',
    createdAt: now,
    updatedAt: now,
  };
}

/**
 * Assembles a new task record from its create input.
 */
export function newTask(id: string, sequence: number, input: TaskCreateInput, now: Date): Task {
  return {
    id,
    sequence,
    type: input.type,
    priority: input.priority,
    payload: input.payload,
    status: 'pending',
    attemptCount: 0,
    maxAttempts: input.maxAttempts,
    cancelRequested: false,
    createdAt: now,
    updatedAt: now,
    result: null,
    error: null,
    verdicts: input.verdicts ?? {},
  };
}
