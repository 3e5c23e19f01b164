import path from 'path';
import { promises as fs } from 'fs';
import { v4 as uuidv4 } from 'uuid';
import lockfile from 'proper-lockfile';
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
  NotFoundError,
  InvalidTransitionError,
  StorageError,
} from '../types/index.js';
import {
  BaseStorageProvider,
  pageTasks,
  filterActivity,
  applyUpdateTransition,
  unexpectedStatusMessage,
  newTask,
  newUpdate,
} from './StorageProvider.js';
import {
  FlatRecord,
  encodeTask,
  decodeTask,
  encodeUpdate,
  decodeUpdate,
  encodeBackup,
  decodeBackup,
  encodeActivity,
  decodeActivity,
} from './records.js';
import * as transitions from './taskTransitions.js';
import {
  ensureDirectory,
  writeFileAtomic,
  writeFileExclusive,
  readFileSafe,
  fileExists,
  listFiles,
  removeFileSafe,
  isNodeError,
} from '../utils/fileUtils.js';
import { KeyedMutex } from '../utils/index.js';
import { logger } from '../utils/logger.js';

interface TaskCollection {
  nextSequence: number;
  tasks: FlatRecord[];
}

interface UpdateCollection {
  updates: FlatRecord[];
}

interface ActivityCounter {
  count: number;
  bytes: number;
}

type CollectionName = 'tasks' | 'updates' | 'activity';

const COLLECTION_FILES: Record<CollectionName, string> = {
  tasks: 'tasks.json',
  updates: 'updates.json',
  activity: 'activity.jsonl',
};

/**
 * File-based storage provider using JSON files with proper file locking.
 * Every mutation is a local transaction: in-process mutex, then a
 * proper-lockfile lock, then read-modify-write with an atomic rename.
 * Suitable for single-machine deployments and development.
 */
export class FileStorageProvider extends BaseStorageProvider {
  private dataDir: string;
  private lockTimeout: number;
  private memoryLocks = new KeyedMutex();

  constructor(dataDir: string = './data', lockTimeout: number = 30000) {
    super();
    this.dataDir = dataDir;
    this.lockTimeout = lockTimeout;
  }

  protected async doInitialize(): Promise<void> {
    await ensureDirectory(this.dataDir);
    await ensureDirectory(this.backupsDir());

    // proper-lockfile needs the target file to exist
    await this.createIfMissing('tasks', JSON.stringify({ nextSequence: 1, tasks: [] }));
    await this.createIfMissing('updates', JSON.stringify({ updates: [] }));
    await this.createIfMissing('activity', '');
  }

  protected async doClose(): Promise<void> {
    // No persistent connections to close for file storage
  }

  private collectionPath(name: CollectionName): string {
    return path.join(this.dataDir, COLLECTION_FILES[name]);
  }

  private backupsDir(): string {
    return path.join(this.dataDir, 'backups');
  }

  private backupPath(backupId: string): string {
    return path.join(this.backupsDir(), `${backupId}.json`);
  }

  private async createIfMissing(name: CollectionName, initial: string): Promise<void> {
    if (!(await fileExists(this.collectionPath(name)))) {
      await writeFileAtomic(this.collectionPath(name), initial);
    }
  }

  private async withCollectionLock<T>(name: CollectionName, operation: () => Promise<T>): Promise<T> {
    this.ensureInitialized();

    // FIRST: in-memory lock, so callers in this process queue instead of spinning on the file lock
    return this.memoryLocks.run(name, async () => {
      // SECOND: file lock, for other processes sharing the data directory
      const lockStart = Date.now();
      const release = await lockfile.lock(this.collectionPath(name), {
        retries: {
          retries: 50,
          minTimeout: 5,
          maxTimeout: 200,
          factor: 1.1,
        },
        stale: this.lockTimeout,
      });
      logger.trace('File lock acquired', {
        operation: 'withCollectionLock',
        collection: name,
        duration: Date.now() - lockStart,
      });

      try {
        return await operation();
      } finally {
        await release();
      }
    });
  }

  private async readTasks(): Promise<TaskCollection> {
    const content = await readFileSafe(this.collectionPath('tasks'));
    if (content === null) {
      throw new StorageError('Task collection is missing');
    }
    try {
      const collection: TaskCollection = JSON.parse(content);
      return collection;
    } catch (error) {
      throw new StorageError(`Failed to parse task collection: ${String(error)}`);
    }
  }

  private async readUpdates(): Promise<UpdateCollection> {
    const content = await readFileSafe(this.collectionPath('updates'));
    if (content === null) {
      throw new StorageError('Update collection is missing');
    }
    try {
      const collection: UpdateCollection = JSON.parse(content);
      return collection;
    } catch (error) {
      throw new StorageError(`Failed to parse update collection: ${String(error)}`);
    }
  }

  /**
   * Read-modify-write over the task collection. The mutator returns the
   * tasks it changed (written back in place) and the caller's result.
   */
  private async mutateTasks<T>(
    mutator: (tasks: Task[], collection: TaskCollection) => { changed: Task[]; result: T }
  ): Promise<T> {
    return this.withCollectionLock('tasks', async () => {
      const collection = await this.readTasks();
      const tasks = collection.tasks.map(decodeTask);
      const { changed, result } = mutator(tasks, collection);

      if (changed.length > 0) {
        const byId = new Map(changed.map(task => [task.id, task]));
        const merged = tasks.map(task => byId.get(task.id) ?? task);
        for (const task of changed) {
          if (!tasks.some(existing => existing.id === task.id)) {
            merged.push(task);
          }
        }
        collection.tasks = merged.map(encodeTask);
        await writeFileAtomic(this.collectionPath('tasks'), JSON.stringify(collection, null, 2));
      }
      return result;
    });
  }

  private mutateOneTask(taskId: string, change: (task: Task) => Task): Promise<Task> {
    return this.mutateTasks(tasks => {
      const task = tasks.find(candidate => candidate.id === taskId);
      if (!task) {
        throw new NotFoundError('Task', taskId);
      }
      const updated = change(task);
      return { changed: [updated], result: updated };
    });
  }

  // Task operations

  async createTask(input: TaskCreateInput, now: Date): Promise<Task> {
    return this.mutateTasks((_tasks, collection) => {
      const task = newTask(uuidv4(), collection.nextSequence, input, now);
      collection.nextSequence += 1;
      return { changed: [task], result: task };
    });
  }

  async getTask(taskId: string): Promise<Task | null> {
    this.ensureInitialized();
    const collection = await this.readTasks();
    const record = collection.tasks.find(candidate => candidate.id === taskId);
    return record ? decodeTask(record) : null;
  }

  async listTasks(filters?: TaskFilters): Promise<Task[]> {
    this.ensureInitialized();
    const collection = await this.readTasks();
    const tasks = collection.tasks.map(decodeTask).sort((a, b) => a.sequence - b.sequence);
    return pageTasks(tasks, filters);
  }

  async claimTask(workerId: string, leaseMs: number, now: Date): Promise<Task | null> {
    return this.mutateTasks<Task | null>(tasks => {
      const promoted = tasks
        .filter(task => transitions.isRetryDue(task, now))
        .map(task => transitions.promoteRetry(task, now));
      const promotedIds = new Set(promoted.map(task => task.id));

      const candidates = [
        ...tasks.filter(task => task.status === 'pending' && !promotedIds.has(task.id)),
        ...promoted,
      ].sort(transitions.compareClaimOrder);

      const next = candidates[0];
      if (!next) {
        return { changed: promoted, result: null };
      }

      const claimed = transitions.claim(next, workerId, leaseMs, now);
      logger.trace('Task claimed', { operation: 'claimTask', taskId: claimed.id, workerId });
      return {
        changed: [...promoted.filter(task => task.id !== claimed.id), claimed],
        result: claimed,
      };
    });
  }

  async startTask(taskId: string, workerId: string, now: Date): Promise<Task> {
    return this.mutateOneTask(taskId, task => transitions.start(task, workerId, now));
  }

  async completeTask(taskId: string, workerId: string, input: TaskCompleteInput, now: Date): Promise<Task> {
    return this.mutateOneTask(taskId, task => transitions.complete(task, workerId, input, now));
  }

  async failTask(taskId: string, workerId: string, input: TaskFailInput, now: Date): Promise<Task> {
    return this.mutateOneTask(taskId, task => transitions.fail(task, workerId, input, now));
  }

  async extendLease(taskId: string, workerId: string, extraMs: number, now: Date): Promise<Task> {
    return this.mutateOneTask(taskId, task => transitions.extendLease(task, workerId, extraMs, now));
  }

  async cancelTask(taskId: string, now: Date): Promise<Task> {
    return this.mutateOneTask(taskId, task => transitions.cancel(task, now));
  }

  async reapExpiredLeases(now: Date): Promise<ReapResult> {
    return this.mutateTasks(tasks => {
      const result: ReapResult = { requeued: [], failed: [], cancelled: [] };
      const changed: Task[] = [];

      for (const task of tasks.filter(candidate => transitions.isLeaseExpired(candidate, now))) {
        const { task: reaped, outcome } = transitions.reap(task, now);
        result[outcome].push(reaped);
        changed.push(reaped);
      }
      return { changed, result };
    });
  }

  // Update operations

  async createUpdate(input: UpdateCreateInput, now: Date): Promise<PendingUpdate> {
    return this.withCollectionLock('updates', async () => {
      const collection = await this.readUpdates();
      const update = newUpdate(uuidv4(), input, now);
      collection.updates.push(encodeUpdate(update));
      await writeFileAtomic(this.collectionPath('updates'), JSON.stringify(collection, null, 2));
      return update;
    });
  }

  async getUpdate(updateId: string): Promise<PendingUpdate | null> {
    this.ensureInitialized();
    const collection = await this.readUpdates();
    const record = collection.updates.find(candidate => candidate.id === updateId);
    return record ? decodeUpdate(record) : null;
  }

  async listUpdates(filters?: UpdateFilters): Promise<PendingUpdate[]> {
    this.ensureInitialized();
    const collection = await this.readUpdates();
    const updates = collection.updates.map(decodeUpdate);
    return filters?.status ? updates.filter(update => update.status === filters.status) : updates;
  }

  async transitionUpdate(
    updateId: string,
    expected: readonly UpdateStatus[],
    patch: UpdateTransition,
    now: Date
  ): Promise<PendingUpdate> {
    return this.withCollectionLock('updates', async () => {
      const collection = await this.readUpdates();
      const index = collection.updates.findIndex(candidate => candidate.id === updateId);
      const record = collection.updates[index];
      if (!record) {
        throw new NotFoundError('Update', updateId);
      }

      const current = decodeUpdate(record);
      if (!expected.includes(current.status)) {
        throw new InvalidTransitionError(unexpectedStatusMessage(updateId, current.status, expected));
      }

      const updated = applyUpdateTransition(current, patch, now);
      collection.updates[index] = encodeUpdate(updated);
      await writeFileAtomic(this.collectionPath('updates'), JSON.stringify(collection, null, 2));
      return updated;
    });
  }

  // Backup operations

  async saveBackup(backup: Backup): Promise<void> {
    this.ensureInitialized();
    try {
      await writeFileExclusive(this.backupPath(backup.id), encodeBackup(backup));
    } catch (error) {
      if (isNodeError(error) && error.code === 'EEXIST') {
        throw new StorageError(`Backup ${backup.id} already exists`);
      }
      throw error;
    }
  }

  async getBackup(backupId: string): Promise<Backup | null> {
    this.ensureInitialized();
    const content = await readFileSafe(this.backupPath(backupId));
    return content === null ? null : decodeBackup(content);
  }

  async listBackups(): Promise<Backup[]> {
    this.ensureInitialized();
    const files = await listFiles(this.backupsDir(), '.json');
    const backups: Backup[] = [];
    for (const file of files) {
      const content = await readFileSafe(file);
      if (content !== null) {
        backups.push(decodeBackup(content));
      }
    }
    return backups.sort((a, b) => a.takenAt.getTime() - b.takenAt.getTime());
  }

  async deleteBackup(backupId: string): Promise<void> {
    this.ensureInitialized();
    await removeFileSafe(this.backupPath(backupId));
  }

  // Activity log

  private async readActivityLines(): Promise<string[]> {
    const content = await readFileSafe(this.collectionPath('activity'));
    if (content === null) {
      return [];
    }
    return content.split('\n').filter(line => line.length > 0);
  }

  private activityCounterPath(): string {
    return path.join(this.dataDir, 'activity.count.json');
  }

  /**
   * Entries in the log, from the counter file when it matches the log's
   * size. Anything else (no counter yet, or a crash between the append and
   * the counter write) falls back to counting lines.
   */
  private async activityCount(): Promise<number> {
    const { size } = await fs.stat(this.collectionPath('activity'));
    const counterText = await readFileSafe(this.activityCounterPath());
    if (counterText !== null) {
      const counter: ActivityCounter = JSON.parse(counterText);
      if (counter.bytes === size) {
        return counter.count;
      }
    }
    return (await this.readActivityLines()).length;
  }

  async appendActivity(input: ActivityCreateInput, now: Date): Promise<ActivityEntry> {
    return this.withCollectionLock('activity', async () => {
      const sequence = (await this.activityCount()) + 1;
      const entry: ActivityEntry = { id: uuidv4(), sequence, timestamp: now, ...input };
      await fs.appendFile(this.collectionPath('activity'), encodeActivity(entry) + '\n', 'utf8');
      const { size } = await fs.stat(this.collectionPath('activity'));
      const counter: ActivityCounter = { count: sequence, bytes: size };
      await writeFileAtomic(this.activityCounterPath(), JSON.stringify(counter));
      return entry;
    });
  }

  async listActivity(filters?: ActivityFilters): Promise<ActivityEntry[]> {
    this.ensureInitialized();
    const lines = await this.readActivityLines();
    return filterActivity(lines.map((line, index) => decodeActivity(line, index + 1)), filters);
  }

  // Health and metrics

  async healthCheck(): Promise<HealthStatus> {
    try {
      await fs.access(this.dataDir);
      return { healthy: true };
    } catch (error) {
      return { healthy: false, message: `Data directory not accessible: ${String(error)}` };
    }
  }

  async getMetrics(): Promise<Record<string, number>> {
    this.ensureInitialized();
    const tasks = (await this.readTasks()).tasks.map(decodeTask);
    const updates = (await this.readUpdates()).updates.map(decodeUpdate);
    return {
      totalTasks: tasks.length,
      pendingTasks: tasks.filter(t => t.status === 'pending').length,
      claimedTasks: tasks.filter(t => t.status === 'claimed').length,
      runningTasks: tasks.filter(t => t.status === 'running').length,
      retryingTasks: tasks.filter(t => t.status === 'retrying').length,
      completedTasks: tasks.filter(t => t.status === 'completed').length,
      failedTasks: tasks.filter(t => t.status === 'failed').length,
      cancelledTasks: tasks.filter(t => t.status === 'cancelled').length,
      pendingUpdates: updates.filter(u => u.status === 'pending_approval').length,
    };
  }
}
