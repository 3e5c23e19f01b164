import {
  Task,
  TaskPayload,
  TaskResult,
  TaskError,
  TaskVerdicts,
  TASK_TYPES,
  TASK_PRIORITIES,
  TaskStatus,
  PendingUpdate,
  UpdateStatus,
  UpdateTransition,
  GuardrailVerdict,
  Backup,
  ActivityEntry,
  ACTIVITY_KINDS,
  StorageError,
} from '../types/index.js';

/**
 * Flat string records shared by both backends. Scalars are stored as plain
 * strings, dates as epoch milliseconds, and nested values as JSON, so a Lua
 * script can read and patch the fields it needs without decoding anything.
 */
export type FlatRecord = Record<string, string>;

const TASK_STATUSES: readonly TaskStatus[] = [
  'pending', 'claimed', 'running', 'completed', 'failed', 'retrying', 'cancelled',
];

const UPDATE_STATUSES: readonly UpdateStatus[] = [
  'pending_approval', 'approved', 'rejected', 'applied', 'rolled_back',
];

interface StoredVerdict {
  allowed: boolean;
  violations: GuardrailVerdict['violations'];
  evaluatedAt: string;
}

interface StoredVerdicts {
  pre?: StoredVerdict;
  post?: StoredVerdict;
}

interface StoredBackup extends Omit<Backup, 'takenAt'> {
  takenAt: string;
}

interface StoredActivity extends Omit<ActivityEntry, 'timestamp' | 'sequence' | 'kind'> {
  kind: string;
  timestamp: string;
}

function oneOf<T extends string>(allowed: readonly T[], value: string | undefined, field: string): T {
  const match = allowed.find(candidate => candidate === value);
  if (match === undefined) {
    throw new StorageError(`Corrupt record: unexpected ${field} "${value ?? ''}"`);
  }
  return match;
}

function required(record: FlatRecord, field: string): string {
  const value = record[field];
  if (value === undefined) {
    throw new StorageError(`Corrupt record: missing ${field}`);
  }
  return value;
}

function int(record: FlatRecord, field: string): number {
  const value = Number(required(record, field));
  if (!Number.isFinite(value)) {
    throw new StorageError(`Corrupt record: ${field} is not a number`);
  }
  return value;
}

export function encodeDate(date: Date | undefined): string {
  return date ? String(date.getTime()) : '';
}

export function decodeDate(value: string | undefined): Date | undefined {
  return value ? new Date(Number(value)) : undefined;
}

function requiredDate(record: FlatRecord, field: string): Date {
  const date = decodeDate(record[field]);
  if (!date) {
    throw new StorageError(`Corrupt record: missing ${field}`);
  }
  return date;
}

function optionalString(value: string | undefined): string | undefined {
  return value ? value : undefined;
}

function encodeVerdict(verdict: GuardrailVerdict): StoredVerdict {
  return {
    allowed: verdict.allowed,
    violations: verdict.violations,
    evaluatedAt: verdict.evaluatedAt.toISOString(),
  };
}

function decodeVerdict(stored: StoredVerdict): GuardrailVerdict {
  return {
    allowed: stored.allowed,
    violations: stored.violations,
    evaluatedAt: new Date(stored.evaluatedAt),
  };
}

export function encodeVerdicts(verdicts: TaskVerdicts): string {
  const stored: StoredVerdicts = {};
  if (verdicts.pre) stored.pre = encodeVerdict(verdicts.pre);
  if (verdicts.post) stored.post = encodeVerdict(verdicts.post);
  return JSON.stringify(stored);
}

function decodeVerdicts(value: string | undefined): TaskVerdicts {
  if (!value) return {};
  const stored: StoredVerdicts = JSON.parse(value);
  const verdicts: TaskVerdicts = {};
  if (stored.pre) verdicts.pre = decodeVerdict(stored.pre);
  if (stored.post) verdicts.post = decodeVerdict(stored.post);
  return verdicts;
}

export function encodeTaskError(error: TaskError): string {
  return JSON.stringify(error);
}

export function encodeTaskResult(result: TaskResult): string {
  return JSON.stringify(result);
}

export function encodeTask(task: Task): FlatRecord {
  return {
    id: task.id,
    sequence: String(task.sequence),
    type: task.type,
    priority: task.priority,
    payload: JSON.stringify(task.payload),
    status: task.status,
    attemptCount: String(task.attemptCount),
    maxAttempts: String(task.maxAttempts),
    claimedBy: task.claimedBy ?? '',
    cancelRequested: task.cancelRequested ? '1' : '0',
    createdAt: encodeDate(task.createdAt),
    updatedAt: encodeDate(task.updatedAt),
    claimedAt: encodeDate(task.claimedAt),
    leaseExpiresAt: encodeDate(task.leaseExpiresAt),
    retryAt: encodeDate(task.retryAt),
    completedAt: encodeDate(task.completedAt),
    result: task.result ? encodeTaskResult(task.result) : '',
    error: task.error ? encodeTaskError(task.error) : '',
    verdicts: encodeVerdicts(task.verdicts),
  };
}

export function decodeTask(record: FlatRecord): Task {
  const payload: TaskPayload = JSON.parse(required(record, 'payload'));
  const resultText = record.result;
  const errorText = record.error;
  const result: TaskResult | null = resultText ? JSON.parse(resultText) : null;
  const error: TaskError | null = errorText ? JSON.parse(errorText) : null;

  return {
    id: required(record, 'id'),
    sequence: int(record, 'sequence'),
    type: oneOf(TASK_TYPES, record.type, 'type'),
    priority: oneOf(TASK_PRIORITIES, record.priority, 'priority'),
    payload,
    status: oneOf(TASK_STATUSES, record.status, 'status'),
    attemptCount: int(record, 'attemptCount'),
    maxAttempts: int(record, 'maxAttempts'),
    claimedBy: optionalString(record.claimedBy),
    cancelRequested: record.cancelRequested === '1',
    createdAt: requiredDate(record, 'createdAt'),
    updatedAt: requiredDate(record, 'updatedAt'),
    claimedAt: decodeDate(record.claimedAt),
    leaseExpiresAt: decodeDate(record.leaseExpiresAt),
    retryAt: decodeDate(record.retryAt),
    completedAt: decodeDate(record.completedAt),
    result,
    error,
    verdicts: decodeVerdicts(record.verdicts),
  };
}

export function encodeUpdate(update: PendingUpdate): FlatRecord {
  return {
    id: update.id,
    targetPath: update.targetPath,
    proposedContent: update.proposedContent,
    proposedHash: update.proposedHash,
    baseHash: update.baseHash,
    reason: update.reason,
    protected: update.protected ? '1' : '0',
    status: update.status,
    verdict: JSON.stringify(encodeVerdict(update.verdict)),
    backupRef: update.backupRef ?? '',
    createdAt: encodeDate(update.createdAt),
    updatedAt: encodeDate(update.updatedAt),
    decidedAt: encodeDate(update.decidedAt),
    decidedBy: update.decidedBy ?? '',
    decisionNote: update.decisionNote ?? '',
    appliedAt: encodeDate(update.appliedAt),
    rolledBackAt: encodeDate(update.rolledBackAt),
  };
}

/**
 * Only the fields a transition sets, plus updatedAt.
 */
export function encodeUpdateTransition(patch: UpdateTransition, now: Date): FlatRecord {
  const fields: FlatRecord = { status: patch.status, updatedAt: encodeDate(now) };
  if (patch.backupRef !== undefined) fields.backupRef = patch.backupRef;
  if (patch.decidedAt !== undefined) fields.decidedAt = encodeDate(patch.decidedAt);
  if (patch.decidedBy !== undefined) fields.decidedBy = patch.decidedBy;
  if (patch.decisionNote !== undefined) fields.decisionNote = patch.decisionNote;
  if (patch.appliedAt !== undefined) fields.appliedAt = encodeDate(patch.appliedAt);
  if (patch.rolledBackAt !== undefined) fields.rolledBackAt = encodeDate(patch.rolledBackAt);
  return fields;
}

export function decodeUpdate(record: FlatRecord): PendingUpdate {
  const verdict: StoredVerdict = JSON.parse(required(record, 'verdict'));
  return {
    id: required(record, 'id'),
    targetPath: required(record, 'targetPath'),
    proposedContent: required(record, 'proposedContent'),
    proposedHash: required(record, 'proposedHash'),
    baseHash: required(record, 'baseHash'),
    reason: required(record, 'reason'),
    protected: record.protected === '1',
    status: oneOf(UPDATE_STATUSES, record.status, 'status'),
    verdict: decodeVerdict(verdict),
    backupRef: optionalString(record.backupRef),
    createdAt: requiredDate(record, 'createdAt'),
    updatedAt: requiredDate(record, 'updatedAt'),
    decidedAt: decodeDate(record.decidedAt),
    decidedBy: optionalString(record.decidedBy),
    decisionNote: optionalString(record.decisionNote),
    appliedAt: decodeDate(record.appliedAt),
    rolledBackAt: decodeDate(record.rolledBackAt),
  };
}

export function encodeBackup(backup: Backup): string {
  const stored: StoredBackup = { ...backup, takenAt: backup.takenAt.toISOString() };
  return JSON.stringify(stored);
}

export function decodeBackup(text: string): Backup {
  const stored: StoredBackup = JSON.parse(text);
  return { ...stored, takenAt: new Date(stored.takenAt) };
}

/**
 * Activity lines carry no sequence: it is their position in the log.
 */
export function encodeActivity(entry: Omit<ActivityEntry, 'sequence'>): string {
  const stored: StoredActivity = {
    id: entry.id,
    timestamp: entry.timestamp.toISOString(),
    kind: entry.kind,
    subjectId: entry.subjectId,
    actor: entry.actor,
    detail: entry.detail,
  };
  return JSON.stringify(stored);
}

export function decodeActivity(text: string, sequence: number): ActivityEntry {
  const stored: StoredActivity = JSON.parse(text);
  return {
    id: stored.id,
    sequence,
    timestamp: new Date(stored.timestamp),
    kind: oneOf(ACTIVITY_KINDS, stored.kind, 'kind'),
    subjectId: stored.subjectId,
    actor: stored.actor,
    detail: stored.detail,
  };
}
