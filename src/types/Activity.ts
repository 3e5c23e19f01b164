export const ACTIVITY_KINDS = [
  'task.submitted',
  'task.claimed',
  'task.completed',
  'task.failed',
  'task.retrying',
  'task.violation',
  'task.cancelled',
  'task.discarded',
  'task.lease_expired',
  'proposal.blocked',
  'update.proposed',
  'update.approved',
  'update.rejected',
  'update.applied',
  'update.rolled_back',
  'update.apply_failed',
] as const;

export type ActivityKind = typeof ACTIVITY_KINDS[number];

export type ActivityDetailValue = string | number | boolean | null;

export interface ActivityEntry {
  id: string;
  sequence: number;
  timestamp: Date;
  kind: ActivityKind;
  subjectId: string;  // Task id or update id; a blocked proposal has only its task id
  actor: string;
  detail: Record<string, ActivityDetailValue>;
}

export interface ActivityCreateInput {
  kind: ActivityKind;
  subjectId: string;
  actor: string;
  detail: Record<string, ActivityDetailValue>;
}

export interface ActivityFilters {
  subjectId?: string;
  kind?: ActivityKind;
  limit?: number;
}
