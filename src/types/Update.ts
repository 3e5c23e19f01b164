import type { GuardrailVerdict } from './Guardrail.js';

export type UpdateStatus =
  | 'pending_approval'
  | 'approved'
  | 'rejected'
  | 'applied'
  | 'rolled_back';

export type UpdateDecision = 'approve' | 'reject';

/**
 * Who performed a governance action. The identity is asserted by the
 * caller; nothing here authenticates it.
 */
export interface Actor {
  kind: 'human' | 'system';
  id: string;
}

export const SYSTEM_AUTO_ACTOR: Actor = { kind: 'system', id: 'auto' };

export function formatActor(actor: Actor): string {
  return `${actor.kind}:${actor.id}`;
}

export interface PendingUpdate {
  id: string;
  targetPath: string;  // Relative to the agent root
  proposedContent: string;
  proposedHash: string;
  baseHash: string;  // sha256 of the target when proposed, '' if it did not exist
  reason: string;  // Originating task id
  protected: boolean;
  status: UpdateStatus;
  verdict: GuardrailVerdict;
  backupRef?: string;
  createdAt: Date;
  updatedAt: Date;
  decidedAt?: Date;
  decidedBy?: string;
  decisionNote?: string;
  appliedAt?: Date;
  rolledBackAt?: Date;
}

export interface UpdateCreateInput {
  targetPath: string;
  proposedContent: string;
  proposedHash: string;
  baseHash: string;
  reason: string;
  protected: boolean;
  verdict: GuardrailVerdict;
}

/**
 * Fields a governance transition may set. Status is always part of the
 * transition; the rest are filled in as the state machine requires.
 */
export interface UpdateTransition {
  status: UpdateStatus;
  backupRef?: string;
  decidedAt?: Date;
  decidedBy?: string;
  decisionNote?: string;
  appliedAt?: Date;
  rolledBackAt?: Date;
}

export interface UpdateFilters {
  status?: UpdateStatus;
}

export interface Backup {
  id: string;
  updateRef: string;
  targetPath: string;
  originalContent: string | null;  // base64 of the prior bytes, null if the file did not exist
  contentHash: string;
  takenAt: Date;
}

export interface RollbackResult {
  update: PendingUpdate;
  changed: boolean;
}
