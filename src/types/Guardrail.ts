import type { TargetScope, TaskPayload } from './Task.js';

export type GuardrailSeverity = 'info' | 'warning' | 'block';

export interface GuardrailViolation {
  ruleName: string;
  severity: GuardrailSeverity;
  message: string;
}

export interface GuardrailVerdict {
  allowed: boolean;
  violations: GuardrailViolation[];
  evaluatedAt: Date;
}

export interface TaskContext {
  kind: 'task';
  type: string;  // Deliberately unchecked: the allowlist rule judges it
  payload: TaskPayload;
}

export interface OutputContext {
  kind: 'output';
  content: string;
  language?: string;
}

export interface PathContext {
  kind: 'path';
  path: string;
  scope: TargetScope;
}

export interface CommandContext {
  kind: 'command';
  command: string;
}

export type GuardrailContext = TaskContext | OutputContext | PathContext | CommandContext;

export type GuardrailContextKind = GuardrailContext['kind'];

/**
 * Policy values the rules read. Roots are absolute, already resolved by the
 * service; rules never touch the filesystem.
 */
export interface GuardrailPolicy {
  workspaceRoot: string;
  agentRoot: string;
  maxPayloadBytes: number;
  maxOutputBytes: number;
  allowedExtensions: readonly string[];
  allowedCommands: readonly string[];
}

export type RiskLevel = 'safe' | 'low' | 'warning' | 'blocked';

export interface VerdictSummary {
  level: RiskLevel;
  total: number;
  bySeverity: Record<GuardrailSeverity, number>;
  rules: string[];
}
