/**
 * Output formatters for CLI commands
 * Supports both human-readable and JSON formats
 */

import chalk from '../utils/chalk.js';
import {
  ActivityEntry,
  GuardrailSeverity,
  GuardrailVerdict,
  PendingUpdate,
  ReapResult,
  Task,
  TaskStatus,
  UpdateStatus,
} from '../types/index.js';
import { summarizeVerdict } from '../services/GuardrailService.js';
import type { QueueStats } from '../services/TaskQueueService.js';
import type { CommandResult } from './types.js';

export type OutputFormat = 'human' | 'json';

export interface FormattedOutput {
  text: string;
  exitCode: number;
}

/**
 * Format command result for display
 */
export function formatCommandResult<R>(
  result: CommandResult<R>,
  format: OutputFormat,
  formatData: (data: R) => string
): FormattedOutput {
  if (format === 'json') {
    return {
      text: JSON.stringify(result, null, 2),
      exitCode: result.success ? 0 : 1,
    };
  }

  if (!result.success) {
    return {
      text: chalk.red(`❌ Error: ${result.error ?? 'Command failed'}`),
      exitCode: 1,
    };
  }

  let output = '';
  if (result.message) {
    output += chalk.green(`✅ ${result.message}`) + '\n';
  }
  if (result.data !== undefined) {
    output += formatData(result.data);
  }

  return {
    text: output.trim(),
    exitCode: 0,
  };
}

/**
 * Formats the time difference between two dates.
 */
export function formatTimeDifference(start: Date, end: Date): string {
  const seconds = Math.abs(Math.floor((end.getTime() - start.getTime()) / 1000));
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);

  if (days > 1) {
    return `${days} days`;
  } else if (hours > 0) {
    return `${hours} hour${hours > 1 ? 's' : ''} ${minutes % 60} min`;
  } else if (minutes > 0) {
    return `${minutes} min ${seconds % 60} sec`;
  }
  return `${seconds} sec`;
}

export function formatRelativeTime(date: Date | undefined, now: Date = new Date()): string {
  if (!date) return 'unknown';
  const suffix = date > now ? 'from now' : 'ago';
  return `${formatTimeDifference(date, now)} ${suffix}`;
}

/**
 * Strip ANSI color codes to get visual width
 */
function getVisualWidth(text: string): number {
  return text.replace(/\u001b\[[0-9;]*m/g, '').length;
}

function padEndVisual(text: string, width: number): string {
  return text + ' '.repeat(Math.max(0, width - getVisualWidth(text)));
}

function formatTable(headers: string[], rows: string[][]): string {
  const widths = headers.map((header, i) =>
    Math.max(header.length, ...rows.map(row => getVisualWidth(row[i] ?? '')))
  );
  const line = (cells: string[]) => cells.map((cell, i) => padEndVisual(cell, widths[i] ?? 0)).join(' | ').trimEnd();

  let output = chalk.bold(line(headers)) + '\n';
  output += chalk.gray('-'.repeat(widths.reduce((sum, width) => sum + width, 0) + 3 * (widths.length - 1))) + '\n';
  for (const row of rows) {
    output += line(row) + '\n';
  }
  return output;
}

const STATUS_COLORS: Record<TaskStatus | UpdateStatus, (text: string) => string> = {
  pending: chalk.yellow,
  claimed: chalk.cyan,
  running: chalk.blue,
  retrying: chalk.magenta,
  completed: chalk.green,
  failed: chalk.red,
  cancelled: chalk.gray,
  pending_approval: chalk.yellow,
  approved: chalk.cyan,
  rejected: chalk.red,
  applied: chalk.green,
  rolled_back: chalk.magenta,
};

export function formatStatus(status: TaskStatus | UpdateStatus): string {
  return STATUS_COLORS[status](status.toUpperCase());
}

function formatLeaseStatus(task: Task, now: Date): string {
  switch (task.status) {
    case 'completed':
    case 'failed':
    case 'cancelled':
      return `finished ${formatRelativeTime(task.completedAt ?? task.updatedAt, now)}`;
    case 'retrying':
      return `retry ${formatRelativeTime(task.retryAt, now)}`;
    case 'claimed':
    case 'running':
      if (!task.leaseExpiresAt || task.leaseExpiresAt <= now) {
        return chalk.red('<lease expired>');
      }
      return `leased by ${task.claimedBy ?? '?'} for ${formatTimeDifference(now, task.leaseExpiresAt)}`;
    default:
      return `queued ${formatRelativeTime(task.createdAt, now)}`;
  }
}

const SEVERITY_COLORS: Record<GuardrailSeverity, (text: string) => string> = {
  info: chalk.gray,
  warning: chalk.yellow,
  block: chalk.red,
};

export function formatVerdict(verdict: GuardrailVerdict): string {
  const summary = summarizeVerdict(verdict);
  let output = verdict.allowed ? chalk.green('ALLOWED') : chalk.red('BLOCKED');
  output += chalk.gray(` (risk: ${summary.level})`) + '\n';
  for (const violation of verdict.violations) {
    output += `  ${SEVERITY_COLORS[violation.severity](`[${violation.severity}]`)} ${violation.ruleName}: ${violation.message}\n`;
  }
  return output;
}

/**
 * Format task data
 */
export function formatTask(task: Task, now: Date = new Date()): string {
  let output = `\n${chalk.bold('Task:')} ${task.id}\n`;
  output += `${chalk.gray('Status:')} ${formatStatus(task.status)}${task.cancelRequested ? chalk.gray(' (cancel requested)') : ''}\n`;
  output += `${chalk.gray('Type:')} ${task.type}\n`;
  output += `${chalk.gray('Priority:')} ${task.priority}\n`;
  output += `${chalk.gray('Attempts:')} ${task.attemptCount}/${task.maxAttempts}\n`;
  output += `${chalk.gray('Lease:')} ${formatLeaseStatus(task, now)}\n`;
  output += `${chalk.gray('Created:')} ${task.createdAt.toISOString()}\n`;

  if (task.payload.target) {
    output += `${chalk.gray('Target:')} ${task.payload.target.scope}:${task.payload.target.path}\n`;
  }

  output += `\n${chalk.bold('Description:')}\n${task.payload.description}\n`;

  if (task.error) {
    output += `\n${chalk.bold.red('Error:')} [${task.error.kind}] ${task.error.message}\n`;
  }

  if (task.result) {
    output += `\n${chalk.bold('Result:')}\n`;
    if (task.result.writtenTo) output += `  Written to: ${task.result.writtenTo}\n`;
    if (task.result.updateId) output += `  Update: ${task.result.updateId} (${task.result.updateStatus ?? 'unknown'})\n`;
    if (task.result.durationMs !== undefined) output += `  Duration: ${task.result.durationMs}ms\n`;
  }

  if (task.verdicts.pre) {
    output += `\n${chalk.bold('Pre-check:')} ${formatVerdict(task.verdicts.pre)}`;
  }
  if (task.verdicts.post) {
    output += `${chalk.bold('Post-check:')} ${formatVerdict(task.verdicts.post)}`;
  }

  return output;
}

/**
 * Format task list
 */
export function formatTaskList(tasks: Task[], now: Date = new Date()): string {
  if (tasks.length === 0) {
    return chalk.gray('No tasks found');
  }
  const rows = tasks.map(task => [
    task.id,
    task.type,
    task.priority,
    formatStatus(task.status),
    `${task.attemptCount}/${task.maxAttempts}`,
    formatLeaseStatus(task, now),
  ]);
  return `\n${chalk.bold('Tasks:')} (${tasks.length})\n\n` +
    formatTable(['ID', 'TYPE', 'PRIORITY', 'STATUS', 'ATTEMPTS', 'STATE'], rows);
}

export function formatUpdate(update: PendingUpdate): string {
  let output = `\n${chalk.bold('Update:')} ${update.id}\n`;
  output += `${chalk.gray('Status:')} ${formatStatus(update.status)}\n`;
  output += `${chalk.gray('Target:')} ${update.targetPath}${update.protected ? chalk.yellow(' (protected)') : ''}\n`;
  output += `${chalk.gray('Reason:')} task ${update.reason}\n`;
  output += `${chalk.gray('Proposed:')} ${update.createdAt.toISOString()}\n`;
  if (update.decidedBy) {
    output += `${chalk.gray('Decided by:')} ${update.decidedBy}${update.decisionNote ? ` (${update.decisionNote})` : ''}\n`;
  }
  if (update.backupRef) {
    output += `${chalk.gray('Backup:')} ${update.backupRef}\n`;
  }
  output += `${chalk.gray('Verdict:')} ${formatVerdict(update.verdict)}`;
  return output;
}

export function formatUpdateList(updates: PendingUpdate[]): string {
  if (updates.length === 0) {
    return chalk.gray('No updates found');
  }
  const rows = updates.map(update => [
    update.id,
    formatStatus(update.status),
    update.protected ? 'yes' : 'no',
    update.targetPath,
  ]);
  return `\n${chalk.bold('Updates:')} (${updates.length})\n\n` +
    formatTable(['ID', 'STATUS', 'PROTECTED', 'TARGET'], rows);
}

export function formatActivityList(entries: ActivityEntry[]): string {
  if (entries.length === 0) {
    return chalk.gray('No activity found');
  }
  return entries
    .map(entry => {
      const detail = Object.entries(entry.detail)
        .map(([key, value]) => `${key}=${String(value)}`)
        .join(' ');
      return `${chalk.gray(`#${entry.sequence}`)} ${entry.timestamp.toISOString()} ${chalk.bold(entry.kind)} ${entry.subjectId} ${chalk.gray(entry.actor)}${detail ? ` ${detail}` : ''}`;
    })
    .join('\n');
}

export function formatQueueStats(stats: QueueStats): string {
  let output = `\n${chalk.bold('Queue:')}\n`;
  for (const [status, count] of Object.entries(stats)) {
    output += `  ${status.padEnd(10)} ${count}\n`;
  }
  return output;
}

export function formatReapResult(result: ReapResult): string {
  return `Requeued: ${result.requeued.length}\nFailed: ${result.failed.length}\nCancelled: ${result.cancelled.length}`;
}
