/**
 * Every CLI command, in help order
 */

import { CommandDefinition } from './types.js';
import { cancelTask, getTask, listTasks, reapLeases, submitTask } from './definitions/task.js';
import {
  applyUpdate,
  approveUpdate,
  cleanupBackups,
  listUpdates,
  rejectUpdate,
  rollbackUpdate,
  showUpdate,
} from './definitions/updates.js';
import { checkCommand, listActivity, runAgent, systemStatus } from './definitions/system.js';

export const COMMAND_GROUPS: Record<string, string> = {
  updates: 'Review, apply and roll back self-updates',
};

export const COMMAND_DEFINITIONS: readonly CommandDefinition[] = [
  // Task queue
  submitTask,
  getTask,
  listTasks,
  cancelTask,
  reapLeases,

  // Self-update governance
  listUpdates,
  showUpdate,
  approveUpdate,
  rejectUpdate,
  applyUpdate,
  rollbackUpdate,
  cleanupBackups,

  // Operations
  listActivity,
  checkCommand,
  systemStatus,
  runAgent,
];

export * from './types.js';
export * from './context.js';
export * from './formatters.js';
export * from './generators.js';
export * from './utils.js';
