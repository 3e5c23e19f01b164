/**
 * Task queue commands
 */

import { ReapResult, TASK_PRIORITIES, TASK_TYPES, Task, TaskPayload, TaskStatus } from '../../types/index.js';
import { formatReapResult, formatTask, formatTaskList } from '../formatters.js';
import { generateCorrelationId } from '../../utils/index.js';
import { defineCommand } from '../types.js';

const TASK_STATUSES: readonly TaskStatus[] = [
  'pending', 'claimed', 'running', 'retrying', 'completed', 'failed', 'cancelled',
];

export const submitTask = defineCommand<Task>({
  name: 'submit',
  description: 'Submit a task to the queue',
  parameters: [
    { name: 'type', type: 'string', description: 'Task type', required: true, positional: true, choices: TASK_TYPES },
    { name: 'description', type: 'string', description: 'What the task should do (or @file)', required: true, positional: true, fromFile: true },
    { name: 'priority', type: 'string', description: 'Queue priority', choices: TASK_PRIORITIES, default: 'normal', alias: 'p' },
    { name: 'code', type: 'string', description: 'Inline code to work on (or @file)', fromFile: true },
    { name: 'language', type: 'string', description: 'Language of the code' },
    { name: 'file', type: 'string', description: 'Input file, relative to the workspace root' },
    { name: 'target', type: 'string', description: 'Where to write the output, relative to the scope root' },
    { name: 'scope', type: 'string', description: 'Root the target is relative to', choices: ['workspace', 'agent'], default: 'workspace' },
    { name: 'max-attempts', type: 'number', description: 'Attempts before the task fails for good' },
    { name: 'correlation-id', type: 'string', description: 'Id that ties log lines and activity to this submission' },
  ],
  examples: [
    'warden submit write_tests "Cover the parser" --file src/parser.py --target tests/test_parser.py',
    'warden submit debug_error @bug-report.txt --code @snippet.js --priority urgent',
  ],
  async handler(context, args) {
    const payload: TaskPayload = { description: args.requireString('description') };
    const code = args.string('code');
    const language = args.string('language');
    const filePath = args.string('file');
    const target = args.string('target');
    if (code !== undefined) payload.code = code;
    if (language !== undefined) payload.language = language;
    if (filePath !== undefined) payload.filePath = filePath;
    if (target !== undefined) {
      payload.target = { scope: args.string('scope') === 'agent' ? 'agent' : 'workspace', path: target };
    }

    const maxAttempts = args.number('max-attempts');
    const taskId = await context.queue.submit(
      args.requireString('type'),
      args.string('priority') ?? 'normal',
      payload,
      maxAttempts === undefined ? {} : { maxAttempts },
      args.string('correlation-id') ?? generateCorrelationId()
    );
    const task = await context.queue.get(taskId);
    if (!task) {
      return { success: false, error: `Task ${taskId} vanished after submission` };
    }
    return { success: true, data: task, message: `Task ${taskId} submitted` };
  },
  formatResult: task => formatTask(task),
});

export const getTask = defineCommand<Task>({
  name: 'get',
  description: 'Show one task',
  parameters: [
    { name: 'taskId', type: 'string', description: 'Task id', required: true, positional: true },
  ],
  async handler(context, args) {
    const taskId = args.requireString('taskId');
    const task = await context.queue.get(taskId);
    if (!task) {
      return { success: false, error: `Task ${taskId} not found` };
    }
    return { success: true, data: task };
  },
  formatResult: task => formatTask(task),
});

export const listTasks = defineCommand<Task[]>({
  name: 'list',
  description: 'List tasks in submission order',
  parameters: [
    { name: 'status', type: 'string', description: 'Only tasks in this status', choices: TASK_STATUSES },
    { name: 'limit', type: 'number', description: 'Maximum number of tasks', default: 100 },
    { name: 'offset', type: 'number', description: 'Tasks to skip', default: 0 },
  ],
  async handler(context, args) {
    const tasks = await context.queue.list({
      status: TASK_STATUSES.find(status => status === args.string('status')),
      limit: args.number('limit'),
      offset: args.number('offset'),
    });
    return { success: true, data: tasks };
  },
  formatResult: tasks => formatTaskList(tasks),
});

export const cancelTask = defineCommand<Task>({
  name: 'cancel',
  description: 'Cancel a task; a task being worked on stops at its lease boundary',
  parameters: [
    { name: 'taskId', type: 'string', description: 'Task id', required: true, positional: true },
  ],
  async handler(context, args) {
    const task = await context.queue.cancel(args.requireString('taskId'), 'human:cli');
    const message = task.status === 'cancelled'
      ? `Task ${task.id} cancelled`
      : `Cancellation requested for task ${task.id}`;
    return { success: true, data: task, message };
  },
  formatResult: task => formatTask(task),
});

export const reapLeases = defineCommand<ReapResult>({
  name: 'reap',
  description: 'Return tasks with expired leases to the queue',
  parameters: [],
  async handler(context) {
    const result = await context.reaper.reapNow();
    return { success: true, data: result };
  },
  formatResult: result => formatReapResult(result),
});
