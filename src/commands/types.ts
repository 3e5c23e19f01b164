/**
 * Types for the declarative CLI command definitions
 */

import type { WardenConfig } from '../config/index.js';
import type { StorageProvider } from '../storage/StorageProvider.js';
import type { ActivityLogService } from '../services/ActivityLogService.js';
import type { AgentService, AgentSettings } from '../services/AgentService.js';
import type { GovernanceService } from '../services/GovernanceService.js';
import type { GuardrailService } from '../services/GuardrailService.js';
import type { LeaseService } from '../services/LeaseService.js';
import type { ReaperService } from '../services/ReaperService.js';
import type { TaskQueueService } from '../services/TaskQueueService.js';
import type { WorkspaceService } from '../services/WorkspaceService.js';

// Service context for command handlers
export interface ServiceContext {
  config: WardenConfig;
  storage: StorageProvider;
  activity: ActivityLogService;
  guardrails: GuardrailService;
  queue: TaskQueueService;
  lease: LeaseService;
  reaper: ReaperService;
  governance: GovernanceService;
  workspace: WorkspaceService;
  /**
   * Builds the worker orchestrator. Needs a completion backend, so it is
   * only created for commands that run tasks.
   */
  createAgent(overrides?: Partial<AgentSettings>): AgentService;
}

export type CommandParameterType = 'string' | 'number' | 'boolean';

export interface CommandParameter {
  readonly name: string;
  readonly type: CommandParameterType;
  readonly description: string;
  readonly required?: boolean;
  readonly default?: string | number | boolean;
  readonly choices?: readonly string[];
  readonly alias?: string;
  readonly positional?: boolean;
  /** Accept `@path` and substitute the file's contents. */
  readonly fromFile?: boolean;
}

// Result format for consistent output
export interface CommandResult<T> {
  success: boolean;
  data?: T;
  error?: string;
  message?: string;
}

/**
 * Parsed command-line values with typed accessors.
 */
export class CommandArgs {
  constructor(private readonly values: Readonly<Record<string, unknown>>) {}

  string(name: string): string | undefined {
    const value = this.values[name];
    if (typeof value === 'string') return value;
    if (typeof value === 'number') return String(value);
    return undefined;
  }

  requireString(name: string): string {
    const value = this.string(name);
    if (value === undefined || value === '') {
      throw new Error(`Missing required argument: ${name}`);
    }
    return value;
  }

  number(name: string): number | undefined {
    const value = this.values[name];
    return typeof value === 'number' && !Number.isNaN(value) ? value : undefined;
  }

  boolean(name: string): boolean {
    return this.values[name] === true;
  }

  with(name: string, value: string): CommandArgs {
    return new CommandArgs({ ...this.values, [name]: value });
  }
}

export interface CommandDefinition<R = unknown> {
  name: string;
  /** Parent command for grouped commands such as `updates approve`. */
  group?: string;
  description: string;
  parameters: readonly CommandParameter[];
  handler(context: ServiceContext, args: CommandArgs): Promise<CommandResult<R>>;
  formatResult(data: R, args: CommandArgs): string;
  examples?: string[];
}

export function defineCommand<R>(definition: CommandDefinition<R>): CommandDefinition<R> {
  return definition;
}
