/**
 * Warden - guarded task-execution agent
 *
 * Library entry point. The `warden` binary lives in cli.js.
 */

export * from './types/index.js';
export * from './config/index.js';
export * from './storage/index.js';

export * from './guardrails/patterns.js';
export * from './guardrails/rules.js';
export * from './guardrails/syntaxScanner.js';
export * from './prompts/index.js';

export * from './services/ActivityLogService.js';
export * from './services/AgentService.js';
export * from './services/CompletionService.js';
export * from './services/GovernanceService.js';
export * from './services/GuardrailService.js';
export * from './services/LeaseService.js';
export * from './services/ReaperService.js';
export * from './services/TaskQueueService.js';
export * from './services/WorkspaceService.js';

export { createServiceContext } from './commands/context.js';
export type { ContextOptions } from './commands/context.js';
export type { ServiceContext } from './commands/types.js';
export { runCLI } from './cli.js';
export { logger, Logger } from './utils/logger.js';
export type { LogLevel, LogContext } from './utils/logger.js';
