import Joi from 'joi';
import type { LogLevel } from '../utils/logger.js';

export interface WardenConfig {
  // Storage configuration
  storage: {
    provider: 'file' | 'redis';
    connectionString?: string;
    fileStorage?: {
      dataDir: string;
      lockTimeout: number;
    };
    redis?: {
      database: number;
      keyPrefix: string;
    };
  };

  // Queue behaviour
  queue: {
    maxAttempts: number;
    leaseDurationMs: number;
    retryBaseDelayMs: number;
    retryMaxDelayMs: number;
    reaperIntervalMs: number;
  };

  // Guardrail policy
  guardrails: {
    workspaceRoot: string;
    maxPayloadBytes: number;
    maxOutputBytes: number;
    allowedExtensions: string[];
    allowedCommands: string[];
  };

  // Self-update governance
  governance: {
    agentRoot: string;
    backupRetentionDays: number;
  };

  // Worker pool and completion calls
  agent: {
    concurrency: number;
    pollIntervalMs: number;
    completionTimeoutMs: number;
    model: string;
    maxTokens: number;
    apiKey?: string;
  };

  // Logging configuration
  logging: {
    level: LogLevel;
  };
}

export const DEFAULT_ALLOWED_EXTENSIONS = [
  '.py', '.js', '.jsx', '.ts', '.tsx', '.json', '.md', '.txt', '.yaml', '.yml', '.html', '.css',
];

export const DEFAULT_ALLOWED_COMMANDS = [
  'python', 'python3', 'node', 'npm', 'git', 'ls', 'cat', 'echo', 'grep', 'find', 'wc', 'sort',
];

const MIB = 1024 * 1024;

export const configSchema = Joi.object<WardenConfig>({
  storage: Joi.object({
    provider: Joi.string().valid('file', 'redis').default('file'),
    connectionString: Joi.string().when('provider', {
      is: 'redis',
      then: Joi.required(),
      otherwise: Joi.optional(),
    }),
    fileStorage: Joi.object({
      dataDir: Joi.string().default('./data'),
      lockTimeout: Joi.number().default(30000), // 30 seconds
    }).when('provider', {
      is: 'file',
      then: Joi.object().default(),
      otherwise: Joi.optional(),
    }),
    redis: Joi.object({
      database: Joi.number().integer().min(0).default(0),
      keyPrefix: Joi.string().default('warden:'),
    }).when('provider', {
      is: 'redis',
      then: Joi.object().default(),
      otherwise: Joi.optional(),
    }),
  }).default(),

  queue: Joi.object({
    maxAttempts: Joi.number().integer().min(1).max(20).default(3),
    leaseDurationMs: Joi.number().integer().min(1000).default(600000), // 10 minutes
    retryBaseDelayMs: Joi.number().integer().min(0).default(5000),
    retryMaxDelayMs: Joi.number().integer().min(0).default(300000),
    reaperIntervalMs: Joi.number().integer().min(100).default(30000),
  }).default(),

  guardrails: Joi.object({
    workspaceRoot: Joi.string().default('./workspace'),
    maxPayloadBytes: Joi.number().integer().min(1).default(MIB),
    maxOutputBytes: Joi.number().integer().min(1).default(MIB),
    allowedExtensions: Joi.array().items(Joi.string().pattern(/^\.[a-z0-9]+$/i)).default(DEFAULT_ALLOWED_EXTENSIONS),
    allowedCommands: Joi.array().items(Joi.string()).default(DEFAULT_ALLOWED_COMMANDS),
  }).default(),

  governance: Joi.object({
    agentRoot: Joi.string().default('.'),
    backupRetentionDays: Joi.number().integer().min(1).default(30),
  }).default(),

  agent: Joi.object({
    concurrency: Joi.number().integer().min(1).max(64).default(3),
    pollIntervalMs: Joi.number().integer().min(10).default(5000),
    completionTimeoutMs: Joi.number().integer().min(100).default(120000),
    model: Joi.string().default('claude-3-haiku-20240307'),
    maxTokens: Joi.number().integer().min(1).default(4000),
    apiKey: Joi.string().optional(),
  }).default(),

  logging: Joi.object({
    level: Joi.string().valid('error', 'warn', 'info', 'debug', 'trace').default('info'),
  }).default(),
}).default();
