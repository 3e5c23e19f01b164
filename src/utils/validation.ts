import Joi from 'joi';
import { TASK_PRIORITIES } from '../types/Task.js';
import type {
  Actor,
  SubmitOptions,
  TaskFilters,
  TaskPayload,
  TaskPriority,
  TaskTarget,
  UpdateDecision,
  ValidationErrorDetail,
} from '../types/index.js';

/**
 * Common validation schemas for queue and governance inputs
 */

export const uuidSchema = Joi.string()
  .uuid({ version: ['uuidv4'] })
  .required();

export const workerIdSchema = Joi.string()
  .min(1)
  .max(100)
  .pattern(/^[a-zA-Z0-9_.:-]+$/)
  .required()
  .messages({
    'string.pattern.base': 'Worker id can only contain letters, numbers, dots, colons, hyphens, and underscores',
  });

export const prioritySchema = Joi.string<TaskPriority>().valid(...TASK_PRIORITIES);

export const targetSchema = Joi.object<TaskTarget>({
  scope: Joi.string().valid('workspace', 'agent').required(),
  path: Joi.string().min(1).max(1024).required(),
});

// Size limits are a guardrail concern; these bounds only reject nonsense.
export const taskPayloadSchema = Joi.object<TaskPayload>({
  description: Joi.string().min(1).max(100000).required(),
  code: Joi.string().allow('').max(10 * 1024 * 1024).optional(),
  language: Joi.string().max(50).optional(),
  filePath: Joi.string().min(1).max(1024).optional(),
  target: targetSchema.optional(),
});

export const submitOptionsSchema = Joi.object<SubmitOptions>({
  maxAttempts: Joi.number().integer().min(1).max(20).optional(),
});

export const leaseDurationSchema = Joi.number().integer().min(1).required();

export const retentionDaysSchema = Joi.number().integer().min(0).required();

export const taskFiltersSchema = Joi.object<TaskFilters>({
  status: Joi.string()
    .valid('pending', 'claimed', 'running', 'completed', 'failed', 'retrying', 'cancelled')
    .optional(),
  limit: Joi.number().integer().min(0).default(100),
  offset: Joi.number().integer().min(0).default(0),
});

export const actorSchema = Joi.object<Actor>({
  kind: Joi.string().valid('human', 'system').required(),
  id: Joi.string().min(1).max(100).required(),
});

export const decisionSchema = Joi.string<UpdateDecision>().valid('approve', 'reject').required();

export const decisionNoteSchema = Joi.string().max(2000).allow('').optional();

/**
 * Raised for malformed input at the service boundary.
 */
export class ValidationError extends Error {
  readonly code = 'VALIDATION_ERROR';

  constructor(
    message: string,
    public readonly validationDetails: ValidationErrorDetail[]
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Validate data against a schema
 */
export function validate<T>(schema: Joi.Schema<T>, data: unknown): T {
  const { error, value } = schema.validate(data, {
    abortEarly: false,
    stripUnknown: false,
    allowUnknown: false,
  });

  if (error) {
    const details: ValidationErrorDetail[] = error.details.map(detail => ({
      field: detail.path.join('.'),
      message: detail.message,
      value: detail.context?.value,
    }));

    const message = `Validation failed: ${details.map(d => `${d.field}: ${d.message}`).join(', ')}`;
    throw new ValidationError(message, details);
  }

  return value;
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}
