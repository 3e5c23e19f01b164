// Core entity types
export * from './Task.js';
export * from './Guardrail.js';
export * from './Update.js';
export * from './Activity.js';
export * from './errors.js';

export interface ValidationErrorDetail {
  field: string;
  message: string;
  value?: unknown;
}

export interface HealthStatus {
  healthy: boolean;
  message?: string;
}
