import type { TaskPayload } from '../types/index.js';

/**
 * What a strategy sees: the task payload, plus the contents of
 * `payload.filePath` when the task names an input file.
 */
export interface PromptInput {
  payload: TaskPayload;
  fileContent?: string;
}

export type PromptStrategy = (input: PromptInput) => string;
