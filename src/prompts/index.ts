/**
 * One fixed prompt strategy per task type. The map is closed: a new task
 * type does not compile until it has a strategy here.
 */

import { TaskPayload, TaskType } from '../types/index.js';
import { PromptStrategy } from './types.js';
import { formatCode, refactorFunction, translateCode, writeTests } from './strategies/code.js';
import { debugError, general, generateDocs } from './strategies/analysis.js';

export const PROMPT_STRATEGIES: Readonly<Record<TaskType, PromptStrategy>> = {
  write_tests: writeTests,
  translate_code: translateCode,
  debug_error: debugError,
  format_code: formatCode,
  generate_docs: generateDocs,
  refactor_function: refactorFunction,
  general,
};

export function buildPrompt(type: TaskType, payload: TaskPayload, fileContent?: string): string {
  return PROMPT_STRATEGIES[type]({ payload, fileContent });
}

export type { PromptInput, PromptStrategy } from './types.js';
export { codeBlock, sourceOf } from './utils.js';
