/**
 * Strategies whose answer is code and nothing else.
 */

import { PromptStrategy } from '../types.js';
import { sections, sourceSection } from '../utils.js';

const CODE_ONLY = 'Respond with the complete code only, without explanations or Markdown fences.';

export const writeTests: PromptStrategy = input =>
  sections(
    `Write thorough unit tests for the code below. ${input.payload.description}`,
    sourceSection(input, 'Code under test'),
    'Cover normal behaviour, edge cases and error handling. Use the idiomatic test framework for the language.',
    CODE_ONLY
  );

export const translateCode: PromptStrategy = input =>
  sections(
    `Translate the code below. ${input.payload.description}`,
    sourceSection(input, 'Source code'),
    input.payload.language && `The source is written in ${input.payload.language}.`,
    'Preserve behaviour exactly and use the idioms of the target language.',
    CODE_ONLY
  );

export const formatCode: PromptStrategy = input =>
  sections(
    `Reformat the code below. ${input.payload.description}`,
    sourceSection(input, 'Code'),
    'Change layout and naming style only; do not change behaviour.',
    CODE_ONLY
  );

export const refactorFunction: PromptStrategy = input =>
  sections(
    `Refactor the code below. ${input.payload.description}`,
    sourceSection(input, 'Code'),
    'Keep the public signature and observable behaviour unchanged.',
    CODE_ONLY
  );
