import { PromptStrategy } from '../types.js';
import { sections, sourceSection } from '../utils.js';

export const debugError: PromptStrategy = input =>
  sections(
    `Find and fix the bug described here: ${input.payload.description}`,
    sourceSection(input, 'Code'),
    'Explain the root cause in one short paragraph, then give the corrected code.'
  );

export const generateDocs: PromptStrategy = input =>
  sections(
    `Write documentation. ${input.payload.description}`,
    sourceSection(input, 'Code to document'),
    'Describe purpose, parameters, return values and errors. Use Markdown.'
  );

export const general: PromptStrategy = input =>
  sections(input.payload.description, sourceSection(input, 'Context'));
