import type { PromptInput } from './types.js';

/**
 * Source the task operates on: inline code wins over the input file.
 */
export function sourceOf(input: PromptInput): string | undefined {
  const code = input.payload.code;
  return code !== undefined && code !== '' ? code : input.fileContent;
}

export function codeBlock(code: string, language?: string): string {
  return `\`\`\`${language ?? ''}\n${code}\n\`\`\``;
}

/**
 * Joins prompt sections, dropping empty ones.
 */
export function sections(...parts: (string | undefined | false)[]): string {
  return parts.filter((part): part is string => typeof part === 'string' && part.length > 0).join('\n\n');
}

export function sourceSection(input: PromptInput, heading: string): string | undefined {
  const source = sourceOf(input);
  if (source === undefined) {
    return undefined;
  }
  const origin = input.payload.filePath ? ` (${input.payload.filePath})` : '';
  return `${heading}${origin}:\n${codeBlock(source, input.payload.language)}`;
}
