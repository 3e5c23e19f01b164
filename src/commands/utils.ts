/**
 * Utilities for command processing
 */

import { readFileSync } from 'fs';
import { resolve } from 'path';
import { Actor } from '../types/index.js';
import { actorSchema, asError, validate } from '../utils/index.js';

/**
 * Reads content from a file path if the value starts with '@', otherwise returns the value as-is
 */
export function readContentFromFileOrValue(value: string): string {
  if (value.startsWith('@')) {
    const filePath = value.slice(1);
    try {
      return readFileSync(resolve(filePath), 'utf-8');
    } catch (error) {
      throw new Error(`Failed to read file '${filePath}': ${asError(error).message}`);
    }
  }
  return value;
}

/**
 * `kind:id` or a bare id, which means a human operator.
 */
export function parseActor(value: string): Actor {
  const separator = value.indexOf(':');
  const candidate = separator === -1
    ? { kind: 'human', id: value }
    : { kind: value.slice(0, separator), id: value.slice(separator + 1) };
  return validate(actorSchema.required(), candidate);
}
