import { promises as fs } from 'fs';
import { constants } from 'fs';
import { createHash } from 'crypto';
import path from 'path';

/**
 * File utilities for atomic operations and safe file handling
 */

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function isMissing(error: unknown): boolean {
  return isNodeError(error) && error.code === 'ENOENT';
}

export async function ensureDirectory(dirPath: string): Promise<void> {
  try {
    await fs.access(dirPath, constants.F_OK);
  } catch {
    await fs.mkdir(dirPath, { recursive: true });
  }
}

/**
 * Write data to a file atomically using temp file + rename
 */
export async function writeFileAtomic(filePath: string, data: string | Buffer): Promise<void> {
  const tempPath = `${filePath}.tmp.${Date.now()}.${Math.random().toString(36).slice(2, 11)}`;

  try {
    await ensureDirectory(path.dirname(filePath));
    await fs.writeFile(tempPath, data);
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await removeFileSafe(tempPath);
    throw error;
  }
}

/**
 * Create a file that must not exist yet. Fails with EEXIST otherwise.
 */
export async function writeFileExclusive(filePath: string, data: string): Promise<void> {
  await ensureDirectory(path.dirname(filePath));
  await fs.writeFile(filePath, data, { encoding: 'utf8', flag: 'wx' });
}

/**
 * Read a file safely, returning null if it doesn't exist
 */
export async function readFileSafe(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isMissing(error)) {
      return null;
    }
    throw error;
  }
}

export async function readBufferSafe(filePath: string): Promise<Buffer | null> {
  try {
    return await fs.readFile(filePath);
  } catch (error) {
    if (isMissing(error)) {
      return null;
    }
    throw error;
  }
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * List all files in a directory with a specific extension
 */
export async function listFiles(dirPath: string, extension: string): Promise<string[]> {
  try {
    const files = await fs.readdir(dirPath);
    return files
      .filter(file => file.endsWith(extension))
      .map(file => path.join(dirPath, file));
  } catch (error) {
    if (isMissing(error)) {
      return [];
    }
    throw error;
  }
}

/**
 * Remove a file safely (no error if it doesn't exist)
 */
export async function removeFileSafe(filePath: string): Promise<void> {
  try {
    await fs.unlink(filePath);
  } catch (error) {
    if (!isMissing(error)) {
      throw error;
    }
  }
}

/**
 * sha256 hex digest; the empty string stands for "no file".
 */
export function hashContent(content: string | Buffer): string {
  return createHash('sha256').update(content).digest('hex');
}

export async function hashFile(filePath: string): Promise<string> {
  const content = await readBufferSafe(filePath);
  return content === null ? '' : hashContent(content);
}
