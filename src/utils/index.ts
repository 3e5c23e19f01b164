export * from './fileUtils.js';
export * from './validation.js';

/**
 * Generate a correlation ID for log tracking
 */
export function generateCorrelationId(): string {
  return Math.random().toString(36).slice(2, 11);
}

/**
 * Keyed async mutex. Calls sharing a key run one at a time, in arrival order;
 * different keys never wait on each other.
 */
export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => {};
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Count of UTF-8 bytes, the unit every size limit is expressed in.
 */
export function utf8ByteLength(text: string): number {
  return Buffer.byteLength(text, 'utf8');
}

/**
 * Source of the current time. Services take one so tests can pin it.
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
