import { createClient } from 'redis';
import { StorageError } from '../types/index.js';
import type { RedisScript } from './redisScripts.js';

export type ScriptReply = string | number | null | ScriptReply[];

/**
 * The slice of Redis the storage provider uses. NodeRedisCommands backs it
 * with a real client; tests plug in an in-process implementation.
 */
export interface RedisCommands {
  connect(): Promise<void>;
  quit(): Promise<void>;
  ping(): Promise<string>;

  get(key: string): Promise<string | null>;
  /** SET NX: true when the key was created, false when it already existed. */
  setIfAbsent(key: string, value: string): Promise<boolean>;
  del(key: string): Promise<number>;
  incr(key: string): Promise<number>;

  hGetAll(key: string): Promise<Record<string, string>>;
  hSet(key: string, fields: Record<string, string>): Promise<number>;

  zAdd(key: string, score: number, member: string): Promise<number>;
  zRange(key: string, start: number, stop: number): Promise<string[]>;

  sAdd(key: string, member: string): Promise<number>;
  sRem(key: string, member: string): Promise<number>;
  sMembers(key: string): Promise<string[]>;

  rPush(key: string, value: string): Promise<number>;
  lRange(key: string, start: number, stop: number): Promise<string[]>;

  runScript(script: RedisScript, keys: string[], args: string[]): Promise<ScriptReply>;
}

export function toScriptReply(reply: unknown): ScriptReply {
  if (reply === null || reply === undefined) {
    return null;
  }
  if (typeof reply === 'string' || typeof reply === 'number') {
    return reply;
  }
  if (Buffer.isBuffer(reply)) {
    return reply.toString('utf8');
  }
  if (Array.isArray(reply)) {
    return reply.map(toScriptReply);
  }
  throw new StorageError(`Unexpected script reply of type ${typeof reply}`);
}

/**
 * RedisCommands over a node-redis client.
 */
export class NodeRedisCommands implements RedisCommands {
  private client: ReturnType<typeof createClient>;

  constructor(connectionString: string, database: number = 0) {
    this.client = createClient({
      url: connectionString,
      database,
    });
  }

  async connect(): Promise<void> {
    await this.client.connect();
  }

  async quit(): Promise<void> {
    await this.client.quit();
  }

  ping(): Promise<string> {
    return this.client.ping();
  }

  get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async setIfAbsent(key: string, value: string): Promise<boolean> {
    const reply = await this.client.set(key, value, { NX: true });
    return reply === 'OK';
  }

  del(key: string): Promise<number> {
    return this.client.del(key);
  }

  incr(key: string): Promise<number> {
    return this.client.incr(key);
  }

  hGetAll(key: string): Promise<Record<string, string>> {
    return this.client.hGetAll(key);
  }

  hSet(key: string, fields: Record<string, string>): Promise<number> {
    return this.client.hSet(key, fields);
  }

  zAdd(key: string, score: number, member: string): Promise<number> {
    return this.client.zAdd(key, { score, value: member });
  }

  zRange(key: string, start: number, stop: number): Promise<string[]> {
    return this.client.zRange(key, start, stop);
  }

  sAdd(key: string, member: string): Promise<number> {
    return this.client.sAdd(key, member);
  }

  sRem(key: string, member: string): Promise<number> {
    return this.client.sRem(key, member);
  }

  sMembers(key: string): Promise<string[]> {
    return this.client.sMembers(key);
  }

  rPush(key: string, value: string): Promise<number> {
    return this.client.rPush(key, value);
  }

  lRange(key: string, start: number, stop: number): Promise<string[]> {
    return this.client.lRange(key, start, stop);
  }

  async runScript(script: RedisScript, keys: string[], args: string[]): Promise<ScriptReply> {
    const reply: unknown = await this.client.eval(script.source, { keys, arguments: args });
    return toScriptReply(reply);
  }
}
