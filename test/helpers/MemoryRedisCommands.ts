import fengari from 'fengari';
import type { LuaState } from 'fengari';
import type { RedisCommands, ScriptReply } from '../../src/storage/redisCommands.js';
import type { RedisScript, RedisScriptName } from '../../src/storage/redisScripts.js';

const { lua, lauxlib, lualib, to_luastring } = fengari;

type Hash = Map<string, string>;
type SortedSet = Map<string, number>;
type RedisValue = string | number | null | RedisValue[];

function at(values: string[], index: number): string {
  const value = values[index];
  if (value === undefined) {
    throw new Error(`Missing command argument ${index}`);
  }
  return value;
}

function parseScore(value: string): number {
  if (value === '-inf') return -Infinity;
  if (value === '+inf' || value === 'inf') return Infinity;
  return Number(value);
}

/**
 * In-process stand-in for Redis. The storage scripts run unchanged in an
 * embedded Lua VM whose `redis.call` reads and writes the maps below; a
 * script runs to completion synchronously, so like scripts on a real
 * server they never interleave.
 */
export class MemoryRedisCommands implements RedisCommands {
  private strings = new Map<string, string>();
  private hashes = new Map<string, Hash>();
  private zsets = new Map<string, SortedSet>();
  private sets = new Map<string, Set<string>>();
  private lists = new Map<string, string[]>();
  connected = false;
  scriptCalls: RedisScriptName[] = [];

  private readonly luaState = this.createLuaState();

  async connect(): Promise<void> {
    this.connected = true;
  }

  async quit(): Promise<void> {
    this.connected = false;
  }

  async ping(): Promise<string> {
    if (!this.connected) {
      throw new Error('The client is closed');
    }
    return 'PONG';
  }

  async get(key: string): Promise<string | null> {
    return this.strings.get(key) ?? null;
  }

  async setIfAbsent(key: string, value: string): Promise<boolean> {
    if (this.strings.has(key)) return false;
    this.strings.set(key, value);
    return true;
  }

  async del(key: string): Promise<number> {
    const existed = this.strings.delete(key) || this.hashes.delete(key);
    return existed ? 1 : 0;
  }

  async incr(key: string): Promise<number> {
    return this.incrSync(key);
  }

  async hGetAll(key: string): Promise<Record<string, string>> {
    return Object.fromEntries(this.hashes.get(key) ?? []);
  }

  async hSet(key: string, fields: Record<string, string>): Promise<number> {
    const hash = this.hash(key);
    let added = 0;
    for (const [field, value] of Object.entries(fields)) {
      if (!hash.has(field)) added++;
      hash.set(field, value);
    }
    return added;
  }

  async zAdd(key: string, score: number, member: string): Promise<number> {
    const zset = this.zset(key);
    const added = zset.has(member) ? 0 : 1;
    zset.set(member, score);
    return added;
  }

  async zRange(key: string, start: number, stop: number): Promise<string[]> {
    const members = this.sortedMembers(key);
    return members.slice(start, stop === -1 ? undefined : stop + 1);
  }

  async sAdd(key: string, member: string): Promise<number> {
    const set = this.sets.get(key) ?? new Set<string>();
    this.sets.set(key, set);
    const added = set.has(member) ? 0 : 1;
    set.add(member);
    return added;
  }

  async sRem(key: string, member: string): Promise<number> {
    return this.sets.get(key)?.delete(member) ? 1 : 0;
  }

  async sMembers(key: string): Promise<string[]> {
    return [...(this.sets.get(key) ?? [])];
  }

  async rPush(key: string, value: string): Promise<number> {
    const list = this.lists.get(key) ?? [];
    this.lists.set(key, list);
    list.push(value);
    return list.length;
  }

  async lRange(key: string, start: number, stop: number): Promise<string[]> {
    const list = this.lists.get(key) ?? [];
    return list.slice(start, stop === -1 ? undefined : stop + 1);
  }

  async runScript(script: RedisScript, keys: string[], args: string[]): Promise<ScriptReply> {
    this.scriptCalls.push(script.name);
    return this.evalScript(script.source, keys, args);
  }

  // Plumbing

  private hash(key: string): Hash {
    const existing = this.hashes.get(key);
    if (existing) return existing;
    const created: Hash = new Map();
    this.hashes.set(key, created);
    return created;
  }

  private zset(key: string): SortedSet {
    const existing = this.zsets.get(key);
    if (existing) return existing;
    const created: SortedSet = new Map();
    this.zsets.set(key, created);
    return created;
  }

  private sortedMembers(key: string): string[] {
    return [...(this.zsets.get(key) ?? new Map<string, number>())]
      .sort(([a, sa], [b, sb]) => sa - sb || (a < b ? -1 : a > b ? 1 : 0))
      .map(([member]) => member);
  }

  private incrSync(key: string): number {
    const next = Number(this.strings.get(key) ?? '0') + 1;
    this.strings.set(key, String(next));
    return next;
  }

  /**
   * The commands the storage scripts issue through `redis.call`.
   */
  private execute([command, ...args]: string[]): RedisValue {
    const key = at(args, 0);
    switch ((command ?? '').toUpperCase()) {
      case 'INCR':
        return this.incrSync(key);
      case 'HSET': {
        const hash = this.hash(key);
        let added = 0;
        for (let i = 1; i + 1 < args.length; i += 2) {
          if (!hash.has(at(args, i))) added++;
          hash.set(at(args, i), at(args, i + 1));
        }
        return added;
      }
      case 'HGET':
        return this.hashes.get(key)?.get(at(args, 1)) ?? null;
      case 'HMGET':
        return args.slice(1).map(field => this.hashes.get(key)?.get(field) ?? null);
      case 'ZADD': {
        const zset = this.zset(key);
        const member = at(args, 2);
        const added = zset.has(member) ? 0 : 1;
        zset.set(member, parseScore(at(args, 1)));
        return added;
      }
      case 'ZREM':
        return this.zsets.get(key)?.delete(at(args, 1)) ? 1 : 0;
      case 'ZRANGE': {
        const stop = Number(at(args, 2));
        return this.sortedMembers(key).slice(Number(at(args, 1)), stop === -1 ? undefined : stop + 1);
      }
      case 'ZRANGEBYSCORE': {
        const min = parseScore(at(args, 1));
        const max = parseScore(at(args, 2));
        return this.sortedMembers(key).filter(member => {
          const score = this.zsets.get(key)?.get(member) ?? NaN;
          return score >= min && score <= max;
        });
      }
      default:
        throw new Error(`Unsupported command ${command ?? ''} in script`);
    }
  }

  // Embedded Lua

  private createLuaState(): LuaState {
    const L = lauxlib.luaL_newstate();
    lualib.luaL_openlibs(L);
    // Redis embeds Lua 5.1, where unpack is a global
    this.runChunk(L, 'unpack = table.unpack');
    lua.lua_settop(L, 0);
    lua.lua_createtable(L, 0, 1);
    lua.lua_pushjsfunction(L, state => this.redisCall(state));
    lua.lua_setfield(L, -2, to_luastring('call'));
    lua.lua_setglobal(L, to_luastring('redis'));
    return L;
  }

  private runChunk(L: LuaState, source: string): void {
    const loaded = lauxlib.luaL_loadstring(L, to_luastring(source)) === lua.LUA_OK;
    if (!loaded || lua.lua_pcall(L, 0, 1, 0) !== lua.LUA_OK) {
      const message = lua.lua_tojsstring(L, -1);
      lua.lua_settop(L, 0);
      throw new Error(`Lua script failed: ${message}`);
    }
  }

  private evalScript(source: string, keys: string[], args: string[]): ScriptReply {
    const L = this.luaState;
    this.setStringArray(L, 'KEYS', keys);
    this.setStringArray(L, 'ARGV', args);
    this.runChunk(L, source);
    const reply = this.toReply(L, lua.lua_gettop(L));
    lua.lua_settop(L, 0);
    return reply;
  }

  private setStringArray(L: LuaState, name: string, values: string[]): void {
    lua.lua_createtable(L, values.length, 0);
    values.forEach((value, i) => {
      lua.lua_pushstring(L, to_luastring(value));
      lua.lua_rawseti(L, -2, i + 1);
    });
    lua.lua_setglobal(L, to_luastring(name));
  }

  private redisCall(L: LuaState): number {
    const argv: string[] = [];
    for (let i = 1; i <= lua.lua_gettop(L); i++) {
      argv.push(lua.lua_type(L, i) === lua.LUA_TNUMBER ? String(lua.lua_tonumber(L, i)) : lua.lua_tojsstring(L, i));
    }
    let reply: RedisValue;
    try {
      reply = this.execute(argv);
    } catch (error) {
      lua.lua_pushstring(L, to_luastring(error instanceof Error ? error.message : String(error)));
      return lua.lua_error(L);
    }
    this.pushValue(L, reply);
    return 1;
  }

  // Redis maps a nil bulk reply to false and arrays to 1-based tables
  private pushValue(L: LuaState, value: RedisValue): void {
    if (value === null) {
      lua.lua_pushboolean(L, false);
    } else if (typeof value === 'number') {
      lua.lua_pushinteger(L, value);
    } else if (typeof value === 'string') {
      lua.lua_pushstring(L, to_luastring(value));
    } else {
      lua.lua_createtable(L, value.length, 0);
      value.forEach((item, i) => {
        this.pushValue(L, item);
        lua.lua_rawseti(L, -2, i + 1);
      });
    }
  }

  // Script return values follow Redis: false is nil, numbers truncate to
  // integers, and a table is read up to its first nil.
  private toReply(L: LuaState, index: number): ScriptReply {
    const type = lua.lua_type(L, index);
    if (type === lua.LUA_TNUMBER) {
      return lua.lua_isinteger(L, index) ? lua.lua_tointeger(L, index) : Math.trunc(lua.lua_tonumber(L, index));
    }
    if (type === lua.LUA_TSTRING) {
      return lua.lua_tojsstring(L, index);
    }
    if (type === lua.LUA_TBOOLEAN) {
      return lua.lua_toboolean(L, index) ? 1 : null;
    }
    if (type !== lua.LUA_TTABLE) {
      return null;
    }
    const items: ScriptReply[] = [];
    for (let n = 1; lua.lua_rawgeti(L, index, n) !== lua.LUA_TNIL; n++) {
      items.push(this.toReply(L, lua.lua_gettop(L)));
      lua.lua_settop(L, -2);
    }
    lua.lua_settop(L, -2);
    return items;
  }
}
