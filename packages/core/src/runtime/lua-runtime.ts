/**
 * Lua Runtime
 *
 * Adapts the fengari interpreter to the ScriptStack boundary.
 * One LuaRuntime owns one interpreter state; every composition gets its own
 * and closes it once the result has been converted.
 */

import fengari from 'fengari';
import type {
  CallStatus,
  HostFunction,
  ScriptStack,
  ScriptType,
} from './types.js';

const { lua, lauxlib, lualib, to_luastring } = fengari;

const strictUtf8 = new TextDecoder('utf-8', { fatal: true });

/** A host error raised into a script, waiting to be taken back */
interface RaisedHostError {
  readonly message: string;
  readonly error: Error;
}

const TYPE_NAMES = new Map<number, ScriptType>([
  [lua.LUA_TNONE, 'none'],
  [lua.LUA_TNIL, 'nil'],
  [lua.LUA_TBOOLEAN, 'boolean'],
  [lua.LUA_TLIGHTUSERDATA, 'userdata'],
  [lua.LUA_TNUMBER, 'number'],
  [lua.LUA_TSTRING, 'string'],
  [lua.LUA_TTABLE, 'table'],
  [lua.LUA_TFUNCTION, 'function'],
  [lua.LUA_TUSERDATA, 'userdata'],
  [lua.LUA_TTHREAD, 'thread'],
]);

function toCallStatus(status: number): CallStatus {
  if (status === lua.LUA_OK) return 'ok';
  if (status === lua.LUA_ERRSYNTAX) return 'syntax';
  return 'runtime';
}

/**
 * Stack view over one interpreter thread.
 * Host functions invoked from a coroutine get a view over that coroutine.
 */
class LuaStack implements ScriptStack {
  constructor(
    private readonly L: fengari.lua_State,
    private readonly hostErrors: RaisedHostError[]
  ) {}

  top(): number {
    return lua.lua_gettop(this.L);
  }

  typeAt(index: number): ScriptType {
    return TYPE_NAMES.get(lua.lua_type(this.L, index)) ?? 'none';
  }

  toText(index: number): string {
    return lua.lua_tojsstring(this.L, index) ?? '';
  }

  toUtf8(index: number): string | undefined {
    const bytes = lua.lua_tostring(this.L, index);
    if (bytes === null) {
      return undefined;
    }
    try {
      return strictUtf8.decode(bytes);
    } catch (err) {
      if (err instanceof TypeError) {
        return undefined;
      }
      throw err;
    }
  }

  toNumber(index: number): number {
    return lua.lua_tonumber(this.L, index);
  }

  toBoolean(index: number): boolean {
    return lua.lua_toboolean(this.L, index);
  }

  tableIdentity(index: number): unknown {
    return lua.lua_topointer(this.L, index);
  }

  next(tableIndex: number): boolean {
    return Boolean(lua.lua_next(this.L, tableIndex));
  }

  pop(count = 1): void {
    lua.lua_pop(this.L, count);
  }

  pushNil(): void {
    lua.lua_pushnil(this.L);
  }

  pushValue(index: number): void {
    lua.lua_pushvalue(this.L, index);
  }

  pushString(value: string): void {
    lua.lua_pushstring(this.L, to_luastring(value));
  }

  pushFunction(fn: HostFunction): void {
    lua.lua_pushjsfunction(this.L, (T) =>
      fn(T === this.L ? this : new LuaStack(T, this.hostErrors))
    );
  }

  setField(tableIndex: number, name: string): void {
    lua.lua_setfield(this.L, tableIndex, to_luastring(name));
  }

  newScopeTable(): void {
    const L = this.L;
    lua.lua_newtable(L);
    const bindings = lua.lua_gettop(L);
    lua.lua_newtable(L);
    const host = lua.lua_gettop(L);

    // Copy every standard library binding into the host table
    lua.lua_pushglobaltable(L);
    lua.lua_pushnil(L);
    while (lua.lua_next(L, -2)) {
      lua.lua_pushvalue(L, -2);
      lua.lua_pushvalue(L, -2);
      lua.lua_rawset(L, host);
      lua.lua_pop(L, 1);
    }
    lua.lua_pop(L, 1);

    lua.lua_pushvalue(L, bindings);
    lua.lua_setfield(L, host, to_luastring('_G'));

    // bindings falls back to host for every name it does not hold itself
    lua.lua_newtable(L);
    lua.lua_pushvalue(L, host);
    lua.lua_setfield(L, -2, to_luastring('__index'));
    lua.lua_setmetatable(L, bindings);
  }

  load(source: string | Uint8Array, chunkName: string): CallStatus {
    const buffer = typeof source === 'string' ? to_luastring(source) : source;
    return toCallStatus(
      lauxlib.luaL_loadbuffer(
        this.L,
        buffer,
        buffer.length,
        to_luastring(chunkName)
      )
    );
  }

  setEnvironment(fnIndex: number): void {
    // Upvalue 1 of a main chunk is _ENV
    if (lua.lua_setupvalue(this.L, fnIndex, 1) === null) {
      lua.lua_pop(this.L, 1);
    }
  }

  protectedCall(nargs: number, nresults: number): CallStatus {
    return toCallStatus(lua.lua_pcall(this.L, nargs, nresults, 0));
  }

  errorMessage(index: number): string {
    const type = this.typeAt(index);
    if (type === 'string' || type === 'number') {
      return this.toText(index);
    }
    return `(error object is a ${type} value)`;
  }

  ref(): number {
    return lauxlib.luaL_ref(this.L, lua.LUA_REGISTRYINDEX);
  }

  pushRef(ref: number): void {
    lua.lua_rawgeti(this.L, lua.LUA_REGISTRYINDEX, ref);
  }

  unref(ref: number): void {
    lauxlib.luaL_unref(this.L, lua.LUA_REGISTRYINDEX, ref);
  }

  raise(message: string): never {
    this.pushString(message);
    return lua.lua_error(this.L);
  }

  raiseHostError(err: Error): never {
    this.hostErrors.push({ message: err.message, error: err });
    return this.raise(err.message);
  }

  hostErrorMark(): number {
    return this.hostErrors.length;
  }

  takeHostErrors(mark: number, message?: string): Error | undefined {
    const raised = this.hostErrors.splice(mark);
    if (message === undefined) {
      return undefined;
    }
    return raised.reverse().find((entry) => entry.message === message)?.error;
  }
}

/**
 * An interpreter state with the standard library opened in its global table.
 * Scope tables copy their bindings from that table.
 */
export class LuaRuntime {
  readonly stack: ScriptStack;
  private readonly L: fengari.lua_State;
  private closed = false;

  constructor() {
    this.L = lauxlib.luaL_newstate();
    lualib.luaL_openlibs(this.L);
    this.stack = new LuaStack(this.L, []);
  }

  /** Release the interpreter state. Safe to call more than once. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    lua.lua_close(this.L);
  }
}
