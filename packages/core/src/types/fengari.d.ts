/**
 * Type declarations for fengari, which ships none.
 * Covers the subset of the Lua C API the runtime adapter uses.
 */

declare module 'fengari' {
  namespace fengari {
    /** Lua strings are byte arrays */
    type luastring = Uint8Array;

    /** Opaque interpreter state (main state or coroutine thread) */
    interface lua_State {
      readonly __lua_State: never;
    }

    /** Host function: reads arguments from L, pushes results, returns result count */
    type lua_JSFunction = (L: lua_State) => number;

    function to_luastring(str: string, cache?: boolean): luastring;

    namespace lua {
      const LUA_OK: number;
      const LUA_ERRSYNTAX: number;

      const LUA_TNONE: number;
      const LUA_TNIL: number;
      const LUA_TBOOLEAN: number;
      const LUA_TLIGHTUSERDATA: number;
      const LUA_TNUMBER: number;
      const LUA_TSTRING: number;
      const LUA_TTABLE: number;
      const LUA_TFUNCTION: number;
      const LUA_TUSERDATA: number;
      const LUA_TTHREAD: number;

      const LUA_REGISTRYINDEX: number;

      function lua_gettop(L: lua_State): number;
      function lua_pop(L: lua_State, n: number): void;

      function lua_type(L: lua_State, idx: number): number;
      function lua_tojsstring(L: lua_State, idx: number): string | null;
      function lua_tostring(L: lua_State, idx: number): luastring | null;
      /** Identity of a table, function or thread value; null for other types */
      function lua_topointer(L: lua_State, idx: number): object | null;
      function lua_tonumber(L: lua_State, idx: number): number;
      function lua_toboolean(L: lua_State, idx: number): boolean;
      function lua_next(L: lua_State, idx: number): number;

      function lua_pushnil(L: lua_State): void;
      function lua_pushvalue(L: lua_State, idx: number): void;
      function lua_pushstring(L: lua_State, s: luastring): luastring;
      function lua_pushjsfunction(L: lua_State, fn: lua_JSFunction): void;
      function lua_pushglobaltable(L: lua_State): void;
      function lua_newtable(L: lua_State): void;

      function lua_setfield(L: lua_State, idx: number, k: luastring): void;
      function lua_rawset(L: lua_State, idx: number): void;
      function lua_setmetatable(L: lua_State, objindex: number): boolean;
      function lua_rawgeti(L: lua_State, idx: number, n: number): number;
      function lua_setupvalue(
        L: lua_State,
        funcindex: number,
        n: number
      ): luastring | null;

      function lua_pcall(
        L: lua_State,
        nargs: number,
        nresults: number,
        msgh: number
      ): number;
      function lua_error(L: lua_State): never;
      function lua_close(L: lua_State): void;
    }

    namespace lauxlib {
      function luaL_newstate(): lua_State;
      function luaL_loadbuffer(
        L: lua_State,
        buff: luastring,
        size: number,
        name: luastring
      ): number;
      function luaL_ref(L: lua_State, t: number): number;
      function luaL_unref(L: lua_State, t: number, ref: number): void;
    }

    namespace lualib {
      function luaL_openlibs(L: lua_State): void;
    }
  }

  export = fengari;
}
