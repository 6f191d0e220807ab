/**
 * Moonlet Runtime Tests: Metatables
 * Tests for operator events, index chains, __call and kind metatables
 */

import { describe, expect, it } from 'vitest';

import {
  builtin,
  createRuntimeContext,
  execute,
  LuaTable,
  parse,
  setMetatable,
} from '../../src/index.js';
import { run, runError } from '../helpers/runtime.js';

const VECTOR = `
  local V = {};
  local function vec(x, y) return setmetatable({x = x, y = y}, V) end;
  V.__add = function(a, b) return vec(a.x + b.x, a.y + b.y) end;
  V.__unm = function(a, b) return vec(-a.x, -b.y) end;
  V.__eq = function(a, b) return a.x == b.x and a.y == b.y end;
  V.__concat = function(a, b) return "(" .. a.x .. "," .. a.y .. ")" .. b end;
  V.__len = function(a) return a.x * a.x + a.y * a.y end;
`;

describe('Moonlet Runtime: Metatables', () => {
  describe('Operator events', () => {
    it('dispatches arithmetic to __add', () => {
      expect(run(`${VECTOR} local v = vec(1, 2) + vec(3, 4); return v.x, v.y`)).toEqual([
        4, 6,
      ]);
    });

    it('passes the operand twice to __unm', () => {
      expect(run(`${VECTOR} local v = -vec(1, 2); return v.x, v.y`)).toEqual([
        -1, -2,
      ]);
    });

    it('uses the second operand handler when the first has none', () => {
      const source = `
        local mt = {__mul = function(a, b) return "scaled " .. a end};
        local t = setmetatable({}, mt);
        return 3 * t
      `;
      expect(run(source)).toEqual(['scaled 3']);
    });

    it('calls __eq for distinct tables sharing the handler', () => {
      expect(
        run(`${VECTOR} return vec(1, 2) == vec(1, 2), vec(1, 2) ~= vec(2, 1)`)
      ).toEqual([true, true]);
    });

    it('skips __eq when only one operand has it', () => {
      expect(run(`${VECTOR} return vec(1, 2) == {x = 1, y = 2}`)).toEqual([false]);
    });

    it('dispatches .. to __concat', () => {
      expect(run(`${VECTOR} return vec(1, 2) .. "!"`)).toEqual(['(1,2)!']);
    });

    it('prefers __len over the border', () => {
      expect(run(`${VECTOR} return #vec(3, 4)`)).toEqual([25]);
    });
  });

  describe('Ordering events', () => {
    const VERSION = `
      local mt = {};
      mt.__lt = function(a, b) return a.n < b.n end;
      local function ver(n) return setmetatable({n = n}, mt) end;
    `;

    it('orders with __lt', () => {
      expect(run(`${VERSION} return ver(1) < ver(2), ver(2) > ver(1)`)).toEqual([
        true,
        true,
      ]);
    });

    it('answers <= as not (b < a) without __le', () => {
      expect(
        run(`${VERSION} return ver(1) <= ver(2), ver(2) <= ver(2), ver(3) <= ver(2)`)
      ).toEqual([true, true, false]);
    });

    it('prefers __le when present', () => {
      const source = `
        local mt = {__le = function() return "le" end, __lt = function() return false end};
        local a = setmetatable({}, mt);
        return a <= a, a >= a
      `;
      expect(run(source)).toEqual([true, true]);
    });

    it('answers > through __le alone', () => {
      const source = `
        local mt = {__le = function(a, b) return a.n <= b.n end};
        local a = setmetatable({n = 1}, mt);
        local b = setmetatable({n = 2}, mt);
        return a > b, b > a
      `;
      expect(run(source)).toEqual([false, true]);
    });

    it('answers >= through __lt alone', () => {
      expect(run(`${VERSION} return ver(2) >= ver(1), ver(1) >= ver(2)`)).toEqual([
        true,
        false,
      ]);
    });
  });

  describe('__index', () => {
    it('follows a two-level table chain and misses on the third', () => {
      const source = `
        local base = {greet = "hi"};
        local middle = setmetatable({level = 2}, {__index = base});
        local top = setmetatable({}, {__index = middle});
        return top.level, top.greet, top.absent
      `;
      expect(run(source)).toEqual([2, 'hi', null]);
    });

    it('calls a function handler with the table and key', () => {
      const source = `
        local t = setmetatable({}, {__index = function(t, k) return k .. "!" end});
        return t.word, t[1]
      `;
      expect(run(source)).toEqual(['word!', '1!']);
    });

    it('does not consult __index for present keys', () => {
      const source = `
        local t = setmetatable({a = 1}, {__index = function() return "fallback" end});
        return t.a
      `;
      expect(run(source)).toEqual([1]);
    });

    it('stops a cyclic chain at maxIndexDepth', () => {
      const source = 'local t = {}; setmetatable(t, {__index = t}); return t.x';
      expect(runError(source, { maxIndexDepth: 5 })).toMatchObject({
        errorId: 'MOON-R012',
        message: '__index chain exceeded 5 levels at 1:54',
        context: { event: '__index', limit: 5 },
      });
    });

    it('counts handler hops against maxIndexDepth', () => {
      const source = `
        local a = {v = "deep"};
        local b = setmetatable({}, {__index = a});
        local c = setmetatable({}, {__index = b});
        return c.v
      `;
      expect(run(source, { maxIndexDepth: 2 })).toEqual(['deep']);
      expect(runError(source, { maxIndexDepth: 1 })).toMatchObject({
        errorId: 'MOON-R012',
      });
    });
  });

  describe('__newindex', () => {
    it('redirects writes of absent keys', () => {
      const source = `
        local log = {};
        local t = setmetatable({}, {__newindex = function(t, k, v) log[k] = v * 10 end});
        t.a = 1;
        return t.a, log.a
      `;
      expect(run(source)).toEqual([null, 10]);
    });

    it('writes into a table handler', () => {
      const source = `
        local store = {};
        local proxy = setmetatable({}, {__newindex = store});
        proxy.k = "v";
        return proxy.k, store.k
      `;
      expect(run(source)).toEqual([null, 'v']);
    });

    it('writes present keys directly', () => {
      const source = `
        local hits = 0;
        local t = setmetatable({a = 1}, {__newindex = function() hits = hits + 1 end});
        t.a = 2;
        return t.a, hits
      `;
      expect(run(source)).toEqual([2, 0]);
    });
  });

  describe('__call', () => {
    it('calls the handler with the value prepended', () => {
      const source = `
        local callable = setmetatable({base = 100}, {__call = function(self, n) return self.base + n end});
        return callable(5)
      `;
      expect(run(source)).toEqual([105]);
    });
  });

  describe('Kind metatables', () => {
    it('gives strings methods through a host-installed __index', () => {
      const ctx = createRuntimeContext();
      const methods = new LuaTable();
      methods.set(
        'upper',
        builtin('upper', ([s = null]) => [typeof s === 'string' ? s.toUpperCase() : null])
      );
      const mt = new LuaTable();
      mt.set('__index', methods);
      setMetatable(ctx, 'any string', mt);

      const result = execute(parse('local s = "abc"; return s:upper()'), ctx);
      expect(result.values).toEqual(['ABC']);
    });

    it('shares one metatable across all numbers', () => {
      const ctx = createRuntimeContext();
      const mt = new LuaTable();
      mt.set(
        '__call',
        builtin('times', ([n = null, m = null]) => [
          typeof n === 'number' && typeof m === 'number' ? n * m : null,
        ])
      );
      setMetatable(ctx, 0, mt);

      expect(execute(parse('local six = 6; return six(7)'), ctx).values).toEqual([42]);
      expect(ctx.metatables.number).toBe(mt);
    });
  });
});
