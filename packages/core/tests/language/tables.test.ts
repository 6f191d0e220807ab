/**
 * Moonlet Runtime Tests: Tables
 * Tests for constructors, indexing, assignment and length
 */

import { describe, expect, it } from 'vitest';

import { LuaTable } from '../../src/index.js';
import { run, runError } from '../helpers/runtime.js';

describe('Moonlet Runtime: Tables', () => {
  describe('Constructors', () => {
    it('stores positional fields from 1', () => {
      const [table] = run('return {"a", "b", "c"}');
      expect(table).toBeInstanceOf(LuaTable);
      if (!(table instanceof LuaTable)) return;
      expect([table.get(1), table.get(2), table.get(3)]).toEqual(['a', 'b', 'c']);
      expect(table.size).toBe(3);
    });

    it('mixes keyed and positional fields', () => {
      expect(
        run('local t = {x = 1, "first", ["y"] = 2; "second"}; return t[1], t[2], t.x, t.y')
      ).toEqual(['first', 'second', 1, 2]);
    });

    it('counts positions independently of keyed fields', () => {
      expect(run('local t = {[1] = "keyed", "positional"}; return t[1]')).toEqual([
        'positional',
      ]);
    });

    it('allows a trailing separator', () => {
      expect(run('return #{1, 2, 3,}')).toEqual([3]);
    });

    it('expands a call in the last positional field', () => {
      expect(
        run('local function three() return 1, 2, 3 end; return #{three()}, #{three(), 10}')
      ).toEqual([3, 2]);
    });

    it('appends past a nil positional value', () => {
      expect(run('local t = {1, nil, 3}; return t[1], t[2], t[3], #t')).toEqual([
        1,
        3,
        null,
        2,
      ]);
    });

    it('appends positional values after keys already set', () => {
      expect(run('local t = {[1] = 5, 7}; return t[1], t[2], #t')).toEqual([5, 7, 2]);
    });

    it('lets a later keyed field replace a positional value', () => {
      expect(run('local t = {7, [1] = 5}; return t[1], #t')).toEqual([5, 1]);
    });

    it('rejects a nil key', () => {
      expect(runError('local t = {[nil] = 1}')).toMatchObject({
        errorId: 'MOON-R010',
        message: 'Table index is nil at 1:13',
      });
    });
  });

  describe('Indexing', () => {
    it('reads absent keys as nil', () => {
      expect(run('local t = {}; return t.missing, t[1]')).toEqual([null, null]);
    });

    it('writes through fields and computed keys', () => {
      expect(
        run('local t = {}; t.a = 1; t["b"] = 2; t[1 + 1] = "two"; return t.a + t.b, t[2]')
      ).toEqual([3, 'two']);
    });

    it('distinguishes number and string keys', () => {
      expect(run('local t = {}; t[1] = "n"; t["1"] = "s"; return t[1], t["1"]')).toEqual([
        'n',
        's',
      ]);
    });

    it('uses tables as keys by identity', () => {
      expect(
        run('local k = {}; local t = {}; t[k] = "found"; return t[k], t[{}]')
      ).toEqual(['found', null]);
    });

    it('removes a key when assigned nil', () => {
      expect(run('local t = {1, 2, 3}; t[3] = nil; return #t')).toEqual([2]);
    });

    it('rejects a NaN key on write', () => {
      expect(runError('local t = {}; t[0 / 0] = 1')).toMatchObject({
        errorId: 'MOON-R010',
        context: { key: 'NaN' },
      });
    });

    it('fails to index nil', () => {
      expect(runError('local a = nil; return a.b')).toMatchObject({
        errorId: 'MOON-R006',
        message: 'Cannot index nil value with key b at 1:23',
      });
    });

    it('fails to assign into a number', () => {
      expect(runError('local n = 1; n.x = 2')).toMatchObject({
        errorId: 'MOON-R007',
        message: 'Cannot set key x on number value at 1:14',
      });
    });

    it('shares tables between holders', () => {
      expect(run('local a = {}; local b = a; b.v = 5; return a.v')).toEqual([5]);
    });
  });
});
