/**
 * Moonlet Call Stack Tests
 * Frame tracking at script call sites and capture on runtime errors
 */

import { describe, expect, it } from 'vitest';

import {
  createRuntimeContext,
  getCallStack,
  LexerError,
  popCallFrame,
  pushCallFrame,
  RuntimeError,
  type CallFrame,
} from '../../src/index.js';
import { runError, runFull } from '../helpers/runtime.js';

const NESTED =
  'local function inner() local n = nil; return n() end; ' +
  'local function outer() return inner() end; outer()';

function frame(name: string, offset: number): CallFrame {
  const location = { line: 1, column: offset + 1, offset };
  return { location: { start: location, end: location }, functionName: name };
}

function failure(source: string, maxCallStackDepth?: number): RuntimeError {
  const error = runError(
    source,
    maxCallStackDepth === undefined ? {} : { maxCallStackDepth }
  );
  if (!(error instanceof RuntimeError)) throw new Error('Expected RuntimeError');
  return error;
}

describe('Moonlet Call Stack', () => {
  describe('pushCallFrame and popCallFrame', () => {
    it('pushes innermost last', () => {
      const ctx = createRuntimeContext();
      pushCallFrame(ctx, frame('a', 0));
      pushCallFrame(ctx, frame('b', 1));
      expect(ctx.callStack.map((f) => f.functionName)).toEqual(['a', 'b']);
      popCallFrame(ctx);
      expect(ctx.callStack.map((f) => f.functionName)).toEqual(['a']);
    });

    it('drops the oldest frame beyond the cap', () => {
      const ctx = createRuntimeContext({ maxCallStackDepth: 2 });
      pushCallFrame(ctx, frame('a', 0));
      pushCallFrame(ctx, frame('b', 1));
      pushCallFrame(ctx, frame('c', 2));
      expect(ctx.callStack.map((f) => f.functionName)).toEqual(['b', 'c']);
    });

    it('ignores a pop on an empty stack', () => {
      const ctx = createRuntimeContext();
      popCallFrame(ctx);
      expect(ctx.callStack).toEqual([]);
    });
  });

  describe('Errors in nested calls', () => {
    it('records every active call site', () => {
      const error = failure(NESTED);
      expect(error.errorId).toBe('MOON-R008');
      expect(error.message).toBe('Cannot call nil value at 1:46');
      expect(getCallStack(error).map((f) => f.functionName)).toEqual([
        'outer',
        'inner',
        'n',
      ]);
    });

    it('spans each call expression', () => {
      const [outer, inner, call] = getCallStack(failure(NESTED));
      expect(outer?.location.start.column).toBe(98);
      expect(inner?.location).toEqual({
        start: { line: 1, column: 85, offset: 84 },
        end: { line: 1, column: 92, offset: 91 },
      });
      expect(call?.location.end.offset).toBe(48);
    });

    it('keeps only the newest frames under a small cap', () => {
      const error = failure(NESTED, 2);
      expect(getCallStack(error).map((f) => f.functionName)).toEqual(['inner', 'n']);
    });

    it('names method and dotted calls', () => {
      const source =
        'local obj = {util = {}}; function obj.util.fail() return nil + 1 end; ' +
        'function obj:run() return obj.util.fail() end; obj:run()';
      expect(getCallStack(failure(source)).map((f) => f.functionName)).toEqual([
        'obj:run',
        'obj.util.fail',
      ]);
    });

    it('leaves the name out for computed callees', () => {
      const source = 'local fs = {function() return #nil end}; fs[1]()';
      expect(getCallStack(failure(source))).toEqual([
        {
          location: {
            start: { line: 1, column: 42, offset: 41 },
            end: { line: 1, column: 49, offset: 48 },
          },
          functionName: undefined,
        },
      ]);
    });

    it('is empty once calls return', () => {
      const { ctx } = runFull('local function ok() return 1 end; ok(); ok()');
      expect(ctx.callStack).toEqual([]);
    });

    it('has no frames for errors outside any call', () => {
      expect(getCallStack(failure('local x = nil + 1'))).toEqual([]);
    });
  });

  describe('getCallStack', () => {
    it('returns a copy', () => {
      const error = failure(NESTED);
      const frames = getCallStack(error);
      expect(frames).not.toBe(error.callStack);
      expect(frames).toEqual(error.callStack);
    });

    it('returns nothing for syntax errors', () => {
      const error = new LexerError('MOON-L001', 'Unterminated string literal', {
        line: 1,
        column: 1,
        offset: 0,
      });
      expect(getCallStack(error)).toEqual([]);
    });
  });
});
