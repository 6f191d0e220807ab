/**
 * Moonlet Error Tests
 * Registry lookups, template rendering and error classes
 */

import { describe, expect, it } from 'vitest';

import {
  ControlFlowError,
  createError,
  ERROR_REGISTRY,
  formatLocation,
  isSyntaxError,
  LexerError,
  MoonletError,
  ParseError,
  renderMessage,
  RuntimeError,
} from '../../src/index.js';

const AT = { line: 3, column: 7, offset: 40 };

describe('Moonlet Errors', () => {
  describe('ERROR_REGISTRY', () => {
    it('holds every error definition', () => {
      expect(ERROR_REGISTRY.size).toBe(21);
      const ids = [...ERROR_REGISTRY.entries()].map(([id]) => id);
      expect(ids.filter((id) => id.startsWith('MOON-L'))).toEqual([
        'MOON-L001',
        'MOON-L002',
        'MOON-L003',
      ]);
      expect(ids.filter((id) => id.startsWith('MOON-P'))).toHaveLength(6);
      expect(ids.filter((id) => id.startsWith('MOON-R'))).toHaveLength(12);
    });

    it('files each definition under the category of its prefix', () => {
      const prefixes = { lexer: 'MOON-L', parse: 'MOON-P', runtime: 'MOON-R' };
      for (const [id, definition] of ERROR_REGISTRY.entries()) {
        expect(id.startsWith(prefixes[definition.category])).toBe(true);
      }
    });

    it('returns undefined for unknown IDs', () => {
      expect(ERROR_REGISTRY.get('MOON-X999')).toBeUndefined();
      expect(ERROR_REGISTRY.has('MOON-X999')).toBe(false);
    });
  });

  describe('renderMessage', () => {
    it('fills placeholders from the context', () => {
      const context = { operation: 'add', left: 'nil', right: 'number' };
      expect(renderMessage('Cannot {operation} {left} and {right}', context)).toBe(
        'Cannot add nil and number'
      );
    });

    it('renders missing placeholders as empty text', () => {
      expect(renderMessage('Variable {name} is not defined', {})).toBe(
        'Variable  is not defined'
      );
    });

    it('returns the template when a brace is unclosed', () => {
      expect(renderMessage('broken {name', { name: 'x' })).toBe('broken {name');
    });
  });

  describe('createError', () => {
    it('picks the class from the category', () => {
      const error = createError('MOON-R001', { name: 'foo' }, AT);
      expect(error).toBeInstanceOf(RuntimeError);
      expect(error.message).toBe('Variable foo is not defined at 3:7');
      expect(error.context).toEqual({ name: 'foo' });
    });

    it('places syntax errors at the origin without a location', () => {
      const error = createError('MOON-L002', { char: '@' });
      expect(error).toBeInstanceOf(LexerError);
      expect(error.location).toEqual({ line: 1, column: 1, offset: 0 });
    });

    it('leaves runtime errors without a location when none is given', () => {
      const error = createError('MOON-R008', { type: 'nil' });
      expect(error.message).toBe('Cannot call nil value');
      expect(error.location).toBeUndefined();
    });

    it('rejects unknown IDs', () => {
      expect(() => createError('MOON-R999', {})).toThrow(
        new TypeError('Unknown error ID: MOON-R999')
      );
    });
  });

  describe('Error classes', () => {
    it('checks the category of the ID', () => {
      expect(() => new ParseError('MOON-R001', 'x', AT)).toThrow(
        new TypeError('Expected parse error ID, got: MOON-R001')
      );
      expect(() => new RuntimeError('MOON-L001', 'x')).toThrow(
        new TypeError('Expected runtime error ID, got: MOON-L001')
      );
    });

    it('requires an errorId', () => {
      expect(() => new MoonletError({ errorId: '', message: 'x' })).toThrow(
        new TypeError('errorId is required')
      );
    });

    it('names each class', () => {
      expect(new LexerError('MOON-L001', 'm', AT).name).toBe('LexerError');
      expect(new ParseError('MOON-P001', 'm', AT).name).toBe('ParseError');
      expect(new RuntimeError('MOON-R001', 'm').name).toBe('RuntimeError');
      expect(new ControlFlowError('function').name).toBe('ControlFlowError');
    });

    it('describes the boundary a break escaped', () => {
      const error = new ControlFlowError('chunk', AT);
      expect(error).toBeInstanceOf(RuntimeError);
      expect(error.errorId).toBe('MOON-R011');
      expect(error.boundary).toBe('chunk');
      expect(error.message).toBe('break escaped chunk without an enclosing loop at 3:7');
    });
  });

  describe('toData and format', () => {
    it('strips the location suffix from the data message', () => {
      const error = new RuntimeError('MOON-R001', 'Variable x is not defined', AT, {
        name: 'x',
      });
      expect(error.toData()).toEqual({
        errorId: 'MOON-R001',
        message: 'Variable x is not defined',
        location: AT,
        context: { name: 'x' },
      });
    });

    it('formats with the message by default', () => {
      const error = new ParseError('MOON-P003', 'Bad statement', AT);
      expect(error.format()).toBe('Bad statement at 3:7');
    });

    it('formats with a host formatter', () => {
      const error = new ParseError('MOON-P003', 'Bad statement', AT);
      const text = error.format(
        (data) => `[${data.errorId}] ${data.message} (${data.location ? formatLocation(data.location) : '?'})`
      );
      expect(text).toBe('[MOON-P003] Bad statement (3:7)');
    });
  });

  describe('Call stack recording', () => {
    it('keeps only the first snapshot', () => {
      const error = new RuntimeError('MOON-R008', 'Cannot call nil value');
      const inner = [{ location: { start: AT, end: AT }, functionName: 'inner' }];
      error.recordCallStack(inner);
      error.recordCallStack([]);
      expect(error.callStack).toEqual(inner);
      expect(error.context).toEqual({ callStack: inner });
    });
  });

  describe('isSyntaxError', () => {
    it('matches lexer and parse errors only', () => {
      expect(isSyntaxError(new LexerError('MOON-L001', 'm', AT))).toBe(true);
      expect(isSyntaxError(new ParseError('MOON-P002', 'm', AT))).toBe(true);
      expect(isSyntaxError(new RuntimeError('MOON-R001', 'm'))).toBe(false);
      expect(isSyntaxError(new Error('m'))).toBe(false);
    });
  });
});
