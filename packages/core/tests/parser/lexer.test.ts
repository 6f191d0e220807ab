/**
 * Moonlet Lexer Tests
 * Token stream, trivia, literals and scan errors
 */

import { describe, expect, it } from 'vitest';

import { LexerError, Scanner, TOKEN_TYPES, tokenize } from '../../src/index.js';

function types(source: string): string[] {
  return tokenize(source).map((t) => t.type);
}

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected a throw');
}

function values(source: string): string[] {
  return tokenize(source)
    .filter((t) => t.type !== TOKEN_TYPES.EOF)
    .map((t) => t.value);
}

describe('Moonlet Lexer', () => {
  describe('Punctuation', () => {
    it('takes the longest operator match', () => {
      expect(values('... .. . <= < >= > == = ~=')).toEqual([
        '...',
        '..',
        '.',
        '<=',
        '<',
        '>=',
        '>',
        '==',
        '=',
        '~=',
      ]);
    });

    it('scans every single-character token', () => {
      expect(types('+-*/%^#(){}[];:,')).toEqual([
        'PLUS',
        'MINUS',
        'STAR',
        'SLASH',
        'PERCENT',
        'CARET',
        'HASH',
        'LPAREN',
        'RPAREN',
        'LBRACE',
        'RBRACE',
        'LBRACKET',
        'RBRACKET',
        'SEMICOLON',
        'COLON',
        'COMMA',
        'EOF',
      ]);
    });
  });

  describe('Names and keywords', () => {
    it('classifies keywords', () => {
      expect(types('local function end while')).toEqual([
        'LOCAL',
        'FUNCTION',
        'END',
        'WHILE',
        'EOF',
      ]);
    });

    it('reads names with digits and underscores', () => {
      const tokens = tokenize('_a1 endx');
      expect(tokens.map((t) => [t.type, t.value])).toEqual([
        ['NAME', '_a1'],
        ['NAME', 'endx'],
        ['EOF', ''],
      ]);
    });

    it('does not treat object properties as keywords', () => {
      expect(types('constructor toString')).toEqual(['NAME', 'NAME', 'EOF']);
    });
  });

  describe('Numbers', () => {
    it('reads digits with an optional fraction', () => {
      expect(values('12 3.5 0.25')).toEqual(['12', '3.5', '0.25']);
    });

    it('leaves a dot without digits for the next token', () => {
      expect(types('1..2')).toEqual(['NUMBER', 'CONCAT', 'NUMBER', 'EOF']);
    });
  });

  describe('Trivia', () => {
    it('skips line comments', () => {
      expect(types('a -- note\nb')).toEqual(['NAME', 'NAME', 'EOF']);
    });

    it('skips block comments of any level', () => {
      expect(types('a --[[ one\ntwo ]] b --[==[ ]] ]==] c')).toEqual([
        'NAME',
        'NAME',
        'NAME',
        'EOF',
      ]);
    });

    it('skips a shebang line', () => {
      expect(values('#!/usr/bin/env moon\nx')).toEqual(['x']);
    });

    it('keeps # elsewhere as the length operator', () => {
      expect(types(' #t')).toEqual(['HASH', 'NAME', 'EOF']);
    });

    it('skips vertical tab and form feed', () => {
      expect(types('a\v\fb')).toEqual(['NAME', 'NAME', 'EOF']);
    });
  });

  describe('Locations', () => {
    it('records line, column and offset', () => {
      const tokens = tokenize('local x\n  = 1');
      expect(tokens[2]?.span.start).toEqual({ line: 2, column: 3, offset: 10 });
      expect(tokens[3]?.span).toEqual({
        start: { line: 2, column: 5, offset: 12 },
        end: { line: 2, column: 6, offset: 13 },
      });
    });
  });

  describe('Errors', () => {
    it('yields ERROR tokens for unknown characters and keeps going', () => {
      const tokens = tokenize('a @ b');
      expect(tokens.map((t) => t.type)).toEqual(['NAME', 'ERROR', 'NAME', 'EOF']);
      expect(tokens[1]?.value).toBe('@');
      expect(tokens[1]?.span.start.offset).toBe(2);
    });

    it('fails on a line break inside a quoted string', () => {
      const error = thrown(() => tokenize('x = "abc\n"'));
      expect(error).toBeInstanceOf(LexerError);
      expect(error).toMatchObject({
        errorId: 'MOON-L001',
        message: 'Unterminated string literal at 1:5',
      });
    });

    it('fails on a string cut off by end of input', () => {
      expect(() => tokenize("'abc")).toThrow('Unterminated string literal at 1:1');
    });

    it('fails on an unterminated long string', () => {
      expect(() => tokenize('s = [==[ text ]]')).toThrow(
        'Unterminated long string at 1:5'
      );
    });

    it('fails on an unterminated block comment', () => {
      expect(thrown(() => tokenize('--[[ open'))).toMatchObject({
        errorId: 'MOON-L003',
        message: 'Unterminated long comment at 1:3',
        context: { kind: 'comment' },
      });
    });
  });

  describe('Scanner', () => {
    it('pulls tokens on demand', () => {
      const scanner = new Scanner('local a = 1');
      expect(scanner.token.type).toBe('LOCAL');
      expect(scanner.peek().value).toBe('a');
      expect(scanner.peek(2).type).toBe('ASSIGN');
      expect(scanner.advance().type).toBe('LOCAL');
      expect(scanner.token.value).toBe('a');
    });

    it('stays on EOF', () => {
      const scanner = new Scanner('x');
      scanner.advance();
      expect(scanner.token.type).toBe('EOF');
      expect(scanner.advance().type).toBe('EOF');
      expect(scanner.peek(5).type).toBe('EOF');
    });

    it('reads a leading # as an operator unless asked to skip a shebang', () => {
      expect(new Scanner('#t').token.type).toBe('HASH');
      const chunk = new Scanner('#!/usr/bin/env moon\nx', { skipShebang: true });
      expect(chunk.token.value).toBe('x');
    });
  });
});
