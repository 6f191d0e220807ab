/**
 * Parser State
 * Core state management and token navigation utilities
 */

import type { SourceLocation, SourceSpan, Token } from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';
import { invalidCharacter } from '../lexer/errors.js';
import type { Scanner } from '../lexer/scanner.js';

// ============================================================
// PARSER STATE
// ============================================================

export interface ParserState {
  readonly scanner: Scanner;
  /** End of the most recently consumed token */
  lastEnd: SourceLocation;
}

export function createParserState(scanner: Scanner): ParserState {
  return {
    scanner,
    lastEnd: scanner.token.span.start,
  };
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

/**
 * Current token. ERROR tokens from the scanner surface here as
 * lexer errors.
 * @internal
 */
export function current(state: ParserState): Token {
  const token = state.scanner.token;
  if (token.type === TOKEN_TYPES.ERROR) {
    throw invalidCharacter(token.value, token.span.start);
  }
  return token;
}

/** @internal */
export function peek(state: ParserState, offset = 1): Token {
  return state.scanner.peek(offset);
}

/** @internal */
export function isAtEnd(state: ParserState): boolean {
  return current(state).type === TOKEN_TYPES.EOF;
}

/** @internal */
export function check(state: ParserState, ...types: string[]): boolean {
  return types.includes(current(state).type);
}

/** @internal */
export function advance(state: ParserState): Token {
  const token = current(state);
  state.scanner.advance();
  state.lastEnd = token.span.end;
  return token;
}

/**
 * Consume the current token when it has the given type.
 * @internal
 */
export function match(state: ParserState, type: string): boolean {
  if (!check(state, type)) return false;
  advance(state);
  return true;
}

/**
 * Consume a token of the given type or fail with MOON-P001.
 * `expected` names the token in the message, e.g. "'then'".
 * @internal
 */
export function expect(
  state: ParserState,
  type: string,
  expected: string
): Token {
  if (check(state, type)) return advance(state);
  const token = current(state);
  const actual = describeToken(token);
  const hint = generateHint(type, token);
  const message = `Expected ${expected}, got '${actual}'`;
  throw new ParseError(
    'MOON-P001',
    hint ? `${message}. ${hint}` : message,
    token.span.start,
    { expected, actual }
  );
}

/** @internal */
export function makeSpan(
  start: SourceLocation,
  end: SourceLocation
): SourceSpan {
  return { start, end };
}

/**
 * Span from `start` to the end of the last consumed token.
 * @internal
 */
export function spanFrom(state: ParserState, start: SourceLocation): SourceSpan {
  return makeSpan(start, state.lastEnd);
}

/** Source-like rendering of a token for error messages */
export function describeToken(token: Token): string {
  switch (token.type) {
    case TOKEN_TYPES.EOF:
      return '<eof>';
    case TOKEN_TYPES.STRING:
      return JSON.stringify(token.value);
    default:
      return token.value;
  }
}

// ============================================================
// ERROR HINTS
// ============================================================

/**
 * Generate contextual hints for common parse errors.
 * @internal
 */
function generateHint(expectedType: string, actualToken: Token): string | null {
  const actual = actualToken.type;

  if (expectedType === TOKEN_TYPES.RPAREN && actual === TOKEN_TYPES.EOF) {
    return 'Hint: Check for unclosed parenthesis';
  }
  if (expectedType === TOKEN_TYPES.RBRACE && actual === TOKEN_TYPES.EOF) {
    return 'Hint: Check for unclosed brace';
  }
  if (expectedType === TOKEN_TYPES.RBRACKET && actual === TOKEN_TYPES.EOF) {
    return 'Hint: Check for unclosed bracket';
  }
  if (expectedType === TOKEN_TYPES.END && actual === TOKEN_TYPES.EOF) {
    return "Hint: Every 'do', 'then' and 'function' needs a matching 'end'";
  }
  if (expectedType === TOKEN_TYPES.SEMICOLON) {
    return "Hint: Separate statements with ';'";
  }
  if (expectedType === TOKEN_TYPES.THEN && actual === TOKEN_TYPES.DO) {
    return "Hint: 'if' conditions are followed by 'then'";
  }

  return null;
}
