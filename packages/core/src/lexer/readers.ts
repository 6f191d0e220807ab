/**
 * Token Readers
 * Functions to read specific token types from source
 */

import type { Token } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { unterminatedLongBracket, unterminatedString } from './errors.js';
import {
  isDigit,
  isHexDigit,
  isIdentifierChar,
  makeToken,
} from './helpers.js';
import { KEYWORDS } from './operators.js';
import {
  advance,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
} from './state.js';

// ============================================================
// QUOTED STRINGS
// ============================================================

/**
 * Process the character after a backslash.
 * `\uXXXX` needs exactly four hex digits; anything else after the
 * backslash is kept as written.
 */
function processEscape(state: LexerState): string {
  const escaped = advance(state);
  switch (escaped) {
    case 'b':
      return '\b';
    case 'f':
      return '\f';
    case 'n':
      return '\n';
    case 'r':
      return '\r';
    case 't':
      return '\t';
    case 'u': {
      const hex = state.source.slice(state.pos, state.pos + 4);
      if (hex.length === 4 && [...hex].every(isHexDigit)) {
        for (let i = 0; i < 4; i++) advance(state);
        return String.fromCharCode(parseInt(hex, 16));
      }
      return 'u';
    }
    default:
      return escaped;
  }
}

/** Read a '...' or "..." string; the token value is the decoded text */
export function readString(state: LexerState): Token {
  const start = currentLocation(state);
  const quote = advance(state);

  let value = '';
  while (peek(state) !== quote) {
    if (isAtEnd(state) || peek(state) === '\n') {
      throw unterminatedString(start);
    }
    if (peek(state) === '\\') {
      advance(state);
      if (isAtEnd(state)) {
        throw unterminatedString(start);
      }
      value += processEscape(state);
    } else {
      value += advance(state);
    }
  }

  advance(state); // consume closing quote
  return makeToken(TOKEN_TYPES.STRING, value, start, currentLocation(state));
}

// ============================================================
// LONG BRACKETS
// ============================================================

/**
 * Level of a long bracket opening at the current position.
 * `[[` is level 0, `[==[` is level 2; -1 when no long bracket starts here.
 */
export function longBracketLevel(state: LexerState): number {
  if (peek(state) !== '[') return -1;
  let level = 0;
  while (peek(state, level + 1) === '=') level++;
  return peek(state, level + 1) === '[' ? level : -1;
}

/**
 * Read the body of a long bracket whose opening is at the current
 * position. No escapes are processed and a line break directly after the
 * opening bracket is dropped.
 */
export function readLongBracket(
  state: LexerState,
  level: number,
  kind: 'string' | 'comment'
): string {
  const start = currentLocation(state);
  for (let i = 0; i < level + 2; i++) advance(state);

  if (peek(state) === '\r' && peek(state, 1) === '\n') {
    advance(state);
    advance(state);
  } else if (peek(state) === '\n') {
    advance(state);
  }

  const close = `]${'='.repeat(level)}]`;
  const end = state.source.indexOf(close, state.pos);
  if (end === -1) {
    throw unterminatedLongBracket(kind, start);
  }

  const value = state.source.slice(state.pos, end);
  while (state.pos < end + close.length) advance(state);
  return value;
}

export function readLongString(state: LexerState, level: number): Token {
  const start = currentLocation(state);
  const value = readLongBracket(state, level, 'string');
  return makeToken(TOKEN_TYPES.STRING, value, start, currentLocation(state));
}

// ============================================================
// NUMBERS AND NAMES
// ============================================================

/** digits [ "." digits ]; a dot not followed by a digit is left alone */
export function readNumber(state: LexerState): Token {
  const start = currentLocation(state);
  let value = '';

  while (isDigit(peek(state))) {
    value += advance(state);
  }

  if (peek(state) === '.' && isDigit(peek(state, 1))) {
    value += advance(state);
    while (isDigit(peek(state))) {
      value += advance(state);
    }
  }

  return makeToken(TOKEN_TYPES.NUMBER, value, start, currentLocation(state));
}

export function readName(state: LexerState): Token {
  const start = currentLocation(state);
  let value = '';

  while (isIdentifierChar(peek(state))) {
    value += advance(state);
  }

  const keywordType = KEYWORDS[value];
  if (keywordType && Object.hasOwn(KEYWORDS, value)) {
    return makeToken(keywordType, value, start, currentLocation(state));
  }

  return makeToken(TOKEN_TYPES.NAME, value, start, currentLocation(state));
}
