/**
 * Tokenizer
 * Main tokenization logic
 */

import type { Token } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import {
  advanceAndMakeToken,
  isDigit,
  isIdentifierStart,
  isWhitespace,
  makeToken,
} from './helpers.js';
import { SINGLE_CHAR_OPERATORS, TWO_CHAR_OPERATORS } from './operators.js';
import {
  longBracketLevel,
  readLongBracket,
  readLongString,
  readName,
  readNumber,
  readString,
} from './readers.js';
import {
  advance,
  createLexerState,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
  peekString,
} from './state.js';

/** Skip a `#` line at the very start of the source (shebang) */
export function skipShebang(state: LexerState): void {
  if (state.pos !== 0 || peek(state) !== '#') return;
  while (!isAtEnd(state) && peek(state) !== '\n') {
    advance(state);
  }
}

/** Skip a `--` comment; returns false when no comment starts here */
function skipComment(state: LexerState): boolean {
  if (peekString(state, 2) !== '--') {
    return false;
  }
  advance(state);
  advance(state);

  const level = longBracketLevel(state);
  if (level >= 0) {
    readLongBracket(state, level, 'comment');
    return true;
  }

  while (!isAtEnd(state) && peek(state) !== '\n') {
    advance(state);
  }
  return true;
}

function skipTrivia(state: LexerState): void {
  for (;;) {
    while (!isAtEnd(state) && isWhitespace(peek(state))) {
      advance(state);
    }
    if (!skipComment(state)) return;
  }
}

export function nextToken(state: LexerState): Token {
  skipTrivia(state);

  if (isAtEnd(state)) {
    const loc = currentLocation(state);
    return makeToken(TOKEN_TYPES.EOF, '', loc, loc);
  }

  const start = currentLocation(state);
  const ch = peek(state);

  if (ch === '"' || ch === "'") {
    return readString(state);
  }

  if (ch === '[') {
    const level = longBracketLevel(state);
    if (level >= 0) {
      return readLongString(state, level);
    }
  }

  if (isDigit(ch)) {
    return readNumber(state);
  }

  if (isIdentifierStart(ch)) {
    return readName(state);
  }

  if (peekString(state, 3) === '...') {
    return advanceAndMakeToken(state, 3, TOKEN_TYPES.ELLIPSIS, '...', start);
  }

  // Two-character operators (lookup table)
  const twoChar = peekString(state, 2);
  const twoCharType = TWO_CHAR_OPERATORS[twoChar];
  if (twoCharType) {
    return advanceAndMakeToken(state, 2, twoCharType, twoChar, start);
  }

  // Single-character operators (lookup table)
  const singleCharType = SINGLE_CHAR_OPERATORS[ch];
  if (singleCharType) {
    return advanceAndMakeToken(state, 1, singleCharType, ch, start);
  }

  // Unknown characters become ERROR tokens; the parser reports them
  return advanceAndMakeToken(state, 1, TOKEN_TYPES.ERROR, ch, start);
}

/** Scan the whole source, including the final EOF token */
export function tokenize(source: string): Token[] {
  const state = createLexerState(source);
  skipShebang(state);

  const tokens: Token[] = [];
  let token: Token;

  do {
    token = nextToken(state);
    tokens.push(token);
  } while (token.type !== TOKEN_TYPES.EOF);

  return tokens;
}
