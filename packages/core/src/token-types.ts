import type { SourceSpan } from './source-location.js';

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Literals
  STRING: 'STRING',
  NUMBER: 'NUMBER',

  // Identifiers
  NAME: 'NAME',

  // Keywords
  AND: 'AND',
  BREAK: 'BREAK',
  DO: 'DO',
  ELSE: 'ELSE',
  ELSEIF: 'ELSEIF',
  END: 'END',
  FALSE: 'FALSE',
  FOR: 'FOR',
  FUNCTION: 'FUNCTION',
  IF: 'IF',
  IN: 'IN',
  LOCAL: 'LOCAL',
  NIL: 'NIL',
  NOT: 'NOT',
  OR: 'OR',
  REPEAT: 'REPEAT',
  RETURN: 'RETURN',
  THEN: 'THEN',
  TRUE: 'TRUE',
  UNTIL: 'UNTIL',
  WHILE: 'WHILE',

  // Arithmetic operators
  PLUS: 'PLUS', // +
  MINUS: 'MINUS', // -
  STAR: 'STAR', // *
  SLASH: 'SLASH', // /
  PERCENT: 'PERCENT', // %
  CARET: 'CARET', // ^
  HASH: 'HASH', // #

  // Comparison operators
  EQ: 'EQ', // ==
  NE: 'NE', // ~=
  LT: 'LT', // <
  GT: 'GT', // >
  LE: 'LE', // <=
  GE: 'GE', // >=

  // Assignment
  ASSIGN: 'ASSIGN', // =

  // Dots
  DOT: 'DOT', // .
  CONCAT: 'CONCAT', // ..
  ELLIPSIS: 'ELLIPSIS', // ...

  // Delimiters
  LPAREN: 'LPAREN', // (
  RPAREN: 'RPAREN', // )
  LBRACE: 'LBRACE', // {
  RBRACE: 'RBRACE', // }
  LBRACKET: 'LBRACKET', // [
  RBRACKET: 'RBRACKET', // ]
  SEMICOLON: 'SEMICOLON', // ;
  COLON: 'COLON', // :
  COMMA: 'COMMA', // ,

  // Special
  ERROR: 'ERROR',
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

export interface Token {
  readonly type: TokenType;
  /** Source text for names and punctuation, decoded text for strings */
  readonly value: string;
  readonly span: SourceSpan;
}
