/**
 * Operator Lookup Tables
 */

import type { TokenType } from '../types.js';
import { TOKEN_TYPES } from '../types.js';

/** Two-character operator lookup table */
export const TWO_CHAR_OPERATORS: Record<string, TokenType> = {
  '..': TOKEN_TYPES.CONCAT,
  '==': TOKEN_TYPES.EQ,
  '~=': TOKEN_TYPES.NE,
  '<=': TOKEN_TYPES.LE,
  '>=': TOKEN_TYPES.GE,
};

/** Single-character operator lookup table */
export const SINGLE_CHAR_OPERATORS: Record<string, TokenType> = {
  '.': TOKEN_TYPES.DOT,
  ':': TOKEN_TYPES.COLON,
  ',': TOKEN_TYPES.COMMA,
  ';': TOKEN_TYPES.SEMICOLON,
  '=': TOKEN_TYPES.ASSIGN,
  '<': TOKEN_TYPES.LT,
  '>': TOKEN_TYPES.GT,
  '(': TOKEN_TYPES.LPAREN,
  ')': TOKEN_TYPES.RPAREN,
  '{': TOKEN_TYPES.LBRACE,
  '}': TOKEN_TYPES.RBRACE,
  '[': TOKEN_TYPES.LBRACKET,
  ']': TOKEN_TYPES.RBRACKET,
  '+': TOKEN_TYPES.PLUS,
  '-': TOKEN_TYPES.MINUS,
  '*': TOKEN_TYPES.STAR,
  '/': TOKEN_TYPES.SLASH,
  '%': TOKEN_TYPES.PERCENT,
  '^': TOKEN_TYPES.CARET,
  '#': TOKEN_TYPES.HASH,
};

/** Keyword lookup table */
export const KEYWORDS: Record<string, TokenType> = {
  and: TOKEN_TYPES.AND,
  break: TOKEN_TYPES.BREAK,
  do: TOKEN_TYPES.DO,
  else: TOKEN_TYPES.ELSE,
  elseif: TOKEN_TYPES.ELSEIF,
  end: TOKEN_TYPES.END,
  false: TOKEN_TYPES.FALSE,
  for: TOKEN_TYPES.FOR,
  function: TOKEN_TYPES.FUNCTION,
  if: TOKEN_TYPES.IF,
  in: TOKEN_TYPES.IN,
  local: TOKEN_TYPES.LOCAL,
  nil: TOKEN_TYPES.NIL,
  not: TOKEN_TYPES.NOT,
  or: TOKEN_TYPES.OR,
  repeat: TOKEN_TYPES.REPEAT,
  return: TOKEN_TYPES.RETURN,
  then: TOKEN_TYPES.THEN,
  true: TOKEN_TYPES.TRUE,
  until: TOKEN_TYPES.UNTIL,
  while: TOKEN_TYPES.WHILE,
};
