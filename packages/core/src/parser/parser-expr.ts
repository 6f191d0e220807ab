/**
 * Parser Extension: Expression Parsing
 * Operator precedence chain, lowest first:
 * or, and, comparison, .., + -, * / %, unary, ^
 */

import { Parser } from './parser.js';
import type { BinaryOp, ExpNode, TokenType, UnaryOp } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { advance, current, makeSpan, match } from './state.js';

declare module './parser.js' {
  interface Parser {
    parseExpression(): ExpNode;
    parseOr(): ExpNode;
    parseAnd(): ExpNode;
    parseComparison(): ExpNode;
    parseConcat(): ExpNode;
    parseAdditive(): ExpNode;
    parseMultiplicative(): ExpNode;
    parseUnary(): ExpNode;
    parsePower(): ExpNode;
  }
}

// ============================================================
// OPERATOR TABLES
// ============================================================

const COMPARISON_OPS: Partial<Record<TokenType, BinaryOp>> = {
  [TOKEN_TYPES.LT]: 'Lt',
  [TOKEN_TYPES.GT]: 'Gt',
  [TOKEN_TYPES.LE]: 'Le',
  [TOKEN_TYPES.GE]: 'Ge',
  [TOKEN_TYPES.NE]: 'Ne',
  [TOKEN_TYPES.EQ]: 'Eq',
};

const ADDITIVE_OPS: Partial<Record<TokenType, BinaryOp>> = {
  [TOKEN_TYPES.PLUS]: 'Add',
  [TOKEN_TYPES.MINUS]: 'Sub',
};

const MULTIPLICATIVE_OPS: Partial<Record<TokenType, BinaryOp>> = {
  [TOKEN_TYPES.STAR]: 'Mul',
  [TOKEN_TYPES.SLASH]: 'Div',
  [TOKEN_TYPES.PERCENT]: 'Mod',
};

const UNARY_OPS: Partial<Record<TokenType, UnaryOp>> = {
  [TOKEN_TYPES.NOT]: 'Not',
  [TOKEN_TYPES.HASH]: 'Len',
  [TOKEN_TYPES.MINUS]: 'Neg',
};

function binary(op: BinaryOp, left: ExpNode, right: ExpNode): ExpNode {
  return {
    type: op,
    left,
    right,
    span: makeSpan(left.span.start, right.span.end),
  };
}

/** Parse a left-associative level whose operators come from `ops` */
function parseLeftAssoc(
  parser: Parser,
  ops: Partial<Record<TokenType, BinaryOp>>,
  operand: () => ExpNode
): ExpNode {
  let left = operand();
  for (;;) {
    const op = ops[current(parser.state).type];
    if (op === undefined) return left;
    advance(parser.state);
    left = binary(op, left, operand());
  }
}

// ============================================================
// PRECEDENCE CHAIN
// ============================================================

Parser.prototype.parseExpression = function (this: Parser): ExpNode {
  return this.parseOr();
};

Parser.prototype.parseOr = function (this: Parser): ExpNode {
  let left = this.parseAnd();
  while (match(this.state, TOKEN_TYPES.OR)) {
    left = binary('Or', left, this.parseAnd());
  }
  return left;
};

Parser.prototype.parseAnd = function (this: Parser): ExpNode {
  let left = this.parseComparison();
  while (match(this.state, TOKEN_TYPES.AND)) {
    left = binary('And', left, this.parseComparison());
  }
  return left;
};

/** Comparisons chain to the left: a < b < c is (a < b) < c */
Parser.prototype.parseComparison = function (this: Parser): ExpNode {
  return parseLeftAssoc(this, COMPARISON_OPS, () => this.parseConcat());
};

/** `..` is right-associative */
Parser.prototype.parseConcat = function (this: Parser): ExpNode {
  const left = this.parseAdditive();
  if (match(this.state, TOKEN_TYPES.CONCAT)) {
    return binary('Concat', left, this.parseConcat());
  }
  return left;
};

Parser.prototype.parseAdditive = function (this: Parser): ExpNode {
  return parseLeftAssoc(this, ADDITIVE_OPS, () => this.parseMultiplicative());
};

Parser.prototype.parseMultiplicative = function (this: Parser): ExpNode {
  return parseLeftAssoc(this, MULTIPLICATIVE_OPS, () => this.parseUnary());
};

/** -2^2 is -(2^2) */
Parser.prototype.parseUnary = function (this: Parser): ExpNode {
  const token = current(this.state);
  const op = UNARY_OPS[token.type];
  if (op === undefined) {
    return this.parsePower();
  }

  advance(this.state);
  const operand = this.parseUnary();
  return {
    type: op,
    operand,
    span: makeSpan(token.span.start, operand.span.end),
  };
};

/** `^` is right-associative and its right operand may be unary: 2^-1 */
Parser.prototype.parsePower = function (this: Parser): ExpNode {
  const base = this.parseSimpleExpression();
  if (match(this.state, TOKEN_TYPES.CARET)) {
    return binary('Pow', base, this.parseUnary());
  }
  return base;
};
