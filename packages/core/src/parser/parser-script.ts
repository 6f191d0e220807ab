/**
 * Parser Extension: Blocks and Statements
 * Chunk and block structure, statement dispatch, assignments
 */

import { Parser } from './parser.js';
import type {
  AssignTarget,
  BlockNode,
  ExpNode,
  SourceLocation,
  StatNode,
} from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  current,
  expect,
  makeSpan,
  match,
  spanFrom,
} from './state.js';

declare module './parser.js' {
  interface Parser {
    parseChunk(): BlockNode;
    parseBlock(): BlockNode;
    isBlockEnd(): boolean;
    parseStatement(): StatNode;
    parseExpressionStatement(): StatNode;
    parseAssignment(first: ExpNode, start: SourceLocation): StatNode;
    parseLocal(start: SourceLocation): StatNode;
    parseReturn(): StatNode;
    parseExpList(): ExpNode[];
    parseExpressionToEnd(): ExpNode;
  }
}

// ============================================================
// CHUNKS AND BLOCKS
// ============================================================

Parser.prototype.parseChunk = function (this: Parser): BlockNode {
  const block = this.parseBlock();
  expect(this.state, TOKEN_TYPES.EOF, '<eof>');
  return block;
};

/**
 * block := { ";" } [ stat { ";" { ";" } stat } { ";" } ]
 * Statements must be separated by at least one semicolon.
 */
Parser.prototype.parseBlock = function (this: Parser): BlockNode {
  const start = current(this.state).span.start;
  const statements: StatNode[] = [];

  while (match(this.state, TOKEN_TYPES.SEMICOLON));

  while (!this.isBlockEnd()) {
    statements.push(this.parseStatement());
    if (this.isBlockEnd()) break;
    expect(this.state, TOKEN_TYPES.SEMICOLON, "';'");
    while (match(this.state, TOKEN_TYPES.SEMICOLON));
  }

  return {
    type: 'Block',
    statements,
    span:
      statements.length > 0
        ? spanFrom(this.state, start)
        : makeSpan(start, start),
  };
};

Parser.prototype.isBlockEnd = function (this: Parser): boolean {
  return check(
    this.state,
    TOKEN_TYPES.EOF,
    TOKEN_TYPES.END,
    TOKEN_TYPES.ELSE,
    TOKEN_TYPES.ELSEIF,
    TOKEN_TYPES.UNTIL
  );
};

// ============================================================
// STATEMENT DISPATCH
// ============================================================

Parser.prototype.parseStatement = function (this: Parser): StatNode {
  const token = current(this.state);
  const start = token.span.start;

  switch (token.type) {
    case TOKEN_TYPES.DO:
      return this.parseDo();
    case TOKEN_TYPES.WHILE:
      return this.parseWhile();
    case TOKEN_TYPES.REPEAT:
      return this.parseRepeat();
    case TOKEN_TYPES.IF:
      return this.parseIf();
    case TOKEN_TYPES.FOR:
      return this.parseFor();
    case TOKEN_TYPES.FUNCTION:
      return this.parseFunctionStatement();
    case TOKEN_TYPES.LOCAL:
      advance(this.state);
      if (match(this.state, TOKEN_TYPES.FUNCTION)) {
        return this.parseLocalFunction(start);
      }
      return this.parseLocal(start);
    case TOKEN_TYPES.RETURN:
      return this.parseReturn();
    case TOKEN_TYPES.BREAK:
      advance(this.state);
      return { type: 'Break', span: spanFrom(this.state, start) };
    default:
      return this.parseExpressionStatement();
  }
};

/**
 * Assignment or call statement.
 * Names and index expressions start an assignment; calls stand alone.
 */
Parser.prototype.parseExpressionStatement = function (
  this: Parser
): StatNode {
  const start = current(this.state).span.start;
  const exp = this.parseExpression();

  if (
    check(this.state, TOKEN_TYPES.ASSIGN, TOKEN_TYPES.COMMA) ||
    exp.type === 'Var' ||
    exp.type === 'Index'
  ) {
    return this.parseAssignment(exp, start);
  }

  if (exp.type === 'FuncCall' || exp.type === 'MethCall') {
    return exp;
  }

  throw new ParseError(
    'MOON-P003',
    'Expression statement must be an assignment or a call',
    start
  );
};

function toAssignTarget(exp: ExpNode): AssignTarget {
  if (exp.type === 'Var' || exp.type === 'Index') {
    return exp;
  }
  throw new ParseError(
    'MOON-P004',
    'Cannot assign to this expression',
    exp.span.start
  );
}

Parser.prototype.parseAssignment = function (
  this: Parser,
  first: ExpNode,
  start: SourceLocation
): StatNode {
  const targets: AssignTarget[] = [toAssignTarget(first)];

  while (match(this.state, TOKEN_TYPES.COMMA)) {
    targets.push(toAssignTarget(this.parseExpression()));
  }

  expect(this.state, TOKEN_TYPES.ASSIGN, "'='");
  const exps = this.parseExpList();

  return { type: 'Assign', targets, exps, span: spanFrom(this.state, start) };
};

// ============================================================
// LOCAL AND RETURN
// ============================================================

/** local namelist [ "=" explist ]; the `local` keyword is consumed */
Parser.prototype.parseLocal = function (
  this: Parser,
  start: SourceLocation
): StatNode {
  const names = [expect(this.state, TOKEN_TYPES.NAME, 'name').value];
  while (match(this.state, TOKEN_TYPES.COMMA)) {
    names.push(expect(this.state, TOKEN_TYPES.NAME, 'name').value);
  }

  const exps = match(this.state, TOKEN_TYPES.ASSIGN)
    ? this.parseExpList()
    : [];

  return { type: 'Local', names, exps, span: spanFrom(this.state, start) };
};

Parser.prototype.parseReturn = function (this: Parser): StatNode {
  const start = advance(this.state).span.start;

  const exps =
    this.isBlockEnd() || check(this.state, TOKEN_TYPES.SEMICOLON)
      ? []
      : this.parseExpList();

  return { type: 'Return', exps, span: spanFrom(this.state, start) };
};

// ============================================================
// EXPRESSION LISTS
// ============================================================

Parser.prototype.parseExpList = function (this: Parser): ExpNode[] {
  const exps = [this.parseExpression()];
  while (match(this.state, TOKEN_TYPES.COMMA)) {
    exps.push(this.parseExpression());
  }
  return exps;
};

Parser.prototype.parseExpressionToEnd = function (this: Parser): ExpNode {
  const exp = this.parseExpression();
  expect(this.state, TOKEN_TYPES.EOF, '<eof>');
  return exp;
};
