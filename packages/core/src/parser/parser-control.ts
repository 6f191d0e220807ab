/**
 * Parser Extension: Control Flow Parsing
 * do blocks, loops and conditionals
 */

import { Parser } from './parser.js';
import type {
  BlockNode,
  ExpNode,
  IfNode,
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
    parseDo(): BlockNode;
    parseWhile(): StatNode;
    parseRepeat(): StatNode;
    parseIf(): IfNode;
    parseIfRest(start: SourceLocation): IfNode;
    parseFor(): StatNode;
    parseLoopBody(): BlockNode;
  }
}

// ============================================================
// BLOCKS AND LOOPS
// ============================================================

Parser.prototype.parseDo = function (this: Parser): BlockNode {
  const start = advance(this.state).span.start;
  const body = this.parseBlock();
  expect(this.state, TOKEN_TYPES.END, "'end'");
  return {
    type: 'Block',
    statements: body.statements,
    span: spanFrom(this.state, start),
  };
};

/** "do" block "end" */
Parser.prototype.parseLoopBody = function (this: Parser): BlockNode {
  expect(this.state, TOKEN_TYPES.DO, "'do'");
  const body = this.parseBlock();
  expect(this.state, TOKEN_TYPES.END, "'end'");
  return body;
};

Parser.prototype.parseWhile = function (this: Parser): StatNode {
  const start = advance(this.state).span.start;
  const condition = this.parseExpression();
  const body = this.parseLoopBody();
  return { type: 'While', condition, body, span: spanFrom(this.state, start) };
};

Parser.prototype.parseRepeat = function (this: Parser): StatNode {
  const start = advance(this.state).span.start;
  const body = this.parseBlock();
  expect(this.state, TOKEN_TYPES.UNTIL, "'until'");
  const condition = this.parseExpression();
  return {
    type: 'Repeat',
    body,
    condition,
    span: spanFrom(this.state, start),
  };
};

// ============================================================
// CONDITIONALS
// ============================================================

Parser.prototype.parseIf = function (this: Parser): IfNode {
  const start = advance(this.state).span.start;
  return this.parseIfRest(start);
};

/**
 * Everything after `if` or `elseif`.
 * An elseif becomes a nested If that owns the shared `end`.
 */
Parser.prototype.parseIfRest = function (
  this: Parser,
  start: SourceLocation
): IfNode {
  const condition = this.parseExpression();
  expect(this.state, TOKEN_TYPES.THEN, "'then'");
  const thenBody = this.parseBlock();

  let elseBody: BlockNode | null = null;
  if (check(this.state, TOKEN_TYPES.ELSEIF)) {
    const nestedStart = advance(this.state).span.start;
    const nested = this.parseIfRest(nestedStart);
    elseBody = { type: 'Block', statements: [nested], span: nested.span };
  } else {
    if (match(this.state, TOKEN_TYPES.ELSE)) {
      elseBody = this.parseBlock();
    }
    expect(this.state, TOKEN_TYPES.END, "'end'");
  }

  return {
    type: 'If',
    condition,
    thenBody,
    elseBody,
    span: spanFrom(this.state, start),
  };
};

// ============================================================
// FOR LOOPS
// ============================================================

/**
 * for Name "=" exp "," exp ["," exp] do block end
 * for namelist "in" explist do block end
 */
Parser.prototype.parseFor = function (this: Parser): StatNode {
  const start = advance(this.state).span.start;
  const first = expect(this.state, TOKEN_TYPES.NAME, 'name').value;
  const names = [first];

  while (match(this.state, TOKEN_TYPES.COMMA)) {
    names.push(expect(this.state, TOKEN_TYPES.NAME, 'name').value);
  }

  if (check(this.state, TOKEN_TYPES.ASSIGN)) {
    if (names.length > 1) {
      throw new ParseError(
        'MOON-P006',
        'Numeric for takes exactly one control variable',
        current(this.state).span.start
      );
    }
    advance(this.state);

    const startExp = this.parseExpression();
    expect(this.state, TOKEN_TYPES.COMMA, "','");
    const stop = this.parseExpression();
    const step: ExpNode = match(this.state, TOKEN_TYPES.COMMA)
      ? this.parseExpression()
      : { type: 'Lit', value: 1, span: makeSpan(stop.span.end, stop.span.end) };
    const body = this.parseLoopBody();

    return {
      type: 'NumericFor',
      name: first,
      start: startExp,
      stop,
      step,
      body,
      span: spanFrom(this.state, start),
    };
  }

  expect(this.state, TOKEN_TYPES.IN, names.length > 1 ? "'in'" : "'=' or 'in'");
  const exps = this.parseExpList();
  const body = this.parseLoopBody();

  return {
    type: 'GenericFor',
    names,
    exps,
    body,
    span: spanFrom(this.state, start),
  };
};
