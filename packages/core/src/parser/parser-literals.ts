/**
 * Parser Extension: Primary Expressions
 * Literals, prefix expressions with postfix chains, table constructors
 */

import { Parser } from './parser.js';
import type { ExpNode, TableConstNode, TableField } from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  current,
  describeToken,
  expect,
  match,
  peek,
  spanFrom,
} from './state.js';

declare module './parser.js' {
  interface Parser {
    parseSimpleExpression(): ExpNode;
    parsePrefixExpression(): ExpNode;
    parsePostfix(prefix: ExpNode): ExpNode;
    parseTableConstructor(): TableConstNode;
    parseTableField(): TableField;
  }
}

// ============================================================
// LITERALS
// ============================================================

/**
 * nil | true | false | Number | String | "..." | function | table
 * | prefixexp
 */
Parser.prototype.parseSimpleExpression = function (this: Parser): ExpNode {
  const token = current(this.state);

  switch (token.type) {
    case TOKEN_TYPES.NIL:
      advance(this.state);
      return { type: 'Lit', value: null, span: token.span };
    case TOKEN_TYPES.TRUE:
      advance(this.state);
      return { type: 'Lit', value: true, span: token.span };
    case TOKEN_TYPES.FALSE:
      advance(this.state);
      return { type: 'Lit', value: false, span: token.span };
    case TOKEN_TYPES.NUMBER:
      advance(this.state);
      return { type: 'Lit', value: Number(token.value), span: token.span };
    case TOKEN_TYPES.STRING:
      advance(this.state);
      return { type: 'Lit', value: token.value, span: token.span };
    case TOKEN_TYPES.ELLIPSIS:
      advance(this.state);
      return { type: 'Var', name: '...', span: token.span };
    case TOKEN_TYPES.FUNCTION:
      return this.parseFunctionLiteral();
    case TOKEN_TYPES.LBRACE:
      return this.parseTableConstructor();
    default:
      return this.parsePostfix(this.parsePrefixExpression());
  }
};

// ============================================================
// PREFIX AND POSTFIX
// ============================================================

/** Name | "(" exp ")" */
Parser.prototype.parsePrefixExpression = function (this: Parser): ExpNode {
  const token = current(this.state);

  if (token.type === TOKEN_TYPES.NAME) {
    advance(this.state);
    return { type: 'Var', name: token.value, span: token.span };
  }

  if (token.type === TOKEN_TYPES.LPAREN) {
    advance(this.state);
    const expression = this.parseExpression();
    expect(this.state, TOKEN_TYPES.RPAREN, "')'");
    return {
      type: 'Paren',
      expression,
      span: spanFrom(this.state, token.span.start),
    };
  }

  const actual = describeToken(token);
  throw new ParseError(
    'MOON-P002',
    `Unexpected '${actual}' in expression`,
    token.span.start,
    { actual }
  );
};

/** { "[" exp "]" | "." Name | ":" Name args | args } */
Parser.prototype.parsePostfix = function (
  this: Parser,
  prefix: ExpNode
): ExpNode {
  let exp = prefix;
  const start = prefix.span.start;

  for (;;) {
    const token = current(this.state);

    if (token.type === TOKEN_TYPES.LBRACKET) {
      advance(this.state);
      const key = this.parseExpression();
      expect(this.state, TOKEN_TYPES.RBRACKET, "']'");
      exp = { type: 'Index', target: exp, key, span: spanFrom(this.state, start) };
    } else if (token.type === TOKEN_TYPES.DOT) {
      advance(this.state);
      const name = expect(this.state, TOKEN_TYPES.NAME, 'field name');
      exp = {
        type: 'Index',
        target: exp,
        key: { type: 'Lit', value: name.value, span: name.span },
        span: spanFrom(this.state, start),
      };
    } else if (token.type === TOKEN_TYPES.COLON) {
      advance(this.state);
      const method = expect(this.state, TOKEN_TYPES.NAME, 'method name').value;
      if (!this.isCallArgsStart()) {
        throw new ParseError(
          'MOON-P005',
          `Method call ':${method}' requires arguments`,
          current(this.state).span.start,
          { method }
        );
      }
      const args = this.parseCallArgs();
      exp = {
        type: 'MethCall',
        receiver: exp,
        method,
        args,
        span: spanFrom(this.state, start),
      };
    } else if (this.isCallArgsStart()) {
      const args = this.parseCallArgs();
      exp = {
        type: 'FuncCall',
        callee: exp,
        args,
        span: spanFrom(this.state, start),
      };
    } else {
      return exp;
    }
  }
};

// ============================================================
// TABLE CONSTRUCTORS
// ============================================================

/** "{" [ field { ("," | ";") field } [ "," | ";" ] ] "}" */
Parser.prototype.parseTableConstructor = function (
  this: Parser
): TableConstNode {
  const start = expect(this.state, TOKEN_TYPES.LBRACE, "'{'").span.start;
  const fields: TableField[] = [];

  while (!check(this.state, TOKEN_TYPES.RBRACE)) {
    fields.push(this.parseTableField());
    if (
      !match(this.state, TOKEN_TYPES.COMMA) &&
      !match(this.state, TOKEN_TYPES.SEMICOLON)
    ) {
      break;
    }
  }

  expect(this.state, TOKEN_TYPES.RBRACE, "'}'");
  return { type: 'TableConst', fields, span: spanFrom(this.state, start) };
};

/** "[" exp "]" "=" exp | Name "=" exp | exp */
Parser.prototype.parseTableField = function (this: Parser): TableField {
  const token = current(this.state);

  if (token.type === TOKEN_TYPES.LBRACKET) {
    advance(this.state);
    const key = this.parseExpression();
    expect(this.state, TOKEN_TYPES.RBRACKET, "']'");
    expect(this.state, TOKEN_TYPES.ASSIGN, "'='");
    return { kind: 'keyed', key, value: this.parseExpression() };
  }

  if (
    token.type === TOKEN_TYPES.NAME &&
    peek(this.state).type === TOKEN_TYPES.ASSIGN
  ) {
    advance(this.state);
    advance(this.state);
    return {
      kind: 'keyed',
      key: { type: 'Lit', value: token.value, span: token.span },
      value: this.parseExpression(),
    };
  }

  return { kind: 'positional', value: this.parseExpression() };
};
