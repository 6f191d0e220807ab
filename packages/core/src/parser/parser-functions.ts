/**
 * Parser Extension: Function Parsing
 * Function definitions, bodies and call arguments
 */

import { Parser } from './parser.js';
import type {
  ExpNode,
  FuncNode,
  SourceLocation,
  StatNode,
} from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  current,
  expect,
  match,
  spanFrom,
} from './state.js';

declare module './parser.js' {
  interface Parser {
    parseFunctionStatement(): StatNode;
    parseLocalFunction(start: SourceLocation): StatNode;
    parseFunctionLiteral(): FuncNode;
    parseFuncBody(start: SourceLocation): FuncNode;
    parseParams(): string[];
    isCallArgsStart(): boolean;
    parseCallArgs(): ExpNode[];
  }
}

// ============================================================
// DEFINITIONS
// ============================================================

/** "function" Name {"." Name} [":" Name] funcbody */
Parser.prototype.parseFunctionStatement = function (this: Parser): StatNode {
  const start = advance(this.state).span.start;
  const path = [expect(this.state, TOKEN_TYPES.NAME, 'function name').value];

  while (match(this.state, TOKEN_TYPES.DOT)) {
    path.push(expect(this.state, TOKEN_TYPES.NAME, 'name').value);
  }

  if (match(this.state, TOKEN_TYPES.COLON)) {
    const method = expect(this.state, TOKEN_TYPES.NAME, 'method name').value;
    const func = this.parseFuncBody(start);
    return {
      type: 'MethDef',
      path,
      method,
      func,
      span: spanFrom(this.state, start),
    };
  }

  const func = this.parseFuncBody(start);
  return { type: 'FuncDef', path, func, span: spanFrom(this.state, start) };
};

/** `local function` is consumed */
Parser.prototype.parseLocalFunction = function (
  this: Parser,
  start: SourceLocation
): StatNode {
  const name = expect(this.state, TOKEN_TYPES.NAME, 'function name').value;
  const func = this.parseFuncBody(start);
  return { type: 'LocalFuncDef', name, func, span: spanFrom(this.state, start) };
};

Parser.prototype.parseFunctionLiteral = function (this: Parser): FuncNode {
  const start = advance(this.state).span.start;
  return this.parseFuncBody(start);
};

// ============================================================
// FUNCTION BODIES
// ============================================================

/** funcbody := "(" [parlist] ")" block "end" */
Parser.prototype.parseFuncBody = function (
  this: Parser,
  start: SourceLocation
): FuncNode {
  const params = this.parseParams();
  const body = this.parseBlock();
  expect(this.state, TOKEN_TYPES.END, "'end'");
  return { type: 'Func', params, body, span: spanFrom(this.state, start) };
};

/** "(" [ Name {"," Name} ["," "..."] | "..." ] ")" */
Parser.prototype.parseParams = function (this: Parser): string[] {
  expect(this.state, TOKEN_TYPES.LPAREN, "'('");
  const params: string[] = [];

  if (!check(this.state, TOKEN_TYPES.RPAREN)) {
    do {
      if (match(this.state, TOKEN_TYPES.ELLIPSIS)) {
        params.push('...');
        break;
      }
      params.push(expect(this.state, TOKEN_TYPES.NAME, 'parameter name').value);
    } while (match(this.state, TOKEN_TYPES.COMMA));
  }

  expect(this.state, TOKEN_TYPES.RPAREN, "')'");
  return params;
};

// ============================================================
// CALL ARGUMENTS
// ============================================================

Parser.prototype.isCallArgsStart = function (this: Parser): boolean {
  return check(
    this.state,
    TOKEN_TYPES.LPAREN,
    TOKEN_TYPES.LBRACE,
    TOKEN_TYPES.STRING
  );
};

/** args := "(" [explist] ")" | tableconstructor | String */
Parser.prototype.parseCallArgs = function (this: Parser): ExpNode[] {
  const token = current(this.state);

  if (token.type === TOKEN_TYPES.STRING) {
    advance(this.state);
    return [{ type: 'Lit', value: token.value, span: token.span }];
  }

  if (token.type === TOKEN_TYPES.LBRACE) {
    return [this.parseTableConstructor()];
  }

  expect(this.state, TOKEN_TYPES.LPAREN, "'('");
  if (match(this.state, TOKEN_TYPES.RPAREN)) {
    return [];
  }
  const args = this.parseExpList();
  expect(this.state, TOKEN_TYPES.RPAREN, "')'");
  return args;
};
