/**
 * Parser Module
 * Converts source text into an AST
 */

// Parser class first, then the modules that extend its prototype
import { Parser } from './parser.js';
import './parser-script.js';
import './parser-control.js';
import './parser-functions.js';
import './parser-expr.js';
import './parser-literals.js';

import { Scanner } from '../lexer/scanner.js';
import type { BlockNode, ExpNode } from '../types.js';

export { Parser };
export { type ParserState, createParserState } from './state.js';

/**
 * Parse a chunk of source text into its root block.
 *
 * @example
 * ```typescript
 * const chunk = parse('local a = 1; print(a)');
 * chunk.statements.length; // 2
 * ```
 */
export function parse(source: string): BlockNode {
  return new Parser(source).parse();
}

/** Parse source text holding exactly one expression */
export function parseExpression(source: string): ExpNode {
  return new Parser(new Scanner(source)).parseStandaloneExpression();
}
