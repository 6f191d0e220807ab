/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Methods are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety.
 */

import type { BlockNode, ExpNode } from '../types.js';
import { Scanner } from '../lexer/scanner.js';
import { type ParserState, createParserState } from './state.js';

/**
 * Recursive-descent parser over a single Scanner.
 *
 * Methods are organized across multiple files:
 * - parser-script.ts: Blocks, statement dispatch, assignments
 * - parser-control.ts: do, while, repeat, if, for
 * - parser-functions.ts: Function definitions, bodies, call arguments
 * - parser-expr.ts: Precedence chain, unary and binary operators
 * - parser-literals.ts: Primary and postfix expressions, table constructors
 *
 * @example
 * ```typescript
 * const parser = new Parser(new Scanner('print(1 + 2)'));
 * const block = parser.parseBlock();
 * ```
 */
export class Parser {
  /** Parser state wrapping the scanner */
  state: ParserState;

  /** A string source is scanned as a chunk, so a leading shebang is skipped */
  constructor(source: Scanner | string) {
    const scanner =
      typeof source === 'string'
        ? new Scanner(source, { skipShebang: true })
        : source;
    this.state = createParserState(scanner);
  }

  /**
   * Parse a whole chunk. Fails unless the block ends at end of input.
   */
  parse(): BlockNode {
    return this.parseChunk();
  }

  /**
   * Parse one expression that spans the whole input.
   */
  parseStandaloneExpression(): ExpNode {
    return this.parseExpressionToEnd();
  }
}
