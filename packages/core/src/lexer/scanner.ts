/**
 * Scanner
 * Pull iterator over the token stream with arbitrary lookahead
 */

import type { Token } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { createLexerState, type LexerState } from './state.js';
import { nextToken, skipShebang } from './tokenizer.js';

export interface ScannerOptions {
  /** Skip a `#` line at the very start of the source. Chunks allow one. */
  readonly skipShebang?: boolean;
}

/**
 * Tokens are scanned on demand. `token` is the current token; `peek(n)`
 * looks n tokens past it. Once EOF is reached the scanner stays on it.
 *
 * @example
 * ```typescript
 * const scanner = new Scanner('local a = 1');
 * scanner.token.type; // 'LOCAL'
 * scanner.advance();
 * scanner.token.value; // 'a'
 * ```
 */
export class Scanner {
  private readonly state: LexerState;
  /** buffer[0] is the current token */
  private readonly buffer: Token[] = [];

  constructor(source: string, options: ScannerOptions = {}) {
    this.state = createLexerState(source);
    if (options.skipShebang === true) skipShebang(this.state);
    this.buffer.push(nextToken(this.state));
  }

  get token(): Token {
    return this.peek(0);
  }

  /** Token `offset` positions after the current one */
  peek(offset = 1): Token {
    while (this.buffer.length <= offset) {
      const last = this.buffer[this.buffer.length - 1];
      if (last && last.type === TOKEN_TYPES.EOF) return last;
      this.buffer.push(nextToken(this.state));
    }
    const token = this.buffer[offset];
    if (token) return token;
    throw new Error('Scanner buffer underflow');
  }

  /** Move to the next token and return the one left behind */
  advance(): Token {
    const token = this.token;
    if (token.type !== TOKEN_TYPES.EOF) {
      this.buffer.shift();
      if (this.buffer.length === 0) {
        this.buffer.push(nextToken(this.state));
      }
    }
    return token;
  }
}
