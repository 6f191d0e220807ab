/**
 * Lexer Errors
 */

import type { SourceLocation } from '../types.js';
import { LexerError } from '../types.js';

export { LexerError };

export function unterminatedString(start: SourceLocation): LexerError {
  return new LexerError('MOON-L001', 'Unterminated string literal', start);
}

export function unterminatedLongBracket(
  kind: 'string' | 'comment',
  start: SourceLocation
): LexerError {
  return new LexerError('MOON-L003', `Unterminated long ${kind}`, start, {
    kind,
  });
}

export function invalidCharacter(
  char: string,
  location: SourceLocation
): LexerError {
  return new LexerError(
    'MOON-L002',
    `Unexpected character '${char}'`,
    location,
    { char }
  );
}
