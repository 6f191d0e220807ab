/**
 * Moonlet Shared Types
 * Barrel over source locations, tokens, AST nodes and errors.
 */

export type { SourceLocation, SourceSpan } from './source-location.js';
export { formatLocation } from './source-location.js';

export { TOKEN_TYPES, type Token, type TokenType } from './token-types.js';

export type * from './ast-nodes.js';
export { isBinaryNode, isCallNode, isUnaryNode } from './ast-nodes.js';

export {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorExample,
  type ErrorRegistry,
} from './error-registry.js';

export {
  ControlFlowError,
  createError,
  isSyntaxError,
  LexerError,
  MoonletError,
  ParseError,
  RuntimeError,
  type CallFrame,
  type MoonletErrorData,
} from './error-classes.js';
