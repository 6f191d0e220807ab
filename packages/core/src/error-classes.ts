/**
 * Moonlet Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import type { SourceLocation, SourceSpan } from './source-location.js';
import type { ErrorCategory } from './error-registry.js';
import { ERROR_REGISTRY, renderMessage } from './error-registry.js';

// ============================================================
// CALL FRAME
// ============================================================

/**
 * Call stack frame information for error reporting.
 * Represents a single function call with its call-site location.
 */
export interface CallFrame {
  /** Source location of the call */
  readonly location: SourceSpan;
  /** Name of the function (closure or built-in) */
  readonly functionName?: string | undefined;
}

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface MoonletErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Create an error from the registry.
 *
 * Renders the definition's message template with `context` and returns
 * the class matching the definition's category.
 *
 * @throws TypeError if errorId is not found in registry
 *
 * @example
 * createError("MOON-R001", { name: "foo" }, location)
 * // RuntimeError: "Variable foo is not defined at 1:5"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  location?: SourceLocation | undefined
): MoonletError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  const message = renderMessage(definition.messageTemplate, context);

  switch (definition.category) {
    case 'lexer':
      return new LexerError(errorId, message, location ?? ORIGIN, context);
    case 'parse':
      return new ParseError(errorId, message, location ?? ORIGIN, context);
    case 'runtime':
      return new RuntimeError(errorId, message, location, context);
  }
}

const ORIGIN: SourceLocation = { line: 1, column: 1, offset: 0 };

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all Moonlet errors.
 * Provides structured data for host applications to format as needed.
 */
export class MoonletError extends Error {
  readonly errorId: string;
  readonly location?: SourceLocation | undefined;
  context?: Record<string, unknown> | undefined;

  constructor(data: MoonletErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }

    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'MoonletError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): MoonletErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at \d+:\d+$/, ''),
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: MoonletErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

function checkCategory(errorId: string, expected: ErrorCategory): void {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (definition.category !== expected) {
    throw new TypeError(`Expected ${expected} error ID, got: ${errorId}`);
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Scan-time errors */
export class LexerError extends MoonletError {
  constructor(
    errorId: string,
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>
  ) {
    checkCategory(errorId, 'lexer');
    super({ errorId, message, location, context });
    this.name = 'LexerError';
  }
}

/** Parse-time errors */
export class ParseError extends MoonletError {
  constructor(
    errorId: string,
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>
  ) {
    checkCategory(errorId, 'parse');
    super({ errorId, message, location, context });
    this.name = 'ParseError';
  }
}

/** Runtime execution errors */
export class RuntimeError extends MoonletError {
  /** Diagnostic call stack at the innermost failing call, once recorded */
  callStack: readonly CallFrame[] | undefined;

  constructor(
    errorId: string,
    message: string,
    location?: SourceLocation,
    context?: Record<string, unknown>
  ) {
    checkCategory(errorId, 'runtime');
    super({ errorId, message, location, context });
    this.name = 'RuntimeError';
    this.callStack = undefined;
  }

  /**
   * Record the call stack snapshot. Only the first snapshot is kept, so
   * the innermost call site wins as the error unwinds.
   */
  recordCallStack(frames: readonly CallFrame[]): void {
    if (this.callStack !== undefined) return;
    this.callStack = [...frames];
    this.context = { ...this.context, callStack: this.callStack };
  }
}

/** A break statement that escaped every enclosing loop */
export class ControlFlowError extends RuntimeError {
  readonly boundary: 'function' | 'chunk';

  constructor(boundary: 'function' | 'chunk', location?: SourceLocation) {
    super(
      'MOON-R011',
      `break escaped ${boundary} without an enclosing loop`,
      location,
      { boundary }
    );
    this.name = 'ControlFlowError';
    this.boundary = boundary;
  }
}

/** True for errors raised while scanning or parsing */
export function isSyntaxError(
  error: unknown
): error is LexerError | ParseError {
  return error instanceof LexerError || error instanceof ParseError;
}
