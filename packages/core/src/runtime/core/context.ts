/**
 * Runtime Context Factory
 *
 * Creates and configures the runtime context for script execution.
 * Public API for host applications.
 */

import type { CallFrame } from '../../types.js';
import { MoonletError, RuntimeError } from '../../types.js';
import { Environment } from './environment.js';
import type { RuntimeContext, RuntimeOptions } from './types.js';
import { builtin, type LuaValue } from './values.js';

const DEFAULT_MAX_CALL_STACK_DEPTH = 100;

function checkDepth(name: string, value: number | undefined): void {
  if (value === undefined) return;
  if (!Number.isInteger(value) || value <= 0) {
    throw new TypeError(`${name} must be a positive integer, got ${value}`);
  }
}

/**
 * Create a runtime context for script execution.
 * This is the main entry point for configuring the runtime.
 *
 * @throws TypeError for non-positive or non-integer depth options
 *
 * @example
 * ```typescript
 * const ctx = createRuntimeContext({
 *   globals: {
 *     print: (args) => {
 *       console.log(args.map(formatValue).join('\t'));
 *       return [];
 *     },
 *   },
 * });
 * ```
 */
export function createRuntimeContext(
  options: RuntimeOptions = {}
): RuntimeContext {
  checkDepth('maxCallStackDepth', options.maxCallStackDepth);
  checkDepth('maxIndexDepth', options.maxIndexDepth);

  const globals = new Environment();

  if (options.globals) {
    for (const [name, value] of Object.entries(options.globals)) {
      const bound: LuaValue =
        typeof value === 'function' ? builtin(name, value) : value;
      globals.bind(name, bound);
    }
  }

  return {
    globals,
    metatables: {
      number: null,
      boolean: null,
      string: null,
      function: null,
    },
    observability: options.observability ?? {},
    callStack: [],
    maxCallStackDepth:
      options.maxCallStackDepth ?? DEFAULT_MAX_CALL_STACK_DEPTH,
    maxIndexDepth: options.maxIndexDepth,
  };
}

/**
 * Extract call stack from a RuntimeError.
 * Returns empty array if no call stack attached.
 */
export function getCallStack(error: MoonletError): readonly CallFrame[] {
  if (!(error instanceof MoonletError)) {
    throw new TypeError('Expected MoonletError instance');
  }
  if (error instanceof RuntimeError && error.callStack !== undefined) {
    return [...error.callStack];
  }
  return [];
}

/**
 * Push frame onto call stack before function execution.
 * Older frames are dropped beyond maxCallStackDepth.
 */
export function pushCallFrame(ctx: RuntimeContext, frame: CallFrame): void {
  ctx.callStack.push(frame);

  if (ctx.callStack.length > ctx.maxCallStackDepth) {
    ctx.callStack.shift();
  }
}

/**
 * Pop frame from call stack after function returns.
 */
export function popCallFrame(ctx: RuntimeContext): void {
  if (ctx.callStack.length > 0) {
    ctx.callStack.pop();
  }
}
