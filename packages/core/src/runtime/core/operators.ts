/**
 * Operators and Metatable Dispatch
 *
 * Every operation the evaluator performs on values. Primitive operands
 * are handled directly; anything else goes through the metatable of the
 * first operand that defines the event, then the second.
 */

import type { SourceLocation } from '../../types.js';
import { RuntimeError } from '../../types.js';
import { getEvaluator } from './eval/index.js';
import { getMetamethod, type MetaEvent } from './metatables.js';
import { LuaTable } from './table.js';
import type { RuntimeContext } from './types.js';
import {
  formatNumber,
  formatValue,
  isFunction,
  isTruthy,
  typeName,
  type LuaFunction,
  type LuaValue,
} from './values.js';

export type ArithOp = 'add' | 'sub' | 'mul' | 'div' | 'mod' | 'pow';

const ARITH: Record<ArithOp, (a: number, b: number) => number> = {
  add: (a, b) => a + b,
  sub: (a, b) => a - b,
  mul: (a, b) => a * b,
  div: (a, b) => a / b,
  // floored: the result takes the sign of the divisor
  mod: (a, b) => a - Math.floor(a / b) * b,
  pow: (a, b) => Math.pow(a, b),
};

const ARITH_EVENTS: Record<ArithOp, MetaEvent> = {
  add: '__add',
  sub: '__sub',
  mul: '__mul',
  div: '__div',
  mod: '__mod',
  pow: '__pow',
};

/** Handler from the first operand defining `event`, else the second */
function binaryHandler(
  ctx: RuntimeContext,
  a: LuaValue,
  b: LuaValue,
  event: MetaEvent
): LuaValue {
  const handler = getMetamethod(ctx, a, event);
  return handler !== null ? handler : getMetamethod(ctx, b, event);
}

function unsupported(
  operation: string,
  a: LuaValue,
  b: LuaValue,
  location: SourceLocation | undefined
): RuntimeError {
  const left = typeName(a);
  const right = typeName(b);
  return new RuntimeError(
    'MOON-R003',
    `Cannot ${operation} ${left} and ${right}`,
    location,
    { operation, left, right }
  );
}

function describeKey(key: LuaValue): string {
  return typeof key === 'string' ? key : formatValue(key);
}

// ============================================================
// ARITHMETIC
// ============================================================

export function arith(
  ctx: RuntimeContext,
  op: ArithOp,
  a: LuaValue,
  b: LuaValue,
  location?: SourceLocation
): LuaValue {
  if (typeof a === 'number' && typeof b === 'number') {
    return ARITH[op](a, b);
  }

  const handler = binaryHandler(ctx, a, b, ARITH_EVENTS[op]);
  if (handler !== null) {
    return call1(ctx, handler, [a, b], location);
  }

  throw unsupported(op, a, b, location);
}

/** Unary minus; handlers receive the operand twice */
export function unm(
  ctx: RuntimeContext,
  a: LuaValue,
  location?: SourceLocation
): LuaValue {
  if (typeof a === 'number') {
    return -a;
  }

  const handler = getMetamethod(ctx, a, '__unm');
  if (handler !== null) {
    return call1(ctx, handler, [a, a], location);
  }

  throw unsupported('negate', a, a, location);
}

// ============================================================
// STRINGS AND LENGTH
// ============================================================

export function concat(
  ctx: RuntimeContext,
  a: LuaValue,
  b: LuaValue,
  location?: SourceLocation
): LuaValue {
  if (
    (typeof a === 'string' || typeof a === 'number') &&
    (typeof b === 'string' || typeof b === 'number')
  ) {
    const left = typeof a === 'number' ? formatNumber(a) : a;
    const right = typeof b === 'number' ? formatNumber(b) : b;
    return left + right;
  }

  const handler = binaryHandler(ctx, a, b, '__concat');
  if (handler !== null) {
    return call1(ctx, handler, [a, b], location);
  }

  throw unsupported('concatenate', a, b, location);
}

export function len(
  ctx: RuntimeContext,
  a: LuaValue,
  location?: SourceLocation
): LuaValue {
  if (typeof a === 'string') {
    return a.length;
  }

  const handler = getMetamethod(ctx, a, '__len');
  if (handler !== null) {
    return call1(ctx, handler, [a], location);
  }

  if (a instanceof LuaTable) {
    return a.length();
  }

  const type = typeName(a);
  throw new RuntimeError(
    'MOON-R004',
    `Cannot get length of ${type} value`,
    location,
    { type }
  );
}

// ============================================================
// COMPARISON
// ============================================================

/**
 * Equality. Identical values are equal (NaN never is); otherwise
 * __eq runs only when both operands share a type and the same handler.
 */
export function eq(
  ctx: RuntimeContext,
  a: LuaValue,
  b: LuaValue,
  location?: SourceLocation
): boolean {
  if (a === b) return true;
  if (typeName(a) !== typeName(b)) return false;

  const handler = getMetamethod(ctx, a, '__eq');
  if (handler === null || handler !== getMetamethod(ctx, b, '__eq')) {
    return false;
  }
  return isTruthy(call1(ctx, handler, [a, b], location));
}

function cannotCompare(
  a: LuaValue,
  b: LuaValue,
  location: SourceLocation | undefined
): RuntimeError {
  const left = typeName(a);
  const right = typeName(b);
  return new RuntimeError(
    'MOON-R005',
    `Cannot compare ${left} with ${right}`,
    location,
    { left, right }
  );
}

export function lt(
  ctx: RuntimeContext,
  a: LuaValue,
  b: LuaValue,
  location?: SourceLocation
): boolean {
  if (typeof a === 'number' && typeof b === 'number') return a < b;
  if (typeof a === 'string' && typeof b === 'string') return a < b;

  const handler = binaryHandler(ctx, a, b, '__lt');
  if (handler !== null) {
    return isTruthy(call1(ctx, handler, [a, b], location));
  }

  throw cannotCompare(a, b, location);
}

/** a <= b; without __le it is not (b < a) using __lt */
export function le(
  ctx: RuntimeContext,
  a: LuaValue,
  b: LuaValue,
  location?: SourceLocation
): boolean {
  if (typeof a === 'number' && typeof b === 'number') return a <= b;
  if (typeof a === 'string' && typeof b === 'string') return a <= b;

  const handler = binaryHandler(ctx, a, b, '__le');
  if (handler !== null) {
    return isTruthy(call1(ctx, handler, [a, b], location));
  }

  const ltHandler = binaryHandler(ctx, b, a, '__lt');
  if (ltHandler !== null) {
    return !isTruthy(call1(ctx, ltHandler, [b, a], location));
  }

  throw cannotCompare(a, b, location);
}

export function gt(
  ctx: RuntimeContext,
  a: LuaValue,
  b: LuaValue,
  location?: SourceLocation
): boolean {
  return !le(ctx, a, b, location);
}

export function ge(
  ctx: RuntimeContext,
  a: LuaValue,
  b: LuaValue,
  location?: SourceLocation
): boolean {
  return !lt(ctx, a, b, location);
}

// ============================================================
// INDEXING
// ============================================================

function checkIndexDepth(
  ctx: RuntimeContext,
  depth: number,
  event: '__index' | '__newindex',
  location: SourceLocation | undefined
): void {
  const limit = ctx.maxIndexDepth;
  if (limit !== undefined && depth > limit) {
    throw new RuntimeError(
      'MOON-R012',
      `${event} chain exceeded ${limit} levels`,
      location,
      { event, limit }
    );
  }
}

/**
 * t[k] with __index fallback.
 * Function handlers are called with (t, k); other handlers are indexed
 * in turn.
 */
export function index(
  ctx: RuntimeContext,
  target: LuaValue,
  key: LuaValue,
  location?: SourceLocation
): LuaValue {
  let current = target;

  for (let depth = 0; ; depth++) {
    checkIndexDepth(ctx, depth, '__index', location);

    let handler: LuaValue;
    if (current instanceof LuaTable) {
      const value = current.get(key);
      if (value !== null) return value;
      handler = getMetamethod(ctx, current, '__index');
      if (handler === null) return null;
    } else {
      handler = getMetamethod(ctx, current, '__index');
      if (handler === null) {
        const type = typeName(current);
        const shown = describeKey(key);
        throw new RuntimeError(
          'MOON-R006',
          `Cannot index ${type} value with key ${shown}`,
          location,
          { type, key: shown }
        );
      }
    }

    if (isFunction(handler)) {
      return call1(ctx, handler, [current, key], location);
    }
    current = handler;
  }
}

/**
 * t[k] = v with __newindex fallback for absent keys.
 * Tables without a handler take a raw write.
 */
export function setIndex(
  ctx: RuntimeContext,
  target: LuaValue,
  key: LuaValue,
  value: LuaValue,
  location?: SourceLocation
): void {
  let current = target;

  for (let depth = 0; ; depth++) {
    checkIndexDepth(ctx, depth, '__newindex', location);

    let handler: LuaValue;
    if (current instanceof LuaTable) {
      if (current.has(key)) {
        current.set(key, value, location);
        return;
      }
      handler = getMetamethod(ctx, current, '__newindex');
      if (handler === null) {
        current.set(key, value, location);
        return;
      }
    } else {
      handler = getMetamethod(ctx, current, '__newindex');
      if (handler === null) {
        const type = typeName(current);
        const shown = describeKey(key);
        throw new RuntimeError(
          'MOON-R007',
          `Cannot set key ${shown} on ${type} value`,
          location,
          { type, key: shown }
        );
      }
    }

    if (isFunction(handler)) {
      call(ctx, handler, [current, key, value], location);
      return;
    }
    current = handler;
  }
}

// ============================================================
// CALLS
// ============================================================

/** Display name used in observability events and call frames */
export function functionName(fn: LuaFunction): string {
  return fn.name ?? '<anonymous>';
}

function invoke(
  ctx: RuntimeContext,
  fn: LuaFunction,
  args: LuaValue[]
): LuaValue[] {
  const startTime = Date.now();
  let values: LuaValue[];

  if (fn.kind === 'builtin') {
    ctx.observability.onHostCall?.({ name: fn.name, args });
    values = fn.fn(args, ctx);
  } else {
    values = getEvaluator(ctx).invokeClosure(fn, args);
  }

  ctx.observability.onFunctionReturn?.({
    name: functionName(fn),
    values,
    durationMs: Date.now() - startTime,
  });
  return values;
}

/**
 * Call a value. Non-functions dispatch to __call with the value
 * prepended to the arguments.
 */
export function call(
  ctx: RuntimeContext,
  fn: LuaValue,
  args: LuaValue[],
  location?: SourceLocation
): LuaValue[] {
  if (isFunction(fn)) {
    return invoke(ctx, fn, args);
  }

  const handler = getMetamethod(ctx, fn, '__call');
  if (handler !== null) {
    return call(ctx, handler, [fn, ...args], location);
  }

  const type = typeName(fn);
  throw new RuntimeError('MOON-R008', `Cannot call ${type} value`, location, {
    type,
  });
}

/** Call and keep the first result; nil when there is none */
export function call1(
  ctx: RuntimeContext,
  fn: LuaValue,
  args: LuaValue[],
  location?: SourceLocation
): LuaValue {
  return call(ctx, fn, args, location)[0] ?? null;
}

/** Functions, and values whose metatable defines __call */
export function isCallable(ctx: RuntimeContext, value: LuaValue): boolean {
  return isFunction(value) || getMetamethod(ctx, value, '__call') !== null;
}
