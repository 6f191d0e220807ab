/**
 * Moonlet Value Types and Utilities
 *
 * Core value types that flow through scripts.
 * Public API for host applications.
 */

import type { BlockNode } from '../../types.js';
import type { Environment } from './environment.js';
import { LuaTable } from './table.js';
import type { RuntimeContext } from './types.js';

/** Host function signature: arguments in, results out */
export type BuiltinFn = (args: LuaValue[], ctx: RuntimeContext) => LuaValue[];

/** Function implemented by the host */
export interface BuiltinFunction {
  readonly kind: 'builtin';
  readonly name: string;
  readonly fn: BuiltinFn;
}

/** Function defined in script; shares its defining environment */
export interface Closure {
  readonly kind: 'closure';
  /** Display name from the defining statement, if any */
  readonly name: string | undefined;
  /** Parameter names; a trailing '...' collects extra arguments */
  readonly params: readonly string[];
  readonly body: BlockNode;
  readonly env: Environment;
}

export type LuaFunction = BuiltinFunction | Closure;

/** Any value a script can hold. nil is null. */
export type LuaValue = null | boolean | number | string | LuaTable | LuaFunction;

export type LuaTypeName =
  | 'nil'
  | 'boolean'
  | 'number'
  | 'string'
  | 'table'
  | 'function';

// ============================================================
// CONSTRUCTORS
// ============================================================

/**
 * Wrap a host function as a value.
 *
 * @example
 * ```typescript
 * const add = builtin('add', ([a, b]) => [Number(a) + Number(b)]);
 * ```
 */
export function builtin(name: string, fn: BuiltinFn): BuiltinFunction {
  return { kind: 'builtin', name, fn };
}

// ============================================================
// TYPE GUARDS
// ============================================================

export function isTable(value: LuaValue): value is LuaTable {
  return value instanceof LuaTable;
}

export function isFunction(value: LuaValue): value is LuaFunction {
  return (
    typeof value === 'object' && value !== null && !(value instanceof LuaTable)
  );
}

export function isClosure(value: LuaValue): value is Closure {
  return isFunction(value) && value.kind === 'closure';
}

export function isBuiltin(value: LuaValue): value is BuiltinFunction {
  return isFunction(value) && value.kind === 'builtin';
}

/** nil and false are falsy; everything else, including 0 and "", is truthy */
export function isTruthy(value: LuaValue): boolean {
  return value !== null && value !== false;
}

export function typeName(value: LuaValue): LuaTypeName {
  if (value === null) return 'nil';
  switch (typeof value) {
    case 'boolean':
      return 'boolean';
    case 'number':
      return 'number';
    case 'string':
      return 'string';
    default:
      return value instanceof LuaTable ? 'table' : 'function';
  }
}

// ============================================================
// FORMATTING
// ============================================================

/**
 * Canonical number text.
 * Integral values print without a decimal point.
 */
export function formatNumber(value: number): string {
  if (Number.isNaN(value)) return 'nan';
  if (value === Infinity) return 'inf';
  if (value === -Infinity) return '-inf';
  return String(value);
}

/** Format a value the way scripts see it when converted to text */
export function formatValue(value: LuaValue): string {
  if (value === null) return 'nil';
  switch (typeof value) {
    case 'boolean':
      return value ? 'true' : 'false';
    case 'number':
      return formatNumber(value);
    case 'string':
      return value;
  }
  if (value instanceof LuaTable) return 'table';
  return value.kind === 'builtin' ? 'function: builtin' : 'function';
}
