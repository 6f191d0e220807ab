/**
 * Moonlet Runtime
 *
 * Public API for executing parsed chunks.
 *
 * Module Structure:
 * - core/: Execution engine
 *   - types.ts: Public types (RuntimeContext, RuntimeOptions, etc.)
 *   - values.ts: LuaValue, function records and value utilities
 *   - table.ts: LuaTable
 *   - environment.ts: Lexical scopes
 *   - metatables.ts: Per-value and per-kind metatables
 *   - operators.ts: Metatable-aware operations
 *   - context.ts: Runtime context factory and call stack
 *   - execute.ts: Script execution (execute, createStepper)
 *   - eval/: AST evaluation (internal)
 */

export type {
  ErrorEvent,
  ExecutionResult,
  ExecutionStepper,
  FunctionReturnEvent,
  HostCallEvent,
  KindMetatables,
  ObservabilityCallbacks,
  RuntimeContext,
  RuntimeOptions,
  StepEndEvent,
  StepResult,
  StepStartEvent,
} from './core/types.js';

export type {
  BuiltinFn,
  BuiltinFunction,
  Closure,
  LuaFunction,
  LuaTypeName,
  LuaValue,
} from './core/values.js';
export {
  builtin,
  formatNumber,
  formatValue,
  isBuiltin,
  isClosure,
  isFunction,
  isTable,
  isTruthy,
  typeName,
} from './core/values.js';

export { LuaTable } from './core/table.js';
export { Environment } from './core/environment.js';

export type { Outcome } from './core/outcome.js';
export { NORMAL } from './core/outcome.js';

export type { MetaEvent } from './core/metatables.js';
export {
  getMetamethod,
  getMetatable,
  setMetatable,
} from './core/metatables.js';

export type { ArithOp } from './core/operators.js';
export {
  arith,
  call,
  call1,
  concat,
  eq,
  ge,
  gt,
  index,
  isCallable,
  le,
  len,
  lt,
  setIndex,
  unm,
} from './core/operators.js';

export {
  createRuntimeContext,
  getCallStack,
  popCallFrame,
  pushCallFrame,
} from './core/context.js';
export type { CallFrame } from '../types.js';

export {
  createStepper,
  evaluate,
  evaluateMulti,
  execute,
} from './core/execute.js';
