/**
 * Moonlet Module
 * Exports lexer, parser, printer, runtime, and AST types
 */

export { Scanner, tokenize, type ScannerOptions } from './lexer/index.js';
export { Parser, parse, parseExpression } from './parser/index.js';
export { formatNode } from './printer.js';
export {
  arith,
  builtin,
  call,
  call1,
  concat,
  createRuntimeContext,
  createStepper,
  Environment,
  eq,
  evaluate,
  evaluateMulti,
  execute,
  formatNumber,
  formatValue,
  ge,
  getCallStack,
  getMetamethod,
  getMetatable,
  gt,
  index,
  isBuiltin,
  isCallable,
  isClosure,
  isFunction,
  isTable,
  isTruthy,
  le,
  len,
  lt,
  LuaTable,
  NORMAL,
  popCallFrame,
  pushCallFrame,
  setIndex,
  setMetatable,
  typeName,
  unm,
  type ArithOp,
  type BuiltinFn,
  type BuiltinFunction,
  type Closure,
  type ErrorEvent,
  type ExecutionResult,
  type ExecutionStepper,
  type FunctionReturnEvent,
  type HostCallEvent,
  type KindMetatables,
  type LuaFunction,
  type LuaTypeName,
  type LuaValue,
  type MetaEvent,
  type ObservabilityCallbacks,
  type Outcome,
  type RuntimeContext,
  type RuntimeOptions,
  type StepEndEvent,
  type StepResult,
  type StepStartEvent,
} from './runtime/index.js';

export * from './types.js';
