/**
 * Runtime Types
 *
 * Public types for runtime configuration and execution results.
 * These types are the primary interface for host applications.
 */

import type { CallFrame } from '../../types.js';
import type { Environment } from './environment.js';
import type { LuaTable } from './table.js';
import type { BuiltinFn, LuaValue } from './values.js';

/** Observability callbacks for monitoring execution */
export interface ObservabilityCallbacks {
  /** Called before each top-level statement executes */
  onStepStart?: (event: StepStartEvent) => void;
  /** Called after each top-level statement executes */
  onStepEnd?: (event: StepEndEvent) => void;
  /** Called before a built-in function runs */
  onHostCall?: (event: HostCallEvent) => void;
  /** Called after any function returns */
  onFunctionReturn?: (event: FunctionReturnEvent) => void;
  /** Called when a top-level statement fails */
  onError?: (event: ErrorEvent) => void;
}

/** Event emitted before a statement executes */
export interface StepStartEvent {
  /** Statement index (0-based) */
  index: number;
  /** Total statements */
  total: number;
}

/** Event emitted after a statement executes */
export interface StepEndEvent {
  /** Statement index (0-based) */
  index: number;
  /** Total statements */
  total: number;
  /** Execution time in milliseconds */
  durationMs: number;
}

/** Event emitted before a built-in function runs */
export interface HostCallEvent {
  /** Function name */
  name: string;
  /** Arguments passed to function */
  args: LuaValue[];
}

/** Event emitted after a function returns */
export interface FunctionReturnEvent {
  /** Function name ('<anonymous>' for unnamed closures) */
  name: string;
  /** Returned values */
  values: LuaValue[];
  /** Execution time in milliseconds */
  durationMs: number;
}

/** Event emitted on error */
export interface ErrorEvent {
  /** The error that occurred */
  error: Error;
  /** Statement index where error occurred */
  index: number;
}

/** Metatables shared by every value of a non-table kind */
export interface KindMetatables {
  number: LuaTable | null;
  boolean: LuaTable | null;
  string: LuaTable | null;
  function: LuaTable | null;
}

/** Session state for one embedding of the interpreter */
export interface RuntimeContext {
  /** Root environment; default scope for execute() */
  readonly globals: Environment;
  readonly metatables: KindMetatables;
  /** Observability callbacks */
  readonly observability: ObservabilityCallbacks;
  /** Diagnostic call stack, innermost call last */
  readonly callStack: CallFrame[];
  /** Frames kept on callStack; older frames are dropped */
  readonly maxCallStackDepth: number;
  /** Cap on __index/__newindex handler hops (undefined = unbounded) */
  readonly maxIndexDepth: number | undefined;
}

/** Options for creating a runtime context */
export interface RuntimeOptions {
  /** Root bindings; plain functions become built-ins */
  globals?: Record<string, LuaValue | BuiltinFn>;
  /** Observability callbacks for monitoring execution */
  observability?: ObservabilityCallbacks;
  /** Maximum frames kept on the diagnostic call stack (default 100) */
  maxCallStackDepth?: number;
  /** Maximum __index/__newindex handler hops per access */
  maxIndexDepth?: number;
}

/** Result of script execution */
export interface ExecutionResult {
  /** Values of a top-level return, else empty */
  values: LuaValue[];
}

/** Result of a single step execution */
export interface StepResult {
  /** Values returned when this step ran a top-level return */
  values: LuaValue[];
  /** Whether execution is complete (no more statements) */
  done: boolean;
  /** Index of the statement this step ran (0-based) */
  index: number;
  /** Total number of statements */
  total: number;
}

/** Stepper for controlled step-by-step execution */
export interface ExecutionStepper {
  /** Whether execution is complete */
  readonly done: boolean;
  /** Index of the next statement (0-based) */
  readonly index: number;
  /** Total number of statements */
  readonly total: number;
  /** The runtime context (for inspecting globals between steps) */
  readonly context: RuntimeContext;
  /** Execute the next statement */
  step(): StepResult;
  /** Get final result (only meaningful after done=true) */
  getResult(): ExecutionResult;
}
