/**
 * Test utilities for Moonlet runtime tests
 */

import {
  builtin,
  createRuntimeContext,
  createStepper,
  execute,
  formatValue,
  LuaTable,
  parse,
  setMetatable,
  type BuiltinFn,
  type LuaValue,
  type ObservabilityCallbacks,
  type RuntimeContext,
  type RuntimeOptions,
  type StepResult,
} from '../../src/index.js';

/** Result of a run: returned values, printed lines and the context */
export interface TestRun {
  values: LuaValue[];
  output: string[];
  ctx: RuntimeContext;
}

/** setmetatable(t, mt) for tables; returns t */
export const setmetatableFn: BuiltinFn = ([target = null, mt = null], ctx) => {
  if (!(target instanceof LuaTable)) {
    throw new TypeError('setmetatable expects a table');
  }
  setMetatable(ctx, target, mt instanceof LuaTable ? mt : null);
  return [target];
};

/** ipairs(t): iterate t[1], t[2], ... up to the first nil */
export const ipairsFn: BuiltinFn = ([target = null]) => {
  const step = builtin('ipairs_step', ([table = null, i = null]) => {
    const next = (typeof i === 'number' ? i : 0) + 1;
    const value = table instanceof LuaTable ? table.get(next) : null;
    return value === null ? [null] : [next, value];
  });
  return [step, target, 0];
};

/** Shared setup for all execution modes */
function setup(source: string, options: RuntimeOptions = {}) {
  const output: string[] = [];
  const print: BuiltinFn = (args) => {
    output.push(args.map(formatValue).join('\t'));
    return [];
  };
  const ctx = createRuntimeContext({
    ...options,
    globals: {
      print,
      setmetatable: setmetatableFn,
      ipairs: ipairsFn,
      ...options.globals,
    },
  });
  return { ast: parse(source), ctx, output };
}

/** Execute a chunk and return the values of its top-level return */
export function run(source: string, options: RuntimeOptions = {}): LuaValue[] {
  const { ast, ctx } = setup(source, options);
  return execute(ast, ctx).values;
}

/** Execute a chunk and return the lines written by print */
export function runOutput(
  source: string,
  options: RuntimeOptions = {}
): string[] {
  const { ast, ctx, output } = setup(source, options);
  execute(ast, ctx);
  return output;
}

/** Execute and return values, output and context together */
export function runFull(source: string, options: RuntimeOptions = {}): TestRun {
  const { ast, ctx, output } = setup(source, options);
  const { values } = execute(ast, ctx);
  return { values, output, ctx };
}

/** Execute using stepper and return all step results */
export function runStepped(
  source: string,
  options: RuntimeOptions = {}
): StepResult[] {
  const { ast, ctx } = setup(source, options);
  const stepper = createStepper(ast, ctx);
  const results: StepResult[] = [];

  while (!stepper.done) {
    results.push(stepper.step());
  }

  return results;
}

/** Event collector for observability testing */
export interface CollectedEvents {
  stepStart: { index: number; total: number }[];
  stepEnd: { index: number; total: number; durationMs: number }[];
  hostCall: { name: string; args: LuaValue[] }[];
  functionReturn: { name: string; values: LuaValue[]; durationMs: number }[];
  error: { error: Error; index: number }[];
}

/** Create an event collector for observability callbacks */
export function createEventCollector(): {
  events: CollectedEvents;
  callbacks: ObservabilityCallbacks;
} {
  const events: CollectedEvents = {
    stepStart: [],
    stepEnd: [],
    hostCall: [],
    functionReturn: [],
    error: [],
  };

  const callbacks: ObservabilityCallbacks = {
    onStepStart: (e) => events.stepStart.push(e),
    onStepEnd: (e) => events.stepEnd.push(e),
    onHostCall: (e) => events.hostCall.push(e),
    onFunctionReturn: (e) => events.functionReturn.push(e),
    onError: (e) => events.error.push(e),
  };

  return { events, callbacks };
}

/** Run source expecting a throw; returns the thrown value */
export function runError(source: string, options: RuntimeOptions = {}): unknown {
  try {
    run(source, options);
  } catch (error) {
    return error;
  }
  throw new Error(`Expected script to fail: ${source}`);
}
