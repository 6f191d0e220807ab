/**
 * Script Execution
 *
 * Public API for executing parsed chunks.
 * Provides both full execution and step-by-step execution.
 */

import type { BlockNode, ExpNode } from '../../types.js';
import { ControlFlowError } from '../../types.js';
import type { Environment } from './environment.js';
import { getEvaluator } from './eval/index.js';
import type {
  ExecutionResult,
  ExecutionStepper,
  RuntimeContext,
  StepResult,
} from './types.js';
import type { LuaValue } from './values.js';

/**
 * Execute a parsed chunk.
 *
 * @param chunk The parsed AST (from parse())
 * @param context The runtime context (from createRuntimeContext())
 * @param env Scope to run in; defaults to the context's globals
 * @returns The values of a top-level return, else none
 */
export function execute(
  chunk: BlockNode,
  context: RuntimeContext,
  env: Environment = context.globals
): ExecutionResult {
  const stepper = createStepper(chunk, context, env);
  while (!stepper.done) {
    stepper.step();
  }
  return stepper.getResult();
}

/**
 * Create a stepper that runs one top-level statement per step().
 * Globals can be inspected between steps.
 */
export function createStepper(
  chunk: BlockNode,
  context: RuntimeContext,
  env: Environment = context.globals
): ExecutionStepper {
  const statements = chunk.statements;
  const total = statements.length;
  const evaluator = getEvaluator(context);
  let index = 0;
  let values: LuaValue[] = [];
  let isDone = total === 0;

  return {
    get done() {
      return isDone;
    },
    get index() {
      return index;
    },
    get total() {
      return total;
    },
    get context() {
      return context;
    },

    step(): StepResult {
      const stmt = statements[index];
      if (isDone || !stmt) {
        isDone = true;
        return { values, done: true, index, total };
      }

      const startTime = Date.now();
      context.observability.onStepStart?.({ index, total });

      try {
        const outcome = evaluator.executeStatement(stmt, env);

        if (outcome.kind === 'break') {
          throw new ControlFlowError('chunk', outcome.span.start);
        }

        context.observability.onStepEnd?.({
          index,
          total,
          durationMs: Date.now() - startTime,
        });

        const stepIndex = index;
        index++;
        if (outcome.kind === 'return') {
          values = outcome.values;
          isDone = true;
          return { values, done: true, index: stepIndex, total };
        }

        isDone = index >= total;
        return { values: [], done: isDone, index: stepIndex, total };
      } catch (error) {
        context.observability.onError?.({
          error: error instanceof Error ? error : new Error(String(error)),
          index,
        });
        throw error;
      }
    },

    getResult(): ExecutionResult {
      return { values };
    },
  };
}

/**
 * Evaluate one expression to a single value.
 *
 * @example
 * ```typescript
 * const ctx = createRuntimeContext();
 * evaluate(parseExpression('1 + 2'), ctx); // 3
 * ```
 */
export function evaluate(
  expression: ExpNode,
  context: RuntimeContext,
  env: Environment = context.globals
): LuaValue {
  return getEvaluator(context).evaluate(expression, env);
}

/** Values of an expression, expanding a call to all of its results */
export function evaluateMulti(
  expression: ExpNode,
  context: RuntimeContext,
  env: Environment = context.globals
): LuaValue[] {
  return getEvaluator(context).evaluateMulti(expression, env);
}
