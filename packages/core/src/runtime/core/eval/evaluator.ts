/**
 * Evaluator Class - Core
 *
 * Defines the Evaluator class structure. Methods are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety:
 * - statements.ts: Blocks, loops, conditionals, definitions, assignment
 * - expressions.ts: Operators, literals, closures, table constructors
 * - calls.ts: Calls, expression lists, closure activation
 *
 * Uses WeakMap caching to reuse evaluator instances per RuntimeContext.
 *
 * @internal
 */

import type { RuntimeContext } from '../types.js';

export class Evaluator {
  constructor(readonly ctx: RuntimeContext) {}
}

/**
 * WeakMap cache for evaluator instances.
 * Entries go away with their RuntimeContext.
 */
const evaluatorCache = new WeakMap<RuntimeContext, Evaluator>();

/**
 * Get or create an evaluator instance for a given RuntimeContext.
 *
 * @internal
 */
export function getEvaluator(ctx: RuntimeContext): Evaluator {
  let evaluator = evaluatorCache.get(ctx);
  if (!evaluator) {
    evaluator = new Evaluator(ctx);
    evaluatorCache.set(ctx, evaluator);
  }
  return evaluator;
}
