/**
 * Evaluator Extension: Statements
 * Blocks, loops, conditionals, definitions and assignment
 */

import type {
  AssignNode,
  BlockNode,
  FuncDefNode,
  GenericForNode,
  MethDefNode,
  NumericForNode,
  SourceLocation,
  StatNode,
} from '../../../types.js';
import { RuntimeError } from '../../../types.js';
import type { Environment } from '../environment.js';
import { call, index, setIndex } from '../operators.js';
import { NORMAL, type Outcome } from '../outcome.js';
import { isTruthy, typeName, type LuaValue } from '../values.js';
import { Evaluator } from './evaluator.js';

declare module './evaluator.js' {
  interface Evaluator {
    executeBlock(block: BlockNode, env: Environment): Outcome;
    executeStatement(stat: StatNode, env: Environment): Outcome;
    executeLoopBody(body: BlockNode, env: Environment): Outcome | null;
    executeNumericFor(stat: NumericForNode, env: Environment): Outcome;
    executeGenericFor(stat: GenericForNode, env: Environment): Outcome;
    executeFuncDef(stat: FuncDefNode, env: Environment): void;
    executeMethDef(stat: MethDefNode, env: Environment): void;
    executeAssign(stat: AssignNode, env: Environment): void;
    resolvePath(
      path: readonly string[],
      env: Environment,
      location: SourceLocation
    ): LuaValue;
  }
}

// ============================================================
// BLOCKS
// ============================================================

/** Run statements in order; stop at the first non-normal outcome */
Evaluator.prototype.executeBlock = function (
  this: Evaluator,
  block: BlockNode,
  env: Environment
): Outcome {
  for (const stat of block.statements) {
    const outcome = this.executeStatement(stat, env);
    if (outcome.kind !== 'normal') return outcome;
  }
  return NORMAL;
};

Evaluator.prototype.executeStatement = function (
  this: Evaluator,
  stat: StatNode,
  env: Environment
): Outcome {
  switch (stat.type) {
    case 'Block':
      return this.executeBlock(stat, env);

    case 'While':
      while (isTruthy(this.evaluate(stat.condition, env))) {
        const outcome = this.executeLoopBody(stat.body, env);
        if (outcome) return outcome;
      }
      return NORMAL;

    case 'Repeat':
      for (;;) {
        const outcome = this.executeLoopBody(stat.body, env);
        if (outcome) return outcome;
        if (isTruthy(this.evaluate(stat.condition, env))) return NORMAL;
      }

    case 'If':
      if (isTruthy(this.evaluate(stat.condition, env))) {
        return this.executeBlock(stat.thenBody, env);
      }
      return stat.elseBody ? this.executeBlock(stat.elseBody, env) : NORMAL;

    case 'NumericFor':
      return this.executeNumericFor(stat, env);

    case 'GenericFor':
      return this.executeGenericFor(stat, env);

    case 'FuncDef':
      this.executeFuncDef(stat, env);
      return NORMAL;

    case 'MethDef':
      this.executeMethDef(stat, env);
      return NORMAL;

    case 'LocalFuncDef':
      // bound before the closure exists so the body can refer to itself
      env.bind(stat.name, null);
      env.update(stat.name, this.makeClosure(stat.func, env, stat.name));
      return NORMAL;

    case 'Local': {
      const values = this.evaluateExpList(stat.exps, env);
      stat.names.forEach((name, i) => env.bind(name, values[i] ?? null));
      return NORMAL;
    }

    case 'Return':
      return { kind: 'return', values: this.evaluateExpList(stat.exps, env) };

    case 'Break':
      return { kind: 'break', span: stat.span };

    case 'Assign':
      this.executeAssign(stat, env);
      return NORMAL;

    case 'FuncCall':
    case 'MethCall':
      this.evaluateCall(stat, env);
      return NORMAL;
  }
};

// ============================================================
// LOOPS
// ============================================================

/**
 * Run one pass of a loop body.
 * Returns null to keep looping, NORMAL after a break, or a return outcome.
 */
Evaluator.prototype.executeLoopBody = function (
  this: Evaluator,
  body: BlockNode,
  env: Environment
): Outcome | null {
  const outcome = this.executeBlock(body, env);
  switch (outcome.kind) {
    case 'normal':
      return null;
    case 'break':
      return NORMAL;
    case 'return':
      return outcome;
  }
};

function forNumber(
  value: LuaValue,
  part: string,
  location: SourceLocation
): number {
  if (typeof value === 'number') return value;
  throw new RuntimeError(
    'MOON-R009',
    `'for' ${part} must be a number`,
    location,
    { part, actual: typeName(value) }
  );
}

/** Ascends while i <= stop for a positive step, else descends while i >= stop */
Evaluator.prototype.executeNumericFor = function (
  this: Evaluator,
  stat: NumericForNode,
  env: Environment
): Outcome {
  const location = stat.span.start;
  const start = forNumber(this.evaluate(stat.start, env), 'initial value', location);
  const stop = forNumber(this.evaluate(stat.stop, env), 'limit', location);
  const step = forNumber(this.evaluate(stat.step, env), 'step', location);

  for (let i = start; step > 0 ? i <= stop : i >= stop; i += step) {
    const loopEnv = env.child();
    loopEnv.bind(stat.name, i);
    const outcome = this.executeLoopBody(stat.body, loopEnv);
    if (outcome) return outcome;
  }
  return NORMAL;
};

/**
 * The iterator function, state and control value stay in this frame;
 * only the declared names are visible to the body.
 */
Evaluator.prototype.executeGenericFor = function (
  this: Evaluator,
  stat: GenericForNode,
  env: Environment
): Outcome {
  const location = stat.span.start;
  const [iterator = null, state = null, initial = null] = this.evaluateExpList(
    stat.exps,
    env
  );
  let control: LuaValue = initial;

  for (;;) {
    const results = call(this.ctx, iterator, [state, control], location);
    const first = results[0] ?? null;
    if (first === null) return NORMAL;
    control = first;

    const loopEnv = env.child();
    stat.names.forEach((name, i) => loopEnv.bind(name, results[i] ?? null));
    const outcome = this.executeLoopBody(stat.body, loopEnv);
    if (outcome) return outcome;
  }
};

// ============================================================
// DEFINITIONS
// ============================================================

/** Look up path[0], then index through the remaining names */
Evaluator.prototype.resolvePath = function (
  this: Evaluator,
  path: readonly string[],
  env: Environment,
  location: SourceLocation
): LuaValue {
  const [head = '', ...rest] = path;
  let value = env.lookup(head, location);
  for (const name of rest) {
    value = index(this.ctx, value, name, location);
  }
  return value;
};

/**
 * `function f()` updates f wherever it is bound, otherwise defines it in
 * the root frame. `function a.b.c()` stores into a.b.
 */
Evaluator.prototype.executeFuncDef = function (
  this: Evaluator,
  stat: FuncDefNode,
  env: Environment
): void {
  const location = stat.span.start;
  const closure = this.makeClosure(stat.func, env, stat.path.join('.'));
  const owner = stat.path.slice(0, -1);
  const name = stat.path[stat.path.length - 1] ?? '';

  if (owner.length === 0) {
    if (env.has(name)) {
      env.update(name, closure, location);
    } else {
      env.root().bind(name, closure);
    }
    return;
  }

  setIndex(this.ctx, this.resolvePath(owner, env, location), name, closure, location);
};

/** `function a.b:m()` stores a closure taking self first into a.b */
Evaluator.prototype.executeMethDef = function (
  this: Evaluator,
  stat: MethDefNode,
  env: Environment
): void {
  const location = stat.span.start;
  const func = { ...stat.func, params: ['self', ...stat.func.params] };
  const closure = this.makeClosure(
    func,
    env,
    `${stat.path.join('.')}:${stat.method}`
  );
  setIndex(
    this.ctx,
    this.resolvePath(stat.path, env, location),
    stat.method,
    closure,
    location
  );
};

// ============================================================
// ASSIGNMENT
// ============================================================

/**
 * Right side first, then targets left to right.
 * Missing values become nil; extra values are dropped.
 */
Evaluator.prototype.executeAssign = function (
  this: Evaluator,
  stat: AssignNode,
  env: Environment
): void {
  const values = this.evaluateExpList(stat.exps, env);

  stat.targets.forEach((target, i) => {
    const value = values[i] ?? null;
    const location = target.span.start;
    if (target.type === 'Var') {
      env.update(target.name, value, location);
    } else {
      const table = this.evaluate(target.target, env);
      const key = this.evaluate(target.key, env);
      setIndex(this.ctx, table, key, value, location);
    }
  });
};
