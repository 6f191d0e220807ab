/**
 * Evaluator Extension: Expressions
 * Operators, literals, closures and table constructors
 */

import type {
  BinaryNode,
  ExpNode,
  FuncNode,
  TableConstNode,
} from '../../../types.js';
import { isCallNode } from '../../../types.js';
import type { Environment } from '../environment.js';
import {
  arith,
  concat,
  eq,
  ge,
  gt,
  index,
  le,
  len,
  lt,
  unm,
  type ArithOp,
} from '../operators.js';
import { LuaTable } from '../table.js';
import { isTruthy, type Closure, type LuaValue } from '../values.js';
import { Evaluator } from './evaluator.js';

declare module './evaluator.js' {
  interface Evaluator {
    evaluate(exp: ExpNode, env: Environment): LuaValue;
    evaluateBinary(exp: BinaryNode, env: Environment): LuaValue;
    evaluateTable(exp: TableConstNode, env: Environment): LuaTable;
    makeClosure(
      func: FuncNode,
      env: Environment,
      name: string | undefined
    ): Closure;
  }
}

const ARITH_OPS: Partial<Record<BinaryNode['type'], ArithOp>> = {
  Add: 'add',
  Sub: 'sub',
  Mul: 'mul',
  Div: 'div',
  Mod: 'mod',
  Pow: 'pow',
};

// ============================================================
// DISPATCH
// ============================================================

/** Evaluate to a single value; calls are truncated to their first result */
Evaluator.prototype.evaluate = function (
  this: Evaluator,
  exp: ExpNode,
  env: Environment
): LuaValue {
  const location = exp.span.start;

  switch (exp.type) {
    case 'Lit':
      return exp.value;
    case 'Var':
      return env.lookup(exp.name, location);
    case 'Index':
      return index(
        this.ctx,
        this.evaluate(exp.target, env),
        this.evaluate(exp.key, env),
        location
      );
    case 'FuncCall':
    case 'MethCall':
      return this.evaluateCall(exp, env)[0] ?? null;
    case 'Func':
      return this.makeClosure(exp, env, undefined);
    case 'TableConst':
      return this.evaluateTable(exp, env);
    case 'Paren':
      return this.evaluate(exp.expression, env);
    case 'Not':
      return !isTruthy(this.evaluate(exp.operand, env));
    case 'Neg':
      return unm(this.ctx, this.evaluate(exp.operand, env), location);
    case 'Len':
      return len(this.ctx, this.evaluate(exp.operand, env), location);
    default:
      return this.evaluateBinary(exp, env);
  }
};

// ============================================================
// BINARY OPERATORS
// ============================================================

/** `and`/`or` short-circuit and yield one of their operands */
Evaluator.prototype.evaluateBinary = function (
  this: Evaluator,
  exp: BinaryNode,
  env: Environment
): LuaValue {
  const left = this.evaluate(exp.left, env);

  if (exp.type === 'And') {
    return isTruthy(left) ? this.evaluate(exp.right, env) : left;
  }
  if (exp.type === 'Or') {
    return isTruthy(left) ? left : this.evaluate(exp.right, env);
  }

  const right = this.evaluate(exp.right, env);
  const location = exp.span.start;

  switch (exp.type) {
    case 'Eq':
      return eq(this.ctx, left, right, location);
    case 'Ne':
      return !eq(this.ctx, left, right, location);
    case 'Lt':
      return lt(this.ctx, left, right, location);
    case 'Gt':
      return gt(this.ctx, left, right, location);
    case 'Le':
      return le(this.ctx, left, right, location);
    case 'Ge':
      return ge(this.ctx, left, right, location);
    case 'Concat':
      return concat(this.ctx, left, right, location);
  }

  const op = ARITH_OPS[exp.type];
  if (op === undefined) {
    throw new Error(`Unhandled binary operator: ${exp.type}`);
  }
  return arith(this.ctx, op, left, right, location);
};

// ============================================================
// CONSTRUCTORS
// ============================================================

/**
 * Positional fields append at the table's border plus one, so they never
 * overwrite a key already present. A call in the last field contributes
 * all of its results.
 */
Evaluator.prototype.evaluateTable = function (
  this: Evaluator,
  exp: TableConstNode,
  env: Environment
): LuaTable {
  const table = new LuaTable();

  exp.fields.forEach((field, i) => {
    if (field.kind === 'keyed') {
      const key = this.evaluate(field.key, env);
      const value = this.evaluate(field.value, env);
      table.set(key, value, field.key.span.start);
      return;
    }

    const isLast = i === exp.fields.length - 1;
    const values = isLast && isCallNode(field.value)
      ? this.evaluateMulti(field.value, env)
      : [this.evaluate(field.value, env)];
    for (const value of values) {
      table.set(table.length() + 1, value);
    }
  });

  return table;
};

Evaluator.prototype.makeClosure = function (
  this: Evaluator,
  func: FuncNode,
  env: Environment,
  name: string | undefined
): Closure {
  return {
    kind: 'closure',
    name,
    params: func.params,
    body: func.body,
    env,
  };
};
