/**
 * Evaluator Extension: Calls
 * Call expressions, multi-value expression lists and closure activation
 */

import type { CallNode, ExpNode } from '../../../types.js';
import { ControlFlowError, isCallNode, RuntimeError } from '../../../types.js';
import { popCallFrame, pushCallFrame } from '../context.js';
import type { Environment } from '../environment.js';
import { call, index } from '../operators.js';
import { LuaTable } from '../table.js';
import type { Closure, LuaValue } from '../values.js';
import { Evaluator } from './evaluator.js';

declare module './evaluator.js' {
  interface Evaluator {
    evaluateMulti(exp: ExpNode, env: Environment): LuaValue[];
    evaluateExpList(exps: readonly ExpNode[], env: Environment): LuaValue[];
    evaluateCall(node: CallNode, env: Environment): LuaValue[];
    invokeClosure(closure: Closure, args: LuaValue[]): LuaValue[];
  }
}

/** Name shown in call frames: `f`, `a.b`, `obj:m` */
function calleeName(node: CallNode): string | undefined {
  if (node.type === 'MethCall') {
    const receiver = pathName(node.receiver);
    return receiver === undefined
      ? node.method
      : `${receiver}:${node.method}`;
  }
  return pathName(node.callee);
}

function pathName(exp: ExpNode): string | undefined {
  if (exp.type === 'Var') return exp.name;
  if (exp.type === 'Index' && exp.key.type === 'Lit') {
    const owner = pathName(exp.target);
    const key = exp.key.value;
    if (owner !== undefined && typeof key === 'string') {
      return `${owner}.${key}`;
    }
  }
  return undefined;
}

// ============================================================
// EXPRESSION LISTS
// ============================================================

/** Calls yield every result; other expressions exactly one */
Evaluator.prototype.evaluateMulti = function (
  this: Evaluator,
  exp: ExpNode,
  env: Environment
): LuaValue[] {
  return isCallNode(exp) ? this.evaluateCall(exp, env) : [this.evaluate(exp, env)];
};

/** Only a call in the last position expands to all of its results */
Evaluator.prototype.evaluateExpList = function (
  this: Evaluator,
  exps: readonly ExpNode[],
  env: Environment
): LuaValue[] {
  const values: LuaValue[] = [];
  exps.forEach((exp, i) => {
    if (i === exps.length - 1) {
      values.push(...this.evaluateMulti(exp, env));
    } else {
      values.push(this.evaluate(exp, env));
    }
  });
  return values;
};

// ============================================================
// CALLS
// ============================================================

/**
 * Evaluate a call. Method calls evaluate the receiver once and pass it
 * first. Errors raised below record the call stack on the way out.
 */
Evaluator.prototype.evaluateCall = function (
  this: Evaluator,
  node: CallNode,
  env: Environment
): LuaValue[] {
  const location = node.span.start;
  let fn: LuaValue;
  let args: LuaValue[];

  if (node.type === 'MethCall') {
    const receiver = this.evaluate(node.receiver, env);
    fn = index(this.ctx, receiver, node.method, location);
    args = [receiver, ...this.evaluateExpList(node.args, env)];
  } else {
    fn = this.evaluate(node.callee, env);
    args = this.evaluateExpList(node.args, env);
  }

  pushCallFrame(this.ctx, {
    location: node.span,
    functionName: calleeName(node),
  });
  try {
    return call(this.ctx, fn, args, location);
  } catch (error) {
    if (error instanceof RuntimeError) {
      error.recordCallStack(this.ctx.callStack);
    }
    throw error;
  } finally {
    popCallFrame(this.ctx);
  }
};

/**
 * Run a closure in a fresh frame under its captured environment.
 * Missing arguments are nil; a trailing '...' parameter receives the
 * rest as a table keyed 1..n.
 */
Evaluator.prototype.invokeClosure = function (
  this: Evaluator,
  closure: Closure,
  args: LuaValue[]
): LuaValue[] {
  const activation = closure.env.child();

  closure.params.forEach((name, i) => {
    if (name === '...') {
      activation.bind(name, LuaTable.from(args.slice(i)));
    } else {
      activation.bind(name, args[i] ?? null);
    }
  });

  const outcome = this.executeBlock(closure.body, activation);
  switch (outcome.kind) {
    case 'return':
      return outcome.values;
    case 'break':
      throw new ControlFlowError('function', outcome.span.start);
    case 'normal':
      return [];
  }
};
