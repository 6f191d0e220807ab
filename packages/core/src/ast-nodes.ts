import type { SourceSpan } from './source-location.js';

interface BaseNode {
  readonly span: SourceSpan;
}

// ============================================================
// BLOCKS
// ============================================================

/** Sequence of statements; the body of a chunk, function or loop */
export interface BlockNode extends BaseNode {
  readonly type: 'Block';
  readonly statements: StatNode[];
}

// ============================================================
// STATEMENTS
// ============================================================

export interface WhileNode extends BaseNode {
  readonly type: 'While';
  readonly condition: ExpNode;
  readonly body: BlockNode;
}

/** repeat body until condition; the condition runs after every pass */
export interface RepeatNode extends BaseNode {
  readonly type: 'Repeat';
  readonly body: BlockNode;
  readonly condition: ExpNode;
}

/**
 * if/elseif/else chain.
 * An elseif is stored as a nested If that is the only statement of
 * elseBody.
 */
export interface IfNode extends BaseNode {
  readonly type: 'If';
  readonly condition: ExpNode;
  readonly thenBody: BlockNode;
  readonly elseBody: BlockNode | null;
}

/** for name = start, stop [, step] do ... end */
export interface NumericForNode extends BaseNode {
  readonly type: 'NumericFor';
  readonly name: string;
  readonly start: ExpNode;
  readonly stop: ExpNode;
  /** Literal 1 when the source omits the step */
  readonly step: ExpNode;
  readonly body: BlockNode;
}

/** for a, b in explist do ... end */
export interface GenericForNode extends BaseNode {
  readonly type: 'GenericFor';
  readonly names: string[];
  readonly exps: ExpNode[];
  readonly body: BlockNode;
}

/**
 * function a.b.c(params) ... end
 * `path` holds every name; the last one is the one defined.
 */
export interface FuncDefNode extends BaseNode {
  readonly type: 'FuncDef';
  readonly path: string[];
  readonly func: FuncNode;
}

/** function a.b:m(params) ... end, with an implicit self parameter */
export interface MethDefNode extends BaseNode {
  readonly type: 'MethDef';
  readonly path: string[];
  readonly method: string;
  readonly func: FuncNode;
}

export interface LocalFuncDefNode extends BaseNode {
  readonly type: 'LocalFuncDef';
  readonly name: string;
  readonly func: FuncNode;
}

export interface LocalNode extends BaseNode {
  readonly type: 'Local';
  readonly names: string[];
  readonly exps: ExpNode[];
}

export interface ReturnNode extends BaseNode {
  readonly type: 'Return';
  readonly exps: ExpNode[];
}

export interface BreakNode extends BaseNode {
  readonly type: 'Break';
}

export interface AssignNode extends BaseNode {
  readonly type: 'Assign';
  readonly targets: AssignTarget[];
  readonly exps: ExpNode[];
}

export type AssignTarget = VarNode | IndexNode;

export type StatNode =
  | BlockNode
  | WhileNode
  | RepeatNode
  | IfNode
  | NumericForNode
  | GenericForNode
  | FuncDefNode
  | MethDefNode
  | LocalFuncDefNode
  | LocalNode
  | ReturnNode
  | BreakNode
  | AssignNode
  | FuncCallNode
  | MethCallNode;

// ============================================================
// EXPRESSIONS
// ============================================================

export type BinaryOp =
  | 'Or'
  | 'And'
  | 'Lt'
  | 'Gt'
  | 'Le'
  | 'Ge'
  | 'Ne'
  | 'Eq'
  | 'Concat'
  | 'Add'
  | 'Sub'
  | 'Mul'
  | 'Div'
  | 'Mod'
  | 'Pow';

export type UnaryOp = 'Not' | 'Neg' | 'Len';

/** Binary operation; the operator is the node type */
export interface BinaryNode<Op extends BinaryOp = BinaryOp> extends BaseNode {
  readonly type: Op;
  readonly left: ExpNode;
  readonly right: ExpNode;
}

export interface UnaryNode<Op extends UnaryOp = UnaryOp> extends BaseNode {
  readonly type: Op;
  readonly operand: ExpNode;
}

export type LiteralValue = null | boolean | number | string;

export interface LitNode extends BaseNode {
  readonly type: 'Lit';
  readonly value: LiteralValue;
}

/**
 * Variable reference.
 * `...` is the variable named "..." holding the extra arguments table.
 */
export interface VarNode extends BaseNode {
  readonly type: 'Var';
  readonly name: string;
}

/** t[k], and t.k with a string literal key */
export interface IndexNode extends BaseNode {
  readonly type: 'Index';
  readonly target: ExpNode;
  readonly key: ExpNode;
}

export interface FuncCallNode extends BaseNode {
  readonly type: 'FuncCall';
  readonly callee: ExpNode;
  readonly args: ExpNode[];
}

/** receiver:method(args) */
export interface MethCallNode extends BaseNode {
  readonly type: 'MethCall';
  readonly receiver: ExpNode;
  readonly method: string;
  readonly args: ExpNode[];
}

/**
 * Function literal.
 * A trailing `...` parameter collects extra arguments.
 */
export interface FuncNode extends BaseNode {
  readonly type: 'Func';
  readonly params: string[];
  readonly body: BlockNode;
}

export type TableField =
  | { readonly kind: 'positional'; readonly value: ExpNode }
  | { readonly kind: 'keyed'; readonly key: ExpNode; readonly value: ExpNode };

export interface TableConstNode extends BaseNode {
  readonly type: 'TableConst';
  readonly fields: TableField[];
}

/** ( exp ); truncates a multi-value expression to its first value */
export interface ParenNode extends BaseNode {
  readonly type: 'Paren';
  readonly expression: ExpNode;
}

export type ExpNode =
  | BinaryNode
  | UnaryNode
  | LitNode
  | VarNode
  | IndexNode
  | FuncCallNode
  | MethCallNode
  | FuncNode
  | TableConstNode
  | ParenNode;

export type CallNode = FuncCallNode | MethCallNode;

export type ASTNode = StatNode | ExpNode;

// ============================================================
// NODE GUARDS
// ============================================================

const BINARY_OPS: ReadonlySet<string> = new Set<BinaryOp>([
  'Or',
  'And',
  'Lt',
  'Gt',
  'Le',
  'Ge',
  'Ne',
  'Eq',
  'Concat',
  'Add',
  'Sub',
  'Mul',
  'Div',
  'Mod',
  'Pow',
]);

export function isBinaryNode(node: ASTNode): node is BinaryNode {
  return BINARY_OPS.has(node.type);
}

export function isUnaryNode(node: ASTNode): node is UnaryNode {
  return node.type === 'Not' || node.type === 'Neg' || node.type === 'Len';
}

export function isCallNode(node: ASTNode): node is CallNode {
  return node.type === 'FuncCall' || node.type === 'MethCall';
}
