/**
 * AST Printer
 * Renders nodes back to canonical source text that parses to an
 * equivalent tree.
 */

import type {
  ASTNode,
  BinaryOp,
  BlockNode,
  ExpNode,
  FuncNode,
  IfNode,
  StatNode,
  TableField,
  UnaryOp,
} from './types.js';
import { isBinaryNode, isCallNode, isUnaryNode } from './types.js';
import { KEYWORDS } from './lexer/operators.js';

// ============================================================
// OPERATOR SYMBOLS
// ============================================================

const BINARY_SYMBOLS: Record<BinaryOp, string> = {
  Or: 'or',
  And: 'and',
  Lt: '<',
  Gt: '>',
  Le: '<=',
  Ge: '>=',
  Ne: '~=',
  Eq: '==',
  Concat: '..',
  Add: '+',
  Sub: '-',
  Mul: '*',
  Div: '/',
  Mod: '%',
  Pow: '^',
};

const UNARY_SYMBOLS: Record<UnaryOp, string> = {
  Not: 'not ',
  Neg: '-',
  Len: '#',
};

// ============================================================
// PUBLIC API
// ============================================================

/**
 * Format a node as canonical source.
 *
 * A Block renders as its statements joined by "; ". Binary and unary
 * operations are fully parenthesised.
 *
 * @example
 * ```typescript
 * formatNode(parseExpression('1 + 2 * 3')); // '(1 + (2 * 3))'
 * ```
 */
export function formatNode(node: ASTNode): string {
  switch (node.type) {
    case 'Block':
      return formatBlock(node);
    case 'While':
    case 'Repeat':
    case 'If':
    case 'NumericFor':
    case 'GenericFor':
    case 'FuncDef':
    case 'MethDef':
    case 'LocalFuncDef':
    case 'Local':
    case 'Return':
    case 'Break':
    case 'Assign':
      return formatStatement(node);
    default:
      return formatExpression(node);
  }
}

// ============================================================
// STATEMENTS
// ============================================================

function formatBlock(block: BlockNode): string {
  return block.statements.map(formatStatement).join('; ');
}

/** Block body between keywords, padded with one space on each side */
function formatBody(block: BlockNode): string {
  const text = formatBlock(block);
  return text === '' ? ' ' : ` ${text} `;
}

function formatStatement(stat: StatNode): string {
  switch (stat.type) {
    case 'Block':
      return `do${formatBody(stat)}end`;
    case 'While':
      return `while ${formatExpression(stat.condition)} do${formatBody(stat.body)}end`;
    case 'Repeat':
      return `repeat${formatBody(stat.body)}until ${formatExpression(stat.condition)}`;
    case 'If':
      return `if ${formatIfRest(stat)}`;
    case 'NumericFor':
      return (
        `for ${stat.name} = ${formatExpression(stat.start)}, ` +
        `${formatExpression(stat.stop)}, ${formatExpression(stat.step)} ` +
        `do${formatBody(stat.body)}end`
      );
    case 'GenericFor':
      return (
        `for ${stat.names.join(', ')} in ${formatList(stat.exps)} ` +
        `do${formatBody(stat.body)}end`
      );
    case 'FuncDef':
      return `function ${stat.path.join('.')}${formatFuncBody(stat.func)}`;
    case 'MethDef':
      return `function ${stat.path.join('.')}:${stat.method}${formatFuncBody(stat.func)}`;
    case 'LocalFuncDef':
      return `local function ${stat.name}${formatFuncBody(stat.func)}`;
    case 'Local':
      return stat.exps.length === 0
        ? `local ${stat.names.join(', ')}`
        : `local ${stat.names.join(', ')} = ${formatList(stat.exps)}`;
    case 'Return':
      return stat.exps.length === 0
        ? 'return'
        : `return ${formatList(stat.exps)}`;
    case 'Break':
      return 'break';
    case 'Assign':
      return `${formatList(stat.targets)} = ${formatList(stat.exps)}`;
    case 'FuncCall':
    case 'MethCall':
      return formatExpression(stat);
  }
}

/** Condition onwards; an else block holding only an If prints as elseif */
function formatIfRest(stat: IfNode): string {
  const head = `${formatExpression(stat.condition)} then${formatBody(stat.thenBody)}`;
  const elseBody = stat.elseBody;
  if (elseBody === null) {
    return `${head}end`;
  }
  const only = elseBody.statements.length === 1 ? elseBody.statements[0] : null;
  if (only?.type === 'If') {
    return `${head}elseif ${formatIfRest(only)}`;
  }
  return `${head}else${formatBody(elseBody)}end`;
}

function formatFuncBody(func: FuncNode): string {
  return `(${func.params.join(', ')})${formatBody(func.body)}end`;
}

// ============================================================
// EXPRESSIONS
// ============================================================

function formatList(exps: readonly ExpNode[]): string {
  return exps.map(formatExpression).join(', ');
}

function formatExpression(exp: ExpNode): string {
  if (isBinaryNode(exp)) {
    const left = formatExpression(exp.left);
    const right = formatExpression(exp.right);
    return `(${left} ${BINARY_SYMBOLS[exp.type]} ${right})`;
  }
  if (isUnaryNode(exp)) {
    return `(${UNARY_SYMBOLS[exp.type]}${formatExpression(exp.operand)})`;
  }

  switch (exp.type) {
    case 'Lit':
      return formatLiteral(exp.value);
    case 'Var':
      return exp.name;
    case 'Index': {
      const target = formatPrefix(exp.target);
      const key = exp.key;
      if (key.type === 'Lit' && typeof key.value === 'string' && isName(key.value)) {
        return `${target}.${key.value}`;
      }
      return `${target}[${formatExpression(key)}]`;
    }
    case 'FuncCall':
      return `${formatPrefix(exp.callee)}(${formatList(exp.args)})`;
    case 'MethCall':
      return `${formatPrefix(exp.receiver)}:${exp.method}(${formatList(exp.args)})`;
    case 'Func':
      return `function${formatFuncBody(exp)}`;
    case 'TableConst':
      return exp.fields.length === 0
        ? '{}'
        : `{${exp.fields.map(formatField).join(', ')}}`;
    case 'Paren':
      // Parentheses only change meaning around a call (one value)
      return isCallNode(exp.expression)
        ? `(${formatExpression(exp.expression)})`
        : formatExpression(exp.expression);
    default: {
      const exhaustive: never = exp;
      throw new TypeError(`Unknown expression: ${JSON.stringify(exhaustive)}`);
    }
  }
}

/** Callee, receiver or index target: a name, index, call or ( exp ) */
function formatPrefix(exp: ExpNode): string {
  switch (exp.type) {
    case 'Var':
    case 'Index':
    case 'FuncCall':
    case 'MethCall':
      return formatExpression(exp);
    case 'Paren':
      return `(${formatExpression(exp.expression)})`;
    default: {
      const text = formatExpression(exp);
      return text.startsWith('(') ? text : `(${text})`;
    }
  }
}

function formatField(field: TableField): string {
  if (field.kind === 'positional') {
    return formatExpression(field.value);
  }
  const key = field.key;
  const value = formatExpression(field.value);
  if (key.type === 'Lit' && typeof key.value === 'string' && isName(key.value)) {
    return `${key.value} = ${value}`;
  }
  return `[${formatExpression(key)}] = ${value}`;
}

function isName(text: string): boolean {
  return /^[A-Za-z_][A-Za-z0-9_]*$/.test(text) && !Object.hasOwn(KEYWORDS, text);
}

// ============================================================
// LITERALS
// ============================================================

function formatLiteral(value: null | boolean | number | string): string {
  if (value === null) return 'nil';
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'number') return formatNumberLiteral(value);
  return formatStringLiteral(value);
}

/**
 * Plain decimal digits only; the scanner reads no exponents.
 * Non-finite values print as the divisions that produce them.
 */
export function formatNumberLiteral(value: number): string {
  if (Number.isNaN(value)) return '(0/0)';
  if (value === Infinity) return '(1/0)';
  if (value === -Infinity) return '(-1/0)';
  if (value < 0 || Object.is(value, -0)) {
    return `(-${formatNumberLiteral(-value)})`;
  }

  const text = String(value);
  const exponentAt = text.indexOf('e');
  if (exponentAt === -1) return text;

  // At or above 1e21 every double is an integer
  if (value >= 1) return BigInt(value).toString();

  const mantissa = text.slice(0, exponentAt);
  const exponent = Number(text.slice(exponentAt + 1));
  const point = mantissa.indexOf('.');
  const digits = mantissa.replace('.', '');
  const intLength = point === -1 ? mantissa.length : point;
  return `0.${'0'.repeat(-(intLength + exponent))}${digits}`;
}

const STRING_ESCAPES: Record<string, string> = {
  '\\': '\\\\',
  '"': '\\"',
  '\b': '\\b',
  '\f': '\\f',
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
};

/** Double-quoted, with control characters as \uXXXX */
export function formatStringLiteral(value: string): string {
  let result = '"';
  for (const char of value) {
    const escape = STRING_ESCAPES[char];
    if (escape !== undefined) {
      result += escape;
      continue;
    }
    const code = char.charCodeAt(0);
    if (code < 0x20 || code === 0x7f) {
      result += `\\u${code.toString(16).padStart(4, '0')}`;
      continue;
    }
    result += char;
  }
  return `${result}"`;
}
