/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'lexer' | 'parse' | 'runtime';

/**
 * Example demonstrating an error condition.
 * Used in error documentation to show common scenarios.
 */
export interface ErrorExample {
  /** Description of the example scenario */
  readonly description: string;
  /** Example code demonstrating the error */
  readonly code: string;
}

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: MOON-{category}{3-digit} (e.g., MOON-R001) */
  readonly errorId: string;
  /** Error category (determines ID prefix) */
  readonly category: ErrorCategory;
  /** Human-readable description */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** What causes this error */
  readonly cause?: string | undefined;
  /** How to resolve this error */
  readonly resolution?: string | undefined;
  /** Example scenarios demonstrating this error */
  readonly examples?: readonly ErrorExample[] | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Central registry for all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: readonly ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

/** All error definitions indexed by error ID */
const ERROR_DEFINITIONS: readonly ErrorDefinition[] = [
  // Lexer Errors (MOON-L0xx)
  {
    errorId: 'MOON-L001',
    category: 'lexer',
    description: 'Unterminated string literal',
    messageTemplate: 'Unterminated string literal',
    cause:
      'A quoted string reached a line break or the end of input before its closing quote.',
    resolution:
      'Close the string on the same line, or use a long string ([[ ... ]]) for multi-line text.',
    examples: [
      { description: 'Missing closing quote', code: 'print("hello)' },
    ],
  },
  {
    errorId: 'MOON-L002',
    category: 'lexer',
    description: 'Invalid character',
    messageTemplate: "Unexpected character '{char}'",
    cause: 'The character is not part of the language syntax.',
    resolution: 'Remove the character or move it inside a string literal.',
    examples: [{ description: 'Stray symbol', code: 'local a = 1 @ 2' }],
  },
  {
    errorId: 'MOON-L003',
    category: 'lexer',
    description: 'Unterminated long bracket',
    messageTemplate: 'Unterminated long {kind}',
    cause:
      'A long string or block comment was opened but its closing bracket of the same level never appears.',
    resolution:
      'Add the closing bracket (]] or ]=...=] with the same number of = signs).',
    examples: [
      { description: 'Unclosed block comment', code: '--[[ note\nlocal a = 1' },
    ],
  },

  // Parse Errors (MOON-P0xx)
  {
    errorId: 'MOON-P001',
    category: 'parse',
    description: 'Expected token',
    messageTemplate: "Expected {expected}, got '{actual}'",
    cause: 'The grammar requires a specific token at this position.',
    resolution:
      'Insert the expected token. Statements must be separated by ";".',
    examples: [
      { description: 'Missing separator', code: 'a = 1 b = 2' },
      { description: 'Missing end', code: 'while true do break' },
    ],
  },
  {
    errorId: 'MOON-P002',
    category: 'parse',
    description: 'Unexpected token',
    messageTemplate: "Unexpected '{actual}' in expression",
    cause: 'An expression was expected but the token cannot start one.',
    resolution: 'Check for a missing operand or an extra operator.',
    examples: [{ description: 'Dangling operator', code: 'local a = 1 +' }],
  },
  {
    errorId: 'MOON-P003',
    category: 'parse',
    description: 'Invalid statement',
    messageTemplate: 'Expression statement must be an assignment or a call',
    cause:
      'A statement began with an expression that is neither an assignment target nor a function call.',
    resolution: 'Assign the value to a variable or call a function with it.',
    examples: [{ description: 'Bare arithmetic', code: '1 + 2' }],
  },
  {
    errorId: 'MOON-P004',
    category: 'parse',
    description: 'Invalid assignment target',
    messageTemplate: 'Cannot assign to this expression',
    cause:
      'Only names and indexed expressions can appear on the left of "=".',
    resolution: 'Assign to a variable, a field (t.x) or an index (t[k]).',
    examples: [{ description: 'Assign to a call', code: 'a, f() = 1, 2' }],
  },
  {
    errorId: 'MOON-P005',
    category: 'parse',
    description: 'Missing method arguments',
    messageTemplate: "Method call ':{method}' requires arguments",
    cause: 'A ":name" method reference must be followed by call arguments.',
    resolution: 'Add an argument list: obj:method().',
    examples: [{ description: 'Method without call', code: 'local f = obj:m' }],
  },
  {
    errorId: 'MOON-P006',
    category: 'parse',
    description: 'Invalid numeric for',
    messageTemplate: 'Numeric for takes exactly one control variable',
    cause: 'A numeric for loop declared more than one name before "=".',
    resolution: 'Use one name, or the generic form "for a, b in ...".',
    examples: [{ description: 'Two names', code: 'for i, j = 1, 2 do end' }],
  },

  // Runtime Errors (MOON-R0xx)
  {
    errorId: 'MOON-R001',
    category: 'runtime',
    description: 'Undefined variable',
    messageTemplate: 'Variable {name} is not defined',
    cause:
      'The name is not bound in any enclosing scope. Names are never created implicitly.',
    resolution:
      'Declare it with "local", define it with "function", or have the host bind it.',
    examples: [{ description: 'Missing global', code: 'print(x)' }],
  },
  {
    errorId: 'MOON-R002',
    category: 'runtime',
    description: 'Assignment to undefined variable',
    messageTemplate: 'Cannot assign to undefined variable {name}',
    cause: 'Assignment only updates existing bindings.',
    resolution: 'Declare the variable with "local" before assigning to it.',
    examples: [{ description: 'Implicit global', code: 'count = 1' }],
  },
  {
    errorId: 'MOON-R003',
    category: 'runtime',
    description: 'Unsupported operation',
    messageTemplate: 'Cannot {operation} {left} and {right}',
    cause:
      'The operands are not numbers (or strings, for ..) and neither metatable defines the event.',
    resolution: 'Convert the operands or define the metamethod.',
    examples: [{ description: 'Add a table', code: 'local a = {} + 1' }],
  },
  {
    errorId: 'MOON-R004',
    category: 'runtime',
    description: 'Cannot apply length',
    messageTemplate: 'Cannot get length of {type} value',
    cause: 'The # operator applies to strings, tables and values with __len.',
    resolution: 'Apply # to a string or table, or define __len.',
    examples: [{ description: 'Length of a number', code: 'local n = #5' }],
  },
  {
    errorId: 'MOON-R005',
    category: 'runtime',
    description: 'Cannot compare',
    messageTemplate: 'Cannot compare {left} with {right}',
    cause:
      'Ordering works on two numbers or two strings; other values need __lt or __le.',
    resolution: 'Compare values of the same kind or define __lt/__le.',
    examples: [{ description: 'Number vs string', code: 'local b = 1 < "2"' }],
  },
  {
    errorId: 'MOON-R006',
    category: 'runtime',
    description: 'Cannot index',
    messageTemplate: 'Cannot index {type} value with key {key}',
    cause: 'The value is not a table and its metatable has no __index.',
    resolution: 'Index a table, or set __index on the value kind metatable.',
    examples: [{ description: 'Index nil', code: 'local a = nil; print(a.b)' }],
  },
  {
    errorId: 'MOON-R007',
    category: 'runtime',
    description: 'Cannot assign index',
    messageTemplate: 'Cannot set key {key} on {type} value',
    cause: 'The value is not a table and its metatable has no __newindex.',
    resolution: 'Assign into a table, or define __newindex.',
    examples: [{ description: 'Assign into a number', code: 'local n = 1; n.x = 2' }],
  },
  {
    errorId: 'MOON-R008',
    category: 'runtime',
    description: 'Not callable',
    messageTemplate: 'Cannot call {type} value',
    cause: 'Only functions and values with a __call metamethod can be called.',
    resolution: 'Check that the name refers to a function.',
    examples: [{ description: 'Call a number', code: 'local n = 1; n()' }],
  },
  {
    errorId: 'MOON-R009',
    category: 'runtime',
    description: 'Invalid for loop bounds',
    messageTemplate: "'for' {part} must be a number",
    cause: 'Numeric for loops need numeric start, stop and step values.',
    resolution: 'Make sure every bound evaluates to a number.',
    examples: [{ description: 'String bound', code: 'for i = 1, "x" do end' }],
  },
  {
    errorId: 'MOON-R010',
    category: 'runtime',
    description: 'Invalid table key',
    messageTemplate: 'Table index is {key}',
    cause: 'nil and NaN cannot be used as table keys.',
    resolution: 'Use a non-nil, non-NaN key.',
    examples: [{ description: 'nil key', code: 'local t = {[nil] = 1}' }],
  },
  {
    errorId: 'MOON-R011',
    category: 'runtime',
    description: 'Break outside loop',
    messageTemplate: 'break escaped {boundary} without an enclosing loop',
    cause:
      'A break statement ran with no loop between it and the enclosing function or chunk.',
    resolution: 'Only use break inside while, repeat or for loops.',
    examples: [{ description: 'Top-level break', code: 'break' }],
  },
  {
    errorId: 'MOON-R012',
    category: 'runtime',
    description: 'Metatable chain too deep',
    messageTemplate: '{event} chain exceeded {limit} levels',
    cause:
      'Resolving __index or __newindex followed more tables than maxIndexDepth allows, usually because of a cycle.',
    resolution: 'Break the metatable cycle or raise maxIndexDepth.',
    examples: [
      {
        description: 'Self-referencing __index',
        code: 'local t = {}; setmetatable(t, {__index = t}); print(t.x)',
      },
    ],
  },
];

/** Global error registry instance */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing {placeholder} tokens with
 * values from the context record.
 *
 * Missing placeholders render as an empty string. An unclosed brace
 * returns the template unchanged.
 *
 * @example
 * renderMessage("Variable {name} is not defined", { name: "x" })
 * // Returns: "Variable x is not defined"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{') {
      const close = template.indexOf('}', i + 1);
      if (close === -1) {
        return template;
      }

      const value = context[template.slice(i + 1, close)];
      if (value !== undefined) {
        try {
          result += String(value);
        } catch {
          result += Object.prototype.toString.call(value);
        }
      }

      i = close + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
