/**
 * Statement Outcomes
 *
 * Statements report how control leaves them instead of throwing.
 * Loops consume BREAK; function activations consume RETURN.
 */

import type { SourceSpan } from '../../types.js';
import type { LuaValue } from './values.js';

export type Outcome =
  | { readonly kind: 'normal' }
  | { readonly kind: 'break'; readonly span: SourceSpan }
  | { readonly kind: 'return'; readonly values: LuaValue[] };

export const NORMAL: Outcome = { kind: 'normal' };
