/**
 * Tables
 *
 * The one structured value type: a map from non-nil keys to non-nil
 * values with an optional metatable.
 */

import type { SourceLocation } from '../../types.js';
import { RuntimeError } from '../../types.js';
import type { LuaValue } from './values.js';

export class LuaTable {
  private readonly fields = new Map<LuaValue, LuaValue>();
  metatable: LuaTable | null = null;

  /** Table holding `values` at keys 1..n */
  static from(values: readonly LuaValue[]): LuaTable {
    const table = new LuaTable();
    values.forEach((value, i) => table.set(i + 1, value));
    return table;
  }

  /** Raw read; nil and NaN keys read as nil */
  get(key: LuaValue): LuaValue {
    return this.fields.get(key) ?? null;
  }

  has(key: LuaValue): boolean {
    return this.fields.has(key);
  }

  /**
   * Raw write. Assigning nil removes the key.
   * @throws RuntimeError MOON-R010 for nil and NaN keys
   */
  set(key: LuaValue, value: LuaValue, location?: SourceLocation): void {
    if (key === null || Number.isNaN(key)) {
      const shown = key === null ? 'nil' : 'NaN';
      throw new RuntimeError('MOON-R010', `Table index is ${shown}`, location, {
        key: shown,
      });
    }
    if (value === null) {
      this.fields.delete(key);
    } else {
      this.fields.set(key, value);
    }
  }

  /** Border: count of consecutive integer keys present from 1 */
  length(): number {
    let n = 0;
    while (this.fields.has(n + 1)) n++;
    return n;
  }

  get size(): number {
    return this.fields.size;
  }

  entries(): IterableIterator<[LuaValue, LuaValue]> {
    return this.fields.entries();
  }
}
