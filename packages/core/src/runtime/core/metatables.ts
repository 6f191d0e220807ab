/**
 * Metatable Access
 *
 * Tables carry their own metatable; every other kind shares one per kind,
 * stored on the runtime context. nil never has a metatable.
 */

import { LuaTable } from './table.js';
import type { KindMetatables, RuntimeContext } from './types.js';
import { typeName, type LuaValue } from './values.js';

/** Metatable events that dispatch to handlers */
export type MetaEvent =
  | '__add'
  | '__sub'
  | '__mul'
  | '__div'
  | '__mod'
  | '__pow'
  | '__unm'
  | '__concat'
  | '__len'
  | '__eq'
  | '__lt'
  | '__le'
  | '__index'
  | '__newindex'
  | '__call';

function kindOf(value: LuaValue): keyof KindMetatables | null {
  const type = typeName(value);
  return type === 'nil' || type === 'table' ? null : type;
}

export function getMetatable(
  ctx: RuntimeContext,
  value: LuaValue
): LuaTable | null {
  if (value instanceof LuaTable) return value.metatable;
  const kind = kindOf(value);
  return kind === null ? null : ctx.metatables[kind];
}

/**
 * Set the metatable of a table, or of every value sharing a kind.
 * @throws TypeError for nil
 */
export function setMetatable(
  ctx: RuntimeContext,
  value: LuaValue,
  metatable: LuaTable | null
): void {
  if (value instanceof LuaTable) {
    value.metatable = metatable;
    return;
  }
  const kind = kindOf(value);
  if (kind === null) {
    throw new TypeError('Cannot set a metatable on nil');
  }
  ctx.metatables[kind] = metatable;
}

/** Handler for `event` on the value's metatable, or null */
export function getMetamethod(
  ctx: RuntimeContext,
  value: LuaValue,
  event: MetaEvent
): LuaValue {
  const metatable = getMetatable(ctx, value);
  return metatable === null ? null : metatable.get(event);
}
