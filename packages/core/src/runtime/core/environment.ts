/**
 * Environments
 *
 * Lexical scopes as a chain of frames. Only function activations and loop
 * iterations that introduce variables create frames.
 */

import type { SourceLocation } from '../../types.js';
import { RuntimeError } from '../../types.js';
import type { LuaValue } from './values.js';

export class Environment {
  private readonly vars = new Map<string, LuaValue>();

  constructor(readonly parent: Environment | null = null) {}

  /** Define `name` in this frame, shadowing outer bindings */
  bind(name: string, value: LuaValue): void {
    this.vars.set(name, value);
  }

  /** True when `name` is bound in this frame or any parent */
  has(name: string): boolean {
    return this.frameOf(name) !== null;
  }

  /**
   * Read `name` from the nearest frame that binds it.
   * @throws RuntimeError MOON-R001 when no frame binds it
   */
  lookup(name: string, location?: SourceLocation): LuaValue {
    const frame = this.frameOf(name);
    if (frame === null) {
      throw new RuntimeError(
        'MOON-R001',
        `Variable ${name} is not defined`,
        location,
        { name }
      );
    }
    return frame.vars.get(name) ?? null;
  }

  /**
   * Overwrite `name` in the nearest frame that binds it.
   * @throws RuntimeError MOON-R002 when no frame binds it
   */
  update(name: string, value: LuaValue, location?: SourceLocation): void {
    const frame = this.frameOf(name);
    if (frame === null) {
      throw new RuntimeError(
        'MOON-R002',
        `Cannot assign to undefined variable ${name}`,
        location,
        { name }
      );
    }
    frame.vars.set(name, value);
  }

  child(): Environment {
    return new Environment(this);
  }

  /** Outermost frame of the chain */
  root(): Environment {
    let env: Environment = this;
    while (env.parent !== null) env = env.parent;
    return env;
  }

  /** Names bound in this frame only */
  names(): string[] {
    return [...this.vars.keys()];
  }

  private frameOf(name: string): Environment | null {
    for (let env: Environment | null = this; env !== null; env = env.parent) {
      if (env.vars.has(name)) return env;
    }
    return null;
  }
}
