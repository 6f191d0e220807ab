/**
 * Moonlet Environment Tests
 */

import { describe, expect, it } from 'vitest';

import { Environment, RuntimeError } from '../../src/index.js';

describe('Moonlet Environment', () => {
  it('reads bindings through parent frames', () => {
    const root = new Environment();
    root.bind('x', 1);
    const inner = root.child().child();
    expect(inner.lookup('x')).toBe(1);
    expect(inner.has('x')).toBe(true);
  });

  it('shadows outer bindings', () => {
    const root = new Environment();
    root.bind('x', 1);
    const inner = root.child();
    inner.bind('x', 2);
    expect(inner.lookup('x')).toBe(2);
    expect(root.lookup('x')).toBe(1);
  });

  it('updates the nearest binding frame', () => {
    const root = new Environment();
    root.bind('x', 1);
    const middle = root.child();
    middle.bind('x', 2);
    const inner = middle.child();

    inner.update('x', 3);

    expect(middle.lookup('x')).toBe(3);
    expect(root.lookup('x')).toBe(1);
    expect(inner.names()).toEqual([]);
  });

  it('keeps nil bindings distinct from unbound names', () => {
    const env = new Environment();
    env.bind('empty', null);
    expect(env.has('empty')).toBe(true);
    expect(env.lookup('empty')).toBeNull();
  });

  it('fails to read an unbound name', () => {
    const env = new Environment();
    const location = { line: 2, column: 4, offset: 9 };
    expect(() => env.lookup('ghost', location)).toThrow(RuntimeError);
    expect(() => env.lookup('ghost', location)).toThrow(
      'Variable ghost is not defined at 2:4'
    );
  });

  it('fails to update an unbound name', () => {
    const env = new Environment().child();
    expect(() => env.update('ghost', 1)).toThrow('Cannot assign to undefined variable ghost');
  });

  it('finds the root frame', () => {
    const root = new Environment();
    const inner = root.child().child();
    expect(inner.root()).toBe(root);
    expect(root.root()).toBe(root);
    expect(inner.parent?.parent).toBe(root);
  });

  it('lists names bound in its own frame', () => {
    const root = new Environment();
    root.bind('a', 1);
    const inner = root.child();
    inner.bind('b', 2);
    inner.bind('c', 3);
    expect(inner.names()).toEqual(['b', 'c']);
  });
});
