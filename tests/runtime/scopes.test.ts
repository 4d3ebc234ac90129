/**
 * Cells, Environment and Stack Tests
 */

import { describe, expect, it } from 'vitest';

import {
  cellFor,
  Environment,
  owned,
  read,
  share,
  shared,
  Stack,
  write,
} from '../../src/index.js';

describe('cells', () => {
  it('replaces owned cells on write', () => {
    const cell = owned(1);
    const next = write(cell, 2);
    expect(next).not.toBe(cell);
    expect(read(cell)).toBe(1);
    expect(read(next)).toBe(2);
  });

  it('writes shared cells in place', () => {
    const cell = shared(1);
    expect(write(cell, 2)).toBe(cell);
    expect(read(cell)).toBe(2);
  });

  it('picks the cell kind from capture analysis', () => {
    expect(cellFor(1, true).kind).toBe('shared');
    expect(cellFor(1, false).kind).toBe('owned');
  });

  it('promotes owned cells and keeps shared ones', () => {
    const sharedCell = shared(3);
    expect(share(sharedCell)).toBe(sharedCell);
    expect(share(owned(4))).toMatchObject({ kind: 'shared', ref: { value: 4 } });
  });
});

describe('Environment', () => {
  it('declares a name once', () => {
    const env = new Environment();
    expect(env.declare('x', owned(1)).ok).toBe(true);
    const again = env.declare('x', owned(2));
    expect(again.ok).toBe(false);
    if (again.ok) return;
    expect(again.diagnostic).toMatchObject({ kind: 'AlreadyDeclared', name: 'x' });
    expect(env.get('x')).toBe(1);
  });

  it('assigns only existing names', () => {
    const env = new Environment();
    const missing = env.assign('y', 1);
    expect(missing.ok).toBe(false);
    env.upsert('y', owned(0));
    expect(env.assign('y', 5).ok).toBe(true);
    expect(env.get('y')).toBe(5);
  });

  it('keeps a shared cell across assignments', () => {
    const env = new Environment();
    const cell = shared(0);
    env.upsert('n', cell);
    env.assign('n', 7);
    expect(env.lookup('n')).toBe(cell);
    expect(read(cell)).toBe(7);
  });

  it('iterates in insertion order', () => {
    const env = new Environment();
    env.upsert('b', owned(1));
    env.upsert('a', owned(2));
    expect([...env].map(([name]) => name)).toEqual(['b', 'a']);
    expect(env.size).toBe(2);
  });
});

describe('Stack', () => {
  function createStack(maxCallDepth = 256) {
    const global = new Environment();
    const base = new Environment();
    base.upsert('exiba', owned(null));
    return { stack: new Stack(global, base, maxCallDepth), global, base };
  }

  it('counts frames and call frames separately', () => {
    const { stack } = createStack();
    stack.push(new Environment(), { kind: 'block' });
    stack.push(new Environment(), { kind: 'call', functionName: 'f' });
    expect(stack.depth).toBe(2);
    expect(stack.callDepth).toBe(1);
    stack.pop();
    stack.pop();
    expect(stack.depth).toBe(0);
    expect(stack.callDepth).toBe(0);
  });

  it('refuses call frames past the limit', () => {
    const { stack } = createStack(2);
    expect(stack.push(new Environment(), { kind: 'call' }).ok).toBe(true);
    expect(stack.push(new Environment(), { kind: 'call' }).ok).toBe(true);
    const third = stack.push(new Environment(), { kind: 'call' });
    expect(third.ok).toBe(false);
    if (third.ok) return;
    expect(third.diagnostic).toMatchObject({ kind: 'StackOverflow', limit: 2 });
    expect(stack.callDepth).toBe(2);
    expect(stack.push(new Environment(), { kind: 'block' }).ok).toBe(true);
  });

  it('declares into the innermost frame', () => {
    const { stack, global } = createStack();
    stack.declare('g', owned(1));
    const inner = new Environment();
    stack.push(inner, { kind: 'block' });
    stack.declare('b', owned(2));
    expect(global.has('g')).toBe(true);
    expect(inner.has('b')).toBe(true);
    expect(global.has('b')).toBe(false);
  });

  it('does not resolve names through caller frames', () => {
    const { stack, global } = createStack();
    global.upsert('g', owned(1));
    const caller = new Environment();
    caller.upsert('local', owned(2));
    stack.push(caller, { kind: 'block' });
    stack.push(new Environment(), { kind: 'call' });

    expect(stack.resolve('local')).toBeUndefined();
    expect(stack.resolve('g')).toBeDefined();
    expect(stack.resolve('exiba')).toBeDefined();
    stack.pop();
    expect(stack.resolve('local')).toBeDefined();
  });

  it('resolves callee globals from the call frame', () => {
    const { stack, global } = createStack();
    global.upsert('x', owned('importador'));
    const moduleGlobals = new Environment();
    moduleGlobals.upsert('x', owned('módulo'));
    stack.push(new Environment(), { kind: 'call', globals: moduleGlobals });

    const cell = stack.resolve('x');
    expect(cell === undefined ? undefined : read(cell)).toBe('módulo');
  });

  it('rejects assignment to prelude names', () => {
    const { stack } = createStack();
    const result = stack.assign('exiba', 1);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.diagnostic).toMatchObject({
      kind: 'ImmutableBinding',
      name: 'exiba',
    });
  });

  it('pops the frame when the body throws', () => {
    const { stack } = createStack();
    expect(() =>
      stack.withFrame(new Environment(), { kind: 'call' }, () => {
        throw new Error('host');
      })
    ).toThrow('host');
    expect(stack.depth).toBe(0);
    expect(stack.callDepth).toBe(0);
  });

  it('collects the innermost shared binding of each name', () => {
    const { stack, global } = createStack();
    global.upsert('x', shared('fora'));
    global.upsert('privado', owned(1));
    global.upsert('p', shared(0));
    const inner = new Environment();
    const innerX = shared('dentro');
    inner.upsert('x', innerX);
    stack.push(inner, { kind: 'block' });

    const snapshot = stack.collectShared(new Set(['p']));
    expect([...snapshot].map(([name]) => name)).toEqual(['x']);
    expect(snapshot.lookup('x')).toBe(innerX);
  });
});
