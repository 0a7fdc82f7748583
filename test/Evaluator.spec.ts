import { describe, expect, it, vi } from 'vitest';
import { Constant, evaluate, UnboundVariableError, Variable } from '../src';
import type { BinaryNode, UnaryNode } from '../src';

describe('evaluate', () => {
  it('returns constant values unconditionally', () => {
    expect(new Constant(3.5).eval({})).toBe(3.5);
  });

  it('applies the four binary operators', () => {
    const a = new Variable('a');
    const b = new Variable('b');
    const env = { a: 6, b: 4 };
    expect(a.add(b).eval(env)).toBe(10);
    expect(a.sub(b).eval(env)).toBe(2);
    expect(a.mul(b).eval(env)).toBe(24);
    expect(a.div(b).eval(env)).toBe(1.5);
  });

  it('applies the elementary functions', () => {
    const x = new Variable('x');
    expect(x.sin().eval({ x: 0 })).toBe(0);
    expect(x.cos().eval({ x: 0 })).toBe(1);
    expect(x.exp().eval({ x: 0 })).toBe(1);
    expect(x.log().eval({ x: 1 })).toBe(0);
  });

  it('binds variables by name or by instance', () => {
    const x = new Variable('x');
    const y = x.mul(2);
    expect(y.eval({ x: 3 })).toBe(6);
    expect(y.eval(new Map([['x', 3]]))).toBe(6);
    expect(y.eval(new Map([[x, 5]]))).toBe(10);
  });

  it('prefers the instance binding over the name binding', () => {
    const x = new Variable('x');
    const env = new Map<Variable | string, number>([
      ['x', 1],
      [x, 10],
    ]);
    expect(x.add(0).eval(env)).toBe(10);
  });

  it('binds same-named variables separately by instance', () => {
    const first = new Variable('x');
    const second = new Variable('x');
    const env = new Map<Variable | string, number>([
      [first, 2],
      ['x', 7],
    ]);
    expect(first.sub(second).eval(env)).toBe(-5);
  });

  it('throws UnboundVariableError naming the variable', () => {
    const x3 = new Variable('x3');
    const y = x3.mul(2).add(1);
    expect(() => y.eval({ x1: 1 })).toThrow(UnboundVariableError);
    expect(() => y.eval({})).toThrow('Unbound variable x3');
    try {
      y.eval(new Map([[new Variable('x3'), 1]]));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(UnboundVariableError);
      if (err instanceof UnboundVariableError) {
        expect(err.variableName).toBe('x3');
      }
    }
  });

  it('lets division by zero produce IEEE results', () => {
    const x = new Variable('x');
    expect(new Constant(1).div(x).eval({ x: 0 })).toBe(Infinity);
    expect(new Constant(-1).div(x).eval({ x: 0 })).toBe(-Infinity);
    expect(Number.isNaN(x.div(x).eval({ x: 0 }))).toBe(true);
    expect(x.log().eval({ x: 0 })).toBe(-Infinity);
  });

  it('is idempotent across calls', () => {
    const x = new Variable('x');
    const y = x.mul(x).add(x.rdiv(1)).sin();
    const first = y.eval({ x: 1.7 });
    expect(y.eval({ x: 1.7 })).toBe(first);
    expect(y.eval({ x: 2 })).toBe(Math.sin(4 + 0.5));
    expect(y.eval({ x: 1.7 })).toBe(first);
  });
});

describe('memoization', () => {
  it('computes a shared subexpression once per call', () => {
    const a = new Variable('a');
    const b = new Variable('b');
    const s = a.mul(b);
    const y = s.add(s);
    const onCompute = vi.fn((_node: BinaryNode | UnaryNode, _value: number) => {});

    expect(evaluate(y, { a: 3, b: 4 }, { observer: { onCompute } })).toBe(24);
    const computedIds = onCompute.mock.calls.map(([node]) => node.id);
    expect(computedIds).toEqual([s.id, y.id]);
  });

  it('matches the result of an unshared tree', () => {
    const a = new Variable('a');
    const b = new Variable('b');
    const s = a.mul(b);
    const shared = s.add(s);
    const duplicated = a.mul(b).add(a.mul(b));
    const env = { a: 1.25, b: -3 };
    expect(shared.eval(env)).toBe(duplicated.eval(env));
  });

  it('keeps deep diamonds linear', () => {
    const x = new Variable('x');
    let node = x.add(0);
    for (let i = 0; i < 40; i++) {
      node = node.add(node);
    }
    let computed = 0;
    const value = node.eval({ x: 1 }, { observer: { onCompute: () => { computed++; } } });
    expect(value).toBe(2 ** 40);
    expect(computed).toBe(41);
  });

  it('starts every call with an empty cache', () => {
    const x = new Variable('x');
    const y = x.mul(3);
    let computed = 0;
    const observer = { onCompute: () => { computed++; } };
    expect(y.eval({ x: 1 }, { observer })).toBe(3);
    expect(y.eval({ x: 2 }, { observer })).toBe(6);
    expect(computed).toBe(2);
  });
});
