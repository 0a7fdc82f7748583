/**
 * Prints a few samples of three curves and their derivatives:
 *   f(x) = sin(x)
 *   f(x) = exp(5 / x) - 5
 *   f(x) = exp(sin(x))
 *
 * Run with: npx tsx examples/curves.ts
 */

import { Expression, Variable, sampleCurve } from '../src';

function printCurve(description: string, y: Expression, x: Variable, start: number, end: number): void {
  console.log(`\n${description}   [${y}]`);
  console.log('x'.padStart(8), 'f(x)'.padStart(12), "f'(x)".padStart(12));
  for (const p of sampleCurve(y, x, { start, end, count: 6 })) {
    console.log(p.x.toFixed(3).padStart(8), p.value.toFixed(5).padStart(12), p.derivative.toFixed(5).padStart(12));
  }
}

const x1 = new Variable('x1');
printCurve('f(x) = sin(x)', x1.sin(), x1, 0, 10);

const x2 = new Variable('x2');
printCurve('f(x) = exp(5 / x) - 5', x2.rdiv(5).exp().sub(5), x2, 1, 3);

const x3 = new Variable('x3');
printCurve('f(x) = exp(sin(x))', x3.sin().exp(), x3, 0, 10);
