import { differentiate } from './Differentiator';
import type { Environment } from './Environment';
import { evaluate } from './Evaluator';
import type { EvaluateOptions } from './Evaluator';
import type { Expression, Variable } from './Expression';

/** @public */
export interface CurvePoint {
  x: number;
  value: number;
  derivative: number;
}

/** @public */
export interface SampleOptions extends EvaluateOptions {
  start: number;
  end: number;
  /** Number of points including both ends. Default 1001. */
  count?: number;
  /** Name bindings for the other variables of the expression. */
  bindings?: ReadonlyMap<string, number>;
}

export const DEFAULT_SAMPLE_COUNT = 1001;

/**
 * `count` evenly spaced numbers from start to end inclusive. The last point
 * is exactly `end`.
 * @public
 */
export function linspace(start: number, end: number, count: number): number[] {
  if (!Number.isInteger(count) || count < 0) {
    throw new RangeError(`count must be a non-negative integer, got ${count}`);
  }
  if (count === 1) return [start];
  const step = (end - start) / (count - 1);
  const points: number[] = [];
  for (let i = 0; i < count; i++) {
    points.push(i === count - 1 ? end : start + i * step);
  }
  return points;
}

/**
 * Evaluates `expression` and its derivative at evenly spaced values of
 * `variable`. Each point gets its own environment binding the variable
 * instance, so caches never carry over between points. Other variables are
 * looked up by name in `bindings`.
 * @public
 */
export function sampleCurve(expression: Expression, variable: Variable, options: SampleOptions): CurvePoint[] {
  const { start, end, count = DEFAULT_SAMPLE_COUNT, observer, bindings = new Map<string, number>() } = options;
  return linspace(start, end, count).map(x => {
    const env: Environment = new Map<Variable | string, number>(bindings).set(variable, x);
    return {
      x,
      value: evaluate(expression, env, { observer }),
      derivative: differentiate(expression, env, { observer }),
    };
  });
}
