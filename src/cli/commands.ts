import { z } from 'zod';
import { differentiate } from '../Differentiator';
import type { Environment } from '../Environment';
import { evaluate } from '../Evaluator';
import type { EvaluationObserver } from '../Evaluator';
import { Variable } from '../Expression';
import { formatNode } from '../Node';
import { parseExpression } from '../Parser';
import { sampleCurve } from '../Sampler';
import type { CurvePoint } from '../Sampler';
import { CliError, assert } from './cli-error';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const evalSchema = z.object({
  expression: z.string().min(1, 'expression is required'),
  at: z.array(z.string()).default([]),
  verbose: z.boolean().default(false),
});

export type EvalArgs = z.infer<typeof evalSchema>;

export const sampleSchema = z.object({
  expression: z.string().min(1, 'expression is required'),
  var: z.string().regex(IDENTIFIER, '--var must be an identifier'),
  from: z.coerce.number(),
  to: z.coerce.number(),
  count: z.coerce.number().int().min(1, '--count must be at least 1').default(11),
  at: z.array(z.string()).default([]),
  json: z.boolean().default(false),
  verbose: z.boolean().default(false),
});

export type SampleArgs = z.infer<typeof sampleSchema>;

export type LogFn = (line: string) => void;

/** `--verbose` or VERBOSE=true turns on node tracing. */
export function isVerbose(flag: boolean, env: NodeJS.ProcessEnv = process.env): boolean {
  return flag || env.VERBOSE === 'true';
}

/** Exit status for malformed `--at` bindings. */
export const BAD_BINDING_EXIT_CODE = 2;

/**
 * Parses `name=value` pairs from repeated `--at` flags.
 */
export function parseBindings(pairs: readonly string[]): Map<string, number> {
  const bindings = new Map<string, number>();
  for (const pair of pairs) {
    const eq = pair.indexOf('=');
    assert(eq > 0, `Invalid binding '${pair}', expected name=value`, BAD_BINDING_EXIT_CODE);
    const name = pair.slice(0, eq).trim();
    const raw = pair.slice(eq + 1).trim();
    assert(IDENTIFIER.test(name), `Invalid variable name '${name}' in binding '${pair}'`, BAD_BINDING_EXIT_CODE);
    const value = Number(raw);
    if (raw === '' || Number.isNaN(value)) {
      throw new CliError(`Invalid number '${raw}' for ${name}`, BAD_BINDING_EXIT_CODE);
    }
    bindings.set(name, value);
  }
  return bindings;
}

function tracer(tag: 'eval' | 'diff' | 'sample', log: LogFn): EvaluationObserver {
  return {
    onCompute: (node, value) => log(`[${tag}] ${formatNode(node)} = ${value}`),
    onDerive: (node, derivative) => log(`[${tag}] d${formatNode(node)} = ${derivative}`),
  };
}

export function formatNumber(v: number): string {
  return Number.isInteger(v) ? String(v) : v.toFixed(6);
}

export function runEval(args: EvalArgs, log: LogFn): string {
  const { root } = parseExpression(args.expression);
  const env: Environment = parseBindings(args.at);
  const observer = isVerbose(args.verbose) ? tracer('eval', log) : undefined;
  return String(evaluate(root, env, { observer }));
}

export function runDiff(args: EvalArgs, log: LogFn): string {
  const { root } = parseExpression(args.expression);
  const env: Environment = parseBindings(args.at);
  const observer = isVerbose(args.verbose) ? tracer('diff', log) : undefined;
  return String(differentiate(root, env, { observer }));
}

/**
 * Samples f and f' over [from, to]. The sampled variable is bound by
 * instance, so a `--at` binding of the same name is shadowed.
 */
export function runSample(args: SampleArgs, log: LogFn): string[] {
  const { root, variables } = parseExpression(args.expression);
  const variable = variables.get(args.var) ?? new Variable(args.var);
  const fixed = parseBindings(args.at);
  if (fixed.has(args.var) && isVerbose(args.verbose)) {
    log(`[sample] --at ${args.var} is ignored, ${args.var} is the sampled variable`);
  }

  const observer = isVerbose(args.verbose) ? tracer('sample', log) : undefined;
  const points: CurvePoint[] = sampleCurve(root, variable, {
    start: args.from,
    end: args.to,
    count: args.count,
    observer,
    bindings: fixed,
  });

  if (args.json) {
    return [JSON.stringify(points)];
  }
  return [
    `x\tf(x)\tf'(x)`,
    ...points.map(p => `${formatNumber(p.x)}\t${formatNumber(p.value)}\t${formatNumber(p.derivative)}`),
  ];
}
