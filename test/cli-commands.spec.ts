import { describe, expect, it } from 'vitest';
import { CliError, describeFailure } from '../src/cli/cli-error';
import {
  BAD_BINDING_EXIT_CODE,
  evalSchema,
  formatNumber,
  isVerbose,
  parseBindings,
  runDiff,
  runEval,
  runSample,
  sampleSchema,
} from '../src/cli/commands';
import { ExpressionSyntaxError, UnboundVariableError } from '../src';

const quiet = { verbose: false };
const collect = () => {
  const lines: string[] = [];
  return { lines, log: (line: string) => { lines.push(line); } };
};

describe('parseBindings', () => {
  it('reads name=value pairs', () => {
    expect(parseBindings(['x=2', ' y = -1.5 '])).toEqual(new Map([['x', 2], ['y', -1.5]]));
  });

  it.each([
    ['x', "Invalid binding 'x', expected name=value"],
    ['=3', "Invalid binding '=3', expected name=value"],
    ['1x=3', "Invalid variable name '1x' in binding '1x=3'"],
    ['x=abc', "Invalid number 'abc' for x"],
    ['x=', "Invalid number '' for x"],
  ])('rejects %j', (pair, message) => {
    expect(() => parseBindings([pair])).toThrow(CliError);
    expect(() => parseBindings([pair])).toThrow(message);
  });

  it('uses exit code 2 for malformed bindings', () => {
    expect(() => parseBindings(['x=abc'])).toThrow(expect.objectContaining({ exitCode: BAD_BINDING_EXIT_CODE }));
    expect(BAD_BINDING_EXIT_CODE).toBe(2);
  });
});

describe('isVerbose', () => {
  it('honours the flag and the VERBOSE variable', () => {
    expect(isVerbose(true, {})).toBe(true);
    expect(isVerbose(false, { VERBOSE: 'true' })).toBe(true);
    expect(isVerbose(false, { VERBOSE: '1' })).toBe(false);
  });
});

describe('formatNumber', () => {
  it('prints integers as is and fractions with six decimals', () => {
    expect(formatNumber(4)).toBe('4');
    expect(formatNumber(-0.25)).toBe('-0.250000');
  });
});

describe('runEval / runDiff', () => {
  it('evaluates and differentiates with bindings', () => {
    const { log } = collect();
    const args = evalSchema.parse({ expression: 'x * x + 3', at: ['x=2'], ...quiet });
    expect(runEval(args, log)).toBe('7');
    expect(runDiff(args, log)).toBe('4');
  });

  it('defaults to no bindings', () => {
    const { log } = collect();
    expect(runEval(evalSchema.parse({ expression: '1 - 5' }), log)).toBe('-4');
  });

  it('traces computed nodes when verbose', () => {
    const { lines, log } = collect();
    const args = evalSchema.parse({ expression: '(x + 1) * (x + 1)', at: ['x=2'], verbose: true });
    expect(runEval(args, log)).toBe('9');
    expect(lines).toEqual(['[eval] (x+1) = 3', '[eval] (x+1) = 3', '[eval] ((x+1)*(x+1)) = 9']);
  });

  it('lets unbound variables surface', () => {
    const { log } = collect();
    const args = evalSchema.parse({ expression: 'x3 + 1', ...quiet });
    expect(() => runEval(args, log)).toThrow(UnboundVariableError);
    expect(() => runDiff(args, log)).toThrow('Unbound variable x3');
  });
});

describe('runSample', () => {
  it('prints a table', () => {
    const { log } = collect();
    const args = sampleSchema.parse({ expression: 'x * x', var: 'x', from: '0', to: '2', count: '3', ...quiet });
    expect(runSample(args, log)).toEqual([
      "x\tf(x)\tf'(x)",
      '0\t0\t0',
      '1\t1\t2',
      '2\t4\t4',
    ]);
  });

  it('prints JSON when asked', () => {
    const { log } = collect();
    const args = sampleSchema.parse({ expression: 'k * x', var: 'x', from: 1, to: 2, count: 2, at: ['k=3'], json: true });
    expect(runSample(args, log)).toEqual([
      '[{"x":1,"value":3,"derivative":4},{"x":2,"value":6,"derivative":5}]',
    ]);
  });

  it('sweeps a variable missing from the expression', () => {
    const { log } = collect();
    const args = sampleSchema.parse({ expression: '2', var: 'x', from: 0, to: 1, count: 2 });
    expect(runSample(args, log)).toEqual(["x\tf(x)\tf'(x)", '0\t2\t0', '1\t2\t0']);
  });

  it('notes a shadowed binding when verbose', () => {
    const { lines, log } = collect();
    const args = sampleSchema.parse({ expression: 'x', var: 'x', from: 0, to: 0, count: 1, at: ['x=9'], verbose: true });
    expect(runSample(args, log)).toEqual(["x\tf(x)\tf'(x)", '0\t0\t1']);
    expect(lines).toEqual(['[sample] --at x is ignored, x is the sampled variable']);
  });

  it('validates options with zod', () => {
    expect(() => sampleSchema.parse({ expression: 'x', var: '1x', from: 0, to: 1 })).toThrow('--var must be an identifier');
    expect(() => sampleSchema.parse({ expression: 'x', var: 'x', from: 0, to: 1, count: 0 })).toThrow('--count must be at least 1');
  });
});

describe('describeFailure', () => {
  it('maps input errors to a message and exit code', () => {
    expect(describeFailure(new CliError('bad flag', 3))).toEqual({ message: 'bad flag', exitCode: 3 });
    expect(describeFailure(new UnboundVariableError('y'))).toEqual({ message: 'Unbound variable y', exitCode: 1 });
    expect(describeFailure(new ExpressionSyntaxError('Unexpected end of input', 4))).toEqual({
      message: 'Unexpected end of input at position 4',
      exitCode: 1,
    });
  });

  it('joins zod issue messages', () => {
    const result = sampleSchema.safeParse({ expression: '', var: '1x', from: 0, to: 1 });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(describeFailure(result.error)).toEqual({
        message: 'expression is required\n--var must be an identifier',
        exitCode: 1,
      });
    }
  });

  it('leaves other errors to the usage handler', () => {
    expect(describeFailure(new Error('boom'))).toBeUndefined();
    expect(describeFailure(undefined)).toBeUndefined();
  });
});
