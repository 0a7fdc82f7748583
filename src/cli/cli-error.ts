import { ZodError } from 'zod';
import { ExpressionSyntaxError, UnboundVariableError } from '../Errors';

/**
 * Error the CLI reports without usage help. `exitCode` becomes the process
 * exit status.
 */
export class CliError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode = 1) {
    super(message);
    this.name = 'CliError';
    this.exitCode = exitCode;
  }
}

export function assert(condition: unknown, message: string, exitCode = 1): asserts condition {
  if (!condition) {
    throw new CliError(message, exitCode);
  }
}

/**
 * Maps the errors a command can raise on bad input to a message and exit
 * status. Anything else returns undefined and gets the usage help.
 */
export function describeFailure(err: unknown): { message: string; exitCode: number } | undefined {
  if (err instanceof CliError) {
    return { message: err.message, exitCode: err.exitCode };
  }
  if (err instanceof UnboundVariableError || err instanceof ExpressionSyntaxError) {
    return { message: err.message, exitCode: 1 };
  }
  if (err instanceof ZodError) {
    return { message: err.issues.map(issue => issue.message).join('\n'), exitCode: 1 };
  }
  return undefined;
}
