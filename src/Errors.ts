/**
 * Thrown when a Variable reachable from the root is bound neither by instance
 * nor by name in the supplied environment.
 * @public
 */
export class UnboundVariableError extends Error {
  readonly variableName: string;

  constructor(variableName: string) {
    super(`Unbound variable ${variableName}`);
    this.name = 'UnboundVariableError';
    this.variableName = variableName;
  }
}

/**
 * Thrown by the expression parser. `position` is the 0-based character offset.
 * @public
 */
export class ExpressionSyntaxError extends Error {
  readonly position: number;

  constructor(message: string, position: number) {
    super(`${message} at position ${position}`);
    this.name = 'ExpressionSyntaxError';
    this.position = position;
  }
}
