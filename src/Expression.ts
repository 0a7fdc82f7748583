import { add, cos, div, exp, log, mul, neg, sin, sub } from './Builders';
import type { ExpressionInput } from './Builders';
import { differentiate } from './Differentiator';
import type { Environment } from './Environment';
import { evaluate } from './Evaluator';
import type { EvaluateOptions } from './Evaluator';
import { formatNode, makeConstantNode, makeVariableNode } from './Node';
import type { ExprNode, NodeId } from './Node';

/**
 * Handle on a node of the expression graph.
 *
 * Every operation allocates a new node that references its operands, so one
 * Expression may be an operand of many others (the graph is a DAG, not a
 * tree). Nothing is computed until {@link Expression.eval} or
 * {@link Expression.d} is called.
 *
 * @example
 * ```ts
 * const x = new Variable('x');
 * const y = x.mul(x).add(3);     // x*x + 3
 * y.eval({ x: 2 });              // 7
 * y.d({ x: 2 });                 // 4
 * ```
 * @public
 */
export class Expression {
  readonly node: ExprNode;

  constructor(node: ExprNode) {
    this.node = node;
  }

  get id(): NodeId {
    return this.node.id;
  }

  /**
   * Recorded at construction: true for variables, false for constants, and
   * the AND of the operands otherwise. Nothing prunes work on it.
   */
  get needsGrad(): boolean {
    return this.node.needsGrad;
  }

  /**
   * Returns this + other.
   * @param other Expression or number to add
   */
  add(other: ExpressionInput): Expression {
    return add(this, other);
  }

  /** Returns other + this. */
  radd(other: ExpressionInput): Expression {
    return add(other, this);
  }

  /**
   * Returns this - other.
   * @param other Expression or number to subtract
   */
  sub(other: ExpressionInput): Expression {
    return sub(this, other);
  }

  /** Returns other - this. */
  rsub(other: ExpressionInput): Expression {
    return sub(other, this);
  }

  /**
   * Returns this * other. Operand order is kept as written.
   * @param other Expression or number to multiply
   */
  mul(other: ExpressionInput): Expression {
    return mul(this, other);
  }

  /** Returns other * this. */
  rmul(other: ExpressionInput): Expression {
    return mul(other, this);
  }

  /**
   * Returns this / other.
   * @param other Expression or number divisor
   */
  div(other: ExpressionInput): Expression {
    return div(this, other);
  }

  /** Returns other / this. */
  rdiv(other: ExpressionInput): Expression {
    return div(other, this);
  }

  /** Returns 0 - this. */
  neg(): Expression {
    return neg(this);
  }

  sin(): Expression {
    return sin(this);
  }

  cos(): Expression {
    return cos(this);
  }

  exp(): Expression {
    return exp(this);
  }

  log(): Expression {
    return log(this);
  }

  /**
   * Evaluates the graph rooted here.
   * @param env Values for the variables, keyed by Variable instance or name
   */
  eval(env: Environment, options?: EvaluateOptions): number {
    return evaluate(this, env, options);
  }

  /**
   * Total forward derivative of the graph rooted here, see {@link differentiate}.
   * @param env Values for the variables, keyed by Variable instance or name
   */
  d(env: Environment, options?: EvaluateOptions): number {
    return differentiate(this, env, options);
  }

  toString(): string {
    return formatNode(this.node);
  }
}

/**
 * Named leaf. Two Variables with the same name are still distinct nodes; an
 * environment can bind each instance separately or both at once by name.
 * @public
 */
export class Variable extends Expression {
  readonly name: string;

  constructor(name: string, needsGrad = true) {
    super(makeVariableNode(name, needsGrad));
    this.name = name;
  }
}

/**
 * Fixed numeric leaf.
 * @public
 */
export class Constant extends Expression {
  readonly value: number;

  constructor(value: number) {
    super(makeConstantNode(value));
    this.value = value;
  }
}
