import { Constant, Expression } from './Expression';
import { makeBinaryNode, makeUnaryNode } from './Node';
import type { BinaryOp, UnaryOp } from './Node';

/**
 * Anything accepted as an operand. Numbers become Constant nodes.
 * @public
 */
export type ExpressionInput = Expression | number;

/**
 * Normalizes an operand: expressions pass through, numbers are wrapped in a
 * new Constant.
 * @public
 */
export function toExpression(x: ExpressionInput): Expression {
  return typeof x === 'number' ? new Constant(x) : x;
}

function binary(op: BinaryOp, a: ExpressionInput, b: ExpressionInput): Expression {
  return new Expression(makeBinaryNode(op, toExpression(a).node, toExpression(b).node));
}

function unary(op: UnaryOp, a: ExpressionInput): Expression {
  return new Expression(makeUnaryNode(op, toExpression(a).node));
}

/** @public */
export function add(a: ExpressionInput, b: ExpressionInput): Expression {
  return binary('add', a, b);
}

/** @public */
export function sub(a: ExpressionInput, b: ExpressionInput): Expression {
  return binary('sub', a, b);
}

/**
 * Product a * b. Left and right stay distinguishable in the node, so callers
 * must not rely on the operands being swapped freely.
 * @public
 */
export function mul(a: ExpressionInput, b: ExpressionInput): Expression {
  return binary('mul', a, b);
}

/** @public */
export function div(a: ExpressionInput, b: ExpressionInput): Expression {
  return binary('div', a, b);
}

/** @public */
export function neg(a: ExpressionInput): Expression {
  return binary('sub', 0, a);
}

/** @public */
export function sin(a: ExpressionInput): Expression {
  return unary('sin', a);
}

/** @public */
export function cos(a: ExpressionInput): Expression {
  return unary('cos', a);
}

/** @public */
export function exp(a: ExpressionInput): Expression {
  return unary('exp', a);
}

/**
 * Natural logarithm. Non-positive arguments give NaN or -Infinity at
 * evaluation time, they are not rejected here.
 * @public
 */
export function log(a: ExpressionInput): Expression {
  return unary('log', a);
}

/**
 * Sum of all terms, folded left. An empty list gives Constant(0).
 * @public
 */
export function sum(terms: readonly ExpressionInput[]): Expression {
  if (terms.length === 0) return new Constant(0);
  return terms.slice(1).reduce<Expression>((acc, t) => add(acc, t), toExpression(terms[0]));
}
