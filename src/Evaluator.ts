import { Bindings } from './Environment';
import type { Environment } from './Environment';
import type { Expression } from './Expression';
import type { BinaryNode, BinaryOp, ExprNode, NodeId, UnaryNode, UnaryOp } from './Node';

/**
 * Per-call memo from node id to computed number. A fresh one is created by
 * every evaluate/differentiate call and never outlives it.
 * @internal
 */
export type NodeCache = Map<NodeId, number>;

/**
 * Hooks fired when an internal node's arithmetic actually runs. Cache hits do
 * not fire, so counting calls shows how much work memoization saved.
 * @public
 */
export interface EvaluationObserver {
  onCompute?(node: BinaryNode | UnaryNode, value: number): void;
  onDerive?(node: BinaryNode | UnaryNode, derivative: number): void;
}

/** @public */
export interface EvaluateOptions {
  observer?: EvaluationObserver;
}

/** @internal */
export function rootNode(root: Expression | ExprNode): ExprNode {
  return 'node' in root ? root.node : root;
}

/**
 * Evaluates the graph under `env`.
 * Division by zero is not trapped: the result is whatever IEEE-754 gives
 * (Infinity, -Infinity or NaN) and it is up to the caller to check.
 * @throws UnboundVariableError if a reachable Variable has no binding
 * @public
 */
export function evaluate(root: Expression | ExprNode, env: Environment, options: EvaluateOptions = {}): number {
  return evalNode(rootNode(root), Bindings.from(env), new Map(), options.observer);
}

/** @internal */
export function evalNode(
  node: ExprNode,
  bindings: Bindings,
  cache: NodeCache,
  observer?: EvaluationObserver
): number {
  switch (node.kind) {
    case 'constant':
      return node.value;
    case 'variable':
      return bindings.resolve(node);
    case 'binary': {
      const cached = cache.get(node.id);
      if (cached !== undefined) return cached;
      const left = evalNode(node.left, bindings, cache, observer);
      const right = evalNode(node.right, bindings, cache, observer);
      const value = applyBinary(node.op, left, right);
      cache.set(node.id, value);
      observer?.onCompute?.(node, value);
      return value;
    }
    case 'unary': {
      const cached = cache.get(node.id);
      if (cached !== undefined) return cached;
      const value = applyUnary(node.op, evalNode(node.arg, bindings, cache, observer));
      cache.set(node.id, value);
      observer?.onCompute?.(node, value);
      return value;
    }
  }
}

function applyBinary(op: BinaryOp, a: number, b: number): number {
  switch (op) {
    case 'add': return a + b;
    case 'sub': return a - b;
    case 'mul': return a * b;
    case 'div': return a / b;
  }
}

function applyUnary(op: UnaryOp, x: number): number {
  switch (op) {
    case 'sin': return Math.sin(x);
    case 'cos': return Math.cos(x);
    case 'exp': return Math.exp(x);
    case 'log': return Math.log(x);
  }
}
