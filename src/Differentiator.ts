import { Bindings } from './Environment';
import type { Environment } from './Environment';
import { evalNode, rootNode } from './Evaluator';
import type { EvaluateOptions, EvaluationObserver, NodeCache } from './Evaluator';
import type { Expression } from './Expression';
import type { BinaryNode, ExprNode, UnaryNode } from './Node';

/**
 * Forward-mode derivative of the whole graph at the point given by `env`.
 *
 * Every Variable has derivative 1, so with several distinct variables the
 * result is the sum of the partials with respect to each of them, not a
 * partial derivative with respect to one. Use a single variable per graph
 * when an ordinary derivative is wanted.
 *
 * @throws UnboundVariableError if a reachable Variable has no binding
 * @public
 */
export function differentiate(root: Expression | ExprNode, env: Environment, options: EvaluateOptions = {}): number {
  const diff = new ForwardDiff(Bindings.from(env), options.observer);
  return diff.derive(rootNode(root));
}

/**
 * Holds the two caches of one differentiate call. The value cache is separate
 * from any evaluate call and lives only as long as this object.
 */
class ForwardDiff {
  private readonly values: NodeCache = new Map();
  private readonly derivatives: NodeCache = new Map();

  constructor(
    private readonly bindings: Bindings,
    private readonly observer?: EvaluationObserver
  ) {}

  private value(node: ExprNode): number {
    return evalNode(node, this.bindings, this.values, this.observer);
  }

  derive(node: ExprNode): number {
    switch (node.kind) {
      case 'constant':
        return 0;
      case 'variable':
        // unbound variables fail here too, not only when a value is needed
        this.bindings.resolve(node);
        return 1;
      case 'binary':
      case 'unary': {
        const cached = this.derivatives.get(node.id);
        if (cached !== undefined) return cached;
        const d = node.kind === 'binary' ? this.deriveBinary(node) : this.deriveUnary(node);
        this.derivatives.set(node.id, d);
        this.observer?.onDerive?.(node, d);
        return d;
      }
    }
  }

  private deriveBinary(node: BinaryNode): number {
    const { left, right } = node;
    switch (node.op) {
      case 'add':
        return this.derive(left) + this.derive(right);
      case 'sub':
        return this.derive(left) - this.derive(right);
      case 'mul':
        return this.value(left) * this.derive(right) + this.value(right) * this.derive(left);
      case 'div': {
        const denominator = this.value(right);
        return this.derive(left) / denominator - (this.derive(right) * this.value(left)) / (denominator * denominator);
      }
    }
  }

  private deriveUnary(node: UnaryNode): number {
    const x = this.value(node.arg);
    const dx = this.derive(node.arg);
    switch (node.op) {
      case 'sin': return Math.cos(x) * dx;
      case 'cos': return -Math.sin(x) * dx;
      case 'exp': return Math.exp(x) * dx;
      case 'log': return dx / x;
    }
  }
}
