/**
 * Stable integer handle identifying a node. Caches are keyed by it.
 * @public
 */
export type NodeId = number;

/**
 * Binary operators. Left and right are always kept in construction order.
 * @public
 */
export type BinaryOp = 'add' | 'sub' | 'mul' | 'div';

/**
 * Elementary single-argument functions.
 * @public
 */
export type UnaryOp = 'sin' | 'cos' | 'exp' | 'log';

/** @public */
export interface VariableNode {
  readonly kind: 'variable';
  readonly id: NodeId;
  readonly name: string;
  readonly needsGrad: boolean;
}

/** @public */
export interface ConstantNode {
  readonly kind: 'constant';
  readonly id: NodeId;
  readonly value: number;
  readonly needsGrad: false;
}

/** @public */
export interface BinaryNode {
  readonly kind: 'binary';
  readonly id: NodeId;
  readonly op: BinaryOp;
  readonly left: ExprNode;
  readonly right: ExprNode;
  readonly needsGrad: boolean;
}

/** @public */
export interface UnaryNode {
  readonly kind: 'unary';
  readonly id: NodeId;
  readonly op: UnaryOp;
  readonly arg: ExprNode;
  readonly needsGrad: boolean;
}

/**
 * A node of the expression graph. Nodes are frozen on creation and only ever
 * reference nodes built before them, so the graph is acyclic.
 * @public
 */
export type ExprNode = VariableNode | ConstantNode | BinaryNode | UnaryNode;

let nextId: NodeId = 0;

function newNodeId(): NodeId {
  return nextId++;
}

/** @internal */
export function makeVariableNode(name: string, needsGrad: boolean): VariableNode {
  const node: VariableNode = { kind: 'variable', id: newNodeId(), name, needsGrad };
  return Object.freeze(node);
}

/** @internal */
export function makeConstantNode(value: number): ConstantNode {
  const node: ConstantNode = { kind: 'constant', id: newNodeId(), value, needsGrad: false };
  return Object.freeze(node);
}

/**
 * Builds a binary node. needsGrad is the AND of both children; it is recorded
 * for callers but evaluation and differentiation never consult it.
 * @internal
 */
export function makeBinaryNode(op: BinaryOp, left: ExprNode, right: ExprNode): BinaryNode {
  const node: BinaryNode = {
    kind: 'binary',
    id: newNodeId(),
    op,
    left,
    right,
    needsGrad: left.needsGrad && right.needsGrad,
  };
  return Object.freeze(node);
}

/** @internal */
export function makeUnaryNode(op: UnaryOp, arg: ExprNode): UnaryNode {
  const node: UnaryNode = { kind: 'unary', id: newNodeId(), op, arg, needsGrad: arg.needsGrad };
  return Object.freeze(node);
}

const BINARY_SYMBOLS: Record<BinaryOp, string> = {
  add: '+',
  sub: '-',
  mul: '*',
  div: '/',
};

/**
 * Renders a node as a fully parenthesized infix string, e.g. `((x*x)+1)`.
 * Shared subexpressions are printed at every occurrence.
 * @public
 */
export function formatNode(node: ExprNode): string {
  switch (node.kind) {
    case 'variable':
      return node.name;
    case 'constant':
      return String(node.value);
    case 'binary':
      return `(${formatNode(node.left)}${BINARY_SYMBOLS[node.op]}${formatNode(node.right)})`;
    case 'unary':
      return `${node.op}(${formatNode(node.arg)})`;
  }
}
