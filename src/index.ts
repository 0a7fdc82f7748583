export { Constant, Expression, Variable } from './Expression';
export { add, cos, div, exp, log, mul, neg, sin, sub, sum, toExpression } from './Builders';
export type { ExpressionInput } from './Builders';
export { evaluate } from './Evaluator';
export type { EvaluateOptions, EvaluationObserver } from './Evaluator';
export { differentiate } from './Differentiator';
export type { Environment } from './Environment';
export { ExpressionSyntaxError, UnboundVariableError } from './Errors';
export { formatNode } from './Node';
export type { BinaryNode, BinaryOp, ConstantNode, ExprNode, NodeId, UnaryNode, UnaryOp, VariableNode } from './Node';
export { parseExpression } from './Parser';
export type { ParsedExpression } from './Parser';
export { DEFAULT_SAMPLE_COUNT, linspace, sampleCurve } from './Sampler';
export type { CurvePoint, SampleOptions } from './Sampler';
