import { BaseNode, Expression, Node } from '../interface';
import { NodeKind } from '../kind';
import { NodeTags } from '../tags';

export type ArithmeticOperator = '+' | '-' | '*' | '/' | '%' | '^';
export type ComparisonOperator = '==' | '~=' | '<' | '<=' | '>' | '>=';
export type LogicalOperator = 'and' | 'or';
export type BinaryOperator = ArithmeticOperator | ComparisonOperator | LogicalOperator | '..';

export const binaryOperators: readonly BinaryOperator[] = [
  'or', 'and', '<', '>', '<=', '>=', '~=', '==', '..', '+', '-', '*', '/', '%', '^',
];

export function isBinaryOperator(s: string): s is BinaryOperator {
  return binaryOperators.some((op) => op === s);
}

// A BinaryExpression represents lhs op rhs.
export class BinaryExpression extends BaseNode {
  readonly kind = NodeKind.BinaryExpression;
  op: BinaryOperator;
  lhs: Expression;
  rhs: Expression;

  constructor(op: BinaryOperator, lhs: Expression, rhs: Expression, tags: NodeTags = NodeTags.none) {
    super(tags);
    this.op = op;
    this.lhs = lhs;
    this.rhs = rhs;
  }
}

export function isBinaryExpression(n: Node): n is BinaryExpression {
  return n.kind === NodeKind.BinaryExpression;
}
