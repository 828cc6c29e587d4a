import { BaseNode, Expression, Node } from '../interface';
import { NodeKind } from '../kind';
import { NodeTags } from '../tags';

export type UnaryOperator = 'not' | '-' | '#';

// A UnaryExpression represents op operand.
export class UnaryExpression extends BaseNode {
  readonly kind = NodeKind.UnaryExpression;
  op: UnaryOperator;
  operand: Expression;

  constructor(op: UnaryOperator, operand: Expression, tags: NodeTags = NodeTags.none) {
    super(tags);
    this.op = op;
    this.operand = operand;
  }
}

export function isUnaryExpression(n: Node): n is UnaryExpression {
  return n.kind === NodeKind.UnaryExpression;
}
