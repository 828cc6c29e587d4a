import { BaseNode, Expression, Node } from '../interface';
import { NodeKind } from '../kind';
import { NodeTags } from '../tags';

// A ParenthesizedExpression represents (expression). The parentheses
// matter in Lua: they truncate a call or '...' to a single value.
export class ParenthesizedExpression extends BaseNode {
  readonly kind = NodeKind.ParenthesizedExpression;
  expression: Expression;

  constructor(expression: Expression, tags: NodeTags = NodeTags.none) {
    super(tags);
    this.expression = expression;
  }
}

export function isParenthesizedExpression(n: Node): n is ParenthesizedExpression {
  return n.kind === NodeKind.ParenthesizedExpression;
}
