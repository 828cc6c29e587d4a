import { BaseNode, Expression, Node } from '../interface';
import { NodeKind } from '../kind';
import { checkShape } from '../shape';
import { NodeTags } from '../tags';

// A FunctionCallExpression represents base(args...).
export class FunctionCallExpression extends BaseNode {
  readonly kind = NodeKind.FunctionCallExpression;
  base: Expression;
  args: Expression[];

  constructor(base: Expression, args: Expression[], tags: NodeTags = NodeTags.none) {
    super(tags);
    this.base = base;
    this.args = args;
  }
}

// A PassSelfFunctionCallExpression represents base:name(args...).
export class PassSelfFunctionCallExpression extends BaseNode {
  readonly kind = NodeKind.PassSelfFunctionCallExpression;
  base: Expression;
  passSelfFunctionName: string;
  args: Expression[];

  constructor(
    base: Expression,
    passSelfFunctionName: string,
    args: Expression[],
    tags: NodeTags = NodeTags.none
  ) {
    super(tags);
    checkShape(passSelfFunctionName.length > 0, 'method call needs a method name');
    this.base = base;
    this.passSelfFunctionName = passSelfFunctionName;
    this.args = args;
  }
}

export function isFunctionCallExpression(n: Node): n is FunctionCallExpression {
  return n.kind === NodeKind.FunctionCallExpression;
}

export function isPassSelfFunctionCallExpression(n: Node): n is PassSelfFunctionCallExpression {
  return n.kind === NodeKind.PassSelfFunctionCallExpression;
}
