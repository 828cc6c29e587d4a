import { BaseNode, Expression, Node } from '../interface';
import { NodeKind } from '../kind';
import { checkShape } from '../shape';
import { NodeTags } from '../tags';

// A FunctionCallStatement is a call evaluated for its effects.
export class FunctionCallStatement extends BaseNode {
  readonly kind = NodeKind.FunctionCallStatement;
  base: Expression;
  args: Expression[];

  constructor(base: Expression, args: Expression[], tags: NodeTags = NodeTags.none) {
    super(tags);
    this.base = base;
    this.args = args;
  }
}

// A PassSelfFunctionCallStatement is base:name(args...) as a statement.
export class PassSelfFunctionCallStatement extends BaseNode {
  readonly kind = NodeKind.PassSelfFunctionCallStatement;
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

export function isFunctionCallStatement(n: Node): n is FunctionCallStatement {
  return n.kind === NodeKind.FunctionCallStatement;
}

export function isPassSelfFunctionCallStatement(n: Node): n is PassSelfFunctionCallStatement {
  return n.kind === NodeKind.PassSelfFunctionCallStatement;
}
