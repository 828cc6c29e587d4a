import { BaseNode, Expression, Node } from '../interface';
import { NodeKind } from '../kind';
import { NodeTags } from '../tags';

// A ReturnStatement represents return args...
export class ReturnStatement extends BaseNode {
  readonly kind = NodeKind.ReturnStatement;
  args: Expression[];

  constructor(args: Expression[], tags: NodeTags = NodeTags.none) {
    super(tags);
    this.args = args;
  }
}

export function isReturnStatement(n: Node): n is ReturnStatement {
  return n.kind === NodeKind.ReturnStatement;
}
