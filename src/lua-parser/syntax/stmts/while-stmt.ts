import { BaseNode, Expression, Node } from '../interface';
import { NodeKind } from '../kind';
import type { Block } from '../nodes/block';
import { NodeTags } from '../tags';

// A WhileStatement represents while condition do body end.
export class WhileStatement extends BaseNode {
  readonly kind = NodeKind.WhileStatement;
  condition: Expression;
  body: Block;

  constructor(condition: Expression, body: Block, tags: NodeTags = NodeTags.none) {
    super(tags);
    this.condition = condition;
    this.body = body;
  }
}

// A RepeatStatement represents repeat body until condition. The condition
// sees the locals of the body, so it is resolved in body.scope.
export class RepeatStatement extends BaseNode {
  readonly kind = NodeKind.RepeatStatement;
  body: Block;
  condition: Expression;

  constructor(body: Block, condition: Expression, tags: NodeTags = NodeTags.none) {
    super(tags);
    this.body = body;
    this.condition = condition;
  }
}

export function isWhileStatement(n: Node): n is WhileStatement {
  return n.kind === NodeKind.WhileStatement;
}

export function isRepeatStatement(n: Node): n is RepeatStatement {
  return n.kind === NodeKind.RepeatStatement;
}
