import { BaseNode, Expression, Node } from '../interface';
import { NodeKind } from '../kind';
import type { Block } from '../nodes/block';
import { NodeTags } from '../tags';

// An ElseIfClause is one elseif condition then body part of an if.
export interface ElseIfClause {
  condition: Expression;
  body: Block;
}

// An IfStatement represents if condition then body {elseif ...} [else elseBody] end.
export class IfStatement extends BaseNode {
  readonly kind = NodeKind.IfStatement;
  condition: Expression;
  body: Block;
  elseifs: ElseIfClause[];
  elseBody: Block | null;

  constructor(
    condition: Expression,
    body: Block,
    elseifs: ElseIfClause[],
    elseBody: Block | null,
    tags: NodeTags = NodeTags.none
  ) {
    super(tags);
    this.condition = condition;
    this.body = body;
    this.elseifs = elseifs;
    this.elseBody = elseBody;
  }
}

export function isIfStatement(n: Node): n is IfStatement {
  return n.kind === NodeKind.IfStatement;
}
