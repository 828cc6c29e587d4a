import { BaseNode, Node } from '../interface';
import { NodeKind } from '../kind';
import type { Block } from '../nodes/block';
import { NodeTags } from '../tags';

// A DoStatement represents do body end.
export class DoStatement extends BaseNode {
  readonly kind = NodeKind.DoStatement;
  body: Block;

  constructor(body: Block, tags: NodeTags = NodeTags.none) {
    super(tags);
    this.body = body;
  }
}

export function isDoStatement(n: Node): n is DoStatement {
  return n.kind === NodeKind.DoStatement;
}
