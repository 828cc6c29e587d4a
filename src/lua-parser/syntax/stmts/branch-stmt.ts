import { BaseNode, Node } from '../interface';
import { NodeKind } from '../kind';
import { NodeTags } from '../tags';

export class BreakStatement extends BaseNode {
  readonly kind = NodeKind.BreakStatement;

  constructor(tags: NodeTags = NodeTags.none) {
    super(tags);
  }
}

// ContinueStatement only exists in the Luau dialect.
export class ContinueStatement extends BaseNode {
  readonly kind = NodeKind.ContinueStatement;

  constructor(tags: NodeTags = NodeTags.none) {
    super(tags);
  }
}

export function isBreakStatement(n: Node): n is BreakStatement {
  return n.kind === NodeKind.BreakStatement;
}

export function isContinueStatement(n: Node): n is ContinueStatement {
  return n.kind === NodeKind.ContinueStatement;
}
