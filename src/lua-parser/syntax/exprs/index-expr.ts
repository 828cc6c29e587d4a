import { BaseNode, Expression, Node } from '../interface';
import { NodeKind } from '../kind';
import { NodeTags } from '../tags';

// An IndexExpression represents base[index]; base.name parses to the
// same node with a string index.
export class IndexExpression extends BaseNode {
  readonly kind = NodeKind.IndexExpression;
  base: Expression;
  index: Expression;

  constructor(base: Expression, index: Expression, tags: NodeTags = NodeTags.none) {
    super(tags);
    this.base = base;
    this.index = index;
  }
}

export function isIndexExpression(n: Node): n is IndexExpression {
  return n.kind === NodeKind.IndexExpression;
}
