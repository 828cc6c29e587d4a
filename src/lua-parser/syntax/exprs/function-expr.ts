import type { Block } from '../nodes/block';
import { BaseNode, FunctionParameter, Node } from '../interface';
import { NodeKind } from '../kind';
import { checkShape } from '../shape';
import { NodeTags } from '../tags';

// checkFunctionShape enforces what every function node shares: a function
// block as body, parameters declared in the body's scope, and at most one
// '...', in last position.
export function checkFunctionShape(params: FunctionParameter[], body: Block): void {
  checkShape(body.isFunctionBlock, 'function body must be a function block');
  params.forEach((p, i) => {
    if (p.kind === NodeKind.VarargExpression) {
      checkShape(i === params.length - 1, "'...' must be the last parameter");
    } else {
      checkShape(p.scope === body.scope, 'parameters must be declared in the function body scope');
    }
  });
}

// A FunctionLiteralExpression represents function(params) body end.
export class FunctionLiteralExpression extends BaseNode {
  readonly kind = NodeKind.FunctionLiteralExpression;
  params: FunctionParameter[];
  body: Block;

  constructor(params: FunctionParameter[], body: Block, tags: NodeTags = NodeTags.none) {
    super(tags);
    checkFunctionShape(params, body);
    this.params = params;
    this.body = body;
  }
}

export function isFunctionLiteralExpression(n: Node): n is FunctionLiteralExpression {
  return n.kind === NodeKind.FunctionLiteralExpression;
}
