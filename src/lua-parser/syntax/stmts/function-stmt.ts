import { SymbolId } from '../../../resolve/binding';
import { Scope } from '../../../resolve/scope';
import { checkFunctionShape } from '../exprs/function-expr';
import { BaseNode, FunctionParameter, Node } from '../interface';
import { NodeKind } from '../kind';
import type { Block } from '../nodes/block';
import { checkShape } from '../shape';
import { NodeTags } from '../tags';

// A FunctionDeclaration represents function name.indices...(params) body end.
// (scope, id) binds the base name, local or global. The method form
// name:m() is parsed with an explicit leading 'self' parameter.
export class FunctionDeclaration extends BaseNode {
  readonly kind = NodeKind.FunctionDeclaration;
  readonly scope: Scope;
  readonly id: SymbolId;
  indices: string[];
  params: FunctionParameter[];
  body: Block;

  constructor(
    scope: Scope,
    id: SymbolId,
    indices: string[],
    params: FunctionParameter[],
    body: Block,
    tags: NodeTags = NodeTags.none
  ) {
    super(tags);
    checkShape(scope.hasVariable(id), `${id} is not declared in ${scope}`);
    checkFunctionShape(params, body);
    this.scope = scope;
    this.id = id;
    this.indices = indices;
    this.params = params;
    this.body = body;
  }
}

export function isFunctionDeclaration(n: Node): n is FunctionDeclaration {
  return n.kind === NodeKind.FunctionDeclaration;
}
