import { SymbolId } from '../../../resolve/binding';
import { Scope } from '../../../resolve/scope';
import { checkFunctionShape } from '../exprs/function-expr';
import { BaseNode, Expression, FunctionParameter, Node } from '../interface';
import { NodeKind } from '../kind';
import type { Block } from '../nodes/block';
import { checkShape } from '../shape';
import { NodeTags } from '../tags';

// A LocalVariableDeclaration represents local ids... = expressions...
// ids and expressions are parallel lists; Lua adjusts a length mismatch
// by padding with nil or discarding surplus values.
export class LocalVariableDeclaration extends BaseNode {
  readonly kind = NodeKind.LocalVariableDeclaration;
  readonly scope: Scope;
  ids: SymbolId[];
  expressions: Expression[];

  constructor(scope: Scope, ids: SymbolId[], expressions: Expression[], tags: NodeTags = NodeTags.none) {
    super(tags);
    checkShape(ids.length > 0, 'local declaration needs at least one variable');
    for (const id of ids) {
      checkShape(scope.hasVariable(id), `${id} is not declared in ${scope}`);
    }
    this.scope = scope;
    this.ids = ids;
    this.expressions = expressions;
  }
}

// A LocalFunctionDeclaration represents local function name(params) body end.
export class LocalFunctionDeclaration extends BaseNode {
  readonly kind = NodeKind.LocalFunctionDeclaration;
  readonly scope: Scope;
  readonly id: SymbolId;
  params: FunctionParameter[];
  body: Block;

  constructor(
    scope: Scope,
    id: SymbolId,
    params: FunctionParameter[],
    body: Block,
    tags: NodeTags = NodeTags.none
  ) {
    super(tags);
    checkShape(scope.hasVariable(id), `${id} is not declared in ${scope}`);
    checkFunctionShape(params, body);
    this.scope = scope;
    this.id = id;
    this.params = params;
    this.body = body;
  }
}

export function isLocalVariableDeclaration(n: Node): n is LocalVariableDeclaration {
  return n.kind === NodeKind.LocalVariableDeclaration;
}

export function isLocalFunctionDeclaration(n: Node): n is LocalFunctionDeclaration {
  return n.kind === NodeKind.LocalFunctionDeclaration;
}
