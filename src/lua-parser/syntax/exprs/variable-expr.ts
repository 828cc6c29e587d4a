import { SymbolId } from '../../../resolve/binding';
import { Scope } from '../../../resolve/scope';
import { BaseNode, Node } from '../interface';
import { NodeKind } from '../kind';
import { checkShape } from '../shape';
import { NodeTags } from '../tags';

// A VariableExpression is a use of a variable. scope is the scope that
// declares id: a local scope up the chain, or the global scope.
export class VariableExpression extends BaseNode {
  readonly kind = NodeKind.VariableExpression;
  readonly scope: Scope;
  readonly id: SymbolId;

  constructor(scope: Scope, id: SymbolId, tags: NodeTags = NodeTags.none) {
    super(tags);
    checkShape(scope.hasVariable(id), `${id} is not declared in ${scope}`);
    this.scope = scope;
    this.id = id;
  }

  get name(): string {
    return this.scope.getVariableName(this.id);
  }
}

export function isVariableExpression(n: Node): n is VariableExpression {
  return n.kind === NodeKind.VariableExpression;
}
