import { Scope } from '../../../resolve/scope';
import { BaseNode, Node, Statement } from '../interface';
import { NodeKind } from '../kind';
import { checkShape } from '../shape';
import { NodeTags } from '../tags';

// A Block is a statement list together with the scope it introduces.
// A function block is the body of a function; its scope declares the
// function's parameters.
export class Block extends BaseNode {
  readonly kind = NodeKind.Block;
  statements: Statement[];
  readonly scope: Scope;
  readonly isFunctionBlock: boolean;

  constructor(statements: Statement[], scope: Scope, isFunctionBlock = false, tags: NodeTags = NodeTags.none) {
    super(tags);
    checkShape(scope instanceof Scope, 'a block requires a scope');
    checkShape(!scope.isGlobal, 'a block cannot own the global scope');
    this.statements = statements;
    this.scope = scope;
    this.isFunctionBlock = isFunctionBlock;
  }
}

export function isBlock(n: Node): n is Block {
  return n.kind === NodeKind.Block;
}
