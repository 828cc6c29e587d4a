import { SymbolId } from '../../../resolve/binding';
import type { Scope } from '../../../resolve/scope';
import { BaseNode, Expression, Node } from '../interface';
import { NodeKind } from '../kind';
import type { Block } from '../nodes/block';
import { checkShape } from '../shape';
import { NodeTags } from '../tags';

// A ForStatement represents for id = initial, final[, step] do body end.
// The loop variable is declared in body.scope; the bounds are evaluated
// outside it.
export class ForStatement extends BaseNode {
  readonly kind = NodeKind.ForStatement;
  readonly id: SymbolId;
  initialValue: Expression;
  finalValue: Expression;
  incrementBy: Expression | null;
  body: Block;

  constructor(
    id: SymbolId,
    initialValue: Expression,
    finalValue: Expression,
    incrementBy: Expression | null,
    body: Block,
    tags: NodeTags = NodeTags.none
  ) {
    super(tags);
    checkShape(body.scope.hasVariable(id), 'loop variable must be declared in the loop body scope');
    this.id = id;
    this.initialValue = initialValue;
    this.finalValue = finalValue;
    this.incrementBy = incrementBy;
    this.body = body;
  }

  get scope(): Scope {
    return this.body.scope;
  }
}

// A ForInStatement represents for ids... in expressions... do body end.
export class ForInStatement extends BaseNode {
  readonly kind = NodeKind.ForInStatement;
  readonly ids: SymbolId[];
  expressions: Expression[];
  body: Block;

  constructor(ids: SymbolId[], expressions: Expression[], body: Block, tags: NodeTags = NodeTags.none) {
    super(tags);
    checkShape(ids.length > 0, 'generic for needs at least one variable');
    checkShape(expressions.length > 0, 'generic for needs at least one expression');
    for (const id of ids) {
      checkShape(body.scope.hasVariable(id), 'loop variables must be declared in the loop body scope');
    }
    this.ids = ids;
    this.expressions = expressions;
    this.body = body;
  }

  get scope(): Scope {
    return this.body.scope;
  }
}

export function isForStatement(n: Node): n is ForStatement {
  return n.kind === NodeKind.ForStatement;
}

export function isForInStatement(n: Node): n is ForInStatement {
  return n.kind === NodeKind.ForInStatement;
}
