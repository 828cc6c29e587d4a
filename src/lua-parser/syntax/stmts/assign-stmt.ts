import { SymbolId } from '../../../resolve/binding';
import { Scope } from '../../../resolve/scope';
import type { ArithmeticOperator } from '../exprs/binary-expr';
import { AssignmentTarget, BaseNode, Expression, Node } from '../interface';
import { NodeKind } from '../kind';
import { checkShape } from '../shape';
import { NodeTags } from '../tags';

// An AssignmentVariable is a variable on the left of an assignment.
export class AssignmentVariable extends BaseNode {
  readonly kind = NodeKind.AssignmentVariable;
  readonly scope: Scope;
  readonly id: SymbolId;

  constructor(scope: Scope, id: SymbolId, tags: NodeTags = NodeTags.none) {
    super(tags);
    checkShape(scope.hasVariable(id), `${id} is not declared in ${scope}`);
    this.scope = scope;
    this.id = id;
  }
}

// An AssignmentIndexing is base[index] on the left of an assignment.
export class AssignmentIndexing extends BaseNode {
  readonly kind = NodeKind.AssignmentIndexing;
  base: Expression;
  index: Expression;

  constructor(base: Expression, index: Expression, tags: NodeTags = NodeTags.none) {
    super(tags);
    this.base = base;
    this.index = index;
  }
}

// An AssignmentStatement represents lhs... = rhs...
export class AssignmentStatement extends BaseNode {
  readonly kind = NodeKind.AssignmentStatement;
  lhs: AssignmentTarget[];
  rhs: Expression[];

  constructor(lhs: AssignmentTarget[], rhs: Expression[], tags: NodeTags = NodeTags.none) {
    super(tags);
    checkShape(lhs.length > 0, 'assignment needs at least one target');
    checkShape(rhs.length > 0, 'assignment needs at least one value');
    this.lhs = lhs;
    this.rhs = rhs;
  }
}

export type CompoundOperator = ArithmeticOperator | '..';

// A CompoundAssignmentStatement represents the Luau form lhs op= rhs.
export class CompoundAssignmentStatement extends BaseNode {
  readonly kind = NodeKind.CompoundAssignmentStatement;
  op: CompoundOperator;
  lhs: AssignmentTarget;
  rhs: Expression;

  constructor(op: CompoundOperator, lhs: AssignmentTarget, rhs: Expression, tags: NodeTags = NodeTags.none) {
    super(tags);
    this.op = op;
    this.lhs = lhs;
    this.rhs = rhs;
  }
}

export function isAssignmentStatement(n: Node): n is AssignmentStatement {
  return n.kind === NodeKind.AssignmentStatement;
}

export function isAssignmentVariable(n: Node): n is AssignmentVariable {
  return n.kind === NodeKind.AssignmentVariable;
}

export function isAssignmentIndexing(n: Node): n is AssignmentIndexing {
  return n.kind === NodeKind.AssignmentIndexing;
}

export function isCompoundAssignmentStatement(n: Node): n is CompoundAssignmentStatement {
  return n.kind === NodeKind.CompoundAssignmentStatement;
}
