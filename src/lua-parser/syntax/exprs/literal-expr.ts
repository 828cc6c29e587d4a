import { BaseNode, Node } from '../interface';
import { NodeKind } from '../kind';
import { checkShape } from '../shape';
import { NodeTags } from '../tags';

// A BooleanExpression represents true or false.
export class BooleanExpression extends BaseNode {
  readonly kind = NodeKind.BooleanExpression;
  value: boolean;

  constructor(value: boolean, tags: NodeTags = NodeTags.none) {
    super(tags);
    this.value = value;
  }
}

// A NumberExpression represents a numeric literal.
// Lua 5.1 numbers are doubles; negative values and non-finite values
// only appear in trees built by rewrite steps.
export class NumberExpression extends BaseNode {
  readonly kind = NodeKind.NumberExpression;
  value: number;

  constructor(value: number, tags: NodeTags = NodeTags.none) {
    super(tags);
    this.value = value;
  }
}

// A StringExpression represents a string literal. The value holds one
// char per byte.
export class StringExpression extends BaseNode {
  readonly kind = NodeKind.StringExpression;
  value: string;

  constructor(value: string, tags: NodeTags = NodeTags.none) {
    super(tags);
    for (let i = 0; i < value.length; i++) {
      checkShape(value.charCodeAt(i) < 256, 'string literal holds a char wider than a byte');
    }
    this.value = value;
  }
}

export class NilExpression extends BaseNode {
  readonly kind = NodeKind.NilExpression;

  constructor(tags: NodeTags = NodeTags.none) {
    super(tags);
  }
}

// A VarargExpression represents '...'.
export class VarargExpression extends BaseNode {
  readonly kind = NodeKind.VarargExpression;

  constructor(tags: NodeTags = NodeTags.none) {
    super(tags);
  }
}

export function isBooleanExpression(n: Node): n is BooleanExpression {
  return n.kind === NodeKind.BooleanExpression;
}

export function isNumberExpression(n: Node): n is NumberExpression {
  return n.kind === NodeKind.NumberExpression;
}

export function isStringExpression(n: Node): n is StringExpression {
  return n.kind === NodeKind.StringExpression;
}

export function isNilExpression(n: Node): n is NilExpression {
  return n.kind === NodeKind.NilExpression;
}

export function isVarargExpression(n: Node): n is VarargExpression {
  return n.kind === NodeKind.VarargExpression;
}
