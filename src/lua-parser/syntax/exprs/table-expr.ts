import { BaseNode, Expression, Node, TableEntryNode } from '../interface';
import { NodeKind } from '../kind';
import { NodeTags } from '../tags';

// A TableEntry is a positional entry of a table constructor.
export class TableEntry extends BaseNode {
  readonly kind = NodeKind.TableEntry;
  value: Expression;

  constructor(value: Expression, tags: NodeTags = NodeTags.none) {
    super(tags);
    this.value = value;
  }
}

// A KeyedTableEntry is [key] = value; name = value parses to the same
// node with a string key.
export class KeyedTableEntry extends BaseNode {
  readonly kind = NodeKind.KeyedTableEntry;
  key: Expression;
  value: Expression;

  constructor(key: Expression, value: Expression, tags: NodeTags = NodeTags.none) {
    super(tags);
    this.key = key;
    this.value = value;
  }
}

// A TableConstructorExpression represents { entries... }.
export class TableConstructorExpression extends BaseNode {
  readonly kind = NodeKind.TableConstructorExpression;
  entries: TableEntryNode[];

  constructor(entries: TableEntryNode[], tags: NodeTags = NodeTags.none) {
    super(tags);
    this.entries = entries;
  }
}

export function isTableConstructorExpression(n: Node): n is TableConstructorExpression {
  return n.kind === NodeKind.TableConstructorExpression;
}

export function isTableEntry(n: Node): n is TableEntry {
  return n.kind === NodeKind.TableEntry;
}

export function isKeyedTableEntry(n: Node): n is KeyedTableEntry {
  return n.kind === NodeKind.KeyedTableEntry;
}
