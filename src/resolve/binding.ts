import type { Scope } from './scope';

// A SymbolId is the identity of one variable for the lifetime of a tree.
// Surface names are cosmetic; two variables with the same name have
// distinct ids, and renaming a variable never changes its id.
export class SymbolId {
  readonly index: number;

  constructor(index: number) {
    this.index = index;
  }

  toString(): string {
    return `#${this.index}`;
  }
}

// A SymbolIdSource hands out the ids of one tree. Every scope of a tree
// shares its source, so ids are unique tree-wide.
export class SymbolIdSource {
  private nextSymbol = 0;
  private nextScope = 0;

  next(): SymbolId {
    return new SymbolId(this.nextSymbol++);
  }

  // scopeSerial numbers scopes for diagnostics.
  scopeSerial(): number {
    return this.nextScope++;
  }

  // issued reports how many ids have been handed out.
  issued(): number {
    return this.nextSymbol;
  }
}

// A Binding ties a reference to the scope declaring it.
export interface Binding {
  readonly scope: Scope;
  readonly id: SymbolId;
}
