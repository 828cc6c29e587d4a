import { Binding, SymbolId, SymbolIdSource } from './binding';
import { ScopeError } from './error';

// A Scope is the symbol table of one block.
//
// Locals are keyed by SymbolId; the name table maps a surface name to
// the most recent declaration carrying it, so shadowing inside one scope
// (local a = 1; local a = a) mints a second id for the same name.
//
// The global scope is the root of every chain. It holds one flat,
// tree-wide namespace and is only ever written through resolveGlobal.
//
// Each scope also keeps a ledger of the variables it uses from enclosing
// scopes: for every ancestor, which of its ids are referenced from within
// this scope's subtree and how many times. The renamer relies on the
// ledger to avoid capturing those variables, so a rewrite that moves a
// reference to a different nesting depth must keep it up to date.
export class Scope {
  readonly isGlobal: boolean;
  readonly ids: SymbolIdSource;
  readonly serial: number;

  private parentScope: Scope | null;
  private childScopes: Scope[] = [];
  // set once the scope has been re-rooted onto another tree
  private attached = false;

  private names = new Map<SymbolId, string>();
  private byName = new Map<string, SymbolId>();
  private referenceCounts = new Map<SymbolId, number>();
  private higher = new Map<Scope, Map<SymbolId, number>>();

  // new Scope(parent) creates a child scope; it is never global.
  constructor(parent: Scope);
  constructor(parent: null, ids: SymbolIdSource);
  constructor(parent: Scope | null, ids?: SymbolIdSource) {
    this.parentScope = parent;
    if (parent === null) {
      this.isGlobal = true;
      this.ids = ids ?? new SymbolIdSource();
    } else {
      this.isGlobal = false;
      this.ids = parent.ids;
      parent.childScopes.push(this);
    }
    this.serial = this.ids.scopeSerial();
  }

  // global creates the root scope of a new tree.
  static global(ids: SymbolIdSource = new SymbolIdSource()): Scope {
    return new Scope(null, ids);
  }

  get parent(): Scope | null {
    return this.parentScope;
  }

  get children(): readonly Scope[] {
    return this.childScopes;
  }

  toString(): string {
    return this.isGlobal ? `global scope ${this.serial}` : `scope ${this.serial}`;
  }

  // globalScope returns the root of the chain.
  globalScope(): Scope {
    let s: Scope = this;
    while (s.parentScope !== null) {
      s = s.parentScope;
    }
    return s;
  }

  // isAncestorOf reports whether this scope is other or encloses it.
  isAncestorOf(other: Scope): boolean {
    for (let s: Scope | null = other; s !== null; s = s.parentScope) {
      if (s === this) {
        return true;
      }
    }
    return false;
  }

  // addVariable declares a fresh local in this scope. Without a name hint
  // the variable gets a synthetic name until the renamer assigns one.
  addVariable(nameHint?: string): SymbolId {
    if (this.isGlobal) {
      throw new ScopeError(`cannot declare a local in the ${this}`);
    }
    const id = this.ids.next();
    const name = nameHint ?? `__sym${id.index}`;
    this.names.set(id, name);
    this.byName.set(name, id);
    return id;
  }

  // hasVariable reports whether id is declared directly in this scope.
  hasVariable(id: SymbolId): boolean {
    return this.names.has(id);
  }

  // variables lists the ids declared in this scope in declaration order.
  variables(): SymbolId[] {
    return [...this.names.keys()];
  }

  // resolve looks a local up by surface name, innermost scope first.
  // Globals are not consulted; see resolveGlobal.
  resolve(name: string): SymbolId | undefined {
    return this.lookup(name)?.id;
  }

  // lookup is resolve, also reporting which scope declares the name.
  lookup(name: string): Binding | undefined {
    for (let s: Scope | null = this; s !== null && !s.isGlobal; s = s.parentScope) {
      const id = s.byName.get(name);
      if (id !== undefined) {
        return { scope: s, id };
      }
    }
    return undefined;
  }

  // resolveGlobal interns name in the tree-wide global namespace.
  resolveGlobal(name: string): Binding {
    const g = this.globalScope();
    let id = g.byName.get(name);
    if (id === undefined) {
      id = g.ids.next();
      g.names.set(id, name);
      g.byName.set(name, id);
    }
    return { scope: g, id };
  }

  // knowsGlobal reports whether name has been interned as a global.
  knowsGlobal(name: string): boolean {
    return this.globalScope().byName.has(name);
  }

  // mustResolve binds name the way a reference in this scope would: to a
  // local up the chain, else to an already interned global. Anything
  // else means a rewrite produced a reference to nothing.
  mustResolve(name: string): Binding {
    const local = this.lookup(name);
    if (local !== undefined) {
      return local;
    }
    const g = this.globalScope();
    const id = g.byName.get(name);
    if (id === undefined) {
      throw new ScopeError(`'${name}' is not declared in ${this} or any enclosing scope`);
    }
    return { scope: g, id };
  }

  // getVariableName returns the surface name of a variable of this scope.
  getVariableName(id: SymbolId): string {
    const name = this.names.get(id);
    if (name === undefined) {
      throw new ScopeError(`${id} is not declared in ${this}`);
    }
    return name;
  }

  // renameVariable changes the surface name of id; the id is unchanged.
  renameVariable(id: SymbolId, name: string): void {
    const old = this.getVariableName(id);
    if (this.isGlobal) {
      throw new ScopeError(`cannot rename global '${old}'`);
    }
    if (this.byName.get(old) === id) {
      this.byName.delete(old);
    }
    this.names.set(id, name);
    this.byName.set(name, id);
  }

  // addReference counts a use of a variable of this scope.
  addReference(id: SymbolId): void {
    this.addReferenceToHigherScope(this, id);
  }

  removeReference(id: SymbolId): void {
    this.removeReferenceToHigherScope(this, id);
  }

  // referenceCount reports how many uses of id have been recorded.
  referenceCount(id: SymbolId): number {
    return this.referenceCounts.get(id) ?? 0;
  }

  // addReferenceToHigherScope records that this scope's subtree uses id,
  // declared in owner. Every scope between this one and owner gets a
  // ledger entry, so each of them knows not to shadow the variable.
  addReferenceToHigherScope(owner: Scope, id: SymbolId, n = 1): void {
    if (!owner.hasVariable(id)) {
      throw new ScopeError(`${id} is not declared in ${owner}`);
    }
    for (const s of this.chainTo(owner)) {
      let entries = s.higher.get(owner);
      if (entries === undefined) {
        entries = new Map();
        s.higher.set(owner, entries);
      }
      entries.set(id, (entries.get(id) ?? 0) + n);
    }
    owner.referenceCounts.set(id, owner.referenceCount(id) + n);
  }

  // removeReferenceToHigherScope undoes one addReferenceToHigherScope.
  removeReferenceToHigherScope(owner: Scope, id: SymbolId, n = 1): void {
    const chain = this.chainTo(owner);
    for (const s of chain) {
      const count = s.higher.get(owner)?.get(id) ?? 0;
      if (count < n) {
        throw new ScopeError(`${s} holds no reference to ${id} of ${owner}`);
      }
    }
    if (owner.referenceCount(id) < n) {
      throw new ScopeError(`${owner} holds no reference to ${id}`);
    }
    for (const s of chain) {
      const entries = s.higher.get(owner);
      if (entries === undefined) {
        continue;
      }
      const left = (entries.get(id) ?? 0) - n;
      if (left > 0) {
        entries.set(id, left);
      } else {
        entries.delete(id);
        if (entries.size === 0) {
          s.higher.delete(owner);
        }
      }
    }
    const left = owner.referenceCount(id) - n;
    if (left > 0) {
      owner.referenceCounts.set(id, left);
    } else {
      owner.referenceCounts.delete(id);
    }
  }

  // isReferencedFromHigherScope reports whether this scope's subtree uses
  // id of the enclosing scope owner.
  isReferencedFromHigherScope(owner: Scope, id: SymbolId): boolean {
    return (this.higher.get(owner)?.get(id) ?? 0) > 0;
  }

  // higherReferences lists, per enclosing scope, the ids this subtree uses.
  higherReferences(): ReadonlyMap<Scope, ReadonlyMap<SymbolId, number>> {
    return this.higher;
  }

  // attach re-roots a scope that heads a separately parsed tree onto
  // parent. It may happen once, and only while the scope still hangs off
  // its own tree's global scope. Ids declared here are unaffected; ledger
  // entries owned by the abandoned global scope are dropped from the whole
  // subtree, since the caller rebinds those references against parent.
  attach(parent: Scope): void {
    const old = this.parentScope;
    if (this.attached || old === null || !old.isGlobal) {
      throw new ScopeError(`${this} is not a detached root and cannot be attached`);
    }
    if (this.isAncestorOf(parent)) {
      throw new ScopeError(`attaching ${this} below ${parent} would create a cycle`);
    }
    old.childScopes = old.childScopes.filter((s) => s !== this);
    this.parentScope = parent;
    parent.childScopes.push(this);
    this.attached = true;
    this.forEachInSubtree((s) => {
      s.higher.delete(old);
    });
  }

  // forEachInSubtree calls f on this scope and every scope below it.
  forEachInSubtree(f: (s: Scope) => void): void {
    f(this);
    for (const child of this.childScopes) {
      child.forEachInSubtree(f);
    }
  }

  // chainTo lists the scopes from this one up to, not including, owner.
  private chainTo(owner: Scope): Scope[] {
    const chain: Scope[] = [];
    for (let s: Scope | null = this; s !== owner; s = s.parentScope) {
      if (s === null) {
        throw new ScopeError(`${owner} does not enclose ${this}`);
      }
      chain.push(s);
    }
    return chain;
  }
}
