import { Scope } from '../resolve/scope';
import { Chunk } from '../lua-parser/syntax';
import { isReserved } from '../lua-parser/tokenize/token';
import { NameGenerator } from './name-generators';

export interface RenameOptions {
  generator: NameGenerator;
  // prepended to every generated name
  prefix?: string;
}

// renameVariables gives every local of the tree a generated name.
//
// Scopes are renamed outermost first, each counting from zero, so
// sibling scopes reuse short names. A scope never takes a name that is
// reserved, that names a global of the tree, that another variable of
// the same scope already took, or that names a variable of an enclosing
// scope referenced from this scope's subtree; the last rule is what
// keeps shadowing from capturing a reference.
export function renameVariables(chunk: Chunk, options: RenameOptions): void {
  const prefix = options.prefix ?? '';
  const globals = new Set<string>();
  for (const id of chunk.globalScope.variables()) {
    globals.add(chunk.globalScope.getVariableName(id));
  }

  chunk.body.scope.forEachInSubtree((scope) => {
    const taken = new Set(globals);
    for (const name of referencedNames(scope)) {
      taken.add(name);
    }
    let counter = 0;
    for (const id of scope.variables()) {
      let name: string;
      do {
        name = prefix + options.generator.generate(counter++);
      } while (isReserved(name) || taken.has(name));
      taken.add(name);
      scope.renameVariable(id, name);
    }
  });
}

// referencedNames lists the names of enclosing scopes' variables that
// are used from within scope's subtree.
function referencedNames(scope: Scope): string[] {
  const names: string[] = [];
  for (const [owner, ids] of scope.higherReferences()) {
    for (const id of ids.keys()) {
      names.push(owner.getVariableName(id));
    }
  }
  return names;
}
