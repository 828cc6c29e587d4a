import { Binding, SymbolId } from '../resolve/binding';
import { ScopeError } from '../resolve/error';
import { Scope } from '../resolve/scope';
import { parse } from '../lua-parser/parse';
import * as syntax from '../lua-parser/syntax';
import { Logger, silentLogger } from '../utils/logger';
import { Visit, visit } from '../walk/visit';

// Where the fragment goes in the host block.
export type SplicePosition = 'start' | 'end' | number;

export interface SpliceOptions {
  // fragment name -> host variable declared in the target block's scope.
  // Declarations of the name in the fragment, and uses of it as a free
  // name, bind to the host variable instead.
  exports?: Record<string, SymbolId>;
  // fragment free name -> host variable visible from the target block
  imports?: Record<string, Binding>;
  position?: SplicePosition;
  logger?: Logger;
}

// A SpliceError reports a fragment that cannot be merged as asked.
export class SpliceError extends Error {
  constructor(msg: string) {
    super(msg);
    this.name = 'SpliceError';
  }
}

// splice parses source as a fragment of host and merges it into block,
// returning the statements inserted.
//
// The fragment is parsed with the host's dialect and id source, then its
// root scope is attached below block's scope. Free names of the fragment
// bind to exports, then imports, then host globals; nothing binds to a
// host local by name. Fragment locals other than exports stay private:
// if the fragment's top level declares any, it is wrapped in do ... end
// and its exported declarations become assignments to host locals
// declared just before it.
//
// Fails with ParseError if source does not parse.
export function splice(
  host: syntax.Chunk,
  block: syntax.Block,
  source: string,
  options: SpliceOptions = {}
): syntax.Statement[] {
  const logger = options.logger ?? silentLogger();
  const target = block.scope;
  if (target.globalScope() !== host.globalScope) {
    throw new SpliceError(`${target} is not part of the host tree`);
  }

  const exportIds = new Map<string, SymbolId>(Object.entries(options.exports ?? {}));
  const exportedHostIds = new Set(exportIds.values());
  const imports = new Map<string, Binding>(Object.entries(options.imports ?? {}));
  for (const [name, id] of exportIds) {
    if (!target.hasVariable(id)) {
      throw new ScopeError(`export '${name}' (${id}) is not declared in ${target}`);
    }
  }

  const parsed = parse(source, {
    dialect: host.dialect,
    filename: '<fragment>',
    ids: host.globalScope.ids,
  });
  if (parsed.err) {
    throw parsed.val;
  }
  const fragment = parsed.val;
  const root = fragment.body.scope;
  const fragmentGlobal = fragment.globalScope;

  // top-level fragment locals that become host variables
  const exported = new Map<SymbolId, SymbolId>();
  let hasPrivate = false;
  for (const id of root.variables()) {
    const hostId = exportIds.get(root.getVariableName(id));
    if (hostId !== undefined) {
      exported.set(id, hostId);
    } else {
      hasPrivate = true;
    }
  }
  const direct = !hasPrivate;
  const matched = new Set<string>();
  for (const id of root.variables()) {
    matched.add(root.getVariableName(id));
  }

  root.attach(target);

  // rebind maps a fragment binding onto the host, or returns undefined
  // for a binding private to the fragment.
  const rebind = (scope: Scope, id: SymbolId): Binding | undefined => {
    if (scope === root) {
      const hostId = exported.get(id);
      return hostId === undefined ? undefined : { scope: target, id: hostId };
    }
    if (scope !== fragmentGlobal) {
      return undefined;
    }
    const name = fragmentGlobal.getVariableName(id);
    const hostId = exportIds.get(name);
    if (hostId !== undefined) {
      matched.add(name);
      return { scope: target, id: hostId };
    }
    return imports.get(name) ?? target.resolveGlobal(name);
  };

  // move records a rebound reference in the ledger. References at the
  // top level of a directly inserted fragment live in the host block.
  const move = (at: Scope, from: Binding, to: Binding): void => {
    const where = direct && at === root ? target : at;
    if (from.scope === root) {
      at.removeReferenceToHigherScope(root, from.id);
    }
    where.addReferenceToHigherScope(to.scope, to.id);
  };

  // forward declared host locals, for exports the fragment does not
  // itself declare with a local statement at its top level
  const forward = new Set<SymbolId>();

  visit(fragment, {
    post(node, ctx) {
      switch (node.kind) {
        case syntax.NodeKind.VariableExpression: {
          const to = rebind(node.scope, node.id);
          if (to === undefined) {
            return undefined;
          }
          move(ctx.scope, node, to);
          return Visit.replace(new syntax.VariableExpression(to.scope, to.id, node.tags));
        }
        case syntax.NodeKind.AssignmentVariable: {
          const to = rebind(node.scope, node.id);
          if (to === undefined) {
            return undefined;
          }
          move(ctx.scope, node, to);
          if (exportedHostIds.has(to.id)) {
            forward.add(to.id);
          }
          return Visit.replace(new syntax.AssignmentVariable(to.scope, to.id, node.tags));
        }
        case syntax.NodeKind.FunctionDeclaration: {
          const to = rebind(node.scope, node.id);
          if (to === undefined) {
            return undefined;
          }
          move(ctx.scope, node, to);
          if (exportedHostIds.has(to.id) && node.indices.length === 0) {
            forward.add(to.id);
          }
          return Visit.replace(
            new syntax.FunctionDeclaration(to.scope, to.id, node.indices, node.params, node.body, node.tags)
          );
        }
        case syntax.NodeKind.LocalFunctionDeclaration: {
          const hostId = node.scope === root ? exported.get(node.id) : undefined;
          if (hostId === undefined) {
            return undefined;
          }
          if (direct) {
            return Visit.replace(
              new syntax.LocalFunctionDeclaration(target, hostId, node.params, node.body, node.tags)
            );
          }
          forward.add(hostId);
          root.addReferenceToHigherScope(target, hostId);
          return Visit.replace(
            new syntax.AssignmentStatement(
              [new syntax.AssignmentVariable(target, hostId)],
              [new syntax.FunctionLiteralExpression(node.params, node.body)],
              node.tags
            )
          );
        }
        case syntax.NodeKind.LocalVariableDeclaration: {
          if (node.scope !== root) {
            return undefined;
          }
          const hostIds = node.ids.map((id) => exported.get(id));
          const declared = hostIds.filter((id): id is SymbolId => id !== undefined);
          if (declared.length === 0) {
            return undefined;
          }
          if (declared.length !== hostIds.length) {
            const names = node.ids.map((id) => root.getVariableName(id)).join(', ');
            throw new SpliceError(`local ${names} mixes exported and private names`);
          }
          if (direct) {
            return Visit.replace(new syntax.LocalVariableDeclaration(target, declared, node.expressions, node.tags));
          }
          for (const id of declared) {
            forward.add(id);
            root.addReferenceToHigherScope(target, id);
          }
          const rhs = node.expressions.length > 0 ? node.expressions : [new syntax.NilExpression()];
          return Visit.replace(
            new syntax.AssignmentStatement(
              declared.map((id) => new syntax.AssignmentVariable(target, id)),
              rhs,
              node.tags
            )
          );
        }
        default:
          return undefined;
      }
    },
  });

  // exports declared by a direct local statement need no forward declaration
  if (direct) {
    for (const stmt of fragment.body.statements) {
      if (stmt.kind === syntax.NodeKind.LocalVariableDeclaration && stmt.scope === target) {
        stmt.ids.forEach((id) => forward.delete(id));
      } else if (stmt.kind === syntax.NodeKind.LocalFunctionDeclaration && stmt.scope === target) {
        forward.delete(stmt.id);
      }
    }
  }

  for (const name of exportIds.keys()) {
    if (!matched.has(name)) {
      logger.debug(`export '${name}' is not defined by the fragment; the host variable stays unused`);
    }
  }

  const inserted: syntax.Statement[] = [];
  if (forward.size > 0) {
    inserted.push(new syntax.LocalVariableDeclaration(target, [...forward], [], syntax.NodeTags.generated));
  }
  if (direct) {
    inserted.push(...fragment.body.statements);
  } else {
    const body = new syntax.Block(fragment.body.statements, root);
    inserted.push(new syntax.DoStatement(body, syntax.NodeTags.generated));
  }

  insert(block, inserted, options.position ?? 'start');
  return inserted;
}

// insert puts stmts into block at position, keeping a trailing return,
// break or continue last.
function insert(block: syntax.Block, stmts: syntax.Statement[], position: SplicePosition): void {
  const list = block.statements;
  const last = list.length > 0 && syntax.isLastStatement(list[list.length - 1]) ? list.length - 1 : list.length;
  let at: number;
  if (position === 'start') {
    at = 0;
  } else if (position === 'end') {
    at = last;
  } else {
    if (!Number.isInteger(position) || position < 0 || position > list.length) {
      throw new SpliceError(`cannot insert at ${position} in a block of ${list.length} statements`);
    }
    at = Math.min(position, last);
  }
  list.splice(at, 0, ...stmts);
}
