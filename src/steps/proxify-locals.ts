import { z } from 'zod';

import { SymbolId } from '../resolve/binding';
import { Scope } from '../resolve/scope';
import * as syntax from '../lua-parser/syntax';
import { Visit, visit } from '../walk/visit';
import dictionary from './dictionary.json';
import { Step, StepContext, defineStep } from './step';

const settings = z
  .object({
    // type of the operand that accompanies every read
    literalType: z.enum(['number', 'string', 'dictionary', 'any']).default('string'),
  })
  .strict();

type Settings = z.output<typeof settings>;

// A Metamethod is the event a proxy answers and the expression that
// triggers it.
interface Metamethod {
  readonly key: string;
  readonly op: syntax.BinaryOperator | 'index';
}

const arithmetic: readonly Metamethod[] = [
  { key: '__add', op: '+' },
  { key: '__sub', op: '-' },
  { key: '__mul', op: '*' },
  { key: '__div', op: '/' },
  { key: '__mod', op: '%' },
  { key: '__pow', op: '^' },
  { key: '__concat', op: '..' },
];

const literalTypes = ['number', 'string', 'dictionary'] as const;

const indexing: Metamethod = { key: '__index', op: 'index' };

// A Proxy describes how one local is stored: in field key of a table
// whose metatable writes it on setter and reads it on getter.
interface Proxy {
  readonly key: string;
  readonly setter: Metamethod;
  readonly getter: Metamethod;
}

// ProxifyLocals stores locals in tables and turns every access into a
// metamethod call.
//
// Locals that cannot live in a table keep their plain form: parameters,
// loop variables, local functions, compound assignment targets and names
// of multi-name declarations.
export class ProxifyLocals implements Step {
  readonly name = 'ProxifyLocals';
  private readonly settings: Settings;

  constructor(s: Settings) {
    this.settings = s;
  }

  apply(chunk: syntax.Chunk, ctx: StepContext): void {
    const locked = new Set<SymbolId>();
    const candidates: SymbolId[] = [];
    visit(chunk, {
      pre: (node) => {
        lockedBy(node).forEach((id) => locked.add(id));
        if (node.kind === syntax.NodeKind.LocalVariableDeclaration && node.ids.length === 1) {
          candidates.push(node.ids[0]);
        }
        return undefined;
      },
    });
    const count = candidates.filter((id) => !locked.has(id)).length;
    if (count === 0) {
      ctx.logger.debug('no locals to proxify');
      return;
    }

    const root = chunk.body.scope;
    const setmetatable = root.addVariable();
    const empty = root.addVariable();
    const proxies = new Map<SymbolId, Proxy>();
    // variable nodes built here that already stand for the raw table
    const raw = new Set<syntax.VariableExpression>();

    visit(chunk, {
      pre: (node, vctx) => {
        if (node.kind !== syntax.NodeKind.AssignmentStatement || node.lhs.length !== 1) {
          return undefined;
        }
        const target = node.lhs[0];
        const proxy = target.kind === syntax.NodeKind.AssignmentVariable ? proxies.get(target.id) : undefined;
        if (target.kind !== syntax.NodeKind.AssignmentVariable || proxy === undefined) {
          return undefined;
        }
        // EMPTY(x <setter> value, rest...)
        const base = new syntax.VariableExpression(target.scope, target.id, syntax.NodeTags.generated);
        raw.add(base);
        vctx.scope.addReferenceToHigherScope(root, empty);
        const [first, ...rest] = node.rhs;
        return Visit.replace(
          new syntax.FunctionCallStatement(
            new syntax.VariableExpression(root, empty, syntax.NodeTags.generated),
            [this.access(proxy.setter, base, first), ...rest],
            syntax.NodeTags.generated
          )
        );
      },
      post: (node, vctx) => {
        switch (node.kind) {
          case syntax.NodeKind.LocalVariableDeclaration: {
            const id = node.ids[0];
            if (node.ids.length !== 1 || locked.has(id)) {
              return undefined;
            }
            const proxy = this.createProxy(ctx);
            proxies.set(id, proxy);
            vctx.scope.addReferenceToHigherScope(root, setmetatable);
            const [value = new syntax.NilExpression(syntax.NodeTags.generated), ...rest] = node.expressions;
            const wrapped = new syntax.FunctionCallExpression(
              new syntax.VariableExpression(root, setmetatable, syntax.NodeTags.generated),
              [
                table([[str(proxy.key), value]]),
                table([
                  [str(proxy.setter.key), setterFunction(vctx.scope, proxy.key)],
                  [str(proxy.getter.key), getterFunction(vctx.scope, proxy.key)],
                ]),
              ],
              syntax.NodeTags.generated
            );
            return Visit.replace(new syntax.LocalVariableDeclaration(node.scope, node.ids, [wrapped, ...rest], node.tags));
          }
          case syntax.NodeKind.VariableExpression: {
            const proxy = proxies.get(node.id);
            if (proxy === undefined || raw.has(node)) {
              return undefined;
            }
            return Visit.replace(this.access(proxy.getter, node, this.literal(ctx, proxy.key)));
          }
          case syntax.NodeKind.AssignmentVariable: {
            const proxy = proxies.get(node.id);
            if (proxy === undefined) {
              return undefined;
            }
            return Visit.replace(
              new syntax.AssignmentIndexing(
                new syntax.VariableExpression(node.scope, node.id, syntax.NodeTags.generated),
                str(proxy.key),
                node.tags
              )
            );
          }
          case syntax.NodeKind.FunctionDeclaration: {
            const proxy = proxies.get(node.id);
            if (proxy === undefined) {
              return undefined;
            }
            return Visit.replace(
              new syntax.FunctionDeclaration(
                node.scope,
                node.id,
                [proxy.key, ...node.indices],
                node.params,
                node.body,
                node.tags
              )
            );
          }
          default:
            return undefined;
        }
      },
    });

    const g = root.resolveGlobal('setmetatable');
    root.addReferenceToHigherScope(g.scope, g.id);
    chunk.body.statements.unshift(
      new syntax.LocalVariableDeclaration(
        root,
        [setmetatable],
        [new syntax.VariableExpression(g.scope, g.id, syntax.NodeTags.generated)],
        syntax.NodeTags.generated
      ),
      new syntax.LocalVariableDeclaration(
        root,
        [empty],
        [new syntax.FunctionLiteralExpression([], new syntax.Block([], new Scope(root), true), syntax.NodeTags.generated)],
        syntax.NodeTags.generated
      )
    );
    ctx.logger.debug(`proxified ${proxies.size} locals`, { locked: locked.size });
  }

  private createProxy(ctx: StepContext): Proxy {
    const setter = ctx.random.pick(arithmetic);
    const getter = ctx.random.pick([...arithmetic, indexing].filter((m) => m !== setter));
    return { key: ctx.generateName(8), setter, getter };
  }

  // literal returns the operand of a read; it never equals the field key,
  // so that an __index read always misses the raw table.
  private literal(ctx: StepContext, key: string): syntax.Expression {
    const type = this.settings.literalType === 'any' ? ctx.random.pick(literalTypes) : this.settings.literalType;
    if (type === 'number') {
      return new syntax.NumberExpression(ctx.random.int(-100000, 100000), syntax.NodeTags.generated);
    }
    let s: string;
    do {
      s = type === 'dictionary' ? ctx.random.pick(dictionary) : ctx.generateName(ctx.random.int(4, 10));
    } while (s === key);
    return str(s);
  }

  private access(m: Metamethod, base: syntax.Expression, operand: syntax.Expression): syntax.Expression {
    if (m.op === 'index') {
      return new syntax.IndexExpression(base, operand, syntax.NodeTags.generated);
    }
    return new syntax.BinaryExpression(m.op, base, operand, syntax.NodeTags.generated);
  }
}

// lockedBy lists the locals a node declares or updates in a way that a
// proxy table cannot stand in for.
function lockedBy(node: syntax.Node): SymbolId[] {
  switch (node.kind) {
    case syntax.NodeKind.FunctionLiteralExpression:
    case syntax.NodeKind.FunctionDeclaration:
      return paramIds(node.params);
    case syntax.NodeKind.LocalFunctionDeclaration:
      return [node.id, ...paramIds(node.params)];
    case syntax.NodeKind.ForStatement:
      return [node.id];
    case syntax.NodeKind.ForInStatement:
      return node.ids;
    case syntax.NodeKind.CompoundAssignmentStatement:
      return node.lhs.kind === syntax.NodeKind.AssignmentVariable ? [node.lhs.id] : [];
    case syntax.NodeKind.LocalVariableDeclaration:
      return node.ids.length > 1 ? node.ids : [];
    default:
      return [];
  }
}

function paramIds(params: syntax.FunctionParameter[]): SymbolId[] {
  const ids: SymbolId[] = [];
  for (const p of params) {
    if (p.kind === syntax.NodeKind.VariableExpression) {
      ids.push(p.id);
    }
  }
  return ids;
}

function str(s: string): syntax.StringExpression {
  return new syntax.StringExpression(s, syntax.NodeTags.generated);
}

function table(entries: Array<[syntax.Expression, syntax.Expression]>): syntax.TableConstructorExpression {
  return new syntax.TableConstructorExpression(
    entries.map(([k, v]) => new syntax.KeyedTableEntry(k, v, syntax.NodeTags.generated)),
    syntax.NodeTags.generated
  );
}

// setterFunction builds function(self, arg) self[key] = arg end.
function setterFunction(parent: Scope, key: string): syntax.FunctionLiteralExpression {
  const scope = new Scope(parent);
  const self = scope.addVariable();
  const arg = scope.addVariable();
  scope.addReference(self);
  scope.addReference(arg);
  const body = new syntax.Block(
    [
      new syntax.AssignmentStatement(
        [new syntax.AssignmentIndexing(new syntax.VariableExpression(scope, self), str(key))],
        [new syntax.VariableExpression(scope, arg)],
        syntax.NodeTags.generated
      ),
    ],
    scope,
    true
  );
  return new syntax.FunctionLiteralExpression(
    [new syntax.VariableExpression(scope, self), new syntax.VariableExpression(scope, arg)],
    body,
    syntax.NodeTags.generated
  );
}

// getterFunction builds function(self, arg) return rawget(self, key) end.
function getterFunction(parent: Scope, key: string): syntax.FunctionLiteralExpression {
  const scope = new Scope(parent);
  const self = scope.addVariable();
  const arg = scope.addVariable();
  const rawget = scope.resolveGlobal('rawget');
  scope.addReference(self);
  scope.addReferenceToHigherScope(rawget.scope, rawget.id);
  const body = new syntax.Block(
    [
      new syntax.ReturnStatement(
        [
          new syntax.FunctionCallExpression(new syntax.VariableExpression(rawget.scope, rawget.id), [
            new syntax.VariableExpression(scope, self),
            str(key),
          ]),
        ],
        syntax.NodeTags.generated
      ),
    ],
    scope,
    true
  );
  return new syntax.FunctionLiteralExpression(
    [new syntax.VariableExpression(scope, self), new syntax.VariableExpression(scope, arg)],
    body,
    syntax.NodeTags.generated
  );
}

export const proxifyLocals = defineStep({
  name: 'ProxifyLocals',
  description: 'stores locals in tables reached through metamethods',
  settings,
  create: (s) => new ProxifyLocals(s),
});
