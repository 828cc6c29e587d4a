import { Scope } from '../resolve/scope';
import * as syntax from '../lua-parser/syntax';

// A VisitAction is what a callback asks the walk to do with a node.
export type VisitAction =
  | { readonly type: 'unchanged' }
  | { readonly type: 'replace'; readonly node: syntax.Node }
  | { readonly type: 'skip' }
  | { readonly type: 'expand'; readonly statements: syntax.Statement[] };

const unchanged: VisitAction = { type: 'unchanged' };
const skip: VisitAction = { type: 'skip' };

export const Visit = {
  // leave the node in its slot; the same as returning nothing
  unchanged,
  // leave the node, but do not descend into it (pre only)
  skip,
  // put node in the slot instead
  replace(node: syntax.Node): VisitAction {
    return { type: 'replace', node };
  },
  // put zero or more statements in a statement slot instead
  expand(statements: syntax.Statement[]): VisitAction {
    return { type: 'expand', statements };
  },
};

// A FunctionOwner is a node whose body is a function block.
export type FunctionOwner = syntax.FunctionNode | syntax.Chunk;

// FunctionData is the per-function record of one traversal. state is
// created by the visitor when the walk enters the function and lives
// until it leaves it.
export interface FunctionData<S> {
  // 0 for the chunk, 1 for a function directly inside it, and so on
  readonly depth: number;
  // scope of the function body
  readonly scope: Scope;
  readonly node: FunctionOwner;
  readonly parent: FunctionData<S> | null;
  state: S;
}

export interface VisitContext<S> {
  // innermost scope enclosing the node
  readonly scope: Scope;
  readonly globalScope: Scope;
  readonly functionData: FunctionData<S>;
  // innermost block enclosing the node; for a block, the block itself
  readonly block: syntax.Block | null;
}

export interface Visitor<S> {
  // pre runs before the node's children are visited. A replacement is
  // not offered to pre again: the walk descends into its children and
  // then runs post on it.
  pre?(node: syntax.Node, ctx: VisitContext<S>): VisitAction | undefined;
  // post runs after the node's children have been visited.
  post?(node: syntax.Node, ctx: VisitContext<S>): VisitAction | undefined;
}

// A StatefulVisitor keeps a state value per function of the tree.
export interface StatefulVisitor<S> extends Visitor<S> {
  createFunctionState(node: FunctionOwner): S;
}

// A VisitError reports a callback result that does not fit its slot.
export class VisitError extends Error {
  constructor(msg: string) {
    super(msg);
    this.name = 'VisitError';
  }
}

// visit walks the tree depth first, calling the visitor on every node
// exactly once, and returns the chunk that ends up at the root.
// Replacements are written into the parent's slot as they happen.
export function visit(root: syntax.Chunk, visitor: Visitor<undefined>): syntax.Chunk;
export function visit<S>(root: syntax.Chunk, visitor: StatefulVisitor<S>): syntax.Chunk;
export function visit<S>(root: syntax.Chunk, visitor: Visitor<undefined> | StatefulVisitor<S>): syntax.Chunk {
  if ('createFunctionState' in visitor) {
    return new Walker(visitor).walk(root);
  }
  return new Walker<undefined>({ ...visitor, createFunctionState: () => undefined }).walk(root);
}

type Guard<T extends syntax.Node> = (n: syntax.Node) => n is T;

class Walker<S> {
  private readonly visitor: StatefulVisitor<S>;

  constructor(visitor: StatefulVisitor<S>) {
    this.visitor = visitor;
  }

  walk(root: syntax.Chunk): syntax.Chunk {
    const ctx: VisitContext<S> = {
      scope: root.globalScope,
      globalScope: root.globalScope,
      functionData: {
        depth: 0,
        scope: root.body.scope,
        node: root,
        parent: null,
        state: this.visitor.createFunctionState(root),
      },
      block: null,
    };
    return this.one(root, ctx, syntax.isChunk, 'root');
  }

  // one visits a node held in a single-node slot.
  private one<T extends syntax.Node>(node: T, ctx: VisitContext<S>, accept: Guard<T>, slot: string): T {
    const out = this.run(node, ctx, accept, slot, false);
    return out[0];
  }

  // list visits every node of a list slot in place.
  private list<T extends syntax.Node>(nodes: T[], ctx: VisitContext<S>, accept: Guard<T>, slot: string): void {
    for (let i = 0; i < nodes.length; i++) {
      nodes[i] = this.one(nodes[i], ctx, accept, slot);
    }
  }

  // statements visits a statement list in place, splicing in expansions.
  // Callbacks may insert into the list they are in; only the statements
  // it held when the walk reached it are visited, and nodes produced by
  // an expansion are not visited again.
  private statements(stmts: syntax.Statement[], ctx: VisitContext<S>): syntax.Statement[] {
    const pending = new Set(stmts);
    let i = 0;
    while (i < stmts.length) {
      const stmt = stmts[i];
      if (!pending.delete(stmt)) {
        i++;
        continue;
      }
      const out = this.run(stmt, ctx, syntax.isStatement, 'statement', true);
      const at = stmts.indexOf(stmt);
      if (at < 0) {
        throw new VisitError(`a ${stmt.kind} was removed from its block while it was visited`);
      }
      stmts.splice(at, 1, ...out);
      i = at + out.length;
    }
    return stmts;
  }

  private run<T extends syntax.Node>(
    node: T,
    ctx: VisitContext<S>,
    accept: Guard<T>,
    slot: string,
    expandable: boolean
  ): T[] {
    const action = this.visitor.pre?.(node, ctx) ?? Visit.unchanged;
    switch (action.type) {
      case 'unchanged':
        return this.finish(node, ctx, accept, slot, expandable);
      case 'skip':
        return this.post(node, ctx, accept, slot, expandable);
      case 'replace':
        return this.finish(this.check(action.node, accept, slot), ctx, accept, slot, expandable);
      case 'expand': {
        const out: T[] = [];
        for (const stmt of this.expansion(action.statements, accept, slot, expandable)) {
          out.push(...this.finish(stmt, ctx, accept, slot, expandable));
        }
        return out;
      }
    }
  }

  // finish visits the children of node and then runs post on it.
  private finish<T extends syntax.Node>(
    node: T,
    ctx: VisitContext<S>,
    accept: Guard<T>,
    slot: string,
    expandable: boolean
  ): T[] {
    this.children(node, ctx);
    return this.post(node, ctx, accept, slot, expandable);
  }

  private post<T extends syntax.Node>(
    node: T,
    ctx: VisitContext<S>,
    accept: Guard<T>,
    slot: string,
    expandable: boolean
  ): T[] {
    const action = this.visitor.post?.(node, ctx) ?? Visit.unchanged;
    switch (action.type) {
      case 'unchanged':
        return [node];
      case 'skip':
        throw new VisitError(`post may not skip a ${node.kind}; its children were already visited`);
      case 'replace':
        return [this.check(action.node, accept, slot)];
      case 'expand':
        return this.expansion(action.statements, accept, slot, expandable);
    }
  }

  private check<T extends syntax.Node>(n: syntax.Node, accept: Guard<T>, slot: string): T {
    if (!accept(n)) {
      throw new VisitError(`a ${n.kind} cannot fill a ${slot} slot`);
    }
    return n;
  }

  private expansion<T extends syntax.Node>(
    stmts: syntax.Statement[],
    accept: Guard<T>,
    slot: string,
    expandable: boolean
  ): T[] {
    if (!expandable) {
      throw new VisitError(`only a statement slot can be expanded, not a ${slot} slot`);
    }
    return stmts.map((s) => this.check(s, accept, slot));
  }

  private expr(e: syntax.Expression, ctx: VisitContext<S>): syntax.Expression {
    return this.one(e, ctx, syntax.isExpression, 'expression');
  }

  private exprs(es: syntax.Expression[], ctx: VisitContext<S>): void {
    this.list(es, ctx, syntax.isExpression, 'expression');
  }

  private block(b: syntax.Block, ctx: VisitContext<S>): syntax.Block {
    return this.one(b, { ...ctx, scope: b.scope, block: b }, syntax.isBlock, 'block');
  }

  // functionBody visits the parameters and body of a function node with
  // a fresh function record.
  private functionBody(
    node: syntax.FunctionNode,
    params: syntax.FunctionParameter[],
    body: syntax.Block,
    ctx: VisitContext<S>
  ): syntax.Block {
    const outer = ctx.functionData;
    const functionData: FunctionData<S> = {
      depth: outer.depth + 1,
      scope: body.scope,
      node,
      parent: outer,
      state: this.visitor.createFunctionState(node),
    };
    const inner = { ...ctx, scope: body.scope, functionData };
    this.list(params, inner, syntax.isFunctionParameter, 'parameter');
    return this.block(body, inner);
  }

  private children(node: syntax.Node, ctx: VisitContext<S>): void {
    switch (node.kind) {
      case syntax.NodeKind.Chunk:
        node.body = this.block(node.body, { ...ctx, scope: node.body.scope });
        return;
      case syntax.NodeKind.Block: {
        node.statements = this.statements(node.statements, { ...ctx, scope: node.scope, block: node });
        return;
      }

      // statements
      case syntax.NodeKind.LocalVariableDeclaration:
        this.exprs(node.expressions, ctx);
        return;
      case syntax.NodeKind.LocalFunctionDeclaration:
      case syntax.NodeKind.FunctionDeclaration:
      case syntax.NodeKind.FunctionLiteralExpression:
        node.body = this.functionBody(node, node.params, node.body, ctx);
        return;
      case syntax.NodeKind.AssignmentStatement:
        this.list(node.lhs, ctx, syntax.isAssignmentTarget, 'assignment target');
        this.exprs(node.rhs, ctx);
        return;
      case syntax.NodeKind.CompoundAssignmentStatement:
        node.lhs = this.one(node.lhs, ctx, syntax.isAssignmentTarget, 'assignment target');
        node.rhs = this.expr(node.rhs, ctx);
        return;
      case syntax.NodeKind.FunctionCallStatement:
      case syntax.NodeKind.PassSelfFunctionCallStatement:
      case syntax.NodeKind.FunctionCallExpression:
      case syntax.NodeKind.PassSelfFunctionCallExpression:
        node.base = this.expr(node.base, ctx);
        this.exprs(node.args, ctx);
        return;
      case syntax.NodeKind.ReturnStatement:
        this.exprs(node.args, ctx);
        return;
      case syntax.NodeKind.DoStatement:
        node.body = this.block(node.body, ctx);
        return;
      case syntax.NodeKind.WhileStatement:
        node.condition = this.expr(node.condition, ctx);
        node.body = this.block(node.body, ctx);
        return;
      case syntax.NodeKind.RepeatStatement:
        node.body = this.block(node.body, ctx);
        // the condition sees the locals of the body
        node.condition = this.expr(node.condition, { ...ctx, scope: node.body.scope });
        return;
      case syntax.NodeKind.ForStatement:
        node.initialValue = this.expr(node.initialValue, ctx);
        node.finalValue = this.expr(node.finalValue, ctx);
        if (node.incrementBy !== null) {
          node.incrementBy = this.expr(node.incrementBy, ctx);
        }
        node.body = this.block(node.body, ctx);
        return;
      case syntax.NodeKind.ForInStatement:
        this.exprs(node.expressions, ctx);
        node.body = this.block(node.body, ctx);
        return;
      case syntax.NodeKind.IfStatement:
        node.condition = this.expr(node.condition, ctx);
        node.body = this.block(node.body, ctx);
        for (const clause of node.elseifs) {
          clause.condition = this.expr(clause.condition, ctx);
          clause.body = this.block(clause.body, ctx);
        }
        if (node.elseBody !== null) {
          node.elseBody = this.block(node.elseBody, ctx);
        }
        return;
      case syntax.NodeKind.BreakStatement:
      case syntax.NodeKind.ContinueStatement:
        return;

      // assignment targets
      case syntax.NodeKind.AssignmentVariable:
        return;
      case syntax.NodeKind.AssignmentIndexing:
      case syntax.NodeKind.IndexExpression:
        node.base = this.expr(node.base, ctx);
        node.index = this.expr(node.index, ctx);
        return;

      // expressions
      case syntax.NodeKind.BooleanExpression:
      case syntax.NodeKind.NumberExpression:
      case syntax.NodeKind.StringExpression:
      case syntax.NodeKind.NilExpression:
      case syntax.NodeKind.VarargExpression:
      case syntax.NodeKind.VariableExpression:
        return;
      case syntax.NodeKind.BinaryExpression:
        node.lhs = this.expr(node.lhs, ctx);
        node.rhs = this.expr(node.rhs, ctx);
        return;
      case syntax.NodeKind.UnaryExpression:
        node.operand = this.expr(node.operand, ctx);
        return;
      case syntax.NodeKind.ParenthesizedExpression:
        node.expression = this.expr(node.expression, ctx);
        return;
      case syntax.NodeKind.TableConstructorExpression:
        this.list(node.entries, ctx, syntax.isTableEntryNode, 'table entry');
        return;
      case syntax.NodeKind.TableEntry:
        node.value = this.expr(node.value, ctx);
        return;
      case syntax.NodeKind.KeyedTableEntry:
        node.key = this.expr(node.key, ctx);
        node.value = this.expr(node.value, ctx);
        return;
    }
  }
}
