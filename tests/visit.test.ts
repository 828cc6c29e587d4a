import * as assert from 'assert';

import * as syntax from '../src/lua-parser/syntax';
import { unparse } from '../src/unparse/unparser';
import { FunctionOwner, StatefulVisitor, Visit, VisitError, visit } from '../src/walk/visit';
import { parseOk } from './helpers';

const everyKind = `
local t = {1, k = "v", [2] = f(nil)}
function t:m(a) return self, a.b end
local function g(p, ...)
  local z = ...
  if p then return p elseif p == 1 then t.x = -p else t:m(p) end
  repeat local r = t:m(z) until r
  for k, v in pairs(t) do print(k, v) end
  for i = 1, 10, 2 do break end
  while true do end
  do x = (p) end
  return function(q) return q end
end
`;

function isNode(value: object): value is syntax.Node {
  return value instanceof syntax.BaseNode;
}

// collect finds every node reachable through node fields, arrays and
// plain objects such as elseif clauses.
function collect(value: unknown, into: syntax.Node[]): void {
  if (Array.isArray(value)) {
    for (const v of value) {
      collect(v, into);
    }
    return;
  }
  if (typeof value !== 'object' || value === null) {
    return;
  }
  if (isNode(value)) {
    into.push(value);
  } else if (Object.getPrototypeOf(value) !== Object.prototype) {
    return;
  }
  for (const v of Object.values(value)) {
    collect(v, into);
  }
}

function call(chunk: syntax.Chunk, name: string): syntax.FunctionCallStatement {
  const b = chunk.globalScope.resolveGlobal(name);
  return new syntax.FunctionCallStatement(new syntax.VariableExpression(b.scope, b.id), []);
}

function callee(node: syntax.FunctionCallStatement): string {
  return syntax.isVariableExpression(node.base) ? node.base.name : '?';
}

describe('test visit', function() {
  it('test order', function() {
    const chunk = parseOk('local a = 1');
    const pre: string[] = [];
    const post: string[] = [];
    visit(chunk, {
      pre(node) {
        pre.push(node.kind);
        return undefined;
      },
      post(node) {
        post.push(node.kind);
        return undefined;
      },
    });
    assert.deepEqual(pre, ['Chunk', 'Block', 'LocalVariableDeclaration', 'NumberExpression']);
    assert.deepEqual(post, ['NumberExpression', 'LocalVariableDeclaration', 'Block', 'Chunk']);
  });

  it('test post replacement', function() {
    const chunk = parseOk('local a = 1; local b = {2, 3}');
    let posts = 0;
    visit(chunk, {
      post(node) {
        if (node.kind !== syntax.NodeKind.NumberExpression) {
          return undefined;
        }
        posts++;
        return Visit.replace(new syntax.StringExpression(String(node.value)));
      },
    });
    assert.equal(posts, 3);
    assert.equal(unparse(chunk), 'local a = "1"; local b = {"2", "3"}');
  });

  it('test literal rewrite keeps bindings', function() {
    const chunk = parseOk('local a = 1; print(a)');
    visit(chunk, {
      post(node) {
        if (node.kind === syntax.NodeKind.NumberExpression && node.value === 1) {
          return Visit.replace(new syntax.NumberExpression(2));
        }
        return undefined;
      },
    });
    assert.equal(unparse(chunk), 'local a = 2; print(a)');
  });

  it('test pre replacement visits the children of the replacement', function() {
    const chunk = parseOk('local a = 1 + 2');
    const pres: string[] = [];
    const posts: string[] = [];
    visit(chunk, {
      pre(node) {
        pres.push(node.kind);
        if (node.kind === syntax.NodeKind.BinaryExpression) {
          return Visit.replace(
            new syntax.BinaryExpression('*', new syntax.NumberExpression(3), new syntax.NumberExpression(4))
          );
        }
        return undefined;
      },
      post(node) {
        if (node.kind === syntax.NodeKind.NumberExpression) {
          posts.push(String(node.value));
        } else if (node.kind === syntax.NodeKind.BinaryExpression) {
          posts.push(node.op);
        }
        return undefined;
      },
    });
    // the replacement is not offered to pre again
    assert.deepEqual(pres, [
      'Chunk',
      'Block',
      'LocalVariableDeclaration',
      'BinaryExpression',
      'NumberExpression',
      'NumberExpression',
    ]);
    assert.deepEqual(posts, ['3', '4', '*']);
    assert.equal(unparse(chunk), 'local a = 3 * 4');
  });

  it('test skip', function() {
    const chunk = parseOk('local f = function() return 1 end; local n = 2');
    const numbers: number[] = [];
    let skippedPost = false;
    visit(chunk, {
      pre(node) {
        return node.kind === syntax.NodeKind.FunctionLiteralExpression ? Visit.skip : undefined;
      },
      post(node) {
        if (node.kind === syntax.NodeKind.NumberExpression) {
          numbers.push(node.value);
        } else if (node.kind === syntax.NodeKind.FunctionLiteralExpression) {
          skippedPost = true;
        }
        return undefined;
      },
    });
    assert.deepEqual(numbers, [2]);
    assert.ok(skippedPost);
  });

  it('test expand', function() {
    const chunk = parseOk('f(); g()');
    visit(chunk, {
      post(node) {
        if (node.kind === syntax.NodeKind.FunctionCallStatement) {
          return Visit.expand([node, new syntax.FunctionCallStatement(node.base, [new syntax.NilExpression()])]);
        }
        return undefined;
      },
    });
    assert.equal(unparse(chunk), 'f(); f(nil); g(); g(nil)');
  });

  it('test expand to nothing', function() {
    const chunk = parseOk('f(); local x = 1');
    visit(chunk, {
      post(node) {
        return node.kind === syntax.NodeKind.FunctionCallStatement ? Visit.expand([]) : undefined;
      },
    });
    assert.equal(unparse(chunk), 'local x = 1');
  });

  it('test slot errors', function() {
    assert.throws(
      () =>
        visit(parseOk('f()'), {
          post(node) {
            return syntax.isStatement(node) ? Visit.replace(new syntax.StringExpression('x')) : undefined;
          },
        }),
      (e: unknown) => e instanceof VisitError && e.message === 'a StringExpression cannot fill a statement slot'
    );
    assert.throws(
      () =>
        visit(parseOk('local a = 1'), {
          post(node) {
            return node.kind === syntax.NodeKind.NumberExpression ? Visit.expand([]) : undefined;
          },
        }),
      /only a statement slot can be expanded, not a expression slot/
    );
    assert.throws(
      () =>
        visit(parseOk('local a = 1'), {
          post(node) {
            return node.kind === syntax.NodeKind.NumberExpression ? Visit.skip : undefined;
          },
        }),
      /post may not skip a NumberExpression/
    );
  });

  it('test context scope', function() {
    const chunk = parseOk('do local a = 1; print(a) end');
    const block = chunk.body.statements[0];
    assert.ok(syntax.isDoStatement(block));
    let seen = false;
    visit(chunk, {
      pre(node, ctx) {
        if (node.kind === syntax.NodeKind.VariableExpression && node.name === 'a') {
          assert.strictEqual(ctx.scope, block.body.scope);
          assert.strictEqual(ctx.block, block.body);
          assert.strictEqual(ctx.globalScope, chunk.globalScope);
          seen = true;
        }
        return undefined;
      },
    });
    assert.ok(seen);
  });

  it('test function state', function() {
    const chunk = parseOk('local a = x; local function f(p) return p, function() return p, p, p end end');
    const counts: [number, number][] = [];
    const visitor: StatefulVisitor<{ uses: number }> = {
      createFunctionState(_node: FunctionOwner) {
        return { uses: 0 };
      },
      post(node, ctx) {
        if (node.kind === syntax.NodeKind.VariableExpression) {
          ctx.functionData.state.uses++;
        }
        if (syntax.isFunctionNode(node) || syntax.isChunk(node)) {
          counts.push([ctx.functionData.depth, ctx.functionData.state.uses]);
        }
        return undefined;
      },
    };
    visit(chunk, visitor);
    // post of a function node runs in the enclosing function's record;
    // parameters count as uses
    assert.deepEqual(counts, [
      [1, 2],
      [0, 1],
      [0, 1],
    ]);
  });

  it('test every node is visited once', function() {
    const chunk = parseOk(everyKind);
    const nodes: syntax.Node[] = [];
    collect(chunk, nodes);
    const pres = new Map<syntax.Node, number>();
    const posts = new Map<syntax.Node, number>();
    visit(chunk, {
      pre(node) {
        pres.set(node, (pres.get(node) ?? 0) + 1);
        return undefined;
      },
      post(node) {
        posts.set(node, (posts.get(node) ?? 0) + 1);
        return undefined;
      },
    });
    assert.equal(new Set(nodes).size, nodes.length);
    for (const seen of [pres, posts]) {
      assert.equal(seen.size, nodes.length);
      for (const n of nodes) {
        assert.equal(seen.get(n), 1, `${n.kind} visited ${seen.get(n) ?? 0} times`);
      }
    }
    const kinds = new Set<string>(nodes.map((n) => n.kind));
    for (const kind of [
      'Chunk',
      'Block',
      'LocalVariableDeclaration',
      'LocalFunctionDeclaration',
      'FunctionDeclaration',
      'IfStatement',
      'RepeatStatement',
      'ForInStatement',
      'ForStatement',
      'WhileStatement',
      'DoStatement',
      'BreakStatement',
      'ReturnStatement',
      'AssignmentStatement',
      'AssignmentVariable',
      'AssignmentIndexing',
      'FunctionCallStatement',
      'PassSelfFunctionCallStatement',
      'PassSelfFunctionCallExpression',
      'FunctionCallExpression',
      'FunctionLiteralExpression',
      'TableConstructorExpression',
      'TableEntry',
      'KeyedTableEntry',
      'IndexExpression',
      'ParenthesizedExpression',
      'BinaryExpression',
      'UnaryExpression',
      'VariableExpression',
      'VarargExpression',
      'NumberExpression',
      'StringExpression',
      'BooleanExpression',
      'NilExpression',
    ]) {
      assert.ok(kinds.has(kind), kind);
    }
  });

  it('test statements inserted at the front of a block are not visited', function() {
    const chunk = parseOk('f(); g()');
    const visited: string[] = [];
    visit(chunk, {
      pre(node, ctx) {
        if (syntax.isFunctionCallStatement(node) && ctx.block !== null) {
          visited.push(callee(node));
          ctx.block.statements.unshift(call(chunk, 'h'));
        }
        return undefined;
      },
    });
    assert.deepEqual(visited, ['f', 'g']);
    assert.equal(unparse(chunk), 'h(); h(); f(); g()');
  });

  it('test statements appended to a block are not visited', function() {
    const chunk = parseOk('f()');
    const visited: string[] = [];
    visit(chunk, {
      pre(node) {
        if (syntax.isFunctionCallStatement(node)) {
          visited.push(callee(node));
        }
        return undefined;
      },
      post(node, ctx) {
        if (syntax.isFunctionCallStatement(node) && ctx.block !== null) {
          ctx.block.statements.push(call(chunk, 'h'));
        }
        return undefined;
      },
    });
    assert.deepEqual(visited, ['f']);
    assert.equal(unparse(chunk), 'f(); h()');
  });

  it('test expansions next to inserted statements', function() {
    const chunk = parseOk('f(); g()');
    visit(chunk, {
      post(node, ctx) {
        if (!syntax.isFunctionCallStatement(node) || callee(node) !== 'f' || ctx.block === null) {
          return undefined;
        }
        ctx.block.statements.unshift(call(chunk, 'h'));
        return Visit.expand([node, call(chunk, 'k')]);
      },
    });
    assert.equal(unparse(chunk), 'h(); f(); k(); g()');
  });

  it('test removing the visited statement is an error', function() {
    const chunk = parseOk('f(); g()');
    assert.throws(
      () =>
        visit(chunk, {
          pre(node, ctx) {
            if (syntax.isFunctionCallStatement(node) && ctx.block !== null) {
              ctx.block.statements.splice(0, 1);
            }
            return undefined;
          },
        }),
      (e: unknown) =>
        e instanceof VisitError && e.message === 'a FunctionCallStatement was removed from its block while it was visited'
    );
  });
});
