import * as assert from 'assert';

import { ParseError } from '../src/lua-parser/error';
import * as syntax from '../src/lua-parser/syntax';
import { ScopeError } from '../src/resolve/error';
import { Scope } from '../src/resolve/scope';
import { SpliceError, splice } from '../src/splice/splice';
import { unparse } from '../src/unparse/unparser';
import { expectNode, parseOk } from './helpers';

describe('test splice', function() {
  it('test direct export', function() {
    const host = parseOk('print(1)');
    const f = host.body.scope.addVariable();
    const inserted = splice(host, host.body, 'local function F(x) return x end', { exports: { F: f } });
    assert.equal(inserted.length, 1);
    const decl = expectNode(inserted[0], syntax.isLocalFunctionDeclaration);
    assert.strictEqual(decl.id, f);
    assert.strictEqual(decl.scope, host.body.scope);
    assert.equal(unparse(host), `local function __sym${f.index}(x) return x end; print(1)`);
  });

  it('test private locals are wrapped', function() {
    const host = parseOk('print(1)');
    const f = host.body.scope.addVariable();
    const name = `__sym${f.index}`;
    splice(host, host.body, 'local helper = 2\nlocal function F() return helper end', { exports: { F: f } });
    assert.equal(
      unparse(host),
      `local ${name}; do local helper = 2; ${name} = function() return helper end end; print(1)`
    );
    const wrapper = expectNode(host.body.statements[1], syntax.isDoStatement);
    assert.strictEqual(wrapper.body.scope.parent, host.body.scope);
    assert.ok(wrapper.hasTag(syntax.NodeTag.Generated));
  });

  it('test exported global function gets a forward local', function() {
    const host = parseOk('print(1)');
    const f = host.body.scope.addVariable();
    const name = `__sym${f.index}`;
    splice(host, host.body, 'function F() end', { exports: { F: f } });
    assert.equal(unparse(host), `local ${name}; function ${name}() end; print(1)`);
    assert.equal(host.body.scope.referenceCount(f), 1);
  });

  it('test imports and globals', function() {
    const host = parseOk('local a = 1');
    const decl = expectNode(host.body.statements[0], syntax.isLocalVariableDeclaration);
    const a = decl.ids[0];
    splice(host, host.body, 'print(A)', {
      imports: { A: { scope: host.body.scope, id: a } },
      position: 'end',
    });
    assert.equal(unparse(host), 'local a = 1; print(a)');
    assert.ok(host.globalScope.knowsGlobal('print'));
    assert.equal(host.body.scope.referenceCount(a), 1);
  });

  it('test free names never bind to host locals', function() {
    const host = parseOk('local print = 5');
    const inserted = splice(host, host.body, 'print(1)', { position: 'end' });
    const call = expectNode(inserted[0], syntax.isFunctionCallStatement);
    assert.strictEqual(expectNode(call.base, syntax.isVariableExpression).scope, host.globalScope);
  });

  it('test nested references move into the host ledger', function() {
    const host = parseOk('local a = 1');
    const decl = expectNode(host.body.statements[0], syntax.isLocalVariableDeclaration);
    const a = decl.ids[0];
    const inserted = splice(host, host.body, 'local function F() return A end', {
      exports: { F: host.body.scope.addVariable() },
      imports: { A: { scope: host.body.scope, id: a } },
      position: 'end',
    });
    const fn = expectNode(inserted[0], syntax.isLocalFunctionDeclaration);
    assert.ok(fn.body.scope.isReferencedFromHigherScope(host.body.scope, a));
  });

  it('test positions', function() {
    const host = parseOk('local x = 1\nreturn x');
    splice(host, host.body, 'print(2)', { position: 'end' });
    assert.equal(unparse(host), 'local x = 1; print(2); return x');
    splice(host, host.body, 'print(3)', { position: 1 });
    assert.equal(unparse(host), 'local x = 1; print(3); print(2); return x');
    assert.throws(
      () => splice(host, host.body, 'print(4)', { position: 9 }),
      (e: unknown) => e instanceof SpliceError && e.message === 'cannot insert at 9 in a block of 4 statements'
    );
  });

  it('test fragment parse errors', function() {
    const host = parseOk('');
    assert.throws(
      () => splice(host, host.body, 'local = 1'),
      (e: unknown) => e instanceof ParseError && e.message === "<fragment>:1:7: <name> expected near '='"
    );
  });

  it('test mixed locals', function() {
    const host = parseOk('');
    const f = host.body.scope.addVariable();
    assert.throws(
      () => splice(host, host.body, 'local F, g = 1, 2', { exports: { F: f } }),
      /local F, g mixes exported and private names/
    );
  });

  it('test bad targets', function() {
    const host = parseOk('');
    const other = parseOk('');
    assert.throws(() => splice(host, other.body, 'print(1)'), SpliceError);
    const stray = new Scope(host.body.scope).addVariable('x');
    assert.throws(() => splice(host, host.body, 'print(1)', { exports: { X: stray } }), ScopeError);
  });
});
