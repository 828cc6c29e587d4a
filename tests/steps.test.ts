import * as assert from 'assert';

import { parseExpression } from '../src/lua-parser/parse';
import * as syntax from '../src/lua-parser/syntax';
import { findStep, stepNames } from '../src/steps';
import { antiTamper } from '../src/steps/anti-tamper';
import dictionary from '../src/steps/dictionary.json';
import { base64Alphabet, constantArray, encodeBase64, rotateRight } from '../src/steps/constant-array';
import { Keystream, encryptStrings } from '../src/steps/encrypt-strings';
import { evaluate, numbersToExpressions } from '../src/steps/numbers-to-expressions';
import { proxifyLocals } from '../src/steps/proxify-locals';
import { unparse } from '../src/unparse/unparser';
import { Random } from '../src/pipeline/random';
import { MemorySink, expectNode, parseOk, stepContext } from './helpers';

function evaluateText(source: string): number | boolean | undefined {
  const r = parseExpression(source);
  if (r.err) {
    throw r.val;
  }
  return evaluate(r.val.expression);
}

describe('test step registry', function() {
  it('test names', function() {
    assert.deepEqual(stepNames(), [
      'AntiTamper',
      'ConstantArray',
      'EncryptStrings',
      'NumbersToExpressions',
      'ProxifyLocals',
    ]);
    assert.equal(findStep('NumbersToExpressions'), numbersToExpressions);
    assert.equal(findStep('numbersToExpressions'), undefined);
  });

  it('test settings are validated', function() {
    assert.equal(numbersToExpressions.settings.safeParse({ maxDepth: 0 }).success, false);
    assert.equal(constantArray.settings.safeParse({ encoding: 'hex' }).success, false);
    assert.throws(() => antiTamper.create({ useDebugg: true }));
    assert.equal(proxifyLocals.create(undefined).name, 'ProxifyLocals');
  });
});

describe('test NumbersToExpressions', function() {
  it('test evaluate', function() {
    assert.equal(evaluateText('(3 == 3) and 7 or 9'), 7);
    assert.equal(evaluateText('(3 == 4) and 7 or 9'), 9);
    assert.equal(evaluateText('7 % -3'), -2);
    assert.equal(evaluateText('-7 % 3'), 2);
    assert.equal(evaluateText('2 ^ 10'), 1024);
    assert.equal(evaluateText('- -5'), 5);
    assert.equal(evaluateText('not (1 < 2)'), false);
    assert.equal(evaluateText('x + 1'), undefined);
    assert.equal(evaluateText('not nil'), undefined);
  });

  it('test literals keep their values', function() {
    const chunk = parseOk('local a = 42; local b = 0.5; local c = 0');
    numbersToExpressions.create({}).apply(chunk, stepContext(5));
    const text = unparse(chunk);
    const reparsed = parseOk(text);
    const want = [42, 0.5, 0];
    reparsed.body.statements.forEach((s, i) => {
      const decl = expectNode(s, syntax.isLocalVariableDeclaration);
      assert.notEqual(decl.expressions[0].kind, syntax.NodeKind.NumberExpression);
      assert.equal(evaluate(decl.expressions[0]), want[i]);
    });
  });

  it('test threshold zero leaves literals', function() {
    const chunk = parseOk('local a = 42');
    numbersToExpressions.create({ threshold: 0 }).apply(chunk, stepContext(5));
    assert.equal(unparse(chunk), 'local a = 42');
  });

  it('test exempt literals are left alone', function() {
    const chunk = parseOk('print(1)');
    const call = expectNode(chunk.body.statements[0], syntax.isFunctionCallStatement);
    call.args[0] = new syntax.NumberExpression(7, syntax.NodeTags.exempt);
    numbersToExpressions.create({}).apply(chunk, stepContext(5));
    assert.equal(unparse(chunk), 'print(7)');
  });
});

describe('test EncryptStrings', function() {
  it('test keystream', function() {
    const keys = new Keystream(65537, 65536 * 7);
    assert.equal(keys.encrypt('AA', 0), 'HO');
    assert.equal(keys.decrypt('HO', 0), 'AA');
    assert.equal(keys.encrypt('\xff', 0), '\x06');
  });

  it('test keystream round trip', function() {
    const keys = Keystream.random(new Random(9));
    assert.equal(keys.multiplier % 4, 1);
    assert.equal(keys.increment % 2, 1);
    const plain = 'hello\x00\xff world';
    const cipher = keys.encrypt(plain, 12345);
    assert.equal(cipher.length, plain.length);
    assert.notEqual(cipher, plain);
    assert.equal(keys.decrypt(cipher, 12345), plain);
  });

  it('test strings become decryptor calls', function() {
    const chunk = parseOk('print("hello", "hello", "x")');
    encryptStrings.create({}).apply(chunk, stepContext(3));
    const statements = chunk.body.statements;
    // forward declaration, wrapped decryptor, then the program
    assert.equal(statements.length, 3);
    const forward = expectNode(statements[0], syntax.isLocalVariableDeclaration);
    expectNode(statements[1], syntax.isDoStatement);
    const call = expectNode(statements[2], syntax.isFunctionCallStatement);
    const args = call.args.map((a) => expectNode(a, syntax.isFunctionCallExpression));
    for (const a of args) {
      assert.strictEqual(expectNode(a.base, syntax.isVariableExpression).id, forward.ids[0]);
      assert.ok(a.args[0].hasTag(syntax.NodeTag.Exempt));
    }
    const seeds = args.map((a) => expectNode(a.args[1], syntax.isNumberExpression).value);
    const ciphers = args.map((a) => expectNode(a.args[0], syntax.isStringExpression).value);
    assert.equal(seeds[0], seeds[1]);
    assert.notEqual(seeds[0], seeds[2]);
    assert.equal(ciphers[0], ciphers[1]);
    assert.equal(ciphers[2].length, 1);
    parseOk(unparse(chunk));
  });

  it('test nothing to encrypt', function() {
    const chunk = parseOk('print(1)');
    const sink = new MemorySink();
    encryptStrings.create({}).apply(chunk, stepContext(3, { sink }));
    assert.equal(unparse(chunk), 'print(1)');
    assert.deepEqual(sink.lines, ['[test] DEBUG: no string literals to encrypt']);
  });
});

describe('test ConstantArray', function() {
  it('test base64', function() {
    for (const s of ['', 'h', 'he', 'hel', 'hello', '\xff\xfe\x00']) {
      const want = Buffer.from(s, 'latin1').toString('base64').replace(/=+$/, '');
      assert.equal(encodeBase64(s, base64Alphabet), want);
    }
  });

  it('test rotate right', function() {
    assert.deepEqual(rotateRight([1, 2, 3, 4, 5], 2), [4, 5, 1, 2, 3]);
    assert.deepEqual(rotateRight([1, 2, 3], 0), [1, 2, 3]);
  });

  it('test plain layout', function() {
    const chunk = parseOk('print("a", "b", "a", 1)');
    const step = constantArray.create({ shuffle: false, rotate: false, encoding: 'none', maxWrapperOffset: 0 });
    step.apply(chunk, stepContext(1));
    const arr = expectNode(chunk.body.statements[0], syntax.isLocalVariableDeclaration).ids[0];
    const wrap = expectNode(chunk.body.statements[2], syntax.isLocalFunctionDeclaration).id;
    const a = `__sym${arr.index}`;
    const w = `__sym${wrap.index}`;
    assert.equal(
      unparse(chunk),
      [
        `local ${a} = {"a", "b", 1}`,
        `do local offset = 0; setmetatable(${a}, {__index = function(t, k) if type(k) == "number" then return rawget(t, k + offset) end end}) end`,
        `local function ${w}(i) return ${a}[i + 0] end`,
        `print(${w}(1), ${w}(2), ${w}(1), ${w}(3))`,
      ].join('; ')
    );
  });

  it('test strings only', function() {
    const chunk = parseOk('print("a", 1)');
    constantArray.create({ stringsOnly: true, encoding: 'none' }).apply(chunk, stepContext(2));
    const call = expectNode(chunk.body.statements[chunk.body.statements.length - 1], syntax.isFunctionCallStatement);
    assert.equal(call.args[0].kind, syntax.NodeKind.FunctionCallExpression);
    assert.equal(expectNode(call.args[1], syntax.isNumberExpression).value, 1);
  });

  it('test generated literals stay', function() {
    const chunk = parseOk('print(1)');
    const call = expectNode(chunk.body.statements[0], syntax.isFunctionCallStatement);
    call.args[0] = new syntax.NumberExpression(5, syntax.NodeTags.generated);
    constantArray.create({}).apply(chunk, stepContext(2));
    assert.equal(unparse(chunk), 'print(5)');
  });

  it('test encoded and rotated', function() {
    const chunk = parseOk('print("hello", "world", 42, "hello")');
    constantArray.create({}).apply(chunk, stepContext(11));
    const decl = expectNode(chunk.body.statements[0], syntax.isLocalVariableDeclaration);
    const table = expectNode(decl.expressions[0], syntax.isTableConstructorExpression);
    assert.equal(table.entries.length, 3);
    const stored = table.entries.map((e) => expectNode(e, syntax.isTableEntry).value);
    const strings = stored.filter(syntax.isStringExpression).map((e) => e.value);
    assert.equal(strings.length, 2);
    for (const s of strings) {
      assert.match(s, /^[A-Za-z0-9+/]{7}$/);
    }
    // rotation, decoding, decoy and wrapper follow the array
    assert.deepEqual(
      chunk.body.statements.slice(1, 5).map((s) => s.kind),
      ['DoStatement', 'DoStatement', 'DoStatement', 'LocalFunctionDeclaration']
    );
    const wrap = expectNode(chunk.body.statements[4], syntax.isLocalFunctionDeclaration).id;
    const call = expectNode(chunk.body.statements[5], syntax.isFunctionCallStatement);
    const indices = call.args.map((a) => {
      const read = expectNode(a, syntax.isFunctionCallExpression);
      assert.strictEqual(expectNode(read.base, syntax.isVariableExpression).id, wrap);
      return expectNode(read.args[0], syntax.isNumberExpression).value;
    });
    assert.equal(indices[0], indices[3]);
    assert.equal(new Set(indices).size, 3);
    parseOk(unparse(chunk));
  });
});

describe('test ProxifyLocals', function() {
  it('test reads and writes go through the proxy', function() {
    const chunk = parseOk('local x = 1\nx = 2\nprint(x)');
    proxifyLocals.create({ literalType: 'number' }).apply(chunk, stepContext(4));
    const statements = chunk.body.statements;
    assert.equal(statements.length, 5);
    const setmetatable = expectNode(statements[0], syntax.isLocalVariableDeclaration);
    const empty = expectNode(statements[1], syntax.isLocalVariableDeclaration);
    assert.equal(expectNode(setmetatable.expressions[0], syntax.isVariableExpression).name, 'setmetatable');

    const decl = expectNode(statements[2], syntax.isLocalVariableDeclaration);
    const x = decl.ids[0];
    const wrapped = expectNode(decl.expressions[0], syntax.isFunctionCallExpression);
    assert.strictEqual(expectNode(wrapped.base, syntax.isVariableExpression).id, setmetatable.ids[0]);
    const storage = expectNode(wrapped.args[0], syntax.isTableConstructorExpression);
    const field = expectNode(storage.entries[0], syntax.isKeyedTableEntry);
    assert.equal(expectNode(field.key, syntax.isStringExpression).value, 'name0');
    assert.equal(expectNode(field.value, syntax.isNumberExpression).value, 1);
    assert.equal(expectNode(wrapped.args[1], syntax.isTableConstructorExpression).entries.length, 2);

    const write = expectNode(statements[3], syntax.isFunctionCallStatement);
    assert.strictEqual(expectNode(write.base, syntax.isVariableExpression).id, empty.ids[0]);
    const set = expectNode(write.args[0], syntax.isBinaryExpression);
    assert.strictEqual(expectNode(set.lhs, syntax.isVariableExpression).id, x);
    assert.equal(expectNode(set.rhs, syntax.isNumberExpression).value, 2);

    const read = expectNode(statements[4], syntax.isFunctionCallStatement).args[0];
    const base = read.kind === syntax.NodeKind.IndexExpression ? read.base : expectNode(read, syntax.isBinaryExpression).lhs;
    assert.strictEqual(expectNode(base, syntax.isVariableExpression).id, x);
    parseOk(unparse(chunk));
  });

  it('test dictionary operands', function() {
    const chunk = parseOk('local x = 1\nprint(x)');
    proxifyLocals.create({ literalType: 'dictionary' }).apply(chunk, stepContext(4));
    const statements = chunk.body.statements;
    const read = expectNode(statements[statements.length - 1], syntax.isFunctionCallStatement).args[0];
    const operand = read.kind === syntax.NodeKind.IndexExpression ? read.index : expectNode(read, syntax.isBinaryExpression).rhs;
    const word = expectNode(operand, syntax.isStringExpression).value;
    assert.ok(dictionary.includes(word), word);
    assert.notEqual(word, 'name0');
    parseOk(unparse(chunk));
  });

  it('test locked locals stay plain', function() {
    const sink = new MemorySink();
    const chunk = parseOk('local function f(a) return a end; for i = 1, 2 do local j = i end; local c, d = 1, 2');
    proxifyLocals.create({}).apply(chunk, stepContext(4, { sink }));
    assert.deepEqual(sink.lines, ['[test] DEBUG: proxified 1 locals {"locked":5}']);
  });

  it('test nothing to proxify', function() {
    const chunk = parseOk('local a, b = 1, 2');
    proxifyLocals.create({}).apply(chunk, stepContext(4));
    assert.equal(unparse(chunk), 'local a, b = 1, 2');
  });
});

describe('test AntiTamper', function() {
  function doBody(chunk: syntax.Chunk): syntax.Block {
    return expectNode(chunk.body.statements[0], syntax.isDoStatement).body;
  }

  it('test checks are spliced first', function() {
    const chunk = parseOk('print(1)');
    antiTamper.create({}).apply(chunk, stepContext(6));
    assert.equal(chunk.body.statements.length, 2);
    assert.equal(doBody(chunk).statements.length, 16);
    const text = unparse(chunk);
    assert.ok(
      text.startsWith(
        'do local valid = true; local function kill() while true do error("Tamper Detected!") end end; local guard = "name0"; '
      )
    );
    assert.ok(text.endsWith(' end; print(1)'));
    parseOk(text);
  });

  it('test without debug checks', function() {
    const chunk = parseOk('print(1)');
    antiTamper.create({ useDebug: false }).apply(chunk, stepContext(6));
    assert.equal(doBody(chunk).statements.length, 14);
  });

  it('test skipped for pretty output', function() {
    const sink = new MemorySink();
    const chunk = parseOk('print(1)');
    antiTamper.create({}).apply(chunk, stepContext(6, { pretty: true, sink }));
    assert.equal(unparse(chunk), 'print(1)');
    assert.deepEqual(sink.lines, ['[test] WARN: skipped: the checks do not hold for pretty printed output']);
  });
});
