import * as assert from 'assert';

import { NameGenerator, createNameGenerator } from '../src/pipeline/name-generators';
import { Random } from '../src/pipeline/random';
import { renameVariables } from '../src/pipeline/rename';
import { unparse } from '../src/unparse/unparser';
import { parseOk } from './helpers';

function rename(source: string, generator: NameGenerator = createNameGenerator('mangled'), prefix = ''): string {
  const chunk = parseOk(source);
  generator.prepare(new Random(1));
  renameVariables(chunk, { generator, prefix });
  return unparse(chunk);
}

describe('test rename', function() {
  it('test locals get short names', function() {
    assert.equal(
      rename('local first = 1; local second = first; print(second)'),
      'local a = 1; local b = a; print(b)'
    );
  });

  it('test globals are kept and avoided', function() {
    assert.equal(rename('local x = a'), 'local b = a');
  });

  it('test enclosing references are not captured', function() {
    assert.equal(
      rename('local x = 1; do local y = 2; print(x, y) end'),
      'local a = 1; do local b = 2; print(a, b) end'
    );
  });

  it('test sibling scopes reuse names', function() {
    assert.equal(rename('do local x = 1 end; do local y = 2 end'), 'do local a = 1 end; do local a = 2 end');
  });

  it('test parameters and loop variables', function() {
    const source =
      'local function sum(list) local total = 0; for _, v in ipairs(list) do total = total + v end; return total end';
    assert.equal(
      rename(source),
      'local function a(a) local b = 0; for a, c in ipairs(a) do b = b + c end; return b end'
    );
  });

  it('test reserved words are skipped', function() {
    const words = ['do', 'end', 'q'];
    const generator: NameGenerator = {
      name: 'words',
      prepare() {
        // fixed list
      },
      generate(index) {
        return words[index];
      },
    };
    assert.equal(rename('local v = 1', generator), 'local q = 1');
  });

  it('test prefix', function() {
    assert.equal(rename('local x = 1; print(x)', createNameGenerator('mangled'), 'v_'), 'local v_a = 1; print(v_a)');
  });

  it('test number names', function() {
    assert.equal(rename('local x, y = 1, 2', createNameGenerator('number')), 'local _0, _1 = 1, 2');
  });
});

describe('test name generators', function() {
  it('test mangled', function() {
    const g = createNameGenerator('mangled');
    g.prepare(new Random(1));
    assert.equal(g.generate(0), 'a');
    assert.equal(g.generate(51), 'Z');
    assert.equal(g.generate(52), 'ab');
    assert.equal(g.generate(53), 'bb');
  });

  it('test mangled shuffled names are distinct', function() {
    const g = createNameGenerator('mangledShuffled');
    g.prepare(new Random(7));
    const seen = new Set<string>();
    for (let i = 0; i < 3000; i++) {
      const name = g.generate(i);
      assert.match(name, /^[A-Za-z][A-Za-z0-9_]*$/);
      seen.add(name);
    }
    assert.equal(seen.size, 3000);
  });

  it('test il', function() {
    const g = createNameGenerator('il');
    g.prepare(new Random(3));
    for (let i = 0; i < 50; i++) {
      const name = g.generate(i);
      assert.match(name, /^[Il][Il1]{5,}$/);
    }
    assert.notEqual(g.generate(0), g.generate(1));
  });

  it('test names', function() {
    assert.equal(createNameGenerator('il').name, 'il');
    assert.equal(createNameGenerator('mangledShuffled').name, 'mangledShuffled');
    assert.equal(createNameGenerator('number').generate(12), '_12');
  });
});
