import * as assert from 'assert';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { Dialect } from '../src/lua-parser/tokenize/token';
import { loadConfigFile, parseConfig, parseConfigText } from '../src/pipeline/config';
import { findPreset, getPreset, presetNames } from '../src/pipeline/presets';

function configError(input: unknown): string {
  const r = parseConfig(input);
  if (r.ok) {
    assert.fail('expected the configuration to be rejected');
  }
  return r.val.message;
}

describe('test config', function() {
  it('test defaults', function() {
    const r = parseConfig({});
    assert.ok(r.ok);
    assert.deepEqual(r.val, {
      luaVersion: Dialect.Lua51,
      prettyPrint: false,
      seed: 0,
      varNamePrefix: '',
      nameGenerator: 'mangledShuffled',
      steps: [],
    });
  });

  it('test step settings default to empty', function() {
    const r = parseConfig({ steps: [{ name: 'AntiTamper' }] });
    assert.ok(r.ok);
    assert.deepEqual(r.val.steps, [{ name: 'AntiTamper', settings: {} }]);
  });

  it('test invalid fields', function() {
    assert.equal(configError({ foo: 1 }), "Unrecognized key(s) in object: 'foo'");
    assert.equal(configError({ seed: -1 }), 'seed: Number must be greater than or equal to 0');
    assert.equal(configError({ seed: 'x' }), 'seed: Expected number, received string');
    assert.equal(configError({ varNamePrefix: '1a' }), 'varNamePrefix: must be empty or start an identifier');
    assert.equal(
      configError({ nameGenerator: 'foo' }),
      "nameGenerator: Invalid enum value. Expected 'mangled' | 'mangledShuffled' | 'il' | 'number', received 'foo'"
    );
    assert.equal(
      configError({ luaVersion: 'Lua52' }),
      "luaVersion: Invalid enum value. Expected 'Lua51' | 'LuaU', received 'Lua52'"
    );
  });

  it('test invalid steps', function() {
    assert.equal(configError({ steps: [{ name: 'Foo' }] }), 'steps.0: unknown step Foo');
    assert.equal(
      configError({ steps: [{ name: 'AntiTamper' }, { name: 'EncryptString' }] }),
      'steps.1: unknown step EncryptString (did you mean EncryptStrings?)'
    );
    assert.equal(
      configError({ steps: [{ name: 'AntiTamper', extra: 1 }] }),
      "steps.0: Unrecognized key(s) in object: 'extra'"
    );
    assert.equal(
      configError({ steps: [{ name: 'NumbersToExpressions', settings: { threshold: 2 } }] }),
      'steps.0.settings.threshold: Number must be less than or equal to 1'
    );
    assert.equal(
      configError({ steps: [{ name: 'AntiTamper', settings: { useDebugg: true } }] }),
      "steps.0.settings: Unrecognized key(s) in object: 'useDebugg'"
    );
  });

  it('test json text', function() {
    const r = parseConfigText('{"seed": 7, "prettyPrint": true}');
    assert.ok(r.ok);
    assert.equal(r.val.seed, 7);
    assert.equal(r.val.prettyPrint, true);

    const bad = parseConfigText('{');
    assert.ok(bad.err);
    assert.ok(bad.val.message.startsWith('invalid JSON: '));
  });

  it('test config files', function() {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'luafuscate-'));
    try {
      const good = path.join(dir, 'good.json');
      fs.writeFileSync(good, JSON.stringify({ nameGenerator: 'il', steps: [{ name: 'ProxifyLocals' }] }));
      const r = loadConfigFile(good);
      assert.ok(r.ok);
      assert.equal(r.val.nameGenerator, 'il');

      const bad = path.join(dir, 'bad.json');
      fs.writeFileSync(bad, '{"seed": "x"}');
      const e = loadConfigFile(bad);
      assert.ok(e.err);
      assert.equal(e.val.message, `${bad}: seed: Expected number, received string`);

      const missing = path.join(dir, 'missing.json');
      const m = loadConfigFile(missing);
      assert.ok(m.err);
      assert.ok(m.val.message.startsWith(`cannot read ${missing}: ENOENT`));
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe('test presets', function() {
  it('test every preset is valid', function() {
    for (const name of presetNames) {
      const r = getPreset(name);
      assert.ok(r.ok, name);
    }
  });

  it('test preset contents', function() {
    const r = getPreset('strong');
    assert.ok(r.ok);
    assert.equal(r.val.nameGenerator, 'il');
    assert.deepEqual(
      r.val.steps.map((s) => s.name),
      ['EncryptStrings', 'AntiTamper', 'ProxifyLocals', 'ConstantArray', 'NumbersToExpressions']
    );
  });

  it('test preset names ignore case', function() {
    assert.equal(findPreset('MINIFY'), 'Minify');
    assert.equal(findPreset('none'), undefined);
  });

  it('test unknown preset', function() {
    const r = getPreset('Meduim');
    assert.ok(r.err);
    assert.equal(r.val.message, 'unknown preset Meduim (did you mean Medium?)');
    const far = getPreset('Foo');
    assert.ok(far.err);
    assert.equal(far.val.message, 'unknown preset Foo');
  });
});
