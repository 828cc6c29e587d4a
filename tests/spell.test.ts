import * as assert from 'assert';

import { presetNames } from '../src/pipeline/presets';
import { stepNames } from '../src/steps';
import { nearest, suggest } from '../src/utils/spell';

describe('test spell', function() {
  it('test nearest 1', function() {
    assert.equal(nearest('rang', ['range', 'while', 'for', 'red']), 'range');
  });

  it('test nearest ignores case and underscores', function() {
    assert.equal(nearest('constant_aray', stepNames()), 'ConstantArray');
    assert.equal(nearest('STRONG', presetNames), 'Strong');
  });

  it('test nearest gives up on distant names', function() {
    assert.equal(nearest('xyz', presetNames), '');
  });

  it('test suggest', function() {
    assert.equal(suggest('Meduim', presetNames), ' (did you mean Medium?)');
    assert.equal(suggest('xyz', presetNames), '');
  });
});
