import { Err, Result } from 'ts-results';

import { Dialect } from '../lua-parser/tokenize/token';
import { suggest } from '../utils/spell';
import { Config, ConfigInput, parseConfig } from './config';
import { ConfigError } from './error';

export const presetNames = ['Minify', 'Weak', 'Medium', 'Strong'] as const;

export type PresetName = (typeof presetNames)[number];

export const presets: Record<PresetName, ConfigInput> = {
  // renaming only
  Minify: {
    luaVersion: Dialect.Lua51,
    nameGenerator: 'mangled',
    steps: [],
  },
  Weak: {
    luaVersion: Dialect.Lua51,
    nameGenerator: 'mangledShuffled',
    steps: [
      {
        name: 'ConstantArray',
        settings: { threshold: 1, stringsOnly: true, shuffle: true, rotate: true, encoding: 'none' },
      },
    ],
  },
  Medium: {
    luaVersion: Dialect.Lua51,
    nameGenerator: 'mangledShuffled',
    steps: [
      { name: 'EncryptStrings' },
      { name: 'AntiTamper', settings: { useDebug: false } },
      {
        name: 'ConstantArray',
        settings: { threshold: 1, stringsOnly: true, shuffle: true, rotate: true, encoding: 'base64' },
      },
      { name: 'NumbersToExpressions' },
    ],
  },
  Strong: {
    luaVersion: Dialect.Lua51,
    nameGenerator: 'il',
    steps: [
      { name: 'EncryptStrings' },
      { name: 'AntiTamper' },
      { name: 'ProxifyLocals', settings: { literalType: 'any' } },
      {
        name: 'ConstantArray',
        settings: { threshold: 1, stringsOnly: false, shuffle: true, rotate: true, encoding: 'base64' },
      },
      { name: 'NumbersToExpressions', settings: { threshold: 1, internalThreshold: 0.4 } },
    ],
  },
};

// findPreset matches name against the preset names, ignoring case.
export function findPreset(name: string): PresetName | undefined {
  return presetNames.find((p) => p.toLowerCase() === name.toLowerCase());
}

export function getPreset(name: string): Result<Config, ConfigError> {
  const preset = findPreset(name);
  if (preset === undefined) {
    return Err(new ConfigError(`unknown preset ${name}${suggest(name, presetNames)}`));
  }
  return parseConfig(presets[preset]);
}
