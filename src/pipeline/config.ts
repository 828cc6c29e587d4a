import * as fs from 'fs';
import { Err, Ok, Result } from 'ts-results';
import { z } from 'zod';

import { Dialect } from '../lua-parser/tokenize/token';
import { findStep, stepNames } from '../steps';
import { suggest } from '../utils/spell';
import { ConfigError } from './error';
import { nameGeneratorNames } from './name-generators';

const identifierPrefix = /^([A-Za-z_][A-Za-z0-9_]*)?$/;

export const stepConfigSchema = z
  .object({
    name: z.string().min(1),
    settings: z.record(z.unknown()).default({}),
  })
  .strict();

export const configSchema = z
  .object({
    luaVersion: z.nativeEnum(Dialect).default(Dialect.Lua51),
    prettyPrint: z.boolean().default(false),
    // 0 picks a random seed per run
    seed: z.number().int().min(0).max(0xffffffff).default(0),
    varNamePrefix: z.string().regex(identifierPrefix, 'must be empty or start an identifier').default(''),
    nameGenerator: z.enum(nameGeneratorNames).default('mangledShuffled'),
    steps: z.array(stepConfigSchema).default([]),
  })
  .strict();

// Config is a validated configuration with every default filled in.
export type Config = z.output<typeof configSchema>;
// ConfigInput is what a configuration file may contain.
export type ConfigInput = z.input<typeof configSchema>;
export type StepConfig = z.output<typeof stepConfigSchema>;

// parseConfig validates a configuration value, including the names and
// settings of its steps.
export function parseConfig(input: unknown): Result<Config, ConfigError> {
  const parsed = configSchema.safeParse(input);
  if (!parsed.success) {
    return Err(new ConfigError(describe(parsed.error)));
  }
  const config = parsed.data;
  for (let i = 0; i < config.steps.length; i++) {
    const step = config.steps[i];
    const def = findStep(step.name);
    if (def === undefined) {
      return Err(new ConfigError(`steps.${i}: unknown step ${step.name}${suggest(step.name, stepNames())}`));
    }
    const settings = def.settings.safeParse(step.settings);
    if (!settings.success) {
      return Err(new ConfigError(describe(settings.error, `steps.${i}.settings`)));
    }
  }
  return Ok(config);
}

// parseConfigText validates a configuration written as JSON.
export function parseConfigText(text: string): Result<Config, ConfigError> {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (e) {
    return Err(new ConfigError(`invalid JSON: ${e instanceof Error ? e.message : String(e)}`));
  }
  return parseConfig(value);
}

export function loadConfigFile(path: string): Result<Config, ConfigError> {
  let text: string;
  try {
    text = fs.readFileSync(path, 'utf8');
  } catch (e) {
    return Err(new ConfigError(`cannot read ${path}: ${e instanceof Error ? e.message : String(e)}`));
  }
  const config = parseConfigText(text);
  if (config.err) {
    return Err(new ConfigError(`${path}: ${config.val.message}`));
  }
  return config;
}

// describe renders the first issue of a zod error as path: message.
function describe(error: z.ZodError, prefix = ''): string {
  const issue = error.issues[0];
  const path = [prefix, ...issue.path.map(String)].filter((p) => p !== '').join('.');
  return path === '' ? issue.message : `${path}: ${issue.message}`;
}
