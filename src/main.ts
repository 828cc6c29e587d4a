#!/usr/bin/env node
import * as fs from 'fs';
import * as path from 'path';
import { Command, InvalidArgumentError, Option } from 'commander';

import { ParseError } from './lua-parser/error';
import { Dialect } from './lua-parser/tokenize/token';
import { Config, loadConfigFile } from './pipeline/config';
import { StepError } from './pipeline/error';
import { Pipeline } from './pipeline/pipeline';
import { getPreset, presetNames } from './pipeline/presets';
import { LogLevel, createLogger } from './utils/logger';

const version = '0.1.0';

interface CliOptions {
  preset?: string;
  config?: string;
  out?: string;
  lua51?: boolean;
  luau?: boolean;
  pretty?: boolean;
  seed?: number;
  verbose?: boolean;
  quiet?: boolean;
}

function parseSeed(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0 || n > 0xffffffff) {
    throw new InvalidArgumentError('expected an integer in [0, 4294967295]');
  }
  return n;
}

// defaultOutput puts the result next to the input: a.lua -> a.obfuscated.lua.
export function defaultOutput(file: string): string {
  const ext = path.extname(file);
  return path.join(path.dirname(file), `${path.basename(file, ext)}.obfuscated${ext === '' ? '.lua' : ext}`);
}

// applyOverrides lays the command line flags over a loaded configuration.
export function applyOverrides(config: Config, opts: CliOptions): Config {
  let luaVersion = config.luaVersion;
  if (opts.lua51) {
    luaVersion = Dialect.Lua51;
  } else if (opts.luau) {
    luaVersion = Dialect.LuaU;
  }
  return {
    ...config,
    luaVersion,
    prettyPrint: opts.pretty ? true : config.prettyPrint,
    seed: opts.seed ?? config.seed,
  };
}

function run(file: string, opts: CliOptions): number {
  let level: LogLevel = 'info';
  if (opts.verbose) {
    level = 'debug';
  } else if (opts.quiet) {
    level = 'error';
  }
  const logger = createLogger({ level });

  const loaded = opts.config !== undefined ? loadConfigFile(opts.config) : getPreset(opts.preset ?? 'Minify');
  if (loaded.err) {
    logger.error(loaded.val.message);
    return 1;
  }
  const pipeline = Pipeline.fromConfig(applyOverrides(loaded.val, opts), { logger });
  if (pipeline.err) {
    logger.error(pipeline.val.message);
    return 1;
  }

  let source: string;
  try {
    // one char per byte
    source = fs.readFileSync(file, 'latin1');
  } catch (e) {
    logger.error(`cannot read ${file}: ${e instanceof Error ? e.message : String(e)}`);
    return 1;
  }

  let out: string;
  try {
    out = pipeline.val.apply(source, file);
  } catch (e) {
    if (e instanceof ParseError || e instanceof StepError) {
      logger.error(e.message);
      return 1;
    }
    throw e;
  }

  const target = opts.out ?? defaultOutput(file);
  fs.writeFileSync(target, out, 'latin1');
  logger.info(`wrote ${target}`);
  return 0;
}

function main(): void {
  const program = new Command();

  program
    .name('luafuscate')
    .description('Obfuscates Lua 5.1 and Luau programs.')
    .version(version)
    .argument('<file>', 'Lua source file')
    .option('-p, --preset <name>', `preset to use (${presetNames.join(', ')})`)
    .addOption(new Option('-c, --config <file>', 'JSON configuration file').conflicts('preset'))
    .option('-o, --out <file>', 'output file (default: <file>.obfuscated.lua)')
    .option('--lua51', 'parse the input as Lua 5.1')
    .addOption(new Option('--luau', 'parse the input as Luau').conflicts('lua51'))
    .option('--pretty', 'pretty print the output')
    .option('--seed <n>', 'random seed; 0 picks one per run', parseSeed)
    .option('-v, --verbose', 'log debug output')
    .addOption(new Option('-q, --quiet', 'log errors only').conflicts('verbose'))
    .action((file: string, opts: CliOptions) => {
      process.exitCode = run(file, opts);
    });

  program.parse();
}

if (require.main === module) {
  main();
}
