import { Err, Ok, Result } from 'ts-results';

import { parse } from '../lua-parser/parse';
import { Chunk } from '../lua-parser/syntax';
import { Dialect, isReserved } from '../lua-parser/tokenize/token';
import { Step, StepContext, findStep } from '../steps';
import { unparse } from '../unparse/unparser';
import { Logger, silentLogger } from '../utils/logger';
import { Config, parseConfig } from './config';
import { ConfigError, StepError } from './error';
import { NameGenerator, createNameGenerator } from './name-generators';
import { Random } from './random';
import { renameVariables } from './rename';

export interface PipelineOptions {
  logger?: Logger;
}

// A Pipeline parses a program, runs the configured steps over it in
// order, renames its variables and prints it.
export class Pipeline {
  readonly config: Config;
  private readonly steps: Step[];
  private readonly logger: Logger;

  private constructor(config: Config, steps: Step[], logger: Logger) {
    this.config = config;
    this.steps = steps;
    this.logger = logger;
  }

  // fromConfig validates input and builds its steps.
  static fromConfig(input: unknown, options: PipelineOptions = {}): Result<Pipeline, ConfigError> {
    const parsed = parseConfig(input);
    if (parsed.err) {
      return parsed;
    }
    const config = parsed.val;
    const steps: Step[] = [];
    for (const s of config.steps) {
      const def = findStep(s.name);
      if (def === undefined) {
        return Err(new ConfigError(`unknown step ${s.name}`));
      }
      steps.push(def.create(s.settings));
    }
    return Ok(new Pipeline(config, steps, options.logger ?? silentLogger()));
  }

  get dialect(): Dialect {
    return this.config.luaVersion;
  }

  // apply obfuscates source. It throws ParseError for input that does not
  // parse and StepError for a step that fails.
  apply(source: string, filename = '<input>'): string {
    const started = Date.now();
    const random = Random.fromSeed(this.config.seed);
    this.logger.info(`obfuscating ${filename}`, { dialect: this.dialect, seed: random.seed });

    const parsed = parse(source, { dialect: this.dialect, filename });
    if (parsed.err) {
      throw parsed.val;
    }
    const chunk = parsed.val;
    const generator = createNameGenerator(this.config.nameGenerator);
    generator.prepare(random);
    this.run(chunk, random, generator);

    this.logger.debug('renaming variables', { generator: generator.name });
    renameVariables(chunk, { generator, prefix: this.config.varNamePrefix });
    const out = unparse(chunk, { pretty: this.config.prettyPrint });
    const elapsed = (Date.now() - started) / 1000;
    this.logger.info(`done in ${elapsed.toFixed(2)}s`, {
      sourceBytes: source.length,
      outputBytes: out.length,
    });
    return out;
  }

  private run(chunk: Chunk, random: Random, generator: NameGenerator): void {
    for (const step of this.steps) {
      const logger = this.logger.child(step.name);
      const ctx: StepContext = {
        random,
        logger,
        pretty: this.config.prettyPrint,
        generateName: (lengthHint) => generateName(generator, random, lengthHint),
      };
      logger.info('applying step');
      const started = Date.now();
      try {
        step.apply(chunk, ctx);
      } catch (e) {
        throw new StepError(step.name, e);
      }
      logger.debug(`finished in ${Date.now() - started}ms`);
    }
  }
}

// generateName draws a non-reserved name from generator at a random
// index; lengthHint bounds the index range.
function generateName(generator: NameGenerator, random: Random, lengthHint: number): string {
  const span = Math.min(0x7fffffff, 52 * 63 ** Math.max(0, lengthHint - 1));
  for (;;) {
    const name = generator.generate(random.int(0, span - 1));
    if (!isReserved(name)) {
      return name;
    }
  }
}
