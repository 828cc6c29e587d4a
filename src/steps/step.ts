import { z } from 'zod';

import { Chunk } from '../lua-parser/syntax';
import { Random } from '../pipeline/random';
import { Logger } from '../utils/logger';

// StepContext is what the pipeline hands every step.
export interface StepContext {
  readonly random: Random;
  readonly logger: Logger;
  // output will be pretty printed
  readonly pretty: boolean;
  // generateName returns a fresh identifier-shaped string; lengthHint
  // picks roughly how long it is.
  generateName(lengthHint: number): string;
}

// A Step is one semantics preserving rewrite of the whole tree. It
// changes the tree in place; the chunk itself stays the root.
export interface Step {
  readonly name: string;
  apply(chunk: Chunk, ctx: StepContext): void;
}

// A StepDefinition describes a step kind and builds configured steps.
export interface StepDefinition {
  readonly name: string;
  readonly description: string;
  readonly settings: z.ZodTypeAny;
  // create validates raw settings and returns the step.
  create(settings: unknown): Step;
}

// defineStep ties a settings schema to the constructor of its step.
export function defineStep<S extends z.ZodTypeAny>(def: {
  name: string;
  description: string;
  settings: S;
  create(settings: z.output<S>): Step;
}): StepDefinition {
  return {
    name: def.name,
    description: def.description,
    settings: def.settings,
    create(settings: unknown): Step {
      return def.create(def.settings.parse(settings ?? {}));
    },
  };
}
