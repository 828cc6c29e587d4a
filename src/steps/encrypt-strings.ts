import { z } from 'zod';

import * as syntax from '../lua-parser/syntax';
import { Random } from '../pipeline/random';
import { splice } from '../splice/splice';
import { luaNumber } from '../unparse/unparser';
import { Visit, visit } from '../walk/visit';
import { Step, StepContext, defineStep } from './step';

const settings = z
  .object({
    // share of string literals that get encrypted
    threshold: z.number().min(0).max(1).default(1),
  })
  .strict();

type Settings = z.output<typeof settings>;

// keystream state stays below 2^24 so that state * multiplier is exact
// in doubles
const modulus = 0x1000000;

// A Keystream is an additive linear congruential generator.
export class Keystream {
  readonly multiplier: number;
  readonly increment: number;

  constructor(multiplier: number, increment: number) {
    this.multiplier = multiplier;
    this.increment = increment;
  }

  // random picks full period parameters.
  static random(random: Random): Keystream {
    return new Keystream(random.int(1, 0x3fffff) * 4 + 1, random.int(0, 0x7fffff) * 2 + 1);
  }

  // encrypt adds the keystream for seed to every byte of plain.
  encrypt(plain: string, seed: number): string {
    return this.run(plain, seed, 1);
  }

  decrypt(cipher: string, seed: number): string {
    return this.run(cipher, seed, -1);
  }

  private run(text: string, seed: number, sign: number): string {
    let state = seed;
    let out = '';
    for (let i = 0; i < text.length; i++) {
      state = (state * this.multiplier + this.increment) % modulus;
      const k = Math.floor(state / 65536) % 256;
      out += String.fromCharCode((((text.charCodeAt(i) + sign * k) % 256) + 256) % 256);
    }
    return out;
  }
}

// decryptor returns the Lua source of the runtime decryptor. It must
// compute the same keystream as Keystream.
function decryptor(keys: Keystream): string {
  return `
local cache = {}
local byte, char, concat, floor = string.byte, string.char, table.concat, math.floor
local function DECRYPT(data, seed)
  local done = cache[seed]
  if done then
    return done
  end
  local state = seed
  local out = {}
  for i = 1, #data do
    state = (state * ${luaNumber(keys.multiplier)} + ${luaNumber(keys.increment)}) % ${modulus}
    out[i] = char((byte(data, i) - floor(state / 65536) % 256) % 256)
  end
  done = concat(out)
  cache[seed] = done
  return done
end
`;
}

// EncryptStrings replaces string literals with calls to a decryptor
// spliced in at the start of the chunk. Each distinct string gets its own
// seed; the decryptor caches by seed.
export class EncryptStrings implements Step {
  readonly name = 'EncryptStrings';
  private readonly settings: Settings;

  constructor(s: Settings) {
    this.settings = s;
  }

  apply(chunk: syntax.Chunk, ctx: StepContext): void {
    const selected = new Set<syntax.StringExpression>();
    visit(chunk, {
      pre: (node) => {
        if (
          node.kind === syntax.NodeKind.StringExpression &&
          !node.hasTag(syntax.NodeTag.Exempt) &&
          ctx.random.chance(this.settings.threshold)
        ) {
          selected.add(node);
        }
        return undefined;
      },
    });
    if (selected.size === 0) {
      ctx.logger.debug('no string literals to encrypt');
      return;
    }

    const keys = Keystream.random(ctx.random);
    const root = chunk.body.scope;
    const decrypt = root.addVariable();
    const seeds = new Map<string, number>();
    const used = new Set<number>();
    const seedFor = (s: string): number => {
      let seed = seeds.get(s);
      if (seed === undefined) {
        do {
          seed = ctx.random.int(1, modulus - 1);
        } while (used.has(seed));
        used.add(seed);
        seeds.set(s, seed);
      }
      return seed;
    };

    visit(chunk, {
      post: (node, vctx) => {
        if (node.kind !== syntax.NodeKind.StringExpression || !selected.has(node)) {
          return undefined;
        }
        const seed = seedFor(node.value);
        vctx.scope.addReferenceToHigherScope(root, decrypt);
        return Visit.replace(
          new syntax.FunctionCallExpression(
            new syntax.VariableExpression(root, decrypt, syntax.NodeTags.generated),
            [
              new syntax.StringExpression(keys.encrypt(node.value, seed), syntax.NodeTags.exempt),
              new syntax.NumberExpression(seed, syntax.NodeTags.exempt),
            ],
            syntax.NodeTags.generated
          )
        );
      },
    });

    splice(chunk, chunk.body, decryptor(keys), {
      exports: { DECRYPT: decrypt },
      position: 'start',
      logger: ctx.logger,
    });
    ctx.logger.debug(`encrypted ${seeds.size} distinct strings`);
  }
}

export const encryptStrings = defineStep({
  name: 'EncryptStrings',
  description: 'replaces string literals with calls to a runtime decryptor',
  settings,
  create: (s) => new EncryptStrings(s),
});
