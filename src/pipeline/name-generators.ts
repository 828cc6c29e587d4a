import { Random } from './random';

// A NameGenerator maps a counter to a variable name. Distinct counters
// give distinct names; the renamer skips names it cannot use.
export interface NameGenerator {
  readonly name: string;
  // prepare is called once per run, before any name is generated.
  prepare(random: Random): void;
  generate(index: number): string;
}

const letters = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ';
const digits = '0123456789';

// encode writes index with a first char from start and the rest from
// rest, least significant first.
function encode(index: number, start: string, rest: string): string {
  let name = start[index % start.length];
  let n = Math.floor(index / start.length);
  while (n > 0) {
    name += rest[n % rest.length];
    n = Math.floor(n / rest.length);
  }
  return name;
}

class Mangled implements NameGenerator {
  readonly name: string = 'mangled';
  protected start = letters;
  protected rest = letters + digits + '_';

  prepare(_random: Random): void {
    // fixed alphabet
  }

  generate(index: number): string {
    return encode(index, this.start, this.rest);
  }
}

class MangledShuffled extends Mangled {
  readonly name = 'mangledShuffled';

  prepare(random: Random): void {
    this.start = random.shuffle([...letters]).join('');
    this.rest = random.shuffle([...letters + digits + '_']).join('');
  }
}

// Il writes names made of look-alike chars, at least minLength long.
class Il implements NameGenerator {
  readonly name = 'il';
  private static readonly start = 'Il';
  private static readonly rest = 'Il1';
  private static readonly minLength = 6;
  private offset = 0;

  prepare(random: Random): void {
    // the smallest index with minLength chars, plus a random shift
    const base = Il.start.length * Il.rest.length ** (Il.minLength - 2);
    this.offset = base + random.int(0, base);
  }

  generate(index: number): string {
    return encode(index + this.offset, Il.start, Il.rest);
  }
}

class NumberNames implements NameGenerator {
  readonly name = 'number';

  prepare(_random: Random): void {
    // nothing to prepare
  }

  generate(index: number): string {
    return `_${index}`;
  }
}

export const nameGeneratorNames = ['mangled', 'mangledShuffled', 'il', 'number'] as const;

export type NameGeneratorName = (typeof nameGeneratorNames)[number];

export function createNameGenerator(name: NameGeneratorName): NameGenerator {
  switch (name) {
    case 'mangled':
      return new Mangled();
    case 'mangledShuffled':
      return new MangledShuffled();
    case 'il':
      return new Il();
    case 'number':
      return new NumberNames();
  }
}
