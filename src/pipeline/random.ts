// Random is the only source of randomness of a run. Seeding it makes an
// obfuscation reproducible.
export class Random {
  readonly seed: number;
  private state: number;

  constructor(seed: number) {
    this.seed = seed >>> 0;
    this.state = this.seed;
  }

  // fromSeed returns a generator for seed, or a randomly seeded one for 0.
  static fromSeed(seed: number): Random {
    if (seed !== 0) {
      return new Random(seed);
    }
    return new Random((Date.now() ^ Math.floor(Math.random() * 0x100000000)) >>> 0 || 1);
  }

  // nextU32 returns the next 32-bit unsigned integer (mulberry32).
  nextU32(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return (t ^ (t >>> 14)) >>> 0;
  }

  // float returns a number in [0, 1).
  float(): number {
    return this.nextU32() / 0x100000000;
  }

  // int returns an integer in [min, max], both inclusive.
  int(min: number, max: number): number {
    if (max < min) {
      throw new RangeError(`empty range [${min}, ${max}]`);
    }
    return min + Math.floor(this.float() * (max - min + 1));
  }

  // chance reports true with probability p.
  chance(p: number): boolean {
    return this.float() < p;
  }

  pick<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new RangeError('pick from an empty list');
    }
    return items[this.int(0, items.length - 1)];
  }

  // shuffle returns a shuffled copy of items.
  shuffle<T>(items: readonly T[]): T[] {
    const out = [...items];
    for (let i = out.length - 1; i > 0; i--) {
      const j = this.int(0, i);
      [out[i], out[j]] = [out[j], out[i]];
    }
    return out;
  }
}
