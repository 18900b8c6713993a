import { PreconditionViolationError } from './errors.js';

export interface RandomSource {
  /** Uniform value in [0, 1). */
  next(): number;
}

/** Largest accepted seed. Seed `n` starts the generator in state `n + 1`. */
export const MAX_SEED = 0xfffffffe;

export class SeededRandom implements RandomSource {
  private state: number;

  constructor(public readonly seed: number) {
    if (!Number.isInteger(seed) || seed < 0 || seed > MAX_SEED) {
      throw new Error(`Seed must be an integer in [0, ${MAX_SEED}], got ${seed}`);
    }
    // xorshift32 has no zero state, so every seed maps to its own non-zero state.
    this.state = seed + 1;
  }

  next(): number {
    // xorshift32
    let x = this.state;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.state = x >>> 0;
    return this.state / 0x100000000;
  }
}

export class MathRandom implements RandomSource {
  next(): number {
    return Math.random();
  }
}

export function createRandomSource(seed?: number): RandomSource {
  return seed === undefined ? new MathRandom() : new SeededRandom(seed);
}

export function pick<T>(random: RandomSource, items: readonly T[]): T {
  if (items.length === 0) {
    throw new PreconditionViolationError('Cannot pick from an empty list');
  }
  const index = Math.floor(random.next() * items.length);
  return items[Math.min(index, items.length - 1)];
}
