import { PreconditionViolationError } from '../src/errors.js';
import { MAX_SEED, MathRandom, SeededRandom, createRandomSource, pick } from '../src/random.js';
import { ScriptedRandom } from './test-utils.js';

describe('SeededRandom', () => {
  it('produces the xorshift32 stream starting one past the seed', () => {
    expect(new SeededRandom(0).next()).toBe(270369 / 2 ** 32);
    expect(new SeededRandom(1).next()).toBe(540738 / 2 ** 32);
  });

  it('replays the same sequence for the same seed', () => {
    const first = new SeededRandom(2024);
    const second = new SeededRandom(2024);
    const a = Array.from({ length: 20 }, () => first.next());
    const b = Array.from({ length: 20 }, () => second.next());
    expect(a).toEqual(b);
  });

  it('gives neighbouring and boundary seeds their own streams', () => {
    const firstDraws = [0, 1, 0x6d2b79f5, MAX_SEED - 1, MAX_SEED].map((seed) => new SeededRandom(seed).next());
    expect(new Set(firstDraws).size).toBe(firstDraws.length);
  });

  it('draws values in [0, 1)', () => {
    const random = new SeededRandom(99);
    for (let i = 0; i < 1000; i += 1) {
      const value = random.next();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it.each([Number.NaN, -1, 1.5, MAX_SEED + 1, 2 ** 32])('rejects seed %p', (seed) => {
    expect(() => new SeededRandom(seed)).toThrow('Seed must be an integer in [0, 4294967294]');
  });
});

describe('createRandomSource', () => {
  it('is seeded only when a seed is given', () => {
    expect(createRandomSource(7)).toBeInstanceOf(SeededRandom);
    expect(createRandomSource()).toBeInstanceOf(MathRandom);
  });
});

describe('pick', () => {
  it('maps one draw onto an index', () => {
    const random = new ScriptedRandom([0.5, 0.99, 0]);
    const items = ['a', 'b', 'c'];
    expect(pick(random, items)).toBe('b');
    expect(pick(random, items)).toBe('c');
    expect(pick(random, items)).toBe('a');
    expect(random.consumed).toBe(3);
  });

  it('refuses an empty list', () => {
    expect(() => pick(new ScriptedRandom([0.1]), [])).toThrow(PreconditionViolationError);
  });
});
