import { describe, expect, it } from 'vitest';

import { IdGenerator } from './id';
import { SeededRandom } from './random';

describe('SeededRandom', () => {
  it('replays the same sequence for the same seed', () => {
    const a = new SeededRandom(42);
    const b = new SeededRandom(42);
    const draws = Array.from({ length: 5 }, () => [a.next(), b.next()]);

    for (const [x, y] of draws) expect(x).toBe(y);
    expect(new SeededRandom(43).next()).not.toBe(new SeededRandom(42).next());
  });

  it('stays within inclusive integer bounds', () => {
    const rng = new SeededRandom(7);
    const values = Array.from({ length: 200 }, () => rng.nextInt(2, 4));

    expect(new Set(values)).toEqual(new Set([2, 3, 4]));
    expect(rng.nextInt(5, 5)).toBe(5);
  });

  it('tolerates swapped bounds', () => {
    const rng = new SeededRandom(7);
    const value = rng.nextInt(9, 3);

    expect(value).toBeGreaterThanOrEqual(3);
    expect(value).toBeLessThanOrEqual(9);
  });
});

describe('IdGenerator', () => {
  it('counts up from its start', () => {
    const ids = new IdGenerator(3);

    expect([ids.nextId(), ids.nextId()]).toEqual([3, 4]);
    expect(ids.peek()).toBe(5);
  });
});
