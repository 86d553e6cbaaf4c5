/**
 * Seeded deterministic RNG for property tests.
 *
 * xorshift32: the same seed always yields the same sequence on every platform,
 * so a failing seed can be replayed exactly.
 */

export type Rng = Readonly<{
  /** Next unsigned 32-bit value. */
  u32: () => number;
  /** Integer in [min, max], both inclusive. */
  int: (min: number, max: number) => number;
  /** Uniformly chosen element of a non-empty list. */
  pick: <T>(values: readonly T[]) => T;
}>;

export function createRng(seed: number): Rng {
  // xorshift has a fixed point at 0.
  let state = seed >>> 0 || 0x9e3779b9;

  const u32 = (): number => {
    state ^= state << 13;
    state >>>= 0;
    state ^= state >>> 17;
    state ^= state << 5;
    state >>>= 0;
    return state;
  };

  const int = (min: number, max: number): number => {
    if (max < min) throw new Error(`createRng: empty range [${min}, ${max}]`);
    return min + (u32() % (max - min + 1));
  };

  const pick = <T>(values: readonly T[]): T => {
    const value = values[u32() % values.length];
    if (value === undefined) throw new Error("createRng: pick from an empty list");
    return value;
  };

  return Object.freeze({ u32, int, pick });
}
