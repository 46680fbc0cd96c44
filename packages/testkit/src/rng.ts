/**
 * Seeded PRNG for property-style tests. Same seed, same sequence.
 */
export type Rng = Readonly<{
  /** Next unsigned 32-bit integer. */
  u32: () => number;
  /** Next float in [0, 1). */
  float: () => number;
  /** Next integer in [min, max], inclusive. */
  int: (min: number, max: number) => number;
}>;

export function createRng(seed: number): Rng {
  let state = seed >>> 0;
  const u32 = (): number => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state;
  };
  const float = (): number => u32() / 4294967296;
  const int = (min: number, max: number): number => min + Math.floor(float() * (max - min + 1));
  return Object.freeze({ u32, float, int });
}
