import seedrandom from "seedrandom";

/**
 * Shared utility for random number generation.
 * Centralizes the RNG so a simulation can be seeded and replayed.
 */
export class RandomUtils {
  private static rng: seedrandom.PRNG = seedrandom();

  /**
   * Reseeds the generator. Passing null restores an unpredictable seed.
   */
  public static seed(seed: string | number | null): void {
    RandomUtils.rng =
      seed === null ? seedrandom() : seedrandom(String(seed));
  }

  /**
   * Returns a random floating-point number between 0 (inclusive) and 1 (exclusive).
   */
  public static float(): number {
    return RandomUtils.rng();
  }

  /**
   * Returns a random floating-point number between min (inclusive) and max (exclusive).
   */
  public static floatRange(min: number, max: number): number {
    return min + RandomUtils.rng() * (max - min);
  }

  /**
   * Returns a random integer between min (inclusive) and max (inclusive).
   */
  public static intRange(min: number, max: number): number {
    return Math.floor(RandomUtils.rng() * (max - min + 1)) + min;
  }

  /**
   * Returns true with the specified probability (0-1).
   */
  public static chance(probability: number): boolean {
    return RandomUtils.rng() < probability;
  }

  /**
   * Returns a random element from an array.
   */
  public static element<T>(array: readonly T[]): T | undefined {
    if (array.length === 0) return undefined;
    return array[Math.floor(RandomUtils.rng() * array.length)];
  }
}
