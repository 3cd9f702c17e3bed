import seedrandom from "seedrandom";
import { ArgumentValueError } from "./errors";

/**
 * Where dice get their randomness. Every rolling function takes one, and
 * falls back to the module-wide source set with `setRandomSource`.
 */
export interface RandomSource {
  /** A uniformly distributed integer in `[low, high]`, both ends inclusive. */
  uniformInt(low: number, high: number): number;
  /** One of `values`, each equally likely. */
  choice<T>(values: readonly T[]): T;
}

/** seedrandom-backed source. Without a seed it draws its seed from the environment. */
export class SeededRandomSource implements RandomSource {
  private readonly next: () => number;

  constructor(seed?: string) {
    this.next = seedrandom(seed);
  }

  uniformInt(low: number, high: number): number {
    if (!Number.isSafeInteger(low) || !Number.isSafeInteger(high)) {
      throw new ArgumentValueError(
        `Random bounds must be whole numbers, got [${low}, ${high}].`
      );
    }
    if (high < low) {
      throw new ArgumentValueError(`Empty random range [${low}, ${high}].`);
    }
    return low + Math.floor(this.next() * (high - low + 1));
  }

  choice<T>(values: readonly T[]): T {
    if (values.length === 0) {
      throw new ArgumentValueError("Cannot choose from an empty list.");
    }
    return values[this.uniformInt(0, values.length - 1)];
  }
}

let activeSource: RandomSource = new SeededRandomSource();

/** Create a new source; the same seed always yields the same sequence. */
export function createRandomSource(seed?: string): RandomSource {
  return new SeededRandomSource(seed);
}

/** Replace the source used when no explicit one is passed. */
export function setRandomSource(source: RandomSource): void {
  activeSource = source;
}

/** The source used when no explicit one is passed. */
export function getRandomSource(): RandomSource {
  return activeSource;
}

/** Go back to a freshly seeded default source. */
export function resetRandomSource(): void {
  activeSource = new SeededRandomSource();
}
