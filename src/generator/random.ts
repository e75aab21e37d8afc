import { createHash } from "node:crypto";

/**
 * Small deterministic PRNG (mulberry32). Every instance owns one, so parallel
 * generation never shares random state.
 */
export class SeededRandom {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  /** Uniform float in `[0, 1)`. */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /** Uniform integer in `[min, max]`, both inclusive. */
  int(min: number, max: number): number {
    if (max < min) {
      throw new RangeError(`Empty integer range [${min}, ${max}]`);
    }
    return min + Math.floor(this.next() * (max - min + 1));
  }

  pick<T>(values: readonly T[]): T {
    if (values.length === 0) {
      throw new RangeError("Cannot pick from an empty list");
    }
    return values[this.int(0, values.length - 1)];
  }

  /** Fisher–Yates shuffle into a new array. */
  shuffle<T>(values: readonly T[]): T[] {
    const result = [...values];
    for (let index = result.length - 1; index > 0; index -= 1) {
      const swap = this.int(0, index);
      [result[index], result[swap]] = [result[swap], result[index]];
    }
    return result;
  }

  /** Unsigned 32-bit seed for a follow-up stream. */
  nextSeed(): number {
    return Math.floor(this.next() * 4294967296) >>> 0;
  }
}

/**
 * Derives an instance seed from the run seed and the instance coordinates by
 * hashing them, so neighbouring instances get unrelated streams.
 */
export function deriveSeed(baseSeed: number, ...parts: Array<string | number>): number {
  const digest = createHash("sha256").update([baseSeed, ...parts].join("\u0000")).digest();
  return digest.readUInt32BE(0);
}
