/**
 * Seeded pseudo-random generator (mulberry32)
 *
 * 32-bit state, period 2^32. Not cryptographic: used for deterministic
 * per-line decisions and as the fallback keystream.
 */
export class SeededRandom {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  /**
   * Next unsigned 32-bit value
   */
  nextUint32(): number {
    this.state = (this.state + 0x6D2B79F5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return (t ^ (t >>> 14)) >>> 0;
  }

  /**
   * Uniform float in [0, 1)
   */
  nextFloat(): number {
    return this.nextUint32() / 0x100000000;
  }

  /**
   * Uniform integer in [0, max)
   */
  nextInt(max: number): number {
    if (!(max > 0)) {
      throw new RangeError(`nextInt bound must be positive, got ${max}`);
    }
    return Math.floor(this.nextFloat() * max);
  }

  /**
   * Fill a buffer with generator output, 4 bytes per step, little-endian
   */
  fillBytes(out: Uint8Array): Uint8Array {
    for (let i = 0; i < out.length; i += 4) {
      const word = this.nextUint32();
      for (let b = 0; b < 4 && i + b < out.length; b++) {
        out[i + b] = (word >>> (8 * b)) & 0xFF;
      }
    }
    return out;
  }

  /**
   * In-place Fisher-Yates shuffle
   */
  shuffle<T>(items: T[]): T[] {
    for (let i = items.length - 1; i > 0; i--) {
      const j = this.nextInt(i + 1);
      const tmp = items[i];
      items[i] = items[j];
      items[j] = tmp;
    }
    return items;
  }
}
