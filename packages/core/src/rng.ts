/**
 * Seeded PRNG (xorshift128+) for reproducibility.
 */
import type { Rng } from "./interfaces.js";

export class SeededRng implements Rng {
  private _s0: number;
  private _s1: number;
  private _hasSpare = false;
  private _spare = 0;

  constructor(seed = 42) {
    this._s0 = seed;
    this._s1 = seed ^ 0xdeadbeef;
    this.warmUp();
  }

  /** Returns a number in [0, 1). */
  next(): number {
    let s1 = this._s0;
    const s0 = this._s1;
    this._s0 = s0;
    s1 ^= s1 << 23;
    s1 ^= s1 >>> 17;
    s1 ^= s0;
    s1 ^= s0 >>> 26;
    this._s1 = s1;
    return ((this._s0 + this._s1) >>> 0) / 0x100000000;
  }

  /** Uniform sample in [lo, hi). */
  uniform(lo: number, hi: number): number {
    return lo + (hi - lo) * this.next();
  }

  /** Integer in [0, n). */
  int(n: number): number {
    return Math.floor(this.next() * n);
  }

  /** Box-Muller transform for Gaussian samples. */
  nextGauss(): number {
    if (this._hasSpare) {
      this._hasSpare = false;
      return this._spare;
    }
    let u: number, v: number, s: number;
    do {
      u = this.next() * 2 - 1;
      v = this.next() * 2 - 1;
      s = u * u + v * v;
    } while (s >= 1 || s === 0);
    const mul = Math.sqrt(-2.0 * Math.log(s) / s);
    this._spare = v * mul;
    this._hasSpare = true;
    return u * mul;
  }

  /** Fisher-Yates shuffle of a copy. */
  shuffle<T>(items: readonly T[]): T[] {
    const out = items.slice();
    for (let i = out.length - 1; i > 0; i--) {
      const j = this.int(i + 1);
      const tmp = out[i];
      out[i] = out[j];
      out[j] = tmp;
    }
    return out;
  }

  private warmUp(): void {
    for (let i = 0; i < 20; i++) this.next();
  }
}
