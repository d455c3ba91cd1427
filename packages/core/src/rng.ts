/**
 * Seeded PRNG (xorshift128+ over two 32-bit words) backing the random
 * creation ops and dropout masks.
 */

/** splitmix32 step; spreads nearby seeds across the state space. */
function mix(x: number): number {
  let z = (x + 0x9e3779b9) | 0;
  z = Math.imul(z ^ (z >>> 16), 0x85ebca6b);
  z = Math.imul(z ^ (z >>> 13), 0xc2b2ae35);
  return (z ^ (z >>> 16)) | 0;
}

export class SeededRng {
  private s0 = 0;
  private s1 = 0;
  private initial = 0;
  private spare: number | null = null;

  constructor(seed = 42) {
    this.seed(seed);
  }

  seed(s: number): void {
    this.initial = s | 0;
    this.s0 = mix(this.initial);
    this.s1 = mix(this.s0);
    // An all-zero state would stay zero forever.
    if (this.s0 === 0 && this.s1 === 0) this.s1 = 1;
    this.spare = null;
  }

  /** The seed the current stream started from. */
  state(): number {
    return this.initial;
  }

  setState(s: number): void {
    this.seed(s);
  }

  /** Uniform in [0, 1). */
  next(): number {
    let a = this.s0;
    const b = this.s1;
    this.s0 = b;
    a ^= a << 23;
    a ^= a >>> 17;
    a ^= b ^ (b >>> 26);
    this.s1 = a;
    return ((this.s0 + this.s1) >>> 0) / 0x100000000;
  }

  /** Standard normal sample (polar Box-Muller; the second value is cached). */
  nextGauss(): number {
    if (this.spare !== null) {
      const v = this.spare;
      this.spare = null;
      return v;
    }
    let u: number;
    let v: number;
    let s: number;
    do {
      u = this.next() * 2 - 1;
      v = this.next() * 2 - 1;
      s = u * u + v * v;
    } while (s >= 1 || s === 0);
    const m = Math.sqrt((-2 * Math.log(s)) / s);
    this.spare = v * m;
    return u * m;
  }
}
