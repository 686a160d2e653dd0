/**
 * Seeded pseudo-random numbers (mulberry32) with Box-Muller normals
 */
export class Random {
  private state: number;
  private cachedGaussian: number | null = null;

  constructor(seed: number = 42) {
    this.state = seed | 0;
  }

  /** Uniform in [0, 1) */
  next(): number {
    this.state = (this.state + 0x6D2B79F5) | 0;
    let t = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /** Uniform in [min, max) */
  uniform(min: number, max: number): number {
    return min + (max - min) * this.next();
  }

  /** Standard normal sample */
  gaussian(): number {
    if (this.cachedGaussian !== null) {
      const result = this.cachedGaussian;
      this.cachedGaussian = null;
      return result;
    }

    let u1: number;
    let u2: number;
    do {
      u1 = this.next();
      u2 = this.next();
    } while (u1 <= 1e-12);

    const mag = Math.sqrt(-2.0 * Math.log(u1));
    this.cachedGaussian = mag * Math.sin(2.0 * Math.PI * u2);
    return mag * Math.cos(2.0 * Math.PI * u2);
  }

  normal(mean: number, std: number): number {
    return mean + std * this.gaussian();
  }
}
