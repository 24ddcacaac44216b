/**
 * Random - seedable mulberry32 stream
 *
 * Owned by the world and used only to break left/right symmetry.
 * Reseeding resets the stream in place.
 */
export class Random {
  private state: number

  constructor(seed: number) {
    this.state = Random.normalizeSeed(seed)
  }

  reseed(seed: number): void {
    this.state = Random.normalizeSeed(seed)
  }

  /** Uniform float in [0, 1) */
  next(): number {
    this.state = (this.state + 0x6D2B79F5) | 0
    let r = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state)
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r)
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296
  }

  nextBoolean(): boolean {
    return this.next() < 0.5
  }

  // Accepts any finite number; fractional and huge seeds fold into 32 bits
  private static normalizeSeed(seed: number): number {
    if (!Number.isFinite(seed)) return 0
    const int = Math.trunc(seed)
    return (int ^ Math.trunc(int / 4294967296)) >>> 0
  }
}
