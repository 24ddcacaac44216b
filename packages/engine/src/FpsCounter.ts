/**
 * Zero-allocation FPS counter using a ring buffer
 *
 * Float32Array as fixed-size ring buffer, no Array.push/shift per frame
 */

import { FPS_SAMPLES } from './timing'

export class FpsCounter {
  private buffer: Float32Array
  private index: number = 0
  private size: number
  private count: number = 0 // How many slots are actually filled

  constructor(size: number = FPS_SAMPLES) {
    this.size = Math.max(1, Math.floor(size))
    this.buffer = new Float32Array(this.size)
  }

  /** Add one sample from a frame duration; non-positive durations are ignored */
  addFrame(dtMs: number): void {
    if (!(dtMs > 0) || !Number.isFinite(dtMs)) return
    this.add(1000 / dtMs)
  }

  add(fps: number): void {
    this.buffer[this.index] = fps
    this.index = (this.index + 1) % this.size
    if (this.count < this.size) this.count++
  }

  /** Smoothed average FPS, rounded */
  getAverage(): number {
    if (this.count === 0) return 0

    let sum = 0
    for (let i = 0; i < this.count; i++) {
      sum += this.buffer[i]
    }
    return Math.round(sum / this.count)
  }

  get samples(): number {
    return this.count
  }

  reset(): void {
    this.count = 0
    this.index = 0
  }
}
