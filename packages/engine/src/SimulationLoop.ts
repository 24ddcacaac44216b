/**
 * Fixed-timestep driver around a World.
 *
 * The host calls `advance(dtMs)` once per frame (requestAnimationFrame,
 * setInterval, a test). Wall time is scaled by speed and converted into
 * whole BASE_STEP_MS ticks; a slow frame never runs more than
 * MAX_STEPS_PER_FRAME ticks and drops the rest of its backlog.
 */

import type { World } from './core/World'
import { FpsCounter } from './FpsCounter'
import { BASE_STEP_MS, MAX_DT_MS, MAX_STEPS_PER_FRAME, STATS_INTERVAL_MS } from './timing'
import { defaultLogger } from './logging/log'
import type { Logger } from './logging/log'

export type SimulationSpeed = 0.5 | 1 | 2 | 4

export interface LoopStats {
  fps: number
  tickCount: number
  stepsLastFrame: number
}

export interface SimulationLoopOptions {
  speed?: SimulationSpeed
  logger?: Logger
  /** Called at most every STATS_INTERVAL_MS of accumulated frame time */
  onStats?: (stats: LoopStats) => void
}

export class SimulationLoop {
  private readonly world: World
  private readonly logger: Logger
  private readonly fps = new FpsCounter()
  private readonly onStats: ((stats: LoopStats) => void) | undefined

  private _speed: SimulationSpeed
  private _isPlaying = false
  private _crashed = false
  private stepAccumulator = 0
  private sinceStats = 0
  private _stepsLastFrame = 0

  constructor(world: World, options: SimulationLoopOptions = {}) {
    this.world = world
    this.logger = options.logger ?? defaultLogger
    this._speed = options.speed ?? 1
    this.onStats = options.onStats
  }

  get isPlaying(): boolean { return this._isPlaying }
  get crashed(): boolean { return this._crashed }
  get speed(): SimulationSpeed { return this._speed }
  get stepsLastFrame(): number { return this._stepsLastFrame }

  set speed(speed: SimulationSpeed) {
    this._speed = speed
  }

  play(): void {
    if (this._crashed) {
      this.logger.warn('Simulation crashed; reset before playing again')
      return
    }
    this._isPlaying = true
  }

  pause(): void {
    this._isPlaying = false
    this.stepAccumulator = 0
  }

  /** Clears the crash flag and any pending backlog */
  reset(): void {
    this._crashed = false
    this._isPlaying = false
    this.stepAccumulator = 0
    this._stepsLastFrame = 0
    this.sinceStats = 0
    this.fps.reset()
  }

  /**
   * Run exactly one tick, playing or not.
   * Returns false when the world threw.
   */
  stepOnce(): boolean {
    if (this._crashed) return false
    return this.runSteps(1) === 1
  }

  /** Advance by one frame of wall time. Returns the number of ticks run. */
  advance(dtMs: number): number {
    const dt = Number.isFinite(dtMs) && dtMs > 0 ? dtMs : 0
    this.fps.addFrame(dt)

    let steps = 0
    if (this._isPlaying && !this._crashed) {
      const clampedDt = Math.min(dt, MAX_DT_MS)
      const safeSpeed = Number.isFinite(this._speed) && this._speed > 0 ? this._speed : 1

      this.stepAccumulator += (safeSpeed * clampedDt) / BASE_STEP_MS
      steps = Math.floor(this.stepAccumulator)
      if (steps > MAX_STEPS_PER_FRAME) {
        steps = MAX_STEPS_PER_FRAME
        this.stepAccumulator = 0
      } else {
        this.stepAccumulator -= steps
      }

      steps = this.runSteps(steps)
    }
    this._stepsLastFrame = steps

    this.sinceStats += dt
    if (this.onStats && this.sinceStats >= STATS_INTERVAL_MS) {
      this.sinceStats = 0
      this.onStats(this.stats())
    }
    return steps
  }

  stats(): LoopStats {
    return {
      fps: this.fps.getAverage(),
      tickCount: this.world.tickId,
      stepsLastFrame: this._stepsLastFrame,
    }
  }

  private runSteps(count: number): number {
    let done = 0
    try {
      for (; done < count; done++) {
        this.world.step()
      }
    } catch (e) {
      this.logger.error('Simulation crashed:', e)
      this._isPlaying = false
      this._crashed = true
      this.stepAccumulator = 0
    }
    return done
  }
}
