/**
 * IBehavior - Interface for movement behaviors
 * Open/Closed Principle: new movement classes plug in without touching the world loop
 */

import type { Grid } from '../core/Grid'
import type { Random } from '../core/Random'
import type { ElementCategory } from '../types'

export interface UpdateContext {
  grid: Grid
  x: number
  y: number
  idx: number
  rng: Random
}

export interface IBehavior {
  readonly category: ElementCategory
  update(ctx: UpdateContext): void
}

// Random left/right priority, one bit from the world's stream
export function getRandomDirection(rng: Random): { dx1: number; dx2: number } {
  const goLeft = rng.nextBoolean()
  return {
    dx1: goLeft ? -1 : 1,
    dx2: goLeft ? 1 : -1
  }
}
