/**
 * PowderBehavior - Physics for granular solids (sand)
 * Falls straight down, else slides diagonally, sinking through any gas or liquid
 */

import { getRandomDirection } from './IBehavior'
import type { IBehavior, UpdateContext } from './IBehavior'
import type { ElementCategory, ElementId } from '../types'
import { lookup } from '../elements'

export function canPowderEnter(targetId: ElementId): boolean {
  return lookup(targetId).phase !== 'solid'
}

export class PowderBehavior implements IBehavior {
  readonly category: ElementCategory = 'powder'

  update(ctx: UpdateContext): void {
    const { grid, idx, rng } = ctx
    const below = idx + grid.width

    if (canPowderEnter(grid.ids[below])) {
      grid.swapIdx(idx, below)
      return
    }

    const { dx1, dx2 } = getRandomDirection(rng)

    if (canPowderEnter(grid.ids[below + dx1])) {
      grid.swapIdx(idx, below + dx1)
      return
    }

    if (canPowderEnter(grid.ids[below + dx2])) {
      grid.swapIdx(idx, below + dx2)
    }
  }
}
