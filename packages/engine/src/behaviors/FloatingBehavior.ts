/**
 * FloatingBehavior - Solids lighter than their melt (ice)
 * Buoyancy by density comparison: rises through a strictly denser liquid,
 * otherwise falls through gas like a powder.
 */

import { getRandomDirection } from './IBehavior'
import type { IBehavior, UpdateContext } from './IBehavior'
import type { ElementCategory } from '../types'
import { getDensityById, isGasId, isLiquidId } from '../elements'

export class FloatingBehavior implements IBehavior {
  readonly category: ElementCategory = 'floating'

  update(ctx: UpdateContext): void {
    const { grid, idx, rng } = ctx
    const ids = grid.ids
    const w = grid.width
    const density = getDensityById(ids[idx])

    const above = ids[idx - w]
    if (isLiquidId(above) && getDensityById(above) > density) {
      grid.swapIdx(idx, idx - w)
      return
    }

    const below = idx + w
    if (isGasId(ids[below])) {
      grid.swapIdx(idx, below)
      return
    }

    const { dx1, dx2 } = getRandomDirection(rng)
    if (isGasId(ids[below + dx1])) {
      grid.swapIdx(idx, below + dx1)
      return
    }
    if (isGasId(ids[below + dx2])) {
      grid.swapIdx(idx, below + dx2)
    }
  }
}
