/**
 * LiquidBehavior - Physics for liquids (water, molten silica, molten rock)
 *
 * - Falls into gas below, else diagonally down into gas
 * - Else spreads one cell sideways per tick, which bounds lateral flow rate
 * - Stays put under a powder so sand can sink through it instead of floating
 */

import { getRandomDirection } from './IBehavior'
import type { IBehavior, UpdateContext } from './IBehavior'
import type { ElementCategory } from '../types'
import { isGasId, lookup } from '../elements'

export class LiquidBehavior implements IBehavior {
  readonly category: ElementCategory = 'liquid'

  update(ctx: UpdateContext): void {
    const { grid, idx, rng } = ctx
    const w = grid.width

    if (lookup(grid.ids[idx - w]).category === 'powder') return

    // --- 1. Gravity: Fall Down ---
    const below = idx + w
    if (isGasId(grid.ids[below])) {
      grid.swapIdx(idx, below)
      return
    }

    // --- 2. Gravity: Fall Diagonally ---
    const fall = getRandomDirection(rng)
    if (isGasId(grid.ids[below + fall.dx1])) {
      grid.swapIdx(idx, below + fall.dx1)
      return
    }
    if (isGasId(grid.ids[below + fall.dx2])) {
      grid.swapIdx(idx, below + fall.dx2)
      return
    }

    // --- 3. Spread sideways, one cell ---
    const spread = getRandomDirection(rng)
    if (isGasId(grid.ids[idx + spread.dx1])) {
      grid.swapIdx(idx, idx + spread.dx1)
    } else if (isGasId(grid.ids[idx + spread.dx2])) {
      grid.swapIdx(idx, idx + spread.dx2)
    }
  }
}
