/**
 * GasBehavior - Physics for vapors (steam, silica and rock vapor)
 *
 * Gases are "inverted liquids": they rise into air, then drift diagonally up,
 * then sideways. Air itself never moves on its own, it is only displaced.
 */

import { getRandomDirection } from './IBehavior'
import type { IBehavior, UpdateContext } from './IBehavior'
import { EL_AIR } from '../types'
import type { ElementCategory } from '../types'

export class GasBehavior implements IBehavior {
  readonly category: ElementCategory = 'gas'

  update(ctx: UpdateContext): void {
    const { grid, idx, rng } = ctx
    const ids = grid.ids
    const above = idx - grid.width

    // --- 1. Rise UP ---
    if (ids[above] === EL_AIR) {
      grid.swapIdx(idx, above)
      return
    }

    // --- 2. Rise DIAGONALLY ---
    const rise = getRandomDirection(rng)
    if (ids[above + rise.dx1] === EL_AIR) {
      grid.swapIdx(idx, above + rise.dx1)
      return
    }
    if (ids[above + rise.dx2] === EL_AIR) {
      grid.swapIdx(idx, above + rise.dx2)
      return
    }

    // --- 3. Drift sideways ---
    const drift = getRandomDirection(rng)
    if (ids[idx + drift.dx1] === EL_AIR) {
      grid.swapIdx(idx, idx + drift.dx1)
    } else if (ids[idx + drift.dx2] === EL_AIR) {
      grid.swapIdx(idx, idx + drift.dx2)
    }
  }
}
