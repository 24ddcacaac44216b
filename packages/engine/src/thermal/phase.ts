/**
 * Phase re-evaluation
 *
 * Recomputes every non-air cell's material from its energy, mass and
 * pressure. Cells whose state went non-finite are reset to the ambient state
 * so a tick never propagates NaN.
 */

import type { Grid } from '../core/Grid'
import { lookup } from '../elements'
import { EL_AIR } from '../types'
import { thermoStateFor, updatePhase } from '../thermo/Thermo'
import type { ThermalContext } from './context'

export function updatePhases(grid: Grid, ctx: ThermalContext): void {
  const { ids, mass, pressure } = grid
  const energy = grid.energy

  for (let i = 0; i < grid.size; i++) {
    const mat = lookup(ids[i])

    if (!Number.isFinite(energy[i]) || !Number.isFinite(mass[i]) || !(mass[i] > 0) || !Number.isFinite(pressure[i])) {
      ctx.logger.warn(`Resetting cell ${i} (${mat.name}) with non-finite state`)
      const state = thermoStateFor(mat, ctx.ambientTemperature, ctx.ambientPressure)
      grid.setCellIdx(i, mat.id, state.energy, state.mass, state.pressure)
    }

    if (ids[i] === EL_AIR || mat.phaseLocked) continue

    const next = updatePhase(mat, energy[i], mass[i], pressure[i])
    if (next.id !== mat.id) ids[i] = next.id
  }
}
