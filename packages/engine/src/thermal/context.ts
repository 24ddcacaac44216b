import type { Grid } from '../core/Grid'
import type { Logger } from '../logging/log'
import { lookup } from '../elements'
import { temperatureC } from '../thermo/Thermo'

export interface ThermalContext {
  /** °C */
  ambientTemperature: number
  /** Pa */
  ambientPressure: number
  /** Simulated seconds per tick */
  dt: number
  /** Scratch buffer, one temperature (°C) per cell */
  temps: Float64Array
  logger: Logger
}

/**
 * Fill `ctx.temps` from the current energy/mass/pressure.
 * Every pass that compares temperatures reads this snapshot, not live values.
 */
export function snapshotTemperatures(grid: Grid, ctx: ThermalContext): Float64Array {
  const { ids, mass, pressure } = grid
  const energy = grid.energy
  const temps = ctx.temps
  for (let i = 0; i < grid.size; i++) {
    temps[i] = temperatureC(lookup(ids[i]), energy[i], mass[i], pressure[i])
  }
  return temps
}
