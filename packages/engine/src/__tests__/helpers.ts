import { Grid } from '../core/Grid'
import { lookup } from '../elements'
import type { ElementId } from '../types'
import type { ThermalContext } from '../thermal'
import { silentLogger } from '../logging/log'
import type { Logger } from '../logging/log'
import { DEFAULT_AMBIENT_PRESSURE_PA, DEFAULT_AMBIENT_TEMP_C, TICK_DT_S } from '../thermo/constants'
import { thermoStateFor } from '../thermo/Thermo'

export function makeThermalContext(grid: Grid, logger: Logger = silentLogger): ThermalContext {
  return {
    ambientTemperature: DEFAULT_AMBIENT_TEMP_C,
    ambientPressure: DEFAULT_AMBIENT_PRESSURE_PA,
    dt: TICK_DT_S,
    temps: new Float64Array(grid.size),
    logger,
  }
}

/** Grid filled with ambient air */
export function airGrid(width: number, height: number): Grid {
  const grid = new Grid(width, height)
  const air = thermoStateFor(lookup(0), DEFAULT_AMBIENT_TEMP_C, DEFAULT_AMBIENT_PRESSURE_PA)
  grid.fill(0, air.energy, air.mass, air.pressure)
  return grid
}

/** Place a material at the given temperature; mass follows from the pressure */
export function place(
  grid: Grid,
  x: number,
  y: number,
  id: ElementId,
  tempC: number = DEFAULT_AMBIENT_TEMP_C,
  pressurePa: number = DEFAULT_AMBIENT_PRESSURE_PA
): number {
  const idx = grid.index(x, y)
  const state = thermoStateFor(lookup(id), tempC, pressurePa)
  grid.setCellIdx(idx, id, state.energy, state.mass, state.pressure)
  return idx
}
