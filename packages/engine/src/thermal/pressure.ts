/**
 * Pressure field
 *
 * Gas cells get their ideal-gas pressure. Condensed cells accumulate weight
 * top to bottom per column, starting from whatever sits above them
 * (ambient, or the gas pocket directly above). Immobile terrain carries its
 * own weight and resets the column to ambient.
 */

import type { Grid } from '../core/Grid'
import { lookup } from '../elements'
import {
  CELL_FACE_AREA_M2,
  GRAVITY_M_S2,
  MAX_GAS_PRESSURE_PA,
  PRESSURE_SCALE,
} from '../thermo/constants'
import { pressureForMassTemperature } from '../thermo/Thermo'
import { snapshotTemperatures } from './context'
import type { ThermalContext } from './context'

export function recomputePressure(grid: Grid, ctx: ThermalContext): void {
  const temps = snapshotTemperatures(grid, ctx)
  const { ids, mass, pressure, width, height } = grid
  const ambient = ctx.ambientPressure
  const weightScale = (GRAVITY_M_S2 / CELL_FACE_AREA_M2) * PRESSURE_SCALE

  for (let x = 0; x < width; x++) {
    let column = ambient
    for (let y = 0; y < height; y++) {
      const i = y * width + x
      const mat = lookup(ids[i])

      if (mat.phase === 'gas') {
        pressure[i] = pressureForMassTemperature(mat, mass[i], temps[i])
        column = pressure[i]
      } else if (mat.immobile) {
        pressure[i] = ambient
        column = ambient
      } else {
        column = Math.min(column + mass[i] * weightScale, MAX_GAS_PRESSURE_PA)
        pressure[i] = column
      }
    }
  }
}
