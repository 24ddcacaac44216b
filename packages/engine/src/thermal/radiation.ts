/**
 * Radiative cooling (Stefan-Boltzmann)
 *
 * Only glowing condensed cells radiate, and only through faces that touch a
 * gas. A cell enclosed by condensed matter keeps its heat.
 */

import type { Grid } from '../core/Grid'
import { isGasId, lookup } from '../elements'
import {
  CELL_FACE_AREA_M2,
  RADIATION_SCALE,
  RADIATION_VISIBLE_START_C,
  STEFAN_BOLTZMANN,
} from '../thermo/constants'
import { energyForTemperature, toKelvin } from '../thermo/Thermo'
import { snapshotTemperatures } from './context'
import type { ThermalContext } from './context'

export function exposedFaces(grid: Grid, x: number, y: number): number {
  let exposed = 0
  if (isGasId(grid.getId(x - 1, y))) exposed++
  if (isGasId(grid.getId(x + 1, y))) exposed++
  if (isGasId(grid.getId(x, y - 1))) exposed++
  if (isGasId(grid.getId(x, y + 1))) exposed++
  return exposed
}

/** Net radiated power (W) of one cell at tempC into surroundings at ambientC */
export function radiatedPower(emissivity: number, exposed: number, tempC: number, ambientC: number): number {
  const t4 = toKelvin(tempC) ** 4
  const a4 = toKelvin(ambientC) ** 4
  return emissivity * STEFAN_BOLTZMANN * CELL_FACE_AREA_M2 * exposed * (t4 - a4) * RADIATION_SCALE
}

export function radiateHeat(grid: Grid, ctx: ThermalContext): void {
  const temps = snapshotTemperatures(grid, ctx)
  const { ids, mass, pressure, width, height } = grid
  const energy = grid.energy

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const i = y * width + x
      const t = temps[i]
      if (t <= RADIATION_VISIBLE_START_C) continue

      const mat = lookup(ids[i])
      if (mat.phase === 'gas' || mat.emissivity <= 0) continue

      const exposed = exposedFaces(grid, x, y)
      if (exposed === 0) continue

      const power = radiatedPower(mat.emissivity, exposed, t, ctx.ambientTemperature)
      if (power <= 0) continue

      // Never radiate below the cell's energy at ambient temperature
      const floor = energyForTemperature(mat, ctx.ambientTemperature, mass[i], pressure[i])
      const headroom = energy[i] - floor
      if (headroom <= 0) continue

      energy[i] -= Math.min(power * ctx.dt, headroom)
    }
  }
}
