/**
 * Gas pressure diffusion
 *
 * A vapor cell pushes mass into a same-family vapor or air neighbor (left,
 * right, up, down) when its pressure exceeds the neighbor's by a threshold.
 * Energy travels in proportion to mass, so the specific energy of the moved
 * gas is unchanged. Receivers are flagged for the rest of the tick.
 */

import type { Grid } from '../core/Grid'
import { lookup } from '../elements'
import { EL_AIR } from '../types'
import type { MaterialDefinition } from '../types'
import {
  GAS_FLOW_THRESHOLD_PA,
  GAS_MAX_FLOW_FRACTION,
  MIN_GAS_MASS_KG,
} from '../thermo/constants'
import { pressureForMassTemperature, temperatureC, thermoStateFor } from '../thermo/Thermo'
import type { ThermalContext } from './context'

// left, right, up, down
const DX = [-1, 1, 0, 0] as const
const DY = [0, 0, -1, 1] as const

function livePressure(grid: Grid, mat: MaterialDefinition, i: number): number {
  const t = temperatureC(mat, grid.energy[i], grid.mass[i], grid.pressure[i])
  return pressureForMassTemperature(mat, grid.mass[i], t)
}

/** Share of the source's mass that moves for a given pressure pair */
export function flowFraction(sourcePa: number, targetPa: number): number {
  const dp = sourcePa - targetPa
  if (dp <= GAS_FLOW_THRESHOLD_PA || !(sourcePa > 0)) return 0
  return Math.min(GAS_MAX_FLOW_FRACTION, (0.5 * dp) / sourcePa)
}

/**
 * Move `fraction` of cell `from`'s gas into cell `to`.
 * An air receiver becomes the source's material and keeps its own parcel, so
 * the pair's mass and energy are unchanged.
 */
export function transferGas(grid: Grid, from: number, to: number, fraction: number): void {
  const { ids, mass, pressure } = grid
  const energy = grid.energy
  const mat = lookup(ids[from])

  const dm = mass[from] * fraction
  const dE = energy[from] * fraction
  mass[from] -= dm
  energy[from] -= dE

  if (ids[to] === EL_AIR) {
    const m2 = mass[to] + dm
    const e2 = energy[to] + dE
    const t = temperatureC(mat, e2, m2, pressure[from])
    grid.setCellIdx(to, mat.id, e2, m2, pressureForMassTemperature(mat, m2, t))
  } else {
    mass[to] += dm
    energy[to] += dE
  }
  grid.markGasFlow(to)
}

export function diffuseGas(grid: Grid, ctx: ThermalContext): void {
  const { ids, mass, pressure, width, height } = grid

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const i = y * width + x
      const mat = lookup(ids[i])
      if (mat.phase !== 'gas' || ids[i] === EL_AIR) continue
      if (grid.hasGasFlowed(i)) continue

      for (let n = 0; n < 4; n++) {
        const nx = x + DX[n]
        const ny = y + DY[n]
        if (!grid.inBounds(nx, ny)) continue

        const j = ny * width + nx
        const target = ids[j]
        if (target !== EL_AIR && target !== mat.id) continue

        const sourcePa = livePressure(grid, mat, i)
        const targetPa = target === EL_AIR ? ctx.ambientPressure : livePressure(grid, mat, j)
        const fraction = flowFraction(sourcePa, targetPa)
        if (fraction <= 0) continue

        transferGas(grid, i, j, fraction)

        if (mass[i] < MIN_GAS_MASS_KG) break
      }

      if (mass[i] < MIN_GAS_MASS_KG) {
        const air = thermoStateFor(lookup(EL_AIR), ctx.ambientTemperature, ctx.ambientPressure)
        grid.setCellIdx(i, EL_AIR, air.energy, air.mass, air.pressure)
      } else {
        pressure[i] = livePressure(grid, mat, i)
      }
    }
  }
}
