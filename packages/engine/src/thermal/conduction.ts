/**
 * Conduction between axis-aligned neighbors
 *
 * Each pair exchanges q = k_eff * dx * dT * dt with k_eff the harmonic mean
 * of both conductivities. Fluxes accumulate in the back energy buffer and are
 * swapped in at the end, so the result does not depend on visiting order.
 */

import type { Grid } from '../core/Grid'
import { lookup } from '../elements'
import { CELL_SIZE_M, CONDUCTION_MAX_PAIR_FRACTION } from '../thermo/constants'
import { snapshotTemperatures } from './context'
import type { ThermalContext } from './context'

export function effectiveConductivity(k1: number, k2: number): number {
  const sum = k1 + k2
  if (sum <= 0) return 0
  return (2 * k1 * k2) / sum
}

/**
 * Heat (J) moving across one face during `dt`, capped at a fraction of the
 * pair's equalization gap so a cell never overshoots its neighbors.
 */
export function pairHeatFlux(
  k1: number,
  k2: number,
  deltaT: number,
  capacity1: number,
  capacity2: number,
  dt: number
): number {
  const kEff = effectiveConductivity(k1, k2)
  if (kEff <= 0 || deltaT === 0) return 0
  if (!(capacity1 > 0) || !(capacity2 > 0)) return 0

  const gap = Math.abs(deltaT)
  const q = kEff * CELL_SIZE_M * gap * dt
  const cap = CONDUCTION_MAX_PAIR_FRACTION * gap * ((capacity1 * capacity2) / (capacity1 + capacity2))
  return Math.min(q, cap)
}

export function conductHeat(grid: Grid, ctx: ThermalContext): void {
  const temps = snapshotTemperatures(grid, ctx)
  const { ids, mass, width, height } = grid
  const current = grid.energy
  const next = grid.energyBack
  next.set(current)

  const exchange = (a: number, b: number): void => {
    const matA = lookup(ids[a])
    const matB = lookup(ids[b])
    const deltaT = temps[a] - temps[b]
    const q = pairHeatFlux(
      matA.heatConductivity,
      matB.heatConductivity,
      deltaT,
      mass[a] * matA.specificHeat,
      mass[b] * matB.specificHeat,
      ctx.dt
    )
    if (q <= 0) return
    if (deltaT > 0) {
      next[a] -= q
      next[b] += q
    } else {
      next[a] += q
      next[b] -= q
    }
  }

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const i = y * width + x
      if (x + 1 < width) exchange(i, i + 1)
      if (y + 1 < height) exchange(i, i + width)
    }
  }

  for (let i = 0; i < grid.size; i++) {
    if (next[i] < 0) next[i] = 0
  }

  grid.swapEnergyBuffers()
}
