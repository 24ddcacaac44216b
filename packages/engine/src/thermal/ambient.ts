/**
 * Ambient coupling
 *
 * Air is an open boundary to an infinite reservoir: its temperature relaxes
 * exponentially toward ambient and its mass/pressure snap to ambient gas
 * values every tick.
 */

import type { Grid } from '../core/Grid'
import { lookup } from '../elements'
import { EL_AIR } from '../types'
import { AMBIENT_RELAX_RATE_PER_S } from '../thermo/constants'
import { energyForTemperature, massForPressureTemperature, temperatureC } from '../thermo/Thermo'
import type { ThermalContext } from './context'

export function relaxFactor(dt: number): number {
  return 1 - Math.exp(-AMBIENT_RELAX_RATE_PER_S * dt)
}

export function coupleAmbient(grid: Grid, ctx: ThermalContext): void {
  const air = lookup(EL_AIR)
  const { ids, mass, pressure } = grid
  const energy = grid.energy
  const f = relaxFactor(ctx.dt)
  const ambientT = ctx.ambientTemperature
  const ambientP = ctx.ambientPressure

  for (let i = 0; i < grid.size; i++) {
    if (ids[i] !== EL_AIR) continue

    const t = temperatureC(air, energy[i], mass[i], pressure[i])
    const relaxed = t + (ambientT - t) * f
    const m = massForPressureTemperature(air, ambientP, relaxed)

    mass[i] = m
    pressure[i] = ambientP
    energy[i] = energyForTemperature(air, relaxed, m, ambientP)
  }
}
