/**
 * Thermodynamics pass, run once per tick after movement.
 *
 * Order matters: radiation subtracts energy before phases are re-evaluated,
 * and venting reads energy against the boil thresholds afterwards.
 */

import type { Grid } from '../core/Grid'
import type { ThermalContext } from './context'
import { recomputePressure } from './pressure'
import { conductHeat } from './conduction'
import { coupleAmbient } from './ambient'
import { radiateHeat } from './radiation'
import { updatePhases } from './phase'
import { ventBoilingLiquids } from './boiling'
import { diffuseGas } from './gasFlow'

export type ThermalPass = (grid: Grid, ctx: ThermalContext) => void

export const THERMAL_PASSES: readonly ThermalPass[] = [
  recomputePressure,
  conductHeat,
  coupleAmbient,
  radiateHeat,
  updatePhases,
  ventBoilingLiquids,
  diffuseGas,
]

export function runThermodynamics(grid: Grid, ctx: ThermalContext): void {
  for (const pass of THERMAL_PASSES) {
    pass(grid, ctx)
  }
}

export type { ThermalContext } from './context'
export { snapshotTemperatures } from './context'
export { recomputePressure } from './pressure'
export { conductHeat, effectiveConductivity, pairHeatFlux } from './conduction'
export { coupleAmbient, relaxFactor } from './ambient'
export { radiateHeat, radiatedPower, exposedFaces } from './radiation'
export { updatePhases } from './phase'
export { ventBoilingLiquids, ventCell, findVentTarget } from './boiling'
export type { VentResult } from './boiling'
export { diffuseGas, transferGas, flowFraction } from './gasFlow'
