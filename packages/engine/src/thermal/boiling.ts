/**
 * Boiling / venting
 *
 * The enthalpy model alone would pin a boiling liquid at its boil plateau
 * forever. Here the energy above the plateau start turns into vapor mass at a
 * bounded rate and escapes into an adjacent air or same-family vapor cell.
 */

import type { Grid } from '../core/Grid'
import { lookup } from '../elements'
import { FAMILY_PHASES } from '../families'
import { EL_AIR } from '../types'
import type { ElementId } from '../types'
import { BOIL_MAX_FRACTION_PER_TICK, MIN_LIQUID_MASS_FRACTION } from '../thermo/constants'
import {
  condensedMassKg,
  createEnergyThresholds,
  energyThresholds,
  pressureForMassTemperature,
  temperatureC,
} from '../thermo/Thermo'
import type { ThermalContext } from './context'

function openCell(grid: Grid, nx: number, ny: number, vaporId: ElementId): number {
  if (!grid.inBounds(nx, ny)) return -1
  const j = grid.index(nx, ny)
  const id = grid.ids[j]
  return id === EL_AIR || id === vaporId ? j : -1
}

/** Vented vapor prefers to go up, then sideways, then down */
export function findVentTarget(grid: Grid, x: number, y: number, vaporId: ElementId): number {
  let j = openCell(grid, x, y - 1, vaporId)
  if (j < 0) j = openCell(grid, x - 1, y, vaporId)
  if (j < 0) j = openCell(grid, x + 1, y, vaporId)
  if (j < 0) j = openCell(grid, x, y + 1, vaporId)
  return j
}

export interface VentResult {
  /** kg moved out of the liquid */
  mass: number
  /** J moved out of the liquid */
  energy: number
  /** Receiving cell, -1 when nothing vented */
  target: number
}

const NO_VENT: VentResult = { mass: 0, energy: 0, target: -1 }
const thresholds = createEnergyThresholds()

/**
 * Vent one liquid cell. Returns what moved; the sum of mass and energy over
 * the liquid and the receiving cell is unchanged.
 */
export function ventCell(grid: Grid, x: number, y: number): VentResult {
  const i = grid.index(x, y)
  const mat = lookup(grid.ids[i])
  if (mat.phase !== 'liquid' || mat.phaseLocked) return NO_VENT

  const phases = FAMILY_PHASES[mat.family]
  const latent = phases.latentVaporization
  if (latent <= 0) return NO_VENT

  const { ids, mass, pressure } = grid
  const energy = grid.energy
  const m = mass[i]
  if (!(m > 0)) return NO_VENT

  const boilStart = energyThresholds(mat.family, m, pressure[i], thresholds).boilStart
  const excess = energy[i] - boilStart
  if (excess < 0) return NO_VENT

  const dm = Math.min(excess / latent, m * BOIL_MAX_FRACTION_PER_TICK)
  if (!(dm > 0)) return NO_VENT

  const vapor = lookup(phases.gas)
  const target = findVentTarget(grid, x, y, vapor.id)
  if (target < 0) return NO_VENT

  // Vapor leaves at the liquid's boil-start specific energy plus latent heat
  const dE = dm * (boilStart / m + latent)

  mass[i] = m - dm
  energy[i] -= dE

  if (ids[target] === EL_AIR) {
    // The air parcel stays in the cell, mixed into the new vapor
    const m2 = mass[target] + dm
    const e2 = energy[target] + dE
    const t = temperatureC(vapor, e2, m2, pressure[i])
    grid.setCellIdx(target, vapor.id, e2, m2, pressureForMassTemperature(vapor, m2, t))
  } else {
    mass[target] += dm
    energy[target] += dE
  }

  if (mass[i] < MIN_LIQUID_MASS_FRACTION * condensedMassKg(mat)) {
    ids[i] = vapor.id
  }

  return { mass: dm, energy: dE, target }
}

export function ventBoilingLiquids(grid: Grid, _ctx: ThermalContext): void {
  const { width, height } = grid
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      ventCell(grid, x, y)
    }
  }
}
