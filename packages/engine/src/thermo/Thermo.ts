/**
 * Thermo - energy / temperature / mass / pressure conversions
 *
 * Each cell stores energy (J), not temperature. Temperature and phase are
 * derived through a piecewise-linear enthalpy model:
 *
 *   solid ramp -> melt plateau (Tm) -> liquid ramp -> boil plateau (Tb) -> gas ramp
 *
 * The model works in kelvin so stored energies stay non-negative; the public
 * API speaks °C. Water's boil point follows local pressure, other families
 * use fixed boundaries.
 */

import type { MaterialDefinition, MaterialFamily } from '../types'
import { lookup } from '../elements'
import { FAMILY_PHASES, gasOf } from '../families'
import {
  CELL_VOLUME_M3,
  DEFAULT_AMBIENT_PRESSURE_PA,
  KELVIN_OFFSET,
  MAX_GAS_MASS_KG,
  MAX_GAS_PRESSURE_PA,
  MAX_TEMP_C,
  MIN_GAS_MASS_KG,
  MIN_LIQUID_MASS_FRACTION,
  MIN_PRESSURE_PA,
  MIN_TEMP_C,
  WATER_CRITICAL_PRESSURE_PA,
  WATER_TRIPLE_POINT_PA,
} from './constants'

export interface EnergyThresholds {
  /** °C */
  meltPoint: number
  /** °C, at the pressure the thresholds were computed for */
  boilPoint: number
  meltStart: number
  meltEnd: number
  boilStart: number
  boilEnd: number
  cpSolid: number
  cpLiquid: number
  cpGas: number
}

export interface CellThermoState {
  mass: number
  energy: number
  pressure: number
}

function clamp(v: number, min: number, max: number): number {
  if (v < min) return min
  return v > max ? max : v
}

export function clampTempC(tempC: number): number {
  return clamp(tempC, MIN_TEMP_C, MAX_TEMP_C)
}

export function toKelvin(tempC: number): number {
  return tempC + KELVIN_OFFSET
}

export function toCelsius(tempK: number): number {
  return tempK - KELVIN_OFFSET
}

// ============================================
// PHASE BOUNDARIES
// ============================================

export function meltingPointC(family: MaterialFamily): number {
  return FAMILY_PHASES[family].meltPoint
}

/**
 * Boil point at the given pressure.
 * Water uses an idealized Clausius-Clapeyron relation:
 *   1/T = 1/T_ref - (R_vapor / L_vapor) * ln(P / P_ref)
 */
export function boilingPointC(family: MaterialFamily, pressurePa: number): number {
  const phases = FAMILY_PHASES[family]
  if (!phases.pressureDependentBoiling || !Number.isFinite(pressurePa)) return phases.boilPoint

  const p = clamp(pressurePa, WATER_TRIPLE_POINT_PA, WATER_CRITICAL_PRESSURE_PA)
  const rVapor = gasOf(family).gasConstant
  const inverse =
    1 / toKelvin(phases.boilPoint) -
    (rVapor / phases.latentVaporization) * Math.log(p / DEFAULT_AMBIENT_PRESSURE_PA)

  const tempC = inverse > 0 ? toCelsius(1 / inverse) : MAX_TEMP_C
  // Keep a non-empty liquid band
  return clamp(tempC, phases.meltPoint + 1, MAX_TEMP_C)
}

export function createEnergyThresholds(): EnergyThresholds {
  return {
    meltPoint: 0,
    boilPoint: 0,
    meltStart: 0,
    meltEnd: 0,
    boilStart: 0,
    boilEnd: 0,
    cpSolid: 0,
    cpLiquid: 0,
    cpGas: 0,
  }
}

// Reused by the per-cell conversions below; never handed out
const scratch = createEnergyThresholds()

/**
 * Energy band edges for a cell. Per-cell callers pass their own `out` record.
 */
export function energyThresholds(
  family: MaterialFamily,
  massKg: number,
  pressurePa: number,
  out: EnergyThresholds = createEnergyThresholds()
): EnergyThresholds {
  const phases = FAMILY_PHASES[family]
  const m = massKg > 0 ? massKg : 0

  const cpSolid = lookup(phases.solid).specificHeat
  const cpLiquid = lookup(phases.liquid).specificHeat
  const cpGas = lookup(phases.gas).specificHeat

  const meltPoint = phases.meltPoint
  const boilPoint = boilingPointC(family, pressurePa)

  const meltStart = m * cpSolid * toKelvin(meltPoint)
  const meltEnd = meltStart + m * phases.latentFusion
  const boilStart = meltEnd + m * cpLiquid * (boilPoint - meltPoint)
  const boilEnd = boilStart + m * phases.latentVaporization

  out.meltPoint = meltPoint
  out.boilPoint = boilPoint
  out.meltStart = meltStart
  out.meltEnd = meltEnd
  out.boilStart = boilStart
  out.boilEnd = boilEnd
  out.cpSolid = cpSolid
  out.cpLiquid = cpLiquid
  out.cpGas = cpGas
  return out
}

// ============================================
// ENERGY <-> TEMPERATURE
// ============================================

/**
 * Temperature (°C) of a cell. Phase only matters on plateaus, where the
 * temperature is pinned whatever the material.
 */
export function temperatureC(
  material: MaterialDefinition,
  energyJ: number,
  massKg: number,
  pressurePa: number
): number {
  if (material.family === 'air') {
    const capacity = massKg * material.specificHeat
    if (!(capacity > 0)) return MIN_TEMP_C
    return clampTempC(toCelsius(energyJ / capacity))
  }

  const th = energyThresholds(material.family, massKg, pressurePa, scratch)
  const m = massKg > 0 ? massKg : 0

  let tempK: number
  if (energyJ < th.meltStart) {
    const denom = m * th.cpSolid
    tempK = denom > 0 ? energyJ / denom : 0
  } else if (energyJ < th.meltEnd) {
    tempK = toKelvin(th.meltPoint)
  } else if (energyJ < th.boilStart) {
    const denom = m * th.cpLiquid
    tempK = toKelvin(th.meltPoint) + (denom > 0 ? (energyJ - th.meltEnd) / denom : 0)
  } else if (energyJ < th.boilEnd) {
    tempK = toKelvin(th.boilPoint)
  } else {
    const denom = m * th.cpGas
    tempK = toKelvin(th.boilPoint) + (denom > 0 ? (energyJ - th.boilEnd) / denom : 0)
  }

  return clampTempC(toCelsius(tempK))
}

/**
 * Energy a cell holds at the given temperature.
 *
 * A temperature exactly on a phase boundary resolves to the side matching the
 * material's current phase:
 * - at the melt point: solids get the start of the plateau, others the end
 * - at the boil point: gases get the end of the plateau, others the start
 */
export function energyForTemperature(
  material: MaterialDefinition,
  tempC: number,
  massKg: number,
  pressurePa: number
): number {
  const t = clampTempC(tempC)
  const m = massKg > 0 ? massKg : 0

  if (material.family === 'air') {
    return m * material.specificHeat * toKelvin(t)
  }

  const th = energyThresholds(material.family, m, pressurePa, scratch)

  if (t < th.meltPoint) return m * th.cpSolid * toKelvin(t)
  if (t > th.boilPoint) return th.boilEnd + m * th.cpGas * (t - th.boilPoint)
  if (t > th.meltPoint && t < th.boilPoint) return th.meltEnd + m * th.cpLiquid * (t - th.meltPoint)

  if (t === th.meltPoint) {
    return material.phase === 'solid' ? th.meltStart : th.meltEnd
  }
  return material.phase === 'gas' ? th.boilEnd : th.boilStart
}

// ============================================
// PHASE
// ============================================

/**
 * Phase variant of the material's family whose energy band contains `energyJ`.
 *
 * Inside a plateau a material bordering it keeps its phase (solid/liquid
 * while melting, liquid/gas while boiling); anything else snaps to the
 * nearer side of the plateau midpoint. A gas holding less than
 * `MIN_LIQUID_MASS_FRACTION` of the condensed cell mass stays gas.
 */
export function updatePhase(
  material: MaterialDefinition,
  energyJ: number,
  massKg: number,
  pressurePa: number
): MaterialDefinition {
  if (material.phaseLocked || material.family === 'air') return material

  const next = bandVariant(material, energyJ, massKg, pressurePa)
  if (
    material.phase === 'gas' &&
    next.phase !== 'gas' &&
    !(massKg >= MIN_LIQUID_MASS_FRACTION * condensedMassKg(next))
  ) {
    return material
  }
  return next
}

function bandVariant(
  material: MaterialDefinition,
  energyJ: number,
  massKg: number,
  pressurePa: number
): MaterialDefinition {
  const phases = FAMILY_PHASES[material.family]
  const solid = lookup(phases.solid)
  const liquid = lookup(phases.liquid)
  const gas = lookup(phases.gas)

  const th = energyThresholds(material.family, massKg, pressurePa, scratch)

  if (energyJ <= th.meltStart) return solid
  if (energyJ >= th.boilEnd) return gas
  if (energyJ >= th.meltEnd && energyJ <= th.boilStart) return liquid

  if (energyJ < th.meltEnd) {
    if (material.phase === 'solid' || material.phase === 'liquid') return material
    return energyJ < (th.meltStart + th.meltEnd) * 0.5 ? solid : liquid
  }

  if (material.phase === 'liquid' || material.phase === 'gas') return material
  return energyJ < (th.boilStart + th.boilEnd) * 0.5 ? liquid : gas
}

// ============================================
// IDEAL GAS (pV = mRT over one cell)
// ============================================

export function condensedMassKg(material: MaterialDefinition): number {
  return material.density * CELL_VOLUME_M3
}

export function isIdealGas(material: MaterialDefinition): boolean {
  return material.phase === 'gas' && material.gasConstant > 0
}

export function massForPressureTemperature(
  material: MaterialDefinition,
  pressurePa: number,
  tempC: number
): number {
  if (!isIdealGas(material)) return condensedMassKg(material)

  const p = Number.isFinite(pressurePa) ? clamp(pressurePa, MIN_PRESSURE_PA, MAX_GAS_PRESSURE_PA) : MIN_PRESSURE_PA
  const tempK = Math.max(toKelvin(clampTempC(tempC)), 1)
  const mass = (p * CELL_VOLUME_M3) / (material.gasConstant * tempK)
  return clamp(mass, MIN_GAS_MASS_KG, MAX_GAS_MASS_KG)
}

/**
 * Ideal-gas pressure of a cell. Condensed matter has no equation of state
 * here and reports the reference pressure.
 */
export function pressureForMassTemperature(
  material: MaterialDefinition,
  massKg: number,
  tempC: number
): number {
  if (!isIdealGas(material)) return DEFAULT_AMBIENT_PRESSURE_PA

  const m = massKg > 0 ? massKg : 0
  const tempK = Math.max(toKelvin(clampTempC(tempC)), 0)
  const p = (m * material.gasConstant * tempK) / CELL_VOLUME_M3
  return Number.isFinite(p) ? clamp(p, MIN_PRESSURE_PA, MAX_GAS_PRESSURE_PA) : MIN_PRESSURE_PA
}

/**
 * Mass / energy / pressure of a freshly placed cell at the given temperature.
 */
export function thermoStateFor(
  material: MaterialDefinition,
  tempC: number,
  pressurePa: number
): CellThermoState {
  const mass = massForPressureTemperature(material, pressurePa, tempC)
  return {
    mass,
    energy: energyForTemperature(material, tempC, mass, pressurePa),
    pressure: pressurePa,
  }
}
