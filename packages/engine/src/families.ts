/**
 * Family -> phase table
 *
 * Every substance family names one solid, liquid and gas material plus the
 * constants of its phase boundaries. Air maps every phase to itself.
 */

import {
  EL_AIR, EL_ICE, EL_WATER, EL_STEAM,
  EL_SAND, EL_MOLTEN_SILICA, EL_SILICA_VAPOR,
  EL_STONE, EL_MOLTEN_ROCK, EL_ROCK_VAPOR,
} from './types'
import type { ElementId, MaterialDefinition, MaterialFamily, Phase } from './types'
import { lookup } from './elements'

export interface FamilyPhases {
  solid: ElementId
  liquid: ElementId
  gas: ElementId
  /** °C */
  meltPoint: number
  /** °C at the reference pressure */
  boilPoint: number
  /** J/kg */
  latentFusion: number
  /** J/kg */
  latentVaporization: number
  /** Boil point follows local pressure (Clausius-Clapeyron) */
  pressureDependentBoiling: boolean
}

export const FAMILY_PHASES: Readonly<Record<MaterialFamily, Readonly<FamilyPhases>>> = {
  air: {
    solid: EL_AIR,
    liquid: EL_AIR,
    gas: EL_AIR,
    meltPoint: Number.POSITIVE_INFINITY,
    boilPoint: Number.POSITIVE_INFINITY,
    latentFusion: 0,
    latentVaporization: 0,
    pressureDependentBoiling: false,
  },
  // Typical values at 1 atm
  water: {
    solid: EL_ICE,
    liquid: EL_WATER,
    gas: EL_STEAM,
    meltPoint: 0,
    boilPoint: 100,
    latentFusion: 333_550,
    latentVaporization: 2_256_000,
    pressureDependentBoiling: true,
  },
  // Silica, game approximation
  sand: {
    solid: EL_SAND,
    liquid: EL_MOLTEN_SILICA,
    gas: EL_SILICA_VAPOR,
    meltPoint: 1550,
    boilPoint: 2230,
    latentFusion: 156_000,
    latentVaporization: 10_000_000,
    pressureDependentBoiling: false,
  },
  // Granite-like, game approximation
  rock: {
    solid: EL_STONE,
    liquid: EL_MOLTEN_ROCK,
    gas: EL_ROCK_VAPOR,
    meltPoint: 1250,
    boilPoint: 3000,
    latentFusion: 400_000,
    latentVaporization: 5_000_000,
    pressureDependentBoiling: false,
  },
}

export function familyPhases(family: MaterialFamily): Readonly<FamilyPhases> {
  return FAMILY_PHASES[family]
}

export function solidOf(family: MaterialFamily): MaterialDefinition {
  return lookup(FAMILY_PHASES[family].solid)
}

export function liquidOf(family: MaterialFamily): MaterialDefinition {
  return lookup(FAMILY_PHASES[family].liquid)
}

export function gasOf(family: MaterialFamily): MaterialDefinition {
  return lookup(FAMILY_PHASES[family].gas)
}

export function phaseVariant(family: MaterialFamily, phase: Phase): MaterialDefinition {
  switch (phase) {
    case 'solid':
      return solidOf(family)
    case 'liquid':
      return liquidOf(family)
    case 'gas':
      return gasOf(family)
  }
}
