/**
 * Material definitions with all physical properties
 *
 * Materials are stored in a flat array indexed by ElementId,
 * which gives O(1) access without hash lookups.
 */

import {
  type ElementId,
  ELEMENT_COUNT,
  EL_AIR, EL_STONE, EL_SAND, EL_WATER, EL_BEDROCK, EL_ICE,
  EL_STEAM, EL_MOLTEN_SILICA, EL_SILICA_VAPOR, EL_MOLTEN_ROCK, EL_ROCK_VAPOR,
} from './types'
import type { MaterialDefinition } from './types'

// Color helper - convert hex string to packed ARGB
function argb(hex: string, alpha = 255): number {
  const num = parseInt(hex.replace('#', ''), 16)
  return ((alpha << 24) | num) >>> 0
}

// ============================================
// MATERIAL DATA - Flat array indexed by ElementId
// ============================================
export const ELEMENT_DATA: readonly MaterialDefinition[] = [
  // 0: Air - a real thermodynamic medium coupled to the ambient reservoir
  {
    id: EL_AIR,
    key: 'air',
    name: 'Air',
    color: argb('#000000'),
    family: 'air',
    phase: 'gas',
    category: 'ambient',
    immobile: false,
    phaseLocked: true,
    density: 1.225,
    specificHeat: 1005,
    heatConductivity: 0.024,
    emissivity: 0,
    gasConstant: 287.05,
  },
  // 1: Stone
  {
    id: EL_STONE,
    key: 'stone',
    name: 'Stone',
    color: argb('#6B6B6B'),
    family: 'rock',
    phase: 'solid',
    category: 'static',
    immobile: true,
    phaseLocked: false,
    density: 2700,
    specificHeat: 790,
    heatConductivity: 2.8,
    emissivity: 0.9,
    gasConstant: 0,
  },
  // 2: Sand
  {
    id: EL_SAND,
    key: 'sand',
    name: 'Sand',
    color: argb('#E1C16E'),
    family: 'sand',
    phase: 'solid',
    category: 'powder',
    immobile: false,
    phaseLocked: false,
    density: 1600,
    specificHeat: 830,
    heatConductivity: 0.27,
    emissivity: 0.9,
    gasConstant: 0,
  },
  // 3: Water
  {
    id: EL_WATER,
    key: 'water',
    name: 'Water',
    color: argb('#3D8BFF'),
    family: 'water',
    phase: 'liquid',
    category: 'liquid',
    immobile: false,
    phaseLocked: false,
    density: 1000,
    specificHeat: 4182,
    heatConductivity: 0.6,
    emissivity: 0.96,
    gasConstant: 0,
  },
  // 4: Bedrock - border / containment, never moves or melts
  {
    id: EL_BEDROCK,
    key: 'bedrock',
    name: 'Bedrock',
    color: argb('#4A4A4A'),
    family: 'rock',
    phase: 'solid',
    category: 'static',
    immobile: true,
    phaseLocked: true,
    density: 2700,
    specificHeat: 790,
    heatConductivity: 2.8,
    emissivity: 0.9,
    gasConstant: 0,
  },
  // 5: Ice
  {
    id: EL_ICE,
    key: 'ice',
    name: 'Ice',
    color: argb('#D8F0FF'),
    family: 'water',
    phase: 'solid',
    category: 'floating',
    immobile: false,
    phaseLocked: false,
    density: 917,
    specificHeat: 2050,
    heatConductivity: 2.22,
    emissivity: 0.97,
    gasConstant: 0,
  },
  // 6: Steam
  {
    id: EL_STEAM,
    key: 'steam',
    name: 'Steam',
    color: argb('#CCCCCC'),
    family: 'water',
    phase: 'gas',
    category: 'gas',
    immobile: false,
    phaseLocked: false,
    density: 0.6,
    specificHeat: 2010,
    heatConductivity: 0.025,
    emissivity: 0,
    gasConstant: 461.5,
  },
  // 7: Molten Silica
  {
    id: EL_MOLTEN_SILICA,
    key: 'molten_silica',
    name: 'Molten Silica',
    color: argb('#FF9A2E'),
    family: 'sand',
    phase: 'liquid',
    category: 'liquid',
    immobile: false,
    phaseLocked: false,
    density: 2200,
    specificHeat: 1000,
    heatConductivity: 1.5,
    emissivity: 0.8,
    gasConstant: 0,
  },
  // 8: Silica Vapor
  {
    id: EL_SILICA_VAPOR,
    key: 'silica_vapor',
    name: 'Silica Vapor',
    color: argb('#BFA6FF'),
    family: 'sand',
    phase: 'gas',
    category: 'gas',
    immobile: false,
    phaseLocked: false,
    density: 1.0,
    specificHeat: 1200,
    heatConductivity: 0.03,
    emissivity: 0,
    gasConstant: 138.4,
  },
  // 9: Molten Rock
  {
    id: EL_MOLTEN_ROCK,
    key: 'molten_rock',
    name: 'Molten Rock',
    color: argb('#FF3B1F'),
    family: 'rock',
    phase: 'liquid',
    category: 'liquid',
    immobile: false,
    phaseLocked: false,
    density: 2600,
    specificHeat: 1200,
    heatConductivity: 1.5,
    emissivity: 0.9,
    gasConstant: 0,
  },
  // 10: Rock Vapor
  {
    id: EL_ROCK_VAPOR,
    key: 'rock_vapor',
    name: 'Rock Vapor',
    color: argb('#FF66CC'),
    family: 'rock',
    phase: 'gas',
    category: 'gas',
    immobile: false,
    phaseLocked: false,
    density: 1.2,
    specificHeat: 1300,
    heatConductivity: 0.04,
    emissivity: 0,
    gasConstant: 120,
  },
]

// The grid relies on ids being dense and in table order
for (let i = 0; i < ELEMENT_COUNT; i++) {
  const def = ELEMENT_DATA[i]
  if (!def || def.id !== i) {
    throw new Error(`Material table is not dense: missing or misplaced id ${i}`)
  }
}

// ============================================
// FAST LOOKUPS
// ============================================

/**
 * Resolve a material by id. Unknown ids fall back to air.
 */
export function lookup(id: ElementId): MaterialDefinition {
  if (!Number.isInteger(id) || id < 0 || id >= ELEMENT_COUNT) return ELEMENT_DATA[EL_AIR]
  return ELEMENT_DATA[id]
}

export function isGasId(id: ElementId): boolean {
  return lookup(id).phase === 'gas'
}

export function isLiquidId(id: ElementId): boolean {
  return lookup(id).phase === 'liquid'
}

export function getDensityById(id: ElementId): number {
  return lookup(id).density
}

// What the player can paint directly.
// Phase variants (ice, steam, molten forms) only come from temperature changes.
const PALETTE: readonly MaterialDefinition[] = [
  ELEMENT_DATA[EL_STONE],
  ELEMENT_DATA[EL_BEDROCK],
  ELEMENT_DATA[EL_SAND],
  ELEMENT_DATA[EL_WATER],
]

export function paletteForUI(): readonly MaterialDefinition[] {
  return PALETTE
}
