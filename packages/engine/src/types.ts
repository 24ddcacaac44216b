/**
 * Core types for the material simulation engine
 *
 * Element ids are small dense integers so the grid can store them in a
 * Uint8Array and resolve definitions with a plain array index.
 */

// =============================================================================
// ELEMENT IDS
// =============================================================================

export type ElementId = number

export const EL_AIR = 0
export const EL_STONE = 1
export const EL_SAND = 2
export const EL_WATER = 3
export const EL_BEDROCK = 4
export const EL_ICE = 5
export const EL_STEAM = 6
export const EL_MOLTEN_SILICA = 7
export const EL_SILICA_VAPOR = 8
export const EL_MOLTEN_ROCK = 9
export const EL_ROCK_VAPOR = 10

export const ELEMENT_COUNT = 11

// =============================================================================
// CLASSIFICATION
// =============================================================================

/** Substance a material belongs to; each family has one solid, liquid and gas variant. */
export type MaterialFamily = 'air' | 'water' | 'sand' | 'rock'

export type Phase = 'solid' | 'liquid' | 'gas'

/**
 * Movement class, used to pick the behavior that moves a cell.
 * - ambient: air, never moves by itself (it is displaced)
 * - static: terrain that never moves
 * - powder: granular solid, falls and piles
 * - floating: solid that rises through denser liquids
 */
export type ElementCategory = 'ambient' | 'static' | 'powder' | 'floating' | 'liquid' | 'gas'

// =============================================================================
// MATERIAL DEFINITION
// =============================================================================

export interface MaterialDefinition {
  readonly id: ElementId
  readonly key: string
  readonly name: string
  /** Packed ARGB (0xAARRGGBB) */
  readonly color: number
  readonly family: MaterialFamily
  readonly phase: Phase
  readonly category: ElementCategory
  /** Never participates in movement */
  readonly immobile: boolean
  /** Never changes phase, whatever its energy says */
  readonly phaseLocked: boolean
  /** kg/m³ */
  readonly density: number
  /** J/kg/K */
  readonly specificHeat: number
  /** W/m/K */
  readonly heatConductivity: number
  /** 0..1 */
  readonly emissivity: number
  /** Specific gas constant in J/kg/K, 0 for condensed matter */
  readonly gasConstant: number
}

// =============================================================================
// RENDER TYPES
// =============================================================================

export type RenderMode = 'normal' | 'thermal'
