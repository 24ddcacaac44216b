/**
 * Public API of the material simulation engine
 */

// Types and material table
export * from './types'
export {
  ELEMENT_DATA,
  lookup,
  isGasId,
  isLiquidId,
  getDensityById,
  paletteForUI,
} from './elements'
export { FAMILY_PHASES, familyPhases, solidOf, liquidOf, gasOf, phaseVariant } from './families'
export type { FamilyPhases } from './families'

// Thermodynamics
export * from './thermo/constants'
export {
  clampTempC,
  toKelvin,
  toCelsius,
  meltingPointC,
  boilingPointC,
  energyThresholds,
  createEnergyThresholds,
  temperatureC,
  energyForTemperature,
  updatePhase,
  condensedMassKg,
  isIdealGas,
  massForPressureTemperature,
  pressureForMassTemperature,
  thermoStateFor,
} from './thermo/Thermo'
export type { EnergyThresholds, CellThermoState } from './thermo/Thermo'

// World
export { World } from './core/World'
export type { WorldOptions } from './core/World'
export { Random } from './core/Random'
export { temperatureToColor, HEATMAP_ANCHORS } from './rendering'

// Runtime
export { SimulationLoop } from './SimulationLoop'
export type { SimulationLoopOptions, SimulationSpeed, LoopStats } from './SimulationLoop'
export { FpsCounter } from './FpsCounter'
export { createSimulationStore } from './simulationStore'
export type { SimulationState, SimulationStore, SimulationStoreOptions } from './simulationStore'

// Ambient stack
export { SimulationError, InvalidArgumentError, InvalidDimensionError } from './errors'
export { DEFAULT_WORLD_SETTINGS, resolveWorldSettings } from './config'
export type { WorldSettings } from './config'
export * from './timing'
export { consoleLogger, silentLogger, defaultLogger, setLogger, setErrorReporter, debugLog, debugWarn, logError } from './logging/log'
export type { Logger, ErrorReporter } from './logging/log'
