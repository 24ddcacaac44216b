// Global constants for the heat, pressure and gas model.
// Keep tuning values here so the passes don't drift apart.

/** Approx. absolute zero, °C */
export const MIN_TEMP_C = -273
/** Game design ceiling, °C */
export const MAX_TEMP_C = 10_000

export const KELVIN_OFFSET = 273.15

/**
 * Edge length of one cell in meters.
 * Mass scales with dx³ while conduction contact scales with dx,
 * so a smaller cell equalizes faster.
 */
export const CELL_SIZE_M = 0.001
export const CELL_VOLUME_M3 = CELL_SIZE_M * CELL_SIZE_M * CELL_SIZE_M
/** Used for hydrostatic pressure and radiation */
export const CELL_FACE_AREA_M2 = CELL_SIZE_M * CELL_SIZE_M

export const DEFAULT_AMBIENT_TEMP_C = 20
export const DEFAULT_AMBIENT_PRESSURE_PA = 101_325

/** Simulated seconds per tick */
export const TICK_DT_S = 1 / 60

export const GRAVITY_M_S2 = 9.81

/**
 * Hydrostatic gameplay scaling. With 1 mm cells the real delta over a few
 * hundred rows is tiny; ~50 makes the boil point visibly depend on depth.
 */
export const PRESSURE_SCALE = 50

// === Radiation ===
export const STEFAN_BOLTZMANN = 5.670374419e-8
/** Start of visible red heat */
export const RADIATION_VISIBLE_START_C = 700
export const RADIATION_SCALE = 1

// === Ambient reservoir ===
/** Exponential relaxation rate of air toward ambient, per second */
export const AMBIENT_RELAX_RATE_PER_S = 1.5

// === Conduction ===
/** Max share of a pair's equalization gap moved per tick (4 neighbors => no overshoot) */
export const CONDUCTION_MAX_PAIR_FRACTION = 0.25

// === Boiling / venting ===
/** Max share of a liquid cell's mass that can vent per tick */
export const BOIL_MAX_FRACTION_PER_TICK = 0.05
/** A liquid below this share of its condensed mass turns fully into vapor */
export const MIN_LIQUID_MASS_FRACTION = 0.1

// === Gas ===
export const MIN_PRESSURE_PA = 1
export const MAX_GAS_PRESSURE_PA = 5e7
export const MIN_GAS_MASS_KG = 1e-15
export const MAX_GAS_MASS_KG = 1e-5
/** Pressure differential a gas needs before it flows */
export const GAS_FLOW_THRESHOLD_PA = 50
export const GAS_MAX_FLOW_FRACTION = 0.25

// === Water boiling curve (Clausius-Clapeyron clamps) ===
export const WATER_TRIPLE_POINT_PA = 611.657
export const WATER_CRITICAL_PRESSURE_PA = 22_064_000
