import { InvalidArgumentError } from './errors'
import { DEFAULT_AMBIENT_PRESSURE_PA, DEFAULT_AMBIENT_TEMP_C } from './thermo/constants'
import { clampTempC } from './thermo/Thermo'

// ============================================
// WORLD SETTINGS
// ============================================
export interface WorldSettings {
  /** °C */
  ambientTemperature: number
  /** Pa */
  ambientPressure: number
}

export const DEFAULT_WORLD_SETTINGS: Readonly<WorldSettings> = {
  ambientTemperature: DEFAULT_AMBIENT_TEMP_C,
  ambientPressure: DEFAULT_AMBIENT_PRESSURE_PA,
}

export function validateTemperature(tempC: number, what = 'temperature'): number {
  if (!Number.isFinite(tempC)) {
    throw new InvalidArgumentError(`${what} must be a finite number, got ${tempC}`)
  }
  return clampTempC(tempC)
}

export function validatePressure(pressurePa: number, what = 'pressure'): number {
  if (!Number.isFinite(pressurePa) || pressurePa <= 0) {
    throw new InvalidArgumentError(`${what} must be a positive finite number, got ${pressurePa}`)
  }
  return pressurePa
}

export function resolveWorldSettings(partial: Partial<WorldSettings> = {}): WorldSettings {
  return {
    ambientTemperature: validateTemperature(
      partial.ambientTemperature ?? DEFAULT_WORLD_SETTINGS.ambientTemperature,
      'ambientTemperature'
    ),
    ambientPressure: validatePressure(
      partial.ambientPressure ?? DEFAULT_WORLD_SETTINGS.ambientPressure,
      'ambientPressure'
    ),
  }
}
