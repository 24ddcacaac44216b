import { describe, it, expect, vi } from 'vitest'
import { Grid } from '../core/Grid'
import { lookup } from '../elements'
import {
  EL_AIR, EL_BEDROCK, EL_ICE, EL_STEAM, EL_STONE, EL_WATER,
} from '../types'
import {
  coupleAmbient,
  conductHeat,
  diffuseGas,
  effectiveConductivity,
  flowFraction,
  pairHeatFlux,
  radiatedPower,
  radiateHeat,
  recomputePressure,
  relaxFactor,
  updatePhases,
  ventCell,
} from '../thermal'
import {
  CELL_SIZE_M,
  DEFAULT_AMBIENT_PRESSURE_PA,
  TICK_DT_S,
} from '../thermo/constants'
import {
  energyForTemperature,
  energyThresholds,
  pressureForMassTemperature,
  temperatureC,
} from '../thermo/Thermo'
import type { Logger } from '../logging/log'
import { airGrid, makeThermalContext, place } from './helpers'

const P = DEFAULT_AMBIENT_PRESSURE_PA

function tempAt(grid: Grid, i: number): number {
  return temperatureC(lookup(grid.ids[i]), grid.energy[i], grid.mass[i], grid.pressure[i])
}

function totalEnergy(grid: Grid, ...cells: number[]): number {
  return cells.reduce((sum, i) => sum + grid.energy[i], 0)
}

describe('Thermodynamics passes', () => {
  describe('pressure', () => {
    it('adds hydrostatic weight down a column', () => {
      const grid = airGrid(1, 3)
      place(grid, 0, 1, EL_WATER)
      place(grid, 0, 2, EL_WATER)

      recomputePressure(grid, makeThermalContext(grid))

      expect(grid.pressure[1] - grid.pressure[0]).toBeCloseTo(490.5, 6)
      expect(grid.pressure[2] - grid.pressure[1]).toBeCloseTo(490.5, 6)
    })

    it('resets the column under immobile terrain', () => {
      const grid = airGrid(1, 3)
      place(grid, 0, 0, EL_WATER)
      place(grid, 0, 1, EL_STONE)
      place(grid, 0, 2, EL_WATER)

      recomputePressure(grid, makeThermalContext(grid))

      expect(grid.pressure[0]).toBeCloseTo(P + 490.5, 6)
      expect(grid.pressure[1]).toBe(P)
      expect(grid.pressure[2]).toBeCloseTo(P + 490.5, 6)
    })

    it('gives gas cells their ideal-gas pressure', () => {
      const grid = airGrid(1, 1)
      const i = place(grid, 0, 0, EL_STEAM, 200, 3 * P)

      recomputePressure(grid, makeThermalContext(grid))

      expect(grid.pressure[i]).toBeCloseTo(3 * P, 3)
    })
  })

  describe('conduction', () => {
    it('uses the harmonic mean of conductivities', () => {
      expect(effectiveConductivity(2, 2)).toBe(2)
      expect(effectiveConductivity(1, 3)).toBe(1.5)
      expect(effectiveConductivity(0, 5)).toBe(0)
      expect(effectiveConductivity(0, 0)).toBe(0)
    })

    it('caps a pair at a share of its equalization gap', () => {
      expect(pairHeatFlux(1000, 1000, 100, 1e-9, 1e-9, 1)).toBeCloseTo(0.25 * 100 * 5e-10, 20)
      expect(pairHeatFlux(1, 1, 0, 1, 1, 1)).toBe(0)
    })

    it('moves heat from hot to cold and conserves energy', () => {
      const grid = new Grid(2, 1)
      const hot = place(grid, 0, 0, EL_STONE, 100)
      const cold = place(grid, 1, 0, EL_STONE, 0)
      const before = totalEnergy(grid, hot, cold)
      const capacity = grid.mass[hot] * lookup(EL_STONE).specificHeat
      const q = 2.8 * CELL_SIZE_M * 100 * TICK_DT_S

      conductHeat(grid, makeThermalContext(grid))

      expect(tempAt(grid, hot)).toBeCloseTo(100 - q / capacity, 9)
      expect(tempAt(grid, cold)).toBeCloseTo(q / capacity, 9)
      expect(totalEnergy(grid, hot, cold)).toBeCloseTo(before, 12)
    })

    it('leaves a uniform field unchanged', () => {
      const grid = airGrid(3, 3)
      const before = Array.from(grid.energy)
      conductHeat(grid, makeThermalContext(grid))
      expect(Array.from(grid.energy)).toEqual(before)
    })
  })

  describe('ambient coupling', () => {
    it('relaxes air toward ambient', () => {
      const grid = airGrid(1, 1)
      place(grid, 0, 0, EL_AIR, 100)
      const f = relaxFactor(TICK_DT_S)

      coupleAmbient(grid, makeThermalContext(grid))

      expect(f).toBeCloseTo(1 - Math.exp(-1.5 / 60), 12)
      expect(tempAt(grid, 0)).toBeCloseTo(100 - 80 * f, 9)
      expect(grid.pressure[0]).toBe(P)
    })

    it('ignores non-air cells', () => {
      const grid = airGrid(1, 1)
      place(grid, 0, 0, EL_WATER, 60)
      const energy = grid.energy[0]
      coupleAmbient(grid, makeThermalContext(grid))
      expect(grid.energy[0]).toBe(energy)
    })
  })

  describe('radiation', () => {
    it('radiates only through faces exposed to gas', () => {
      const grid = new Grid(3, 1)
      place(grid, 0, 0, EL_AIR)
      const exposed = place(grid, 1, 0, EL_STONE, 1000)
      const enclosed = place(grid, 2, 0, EL_STONE, 1000)
      const before = [grid.energy[exposed], grid.energy[enclosed]]

      radiateHeat(grid, makeThermalContext(grid))

      expect(before[0] - grid.energy[exposed]).toBeCloseTo(radiatedPower(0.9, 1, 1000, 20) * TICK_DT_S, 12)
      expect(grid.energy[enclosed]).toBe(before[1])
    })

    it('does not radiate below visible heat', () => {
      const grid = airGrid(3, 3)
      const i = place(grid, 1, 1, EL_STONE, 600)
      const energy = grid.energy[i]
      radiateHeat(grid, makeThermalContext(grid))
      expect(grid.energy[i]).toBe(energy)
    })
  })

  describe('phase re-evaluation', () => {
    it('turns hot water into steam and cold water into ice', () => {
      const grid = airGrid(2, 1)
      grid.setCellIdx(0, EL_WATER, energyForTemperature(lookup(EL_WATER), 150, 1e-6, P), 1e-6, P)
      grid.setCellIdx(1, EL_WATER, energyForTemperature(lookup(EL_WATER), -10, 1e-6, P), 1e-6, P)

      updatePhases(grid, makeThermalContext(grid))

      expect(grid.ids[0]).toBe(EL_STEAM)
      expect(grid.ids[1]).toBe(EL_ICE)
    })

    it('resets non-finite cells and reports them', () => {
      const warn = vi.fn()
      const logger: Logger = { debug: vi.fn(), warn, error: vi.fn() }
      const grid = airGrid(1, 1)
      grid.setCellIdx(0, EL_WATER, Number.NaN, 1e-6, P)

      updatePhases(grid, makeThermalContext(grid, logger))

      expect(warn).toHaveBeenCalledTimes(1)
      expect(grid.ids[0]).toBe(EL_WATER)
      expect(tempAt(grid, 0)).toBeCloseTo(20, 9)
    })

    it('keeps vapor too thin to fill a cell as gas', () => {
      const grid = airGrid(2, 1)
      const steam = lookup(EL_STEAM)
      const thin = 7.5e-10
      grid.setCellIdx(0, EL_STEAM, energyForTemperature(steam, 20, thin, P), thin, P)
      grid.setCellIdx(1, EL_STEAM, energyForTemperature(steam, 20, 1e-6, P), 1e-6, P)

      updatePhases(grid, makeThermalContext(grid))

      expect(grid.ids[0]).toBe(EL_STEAM)
      expect(grid.ids[1]).toBe(EL_WATER)
    })

    it('never touches bedrock', () => {
      const grid = airGrid(1, 1)
      grid.setCellIdx(0, EL_BEDROCK, 1e6, 2.7e-6, P)
      updatePhases(grid, makeThermalContext(grid))
      expect(grid.ids[0]).toBe(EL_BEDROCK)
    })
  })

  describe('boiling', () => {
    function superheated(grid: Grid, x: number, y: number, mass: number, latentShare: number): number {
      const th = energyThresholds('water', mass, P)
      const i = grid.index(x, y)
      grid.setCellIdx(i, EL_WATER, th.boilStart + latentShare * mass * 2_256_000, mass, P)
      return i
    }

    it('vents vapor into air above and conserves the pair', () => {
      const grid = airGrid(1, 2)
      const water = superheated(grid, 0, 1, 1e-6, 0.01)
      const air = { mass: grid.mass[0], energy: grid.energy[0] }
      const mass = air.mass + grid.mass[water]
      const energy = totalEnergy(grid, 0, water)

      const result = ventCell(grid, 0, 1)

      expect(result.target).toBe(0)
      expect(result.mass).toBeCloseTo(1e-8, 20)
      expect(grid.ids[0]).toBe(EL_STEAM)
      expect(grid.ids[water]).toBe(EL_WATER)
      expect(grid.mass[0]).toBe(air.mass + result.mass)
      expect(grid.energy[0]).toBe(air.energy + result.energy)
      expect(grid.mass[0] + grid.mass[water]).toBeCloseTo(mass, 20)
      expect(totalEnergy(grid, 0, water)).toBeCloseTo(energy, 12)
    })

    it('limits the vented share per tick', () => {
      const grid = airGrid(1, 2)
      superheated(grid, 0, 1, 1e-6, 0.5)
      expect(ventCell(grid, 0, 1).mass).toBeCloseTo(0.05 * 1e-6, 20)
    })

    it('does not vent without an open neighbor', () => {
      const grid = new Grid(1, 1)
      superheated(grid, 0, 0, 1e-6, 0.5)
      expect(ventCell(grid, 0, 0).mass).toBe(0)
      expect(grid.mass[0]).toBe(1e-6)
    })

    it('turns a nearly dry cell into vapor', () => {
      const grid = airGrid(1, 2)
      const water = superheated(grid, 0, 1, 1.05e-7, 0.5)
      ventCell(grid, 0, 1)
      expect(grid.ids[water]).toBe(EL_STEAM)
    })

    it('ignores liquids below the boil threshold', () => {
      const grid = airGrid(1, 2)
      place(grid, 0, 1, EL_WATER, 60)
      expect(ventCell(grid, 0, 1).target).toBe(-1)
      expect(grid.ids[0]).toBe(EL_AIR)
    })
  })

  describe('gas diffusion', () => {
    function steamCell(grid: Grid, x: number, y: number, mass: number, tempC: number): number {
      const steam = lookup(EL_STEAM)
      const p = pressureForMassTemperature(steam, mass, tempC)
      const i = grid.index(x, y)
      grid.setCellIdx(i, EL_STEAM, energyForTemperature(steam, tempC, mass, p), mass, p)
      return i
    }

    function bedrockGrid(width: number, height: number): Grid {
      const grid = new Grid(width, height)
      grid.fill(EL_BEDROCK, 0, 2.7e-6, P)
      return grid
    }

    it('computes the flow fraction from the pressure gap', () => {
      expect(flowFraction(1000, 960)).toBe(0)
      expect(flowFraction(1000, 900)).toBeCloseTo(0.05, 12)
      expect(flowFraction(1e6, 0)).toBe(0.25)
    })

    it('moves mass and energy between vapor cells and conserves both', () => {
      const grid = bedrockGrid(4, 3)
      const a = steamCell(grid, 1, 1, 1e-9, 200)
      const b = steamCell(grid, 2, 1, 1e-10, 200)
      const mass = grid.mass[a] + grid.mass[b]
      const energy = totalEnergy(grid, a, b)
      grid.beginTick()

      diffuseGas(grid, makeThermalContext(grid))

      expect(grid.mass[a]).toBeCloseTo(0.75e-9, 20)
      expect(grid.mass[b]).toBeCloseTo(3.5e-10, 20)
      expect(grid.mass[a] + grid.mass[b]).toBeCloseTo(mass, 20)
      expect(totalEnergy(grid, a, b)).toBeCloseTo(energy, 15)
      expect(grid.hasGasFlowed(b)).toBe(true)
    })

    it('pushes overpressure into air and conserves the pair', () => {
      const grid = airGrid(2, 1)
      const src = steamCell(grid, 0, 0, 1e-9, 200)
      const airMass = grid.mass[1]
      const mass = grid.mass[src] + airMass
      const energy = totalEnergy(grid, src, 1)
      grid.beginTick()

      diffuseGas(grid, makeThermalContext(grid))

      expect(grid.ids[1]).toBe(EL_STEAM)
      expect(grid.mass[src]).toBeCloseTo(0.75e-9, 20)
      expect(grid.mass[1]).toBeCloseTo(airMass + 0.25e-9, 20)
      expect(grid.mass[src] + grid.mass[1]).toBeCloseTo(mass, 20)
      expect(totalEnergy(grid, src, 1)).toBeCloseTo(energy, 15)
    })

    it('does not flow below the threshold', () => {
      const grid = bedrockGrid(3, 1)
      const a = steamCell(grid, 0, 0, 5e-10, 200)
      const b = steamCell(grid, 1, 0, 5e-10, 200)
      grid.beginTick()

      diffuseGas(grid, makeThermalContext(grid))

      expect(grid.mass[a]).toBe(5e-10)
      expect(grid.mass[b]).toBe(5e-10)
    })
  })
})
