/**
 * World - public facade over the grid
 * Single Responsibility: owns grid, rng and ambient settings, delegates
 * movement to behaviors and heat to the thermal passes
 * Open/Closed: new movement classes register in the behavior map
 */

import type { ElementCategory, MaterialDefinition } from '../types'
import { EL_AIR } from '../types'
import { lookup } from '../elements'
import { Grid } from './Grid'
import { Random } from './Random'
import {
  FloatingBehavior,
  GasBehavior,
  LiquidBehavior,
  PowderBehavior,
} from '../behaviors'
import type { IBehavior, UpdateContext } from '../behaviors'
import { InvalidArgumentError, InvalidDimensionError } from '../errors'
import { resolveWorldSettings, validatePressure, validateTemperature } from '../config'
import type { WorldSettings } from '../config'
import { defaultLogger } from '../logging/log'
import type { Logger } from '../logging/log'
import { TICK_DT_S } from '../thermo/constants'
import { energyForTemperature, massForPressureTemperature, temperatureC, thermoStateFor, updatePhase } from '../thermo/Thermo'
import { runThermodynamics, snapshotTemperatures } from '../thermal'
import type { ThermalContext } from '../thermal'
import { renderMaterials, renderThermal } from '../rendering'

export interface WorldOptions extends Partial<WorldSettings> {
  logger?: Logger
}

type MaterialArg = MaterialDefinition | null | undefined

function requireMaterial(material: MaterialArg, what = 'material'): MaterialDefinition {
  if (material === null || material === undefined) {
    throw new InvalidArgumentError(`${what} must not be null or undefined`)
  }
  return material
}

function requireDimension(value: number, what: string): number {
  if (!Number.isFinite(value) || Math.floor(value) < 1) {
    throw new InvalidDimensionError(`${what} must be a finite number >= 1, got ${value}`)
  }
  return Math.floor(value)
}

export class World {
  private readonly grid: Grid
  private readonly rng: Random
  private readonly logger: Logger
  private readonly thermal: ThermalContext

  // Behavior registry - maps category to movement handler
  private readonly behaviors: Map<ElementCategory, IBehavior>

  // Reused for every cell of the movement pass
  private readonly updateCtx: UpdateContext

  constructor(width: number, height: number, seed: number, options: WorldOptions = {}) {
    const w = requireDimension(width, 'width')
    const h = requireDimension(height, 'height')
    const settings = resolveWorldSettings(options)

    this.grid = new Grid(w, h)
    this.rng = new Random(seed)
    this.logger = options.logger ?? defaultLogger
    this.thermal = {
      ambientTemperature: settings.ambientTemperature,
      ambientPressure: settings.ambientPressure,
      dt: TICK_DT_S,
      temps: new Float64Array(this.grid.size),
      logger: this.logger,
    }

    // Register behaviors (OCP: add new behaviors here)
    this.behaviors = new Map<ElementCategory, IBehavior>([
      ['powder', new PowderBehavior()],
      ['liquid', new LiquidBehavior()],
      ['gas', new GasBehavior()],
      ['floating', new FloatingBehavior()],
    ])

    this.updateCtx = { grid: this.grid, x: 0, y: 0, idx: 0, rng: this.rng }

    this.clear()
    this.logger.debug(`World ${w}x${h} created (seed ${seed})`)
  }

  // === Dimensions / settings ===
  get width(): number { return this.grid.width }
  get height(): number { return this.grid.height }
  get cellCount(): number { return this.grid.size }
  get tickId(): number { return this.grid.tickId }
  get ambientTemperature(): number { return this.thermal.ambientTemperature }
  get ambientPressure(): number { return this.thermal.ambientPressure }

  inBounds(x: number, y: number): boolean {
    return this.grid.inBounds(Math.floor(x), Math.floor(y))
  }

  reseed(seed: number): void {
    this.rng.reseed(seed)
  }

  // ============================================
  // MUTATORS
  // ============================================

  /** Place a material at ambient temperature. Out-of-bounds writes are ignored. */
  setCell(x: number, y: number, material: MaterialArg): void {
    const mat = requireMaterial(material)
    const ix = Math.floor(x)
    const iy = Math.floor(y)
    if (!this.grid.inBounds(ix, iy)) return
    this.placeIdx(this.grid.index(ix, iy), mat, this.thermal.ambientTemperature)
  }

  /** Every cell becomes air at ambient state. The tick counter keeps running. */
  clear(): void {
    const air = lookup(EL_AIR)
    const state = thermoStateFor(air, this.thermal.ambientTemperature, this.thermal.ambientPressure)
    this.grid.fill(EL_AIR, state.energy, state.mass, state.pressure)
  }

  fillBorder(material: MaterialArg): void {
    const mat = requireMaterial(material)
    const { width, height } = this.grid

    // top and bottom
    for (let x = 0; x < width; x++) {
      this.placeIdx(this.grid.index(x, 0), mat, this.thermal.ambientTemperature)
      this.placeIdx(this.grid.index(x, height - 1), mat, this.thermal.ambientTemperature)
    }
    // left and right
    for (let y = 0; y < height; y++) {
      this.placeIdx(this.grid.index(0, y), mat, this.thermal.ambientTemperature)
      this.placeIdx(this.grid.index(width - 1, y), mat, this.thermal.ambientTemperature)
    }
  }

  paintCircle(cx: number, cy: number, radius: number, material: MaterialArg): void {
    const mat = requireMaterial(material)
    const tempC = this.thermal.ambientTemperature
    this.forEachInCircle(cx, cy, radius, (i) => this.placeIdx(i, mat, tempC))
  }

  /** Paint a material already at `tempC`; the placed cells take their matching phase. */
  paintCircleWithTemperature(cx: number, cy: number, radius: number, material: MaterialArg, tempC: number): void {
    const mat = requireMaterial(material)
    const t = validateTemperature(tempC)
    this.forEachInCircle(cx, cy, radius, (i) => {
      this.placeIdx(i, mat, t)
      this.applyPhase(i)
    })
  }

  /** Heat or cool existing cells without changing what they are made of */
  paintTemperatureCircle(cx: number, cy: number, radius: number, tempC: number): void {
    const t = validateTemperature(tempC)
    this.forEachInCircle(cx, cy, radius, (i) => this.setTemperatureIdx(i, t))
  }

  setTemperatureC(x: number, y: number, tempC: number): void {
    const t = validateTemperature(tempC)
    const ix = Math.floor(x)
    const iy = Math.floor(y)
    if (!this.grid.inBounds(ix, iy)) return
    this.setTemperatureIdx(this.grid.index(ix, iy), t)
  }

  setAmbientTemperatureC(tempC: number): void {
    this.thermal.ambientTemperature = validateTemperature(tempC, 'ambientTemperature')
    this.rederiveAir()
  }

  setAmbientPressurePa(pressurePa: number): void {
    this.thermal.ambientPressure = validatePressure(pressurePa, 'ambientPressure')
    this.rederiveAir()
  }

  // ============================================
  // ACCESSORS
  // ============================================

  /** Out of bounds reads as the containment material */
  materialAt(x: number, y: number): MaterialDefinition {
    return lookup(this.grid.getId(Math.floor(x), Math.floor(y)))
  }

  temperatureAt(x: number, y: number): number {
    const i = this.indexOrNull(x, y)
    if (i === null) return this.thermal.ambientTemperature
    const { ids, mass, pressure } = this.grid
    return temperatureC(lookup(ids[i]), this.grid.energy[i], mass[i], pressure[i])
  }

  pressureAt(x: number, y: number): number {
    const i = this.indexOrNull(x, y)
    return i === null ? this.thermal.ambientPressure : this.grid.pressure[i]
  }

  massAt(x: number, y: number): number {
    const i = this.indexOrNull(x, y)
    return i === null ? 0 : this.grid.mass[i]
  }

  energyAt(x: number, y: number): number {
    const i = this.indexOrNull(x, y)
    return i === null ? 0 : this.grid.energy[i]
  }

  // ============================================
  // RENDERING
  // ============================================

  renderMaterialsTo(buffer: Uint32Array): void {
    this.requireBuffer(buffer)
    renderMaterials({ pixels32: buffer, ids: this.grid.ids, width: this.width, height: this.height })
  }

  renderTemperatureHeatmapTo(buffer: Uint32Array): void {
    this.requireBuffer(buffer)
    const temps = snapshotTemperatures(this.grid, this.thermal)
    renderThermal({ pixels32: buffer, temps, width: this.width, height: this.height })
  }

  // ============================================
  // SIMULATION STEP
  // ============================================

  step(): void {
    this.grid.beginTick()

    // Random starting direction each tick, alternating per row against bias.
    // The outer ring is never scanned.
    let leftToRight = this.rng.nextBoolean()
    for (let y = this.grid.height - 2; y >= 1; y--) {
      this.processRow(y, leftToRight)
      leftToRight = !leftToRight
    }

    runThermodynamics(this.grid, this.thermal)
  }

  private processRow(y: number, leftToRight: boolean): void {
    const w = this.grid.width

    if (leftToRight) {
      for (let x = 1; x < w - 1; x++) {
        this.updateCell(x, y)
      }
    } else {
      for (let x = w - 2; x >= 1; x--) {
        this.updateCell(x, y)
      }
    }
  }

  private updateCell(x: number, y: number): void {
    const idx = this.grid.index(x, y)
    const id = this.grid.ids[idx]
    if (id === EL_AIR) return
    if (this.grid.hasMoved(idx)) return

    const mat = lookup(id)
    if (mat.immobile) return

    const behavior = this.behaviors.get(mat.category)
    if (!behavior) return

    const ctx = this.updateCtx
    ctx.x = x
    ctx.y = y
    ctx.idx = idx
    behavior.update(ctx)
  }

  // ============================================
  // INTERNALS
  // ============================================

  private indexOrNull(x: number, y: number): number | null {
    const ix = Math.floor(x)
    const iy = Math.floor(y)
    return this.grid.inBounds(ix, iy) ? this.grid.index(ix, iy) : null
  }

  private placeIdx(i: number, mat: MaterialDefinition, tempC: number): void {
    const state = thermoStateFor(mat, tempC, this.thermal.ambientPressure)
    this.grid.setCellIdx(i, mat.id, state.energy, state.mass, state.pressure)
  }

  private applyPhase(i: number): void {
    const { ids, mass, pressure } = this.grid
    ids[i] = updatePhase(lookup(ids[i]), this.grid.energy[i], mass[i], pressure[i]).id
  }

  private setTemperatureIdx(i: number, tempC: number): void {
    const { ids, mass, pressure } = this.grid
    const mat = lookup(ids[i])

    if (mat.id === EL_AIR) {
      const p = this.thermal.ambientPressure
      mass[i] = massForPressureTemperature(mat, p, tempC)
      pressure[i] = p
    }

    this.grid.energy[i] = energyForTemperature(mat, tempC, mass[i], pressure[i])
    this.applyPhase(i)
  }

  private rederiveAir(): void {
    const air = lookup(EL_AIR)
    const state = thermoStateFor(air, this.thermal.ambientTemperature, this.thermal.ambientPressure)
    const ids = this.grid.ids
    for (let i = 0; i < this.grid.size; i++) {
      if (ids[i] === EL_AIR) this.grid.setCellIdx(i, EL_AIR, state.energy, state.mass, state.pressure)
    }
  }

  private forEachInCircle(cx: number, cy: number, radius: number, paint: (idx: number) => void): void {
    if (!Number.isFinite(radius)) {
      throw new InvalidArgumentError(`radius must be a finite number, got ${radius}`)
    }
    const r = Math.floor(radius)
    if (r < 0) return
    const x0 = Math.floor(cx)
    const y0 = Math.floor(cy)
    if (!Number.isFinite(x0) || !Number.isFinite(y0)) return

    const { width, height } = this.grid
    const r2 = r * r
    const minX = clampInt(x0 - r, 0, width - 1)
    const maxX = clampInt(x0 + r, 0, width - 1)
    const minY = clampInt(y0 - r, 0, height - 1)
    const maxY = clampInt(y0 + r, 0, height - 1)

    for (let y = minY; y <= maxY; y++) {
      const dy = y - y0
      const dy2 = dy * dy
      const rowBase = y * width
      for (let x = minX; x <= maxX; x++) {
        const dx = x - x0
        if (dx * dx + dy2 <= r2) paint(rowBase + x)
      }
    }
  }

  private requireBuffer(buffer: Uint32Array): void {
    if (buffer.length < this.grid.size) {
      throw new InvalidArgumentError(`buffer length must be >= width*height (${this.grid.size}), got ${buffer.length}`)
    }
  }
}

function clampInt(v: number, min: number, max: number): number {
  if (v < min) return min
  return v > max ? max : v
}
