/**
 * Grid - Data-Oriented Design with Structure of Arrays (SoA)
 *
 * Instead of: cells[i] = { id: 2, energy: 1.2e-3, mass: 1.6e-6, ... }
 * We have:    ids[i] = 2, energy[i] = 1.2e-3, mass[i] = 1.6e-6, ...
 *
 * - No object allocations during a tick
 * - Fixed-size TypedArrays, allocated once for the grid's lifetime
 * - Energy is double-buffered so conduction can write into the back
 *   buffer and swap it in at once
 */

import { EL_AIR, EL_BEDROCK } from '../types'
import type { ElementId } from '../types'

export interface IGrid {
  readonly width: number
  readonly height: number
  readonly size: number
  readonly tickId: number

  // === SoA Data Access ===
  readonly ids: Uint8Array
  readonly energy: Float64Array
  readonly mass: Float64Array
  readonly pressure: Float64Array

  // === Utilities ===
  index(x: number, y: number): number
  inBounds(x: number, y: number): boolean
  getId(x: number, y: number): ElementId

  // Anti double-move bookkeeping (per tick)
  hasMoved(idx: number): boolean
  hasGasFlowed(idx: number): boolean
  markGasFlow(idx: number): void

  // Swap two cells (id + thermodynamic state move together)
  swapIdx(idx1: number, idx2: number): void

  setCellIdx(idx: number, id: ElementId, energy: number, mass: number, pressure: number): void
}

export class Grid implements IGrid {
  readonly width: number
  readonly height: number
  readonly size: number

  // === Structure of Arrays ===
  readonly ids: Uint8Array
  readonly mass: Float64Array
  readonly pressure: Float64Array
  private front: Float64Array
  private back: Float64Array

  // Stamp technique: compare against tickId instead of clearing flags every tick
  private readonly movedStamp: Int32Array
  private readonly gasFlowStamp: Int32Array
  private _tickId = 0

  constructor(width: number, height: number) {
    this.width = width
    this.height = height
    this.size = width * height

    this.ids = new Uint8Array(this.size) // All 0 = EL_AIR
    this.mass = new Float64Array(this.size)
    this.pressure = new Float64Array(this.size)
    this.front = new Float64Array(this.size)
    this.back = new Float64Array(this.size)
    this.movedStamp = new Int32Array(this.size)
    this.gasFlowStamp = new Int32Array(this.size)
  }

  get tickId(): number { return this._tickId }

  /** Authoritative energy buffer (J per cell) */
  get energy(): Float64Array { return this.front }

  /**
   * Back buffer for double-buffered energy updates.
   * Its contents are undefined until a pass fills it.
   */
  get energyBack(): Float64Array { return this.back }

  /** Make the back buffer authoritative. No allocation. */
  swapEnergyBuffers(): void {
    const t = this.front
    this.front = this.back
    this.back = t
  }

  /** Starts a new tick; ids are never reused */
  beginTick(): number {
    this._tickId++
    return this._tickId
  }

  // === Index conversion ===
  index(x: number, y: number): number {
    return y * this.width + x
  }

  // === Bounds checking ===
  inBounds(x: number, y: number): boolean {
    return x >= 0 && x < this.width && y >= 0 && y < this.height
  }

  // Out-of-bounds reads behave like the containment material
  getId(x: number, y: number): ElementId {
    if (!this.inBounds(x, y)) return EL_BEDROCK
    return this.ids[this.index(x, y)]
  }

  isAirIdx(idx: number): boolean {
    return this.ids[idx] === EL_AIR
  }

  // === Stamps ===
  hasMoved(idx: number): boolean {
    return this.movedStamp[idx] === this._tickId
  }

  hasGasFlowed(idx: number): boolean {
    return this.gasFlowStamp[idx] === this._tickId
  }

  markGasFlow(idx: number): void {
    this.gasFlowStamp[idx] = this._tickId
  }

  // === Swap two cells ===
  swapIdx(idx1: number, idx2: number): void {
    const id = this.ids[idx1]
    this.ids[idx1] = this.ids[idx2]
    this.ids[idx2] = id

    const e = this.front[idx1]
    this.front[idx1] = this.front[idx2]
    this.front[idx2] = e

    const m = this.mass[idx1]
    this.mass[idx1] = this.mass[idx2]
    this.mass[idx2] = m

    const p = this.pressure[idx1]
    this.pressure[idx1] = this.pressure[idx2]
    this.pressure[idx2] = p

    this.movedStamp[idx1] = this._tickId
    this.movedStamp[idx2] = this._tickId
  }

  // === Set cell with all data ===
  setCellIdx(idx: number, id: ElementId, energy: number, mass: number, pressure: number): void {
    this.ids[idx] = id
    this.front[idx] = energy
    this.mass[idx] = mass
    this.pressure[idx] = pressure
  }

  // === Fill entire grid with one state ===
  fill(id: ElementId, energy: number, mass: number, pressure: number): void {
    this.ids.fill(id)
    this.front.fill(energy)
    this.mass.fill(mass)
    this.pressure.fill(pressure)
  }
}
