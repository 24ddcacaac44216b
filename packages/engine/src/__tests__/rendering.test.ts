import { describe, it, expect } from 'vitest'
import { HEATMAP_ANCHORS, renderMaterials, renderThermal, temperatureToColor } from '../rendering'
import { EL_AIR, EL_SAND, EL_WATER } from '../types'

describe('Heatmap', () => {
  it('hits every anchor exactly', () => {
    expect(temperatureToColor(-273)).toBe(0xFF0A0028)
    expect(temperatureToColor(0)).toBe(0xFF005AFF)
    expect(temperatureToColor(100)).toBe(0xFF00DC78)
    expect(temperatureToColor(500)).toBe(0xFFFFE600)
    expect(temperatureToColor(1000)).toBe(0xFFFF5000)
    expect(temperatureToColor(3000)).toBe(0xFFFFFFFF)
    expect(temperatureToColor(10_000)).toBe(0xFFC8B4FF)
  })

  it('interpolates each channel between anchors', () => {
    // halfway between 0 °C (0, 90, 255) and 100 °C (0, 220, 120)
    expect(temperatureToColor(50)).toBe(0xFF009BBC)
  })

  it('clamps outside the range', () => {
    expect(temperatureToColor(-500)).toBe(0xFF0A0028)
    expect(temperatureToColor(50_000)).toBe(0xFFC8B4FF)
    expect(temperatureToColor(Number.NaN)).toBe(0xFF0A0028)
  })

  it('keeps anchors sorted', () => {
    for (let i = 1; i < HEATMAP_ANCHORS.length; i++) {
      expect(HEATMAP_ANCHORS[i].t).toBeGreaterThan(HEATMAP_ANCHORS[i - 1].t)
    }
  })

  it('fills a pixel buffer', () => {
    const pixels32 = new Uint32Array(3)
    renderThermal({ pixels32, temps: new Float64Array([0, 100, 3000]), width: 3, height: 1 })
    expect(Array.from(pixels32)).toEqual([0xFF005AFF, 0xFF00DC78, 0xFFFFFFFF])
  })
})

describe('Material colors', () => {
  it('writes each cell color', () => {
    const pixels32 = new Uint32Array(3)
    renderMaterials({ pixels32, ids: new Uint8Array([EL_AIR, EL_WATER, EL_SAND]), width: 3, height: 1 })
    expect(Array.from(pixels32)).toEqual([0xFF000000, 0xFF3D8BFF, 0xFFE1C16E])
  })
})
