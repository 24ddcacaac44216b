/**
 * Temperature -> packed ARGB gradient.
 * Channels interpolate linearly between fixed anchors, alpha included.
 */

import { MAX_TEMP_C, MIN_TEMP_C } from '../thermo/constants'

interface HeatmapAnchor {
  /** °C */
  t: number
  a: number
  r: number
  g: number
  b: number
}

export const HEATMAP_ANCHORS: readonly HeatmapAnchor[] = [
  { t: MIN_TEMP_C, a: 255, r: 10, g: 0, b: 40 },
  { t: 0, a: 255, r: 0, g: 90, b: 255 },
  { t: 100, a: 255, r: 0, g: 220, b: 120 },
  { t: 500, a: 255, r: 255, g: 230, b: 0 },
  { t: 1000, a: 255, r: 255, g: 80, b: 0 },
  { t: 3000, a: 255, r: 255, g: 255, b: 255 },
  { t: MAX_TEMP_C, a: 255, r: 200, g: 180, b: 255 },
]

function pack(a: number, r: number, g: number, b: number): number {
  return ((a << 24) | (r << 16) | (g << 8) | b) >>> 0
}

function mix(from: number, to: number, f: number): number {
  return Math.round(from + (to - from) * f)
}

export function temperatureToColor(tempC: number): number {
  const first = HEATMAP_ANCHORS[0]
  const last = HEATMAP_ANCHORS[HEATMAP_ANCHORS.length - 1]

  // NaN falls through to the coldest color
  if (!(tempC > first.t)) return pack(first.a, first.r, first.g, first.b)
  if (tempC >= last.t) return pack(last.a, last.r, last.g, last.b)

  for (let i = 1; i < HEATMAP_ANCHORS.length; i++) {
    const hi = HEATMAP_ANCHORS[i]
    if (tempC > hi.t) continue
    const lo = HEATMAP_ANCHORS[i - 1]
    const f = (tempC - lo.t) / (hi.t - lo.t)
    return pack(mix(lo.a, hi.a, f), mix(lo.r, hi.r, f), mix(lo.g, hi.g, f), mix(lo.b, hi.b, f))
  }
  return pack(last.a, last.r, last.g, last.b)
}

export function renderThermal(args: {
  pixels32: Uint32Array
  temps: Float64Array
  width: number
  height: number
}): void {
  const { pixels32, temps, width, height } = args

  const len = Math.min(temps.length, width * height)

  for (let i = 0; i < len; i++) {
    pixels32[i] = temperatureToColor(temps[i])
  }
}
