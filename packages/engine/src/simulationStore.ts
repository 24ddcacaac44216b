import { createStore } from 'zustand/vanilla'
import type { StoreApi } from 'zustand/vanilla'
import type { MaterialDefinition, RenderMode } from './types'
import { EL_BEDROCK } from './types'
import { lookup } from './elements'
import type { World } from './core/World'
import { SimulationLoop } from './SimulationLoop'
import type { LoopStats, SimulationSpeed } from './SimulationLoop'
import type { Logger } from './logging/log'

export interface SimulationState {
  // State
  isPlaying: boolean
  speed: SimulationSpeed
  renderMode: RenderMode
  fps: number
  tickCount: number
  stepsLastFrame: number
  crashed: boolean

  // World settings
  ambientTemperature: number
  ambientPressure: number

  // Actions
  play: () => void
  pause: () => void
  step: () => void
  /** Clear the world, rebuild its border and optionally reseed */
  reset: (seed?: number) => void
  setSpeed: (speed: SimulationSpeed) => void
  setAmbientTemperature: (tempC: number) => void
  setAmbientPressure: (pressurePa: number) => void
  toggleRenderMode: () => void
  /** Feed one frame of wall time to the fixed-timestep loop */
  advance: (dtMs: number) => number
  /** Fill a packed ARGB buffer according to the current render mode */
  render: (buffer: Uint32Array) => void
}

export interface SimulationStoreOptions {
  speed?: SimulationSpeed
  renderMode?: RenderMode
  /** Material written around the edge on reset (default bedrock) */
  borderMaterial?: MaterialDefinition
  logger?: Logger
}

export type SimulationStore = StoreApi<SimulationState>

export function createSimulationStore(world: World, options: SimulationStoreOptions = {}): SimulationStore {
  const borderMaterial = options.borderMaterial ?? lookup(EL_BEDROCK)

  return createStore<SimulationState>()((set, get) => {
    // The loop publishes its stats through the store; it never reads it back
    const applyStats = (stats: LoopStats): void => {
      set({ fps: stats.fps, tickCount: stats.tickCount, stepsLastFrame: stats.stepsLastFrame })
    }

    const loop = new SimulationLoop(world, {
      speed: options.speed,
      logger: options.logger,
      onStats: applyStats,
    })

    const syncLoopFlags = (): void => {
      set({ isPlaying: loop.isPlaying, crashed: loop.crashed })
    }

    return {
      // Initial state
      isPlaying: false,
      speed: loop.speed,
      renderMode: options.renderMode ?? 'normal',
      fps: 0,
      tickCount: world.tickId,
      stepsLastFrame: 0,
      crashed: false,
      ambientTemperature: world.ambientTemperature,
      ambientPressure: world.ambientPressure,

      // Actions
      play: () => {
        loop.play()
        syncLoopFlags()
      },
      pause: () => {
        loop.pause()
        syncLoopFlags()
      },
      step: () => {
        loop.stepOnce()
        set({ tickCount: world.tickId, crashed: loop.crashed, isPlaying: loop.isPlaying })
      },
      reset: (seed?: number) => {
        loop.reset()
        world.clear()
        world.fillBorder(borderMaterial)
        if (seed !== undefined) world.reseed(seed)
        set({ isPlaying: false, crashed: false, fps: 0, stepsLastFrame: 0, tickCount: world.tickId })
      },
      setSpeed: (speed: SimulationSpeed) => {
        loop.speed = speed
        set({ speed })
      },
      setAmbientTemperature: (tempC: number) => {
        world.setAmbientTemperatureC(tempC)
        set({ ambientTemperature: world.ambientTemperature })
      },
      setAmbientPressure: (pressurePa: number) => {
        world.setAmbientPressurePa(pressurePa)
        set({ ambientPressure: world.ambientPressure })
      },
      toggleRenderMode: () => {
        const currentMode = get().renderMode
        const newMode: RenderMode = currentMode === 'normal' ? 'thermal' : 'normal'
        set({ renderMode: newMode })
      },
      advance: (dtMs: number) => {
        const steps = loop.advance(dtMs)
        set({ tickCount: world.tickId, stepsLastFrame: steps })
        if (loop.crashed !== get().crashed) syncLoopFlags()
        return steps
      },
      render: (buffer: Uint32Array) => {
        if (get().renderMode === 'thermal') {
          world.renderTemperatureHeatmapTo(buffer)
        } else {
          world.renderMaterialsTo(buffer)
        }
      },
    }
  })
}
