import { describe, it, expect } from 'vitest'
import { FAMILY_PHASES, gasOf, liquidOf, phaseVariant, solidOf } from '../families'
import { lookup } from '../elements'
import type { MaterialFamily } from '../types'
import { EL_AIR, EL_ICE, EL_MOLTEN_SILICA, EL_ROCK_VAPOR, EL_STEAM } from '../types'

const SUBSTANCES: MaterialFamily[] = ['water', 'sand', 'rock']
const ALL_FAMILIES: MaterialFamily[] = ['air', ...SUBSTANCES]

describe('Family map', () => {
  it.each(SUBSTANCES)('%s has one variant per phase', (family) => {
    expect(solidOf(family).phase).toBe('solid')
    expect(liquidOf(family).phase).toBe('liquid')
    expect(gasOf(family).phase).toBe('gas')
    for (const mat of [solidOf(family), liquidOf(family), gasOf(family)]) {
      expect(mat.family).toBe(family)
    }
  })

  it('maps every material back to its own family', () => {
    for (const family of ALL_FAMILIES) {
      const { solid, liquid, gas } = FAMILY_PHASES[family]
      for (const id of [solid, liquid, gas]) {
        expect(lookup(id).family).toBe(family)
      }
    }
  })

  it('maps air to itself', () => {
    expect(phaseVariant('air', 'solid').id).toBe(EL_AIR)
    expect(phaseVariant('air', 'gas').id).toBe(EL_AIR)
  })

  it('resolves variants', () => {
    expect(phaseVariant('water', 'solid').id).toBe(EL_ICE)
    expect(phaseVariant('water', 'gas').id).toBe(EL_STEAM)
    expect(phaseVariant('sand', 'liquid').id).toBe(EL_MOLTEN_SILICA)
    expect(phaseVariant('rock', 'gas').id).toBe(EL_ROCK_VAPOR)
  })

  it('orders phase boundaries', () => {
    for (const family of SUBSTANCES) {
      const p = FAMILY_PHASES[family]
      expect(p.meltPoint).toBeLessThan(p.boilPoint)
      expect(p.latentFusion).toBeGreaterThan(0)
      expect(p.latentVaporization).toBeGreaterThan(0)
    }
  })
})
