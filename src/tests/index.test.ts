import { describe, it, expect } from 'vitest'
import * as atmosphere from '../atmosphere/index.ts'

describe('package entry', () => {
  it('exposes the façade and registry', () => {
    expect(new atmosphere.ISA({ geopotentialHeight: 11 }).layerLabel).toBe('Tropopause')
    expect(atmosphere.UnitRegistry.getUnitStandardName()).toBe('SI')
    expect(atmosphere.UNIT_STANDARDS).toEqual(['SI', 'USCS', 'IMPERIAL'])
  })
})
