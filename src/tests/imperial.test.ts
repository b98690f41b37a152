/**
 * IMPERIAL unit standard tests, selected through the environment.
 */

import { describe, it, expect } from 'vitest'
import { configureFromEnvironment } from '../atmosphere/config.ts'
import { isUnitStandardLocked } from '../atmosphere/units.ts'
import { ISA } from '../atmosphere/isa.ts'

const selected = configureFromEnvironment({ ISA_UNIT_STANDARD: 'IMPERIAL' })

describe('IMPERIAL from the environment', () => {
  it('is selected and locked', () => {
    expect(selected).toBe('IMPERIAL')
    expect(isUnitStandardLocked()).toBe(true)
  })
})

describe('IMPERIAL sea level', () => {
  const isa = new ISA()

  it('15 °C', () => {
    expect(isa.temperature.unit).toBe('°C')
    expect(isa.temperature.value).toBeCloseTo(15, 9)
  })

  it('pressure in lbf/ft²', () => {
    expect(isa.pressure.unit).toBe('lbf/ft²')
    expect(isa.pressure.value).toBeCloseTo(2116.2166, 4)
  })

  it('density in lb/ft³', () => {
    expect(isa.density.unit).toBe('lb/ft³')
    expect(isa.density.value).toBeCloseTo(0.0764743, 7)
  })

  it('speed of sound in knots', () => {
    expect(isa.speedOfSound.unit).toBe('kn')
    expect(isa.speedOfSound.value).toBeCloseTo(661.4786, 4)
  })
})

describe('IMPERIAL at 5000 ft', () => {
  const isa = new ISA({ geopotentialHeight: 5000 })

  it('state', () => {
    expect(isa.temperature.value).toBeCloseTo(5.094, 9)
    expect(isa.pressure.value).toBeCloseTo(1760.7938, 4)
    expect(isa.density.value).toBeCloseTo(0.0658956, 7)
    expect(isa.speedOfSound.value).toBeCloseTo(650.009, 3)
  })

  it('lapse rate in °C/ft', () => {
    expect(isa.lapseRate.unit).toBe('°C/ft')
    expect(isa.lapseRate.value).toBeCloseTo(-0.0065 * 0.3048, 12)
  })
})

describe('IMPERIAL velocity inputs', () => {
  const isa = new ISA({ geopotentialHeight: 10000 / 0.3048 })
  const knots = 250 / 0.5144444444444445

  it('Mach number from knots', () => {
    expect(isa.machNumber(knots)).toBeCloseTo(0.834827, 6)
  })

  it('dynamic pressure in lbf/ft²', () => {
    const q = isa.dynamicPressure(knots)
    expect(q.unit).toBe('lbf/ft²')
    expect(q.value * 47.88025898033584).toBeCloseTo(12897.07, 1)
  })
})
