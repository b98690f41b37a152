/**
 * Atmosphere profile tests (SI standard, heights in km).
 */

import { describe, it, expect } from 'vitest'
import { atmosphereProfile, linspace, profileSeries, sweepAtmosphere } from '../atmosphere/profile.ts'
import { AltitudeRangeError, ValidationError } from '../atmosphere/errors.ts'

describe('linspace', () => {
  it('includes both ends', () => {
    expect(linspace(0, 20, 5)).toEqual([0, 5, 10, 15, 20])
  })

  it('single sample', () => {
    expect(linspace(3, 9, 1)).toEqual([3])
  })

  it('no samples', () => {
    expect(linspace(3, 9, 0)).toEqual([])
  })

  it('count must be a non-negative integer', () => {
    expect(() => linspace(0, 1, -1)).toThrow(ValidationError)
    expect(() => linspace(0, 1, 2.5)).toThrow(ValidationError)
    expect(() => linspace(0, 1, Number.POSITIVE_INFINITY)).toThrow(
      'linspace count must be a non-negative integer, got Infinity',
    )
  })
})

describe('sweepAtmosphere', () => {
  it('labels each row with its layer', () => {
    const profile = sweepAtmosphere({ maxHeight: 20, step: 5 })
    expect(profile.rows.map(r => r.layer)).toEqual([
      'Troposphere', 'Troposphere', 'Troposphere', 'Tropopause', 'Lower Stratosphere',
    ])
  })

  it('default sweep is 0 to 20 km in 100 m steps', () => {
    const profile = sweepAtmosphere()
    expect(profile.rows).toHaveLength(201)
    expect(profile.rows[0].geopotentialHeight).toBe(0)
    expect(profile.rows[200].geopotentialHeight).toBe(20)
  })

  it('column units', () => {
    const { units } = sweepAtmosphere({ maxHeight: 1, step: 1 })
    expect(units.temperature).toBe('K')
    expect(units.geopotentialHeight).toBe('km')
    expect(units.pressure).toBe('Pa')
    expect(units.speedOfSound).toBe('m/s')
  })

  it('step must be finite and positive', () => {
    expect(() => sweepAtmosphere({ step: 0 })).toThrow(ValidationError)
    expect(() => sweepAtmosphere({ step: 0 })).toThrow(/^Invalid profile configuration: step: /)
    expect(() => sweepAtmosphere({ step: -1 })).toThrow(ValidationError)
    expect(() => sweepAtmosphere({ step: Number.NaN })).toThrow(ValidationError)
  })

  it('maxHeight below minHeight fails', () => {
    expect(() => sweepAtmosphere({ minHeight: 10, maxHeight: 5 })).toThrow(
      'Invalid profile configuration: maxHeight: maxHeight must not be below minHeight',
    )
  })

  it('equal bounds give one row', () => {
    expect(sweepAtmosphere({ minHeight: 5, maxHeight: 5, step: 1 }).rows).toHaveLength(1)
  })

  it('offset shifts every temperature', () => {
    const standard = sweepAtmosphere({ maxHeight: 30, step: 10 })
    const hot = sweepAtmosphere({ maxHeight: 30, step: 10, offset: 10 })
    const diffs = hot.rows.map((r, i) => r.temperature - standard.rows[i].temperature)
    for (const d of diffs) expect(d).toBeCloseTo(10, 9)
  })
})

describe('atmosphereProfile', () => {
  it('sea-level row', () => {
    const [row] = atmosphereProfile([0]).rows
    expect(row.temperature).toBeCloseTo(288.15, 10)
    expect(row.pressure).toBe(101325)
    expect(row.geometricHeight).toBe(0)
    expect(row.layer).toBe('Troposphere')
  })

  it('pressure series decreases with height', () => {
    const pressure = profileSeries(sweepAtmosphere({ maxHeight: 47, step: 1 }), 'pressure')
    expect(pressure).toHaveLength(48)
    for (let i = 1; i < pressure.length; i++) {
      expect(pressure[i]).toBeLessThan(pressure[i - 1])
    }
  })

  it('heights above 47 km fail', () => {
    expect(() => atmosphereProfile([10, 50])).toThrow(AltitudeRangeError)
  })
})
