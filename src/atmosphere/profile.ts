/**
 * Atmosphere profile generation. Sweeps geopotential height and samples
 * the standard atmosphere at each step.
 *
 * Rows are expressed in the active unit standard, ready for tables or charts.
 */

import { z } from 'zod'
import { ISA } from './isa.ts'
import { getUnits } from './units.ts'
import { ValidationError, validationErrorFrom } from './errors.ts'

// ─── Data Point ──────────────────────────────────────────────────────────────

export interface ProfileRow {
  geopotentialHeight: number
  geometricHeight: number
  temperature: number
  pressure: number
  density: number
  speedOfSound: number
  dynamicViscosity: number
  layer: string
}

export type ProfileSeriesKey = Exclude<keyof ProfileRow, 'layer'>

export interface AtmosphereProfile {
  /** Unit label per numeric column */
  units: Record<ProfileSeriesKey, string>
  rows: ProfileRow[]
}

// ─── Sweep Configuration ─────────────────────────────────────────────────────

export interface ProfileConfig {
  minHeight: number   // active DISTANCE unit
  maxHeight: number   // active DISTANCE unit
  step: number        // active DISTANCE unit
  offset: number      // K
}

const ProfileConfigSchema = z.object({
  minHeight: z.number().finite().default(0),
  maxHeight: z.number().finite().default(20),
  step: z.number().finite().positive().default(0.1),
  offset: z.number().finite().default(0),
}).refine(cfg => cfg.maxHeight >= cfg.minHeight, {
  message: 'maxHeight must not be below minHeight',
  path: ['maxHeight'],
})

function parseProfileConfig(config: Partial<ProfileConfig>): ProfileConfig {
  const parsed = ProfileConfigSchema.safeParse(config)
  if (!parsed.success) throw validationErrorFrom('Invalid profile configuration', parsed.error)
  return parsed.data
}

/**
 * `count` evenly spaced values from start to stop inclusive.
 */
export function linspace(start: number, stop: number, count: number): number[] {
  if (!Number.isInteger(count) || count < 0) {
    throw new ValidationError(`linspace count must be a non-negative integer, got ${count}`)
  }
  if (count === 1) return [start]
  const values: number[] = []
  for (let i = 0; i < count; i++) {
    values.push(start + (stop - start) * i / (count - 1))
  }
  return values
}

// ─── Sampling ────────────────────────────────────────────────────────────────

function columnUnits(): Record<ProfileSeriesKey, string> {
  const units = getUnits()
  return {
    geopotentialHeight: units.DISTANCE(0).unit,
    geometricHeight: units.DISTANCE(0).unit,
    temperature: units.TEMPERATURE(0).unit,
    pressure: units.PRESSURE(0).unit,
    density: units.DENSITY(0).unit,
    speedOfSound: units.SPEED(0).unit,
    dynamicViscosity: units.DYNAMIC_VISCOSITY(0).unit,
  }
}

/** Sample the atmosphere at each geopotential height (active DISTANCE unit). */
export function atmosphereProfile(heights: readonly number[], offset: number = 0): AtmosphereProfile {
  const rows = heights.map((h): ProfileRow => {
    const isa = new ISA({ offset, geopotentialHeight: h })
    return {
      geopotentialHeight: h,
      geometricHeight: isa.geometricHeight.value,
      temperature: isa.temperature.value,
      pressure: isa.pressure.value,
      density: isa.density.value,
      speedOfSound: isa.speedOfSound.value,
      dynamicViscosity: isa.dynamicViscosity.value,
      layer: isa.layerLabel,
    }
  })
  return { units: columnUnits(), rows }
}

/**
 * Sweep from minHeight to maxHeight in `step` increments.
 * The sample count is rounded; the last sample is always maxHeight.
 */
export function sweepAtmosphere(config: Partial<ProfileConfig> = {}): AtmosphereProfile {
  const cfg = parseProfileConfig(config)
  const count = Math.round((cfg.maxHeight - cfg.minHeight) / cfg.step) + 1
  return atmosphereProfile(linspace(cfg.minHeight, cfg.maxHeight, count), cfg.offset)
}

export function profileSeries(profile: AtmosphereProfile, key: ProfileSeriesKey): number[] {
  return profile.rows.map(row => row[key])
}
