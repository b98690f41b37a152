/**
 * ISA: International Standard Atmosphere façade.
 *
 * Composes altitude, temperature offset, constants and the selected layer
 * into derived properties. Inputs are read in the active unit standard
 * (altitude: km in SI, ft in USCS/IMPERIAL; velocity: the standard's SPEED
 * unit); the temperature offset is always in kelvin. Every dimensional
 * property is returned as a UnitValue in the active standard.
 *
 * Instances are immutable; `plus`/`minus` return a new atmosphere with a
 * shifted offset.
 */

import { z } from 'zod'
import { ValidationError, validationErrorFrom } from './errors.ts'
import { CONSTANTS } from './constants.ts'
import { chooseAtmosphere } from './layers.ts'
import type { AtmosphericLayer, LayerKind } from './layers.ts'
import { formatUnitValue, toSI, toUserUnit } from './units.ts'
import type { UnitValue } from './units.ts'

// ─── Closed-Form Gas Properties (SI) ─────────────────────────────────────────

/**
 * Sutherland's law.
 * μ(T) = μ₀ · (T/T₀)^1.5 · (T₀ + S)/(T + S)
 */
export function sutherlandViscosity(temperature: number): number {
  const T0 = CONSTANTS.MSL_TEMPERATURE.si
  const S = CONSTANTS.S.si
  return CONSTANTS.MSL_DYNAMIC_VISCOSITY.si
    * Math.pow(temperature / T0, 1.5)
    * (T0 + S) / (temperature + S)
}

/** a = √(γ·R·T) */
export function speedOfSoundAt(temperature: number): number {
  return Math.sqrt(CONSTANTS.y * CONSTANTS.R.si * temperature)
}

// ─── Construction ────────────────────────────────────────────────────────────

export interface ISAOptions {
  /** Temperature deviation from the standard day [K] */
  offset?: number
  /** Geopotential height in the active DISTANCE unit */
  geopotentialHeight?: number
}

const ISAOptionsSchema = z.object({
  offset: z.number().finite().default(0),
  geopotentialHeight: z.number().finite().nonnegative().default(0),
})

function parseOptions(options: ISAOptions): z.infer<typeof ISAOptionsSchema> {
  const parsed = ISAOptionsSchema.safeParse(options)
  if (!parsed.success) throw validationErrorFrom('Invalid ISA options', parsed.error)
  return parsed.data
}

/** Validated SI state carried through offset arithmetic without re-reading units. */
class ShiftedState {
  constructor(readonly offset: number, readonly altitude: number) {}
}

function assertAboveAbsoluteZero(layer: AtmosphericLayer, altitude: number, offset: number): void {
  if (layer.temperature(altitude) <= 0) {
    throw new ValidationError(
      `Temperature offset ${offset} K puts the absolute temperature at or below 0 K at ${altitude} m`,
    )
  }
}

// ─── Façade ──────────────────────────────────────────────────────────────────

export class ISA {
  readonly offset: number
  /** Geopotential height [m] */
  readonly altitude: number
  readonly layer: AtmosphericLayer

  constructor(options: ISAOptions | ShiftedState = {}) {
    if (options instanceof ShiftedState) {
      this.offset = parseOptions({ offset: options.offset }).offset
      this.altitude = options.altitude
    } else {
      const { offset, geopotentialHeight } = parseOptions(options)
      this.offset = offset
      this.altitude = toSI(geopotentialHeight, 'DISTANCE')
    }
    this.layer = chooseAtmosphere(this.altitude, this.offset)
    assertAboveAbsoluteZero(this.layer, this.altitude, this.offset)
  }

  /** Geopotential height in the active DISTANCE unit */
  get geopotentialHeight(): number {
    return toUserUnit(this.altitude, 'DISTANCE').value
  }

  /** Build from geometric height, converted to geopotential first. */
  static fromGeometricHeight(offset: number = 0, geometricHeight: number = 0): ISA {
    const hp = ISA.geopotentialHeight(geometricHeight)
    return new ISA({ offset, geopotentialHeight: hp.value })
  }

  /** h_p = r·h_g / (r + h_g), in and out in the active DISTANCE unit. */
  static geopotentialHeight(geometricHeight: number): UnitValue {
    const hg = toSI(geometricHeight, 'DISTANCE')
    const r = CONSTANTS.r.si
    return toUserUnit((r * hg) / (r + hg), 'DISTANCE')
  }

  // ── Layer delegation ──

  get layerKind(): LayerKind {
    return this.layer.kind
  }

  get layerLabel(): string {
    return this.layer.label
  }

  get lapseRate(): UnitValue {
    return toUserUnit(this.layer.lapseRate, 'LAPSE_RATE')
  }

  // ── SI internals ──

  private get temperatureSI(): number {
    return this.layer.temperature(this.altitude)
  }

  private get pressureSI(): number {
    return this.layer.pressure(this.altitude)
  }

  private get densitySI(): number {
    return this.layer.density(this.altitude)
  }

  // ── State ──

  get temperature(): UnitValue {
    return toUserUnit(this.temperatureSI, 'TEMPERATURE')
  }

  get pressure(): UnitValue {
    return toUserUnit(this.pressureSI, 'PRESSURE')
  }

  get density(): UnitValue {
    return toUserUnit(this.densitySI, 'DENSITY')
  }

  /** h_g = r·h_p / (r − h_p) */
  get geometricHeight(): UnitValue {
    const r = CONSTANTS.r.si
    return toUserUnit((r * this.altitude) / (r - this.altitude), 'DISTANCE')
  }

  // ── Ratios (dimensionless) ──

  get temperatureRatio(): number {
    return this.temperatureSI / CONSTANTS.MSL_TEMPERATURE.si
  }

  get pressureRatio(): number {
    return this.pressureSI / CONSTANTS.MSL_PRESSURE.si
  }

  get densityRatio(): number {
    return this.densitySI / CONSTANTS.MSL_DENSITY.si
  }

  // ── Transport and acoustics ──

  get dynamicViscosity(): UnitValue {
    return toUserUnit(sutherlandViscosity(this.temperatureSI), 'DYNAMIC_VISCOSITY')
  }

  get kinematicViscosity(): UnitValue {
    return toUserUnit(sutherlandViscosity(this.temperatureSI) / this.densitySI, 'KINEMATIC_VISCOSITY')
  }

  get speedOfSound(): UnitValue {
    return toUserUnit(speedOfSoundAt(this.temperatureSI), 'SPEED')
  }

  // ── Flight quantities ──

  /** Velocity in the active SPEED unit. */
  machNumber(velocity: number): number {
    return toSI(velocity, 'SPEED') / speedOfSoundAt(this.temperatureSI)
  }

  /** q = ½·ρ·V², velocity in the active SPEED unit. */
  dynamicPressure(velocity: number): UnitValue {
    const v = toSI(velocity, 'SPEED')
    return toUserUnit(0.5 * this.densitySI * v * v, 'PRESSURE')
  }

  // ── Offset arithmetic ──

  plus(deltaKelvin: number): ISA {
    return new ISA(new ShiftedState(this.offset + deltaKelvin, this.altitude))
  }

  minus(deltaKelvin: number): ISA {
    return new ISA(new ShiftedState(this.offset - deltaKelvin, this.altitude))
  }

  toString(): string {
    return `ISA(offset=${this.offset} K, ${formatUnitValue(toUserUnit(this.altitude, 'DISTANCE'))})`
  }
}
