/**
 * Atmospheric layers: closed-form ICAO 1983 temperature and pressure,
 * sea level to the stratopause.
 *
 * All inputs and outputs are SI (geopotential metres, K, Pa, kg/m³).
 *
 *   Layer               range [m]          lapse rate [K/m]
 *   Troposphere         [0, 11 000)        −0.0065
 *   Tropopause          [11 000, 20 000)    0         (isothermal)
 *   LowerStratosphere   [20 000, 32 000)   +0.001
 *   UpperStratosphere   [32 000, 47 000]   +0.0028
 *
 * Each layer's base state is the layer below evaluated at the shared
 * boundary, so temperature and pressure are continuous across boundaries.
 * The temperature offset shifts temperature (and therefore density) only;
 * pressure always follows the standard temperature profile.
 *
 * This module is UI-independent.
 */

import { AltitudeRangeError } from './errors.ts'
import { CONSTANTS } from './constants.ts'

const G = CONSTANTS.g.si
const R = CONSTANTS.R.si

export const LAYER_BOUNDARIES = Object.freeze({
  TROPOPAUSE: 11000,
  LOWER_STRATOSPHERE: 20000,
  UPPER_STRATOSPHERE: 32000,
  STRATOPAUSE: 47000,
})

// ─── Types ───────────────────────────────────────────────────────────────────

export type LayerKind = 'troposphere' | 'tropopause' | 'lowerStratosphere' | 'upperStratosphere'

/** Capability contract every layer variant implements. h in geopotential metres. */
export interface LayerFormulas {
  /** Standard-day temperature (no offset) [K] */
  standardTemperature(h: number): number
  /** Temperature including the layer's offset [K] */
  temperature(h: number): number
  /** Pressure [Pa] */
  pressure(h: number): number
  /** Ideal-gas density P / (R·T) [kg/m³] */
  density(h: number): number
}

export interface LayerDefinition<K extends LayerKind> {
  readonly kind: K
  readonly label: string
  /** [K/m]; 0 for isothermal layers */
  readonly lapseRate: number
  readonly baseHeight: number
  /** Upper limit of the layer [m] */
  readonly ceiling: number
  readonly baseTemperature: number
  readonly basePressure: number
  readonly baseDensity: number
}

export interface LayerOf<K extends LayerKind> extends LayerDefinition<K>, LayerFormulas {
  /** Additive temperature deviation of the owning atmosphere [K] */
  readonly offset: number
  readonly isothermal: boolean
}

export type Troposphere = LayerOf<'troposphere'>
export type Tropopause = LayerOf<'tropopause'>
export type LowerStratosphere = LayerOf<'lowerStratosphere'>
export type UpperStratosphere = LayerOf<'upperStratosphere'>

export type AtmosphericLayer = Troposphere | Tropopause | LowerStratosphere | UpperStratosphere

// ─── Layer Factory ───────────────────────────────────────────────────────────

/**
 * Build a layer variant from its definition.
 *
 * Gradient layer:   T = Tb + L·(h − hb),  P = Pb · (T/Tb)^(−g/(L·R))
 * Isothermal layer: T = Tb,               P = Pb · exp(−g·(h − hb)/(R·Tb))
 */
export function makeLayer<K extends LayerKind>(def: LayerDefinition<K>, offset: number = 0): LayerOf<K> {
  const isothermal = def.lapseRate === 0
  const exponent = isothermal ? 0 : -G / (def.lapseRate * R)

  const standardTemperature = (h: number): number =>
    def.baseTemperature + def.lapseRate * (h - def.baseHeight)

  const temperature = (h: number): number => standardTemperature(h) + offset

  const pressure = (h: number): number => {
    if (isothermal) {
      return def.basePressure * Math.exp(-G * (h - def.baseHeight) / (R * def.baseTemperature))
    }
    return def.basePressure * Math.pow(standardTemperature(h) / def.baseTemperature, exponent)
  }

  const density = (h: number): number => pressure(h) / (R * temperature(h))

  return Object.freeze({
    ...def,
    offset,
    isothermal,
    standardTemperature,
    temperature,
    pressure,
    density,
  })
}

/** Definition of the layer sitting on top of `below`, starting at its ceiling. */
function stackOn<K extends LayerKind>(
  below: LayerOf<LayerKind>,
  layer: Pick<LayerDefinition<K>, 'kind' | 'label' | 'lapseRate' | 'ceiling'>,
): LayerDefinition<K> {
  const h = below.ceiling
  return Object.freeze({
    ...layer,
    baseHeight: h,
    baseTemperature: below.standardTemperature(h),
    basePressure: below.pressure(h),
    baseDensity: below.density(h),
  })
}

// ─── Standard Layer Stack ────────────────────────────────────────────────────

const TROPOSPHERE: LayerDefinition<'troposphere'> = Object.freeze({
  kind: 'troposphere',
  label: 'Troposphere',
  lapseRate: -0.0065,
  baseHeight: 0,
  ceiling: LAYER_BOUNDARIES.TROPOPAUSE,
  baseTemperature: CONSTANTS.MSL_TEMPERATURE.si,
  basePressure: CONSTANTS.MSL_PRESSURE.si,
  baseDensity: CONSTANTS.MSL_PRESSURE.si / (R * CONSTANTS.MSL_TEMPERATURE.si),
})

const TROPOPAUSE = stackOn(makeLayer(TROPOSPHERE), {
  kind: 'tropopause',
  label: 'Tropopause',
  lapseRate: 0,
  ceiling: LAYER_BOUNDARIES.LOWER_STRATOSPHERE,
})

const LOWER_STRATOSPHERE = stackOn(makeLayer(TROPOPAUSE), {
  kind: 'lowerStratosphere',
  label: 'Lower Stratosphere',
  lapseRate: 0.001,
  ceiling: LAYER_BOUNDARIES.UPPER_STRATOSPHERE,
})

const UPPER_STRATOSPHERE = stackOn(makeLayer(LOWER_STRATOSPHERE), {
  kind: 'upperStratosphere',
  label: 'Upper Stratosphere',
  lapseRate: 0.0028,
  ceiling: LAYER_BOUNDARIES.STRATOPAUSE,
})

/** The four standard-day layers (offset 0), bottom to top. */
export const STANDARD_LAYERS: readonly [Troposphere, Tropopause, LowerStratosphere, UpperStratosphere] =
  Object.freeze([
    makeLayer(TROPOSPHERE),
    makeLayer(TROPOPAUSE),
    makeLayer(LOWER_STRATOSPHERE),
    makeLayer(UPPER_STRATOSPHERE),
  ] as const)

// ─── Selection ───────────────────────────────────────────────────────────────

/** Layer variant of a given kind, carrying `offset`. */
export function layerAt(kind: LayerKind, offset: number = 0): AtmosphericLayer {
  switch (kind) {
    case 'troposphere': return makeLayer(TROPOSPHERE, offset)
    case 'tropopause': return makeLayer(TROPOPAUSE, offset)
    case 'lowerStratosphere': return makeLayer(LOWER_STRATOSPHERE, offset)
    case 'upperStratosphere': return makeLayer(UPPER_STRATOSPHERE, offset)
  }
}

/**
 * Select the layer containing geopotential altitude h [m].
 * Throws AltitudeRangeError below sea level or above the stratopause.
 */
export function chooseAtmosphere(h: number, offset: number = 0): AtmosphericLayer {
  if (!(h >= 0 && h <= LAYER_BOUNDARIES.STRATOPAUSE)) {
    throw new AltitudeRangeError(
      `Altitude ${h} m is outside the supported range [0, ${LAYER_BOUNDARIES.STRATOPAUSE}] m geopotential`,
    )
  }
  if (h < LAYER_BOUNDARIES.TROPOPAUSE) return layerAt('troposphere', offset)
  if (h < LAYER_BOUNDARIES.LOWER_STRATOSPHERE) return layerAt('tropopause', offset)
  if (h < LAYER_BOUNDARIES.UPPER_STRATOSPHERE) return layerAt('lowerStratosphere', offset)
  return layerAt('upperStratosphere', offset)
}
