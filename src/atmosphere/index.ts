/**
 * Atmosphere module: public API.
 *
 * Barrel export for the standard-atmosphere library.
 * Everything in this directory is UI-independent.
 */

export { ConfigurationError, ValidationError, AltitudeRangeError, UnitError } from './errors.ts'
export type { AtmosphereErrorCode } from './errors.ts'
export { WriteOnce } from './write-once.ts'
export { UNIT_STANDARDS, QUANTITY_NAMES, UNIT_DEFINITIONS, UnitStandardNameSchema, QuantityNameSchema } from './unit-standards.ts'
export type { UnitStandardName, QuantityName, UnitDefinition, UnitStandardDefinition } from './unit-standards.ts'
export {
  UnitRegistry, setUnitStandard, getUnits, getActiveUnitTable, getUnitStandard, getUnitStandardName, isUnitStandardLocked,
  toSI, toUserUnit, convertToSI, convertFromSI, resolveQuantity, formatUnitValue,
} from './units.ts'
export type { UnitValue, UnitConstructor, QuantityTable } from './units.ts'
export { UnitDescriptor } from './unit-descriptor.ts'
export { CONSTANTS } from './constants.ts'
export type { PhysicalConstants } from './constants.ts'
export { LAYER_BOUNDARIES, STANDARD_LAYERS, makeLayer, layerAt, chooseAtmosphere } from './layers.ts'
export type {
  LayerKind, LayerFormulas, LayerDefinition, LayerOf, AtmosphericLayer,
  Troposphere, Tropopause, LowerStratosphere, UpperStratosphere,
} from './layers.ts'
export { ISA, sutherlandViscosity, speedOfSoundAt } from './isa.ts'
export type { ISAOptions } from './isa.ts'
export { configureFromEnvironment, UNIT_STANDARD_ENV } from './config.ts'
export type { Environment } from './config.ts'
export { atmosphereProfile, sweepAtmosphere, profileSeries, linspace } from './profile.ts'
export type { AtmosphereProfile, ProfileRow, ProfileConfig, ProfileSeriesKey } from './profile.ts'
