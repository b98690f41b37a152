/**
 * Unit standard definitions.
 *
 * The conversion factors for SI, USCS and IMPERIAL live in
 * unit-standards.json and are validated here when the module loads.
 * A unit is an affine map onto the SI base unit:
 *
 *   si = user · scale + offset
 *
 * The SI base for DISTANCE is the metre, but the SI *display* unit is the
 * kilometre (altitudes are given in km), hence its scale of 1000.
 */

import { z } from 'zod'
import { ConfigurationError } from './errors.ts'
import unitStandardsJson from './unit-standards.json'

// ─── Schemas ─────────────────────────────────────────────────────────────────

export const UNIT_STANDARDS = ['SI', 'USCS', 'IMPERIAL'] as const

export const UnitStandardNameSchema = z.enum(UNIT_STANDARDS)
export type UnitStandardName = z.infer<typeof UnitStandardNameSchema>

const UnitDefinitionSchema = z.object({
  label: z.string().min(1),
  scale: z.number().positive(),
  offset: z.number().default(0),
})
export type UnitDefinition = z.infer<typeof UnitDefinitionSchema>

const QuantityUnitsSchema = z.object({
  TEMPERATURE: UnitDefinitionSchema,
  TEMPERATURE_DIFFERENCE: UnitDefinitionSchema,
  PRESSURE: UnitDefinitionSchema,
  DENSITY: UnitDefinitionSchema,
  DISTANCE: UnitDefinitionSchema,
  DYNAMIC_VISCOSITY: UnitDefinitionSchema,
  KINEMATIC_VISCOSITY: UnitDefinitionSchema,
  SPEED: UnitDefinitionSchema,
  ACCELERATION: UnitDefinitionSchema,
  LAPSE_RATE: UnitDefinitionSchema,
  UNIV_GAS_CONSTANT: UnitDefinitionSchema,
  EARTH_MOLAR_MASS: UnitDefinitionSchema,
  SPEC_HEAT_CONSTANT: UnitDefinitionSchema,
}).strict()

export const QuantityNameSchema = QuantityUnitsSchema.keyof()
export type QuantityName = z.infer<typeof QuantityNameSchema>
export const QUANTITY_NAMES: readonly QuantityName[] = QuantityNameSchema.options

const UnitStandardsFileSchema = z.object({
  SI: QuantityUnitsSchema,
  USCS: QuantityUnitsSchema,
  IMPERIAL: QuantityUnitsSchema,
}).strict()

// ─── Definitions ─────────────────────────────────────────────────────────────

/** Raw unit-definition mapping of one standard, keyed by quantity name. */
export type UnitStandardDefinition =
  { readonly UNIT_NAME: UnitStandardName } & { readonly [Q in QuantityName]: Readonly<UnitDefinition> }

function loadUnitStandards(raw: unknown): Readonly<Record<UnitStandardName, UnitStandardDefinition>> {
  const parsed = UnitStandardsFileSchema.safeParse(raw)
  if (!parsed.success) {
    throw new ConfigurationError('unit-standards.json does not match the unit table schema', { cause: parsed.error })
  }
  const { SI, USCS, IMPERIAL } = parsed.data
  return Object.freeze({
    SI: Object.freeze({ UNIT_NAME: 'SI' as const, ...SI }),
    USCS: Object.freeze({ UNIT_NAME: 'USCS' as const, ...USCS }),
    IMPERIAL: Object.freeze({ UNIT_NAME: 'IMPERIAL' as const, ...IMPERIAL }),
  })
}

export const UNIT_DEFINITIONS = loadUnitStandards(unitStandardsJson)

/**
 * Build one value per quantity name.
 * Spelled out so the result is a complete record without a cast.
 */
export function mapQuantities<T>(fn: (quantity: QuantityName) => T): { readonly [Q in QuantityName]: T } {
  return {
    TEMPERATURE: fn('TEMPERATURE'),
    TEMPERATURE_DIFFERENCE: fn('TEMPERATURE_DIFFERENCE'),
    PRESSURE: fn('PRESSURE'),
    DENSITY: fn('DENSITY'),
    DISTANCE: fn('DISTANCE'),
    DYNAMIC_VISCOSITY: fn('DYNAMIC_VISCOSITY'),
    KINEMATIC_VISCOSITY: fn('KINEMATIC_VISCOSITY'),
    SPEED: fn('SPEED'),
    ACCELERATION: fn('ACCELERATION'),
    LAPSE_RATE: fn('LAPSE_RATE'),
    UNIV_GAS_CONSTANT: fn('UNIV_GAS_CONSTANT'),
    EARTH_MOLAR_MASS: fn('EARTH_MOLAR_MASS'),
    SPEC_HEAT_CONSTANT: fn('SPEC_HEAT_CONSTANT'),
  }
}
