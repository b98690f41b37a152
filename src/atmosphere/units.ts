/**
 * Unit registry and conversions.
 *
 * The active unit standard is process-wide and can be chosen exactly once.
 * Until it is chosen, SI is in effect. All physics runs in SI; values are
 * converted only when a public property is read (toUserUnit) or when a
 * caller hands in a number expressed in the active standard (toSI).
 */

import { ConfigurationError, UnitError } from './errors.ts'
import { WriteOnce } from './write-once.ts'
import {
  UNIT_DEFINITIONS, UNIT_STANDARDS,
  QuantityNameSchema, UnitStandardNameSchema,
  mapQuantities,
} from './unit-standards.ts'
import type { QuantityName, UnitStandardDefinition, UnitStandardName } from './unit-standards.ts'

// ─── Unit-Tagged Values ──────────────────────────────────────────────────────

export interface UnitValue {
  readonly value: number
  readonly unit: string
}

/** Tags a number with one standard's unit for a given quantity (no conversion). */
export type UnitConstructor = (value: number) => UnitValue

export type QuantityTable =
  { readonly UNIT_NAME: UnitStandardName } & { readonly [Q in QuantityName]: UnitConstructor }

export function formatUnitValue(v: UnitValue, digits?: number): string {
  const value = digits === undefined ? String(v.value) : v.value.toFixed(digits)
  return `${value} ${v.unit}`
}

function buildQuantityTable(standard: UnitStandardDefinition): QuantityTable {
  return Object.freeze({
    UNIT_NAME: standard.UNIT_NAME,
    ...mapQuantities((q): UnitConstructor => {
      const unit = standard[q].label
      return (value: number) => ({ value, unit })
    }),
  })
}

const QUANTITY_TABLES: Readonly<Record<UnitStandardName, QuantityTable>> = Object.freeze({
  SI: buildQuantityTable(UNIT_DEFINITIONS.SI),
  USCS: buildQuantityTable(UNIT_DEFINITIONS.USCS),
  IMPERIAL: buildQuantityTable(UNIT_DEFINITIONS.IMPERIAL),
})

// ─── Registry ────────────────────────────────────────────────────────────────

const activeStandard = new WriteOnce<UnitStandardName>('Unit standard')

/**
 * Select the process-wide unit standard. Exact, case-sensitive match of
 * 'SI', 'USCS' or 'IMPERIAL'. Throws ConfigurationError on a second call
 * or on an unknown name.
 */
export function setUnitStandard(standard: string): void {
  if (activeStandard.isSet) {
    throw new ConfigurationError(
      `Unit standard has already been configured as ${activeStandard.get()}`,
    )
  }
  const parsed = UnitStandardNameSchema.safeParse(standard)
  if (!parsed.success) {
    throw new ConfigurationError(
      `${standard} is not an available unit standard (expected one of ${UNIT_STANDARDS.join(', ')})`,
      { cause: parsed.error },
    )
  }
  activeStandard.set(parsed.data)
}

export function getUnitStandardName(): UnitStandardName {
  return activeStandard.getOr('SI')
}

export function isUnitStandardLocked(): boolean {
  return activeStandard.isSet
}

/** Unit constructors of the active standard. */
export function getUnits(): QuantityTable {
  return QUANTITY_TABLES[getUnitStandardName()]
}

export const getActiveUnitTable = getUnits

/** Raw unit definitions (label, scale, offset) of the active standard. */
export function getUnitStandard(): UnitStandardDefinition {
  return UNIT_DEFINITIONS[getUnitStandardName()]
}

export const UnitRegistry = Object.freeze({
  STANDARDS: UNIT_STANDARDS,
  setUnitStandard,
  getUnits,
  getUnitStandard,
  getUnitStandardName,
  isLocked: isUnitStandardLocked,
})

// ─── Conversions ─────────────────────────────────────────────────────────────

export function resolveQuantity(quantity: string): QuantityName {
  const parsed = QuantityNameSchema.safeParse(quantity)
  if (!parsed.success) {
    throw new UnitError(`Unknown quantity '${quantity}'`, { cause: parsed.error })
  }
  return parsed.data
}

/** Value in `standard`'s unit for `quantity` → SI base unit. */
export function convertToSI(x: number, quantity: string, standard: UnitStandardDefinition): number {
  const unit = standard[resolveQuantity(quantity)]
  return x * unit.scale + unit.offset
}

/** SI base value → unit-tagged value in `standard`'s unit for `quantity`. */
export function convertFromSI(x: number, quantity: string, standard: UnitStandardDefinition): UnitValue {
  const unit = standard[resolveQuantity(quantity)]
  return { value: (x - unit.offset) / unit.scale, unit: unit.label }
}

export function toSI(x: number, quantity: string): number {
  return convertToSI(x, quantity, getUnitStandard())
}

export function toUserUnit(x: number, quantity: string): UnitValue {
  return convertFromSI(x, quantity, getUnitStandard())
}
