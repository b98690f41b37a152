/**
 * Environment configuration.
 *
 * ISA_UNIT_STANDARD selects the process-wide unit standard at startup.
 * Call before creating any atmosphere.
 */

import { getUnitStandardName, setUnitStandard } from './units.ts'
import type { UnitStandardName } from './unit-standards.ts'

export const UNIT_STANDARD_ENV = 'ISA_UNIT_STANDARD'

export type Environment = Readonly<Record<string, string | undefined>>

/**
 * Apply ISA_UNIT_STANDARD from `env` and return the standard in effect.
 * Unset leaves the registry untouched; an empty value is ignored with a warning.
 */
export function configureFromEnvironment(env: Environment = process.env): UnitStandardName {
  const raw = env[UNIT_STANDARD_ENV]
  if (raw === undefined) return getUnitStandardName()

  const standard = raw.trim()
  if (standard === '') {
    console.warn(`${UNIT_STANDARD_ENV} is empty; keeping the ${getUnitStandardName()} unit standard`)
    return getUnitStandardName()
  }

  setUnitStandard(standard)
  return getUnitStandardName()
}
