/**
 * Physical constants: ICAO 1983 sea-level reference values and gas
 * properties of dry air.
 *
 * Built once when the module loads. Every dimensional constant is a
 * UnitDescriptor (SI magnitude + quantity tag); γ is a plain number.
 */

import { UnitDescriptor } from './unit-descriptor.ts'

export interface PhysicalConstants {
  /** Sea-level temperature T₀ */
  readonly MSL_TEMPERATURE: UnitDescriptor
  /** Sea-level pressure P₀ */
  readonly MSL_PRESSURE: UnitDescriptor
  /** Sea-level density ρ₀ */
  readonly MSL_DENSITY: UnitDescriptor
  /** Sea-level dynamic viscosity μ₀ */
  readonly MSL_DYNAMIC_VISCOSITY: UnitDescriptor
  /** μ₀ / ρ₀ */
  readonly MSL_KINEMATIC_VISCOSITY: UnitDescriptor
  /** Standard gravity */
  readonly g: UnitDescriptor
  /** Specific gas constant of dry air */
  readonly R: UnitDescriptor
  /** Universal gas constant */
  readonly R_: UnitDescriptor
  /** Earth mean radius */
  readonly r: UnitDescriptor
  /** Molar mass of dry air */
  readonly M: UnitDescriptor
  /** Sea-level speed of sound √(γ·R·T₀) */
  readonly a_o: UnitDescriptor
  /** Ratio of specific heats γ */
  readonly y: number
  readonly c_p: UnitDescriptor
  readonly c_v: UnitDescriptor
  /** Sutherland's constant */
  readonly S: UnitDescriptor
}

const GAMMA = 1.4

function buildConstants(): PhysicalConstants {
  const MSL_TEMPERATURE = UnitDescriptor.fromSI('MSL_TEMPERATURE', 'TEMPERATURE', 288.15)
  const MSL_DENSITY = UnitDescriptor.fromSI('MSL_DENSITY', 'DENSITY', 1.2250122659907)
  const MSL_DYNAMIC_VISCOSITY = UnitDescriptor.fromSI('MSL_DYNAMIC_VISCOSITY', 'DYNAMIC_VISCOSITY', 1.7894e-5)
  const R = UnitDescriptor.fromSI('R', 'SPEC_HEAT_CONSTANT', 287.052874)

  return Object.freeze({
    MSL_TEMPERATURE,
    MSL_PRESSURE: UnitDescriptor.fromSI('MSL_PRESSURE', 'PRESSURE', 101325.0),
    MSL_DENSITY,
    MSL_DYNAMIC_VISCOSITY,
    MSL_KINEMATIC_VISCOSITY: UnitDescriptor.fromSI(
      'MSL_KINEMATIC_VISCOSITY', 'KINEMATIC_VISCOSITY', MSL_DYNAMIC_VISCOSITY.si / MSL_DENSITY.si,
    ),
    g: UnitDescriptor.fromSI('g', 'ACCELERATION', 9.80665),
    R,
    R_: UnitDescriptor.fromSI('R_', 'UNIV_GAS_CONSTANT', 8.314462618),
    r: UnitDescriptor.fromSI('r', 'DISTANCE', 6371000.0),
    M: UnitDescriptor.fromSI('M', 'EARTH_MOLAR_MASS', 0.0289644),
    a_o: UnitDescriptor.fromSI('a_o', 'SPEED', Math.sqrt(GAMMA * R.si * MSL_TEMPERATURE.si)),
    y: GAMMA,
    c_p: UnitDescriptor.fromSI('c_p', 'SPEC_HEAT_CONSTANT', 1005.0),
    c_v: UnitDescriptor.fromSI('c_v', 'SPEC_HEAT_CONSTANT', 718.0),
    S: UnitDescriptor.fromSI('S', 'TEMPERATURE_DIFFERENCE', 110.4),
  })
}

export const CONSTANTS: PhysicalConstants = buildConstants()
