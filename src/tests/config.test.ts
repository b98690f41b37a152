/**
 * Environment configuration tests. Each test loads a fresh registry.
 */

import { describe, it, expect, vi, afterEach } from 'vitest'

async function freshConfig() {
  vi.resetModules()
  const config = await import('../atmosphere/config.ts')
  const units = await import('../atmosphere/units.ts')
  const errors = await import('../atmosphere/errors.ts')
  return { ...config, ...units, ...errors }
}

afterEach(() => {
  vi.restoreAllMocks()
})

describe('configureFromEnvironment', () => {
  it('unset variable keeps the SI default unlocked', async () => {
    const c = await freshConfig()
    expect(c.configureFromEnvironment({})).toBe('SI')
    expect(c.isUnitStandardLocked()).toBe(false)
  })

  it('empty variable warns and leaves the registry unlocked', async () => {
    const c = await freshConfig()
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    expect(c.configureFromEnvironment({ ISA_UNIT_STANDARD: '  ' })).toBe('SI')
    expect(warn).toHaveBeenCalledWith('ISA_UNIT_STANDARD is empty; keeping the SI unit standard')
    expect(c.isUnitStandardLocked()).toBe(false)
  })

  it('a named standard is applied and locked', async () => {
    const c = await freshConfig()
    expect(c.configureFromEnvironment({ ISA_UNIT_STANDARD: ' USCS ' })).toBe('USCS')
    expect(c.isUnitStandardLocked()).toBe(true)
    expect(c.getUnits().TEMPERATURE(0).unit).toBe('°F')
  })

  it('an unknown standard fails with ConfigurationError', async () => {
    const c = await freshConfig()
    expect(() => c.configureFromEnvironment({ ISA_UNIT_STANDARD: 'METRIC' })).toThrow(c.ConfigurationError)
    expect(c.isUnitStandardLocked()).toBe(false)
  })

  it('a second configuration fails', async () => {
    const c = await freshConfig()
    c.configureFromEnvironment({ [c.UNIT_STANDARD_ENV]: 'IMPERIAL' })
    expect(() => c.configureFromEnvironment({ ISA_UNIT_STANDARD: 'SI' })).toThrow(
      'Unit standard has already been configured as IMPERIAL',
    )
  })
})
