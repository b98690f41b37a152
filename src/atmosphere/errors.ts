/**
 * Error taxonomy for the atmosphere library.
 *
 * Every error is raised synchronously at the point of violation and carries
 * a stable `code` so callers can branch without matching on messages.
 */

import type { ZodError } from 'zod'

export type AtmosphereErrorCode =
  | 'ISA_CONFIGURATION'
  | 'ISA_VALIDATION'
  | 'ISA_ALTITUDE_RANGE'
  | 'ISA_UNIT'

/** Unit standard set twice or set to an unknown name; write-once value reassigned. */
export class ConfigurationError extends Error {
  readonly code: AtmosphereErrorCode = 'ISA_CONFIGURATION'

  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'ConfigurationError'
  }
}

/** Non-finite or negative altitude, offset below absolute zero, or a bad profile sweep. */
export class ValidationError extends Error {
  readonly code: AtmosphereErrorCode = 'ISA_VALIDATION'

  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'ValidationError'
  }
}

/** Wrap a failed zod parse as `${context}: path: message; ...`. */
export function validationErrorFrom(context: string, error: ZodError): ValidationError {
  const detail = error.issues
    .map(issue => `${issue.path.join('.')}: ${issue.message}`)
    .join('; ')
  return new ValidationError(`${context}: ${detail}`, { cause: error })
}

/**
 * Altitude outside [0, 47 000] m geopotential.
 * Extends the built-in RangeError so `instanceof RangeError` also holds.
 */
export class AltitudeRangeError extends RangeError {
  readonly code: AtmosphereErrorCode = 'ISA_ALTITUDE_RANGE'

  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'AltitudeRangeError'
  }
}

/** Conversion requested for a quantity name the unit tables do not know. */
export class UnitError extends Error {
  readonly code: AtmosphereErrorCode = 'ISA_UNIT'

  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'UnitError'
  }
}
