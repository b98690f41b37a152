/**
 * Write-once cell.
 *
 * Holds a value that may be assigned exactly once for the lifetime of the
 * cell. Used for the process-wide unit standard and for constant descriptors.
 */

import { ConfigurationError } from './errors.ts'

export class WriteOnce<T> {
  private current: { value: T } | null = null

  constructor(readonly name: string) {}

  get isSet(): boolean {
    return this.current !== null
  }

  /** Stored value, or `fallback` when nothing has been written yet. */
  getOr(fallback: T): T {
    return this.current === null ? fallback : this.current.value
  }

  /** Stored value; throws when nothing has been written yet. */
  get(): T {
    if (this.current === null) {
      throw new ConfigurationError(`${this.name} has not been set`)
    }
    return this.current.value
  }

  set(value: T): void {
    if (this.current !== null) {
      throw new ConfigurationError(
        `${this.name} has already been set to ${String(this.current.value)} and cannot be changed`,
      )
    }
    this.current = { value }
  }
}
