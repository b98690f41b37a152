/**
 * UnitDescriptor: a write-once physical quantity tagged with its kind.
 *
 * The magnitude is stored once, in SI. Reads convert to the active unit
 * standard; `set()` converts from it.
 */

import { ValidationError } from './errors.ts'
import { WriteOnce } from './write-once.ts'
import { formatUnitValue, toSI, toUserUnit } from './units.ts'
import type { UnitValue } from './units.ts'
import type { QuantityName } from './unit-standards.ts'

export class UnitDescriptor {
  private readonly cell: WriteOnce<number>

  constructor(readonly name: string, readonly quantity: QuantityName) {
    this.cell = new WriteOnce<number>(name)
  }

  static fromSI(name: string, quantity: QuantityName, si: number): UnitDescriptor {
    const descriptor = new UnitDescriptor(name, quantity)
    descriptor.setSI(si)
    return descriptor
  }

  get isSet(): boolean {
    return this.cell.isSet
  }

  /** Assign from a value expressed in the active unit standard. */
  set(value: number): void {
    this.setSI(toSI(value, this.quantity))
  }

  setSI(value: number): void {
    if (!Number.isFinite(value)) {
      throw new ValidationError(`${this.name} must be a finite number`)
    }
    this.cell.set(value)
  }

  /** Raw SI magnitude. */
  get si(): number {
    return this.cell.get()
  }

  get value(): UnitValue {
    return toUserUnit(this.si, this.quantity)
  }

  toString(): string {
    return `${this.name} = ${formatUnitValue(this.value)}`
  }
}
