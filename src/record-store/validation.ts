/**
 * Field checks run before a record is encoded.
 */

import { isInt32, textByteLength } from './binary-format'
import { ValidationError } from './errors'

function requirePresent(value: unknown, field: string): void {
  if (value === undefined || value === null) {
    throw new ValidationError(`Missing required field "${field}"`, field)
  }
}

export function requireInt32(value: unknown, field: string): void {
  requirePresent(value, field)
  if (typeof value !== 'number' || !isInt32(value)) {
    throw new ValidationError(
      `"${field}" must be a 32-bit integer, got ${String(value)}`,
      field
    )
  }
}

export function requireFiniteNumber(value: unknown, field: string): void {
  requirePresent(value, field)
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ValidationError(
      `"${field}" must be a finite number, got ${String(value)}`,
      field
    )
  }
}

export function requireBoolean(value: unknown, field: string): void {
  requirePresent(value, field)
  if (typeof value !== 'boolean') {
    throw new ValidationError(`"${field}" must be a boolean`, field)
  }
}

/**
 * Text must be a string whose UTF-8 form fits in `width` bytes.
 */
export function requireText(
  value: unknown,
  field: string,
  width: number
): void {
  requirePresent(value, field)
  if (typeof value !== 'string') {
    throw new ValidationError(`"${field}" must be a string`, field)
  }
  const size = textByteLength(value)
  if (size > width) {
    throw new ValidationError(
      `"${field}" is ${size} bytes, maximum is ${width}`,
      field
    )
  }
}
