/**
 * Field-level serialization shared by the entity codecs.
 *
 * Slot prefix: [active:1][id:4]
 * Numbers are little-endian Int32 / Float64. Text is UTF-8, right padded
 * with zero bytes to a fixed width.
 */

import {
  activeFlag,
  inactiveFlag,
  int32Max,
  int32Min,
  slotOffsets
} from './constants'
import { FormatError, ValidationError } from './errors'

const textEncoder = new TextEncoder()
const textDecoder = new TextDecoder('utf-8', { fatal: true })

/**
 * Check that a block is exactly one slot long.
 */
export function assertSlotLength(
  data: Uint8Array,
  recordSize: number,
  entity: string
): void {
  if (data.length !== recordSize) {
    throw new FormatError(
      `${entity} record must be ${recordSize} bytes, got ${data.length}`
    )
  }
}

/**
 * Create a DataView over exactly the bytes of `data`.
 */
export function viewOf(data: Uint8Array): DataView {
  return new DataView(data.buffer, data.byteOffset, data.byteLength)
}

/**
 * Write the slot flag and id.
 */
export function writeSlotHeader(
  view: DataView,
  active: boolean,
  id: number
): void {
  view.setUint8(slotOffsets.active, active ? activeFlag : inactiveFlag)
  view.setInt32(slotOffsets.id, id, true)
}

/**
 * Read the slot flag and id.
 *
 * Only 0 and 1 are valid flags. Any other byte is corruption, not
 * "nonzero means active": scans skip the slot and add never reuses it.
 */
export function readSlotHeader(view: DataView): { active: boolean; id: number } {
  const flag = view.getUint8(slotOffsets.active)
  if (flag !== activeFlag && flag !== inactiveFlag) {
    throw new FormatError(`Invalid slot flag: ${flag}`)
  }

  return {
    active: flag === activeFlag,
    id: view.getInt32(slotOffsets.id, true)
  }
}

/**
 * Whether a flag byte read on its own marks a free slot.
 */
export function isFreeFlag(flag: number): boolean {
  return flag === inactiveFlag
}

export function isInt32(value: number): boolean {
  return Number.isInteger(value) && value >= int32Min && value <= int32Max
}

/**
 * Number of bytes `text` takes once encoded.
 */
export function textByteLength(text: string): number {
  return textEncoder.encode(text).length
}

/**
 * Write `text` into a `width`-byte field at `offset`, zero padded.
 * Text that does not fit is rejected; use truncateText first.
 */
export function writeText(
  buffer: Uint8Array,
  offset: number,
  text: string,
  width: number,
  field: string
): void {
  const bytes = textEncoder.encode(text)
  if (bytes.length > width) {
    throw new ValidationError(
      `${field} is ${bytes.length} bytes, maximum is ${width}`,
      field
    )
  }
  buffer.fill(0, offset, offset + width)
  buffer.set(bytes, offset)
}

/**
 * Read a `width`-byte text field: bytes up to the first zero, trimmed.
 * Invalid UTF-8 reads as the empty string.
 */
export function readText(
  buffer: Uint8Array,
  offset: number,
  width: number
): string {
  const field = buffer.subarray(offset, offset + width)
  const end = field.indexOf(0)
  const bytes = end === -1 ? field : field.subarray(0, end)

  try {
    return textDecoder.decode(bytes).trim()
  } catch {
    return ''
  }
}

/**
 * Shorten `text` until its UTF-8 form fits in `width` bytes, without
 * splitting a character.
 */
export function truncateText(text: string, width: number): string {
  if (textByteLength(text) <= width) {
    return text
  }

  let result = ''
  let used = 0
  for (const char of text) {
    const size = textByteLength(char)
    if (used + size > width) {
      break
    }
    result += char
    used += size
  }
  return result
}
