/**
 * Constants for the fixed-size record files.
 *
 * Every slot starts with the same two fields; the rest is entity specific.
 */

// Slot flag byte
export const activeFlag = 1
export const inactiveFlag = 0

// Common slot prefix
export const slotOffsets = {
  active: 0, // 1 byte
  id: 1, // 4 bytes (Int32)
  payload: 5
} as const

// Fixed field sizes
export const fieldSizes = {
  flag: 1,
  int32: 4,
  float64: 8
} as const

export const int32Min = -0x80000000
export const int32Max = 0x7fffffff

// Default file names, one file per entity
export const fileNames = {
  cars: 'cars.bin',
  customers: 'customers.bin',
  rentals: 'rentals.bin'
} as const
