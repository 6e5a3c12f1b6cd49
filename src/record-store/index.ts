/**
 * Record Store module - fixed-size binary slots with tombstone reuse.
 */

// Main classes
export { RecordStore } from './record-store'
export { Mutex } from './mutex'

// Errors
export {
  RecordNotFoundError,
  FormatError,
  ValidationError,
  DuplicateIdError,
  StorageIOError,
  StoreClosedError
} from './errors'

// Types
export type {
  StoredRecord,
  RecordPatch,
  DecodedSlot,
  SlotEntry,
  LocatedRecord,
  RecordCodec,
  RecordStoreOptions
} from './types'

// Constants
export {
  activeFlag,
  inactiveFlag,
  slotOffsets,
  fieldSizes,
  int32Min,
  int32Max,
  fileNames
} from './constants'

// Serialization utilities
export {
  assertSlotLength,
  viewOf,
  writeSlotHeader,
  readSlotHeader,
  isFreeFlag,
  isInt32,
  textByteLength,
  writeText,
  readText,
  truncateText
} from './binary-format'

export {
  requireInt32,
  requireFiniteNumber,
  requireBoolean,
  requireText
} from './validation'
