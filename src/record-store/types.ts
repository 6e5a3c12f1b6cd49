/**
 * Types for the fixed-size record store.
 */

/**
 * Fields every stored entity carries. `active` is not part of the record
 * value; it lives in the slot flag byte.
 */
export interface StoredRecord {
  /** Logical id, unique among active records of one entity type */
  id: number
}

/**
 * Fields an update may change. Identity is fixed for the life of a slot.
 */
export type RecordPatch<T extends StoredRecord> = Partial<Omit<T, 'id'>>

/**
 * A decoded slot.
 */
export interface DecodedSlot<T extends StoredRecord> {
  active: boolean
  record: T
}

/**
 * A decoded slot together with its byte offset in the file.
 */
export interface SlotEntry<T extends StoredRecord> extends DecodedSlot<T> {
  offset: number
}

/**
 * An active record and where it lives.
 */
export interface LocatedRecord<T extends StoredRecord> {
  record: T
  offset: number
}

/**
 * Encode/decode pair defining one entity's wire format.
 */
export interface RecordCodec<T extends StoredRecord> {
  /** Entity name used in messages and logs */
  name: string
  /** Exact size of every slot in bytes */
  recordSize: number
  /** Throws ValidationError for a missing, mistyped or oversized field */
  validate(record: T): void
  encode(active: boolean, record: T): Uint8Array
  /** Throws FormatError when `data` is not exactly `recordSize` bytes */
  decode(data: Uint8Array): DecodedSlot<T>
}

/**
 * Options for opening a record store.
 */
export interface RecordStoreOptions<T extends StoredRecord> {
  /** Path to the store file; created with its directory when absent */
  filePath: string
  codec: RecordCodec<T>
  /** fsync after every write instead of only on close (default: false) */
  syncWrites?: boolean
}
