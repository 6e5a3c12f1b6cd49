/**
 * Error types raised by the record store and the layers above it.
 */

/**
 * A record id that is absent or inactive.
 * Store lookups report this as `null` or `false`; it is only thrown by
 * callers that need the record to exist.
 */
export class RecordNotFoundError extends Error {
  constructor(
    public readonly entity: string,
    public readonly id: number,
    message: string = `${entity} ${id} not found`
  ) {
    super(message)
    this.name = 'RecordNotFoundError'
  }
}

/**
 * A bytes block that cannot be decoded into a record.
 */
export class FormatError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'FormatError'
  }
}

/**
 * A record rejected before encoding. Nothing has been written when this
 * is thrown.
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message)
    this.name = 'ValidationError'
  }
}

/**
 * An add whose id is already held by an active record.
 */
export class DuplicateIdError extends ValidationError {
  constructor(
    public readonly entity: string,
    public readonly id: number
  ) {
    super(`${entity} ${id} already exists`, 'id')
    this.name = 'DuplicateIdError'
  }
}

/**
 * Open, read, write, sync or close failure on a store file.
 */
export class StorageIOError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'StorageIOError'
  }
}

/**
 * Any operation on a store after it has been closed.
 */
export class StoreClosedError extends Error {
  constructor(public readonly filePath: string) {
    super(`Store is closed: ${filePath}`)
    this.name = 'StoreClosedError'
  }
}
