/**
 * Record Store - fixed-size slot file with tombstone deletes.
 *
 * Slot N lives at byte N * recordSize; there is no header and no index.
 * Every operation rescans the file, so each call leaves it consistent
 * before the next one starts:
 *
 * - add: first inactive slot (lowest offset) is reused, else append
 * - update: whole slot rewritten in place, id and flag kept
 * - delete: a single zero byte written over the flag
 *
 * A partial trailing slot is not data; the next append overwrites it.
 */

import { mkdir, open } from 'node:fs/promises'
import type { FileHandle } from 'node:fs/promises'
import { dirname } from 'node:path'
import invariant from 'tiny-invariant'
import { logger } from '../logger'
import { inactiveFlag, slotOffsets } from './constants'
import { isFreeFlag } from './binary-format'
import { FormatError, StorageIOError, StoreClosedError } from './errors'
import { Mutex } from './mutex'
import type {
  LocatedRecord,
  RecordCodec,
  RecordPatch,
  RecordStoreOptions,
  SlotEntry,
  StoredRecord
} from './types'

// Slots read per request during full scans
const scanChunkSlots = 256

export class RecordStore<T extends StoredRecord> {
  private readonly filePath: string
  private readonly codec: RecordCodec<T>
  private readonly syncWrites: boolean
  private readonly mutex: Mutex

  private handle: FileHandle | null

  private constructor(
    filePath: string,
    codec: RecordCodec<T>,
    syncWrites: boolean,
    handle: FileHandle
  ) {
    this.filePath = filePath
    this.codec = codec
    this.syncWrites = syncWrites
    this.mutex = new Mutex()
    this.handle = handle
  }

  /**
   * Open a store file for reading and writing, creating it (and its
   * directory) when it does not exist yet.
   */
  static async open<T extends StoredRecord>(
    options: RecordStoreOptions<T>
  ): Promise<RecordStore<T>> {
    const { filePath, codec } = options
    invariant(
      Number.isInteger(codec.recordSize) &&
        codec.recordSize > slotOffsets.payload,
      `Invalid record size for ${codec.name}: ${codec.recordSize}`
    )

    try {
      await mkdir(dirname(filePath), { recursive: true })
    } catch (error) {
      throw new StorageIOError(
        `Cannot create directory for ${filePath}`,
        filePath,
        { cause: error }
      )
    }

    const handle = await openOrCreate(filePath, codec.name)
    return new RecordStore(
      filePath,
      codec,
      options.syncWrites ?? false,
      handle
    )
  }

  /**
   * Insert a record and return the byte offset it was written at.
   * Reuses the lowest-offset inactive slot before growing the file.
   */
  async add(record: T): Promise<number> {
    this.codec.validate(record)
    const data = this.codec.encode(true, record)

    return this.exclusive((handle) => this.insert(handle, record.id, data))
  }

  /**
   * Like add, but returns null without writing when an active record
   * already holds the id. Check and write happen under one lock.
   */
  async addUnique(record: T): Promise<number | null> {
    this.codec.validate(record)
    const data = this.codec.encode(true, record)

    return this.exclusive(async (handle) => {
      if (await this.findActive(handle, record.id)) {
        return null
      }

      return this.insert(handle, record.id, data)
    })
  }

  /**
   * Find the active record with `id`.
   * O(n) scan; corrupt slots are skipped.
   */
  async getById(id: number): Promise<LocatedRecord<T> | null> {
    return this.exclusive((handle) => this.findActive(handle, id))
  }

  /**
   * Merge `patch` onto the stored record and rewrite its slot in place.
   * The id and active flag never change.
   */
  async update(id: number, patch: RecordPatch<T>): Promise<boolean> {
    return this.exclusive(async (handle) => {
      const found = await this.findActive(handle, id)
      if (!found) {
        return false
      }

      const merged: T = { ...found.record, ...patch, id: found.record.id }
      this.codec.validate(merged)
      const data = this.codec.encode(true, merged)
      await this.writeAt(handle, data, found.offset)

      logger.debug('record.update', {
        entity: this.codec.name,
        details: { id, offset: found.offset }
      })
      return true
    })
  }

  /**
   * Tombstone the active record with `id`.
   * Only the flag byte is written; the payload stays on disk until the
   * slot is reused.
   */
  async delete(id: number): Promise<boolean> {
    return this.exclusive(async (handle) => {
      const found = await this.findActive(handle, id)
      if (!found) {
        return false
      }

      await this.writeAt(handle, Uint8Array.of(inactiveFlag), found.offset)

      logger.debug('record.delete', {
        entity: this.codec.name,
        details: { id, offset: found.offset }
      })
      return true
    })
  }

  /**
   * All active records in offset order.
   */
  async getAll(): Promise<T[]> {
    return this.exclusive(async (handle) => {
      const records: T[] = []
      for await (const slot of this.decodeSlots(handle)) {
        if (slot.active) {
          records.push(slot.record)
        }
      }
      return records
    })
  }

  /**
   * Iterate every decodable slot, inactive ones included, in offset order.
   *
   * The store stays locked until the loop finishes or breaks, so calling
   * this store's other methods from inside the loop waits forever.
   */
  async *scan(): AsyncGenerator<SlotEntry<T>> {
    await this.mutex.acquire()
    try {
      const handle = this.handle
      if (!handle) {
        throw new StoreClosedError(this.filePath)
      }
      yield* this.decodeSlots(handle)
    } finally {
      this.mutex.release()
    }
  }

  /**
   * Every decodable slot collected from scan().
   */
  async scanSlots(): Promise<SlotEntry<T>[]> {
    const slots: SlotEntry<T>[] = []
    for await (const slot of this.scan()) {
      slots.push(slot)
    }
    return slots
  }

  /**
   * Number of whole slots in the file.
   */
  async slotCount(): Promise<number> {
    return this.exclusive((handle) => this.countSlots(handle))
  }

  getRecordSize(): number {
    return this.codec.recordSize
  }

  getFilePath(): string {
    return this.filePath
  }

  isClosed(): boolean {
    return this.handle === null
  }

  /**
   * Sync the file to disk and release the handle.
   * Closing an already closed store does nothing.
   */
  async close(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      const handle = this.handle
      if (!handle) {
        return
      }
      this.handle = null

      try {
        await this.io('sync', () => handle.sync())
      } finally {
        await this.io('close', () => handle.close())
      }

      logger.debug('store.close', {
        entity: this.codec.name,
        details: { filePath: this.filePath }
      })
    })
  }

  /**
   * Run `task` with the open handle while holding the store mutex.
   */
  private async exclusive<R>(
    task: (handle: FileHandle) => Promise<R>
  ): Promise<R> {
    return this.mutex.runExclusive(async () => {
      const handle = this.handle
      if (!handle) {
        throw new StoreClosedError(this.filePath)
      }
      return task(handle)
    })
  }

  /**
   * Write an encoded record into the first free slot, else at the end.
   */
  private async insert(
    handle: FileHandle,
    id: number,
    data: Uint8Array
  ): Promise<number> {
    const slots = await this.countSlots(handle)
    const freeOffset = await this.findFreeSlot(handle, slots)
    const offset = freeOffset ?? slots * this.codec.recordSize

    await this.writeAt(handle, data, offset)

    logger.debug(freeOffset === null ? 'slot.append' : 'slot.reuse', {
      entity: this.codec.name,
      details: { id, offset }
    })
    return offset
  }

  private async countSlots(handle: FileHandle): Promise<number> {
    const stats = await this.io('stat', () => handle.stat())
    return Math.floor(stats.size / this.codec.recordSize)
  }

  /**
   * Walk the flag byte of each slot, seeking past the payload.
   */
  private async findFreeSlot(
    handle: FileHandle,
    slots: number
  ): Promise<number | null> {
    const flag = new Uint8Array(1)

    for (let slot = 0; slot < slots; slot++) {
      const offset = slot * this.codec.recordSize
      const { bytesRead } = await this.io('read', () =>
        handle.read(flag, 0, 1, offset)
      )
      if (bytesRead < 1) {
        return null
      }
      if (isFreeFlag(flag[0])) {
        return offset
      }
    }

    return null
  }

  private async findActive(
    handle: FileHandle,
    id: number
  ): Promise<LocatedRecord<T> | null> {
    for await (const slot of this.decodeSlots(handle)) {
      if (slot.active && slot.record.id === id) {
        return { record: slot.record, offset: slot.offset }
      }
    }
    return null
  }

  /**
   * Decode every whole slot in offset order, skipping corrupt ones.
   */
  private async *decodeSlots(
    handle: FileHandle
  ): AsyncGenerator<SlotEntry<T>> {
    for await (const { offset, data } of this.readSlots(handle)) {
      try {
        const slot = this.codec.decode(data)
        yield { offset, active: slot.active, record: slot.record }
      } catch (error) {
        if (!(error instanceof FormatError)) {
          throw error
        }
        logger.warn('slot.skip', {
          entity: this.codec.name,
          message: error.message,
          details: { offset }
        })
      }
    }
  }

  /**
   * Read whole slots in chunks. The yielded bytes are only valid until
   * the next iteration.
   */
  private async *readSlots(
    handle: FileHandle
  ): AsyncGenerator<{ offset: number; data: Uint8Array }> {
    const { recordSize } = this.codec
    const slots = await this.countSlots(handle)
    const buffer = new Uint8Array(recordSize * scanChunkSlots)

    for (let first = 0; first < slots; first += scanChunkSlots) {
      const count = Math.min(scanChunkSlots, slots - first)
      const position = first * recordSize
      const { bytesRead } = await this.io('read', () =>
        handle.read(buffer, 0, count * recordSize, position)
      )

      const whole = Math.floor(bytesRead / recordSize)
      for (let i = 0; i < whole; i++) {
        yield {
          offset: position + i * recordSize,
          data: buffer.subarray(i * recordSize, (i + 1) * recordSize)
        }
      }

      if (whole < count) {
        return
      }
    }
  }

  private async writeAt(
    handle: FileHandle,
    data: Uint8Array,
    offset: number
  ): Promise<void> {
    await this.io('write', () => handle.write(data, 0, data.length, offset))
    if (this.syncWrites) {
      await this.io('sync', () => handle.sync())
    }
  }

  private async io<R>(operation: string, task: () => Promise<R>): Promise<R> {
    try {
      return await task()
    } catch (error) {
      throw new StorageIOError(
        `Failed to ${operation} ${this.filePath}`,
        this.filePath,
        { cause: error }
      )
    }
  }
}

/**
 * Open `filePath` read/write; create it empty only when it is missing.
 */
async function openOrCreate(
  filePath: string,
  entity: string
): Promise<FileHandle> {
  try {
    const handle = await open(filePath, 'r+')
    logger.debug('store.open', { entity, details: { filePath } })
    return handle
  } catch (error) {
    if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
      throw new StorageIOError(`Cannot open ${filePath}`, filePath, {
        cause: error
      })
    }
  }

  try {
    const handle = await open(filePath, 'w+')
    logger.debug('store.create', { entity, details: { filePath } })
    return handle
  } catch (error) {
    throw new StorageIOError(`Cannot create ${filePath}`, filePath, {
      cause: error
    })
  }
}
