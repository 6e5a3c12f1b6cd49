/**
 * Entity Store - a record store bound to one entity's codec and file.
 *
 * This is the contract menus and reports call; they address records by
 * id and never see offsets unless they ask for them with locate().
 */

import { join } from 'node:path'
import { DuplicateIdError } from '../record-store/errors'
import { RecordStore } from '../record-store/record-store'
import type {
  LocatedRecord,
  RecordCodec,
  RecordPatch,
  SlotEntry,
  StoredRecord
} from '../record-store/types'
import type { EntityStoreOptions } from '../types'

export class EntityStore<T extends StoredRecord> {
  protected readonly store: RecordStore<T>
  readonly entity: string

  protected constructor(store: RecordStore<T>, entity: string) {
    this.store = store
    this.entity = entity
  }

  /**
   * Open the record store for `codec` inside `options.dataDir`.
   */
  protected static openRecordStore<R extends StoredRecord>(
    codec: RecordCodec<R>,
    defaultFileName: string,
    options: EntityStoreOptions
  ): Promise<RecordStore<R>> {
    return RecordStore.open({
      filePath: join(options.dataDir, options.fileName ?? defaultFileName),
      codec,
      syncWrites: options.syncWrites
    })
  }

  /**
   * Add a record and return its byte offset.
   * Throws ValidationError (DuplicateIdError for an id already in use)
   * before anything is written.
   */
  async add(record: T): Promise<number> {
    const offset = await this.store.addUnique(record)
    if (offset === null) {
      throw new DuplicateIdError(this.entity, record.id)
    }
    return offset
  }

  async get(id: number): Promise<T | null> {
    const found = await this.store.getById(id)
    return found?.record ?? null
  }

  async locate(id: number): Promise<LocatedRecord<T> | null> {
    return this.store.getById(id)
  }

  async update(id: number, patch: RecordPatch<T>): Promise<boolean> {
    return this.store.update(id, patch)
  }

  async delete(id: number): Promise<boolean> {
    return this.store.delete(id)
  }

  async listActive(): Promise<T[]> {
    return this.store.getAll()
  }

  /**
   * Iterate every decodable slot including deleted ones. Holds the store
   * lock until the loop ends.
   */
  scan(): AsyncGenerator<SlotEntry<T>> {
    return this.store.scan()
  }

  async scanSlots(): Promise<SlotEntry<T>[]> {
    return this.store.scanSlots()
  }

  getFilePath(): string {
    return this.store.getFilePath()
  }

  isClosed(): boolean {
    return this.store.isClosed()
  }

  async close(): Promise<void> {
    await this.store.close()
  }
}
