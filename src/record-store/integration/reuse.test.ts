/**
 * Free-space reuse integration tests for RecordStore.
 * Tests tombstones and first-fit slot reuse.
 */

import { describe, it, expect, afterEach } from 'vitest'
import { RecordStore } from '../record-store'
import { customerCodec, customerRecordSize } from '../../entities/customer'
import type { Customer } from '../../types'
import { createTestPaths, cleanup, readBytes, type TestPaths } from './helpers'

function customer(id: number, name = `Customer ${id}`): Customer {
  return { id, name, phone: `08${String(id).padStart(8, '0')}` }
}

describe('RecordStore slot reuse', () => {
  const testPathsList: TestPaths[] = []

  afterEach(async () => {
    await cleanup(testPathsList)
    testPathsList.length = 0
  })

  async function openCustomers(
    prefix: string
  ): Promise<{ store: RecordStore<Customer>; paths: TestPaths }> {
    const paths = createTestPaths(prefix)
    testPathsList.push(paths)
    const store = await RecordStore.open({
      filePath: paths.filePath,
      codec: customerCodec
    })
    return { store, paths }
  }

  it('reuses a deleted slot instead of appending', async () => {
    const { store } = await openCustomers('reuse-single')

    await store.add(customer(1))
    await store.add(customer(2))
    await store.add(customer(3))
    await store.delete(2)

    const offset = await store.add(customer(4))

    expect(offset).toBe(customerRecordSize)
    expect(await store.slotCount()).toBe(3)
    expect((await store.getAll()).map((c) => c.id)).toEqual([1, 4, 3])

    await store.close()
  })

  it('picks the lowest free offset first', async () => {
    const { store } = await openCustomers('reuse-lowest')

    for (let id = 1; id <= 5; id++) {
      await store.add(customer(id))
    }
    await store.delete(4)
    await store.delete(2)

    expect(await store.add(customer(6))).toBe(customerRecordSize)
    expect(await store.add(customer(7))).toBe(3 * customerRecordSize)
    expect(await store.add(customer(8))).toBe(5 * customerRecordSize)

    await store.close()
  })

  it('overwrites the old id when a slot is reused', async () => {
    const { store } = await openCustomers('reuse-id')

    expect(await store.add(customer(1))).toBe(0)
    await store.delete(1)
    expect(await store.add(customer(2))).toBe(0)

    expect(await store.getById(2)).toEqual({ record: customer(2), offset: 0 })
    expect(await store.getById(1)).toBeNull()

    await store.close()
  })

  it('writes only the flag byte on delete', async () => {
    const { store, paths } = await openCustomers('reuse-tombstone')

    await store.add(customer(1, 'Somchai'))
    await store.close()
    const before = await readBytes(paths.filePath)

    const reopened = await RecordStore.open({
      filePath: paths.filePath,
      codec: customerCodec
    })
    await reopened.delete(1)
    await reopened.close()
    const after = await readBytes(paths.filePath)

    expect(before[0]).toBe(1)
    expect(after[0]).toBe(0)
    expect(after.subarray(1)).toEqual(before.subarray(1))
  })

  it('overwrites the whole stale slot on reuse', async () => {
    const { store, paths } = await openCustomers('reuse-overwrite')

    await store.add({ id: 1, name: 'A much longer customer name', phone: '0811111111' })
    await store.delete(1)
    await store.add({ id: 2, name: 'Bo', phone: '1' })
    await store.close()

    const bytes = await readBytes(paths.filePath)
    // name field starts at byte 5: "Bo" then zero padding
    expect(Array.from(bytes.subarray(5, 9))).toEqual([0x42, 0x6f, 0, 0])
    // phone field starts at byte 35: "1" then zero padding
    expect(Array.from(bytes.subarray(35, 38))).toEqual([0x31, 0, 0])
  })
})
