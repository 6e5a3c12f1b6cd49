/**
 * Corruption handling integration tests for RecordStore.
 * Tests partial trailing slots and damaged slot bytes.
 */

import { describe, it, expect, afterEach } from 'vitest'
import { appendFile, stat } from 'node:fs/promises'
import { RecordStore } from '../record-store'
import { carCodec } from '../../entities/car'
import { rentalCodec, rentalRecordSize } from '../../entities/rental'
import type { Car, Rental } from '../../types'
import { createTestPaths, cleanup, setByte, type TestPaths } from './helpers'

function rental(id: number): Rental {
  return {
    id,
    customerId: 1,
    carId: 1,
    startDate: 1012025,
    endDate: 3012025,
    totalPrice: 3600
  }
}

describe('RecordStore corruption handling', () => {
  const testPathsList: TestPaths[] = []

  afterEach(async () => {
    await cleanup(testPathsList)
    testPathsList.length = 0
  })

  async function seedRentals(prefix: string, count: number): Promise<TestPaths> {
    const paths = createTestPaths(prefix)
    testPathsList.push(paths)

    const store = await RecordStore.open({
      filePath: paths.filePath,
      codec: rentalCodec
    })
    for (let id = 1; id <= count; id++) {
      await store.add(rental(id))
    }
    await store.close()
    return paths
  }

  describe('partial trailing slot', () => {
    it('ignores bytes past the last whole slot', async () => {
      const paths = await seedRentals('corrupt-partial-read', 2)
      await appendFile(paths.filePath, new Uint8Array(10).fill(1))

      const store = await RecordStore.open({
        filePath: paths.filePath,
        codec: rentalCodec
      })

      expect(await store.slotCount()).toBe(2)
      expect(await store.getAll()).toEqual([rental(1), rental(2)])

      await store.close()
    })

    it('appends over the partial slot', async () => {
      const paths = await seedRentals('corrupt-partial-append', 2)
      await appendFile(paths.filePath, new Uint8Array(10).fill(1))

      const store = await RecordStore.open({
        filePath: paths.filePath,
        codec: rentalCodec
      })

      const offset = await store.add(rental(3))
      expect(offset).toBe(2 * rentalRecordSize)
      expect(await store.getById(3)).toEqual({ record: rental(3), offset })
      await store.close()

      const stats = await stat(paths.filePath)
      expect(stats.size).toBe(3 * rentalRecordSize)
    })
  })

  describe('damaged slots', () => {
    it('skips a slot with an invalid flag byte and keeps scanning', async () => {
      const paths = await seedRentals('corrupt-flag', 3)
      await setByte(paths.filePath, rentalRecordSize, 0x7f)

      const store = await RecordStore.open({
        filePath: paths.filePath,
        codec: rentalCodec
      })

      expect(await store.getAll()).toEqual([rental(1), rental(3)])
      expect(await store.getById(2)).toBeNull()
      expect(await store.getById(3)).toEqual({
        record: rental(3),
        offset: 2 * rentalRecordSize
      })

      await store.close()
    })

    it('does not reuse a slot with an invalid flag byte', async () => {
      const paths = await seedRentals('corrupt-flag-reuse', 3)
      await setByte(paths.filePath, rentalRecordSize, 0x7f)

      const store = await RecordStore.open({
        filePath: paths.filePath,
        codec: rentalCodec
      })

      expect(await store.add(rental(4))).toBe(3 * rentalRecordSize)

      await store.close()
    })

    it('reads undecodable text as an empty string', async () => {
      const paths = createTestPaths('corrupt-text')
      testPathsList.push(paths)

      const car: Car = {
        id: 1,
        model: 'Toyota Camry',
        licensePlate: 'ABC123',
        dailyRate: 1200,
        isRented: false
      }
      const first = await RecordStore.open({
        filePath: paths.filePath,
        codec: carCodec
      })
      await first.add(car)
      await first.close()

      // First byte of the model field
      await setByte(paths.filePath, 5, 0xff)

      const second = await RecordStore.open({
        filePath: paths.filePath,
        codec: carCodec
      })
      expect((await second.getById(1))?.record).toEqual({ ...car, model: '' })
      await second.close()
    })
  })
})
