import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { rm } from 'node:fs/promises'

import { brandOf, rateStatistics, summarizeFleet } from './fleet-stats'
import { RentalSystem } from './rental-system'

describe('fleet statistics', () => {
  describe('brandOf', () => {
    it('should take the first word of the model', () => {
      expect(brandOf('Toyota Camry')).toBe('Toyota')
      expect(brandOf('  Mazda   3 ')).toBe('Mazda')
      expect(brandOf('Tesla')).toBe('Tesla')
    })
  })

  describe('rateStatistics', () => {
    it('should be zero for an empty fleet', () => {
      expect(rateStatistics([])).toEqual({ min: 0, max: 0, average: 0 })
    })

    it('should handle more rates than fit in one call', () => {
      const cars = Array.from({ length: 200_000 }, (_, i) => ({
        id: i + 1,
        model: 'Toyota Yaris',
        licensePlate: `P${i}`,
        dailyRate: (i % 1000) + 1,
        isRented: false
      }))

      expect(rateStatistics(cars)).toEqual({ min: 1, max: 1000, average: 500.5 })
    })
  })

  describe('summarizeFleet', () => {
    let dataDir: string
    let system: RentalSystem

    beforeEach(async () => {
      const id = `${Date.now()}-${Math.random().toString(36).slice(2)}`
      dataDir = `/tmp/test-fleet-stats-${id}`
      system = await RentalSystem.open({ dataDir })
    })

    afterEach(async () => {
      await system.close()
      await rm(dataDir, { recursive: true, force: true })
    })

    it('should count active, deleted, rented and available cars', async () => {
      await system.cars.add({
        id: 1,
        model: 'Toyota Camry',
        licensePlate: 'AAA111',
        dailyRate: 1200
      })
      await system.cars.add({
        id: 2,
        model: 'Toyota Yaris',
        licensePlate: 'BBB222',
        dailyRate: 800
      })
      await system.cars.add({
        id: 3,
        model: 'Honda Civic',
        licensePlate: 'CCC333',
        dailyRate: 1000
      })
      await system.cars.add({
        id: 4,
        model: 'Mazda 3',
        licensePlate: 'DDD444',
        dailyRate: 1500
      })
      await system.cars.delete(4)
      await system.customers.add({ id: 1, name: 'Somchai', phone: '0811111111' })
      await system.rentalService.openRental({
        id: 1,
        customerId: 1,
        carId: 1,
        startDate: '01012025',
        endDate: '02012025'
      })

      expect(await summarizeFleet(system)).toEqual({
        totalCarRecords: 4,
        activeCars: 3,
        deletedCars: 1,
        currentlyRented: 1,
        availableNow: 2,
        rates: { min: 800, max: 1200, average: 1000 },
        carsByBrand: [
          { brand: 'Honda', count: 1 },
          { brand: 'Toyota', count: 2 }
        ]
      })
    })

    it('should ignore rentals whose car was deleted', async () => {
      await system.cars.add({
        id: 1,
        model: 'Toyota Camry',
        licensePlate: 'AAA111',
        dailyRate: 1200
      })
      await system.customers.add({ id: 1, name: 'Somchai', phone: '0811111111' })
      await system.rentalService.openRental({
        id: 1,
        customerId: 1,
        carId: 1,
        startDate: '01012025',
        endDate: '02012025'
      })
      await system.cars.delete(1)

      const summary = await summarizeFleet(system)

      expect(summary.currentlyRented).toBe(0)
      expect(summary.availableNow).toBe(0)
      expect(summary.deletedCars).toBe(1)
    })
  })
})
