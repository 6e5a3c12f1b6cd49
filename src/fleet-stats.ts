/**
 * Fleet summary: counts and rate statistics over the car and rental
 * stores, the figures behind the detailed summary report.
 */

import type { CarStore } from './entities/car'
import type { RentalStore } from './entities/rental'
import type { Car, FleetSummary, RateStatistics } from './types'

export interface FleetStores {
  cars: CarStore
  rentals: RentalStore
}

/**
 * First word of the model, e.g. "Toyota" for "Toyota Camry".
 */
export function brandOf(model: string): string {
  return model.trim().split(/\s+/)[0] ?? ''
}

export function rateStatistics(cars: Car[]): RateStatistics {
  if (cars.length === 0) {
    return { min: 0, max: 0, average: 0 }
  }

  let min = Infinity
  let max = -Infinity
  let total = 0
  for (const car of cars) {
    min = Math.min(min, car.dailyRate)
    max = Math.max(max, car.dailyRate)
    total += car.dailyRate
  }
  return { min, max, average: total / cars.length }
}

export async function summarizeFleet(
  stores: FleetStores
): Promise<FleetSummary> {
  let totalCarRecords = 0
  const activeCars: Car[] = []
  for await (const slot of stores.cars.scan()) {
    totalCarRecords++
    if (slot.active) {
      activeCars.push(slot.record)
    }
  }
  const rentals = await stores.rentals.listActive()

  const activeIds = new Set(activeCars.map((car) => car.id))
  const rentedIds = new Set(rentals.map((rental) => rental.carId))
  let currentlyRented = 0
  for (const id of rentedIds) {
    if (activeIds.has(id)) {
      currentlyRented++
    }
  }

  const brandCounts = new Map<string, number>()
  for (const car of activeCars) {
    const brand = brandOf(car.model)
    brandCounts.set(brand, (brandCounts.get(brand) ?? 0) + 1)
  }
  const carsByBrand = [...brandCounts.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([brand, count]) => ({ brand, count }))

  return {
    totalCarRecords,
    activeCars: activeCars.length,
    deletedCars: totalCarRecords - activeCars.length,
    currentlyRented,
    availableNow: activeCars.length - currentlyRented,
    rates: rateStatistics(activeCars),
    carsByBrand
  }
}
