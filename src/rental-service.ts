/**
 * Rental Service - keeps rentals and car availability in step.
 *
 * Opening a rental checks that its customer and car are active, prices it
 * from the car's current daily rate and marks the car rented. Closing it
 * tombstones the rental and frees the car. References are only checked
 * when a rental is opened; later deletes leave them dangling.
 */

import { rentalDays, parseDate } from './entities/dates'
import type { CarStore } from './entities/car'
import type { CustomerStore } from './entities/customer'
import type { RentalStore } from './entities/rental'
import { RecordNotFoundError, ValidationError } from './record-store/errors'
import { Mutex } from './record-store/mutex'
import { logger } from './logger'
import type { OpenRentalInput, Rental, RentalDetail } from './types'

export interface RentalStores {
  cars: CarStore
  customers: CustomerStore
  rentals: RentalStore
}

/**
 * A rental referencing a customer or car that is absent or deleted.
 */
export class MissingReferenceError extends RecordNotFoundError {
  constructor(entity: string, id: number) {
    super(entity, id, `Referenced ${entity} ${id} does not exist`)
    this.name = 'MissingReferenceError'
  }
}

/**
 * A rental for a car that is already out on another rental.
 */
export class CarUnavailableError extends ValidationError {
  constructor(public readonly carId: number) {
    super(`Car ${carId} is already rented`, 'carId')
    this.name = 'CarUnavailableError'
  }
}

export class RentalService {
  private readonly stores: RentalStores
  // Opens and closes span several stores; one runs at a time
  private readonly mutex = new Mutex()

  constructor(stores: RentalStores) {
    this.stores = stores
  }

  /**
   * Create a rental priced at dailyRate × days (both ends inclusive).
   * Validation and reference failures throw before anything is written.
   * The price is fixed here and never follows later rate changes.
   */
  async openRental(input: OpenRentalInput): Promise<Rental> {
    return this.mutex.runExclusive(() => this.open(input))
  }

  /**
   * Tombstone a rental and mark its car available again.
   * Returns false when the rental is absent or already closed.
   */
  async closeRental(id: number): Promise<boolean> {
    return this.mutex.runExclusive(() => this.close(id))
  }

  private async open(input: OpenRentalInput): Promise<Rental> {
    const startDate = parseDate(input.startDate, 'startDate')
    const endDate = parseDate(input.endDate, 'endDate')

    const customer = await this.stores.customers.get(input.customerId)
    if (!customer) {
      throw new MissingReferenceError('customer', input.customerId)
    }

    const car = await this.stores.cars.get(input.carId)
    if (!car) {
      throw new MissingReferenceError('car', input.carId)
    }
    if (car.isRented) {
      throw new CarUnavailableError(car.id)
    }

    let days = rentalDays(startDate, endDate)
    if (days === null) {
      logger.warn('rental.days-fallback', {
        entity: 'rental',
        message: 'Could not count rental days, charging one day',
        details: { id: input.id, startDate, endDate }
      })
      days = 1
    }

    const rental: Rental = {
      id: input.id,
      customerId: customer.id,
      carId: car.id,
      startDate,
      endDate,
      totalPrice: car.dailyRate * days
    }
    await this.stores.rentals.add(rental)

    const marked = await this.stores.cars.update(car.id, { isRented: true })
    if (!marked) {
      logger.warn('rental.car-missing', {
        entity: 'car',
        message: 'Car disappeared before it could be marked rented',
        details: { rentalId: rental.id, carId: car.id }
      })
    }

    logger.debug('rental.open', {
      entity: 'rental',
      details: { id: rental.id, days, totalPrice: rental.totalPrice }
    })
    return rental
  }

  private async close(id: number): Promise<boolean> {
    const rental = await this.stores.rentals.get(id)
    if (!rental) {
      return false
    }

    if (!(await this.stores.rentals.delete(id))) {
      return false
    }

    const freed = await this.stores.cars.update(rental.carId, {
      isRented: false
    })
    if (!freed) {
      logger.warn('rental.car-missing', {
        entity: 'car',
        message: 'Rented car no longer exists',
        details: { rentalId: id, carId: rental.carId }
      })
    }

    logger.debug('rental.close', { entity: 'rental', details: { id } })
    return true
  }

  /**
   * Active rentals with customer and car resolved; null for a reference
   * that no longer resolves.
   */
  async listRentalDetails(): Promise<RentalDetail[]> {
    const rentals = await this.stores.rentals.listActive()
    const details: RentalDetail[] = []

    for (const rental of rentals) {
      details.push({
        rental,
        customer: await this.stores.customers.get(rental.customerId),
        car: await this.stores.cars.get(rental.carId),
        days: rentalDays(rental.startDate, rental.endDate) ?? 1
      })
    }

    return details
  }
}
