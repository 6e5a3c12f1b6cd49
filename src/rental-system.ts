/**
 * Rental System - the three entity stores opened together.
 *
 * Each store owns its file handle until close(). Use withRentalSystem()
 * so the handles are released even when the caller throws.
 */

import { resolveConfig, type RentalConfigOptions } from './config'
import { CarStore } from './entities/car'
import { CustomerStore } from './entities/customer'
import { RentalStore } from './entities/rental'
import { RentalService } from './rental-service'
import { logger } from './logger'

export class RentalSystem {
  readonly cars: CarStore
  readonly customers: CustomerStore
  readonly rentals: RentalStore
  readonly rentalService: RentalService
  readonly dataDir: string

  private constructor(
    dataDir: string,
    cars: CarStore,
    customers: CustomerStore,
    rentals: RentalStore
  ) {
    this.dataDir = dataDir
    this.cars = cars
    this.customers = customers
    this.rentals = rentals
    this.rentalService = new RentalService({ cars, customers, rentals })
  }

  /**
   * Open (or create) cars.bin, customers.bin and rentals.bin.
   * If one store fails to open, the ones already open are closed and the
   * open failure is rethrown.
   */
  static async open(options: RentalConfigOptions = {}): Promise<RentalSystem> {
    const config = resolveConfig(options)
    const storeOptions = {
      dataDir: config.dataDir,
      syncWrites: config.syncWrites
    }

    const cars = await CarStore.open(storeOptions)
    let customers: CustomerStore | null = null
    try {
      customers = await CustomerStore.open(storeOptions)
      const rentals = await RentalStore.open(storeOptions)
      logger.debug('system.open', { details: { dataDir: config.dataDir } })
      return new RentalSystem(config.dataDir, cars, customers, rentals)
    } catch (error) {
      const opened: Array<CarStore | CustomerStore> = customers
        ? [cars, customers]
        : [cars]
      await Promise.allSettled(opened.map((store) => store.close()))
      throw error
    }
  }

  /**
   * Close every store, even if an earlier one fails; the first failure
   * is rethrown afterwards.
   */
  async close(): Promise<void> {
    const results = await Promise.allSettled([
      this.cars.close(),
      this.customers.close(),
      this.rentals.close()
    ])

    const failure = results.find(
      (result): result is PromiseRejectedResult => result.status === 'rejected'
    )
    if (failure) {
      throw failure.reason
    }
  }
}

/**
 * Open the rental system, run `task`, and always close it.
 */
export async function withRentalSystem<T>(
  options: RentalConfigOptions,
  task: (system: RentalSystem) => Promise<T>
): Promise<T> {
  const system = await RentalSystem.open(options)

  let result: T
  try {
    result = await task(system)
  } catch (error) {
    // The task's error wins over a failed close
    await system.close().catch((closeError: unknown) => {
      logger.error('system.close', {
        message:
          closeError instanceof Error ? closeError.message : String(closeError),
        details: { dataDir: system.dataDir }
      })
    })
    throw error
  }

  await system.close()
  return result
}
