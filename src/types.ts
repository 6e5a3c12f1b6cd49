export interface Car {
  id: number
  /** Up to 30 bytes of UTF-8 */
  model: string
  /** Up to 10 bytes of UTF-8 */
  licensePlate: string
  dailyRate: number
  /** Set while an active rental holds the car */
  isRented: boolean
}

export interface Customer {
  id: number
  /** Up to 30 bytes of UTF-8 */
  name: string
  /** Up to 15 bytes of UTF-8 */
  phone: string
}

export interface Rental {
  id: number
  customerId: number
  carId: number
  /** DDMMYYYY */
  startDate: number
  /** DDMMYYYY */
  endDate: number
  /** Daily rate times days, fixed when the rental was opened */
  totalPrice: number
}

/**
 * Fields accepted when adding a car. A new car is not rented unless stated.
 */
export type NewCar = Omit<Car, 'isRented'> & { isRented?: boolean }

export interface OpenRentalInput {
  id: number
  customerId: number
  carId: number
  /** DDMMYYYY as an 8-digit string, or as an integer */
  startDate: string | number
  endDate: string | number
}

/**
 * An active rental with its references resolved; `null` where the
 * customer or car has since been deleted.
 */
export interface RentalDetail {
  rental: Rental
  customer: Customer | null
  car: Car | null
  days: number
}

export interface RateStatistics {
  min: number
  max: number
  average: number
}

export interface FleetSummary {
  /** Decodable car slots, deleted ones included */
  totalCarRecords: number
  activeCars: number
  deletedCars: number
  currentlyRented: number
  availableNow: number
  rates: RateStatistics
  /** Active cars per brand (first word of the model), sorted by brand */
  carsByBrand: Array<{ brand: string; count: number }>
}

export interface EntityStoreOptions {
  /** Directory holding the store file */
  dataDir: string
  /** Override the default file name */
  fileName?: string
  /** fsync after every write instead of only on close (default: false) */
  syncWrites?: boolean
}
