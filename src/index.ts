export { RentalSystem, withRentalSystem } from './rental-system'
export {
  RentalService,
  MissingReferenceError,
  CarUnavailableError
} from './rental-service'
export type { RentalStores } from './rental-service'
export { EntityStore } from './entities/entity-store'
export { CarStore, carCodec, carRecordSize, carWidths } from './entities/car'
export {
  CustomerStore,
  customerCodec,
  customerRecordSize,
  customerWidths
} from './entities/customer'
export { RentalStore, rentalCodec, rentalRecordSize } from './entities/rental'
export {
  parseDate,
  decodeDate,
  encodeDate,
  formatDate,
  rentalDays
} from './entities/dates'
export type { CalendarDate } from './entities/dates'
export { summarizeFleet, rateStatistics, brandOf } from './fleet-stats'
export { resolveConfig } from './config'
export type { RentalConfig, RentalConfigOptions } from './config'
export { logger, setLogLevel, setLoggingEnabled } from './logger'
export type { LogLevel, LogEntry } from './logger'
export {
  RecordStore,
  RecordNotFoundError,
  FormatError,
  ValidationError,
  DuplicateIdError,
  StorageIOError,
  StoreClosedError,
  truncateText
} from './record-store'
export type {
  StoredRecord,
  RecordPatch,
  RecordCodec,
  LocatedRecord,
  SlotEntry
} from './record-store'
export type {
  Car,
  NewCar,
  Customer,
  Rental,
  OpenRentalInput,
  RentalDetail,
  FleetSummary,
  RateStatistics,
  EntityStoreOptions
} from './types'
