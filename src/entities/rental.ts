/**
 * Rental records.
 *
 * Binary format (29 bytes):
 * [active:1][id:4][customerId:4][carId:4][startDate:4][endDate:4][totalPrice:8]
 *
 * Dates are DDMMYYYY integers. References are not checked here; see
 * RentalService.
 */

import {
  assertSlotLength,
  readSlotHeader,
  viewOf,
  writeSlotHeader
} from '../record-store/binary-format'
import { fileNames } from '../record-store/constants'
import { requireFiniteNumber, requireInt32 } from '../record-store/validation'
import type { DecodedSlot, RecordCodec } from '../record-store/types'
import type { EntityStoreOptions, Rental } from '../types'
import { EntityStore } from './entity-store'

export const rentalRecordSize = 29

const rentalOffsets = {
  customerId: 5, // 4 bytes
  carId: 9, // 4 bytes
  startDate: 13, // 4 bytes
  endDate: 17, // 4 bytes
  totalPrice: 21 // 8 bytes (Float64)
} as const

export function validateRental(rental: Rental): void {
  requireInt32(rental.id, 'id')
  requireInt32(rental.customerId, 'customerId')
  requireInt32(rental.carId, 'carId')
  requireInt32(rental.startDate, 'startDate')
  requireInt32(rental.endDate, 'endDate')
  requireFiniteNumber(rental.totalPrice, 'totalPrice')
}

export function encodeRental(active: boolean, rental: Rental): Uint8Array {
  const buffer = new Uint8Array(rentalRecordSize)
  const view = viewOf(buffer)

  writeSlotHeader(view, active, rental.id)
  view.setInt32(rentalOffsets.customerId, rental.customerId, true)
  view.setInt32(rentalOffsets.carId, rental.carId, true)
  view.setInt32(rentalOffsets.startDate, rental.startDate, true)
  view.setInt32(rentalOffsets.endDate, rental.endDate, true)
  view.setFloat64(rentalOffsets.totalPrice, rental.totalPrice, true)

  return buffer
}

export function decodeRental(data: Uint8Array): DecodedSlot<Rental> {
  assertSlotLength(data, rentalRecordSize, 'rental')
  const view = viewOf(data)
  const { active, id } = readSlotHeader(view)

  return {
    active,
    record: {
      id,
      customerId: view.getInt32(rentalOffsets.customerId, true),
      carId: view.getInt32(rentalOffsets.carId, true),
      startDate: view.getInt32(rentalOffsets.startDate, true),
      endDate: view.getInt32(rentalOffsets.endDate, true),
      totalPrice: view.getFloat64(rentalOffsets.totalPrice, true)
    }
  }
}

export const rentalCodec: RecordCodec<Rental> = {
  name: 'rental',
  recordSize: rentalRecordSize,
  validate: validateRental,
  encode: encodeRental,
  decode: decodeRental
}

export class RentalStore extends EntityStore<Rental> {
  static async open(options: EntityStoreOptions): Promise<RentalStore> {
    const store = await EntityStore.openRecordStore(
      rentalCodec,
      fileNames.rentals,
      options
    )
    return new RentalStore(store, rentalCodec.name)
  }
}
