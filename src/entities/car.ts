/**
 * Car records.
 *
 * Binary format (54 bytes):
 * [active:1][id:4][model:30][licensePlate:10][dailyRate:8][isRented:1]
 */

import {
  assertSlotLength,
  readSlotHeader,
  readText,
  viewOf,
  writeSlotHeader,
  writeText
} from '../record-store/binary-format'
import { fileNames } from '../record-store/constants'
import {
  requireBoolean,
  requireFiniteNumber,
  requireInt32,
  requireText
} from '../record-store/validation'
import type { DecodedSlot, RecordCodec } from '../record-store/types'
import type { Car, EntityStoreOptions, NewCar } from '../types'
import { EntityStore } from './entity-store'

export const carRecordSize = 54

export const carWidths = {
  model: 30,
  licensePlate: 10
} as const

const carOffsets = {
  model: 5, // 30 bytes
  licensePlate: 35, // 10 bytes
  dailyRate: 45, // 8 bytes (Float64)
  isRented: 53 // 1 byte
} as const

export function validateCar(car: Car): void {
  requireInt32(car.id, 'id')
  requireText(car.model, 'model', carWidths.model)
  requireText(car.licensePlate, 'licensePlate', carWidths.licensePlate)
  requireFiniteNumber(car.dailyRate, 'dailyRate')
  requireBoolean(car.isRented, 'isRented')
}

export function encodeCar(active: boolean, car: Car): Uint8Array {
  const buffer = new Uint8Array(carRecordSize)
  const view = viewOf(buffer)

  writeSlotHeader(view, active, car.id)
  writeText(buffer, carOffsets.model, car.model, carWidths.model, 'model')
  writeText(
    buffer,
    carOffsets.licensePlate,
    car.licensePlate,
    carWidths.licensePlate,
    'licensePlate'
  )
  view.setFloat64(carOffsets.dailyRate, car.dailyRate, true)
  view.setUint8(carOffsets.isRented, car.isRented ? 1 : 0)

  return buffer
}

export function decodeCar(data: Uint8Array): DecodedSlot<Car> {
  assertSlotLength(data, carRecordSize, 'car')
  const view = viewOf(data)
  const { active, id } = readSlotHeader(view)

  return {
    active,
    record: {
      id,
      model: readText(data, carOffsets.model, carWidths.model),
      licensePlate: readText(
        data,
        carOffsets.licensePlate,
        carWidths.licensePlate
      ),
      dailyRate: view.getFloat64(carOffsets.dailyRate, true),
      isRented: view.getUint8(carOffsets.isRented) !== 0
    }
  }
}

export const carCodec: RecordCodec<Car> = {
  name: 'car',
  recordSize: carRecordSize,
  validate: validateCar,
  encode: encodeCar,
  decode: decodeCar
}

export class CarStore extends EntityStore<Car> {
  static async open(options: EntityStoreOptions): Promise<CarStore> {
    const store = await EntityStore.openRecordStore(
      carCodec,
      fileNames.cars,
      options
    )
    return new CarStore(store, carCodec.name)
  }

  /**
   * Add a car; it starts out available unless `isRented` is given.
   */
  override async add(car: NewCar): Promise<number> {
    return super.add({ ...car, isRented: car.isRented ?? false })
  }
}
