import { describe, it, expect } from 'vitest'

import { FormatError, ValidationError } from '../record-store/errors'
import type { Car } from '../types'
import { carCodec, carRecordSize, decodeCar, encodeCar } from './car'

const camry: Car = {
  id: 1,
  model: 'Toyota Camry',
  licensePlate: 'ABC123',
  dailyRate: 1200,
  isRented: false
}

describe('car codec', () => {
  it('should encode to a 54 byte slot', () => {
    expect(carRecordSize).toBe(54)
    expect(encodeCar(true, camry).length).toBe(54)
  })

  it('should lay fields out in declaration order', () => {
    const data = encodeCar(true, { ...camry, isRented: true })
    const view = new DataView(data.buffer)

    expect(data[0]).toBe(1)
    expect(view.getInt32(1, true)).toBe(1)
    expect(new TextDecoder().decode(data.subarray(5, 17))).toBe('Toyota Camry')
    expect(data[17]).toBe(0)
    expect(new TextDecoder().decode(data.subarray(35, 41))).toBe('ABC123')
    expect(view.getFloat64(45, true)).toBe(1200)
    expect(data[53]).toBe(1)
  })

  it('should decode what it encodes', () => {
    expect(decodeCar(encodeCar(true, camry))).toEqual({
      active: true,
      record: camry
    })
    expect(decodeCar(encodeCar(false, camry)).active).toBe(false)
  })

  it('should keep fields that fill their whole width', () => {
    const car: Car = {
      ...camry,
      model: 'M'.repeat(30),
      licensePlate: 'P'.repeat(10),
      dailyRate: 1234.56
    }

    expect(decodeCar(encodeCar(true, car)).record).toEqual(car)
  })

  it('should throw FormatError for a block of the wrong size', () => {
    expect(() => decodeCar(new Uint8Array(53))).toThrow(FormatError)
  })

  it('should validate before encoding', () => {
    expect(() => carCodec.validate({ ...camry, id: 2 ** 31 })).toThrow(
      ValidationError
    )
    expect(() => carCodec.validate({ ...camry, model: 'x'.repeat(31) })).toThrow(
      '"model" is 31 bytes, maximum is 30'
    )
    expect(() => carCodec.validate({ ...camry, dailyRate: Infinity })).toThrow(
      ValidationError
    )
  })
})
