/**
 * Customer records.
 *
 * Binary format (50 bytes):
 * [active:1][id:4][name:30][phone:15]
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
import { requireInt32, requireText } from '../record-store/validation'
import type { DecodedSlot, RecordCodec } from '../record-store/types'
import type { Customer, EntityStoreOptions } from '../types'
import { EntityStore } from './entity-store'

export const customerRecordSize = 50

export const customerWidths = {
  name: 30,
  phone: 15
} as const

const customerOffsets = {
  name: 5, // 30 bytes
  phone: 35 // 15 bytes
} as const

export function validateCustomer(customer: Customer): void {
  requireInt32(customer.id, 'id')
  requireText(customer.name, 'name', customerWidths.name)
  requireText(customer.phone, 'phone', customerWidths.phone)
}

export function encodeCustomer(
  active: boolean,
  customer: Customer
): Uint8Array {
  const buffer = new Uint8Array(customerRecordSize)

  writeSlotHeader(viewOf(buffer), active, customer.id)
  writeText(
    buffer,
    customerOffsets.name,
    customer.name,
    customerWidths.name,
    'name'
  )
  writeText(
    buffer,
    customerOffsets.phone,
    customer.phone,
    customerWidths.phone,
    'phone'
  )

  return buffer
}

export function decodeCustomer(data: Uint8Array): DecodedSlot<Customer> {
  assertSlotLength(data, customerRecordSize, 'customer')
  const { active, id } = readSlotHeader(viewOf(data))

  return {
    active,
    record: {
      id,
      name: readText(data, customerOffsets.name, customerWidths.name),
      phone: readText(data, customerOffsets.phone, customerWidths.phone)
    }
  }
}

export const customerCodec: RecordCodec<Customer> = {
  name: 'customer',
  recordSize: customerRecordSize,
  validate: validateCustomer,
  encode: encodeCustomer,
  decode: decodeCustomer
}

export class CustomerStore extends EntityStore<Customer> {
  static async open(options: EntityStoreOptions): Promise<CustomerStore> {
    const store = await EntityStore.openRecordStore(
      customerCodec,
      fileNames.customers,
      options
    )
    return new CustomerStore(store, customerCodec.name)
  }
}
