import { command } from 'cleye'
import { customerWidths } from '../entities/customer'
import { truncateText } from '../record-store/binary-format'
import type { Customer } from '../types'
import { sharedFlags } from './flags'
import { notFound, parseInteger, runCommand } from './run'

export const addCustomer = command(
  {
    name: 'add-customer',
    parameters: ['<id>', '<name>', '<phone>'],
    flags: {
      ...sharedFlags
    },
    help: {
      description: 'Add a customer',
      examples: ['rental add-customer 1 "Jane Doe" 0800000000']
    }
  },
  async (argv) => {
    const [id, name, phone] = argv._

    await runCommand(argv.flags, async ({ customers }) => {
      const customerId = parseInteger(id, 'id')
      const offset = await customers.add({
        id: customerId,
        name: truncateText(name.trim(), customerWidths.name),
        phone: truncateText(phone.trim(), customerWidths.phone)
      })
      console.log(`Added customer ${customerId} at offset ${offset}`)
    })
  }
)

export const updateCustomer = command(
  {
    name: 'update-customer',
    parameters: ['<id>'],
    flags: {
      ...sharedFlags,
      name: {
        type: String,
        description: 'New name'
      },
      phone: {
        type: String,
        description: 'New phone number'
      }
    },
    help: {
      description: 'Change the name or phone number of a customer',
      examples: ['rental update-customer 1 --phone 0899999999']
    }
  },
  async (argv) => {
    const [id] = argv._
    const { name, phone } = argv.flags

    await runCommand(argv.flags, async ({ customers }) => {
      const customerId = parseInteger(id, 'id')
      const patch: Partial<Omit<Customer, 'id'>> = {}
      if (name !== undefined) {
        patch.name = truncateText(name.trim(), customerWidths.name)
      }
      if (phone !== undefined) {
        patch.phone = truncateText(phone.trim(), customerWidths.phone)
      }

      if (await customers.update(customerId, patch)) {
        console.log(`Updated customer ${customerId}`)
      } else {
        notFound('customer', customerId)
      }
    })
  }
)
