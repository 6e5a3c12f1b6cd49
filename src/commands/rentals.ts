import { command } from 'cleye'
import { formatDate } from '../entities/dates'
import { sharedFlags } from './flags'
import { notFound, parseInteger, runCommand } from './run'

export const rent = command(
  {
    name: 'rent',
    parameters: ['<id>', '<customer-id>', '<car-id>', '<start>', '<end>'],
    flags: {
      ...sharedFlags
    },
    help: {
      description: 'Open a rental; dates are DDMMYYYY, both days are charged',
      examples: ['rental rent 1 1 1 01012025 03012025']
    }
  },
  async (argv) => {
    const [id, customerId, carId, start, end] = argv._

    await runCommand(argv.flags, async ({ rentalService }) => {
      const rental = await rentalService.openRental({
        id: parseInteger(id, 'id'),
        customerId: parseInteger(customerId, 'customerId'),
        carId: parseInteger(carId, 'carId'),
        startDate: start,
        endDate: end
      })
      console.log(
        `Opened rental ${rental.id}: ${formatDate(rental.startDate)} to ${formatDate(rental.endDate)}, total ${rental.totalPrice.toFixed(2)}`
      )
    })
  }
)

export const returnCar = command(
  {
    name: 'return',
    parameters: ['<rental-id>'],
    flags: {
      ...sharedFlags
    },
    help: {
      description: 'Close a rental and make its car available again',
      examples: ['rental return 1']
    }
  },
  async (argv) => {
    const [id] = argv._

    await runCommand(argv.flags, async ({ rentalService }) => {
      const rentalId = parseInteger(id, 'rentalId')
      if (await rentalService.closeRental(rentalId)) {
        console.log(`Closed rental ${rentalId}`)
      } else {
        notFound('rental', rentalId)
      }
    })
  }
)
