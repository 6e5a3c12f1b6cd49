import { command } from 'cleye'
import { carWidths } from '../entities/car'
import { truncateText } from '../record-store/binary-format'
import type { Car } from '../types'
import { sharedFlags } from './flags'
import { notFound, parseAmount, parseInteger, runCommand } from './run'

export const addCar = command(
  {
    name: 'add-car',
    parameters: ['<id>', '<model>', '<plate>', '<rate>'],
    flags: {
      ...sharedFlags
    },
    help: {
      description: 'Add a car',
      examples: ['rental add-car 1 "Toyota Camry" ABC123 1200']
    }
  },
  async (argv) => {
    const [id, model, plate, rate] = argv._

    await runCommand(argv.flags, async ({ cars }) => {
      const carId = parseInteger(id, 'id')
      const offset = await cars.add({
        id: carId,
        model: truncateText(model.trim(), carWidths.model),
        licensePlate: truncateText(plate.trim(), carWidths.licensePlate),
        dailyRate: parseAmount(rate, 'rate')
      })
      console.log(`Added car ${carId} at offset ${offset}`)
    })
  }
)

export const updateCar = command(
  {
    name: 'update-car',
    parameters: ['<id>'],
    flags: {
      ...sharedFlags,
      model: {
        type: String,
        description: 'New model name'
      },
      plate: {
        type: String,
        description: 'New license plate'
      },
      rate: {
        type: String,
        description: 'New daily rate'
      }
    },
    help: {
      description: 'Change the model, plate or daily rate of a car',
      examples: ['rental update-car 1 --rate 1500']
    }
  },
  async (argv) => {
    const [id] = argv._
    const { model, plate, rate } = argv.flags

    await runCommand(argv.flags, async ({ cars }) => {
      const carId = parseInteger(id, 'id')
      const patch: Partial<Omit<Car, 'id'>> = {}
      if (model !== undefined) {
        patch.model = truncateText(model.trim(), carWidths.model)
      }
      if (plate !== undefined) {
        patch.licensePlate = truncateText(plate.trim(), carWidths.licensePlate)
      }
      if (rate !== undefined) {
        patch.dailyRate = parseAmount(rate, 'rate')
      }

      if (await cars.update(carId, patch)) {
        console.log(`Updated car ${carId}`)
      } else {
        notFound('car', carId)
      }
    })
  }
)
