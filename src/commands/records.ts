import { command } from 'cleye'
import { sharedFlags } from './flags'
import {
  notFound,
  parseEntity,
  parseInteger,
  runCommand,
  storeFor
} from './run'

export const get = command(
  {
    name: 'get',
    parameters: ['<entity>', '<id>'],
    flags: {
      ...sharedFlags
    },
    help: {
      description: 'Show one active car, customer or rental with its offset',
      examples: ['rental get car 1', 'rental get rental 7 -d ./data']
    }
  },
  async (argv) => {
    const [entityArg, id] = argv._

    await runCommand(argv.flags, async (system) => {
      const entity = parseEntity(entityArg)
      const recordId = parseInteger(id, 'id')
      const found = await storeFor(system, entity).locate(recordId)

      if (found) {
        console.log(
          JSON.stringify({ ...found.record, offset: found.offset }, null, 2)
        )
      } else {
        notFound(entity, recordId)
      }
    })
  }
)

export const list = command(
  {
    name: 'list',
    parameters: ['<entity>'],
    flags: {
      ...sharedFlags
    },
    help: {
      description: 'List active cars, customers or rentals',
      examples: ['rental list car']
    }
  },
  async (argv) => {
    const [entityArg] = argv._

    await runCommand(argv.flags, async (system) => {
      const entity = parseEntity(entityArg)
      const records = await storeFor(system, entity).listActive()

      for (const record of records) {
        console.log(JSON.stringify(record))
      }
      console.log(`Total: ${records.length} active ${entity} records`)
    })
  }
)

export const deleteCmd = command(
  {
    name: 'delete',
    parameters: ['<entity>', '<id>'],
    flags: {
      ...sharedFlags
    },
    help: {
      description: 'Soft delete a car, customer or rental',
      examples: ['rental delete customer 3']
    }
  },
  async (argv) => {
    const [entityArg, id] = argv._

    await runCommand(argv.flags, async (system) => {
      const entity = parseEntity(entityArg)
      const recordId = parseInteger(id, 'id')

      if (await storeFor(system, entity).delete(recordId)) {
        console.log(`Deleted ${entity} ${recordId}`)
      } else {
        notFound(entity, recordId)
      }
    })
  }
)
