import { command } from 'cleye'
import { summarizeFleet } from '../fleet-stats'
import { sharedFlags } from './flags'
import { runCommand } from './run'

export const stats = command(
  {
    name: 'stats',
    flags: {
      ...sharedFlags
    },
    help: {
      description: 'Print fleet counts and daily rate statistics',
      examples: ['rental stats', 'rental stats -d ./data']
    }
  },
  async (argv) => {
    await runCommand(argv.flags, async (system) => {
      const summary = await summarizeFleet(system)
      console.log(JSON.stringify(summary, null, 2))
    })
  }
)
