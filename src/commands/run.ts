import { RecordNotFoundError, ValidationError } from '../record-store/errors'
import { withRentalSystem, type RentalSystem } from '../rental-system'
import type { SharedFlags } from './flags'

export type EntityName = 'car' | 'customer' | 'rental'

const entityNames: readonly EntityName[] = ['car', 'customer', 'rental']

/**
 * Open the stores from the command's flags, run `task`, close the stores.
 * Validation and missing-reference errors are reported with exit code 1.
 */
export async function runCommand(
  flags: SharedFlags,
  task: (system: RentalSystem) => Promise<void>
): Promise<void> {
  try {
    await withRentalSystem({ dataDir: flags.dataDir }, task)
  } catch (error) {
    if (
      error instanceof ValidationError ||
      error instanceof RecordNotFoundError
    ) {
      console.error(`Error: ${error.message}`)
      process.exitCode = 1
      return
    }
    throw error
  }
}

export function parseInteger(value: string, field: string): number {
  const parsed = Number(value)
  if (value.trim() === '' || !Number.isInteger(parsed)) {
    throw new ValidationError(`${field} must be an integer, got "${value}"`, field)
  }
  return parsed
}

export function parseAmount(value: string, field: string): number {
  const parsed = Number(value)
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new ValidationError(`${field} must be a number, got "${value}"`, field)
  }
  return parsed
}

export function parseEntity(value: string): EntityName {
  const entity = entityNames.find((name) => name === value.toLowerCase())
  if (!entity) {
    throw new ValidationError(
      `entity must be one of ${entityNames.join(', ')}, got "${value}"`,
      'entity'
    )
  }
  return entity
}

export function storeFor(system: RentalSystem, entity: EntityName) {
  switch (entity) {
    case 'car':
      return system.cars
    case 'customer':
      return system.customers
    case 'rental':
      return system.rentals
  }
}

export function notFound(entity: EntityName, id: number): void {
  console.log(`${entity} ${id} not found`)
  process.exitCode = 1
}
