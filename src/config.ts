/**
 * Runtime configuration for the rental stores.
 */

import { resolve } from 'node:path'

const defaultDataDir = './data'

export interface RentalConfig {
  /** Directory holding cars.bin, customers.bin and rentals.bin */
  dataDir: string
  /** fsync after every write instead of only on close */
  syncWrites: boolean
}

export interface RentalConfigOptions {
  dataDir?: string
  syncWrites?: boolean
}

/**
 * Resolve configuration: explicit options first, then environment
 * (CAR_RENTAL_DATA_DIR, CAR_RENTAL_SYNC_WRITES), then defaults.
 */
export function resolveConfig(
  options: RentalConfigOptions = {},
  env: NodeJS.ProcessEnv = process.env
): RentalConfig {
  const dataDir = options.dataDir ?? env.CAR_RENTAL_DATA_DIR ?? defaultDataDir
  const syncWrites =
    options.syncWrites ?? parseFlag(env.CAR_RENTAL_SYNC_WRITES) ?? false

  return {
    dataDir: resolve(dataDir),
    syncWrites
  }
}

function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') {
    return undefined
  }
  return value === '1' || value.toLowerCase() === 'true'
}
