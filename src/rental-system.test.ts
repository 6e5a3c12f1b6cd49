import { describe, it, expect, afterEach, vi } from 'vitest'
import { mkdir, readdir, rm } from 'node:fs/promises'

import { EntityStore } from './entities/entity-store'
import { StorageIOError, StoreClosedError } from './record-store/errors'
import { setLoggingEnabled } from './logger'
import { RentalSystem, withRentalSystem } from './rental-system'

describe('RentalSystem', () => {
  const dirs: string[] = []

  function createDataDir(prefix: string): string {
    const id = `${Date.now()}-${Math.random().toString(36).slice(2)}`
    const dir = `/tmp/test-${prefix}-${id}`
    dirs.push(dir)
    return dir
  }

  afterEach(async () => {
    vi.restoreAllMocks()
    setLoggingEnabled(true)
    for (const dir of dirs) {
      await rm(dir, { recursive: true, force: true })
    }
    dirs.length = 0
  })

  it('should create one file per entity', async () => {
    const dataDir = createDataDir('system-files')

    const system = await RentalSystem.open({ dataDir })
    await system.close()

    expect((await readdir(dataDir)).sort()).toEqual([
      'cars.bin',
      'customers.bin',
      'rentals.bin'
    ])
  })

  it('should close every store when closed twice', async () => {
    const system = await RentalSystem.open({
      dataDir: createDataDir('system-close')
    })

    await system.close()
    await expect(system.close()).resolves.toBeUndefined()
    await expect(system.cars.get(1)).rejects.toBeInstanceOf(StoreClosedError)
  })

  it('should close the stores when the task throws', async () => {
    const captured: RentalSystem[] = []

    await expect(
      withRentalSystem({ dataDir: createDataDir('system-throw') }, async (system) => {
        captured.push(system)
        throw new Error('menu failed')
      })
    ).rejects.toThrow('menu failed')

    expect(captured).toHaveLength(1)
    const [system] = captured
    expect(system.cars.isClosed()).toBe(true)
    expect(system.customers.isClosed()).toBe(true)
    expect(system.rentals.isClosed()).toBe(true)
  })

  it('should close the opened stores and rethrow when a later open fails', async () => {
    const dataDir = createDataDir('system-open-fail')
    // A directory where rentals.bin should be cannot be opened as a file
    await mkdir(`${dataDir}/rentals.bin`, { recursive: true })
    const close = vi.spyOn(EntityStore.prototype, 'close')

    await expect(RentalSystem.open({ dataDir })).rejects.toBeInstanceOf(
      StorageIOError
    )
    expect(close).toHaveBeenCalledTimes(2)
  })

  it('should keep the task error when closing also fails', async () => {
    const captured: RentalSystem[] = []
    setLoggingEnabled(false)

    await expect(
      withRentalSystem({ dataDir: createDataDir('system-close-fail') }, async (system) => {
        captured.push(system)
        vi.spyOn(system, 'close').mockRejectedValueOnce(new Error('sync failed'))
        throw new Error('menu failed')
      })
    ).rejects.toThrow('menu failed')

    const [system] = captured
    await system.close()
    expect(system.cars.isClosed()).toBe(true)
  })

  it('should return the task result and keep data for the next open', async () => {
    const dataDir = createDataDir('system-persist')

    const offset = await withRentalSystem({ dataDir }, (system) =>
      system.customers.add({ id: 7, name: 'Jane', phone: '0800000000' })
    )
    expect(offset).toBe(0)

    const customer = await withRentalSystem({ dataDir }, (system) =>
      system.customers.get(7)
    )
    expect(customer).toEqual({ id: 7, name: 'Jane', phone: '0800000000' })
  })
})
