import { readFile, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'

export interface TestPaths {
  /** Per-test directory under /tmp */
  dir: string
  /** Store file inside `dir` */
  filePath: string
}

/**
 * Generate a unique test directory and store path with a prefix.
 */
export function createTestPaths(prefix: string, fileName = 'store.bin'): TestPaths {
  const id = `${Date.now()}-${Math.random().toString(36).slice(2)}`
  const dir = `/tmp/test-${prefix}-${id}`
  return { dir, filePath: join(dir, fileName) }
}

/**
 * Remove test directories.
 */
export async function cleanup(paths: TestPaths[]): Promise<void> {
  for (const { dir } of paths) {
    await rm(dir, { recursive: true, force: true })
  }
}

/**
 * Read a store file as raw bytes.
 */
export async function readBytes(filePath: string): Promise<Uint8Array> {
  return new Uint8Array(await readFile(filePath))
}

/**
 * Overwrite one byte of a file.
 */
export async function setByte(
  filePath: string,
  index: number,
  value: number
): Promise<void> {
  const data = await readBytes(filePath)
  data[index] = value
  await writeFile(filePath, data)
}
