import { mkdir, readFile, readdir, rename, rm, writeFile } from 'fs/promises'
import path from 'path'
import { StorageError } from '../errors'

function isMissingFile(error: unknown) {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

/** Reads and parses a JSON file. Resolves null when the file does not exist. */
export async function readJsonFile(filePath: string): Promise<unknown> {
  let content: string
  try {
    content = await readFile(filePath, 'utf-8')
  } catch (error) {
    if (isMissingFile(error)) return null
    throw new StorageError(filePath, 'Failed to read file', { cause: error })
  }
  try {
    const parsed: unknown = JSON.parse(content)
    return parsed
  } catch (error) {
    throw new StorageError(filePath, 'File is not valid JSON', { cause: error })
  }
}

/** Writes to a sibling temporary file, then renames it over the target. */
export async function writeJsonFile(filePath: string, data: unknown) {
  const tempPath = `${filePath}.tmp`
  try {
    await mkdir(path.dirname(filePath), { recursive: true })
    await writeFile(tempPath, JSON.stringify(data, null, 2), 'utf-8')
    await rename(tempPath, filePath)
  } catch (error) {
    throw new StorageError(filePath, 'Failed to write file', { cause: error })
  }
}

export async function removeFile(filePath: string) {
  try {
    await rm(filePath, { force: true })
  } catch (error) {
    throw new StorageError(filePath, 'Failed to remove file', { cause: error })
  }
}

export async function listJsonFiles(dir: string) {
  try {
    const entries = await readdir(dir)
    return entries.filter((entry) => entry.endsWith('.json')).sort()
  } catch (error) {
    if (isMissingFile(error)) return []
    throw new StorageError(dir, 'Failed to list directory', { cause: error })
  }
}

/** Runs tasks one after another so read-modify-write cycles on a file never interleave. */
export class TaskQueue {
  private tail: Promise<unknown> = Promise.resolve()

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task)
    // the next task waits for this one whether it succeeds or fails
    this.tail = result.then(
      () => undefined,
      () => undefined
    )
    return result
  }
}
