import path from 'path'
import { InvalidArgumentError, InvalidSnapshotError, StorageError } from './errors'
import { createLogger } from './logger'
import { getDifficultySettings, getModeDisplayName } from './settings'
import type { GameSnapshot } from './snapshot'
import { isRecord, parseSnapshot } from './snapshot'
import { listJsonFiles, readJsonFile, removeFile, writeJsonFile } from './storage/jsonFiles'

export interface SavePayload {
  slot: string
  description: string
  snapshot: GameSnapshot
  savedAt: number
}

export interface SaveSummary {
  slot: string
  description: string
  savedAt: number
  mode: GameSnapshot['mode']
  difficulty: GameSnapshot['difficulty']
  score: number
  level: number
}

export const QUICK_SAVE_SLOT = 'quicksave'

const SLOT_PATTERN = /^[A-Za-z0-9 _-]{1,50}$/

function assertSlot(slot: string) {
  if (!SLOT_PATTERN.test(slot)) {
    throw new InvalidArgumentError(
      `Save name "${slot}" must be 1-50 letters, digits, spaces, dashes or underscores`
    )
  }
}

function describeSnapshot(snapshot: GameSnapshot) {
  const mode = getModeDisplayName(snapshot.mode)
  const difficulty = getDifficultySettings(snapshot.difficulty).displayName
  return `${mode} (${difficulty}) - level ${snapshot.level}, ${snapshot.score} points`
}

function parsePayload(data: unknown, slot: string): SavePayload {
  if (!isRecord(data)) {
    throw new InvalidSnapshotError(`save "${slot}" is not an object`)
  }
  const { savedAt, description } = data
  if (typeof savedAt !== 'number' || !Number.isFinite(savedAt)) {
    throw new InvalidSnapshotError(`save "${slot}" has no savedAt timestamp`)
  }
  return {
    slot,
    description: typeof description === 'string' ? description : '',
    snapshot: parseSnapshot(data.snapshot),
    savedAt
  }
}

/**
 * Stores game snapshots as one JSON document per slot under `<saveDir>/saves`.
 */
export class SavingService {
  private readonly dir: string
  private readonly logger = createLogger('SavingService')

  constructor(saveDir: string) {
    this.dir = path.join(saveDir, 'saves')
  }

  async save(snapshot: GameSnapshot, slot = QUICK_SAVE_SLOT, description?: string) {
    assertSlot(slot)
    const payload: SavePayload = {
      slot,
      description: description ?? describeSnapshot(snapshot),
      snapshot,
      savedAt: Date.now()
    }
    await writeJsonFile(this.pathFor(slot), payload)
    this.logger.debug('Saved game', { slot, score: snapshot.score })
    return payload
  }

  /**
   * Resolves null when the slot is empty. A save that cannot be read back as a
   * valid game rejects with InvalidSnapshotError.
   */
  async load(slot = QUICK_SAVE_SLOT) {
    assertSlot(slot)
    let data: unknown
    try {
      data = await readJsonFile(this.pathFor(slot))
    } catch (error) {
      if (error instanceof StorageError && error.cause instanceof SyntaxError) {
        throw new InvalidSnapshotError(`save "${slot}" is not valid JSON`)
      }
      throw error
    }
    if (data === null) return null
    return parsePayload(data, slot)
  }

  /** Like {@link load}, but a damaged quick save counts as no save. */
  async loadQuickSave() {
    try {
      return await this.load(QUICK_SAVE_SLOT)
    } catch (error) {
      if (error instanceof InvalidSnapshotError) {
        this.logger.warn('Ignoring damaged quick save', { reason: error.reason })
        return null
      }
      throw error
    }
  }

  async list(): Promise<SaveSummary[]> {
    const files = await listJsonFiles(this.dir)
    const summaries: SaveSummary[] = []
    for (const file of files) {
      try {
        const slot = decodeURIComponent(path.basename(file, '.json'))
        const payload = await this.load(slot)
        if (!payload) continue
        summaries.push({
          slot,
          description: payload.description,
          savedAt: payload.savedAt,
          mode: payload.snapshot.mode,
          difficulty: payload.snapshot.difficulty,
          score: payload.snapshot.score,
          level: payload.snapshot.level
        })
      } catch (error) {
        const unreadable =
          error instanceof InvalidSnapshotError ||
          error instanceof InvalidArgumentError ||
          error instanceof URIError
        if (!unreadable) throw error
        this.logger.warn('Skipping unreadable save', { file, reason: error.message })
      }
    }
    return summaries.sort((a, b) => b.savedAt - a.savedAt)
  }

  async hasSave(slot = QUICK_SAVE_SLOT) {
    const payload = await this.load(slot)
    return Boolean(payload)
  }

  async remove(slot = QUICK_SAVE_SLOT) {
    assertSlot(slot)
    await removeFile(this.pathFor(slot))
  }

  private pathFor(slot: string) {
    return path.join(this.dir, `${encodeURIComponent(slot)}.json`)
  }
}
