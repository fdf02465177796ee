import type { Cell } from './board'
import { BOARD_HEIGHT, BOARD_WIDTH, Board } from './board'
import { InvalidSnapshotError } from './errors'
import type { GameOverReason, LineClearCounts } from './events'
import type { Piece } from './pieces'
import { getCells, isPieceKind, isRotationState } from './pieces'
import type { Difficulty, GameMode } from './settings'
import { getLevelForRows, isDifficulty, isGameMode } from './settings'

export const SNAPSHOT_VERSION = 1

export type GameStatus = 'idle' | 'running' | 'paused' | 'gameOver' | 'won'

export type SnapshotStatus = Exclude<GameStatus, 'idle'>

export interface GameSnapshot {
  version: typeof SNAPSHOT_VERSION
  board: Cell[][]
  currentPiece: Piece | null
  nextPiece: Piece
  score: number
  level: number
  totalRowsCleared: number
  lineClears: LineClearCounts
  mode: GameMode
  difficulty: Difficulty
  remainingMs: number | null
  targetRows: number | null
  elapsedMs: number
  softDrop: boolean
  status: SnapshotStatus
  gameOverReason: GameOverReason | null
}

const SNAPSHOT_STATUSES: readonly SnapshotStatus[] = ['running', 'paused', 'gameOver', 'won']

const GAME_OVER_REASONS: readonly GameOverReason[] = ['boardFull', 'noSpaceForNewPiece', 'playerEnded']

export type UnknownRecord = Record<string, unknown>

export function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isCount(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0
}

function isSnapshotStatus(value: unknown): value is SnapshotStatus {
  return SNAPSHOT_STATUSES.some((status) => status === value)
}

function isGameOverReason(value: unknown): value is GameOverReason {
  return GAME_OVER_REASONS.some((reason) => reason === value)
}

function readCount(record: UnknownRecord, key: string) {
  const value = record[key]
  if (!isCount(value)) {
    throw new InvalidSnapshotError(`${key} must be a non-negative integer`)
  }
  return value
}

function readBoard(value: unknown): Cell[][] {
  if (!Array.isArray(value) || value.length !== BOARD_HEIGHT) {
    throw new InvalidSnapshotError(`board must have ${BOARD_HEIGHT} rows`)
  }
  return value.map((row: unknown, y) => {
    if (!Array.isArray(row) || row.length !== BOARD_WIDTH) {
      throw new InvalidSnapshotError(`board row ${y} must have ${BOARD_WIDTH} cells`)
    }
    return row.map((cell: unknown, x): Cell => {
      if (cell === null) return null
      if (!isPieceKind(cell)) {
        throw new InvalidSnapshotError(`board cell (${x}, ${y}) holds an unknown value`)
      }
      return cell
    })
  })
}

function readPiece(value: unknown, label: string): Piece {
  if (!isRecord(value)) {
    throw new InvalidSnapshotError(`${label} must be an object`)
  }
  const { kind, rotation, x, y } = value
  if (!isPieceKind(kind)) {
    throw new InvalidSnapshotError(`${label} has an unknown kind`)
  }
  if (!isRotationState(rotation)) {
    throw new InvalidSnapshotError(`${label} rotation must be 0-3`)
  }
  if (typeof x !== 'number' || !Number.isInteger(x) || typeof y !== 'number' || !Number.isInteger(y)) {
    throw new InvalidSnapshotError(`${label} position must be integers`)
  }
  return { kind, rotation, x, y }
}

function readLineClears(value: unknown): LineClearCounts {
  if (!isRecord(value)) {
    throw new InvalidSnapshotError('lineClears must be an object')
  }
  return {
    single: readCount(value, 'single'),
    double: readCount(value, 'double'),
    triple: readCount(value, 'triple'),
    tetris: readCount(value, 'tetris')
  }
}

/**
 * Checks an untrusted value (usually parsed from a save file) and returns it as
 * a snapshot the engine can resume from. Throws {@link InvalidSnapshotError}
 * naming the first problem found.
 */
export function parseSnapshot(data: unknown): GameSnapshot {
  if (!isRecord(data)) {
    throw new InvalidSnapshotError('snapshot must be an object')
  }
  if (data.version !== SNAPSHOT_VERSION) {
    throw new InvalidSnapshotError(`unsupported version ${String(data.version)}`)
  }

  const board = readBoard(data.board)
  const status = data.status
  if (!isSnapshotStatus(status)) {
    throw new InvalidSnapshotError('status is not recognised')
  }
  const mode = data.mode
  if (!isGameMode(mode)) {
    throw new InvalidSnapshotError('mode is not recognised')
  }
  const difficulty = data.difficulty
  if (!isDifficulty(difficulty)) {
    throw new InvalidSnapshotError('difficulty is not recognised')
  }

  const live = status === 'running' || status === 'paused'
  const currentPiece = data.currentPiece === null ? null : readPiece(data.currentPiece, 'currentPiece')
  if (live && !currentPiece) {
    throw new InvalidSnapshotError('an active game needs a current piece')
  }
  const grid = Board.fromRows(board)
  if (live && currentPiece && !grid.canPlace(getCells(currentPiece))) {
    throw new InvalidSnapshotError('current piece overlaps the board')
  }
  if (live && grid.isGameOver()) {
    throw new InvalidSnapshotError('an active game cannot have blocks in the top row')
  }
  const nextPiece = readPiece(data.nextPiece, 'nextPiece')

  const score = readCount(data, 'score')
  const totalRowsCleared = readCount(data, 'totalRowsCleared')
  const level = readCount(data, 'level')
  if (level !== getLevelForRows(totalRowsCleared)) {
    throw new InvalidSnapshotError('level does not match rows cleared')
  }
  const lineClears = readLineClears(data.lineClears)
  const countedRows =
    lineClears.single + lineClears.double * 2 + lineClears.triple * 3 + lineClears.tetris * 4
  if (countedRows !== totalRowsCleared) {
    throw new InvalidSnapshotError('line clear counters do not add up to rows cleared')
  }

  let remainingMs: number | null = null
  if (mode === 'timed') {
    const value = data.remainingMs
    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
      throw new InvalidSnapshotError('timed games need a non-negative remainingMs')
    }
    remainingMs = value
  }
  let targetRows: number | null = null
  if (mode === 'challenge') {
    const value = readCount(data, 'targetRows')
    if (value === 0) {
      throw new InvalidSnapshotError('challenge games need a positive targetRows')
    }
    targetRows = value
  }

  const targetReached = targetRows !== null && totalRowsCleared >= targetRows
  const timeUp = remainingMs === 0
  if (live && targetReached) {
    throw new InvalidSnapshotError('an active challenge has already reached its target')
  }
  if (live && timeUp) {
    throw new InvalidSnapshotError('an active timed game has no time left')
  }
  if (status === 'won' && !targetReached && !timeUp) {
    throw new InvalidSnapshotError('only a completed challenge or an expired timed game can be won')
  }

  const elapsedMs = data.elapsedMs
  if (typeof elapsedMs !== 'number' || !Number.isFinite(elapsedMs) || elapsedMs < 0) {
    throw new InvalidSnapshotError('elapsedMs must be a non-negative number')
  }
  const softDrop = data.softDrop
  if (typeof softDrop !== 'boolean') {
    throw new InvalidSnapshotError('softDrop must be a boolean')
  }

  let gameOverReason: GameOverReason | null = null
  if (status === 'gameOver') {
    const reason = data.gameOverReason
    if (!isGameOverReason(reason)) {
      throw new InvalidSnapshotError('a finished game needs a gameOverReason')
    }
    gameOverReason = reason
  }

  return {
    version: SNAPSHOT_VERSION,
    board,
    currentPiece,
    nextPiece,
    score,
    level,
    totalRowsCleared,
    lineClears,
    mode,
    difficulty,
    remainingMs,
    targetRows,
    elapsedMs,
    softDrop,
    status,
    gameOverReason
  }
}
