import type { Cell } from './board'
import { BOARD_HEIGHT, BOARD_WIDTH } from './board'
import type { GameSummary } from './events'
import type { PieceKind } from './pieces'
import type { GameSnapshot } from './snapshot'
import { SNAPSHOT_VERSION } from './snapshot'

export const emptyRows = (): Cell[][] =>
  Array.from({ length: BOARD_HEIGHT }, () => Array.from({ length: BOARD_WIDTH }, (): Cell => null))

/** Fills a row except for the listed columns. */
export function fillRow(rows: Cell[][], y: number, kind: PieceKind, gaps: number[] = []) {
  rows[y] = rows[y].map((_, x) => (gaps.includes(x) ? null : kind))
  return rows
}

export function makeSnapshot(overrides: Partial<GameSnapshot> = {}): GameSnapshot {
  return {
    version: SNAPSHOT_VERSION,
    board: emptyRows(),
    currentPiece: { kind: 'T', rotation: 0, x: 3, y: 0 },
    nextPiece: { kind: 'O', rotation: 0, x: 3, y: 0 },
    score: 0,
    level: 1,
    totalRowsCleared: 0,
    lineClears: { single: 0, double: 0, triple: 0, tetris: 0 },
    mode: 'classic',
    difficulty: 'easy',
    remainingMs: null,
    targetRows: null,
    elapsedMs: 0,
    softDrop: false,
    status: 'running',
    gameOverReason: null,
    ...overrides
  }
}

export function makeSummary(overrides: Partial<GameSummary> = {}): GameSummary {
  return {
    finalScore: 0,
    finalLevel: 1,
    totalRowsCleared: 0,
    lineClears: { single: 0, double: 0, triple: 0, tetris: 0 },
    mode: 'classic',
    difficulty: 'medium',
    elapsedSeconds: 0,
    ...overrides
  }
}
