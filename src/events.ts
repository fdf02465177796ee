import type { Difficulty, GameMode } from './settings'

export type GameOverReason = 'boardFull' | 'noSpaceForNewPiece' | 'playerEnded'

export interface LineClearCounts {
  single: number
  double: number
  triple: number
  tetris: number
}

export interface GameSummary {
  finalScore: number
  finalLevel: number
  totalRowsCleared: number
  lineClears: LineClearCounts
  mode: GameMode
  difficulty: Difficulty
  elapsedSeconds: number
}

export type GameEvent =
  | { type: 'scoreChanged'; score: number; delta: number }
  | { type: 'levelIncreased'; oldLevel: number; newLevel: number }
  | { type: 'rowsCleared'; count: number; scoreGained: number; rows: number[] }
  | { type: 'gameOver'; reason: GameOverReason; summary: GameSummary }
  | { type: 'gameWon'; summary: GameSummary }
  | { type: 'remainingTimeChanged'; seconds: number }
  | { type: 'boardUpdated' }
  | { type: 'paused' }
  | { type: 'resumed' }

export type GameEventType = GameEvent['type']

export type GameEventListener = (event: GameEvent) => void

/**
 * Events are queued while the engine mutates state and handed out afterwards,
 * either by draining the queue or by flushing it to subscribers.
 */
export class GameEventQueue {
  private pending: GameEvent[] = []
  private listeners = new Set<GameEventListener>()

  emit(event: GameEvent) {
    this.pending.push(event)
  }

  subscribe(listener: GameEventListener) {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  drain() {
    const events = this.pending
    this.pending = []
    return events
  }

  flush() {
    const events = this.drain()
    for (const event of events) {
      for (const listener of [...this.listeners]) {
        listener(event)
      }
    }
    return events
  }

  clear() {
    this.pending = []
  }

  get size() {
    return this.pending.length
  }
}
