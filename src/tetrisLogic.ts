import type { Cell } from './board'
import { BOARD_HEIGHT, BOARD_WIDTH, Board } from './board'
import type {
  GameEvent,
  GameEventListener,
  GameOverReason,
  GameSummary,
  LineClearCounts
} from './events'
import { GameEventQueue } from './events'
import type { Logger } from './logger'
import { createLogger } from './logger'
import { PieceFactory, SPAWN_X, SPAWN_Y } from './pieceFactory'
import type { Piece, Point, RotationDirection } from './pieces'
import { clonePiece, getCells, getRotatedCells, rotatePiece } from './pieces'
import type { Difficulty, GameMode } from './settings'
import {
  SOFT_DROP_INTERVAL,
  getChallengeTarget,
  getFallDelay,
  getLevelForRows,
  getLineClearScore,
  getTimedModeMs
} from './settings'
import type { GameSnapshot, GameStatus } from './snapshot'
import { SNAPSHOT_VERSION, parseSnapshot } from './snapshot'

export { BOARD_HEIGHT, BOARD_WIDTH }

export interface StartOptions {
  mode?: GameMode
  difficulty?: Difficulty
}

export interface EngineOptions {
  factory?: PieceFactory
  logger?: Logger
}

export interface RenderState {
  width: number
  height: number
  board: Cell[][]
  currentPiece: Piece | null
  nextPiece: Piece | null
  ghostCells: Point[]
  score: number
  level: number
  totalRowsCleared: number
  lineClears: LineClearCounts
  status: GameStatus
  gameOverReason: GameOverReason | null
  mode: GameMode
  difficulty: Difficulty
  remainingSeconds: number | null
  targetRows: number | null
  dropInterval: number
}

const emptyLineClears = (): LineClearCounts => ({ single: 0, double: 0, triple: 0, tetris: 0 })

const toSeconds = (ms: number) => Math.ceil(ms / 1000)

/**
 * Falling-piece state machine: idle → running ⇄ paused → gameOver | won.
 *
 * Time only advances through {@link update}; nothing here schedules timers.
 * State changes are reported as queued {@link GameEvent}s that the caller
 * drains or flushes once the mutating call has returned.
 */
export class TetrisEngine {
  public readonly width = BOARD_WIDTH
  public readonly height = BOARD_HEIGHT

  private readonly factory: PieceFactory
  private readonly logger: Logger
  private readonly events = new GameEventQueue()

  private board = new Board()
  private currentPiece: Piece | null = null
  private nextPiece: Piece | null = null
  private status: GameStatus = 'idle'
  private gameOverReason: GameOverReason | null = null
  private score = 0
  private level = 1
  private totalRowsCleared = 0
  private lineClears = emptyLineClears()
  private mode: GameMode = 'classic'
  private difficulty: Difficulty = 'medium'
  private remainingMs: number | null = null
  private targetRows: number | null = null
  private elapsedMs = 0
  private softDrop = false
  private dropTimer = 0

  constructor(options: EngineOptions = {}) {
    this.factory = options.factory ?? new PieceFactory()
    this.logger = options.logger ?? createLogger('TetrisEngine')
  }

  start(options: StartOptions = {}) {
    this.mode = options.mode ?? 'classic'
    this.difficulty = options.difficulty ?? 'medium'
    this.board.clear()
    this.score = 0
    this.level = 1
    this.totalRowsCleared = 0
    this.lineClears = emptyLineClears()
    this.remainingMs = this.mode === 'timed' ? getTimedModeMs(this.difficulty) : null
    this.targetRows = this.mode === 'challenge' ? getChallengeTarget(this.difficulty) : null
    this.elapsedMs = 0
    this.softDrop = false
    this.dropTimer = 0
    this.gameOverReason = null
    this.currentPiece = null
    this.nextPiece = this.factory.createRandom()
    this.status = 'running'
    this.logger.debug('Game started', { mode: this.mode, difficulty: this.difficulty })

    this.events.emit({ type: 'scoreChanged', score: 0, delta: 0 })
    if (this.remainingMs !== null) {
      this.events.emit({ type: 'remainingTimeChanged', seconds: toSeconds(this.remainingMs) })
    }
    if (this.spawnNextPiece()) {
      this.events.emit({ type: 'boardUpdated' })
    }
  }

  /** Advances the game clock. Does nothing unless the game is running. */
  update(deltaMs: number) {
    if (this.status !== 'running' || !(deltaMs > 0)) return
    this.elapsedMs += deltaMs

    if (this.remainingMs !== null) {
      const before = toSeconds(this.remainingMs)
      this.remainingMs = Math.max(0, this.remainingMs - deltaMs)
      const after = toSeconds(this.remainingMs)
      if (after !== before) {
        this.events.emit({ type: 'remainingTimeChanged', seconds: after })
      }
      if (this.remainingMs === 0) {
        this.finishWon()
        return
      }
    }

    this.dropTimer += deltaMs
    while (this.status === 'running' && this.dropTimer >= this.getDropInterval()) {
      this.dropTimer -= this.getDropInterval()
      this.stepDown()
    }
  }

  /** One gravity step: move the piece down, or lock it when it rests. */
  tick() {
    if (this.status !== 'running') return false
    return this.stepDown()
  }

  moveLeft() {
    return this.shiftPiece(-1)
  }

  moveRight() {
    return this.shiftPiece(1)
  }

  rotateClockwise() {
    return this.rotateCurrent('cw')
  }

  rotateCounterClockwise() {
    return this.rotateCurrent('ccw')
  }

  /** Switching soft drop on needs a running game; switching it off always works. */
  setSoftDrop(active: boolean) {
    if (this.softDrop === active) return false
    if (active && this.status !== 'running') return false
    this.softDrop = active
    this.dropTimer = 0
    return true
  }

  /** Drops the piece to its resting row and locks it. Returns rows travelled. */
  hardDrop() {
    const piece = this.currentPiece
    if (this.status !== 'running' || !piece) return 0
    let distance = 0
    while (this.board.canPlace(getCells(piece, 0, 1))) {
      piece.y += 1
      distance += 1
    }
    this.dropTimer = 0
    this.lockCurrentPiece()
    return distance
  }

  pause() {
    if (this.status !== 'running') return false
    this.status = 'paused'
    this.events.emit({ type: 'paused' })
    return true
  }

  resume() {
    if (this.status !== 'paused') return false
    this.status = 'running'
    this.events.emit({ type: 'resumed' })
    return true
  }

  togglePause() {
    return this.status === 'paused' ? this.resume() : this.pause()
  }

  /** Ends an active game on the player's request. */
  endGame() {
    if (this.status !== 'running' && this.status !== 'paused') return false
    this.finishLost('playerEnded')
    return true
  }

  canPieceMove(dx: number, dy: number) {
    if (!this.currentPiece) return false
    return this.board.canPlace(getCells(this.currentPiece, dx, dy))
  }

  isRunning() {
    return this.status === 'running'
  }

  isPaused() {
    return this.status === 'paused'
  }

  isGameOver() {
    return this.status === 'gameOver'
  }

  isWon() {
    return this.status === 'won'
  }

  getStatus() {
    return this.status
  }

  getGameOverReason() {
    return this.gameOverReason
  }

  getBoard() {
    return this.board.clone()
  }

  getCurrentPiece() {
    return this.currentPiece ? clonePiece(this.currentPiece) : null
  }

  getNextPiece() {
    return this.nextPiece ? clonePiece(this.nextPiece) : null
  }

  getScore() {
    return this.score
  }

  getLevel() {
    return this.level
  }

  getTotalRowsCleared() {
    return this.totalRowsCleared
  }

  getLineClears(): LineClearCounts {
    return { ...this.lineClears }
  }

  getMode() {
    return this.mode
  }

  getDifficulty() {
    return this.difficulty
  }

  getTargetRows() {
    return this.targetRows
  }

  getRemainingSeconds() {
    return this.remainingMs === null ? null : toSeconds(this.remainingMs)
  }

  isSoftDropActive() {
    return this.softDrop
  }

  getDropInterval() {
    return this.softDrop ? SOFT_DROP_INTERVAL : getFallDelay(this.level, this.difficulty)
  }

  /** Cells the current piece would occupy after a hard drop. */
  getGhostCells(board: Board = this.board.clone()): Point[] {
    if (!this.currentPiece) return []
    let dy = 0
    while (board.canPlace(getCells(this.currentPiece, 0, dy + 1))) {
      dy += 1
    }
    return getCells(this.currentPiece, 0, dy)
  }

  getSummary(): GameSummary {
    return {
      finalScore: this.score,
      finalLevel: this.level,
      totalRowsCleared: this.totalRowsCleared,
      lineClears: this.getLineClears(),
      mode: this.mode,
      difficulty: this.difficulty,
      elapsedSeconds: Math.floor(this.elapsedMs / 1000)
    }
  }

  getRenderState(): RenderState {
    const board = this.board.clone()
    return {
      width: this.width,
      height: this.height,
      board: board.toRows(),
      currentPiece: this.getCurrentPiece(),
      nextPiece: this.getNextPiece(),
      ghostCells: this.getGhostCells(board),
      score: this.score,
      level: this.level,
      totalRowsCleared: this.totalRowsCleared,
      lineClears: this.getLineClears(),
      status: this.status,
      gameOverReason: this.gameOverReason,
      mode: this.mode,
      difficulty: this.difficulty,
      remainingSeconds: this.getRemainingSeconds(),
      targetRows: this.targetRows,
      dropInterval: this.getDropInterval()
    }
  }

  createSnapshot(): GameSnapshot {
    if (this.status === 'idle' || !this.nextPiece) {
      throw new Error('No game to snapshot')
    }
    return {
      version: SNAPSHOT_VERSION,
      board: this.board.toRows(),
      currentPiece: this.getCurrentPiece(),
      nextPiece: clonePiece(this.nextPiece),
      score: this.score,
      level: this.level,
      totalRowsCleared: this.totalRowsCleared,
      lineClears: this.getLineClears(),
      mode: this.mode,
      difficulty: this.difficulty,
      remainingMs: this.remainingMs,
      targetRows: this.targetRows,
      elapsedMs: this.elapsedMs,
      softDrop: this.softDrop,
      status: this.status,
      gameOverReason: this.gameOverReason
    }
  }

  /**
   * Replaces the session with a saved one. The data is fully validated first;
   * on failure an InvalidSnapshotError is thrown and the current session is
   * left as it was.
   */
  restoreFromSnapshot(data: unknown) {
    const snapshot = parseSnapshot(data)
    this.board = Board.fromRows(snapshot.board)
    this.currentPiece = snapshot.currentPiece ? clonePiece(snapshot.currentPiece) : null
    this.nextPiece = clonePiece(snapshot.nextPiece)
    this.score = snapshot.score
    this.level = snapshot.level
    this.totalRowsCleared = snapshot.totalRowsCleared
    this.lineClears = { ...snapshot.lineClears }
    this.mode = snapshot.mode
    this.difficulty = snapshot.difficulty
    this.remainingMs = snapshot.remainingMs
    this.targetRows = snapshot.targetRows
    this.elapsedMs = snapshot.elapsedMs
    this.softDrop = snapshot.softDrop
    this.status = snapshot.status
    this.gameOverReason = snapshot.gameOverReason
    this.dropTimer = 0
    this.logger.debug('Game restored', { status: this.status, score: this.score })

    this.events.emit({ type: 'scoreChanged', score: this.score, delta: 0 })
    if (this.remainingMs !== null) {
      this.events.emit({ type: 'remainingTimeChanged', seconds: toSeconds(this.remainingMs) })
    }
    this.events.emit({ type: 'boardUpdated' })
  }

  subscribe(listener: GameEventListener) {
    return this.events.subscribe(listener)
  }

  drainEvents(): GameEvent[] {
    return this.events.drain()
  }

  flushEvents(): GameEvent[] {
    return this.events.flush()
  }

  private spawnNextPiece() {
    const next = this.nextPiece ?? this.factory.createRandom()
    const candidate: Piece = { kind: next.kind, rotation: 0, x: SPAWN_X, y: SPAWN_Y }
    this.nextPiece = this.factory.createRandom()
    if (!this.board.canPlace(getCells(candidate))) {
      this.currentPiece = null
      this.finishLost('noSpaceForNewPiece')
      return false
    }
    this.currentPiece = candidate
    return true
  }

  private stepDown() {
    const piece = this.currentPiece
    if (!piece) return false
    if (this.board.canPlace(getCells(piece, 0, 1))) {
      piece.y += 1
      this.events.emit({ type: 'boardUpdated' })
      return true
    }
    this.lockCurrentPiece()
    return false
  }

  private shiftPiece(dx: number) {
    const piece = this.currentPiece
    if (this.status !== 'running' || !piece) return false
    if (!this.board.canPlace(getCells(piece, dx, 0))) return false
    piece.x += dx
    this.events.emit({ type: 'boardUpdated' })
    return true
  }

  private rotateCurrent(direction: RotationDirection) {
    const piece = this.currentPiece
    if (this.status !== 'running' || !piece) return false
    if (!this.board.canPlace(getRotatedCells(piece, direction))) return false
    rotatePiece(piece, direction)
    this.events.emit({ type: 'boardUpdated' })
    return true
  }

  private lockCurrentPiece() {
    const piece = this.currentPiece
    if (!piece) return
    this.board.place(getCells(piece), piece.kind)
    this.currentPiece = null

    const rows = this.board.findFullRows()
    const cleared = this.board.clearRows(rows)
    if (cleared > 0) {
      this.applyLineClear(cleared, rows)
    }
    if (this.status !== 'running') return

    if (this.board.isGameOver()) {
      this.finishLost('boardFull')
      return
    }
    if (this.spawnNextPiece()) {
      this.events.emit({ type: 'boardUpdated' })
    }
  }

  private applyLineClear(count: number, rows: number[]) {
    const points = getLineClearScore(count, this.level, this.difficulty)
    this.score += points
    this.totalRowsCleared += count
    if (count === 1) this.lineClears.single += 1
    else if (count === 2) this.lineClears.double += 1
    else if (count === 3) this.lineClears.triple += 1
    else if (count === 4) this.lineClears.tetris += 1

    this.events.emit({ type: 'rowsCleared', count, scoreGained: points, rows })
    this.events.emit({ type: 'scoreChanged', score: this.score, delta: points })

    const nextLevel = getLevelForRows(this.totalRowsCleared)
    if (nextLevel > this.level) {
      const oldLevel = this.level
      this.level = nextLevel
      this.events.emit({ type: 'levelIncreased', oldLevel, newLevel: nextLevel })
    }

    if (this.targetRows !== null && this.totalRowsCleared >= this.targetRows) {
      this.finishWon()
    }
  }

  private finishLost(reason: GameOverReason) {
    this.status = 'gameOver'
    this.gameOverReason = reason
    this.softDrop = false
    this.events.emit({ type: 'gameOver', reason, summary: this.getSummary() })
    this.logger.debug('Game over', { reason, score: this.score, rows: this.totalRowsCleared })
  }

  private finishWon() {
    this.status = 'won'
    this.gameOverReason = null
    this.softDrop = false
    this.events.emit({ type: 'gameWon', summary: this.getSummary() })
    this.logger.debug('Game won', { mode: this.mode, score: this.score, rows: this.totalRowsCleared })
  }
}
