import type { Cell } from './board'
import { getCells } from './pieces'
import type { TetrisEngine } from './tetrisLogic'

export type InputAction =
  | 'moveLeft'
  | 'moveRight'
  | 'rotateCw'
  | 'rotateCcw'
  | 'softDropStart'
  | 'softDropEnd'
  | 'hardDrop'

export const INPUT_ACTIONS: readonly InputAction[] = [
  'moveLeft',
  'moveRight',
  'rotateCw',
  'rotateCcw',
  'softDropStart',
  'softDropEnd',
  'hardDrop'
]

/**
 * Translates discrete player input into engine commands. The only state kept
 * here is whether soft drop is currently held.
 */
export class PieceController {
  private softDropActive = false

  constructor(private readonly engine: TetrisEngine) {}

  isSoftDropActive() {
    return this.softDropActive
  }

  /** Returns false when the engine rejected the command. */
  handleAction(action: InputAction): boolean {
    switch (action) {
      case 'moveLeft':
        return this.engine.moveLeft()
      case 'moveRight':
        return this.engine.moveRight()
      case 'rotateCw':
        return this.engine.rotateClockwise()
      case 'rotateCcw':
        return this.engine.rotateCounterClockwise()
      case 'softDropStart':
        return this.toggleSoftDrop(true)
      case 'softDropEnd':
        return this.toggleSoftDrop(false)
      case 'hardDrop':
        if (!this.engine.isRunning()) return false
        this.engine.hardDrop()
        return true
    }
  }

  toggleSoftDrop(activate: boolean) {
    // the engine clears soft drop on game end and sets it on restore
    this.softDropActive = this.engine.isSoftDropActive()
    if (activate === this.softDropActive) return false
    if (activate && !this.engine.setSoftDrop(true)) return false
    if (!activate) this.engine.setSoftDrop(false)
    this.softDropActive = activate
    return true
  }

  getBoardWithCurrentPiece(): Cell[][] {
    const board = this.engine.getBoard()
    const piece = this.engine.getCurrentPiece()
    if (piece) {
      board.place(getCells(piece), piece.kind)
    }
    return board.toRows()
  }

  getHardDropPreview(): Cell[][] {
    const board = this.engine.getBoard()
    const piece = this.engine.getCurrentPiece()
    if (piece) {
      board.place(this.engine.getGhostCells(board), piece.kind)
    }
    return board.toRows()
  }
}
