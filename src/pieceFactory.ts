import { BOARD_WIDTH } from './board'
import { InvalidArgumentError } from './errors'
import type { Piece } from './pieces'
import { PIECE_KINDS, isPieceKind } from './pieces'

export const SPAWN_X = Math.floor(BOARD_WIDTH / 2) - 2
export const SPAWN_Y = 0

export type RandomSource = () => number

/**
 * Builds pieces at the spawn position. Kinds are drawn uniformly and
 * independently on every call; there is no bag.
 */
export class PieceFactory {
  private readonly random: RandomSource

  constructor(random: RandomSource = Math.random) {
    this.random = random
  }

  createRandom(): Piece {
    const index = Math.min(Math.floor(this.random() * PIECE_KINDS.length), PIECE_KINDS.length - 1)
    return this.createByKind(PIECE_KINDS[index])
  }

  createByKind(kind: string): Piece {
    if (!isPieceKind(kind)) {
      throw new InvalidArgumentError(`Unknown piece kind "${kind}"`)
    }
    return { kind, rotation: 0, x: SPAWN_X, y: SPAWN_Y }
  }
}
