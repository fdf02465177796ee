export type PieceKind = 'I' | 'J' | 'L' | 'O' | 'S' | 'T' | 'Z'

export type RotationState = 0 | 1 | 2 | 3

export type RotationDirection = 'cw' | 'ccw'

export type PieceColor = 'cyan' | 'blue' | 'orange' | 'yellow' | 'green' | 'purple' | 'red'

export interface Point {
  x: number
  y: number
}

export interface Piece {
  kind: PieceKind
  rotation: RotationState
  x: number
  y: number
}

export interface PieceDefinition {
  kind: PieceKind
  id: number
  color: PieceColor
  rotations: readonly [Point[], Point[], Point[], Point[]]
}

export const PIECE_KINDS: readonly PieceKind[] = ['I', 'J', 'L', 'O', 'S', 'T', 'Z']

export const ROTATION_STATES: readonly RotationState[] = [0, 1, 2, 3]

type OffsetRow = [number, number][]

function offsets(
  r0: OffsetRow,
  r1 = r0,
  r2 = r0,
  r3 = r0
): [Point[], Point[], Point[], Point[]] {
  const toPoints = (row: OffsetRow) => row.map(([x, y]) => ({ x, y }))
  return [toPoints(r0), toPoints(r1), toPoints(r2), toPoints(r3)]
}

const PIECE_DEFINITIONS: Record<PieceKind, PieceDefinition> = {
  I: {
    kind: 'I',
    id: 1,
    color: 'cyan',
    rotations: offsets(
      [[0, 1], [1, 1], [2, 1], [3, 1]],
      [[2, 0], [2, 1], [2, 2], [2, 3]],
      [[0, 2], [1, 2], [2, 2], [3, 2]],
      [[1, 0], [1, 1], [1, 2], [1, 3]]
    )
  },
  J: {
    kind: 'J',
    id: 2,
    color: 'blue',
    rotations: offsets(
      [[0, 0], [0, 1], [1, 1], [2, 1]],
      [[1, 0], [2, 0], [1, 1], [1, 2]],
      [[0, 1], [1, 1], [2, 1], [2, 2]],
      [[1, 0], [1, 1], [0, 2], [1, 2]]
    )
  },
  L: {
    kind: 'L',
    id: 3,
    color: 'orange',
    rotations: offsets(
      [[2, 0], [0, 1], [1, 1], [2, 1]],
      [[1, 0], [1, 1], [1, 2], [2, 2]],
      [[0, 1], [1, 1], [2, 1], [0, 2]],
      [[0, 0], [1, 0], [1, 1], [1, 2]]
    )
  },
  // same footprint in every state
  O: {
    kind: 'O',
    id: 4,
    color: 'yellow',
    rotations: offsets([[1, 0], [2, 0], [1, 1], [2, 1]])
  },
  S: {
    kind: 'S',
    id: 5,
    color: 'green',
    rotations: offsets(
      [[1, 0], [2, 0], [0, 1], [1, 1]],
      [[1, 0], [1, 1], [2, 1], [2, 2]],
      [[1, 1], [2, 1], [0, 2], [1, 2]],
      [[0, 0], [0, 1], [1, 1], [1, 2]]
    )
  },
  T: {
    kind: 'T',
    id: 6,
    color: 'purple',
    rotations: offsets(
      [[1, 0], [0, 1], [1, 1], [2, 1]],
      [[1, 0], [1, 1], [2, 1], [1, 2]],
      [[0, 1], [1, 1], [2, 1], [1, 2]],
      [[1, 0], [0, 1], [1, 1], [1, 2]]
    )
  },
  Z: {
    kind: 'Z',
    id: 7,
    color: 'red',
    rotations: offsets(
      [[0, 0], [1, 0], [1, 1], [2, 1]],
      [[2, 0], [1, 1], [2, 1], [1, 2]],
      [[0, 1], [1, 1], [1, 2], [2, 2]],
      [[1, 0], [0, 1], [1, 1], [0, 2]]
    )
  }
}

export function isPieceKind(value: unknown): value is PieceKind {
  return typeof value === 'string' && PIECE_KINDS.some((kind) => kind === value)
}

export function isRotationState(value: unknown): value is RotationState {
  return value === 0 || value === 1 || value === 2 || value === 3
}

export function getPieceDefinition(kind: PieceKind): PieceDefinition {
  return PIECE_DEFINITIONS[kind]
}

export function getOffsets(kind: PieceKind, rotation: RotationState): Point[] {
  return PIECE_DEFINITIONS[kind].rotations[rotation].map((point) => ({ ...point }))
}

export function rotateState(rotation: RotationState, direction: RotationDirection): RotationState {
  switch (rotation) {
    case 0:
      return direction === 'cw' ? 1 : 3
    case 1:
      return direction === 'cw' ? 2 : 0
    case 2:
      return direction === 'cw' ? 3 : 1
    case 3:
      return direction === 'cw' ? 0 : 2
  }
}

/**
 * Turns the piece to the adjacent rotation state in place and returns the new
 * offsets. There are no wall kicks: callers check the result against the board
 * before committing, usually through {@link getRotatedCells}.
 */
export function rotatePiece(piece: Piece, direction: RotationDirection): Point[] {
  piece.rotation = rotateState(piece.rotation, direction)
  return getOffsets(piece.kind, piece.rotation)
}

export function getCells(piece: Piece, dx = 0, dy = 0): Point[] {
  return PIECE_DEFINITIONS[piece.kind].rotations[piece.rotation].map((offset) => ({
    x: piece.x + offset.x + dx,
    y: piece.y + offset.y + dy
  }))
}

export function getRotatedCells(piece: Piece, direction: RotationDirection): Point[] {
  return getCells({ ...piece, rotation: rotateState(piece.rotation, direction) })
}

export function clonePiece(piece: Piece): Piece {
  return {
    kind: piece.kind,
    rotation: piece.rotation,
    x: piece.x,
    y: piece.y
  }
}
