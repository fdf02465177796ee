import type { PieceKind, Point } from './pieces'

export type Cell = PieceKind | null

export const BOARD_WIDTH = 10
export const BOARD_HEIGHT = 20

/**
 * Playfield grid stored row-major (`cells[y][x]`), row 0 at the top.
 */
export class Board {
  public readonly width = BOARD_WIDTH
  public readonly height = BOARD_HEIGHT

  private cells: Cell[][]

  constructor() {
    this.cells = this.createEmptyRows(this.height)
  }

  /** Builds a board from a row-major grid. The caller validates the shape. */
  static fromRows(rows: Cell[][]) {
    const board = new Board()
    board.cells = rows.map((row) => [...row])
    return board
  }

  clear() {
    this.cells = this.createEmptyRows(this.height)
  }

  isWithinBounds(x: number, y: number) {
    return x >= 0 && x < this.width && y >= 0 && y < this.height
  }

  isCellEmpty(x: number, y: number) {
    if (!this.isWithinBounds(x, y)) return false
    return this.cells[y][x] === null
  }

  getCell(x: number, y: number): Cell {
    if (!this.isWithinBounds(x, y)) return null
    return this.cells[y][x]
  }

  canPlace(cells: Point[]) {
    return cells.every(({ x, y }) => this.isCellEmpty(x, y))
  }

  /** Writes without collision checks; validate with {@link canPlace} first. */
  place(cells: Point[], kind: PieceKind) {
    for (const { x, y } of cells) {
      if (!this.isWithinBounds(x, y)) continue
      this.cells[y][x] = kind
    }
  }

  isRowFull(row: number) {
    if (row < 0 || row >= this.height) return false
    return this.cells[row].every((cell) => cell !== null)
  }

  findFullRows() {
    const rows: number[] = []
    for (let row = 0; row < this.height; row += 1) {
      if (this.isRowFull(row)) rows.push(row)
    }
    return rows
  }

  /**
   * Removes the given rows in a single pass: surviving rows keep their order and
   * settle to the bottom, then empty rows fill the top. Indices that are
   * duplicated or off the board are ignored.
   */
  clearRows(rows: number[]) {
    const doomed = new Set(rows.filter((row) => Number.isInteger(row) && row >= 0 && row < this.height))
    if (!doomed.size) return 0
    const survivors = this.cells.filter((_, row) => !doomed.has(row))
    this.cells = [...this.createEmptyRows(doomed.size), ...survivors]
    return doomed.size
  }

  isGameOver() {
    return this.cells[0].some((cell) => cell !== null)
  }

  clone() {
    return Board.fromRows(this.cells)
  }

  toRows(): Cell[][] {
    return this.cells.map((row) => [...row])
  }

  toString() {
    return this.cells.map((row) => row.map((cell) => (cell ? '#' : '.')).join(' ')).join('\n')
  }

  private createEmptyRows(count: number): Cell[][] {
    return Array.from({ length: count }, () =>
      Array.from({ length: this.width }, () => null)
    )
  }
}
