import type { GameOverReason } from '../events'
import type { PieceColor, PieceKind } from '../pieces'
import { getCells, getOffsets, getPieceDefinition } from '../pieces'
import { getDifficultySettings, getModeDisplayName } from '../settings'
import type { RenderState } from '../tetrisLogic'
import type { ColorTheme, KeyAction, KeyMappings } from '../userSettings'
import { DEFAULT_KEY_MAPPINGS, KEY_ACTIONS } from '../userSettings'

export interface FrameOptions {
  color?: boolean
  theme?: ColorTheme
  showGhost?: boolean
  statusMessage?: string
  controlsHint?: string
}

type CellView = { kind: PieceKind; ghost: boolean } | null

type Palette = Record<PieceColor, string>

// monochrome draws glyphs only
const THEME_COLORS: Record<ColorTheme, Palette | null> = {
  classic: {
    cyan: '\x1b[96m',
    blue: '\x1b[94m',
    orange: '\x1b[33m',
    yellow: '\x1b[93m',
    green: '\x1b[92m',
    purple: '\x1b[95m',
    red: '\x1b[91m'
  },
  dark: {
    cyan: '\x1b[36m',
    blue: '\x1b[34m',
    orange: '\x1b[2;33m',
    yellow: '\x1b[33m',
    green: '\x1b[32m',
    purple: '\x1b[35m',
    red: '\x1b[31m'
  },
  highContrast: {
    cyan: '\x1b[1;96m',
    blue: '\x1b[1;94m',
    orange: '\x1b[1;33m',
    yellow: '\x1b[1;93m',
    green: '\x1b[1;92m',
    purple: '\x1b[1;95m',
    red: '\x1b[1;91m'
  },
  monochrome: null
}

const RESET = '\x1b[0m'
const DIM = '\x1b[2m'

const BLOCK = '██'
const GHOST = '░░'
const EMPTY = ' .'
const PREVIEW_EMPTY = '  '
const PREVIEW_SIZE = 4

const REASON_TEXT: Record<GameOverReason, string> = {
  boardFull: 'the stack reached the top',
  noSpaceForNewPiece: 'no room for the next piece',
  playerEnded: 'game ended'
}

const HINT_LABELS: Record<KeyAction, string> = {
  moveLeft: 'left',
  moveRight: 'right',
  rotateCw: 'rotate',
  rotateCcw: 'rotate back',
  softDrop: 'soft drop',
  hardDrop: 'drop',
  pause: 'pause',
  toggleGhost: 'ghost',
  save: 'save',
  load: 'load',
  restart: 'restart',
  quit: 'quit'
}

const KEY_GLYPHS = new Map([
  ['left', '←'],
  ['right', '→'],
  ['up', '↑'],
  ['down', '↓'],
  ['space', 'Space'],
  ['escape', 'Esc'],
  ['return', 'Enter'],
  ['tab', 'Tab']
])

const keyGlyph = (key: string) => KEY_GLYPHS.get(key) ?? `${key.charAt(0).toUpperCase()}${key.slice(1)}`

/** One-line key help, e.g. `←/A left  →/D right  ...`. */
export function formatControlsHint(mappings: Readonly<KeyMappings>) {
  return KEY_ACTIONS.map((action) => `${mappings[action].map(keyGlyph).join('/')} ${HINT_LABELS[action]}`).join('  ')
}

export const CONTROLS_HINT = formatControlsHint(DEFAULT_KEY_MAPPINGS)

function paint(view: CellView, palette: Palette | null) {
  if (!view) return EMPTY
  const glyph = view.ghost ? GHOST : BLOCK
  if (!palette) return glyph
  const code = palette[getPieceDefinition(view.kind).color]
  return `${view.ghost ? DIM : ''}${code}${glyph}${RESET}`
}

function composeBoard(state: RenderState, showGhost: boolean): CellView[][] {
  const rows = state.board.map((row) =>
    row.map((cell): CellView => (cell ? { kind: cell, ghost: false } : null))
  )
  const inside = (x: number, y: number) => x >= 0 && x < state.width && y >= 0 && y < state.height
  const piece = state.currentPiece
  if (!piece) return rows
  if (showGhost) {
    for (const { x, y } of state.ghostCells) {
      if (inside(x, y) && !rows[y][x]) rows[y][x] = { kind: piece.kind, ghost: true }
    }
  }
  for (const { x, y } of getCells(piece)) {
    if (inside(x, y)) rows[y][x] = { kind: piece.kind, ghost: false }
  }
  return rows
}

function renderPreview(kind: PieceKind | undefined, palette: Palette | null) {
  const grid: CellView[][] = Array.from({ length: PREVIEW_SIZE }, () =>
    Array.from({ length: PREVIEW_SIZE }, (): CellView => null)
  )
  if (kind) {
    for (const { x, y } of getOffsets(kind, 0)) {
      grid[y][x] = { kind, ghost: false }
    }
  }
  return grid.map((row) => row.map((view) => (view ? paint(view, palette) : PREVIEW_EMPTY)).join(''))
}

const stat = (label: string, value: string | number) => `${label.padEnd(10)}${value}`

export function formatClock(totalSeconds: number) {
  const minutes = Math.floor(totalSeconds / 60)
  const seconds = totalSeconds % 60
  return `${minutes}:${String(seconds).padStart(2, '0')}`
}

function renderPanel(state: RenderState, palette: Palette | null) {
  const difficulty = getDifficultySettings(state.difficulty).displayName
  const rows = state.targetRows === null ? state.totalRowsCleared : `${state.totalRowsCleared}/${state.targetRows}`
  return [
    `${getModeDisplayName(state.mode)} - ${difficulty}`,
    '',
    stat('Score', state.score),
    stat('Level', state.level),
    stat('Rows', rows),
    state.remainingSeconds === null ? '' : stat('Time', formatClock(state.remainingSeconds)),
    '',
    'Next',
    ...renderPreview(state.nextPiece?.kind, palette),
    '',
    stat('Singles', state.lineClears.single),
    stat('Doubles', state.lineClears.double),
    stat('Triples', state.lineClears.triple),
    stat('Tetrises', state.lineClears.tetris)
  ]
}

export function describeStatus(state: RenderState) {
  switch (state.status) {
    case 'idle':
      return 'Press R to start a new game'
    case 'paused':
      return 'Paused - press P to resume'
    case 'gameOver': {
      const reason = state.gameOverReason ? REASON_TEXT[state.gameOverReason] : REASON_TEXT.boardFull
      return `Game over (${reason}). Final score ${state.score}. Press R to play again or Q to quit`
    }
    case 'won':
      return `You win! Final score ${state.score}. Press R to play again or Q to quit`
    case 'running':
      return ''
  }
}

/** Plain-text frame: the bordered board with a side panel, a status line and the key help. */
export function renderFrame(state: RenderState, options: FrameOptions = {}): string[] {
  const palette = options.color ? THEME_COLORS[options.theme ?? 'classic'] : null
  const board = composeBoard(state, options.showGhost ?? true)
  const panel = renderPanel(state, palette)

  const left = [
    `╔${'══'.repeat(state.width)}╗`,
    ...board.map((row) => `║${row.map((view) => paint(view, palette)).join('')}║`),
    `╚${'══'.repeat(state.width)}╝`
  ]
  const lines = left.map((line, index) => {
    const side = panel[index] ?? ''
    return side ? `${line}  ${side}`.trimEnd() : line
  })
  lines.push(options.statusMessage || describeStatus(state))
  lines.push(options.controlsHint ?? CONTROLS_HINT)
  return lines
}
