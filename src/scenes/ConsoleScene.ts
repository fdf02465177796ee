import type { InputAction } from '../controller'
import { PieceController } from '../controller'
import type { GameEvent, GameSummary } from '../events'
import { parseSnapshot } from '../snapshot'
import type { RenderState, StartOptions } from '../tetrisLogic'
import { TetrisEngine } from '../tetrisLogic'
import type { KeyAction, KeyMappings, UserSettings } from '../userSettings'
import { DEFAULT_KEY_MAPPINGS, KEY_ACTIONS, cloneSettings, createDefaultSettings } from '../userSettings'
import { formatControlsHint, renderFrame } from './frame'

export type SceneCommand = InputAction | 'togglePause' | 'toggleGhost' | 'save' | 'load' | 'restart' | 'quit'

/** The subset of a readline keypress the scene reads. */
export interface KeyPress {
  name?: string
  sequence?: string
  ctrl?: boolean
}

export type SceneCallbacks = {
  onStateUpdate?: (state: RenderState) => void
  onGameFinished?: (summary: GameSummary, completed: boolean) => void
  onSettingsChanged?: (settings: UserSettings) => void
  onRequestSave?: () => void
  onRequestLoad?: () => void
  onRequestRestart?: () => void
  onRequestQuit?: () => void
}

export type SceneOptions = {
  engine?: TetrisEngine
  write?: (output: string) => void
  color?: boolean
  settings?: UserSettings
}

// terminals report no key release, so soft drop lasts while the key repeats
export const SOFT_DROP_RELEASE_MS = 180

const ACTION_COMMANDS: Record<KeyAction, SceneCommand> = {
  moveLeft: 'moveLeft',
  moveRight: 'moveRight',
  rotateCw: 'rotateCw',
  rotateCcw: 'rotateCcw',
  softDrop: 'softDropStart',
  hardDrop: 'hardDrop',
  pause: 'togglePause',
  toggleGhost: 'toggleGhost',
  save: 'save',
  load: 'load',
  restart: 'restart',
  quit: 'quit'
}

// commands a held key may fire again; subject to the key repeat setting
const REPEATABLE = new Set<SceneCommand>(['moveLeft', 'moveRight', 'rotateCw', 'rotateCcw'])

const CLEAR_NAMES = ['', 'Single', 'Double', 'Triple', 'Tetris']

export function createKeyBindings(mappings: Readonly<KeyMappings>) {
  const bindings = new Map<string, SceneCommand>()
  for (const action of KEY_ACTIONS) {
    for (const key of mappings[action]) {
      bindings.set(key, ACTION_COMMANDS[action])
    }
  }
  return bindings
}

const DEFAULT_BINDINGS = createKeyBindings(DEFAULT_KEY_MAPPINGS)

export function resolveKey(
  key: KeyPress,
  bindings: ReadonlyMap<string, SceneCommand> = DEFAULT_BINDINGS
): SceneCommand | null {
  if (key.ctrl) return key.name === 'c' ? 'quit' : null
  const name = key.name ?? key.sequence?.toLowerCase()
  if (!name) return null
  return bindings.get(name) ?? null
}

export class ConsoleScene {
  private readonly engine: TetrisEngine
  private readonly controller: PieceController
  private readonly callbacks: SceneCallbacks
  private readonly write: (output: string) => void
  private readonly color: boolean
  private settings: UserSettings
  private bindings: Map<string, SceneCommand>
  private controlsHint: string
  private lastRepeatable: SceneCommand | null = null
  private sinceLastPress = 0
  private needsDraw = true
  private softDropIdle = 0
  private statusMessage = ''
  private statusTimer = 0
  private lastOutput = ''

  constructor(callbacks: SceneCallbacks = {}, options: SceneOptions = {}) {
    this.callbacks = callbacks
    this.engine = options.engine ?? new TetrisEngine()
    this.controller = new PieceController(this.engine)
    this.write = options.write ?? ((output) => process.stdout.write(output))
    this.color = options.color ?? true
    this.settings = cloneSettings(options.settings ?? createDefaultSettings())
    this.bindings = createKeyBindings(this.settings.controls.keyMappings)
    this.controlsHint = formatControlsHint(this.settings.controls.keyMappings)
    this.engine.subscribe((event) => this.handleEvent(event))
  }

  startNewGame(options: StartOptions = {}) {
    this.engine.start(options)
    this.softDropIdle = 0
    this.showStatus('New game ready', 2000)
    this.refresh()
  }

  /**
   * Replaces the current game with a saved one; a game in progress is ended as
   * abandoned first. Throws InvalidSnapshotError and keeps the current game when
   * the data is unusable.
   */
  restoreGame(data: unknown) {
    const snapshot = parseSnapshot(data)
    this.engine.endGame()
    this.engine.restoreFromSnapshot(snapshot)
    this.softDropIdle = 0
    this.showStatus('Loaded saved game', 2000)
    this.refresh()
  }

  getSnapshot() {
    return this.engine.createSnapshot()
  }

  getSettings() {
    return cloneSettings(this.settings)
  }

  applySettings(settings: UserSettings) {
    this.settings = cloneSettings(settings)
    this.bindings = createKeyBindings(this.settings.controls.keyMappings)
    this.controlsHint = formatControlsHint(this.settings.controls.keyMappings)
    this.lastRepeatable = null
    this.needsDraw = true
    this.refresh()
  }

  hasGame() {
    return this.engine.getStatus() !== 'idle'
  }

  /** Ends a running or paused game, reporting it as abandoned. */
  endGame() {
    const ended = this.engine.endGame()
    this.refresh()
    return ended
  }

  update(delta: number) {
    this.sinceLastPress += delta
    if (this.engine.isSoftDropActive()) {
      this.softDropIdle += delta
      if (this.softDropIdle >= SOFT_DROP_RELEASE_MS) {
        this.controller.handleAction('softDropEnd')
      }
    }
    this.engine.update(delta)
    if (this.statusTimer > 0) {
      this.statusTimer -= delta
      if (this.statusTimer <= 0) {
        this.statusTimer = 0
        this.statusMessage = ''
        this.needsDraw = true
      }
    }
    this.refresh()
  }

  handleKey(key: KeyPress) {
    const command = resolveKey(key, this.bindings)
    if (!command) return false
    if (!this.isIgnoredRepeat(command)) this.runCommand(command)
    return true
  }

  runCommand(command: SceneCommand) {
    switch (command) {
      case 'togglePause':
        this.engine.togglePause()
        break
      case 'toggleGhost':
        this.settings.showGhostPiece = !this.settings.showGhostPiece
        this.showStatus(`Ghost piece ${this.settings.showGhostPiece ? 'on' : 'off'}`, 1500)
        this.callbacks.onSettingsChanged?.(cloneSettings(this.settings))
        break
      case 'save':
        this.callbacks.onRequestSave?.()
        break
      case 'load':
        this.callbacks.onRequestLoad?.()
        break
      case 'restart':
        this.callbacks.onRequestRestart?.()
        break
      case 'quit':
        this.callbacks.onRequestQuit?.()
        break
      case 'softDropStart':
        this.softDropIdle = 0
        this.controller.handleAction(command)
        break
      default:
        this.controller.handleAction(command)
    }
    this.refresh()
  }

  /** A duration of 0 keeps the message until the next one. */
  showStatus(message: string, duration = 2000) {
    this.statusMessage = message
    this.statusTimer = duration
    this.needsDraw = true
  }

  /** Forces the next frame to be written even if it did not change. */
  invalidate() {
    this.lastOutput = ''
    this.needsDraw = true
  }

  /**
   * With key repeat off, a press of the same move or rotation that arrives
   * within the repeat delay of the previous one is the terminal repeating a held
   * key, so a held key acts once.
   */
  private isIgnoredRepeat(command: SceneCommand) {
    if (!REPEATABLE.has(command)) {
      this.lastRepeatable = null
      return false
    }
    const { keyRepeatEnabled, keyRepeatDelay } = this.settings.controls
    const repeated = command === this.lastRepeatable && this.sinceLastPress < keyRepeatDelay
    this.lastRepeatable = command
    this.sinceLastPress = 0
    return repeated && !keyRepeatEnabled
  }

  private refresh() {
    this.engine.flushEvents()
    if (this.needsDraw) {
      this.draw()
    }
  }

  private handleEvent(event: GameEvent) {
    switch (event.type) {
      case 'gameOver':
        this.callbacks.onGameFinished?.(event.summary, event.reason !== 'playerEnded')
        break
      case 'gameWon':
        this.callbacks.onGameFinished?.(event.summary, true)
        break
      case 'rowsCleared': {
        const mode = this.settings.animationMode
        if (mode === 'enhanced' || (mode === 'normal' && event.count === 4)) {
          this.showStatus(`${CLEAR_NAMES[event.count]}! +${event.scoreGained}`, 1500)
        }
        break
      }
      case 'levelIncreased':
        if (this.settings.animationMode !== 'none') this.showStatus(`Level ${event.newLevel}`, 2000)
        break
      case 'resumed':
        this.showStatus('Resumed', 1200)
        break
      default:
        break
    }
    this.needsDraw = true
  }

  private draw() {
    const state = this.engine.getRenderState()
    this.needsDraw = false
    this.callbacks.onStateUpdate?.(state)
    const lines = renderFrame(state, {
      color: this.color,
      theme: this.settings.colorTheme,
      showGhost: this.settings.showGhostPiece,
      statusMessage: this.statusMessage,
      controlsHint: this.controlsHint
    })
    const output = `\x1b[H${lines.map((line) => `${line}\x1b[K`).join('\n')}\x1b[J`
    if (output === this.lastOutput) return
    this.lastOutput = output
    this.write(output)
  }
}
