import path from 'path'
import { InvalidArgumentError, StorageError } from './errors'
import { createLogger } from './logger'
import { isRecord } from './snapshot'
import { TaskQueue, readJsonFile, writeJsonFile } from './storage/jsonFiles'

export type KeyAction =
  | 'moveLeft'
  | 'moveRight'
  | 'rotateCw'
  | 'rotateCcw'
  | 'softDrop'
  | 'hardDrop'
  | 'pause'
  | 'toggleGhost'
  | 'save'
  | 'load'
  | 'restart'
  | 'quit'

export type ColorTheme = 'classic' | 'dark' | 'highContrast' | 'monochrome'

export type AnimationMode = 'none' | 'minimal' | 'normal' | 'enhanced'

/** Readline key names (`left`, `space`, `a`) per action. */
export type KeyMappings = Record<KeyAction, string[]>

export interface ControlSettings {
  keyMappings: KeyMappings
  keyRepeatEnabled: boolean
  keyRepeatDelay: number
}

export interface UserSettings {
  controls: ControlSettings
  showGhostPiece: boolean
  colorTheme: ColorTheme
  animationMode: AnimationMode
  createdAt: string
  updatedAt: string
}

export const KEY_ACTIONS: readonly KeyAction[] = [
  'moveLeft',
  'moveRight',
  'rotateCw',
  'rotateCcw',
  'softDrop',
  'hardDrop',
  'pause',
  'toggleGhost',
  'save',
  'load',
  'restart',
  'quit'
]

export const COLOR_THEMES: readonly ColorTheme[] = ['classic', 'dark', 'highContrast', 'monochrome']

export const ANIMATION_MODES: readonly AnimationMode[] = ['none', 'minimal', 'normal', 'enhanced']

export const MIN_KEY_REPEAT_DELAY = 50
export const MAX_KEY_REPEAT_DELAY = 1000

export const DEFAULT_KEY_MAPPINGS: Readonly<KeyMappings> = {
  moveLeft: ['left', 'a'],
  moveRight: ['right', 'd'],
  rotateCw: ['up', 'w', 'x'],
  rotateCcw: ['z'],
  softDrop: ['down', 's'],
  hardDrop: ['space'],
  pause: ['p', 'escape'],
  toggleGhost: ['g'],
  save: ['k'],
  load: ['l'],
  restart: ['r'],
  quit: ['q']
}

const ACTION_LABELS: Record<KeyAction, string> = {
  moveLeft: 'Move left',
  moveRight: 'Move right',
  rotateCw: 'Rotate',
  rotateCcw: 'Rotate back',
  softDrop: 'Soft drop',
  hardDrop: 'Hard drop',
  pause: 'Pause',
  toggleGhost: 'Toggle ghost',
  save: 'Save',
  load: 'Load',
  restart: 'Restart',
  quit: 'Quit'
}

export const isKeyAction = (value: unknown): value is KeyAction => KEY_ACTIONS.some((action) => action === value)

const isColorTheme = (value: unknown): value is ColorTheme => COLOR_THEMES.some((theme) => theme === value)

const isAnimationMode = (value: unknown): value is AnimationMode => ANIMATION_MODES.some((mode) => mode === value)

const cloneMappings = (mappings: Readonly<KeyMappings>): KeyMappings => ({
  moveLeft: [...mappings.moveLeft],
  moveRight: [...mappings.moveRight],
  rotateCw: [...mappings.rotateCw],
  rotateCcw: [...mappings.rotateCcw],
  softDrop: [...mappings.softDrop],
  hardDrop: [...mappings.hardDrop],
  pause: [...mappings.pause],
  toggleGhost: [...mappings.toggleGhost],
  save: [...mappings.save],
  load: [...mappings.load],
  restart: [...mappings.restart],
  quit: [...mappings.quit]
})

export function createDefaultSettings(now = new Date()): UserSettings {
  const timestamp = now.toISOString()
  return {
    controls: {
      keyMappings: cloneMappings(DEFAULT_KEY_MAPPINGS),
      keyRepeatEnabled: true,
      keyRepeatDelay: 150
    },
    showGhostPiece: true,
    colorTheme: 'classic',
    animationMode: 'normal',
    createdAt: timestamp,
    updatedAt: timestamp
  }
}

export function cloneSettings(settings: UserSettings): UserSettings {
  return {
    ...settings,
    controls: { ...settings.controls, keyMappings: cloneMappings(settings.controls.keyMappings) }
  }
}

/** Returns the first reason the settings cannot be used, or null. */
export function findSettingsProblem(settings: UserSettings): string | null {
  const owners = new Map<string, KeyAction>()
  for (const action of KEY_ACTIONS) {
    const keys = settings.controls.keyMappings[action]
    if (!keys.length) return `${action} has no key`
    for (const key of keys) {
      if (!key || key !== key.toLowerCase()) return `${action} has an invalid key "${key}"`
      const owner = owners.get(key)
      if (owner) return `key "${key}" is bound to both ${owner} and ${action}`
      owners.set(key, action)
    }
  }
  const delay = settings.controls.keyRepeatDelay
  if (!Number.isInteger(delay) || delay < MIN_KEY_REPEAT_DELAY || delay > MAX_KEY_REPEAT_DELAY) {
    return `keyRepeatDelay must be between ${MIN_KEY_REPEAT_DELAY} and ${MAX_KEY_REPEAT_DELAY}`
  }
  return null
}

function readKeys(value: unknown) {
  if (!Array.isArray(value)) return null
  const keys: string[] = []
  for (const key of value) {
    if (typeof key !== 'string') return null
    keys.push(key.trim().toLowerCase())
  }
  return keys
}

function readMappings(value: unknown): KeyMappings | null {
  const mappings = cloneMappings(DEFAULT_KEY_MAPPINGS)
  if (value === undefined) return mappings
  if (!isRecord(value)) return null
  for (const [action, raw] of Object.entries(value)) {
    if (!isKeyAction(action)) return null
    const keys = readKeys(raw)
    if (!keys) return null
    mappings[action] = keys
  }
  return mappings
}

function readControls(value: unknown): ControlSettings | null {
  const defaults = createDefaultSettings().controls
  if (value === undefined) return defaults
  if (!isRecord(value)) return null
  const keyMappings = readMappings(value.keyMappings)
  const { keyRepeatEnabled = defaults.keyRepeatEnabled, keyRepeatDelay = defaults.keyRepeatDelay } = value
  if (!keyMappings || typeof keyRepeatEnabled !== 'boolean' || typeof keyRepeatDelay !== 'number') return null
  return { keyMappings, keyRepeatEnabled, keyRepeatDelay }
}

/**
 * Reads settings from parsed JSON. Fields left out take their defaults so older
 * files keep loading; fields of the wrong type or inconsistent key bindings
 * make the whole file unusable and return null.
 */
export function parseUserSettings(data: unknown): UserSettings | null {
  if (!isRecord(data)) return null
  const settings = createDefaultSettings()
  const controls = readControls(data.controls)
  if (!controls) return null
  settings.controls = controls

  const {
    showGhostPiece = settings.showGhostPiece,
    colorTheme = settings.colorTheme,
    animationMode = settings.animationMode
  } = data
  if (typeof showGhostPiece !== 'boolean' || !isColorTheme(colorTheme) || !isAnimationMode(animationMode)) {
    return null
  }
  settings.showGhostPiece = showGhostPiece
  settings.colorTheme = colorTheme
  settings.animationMode = animationMode

  const { createdAt, updatedAt } = data
  if (typeof createdAt === 'string') settings.createdAt = createdAt
  if (typeof updatedAt === 'string') settings.updatedAt = updatedAt
  return findSettingsProblem(settings) ? null : settings
}

export function describeSettings(settings: UserSettings): string[] {
  const line = (label: string, value: string) => `${label.padEnd(20)}${value}`
  const { controls } = settings
  return [
    line('Ghost piece', settings.showGhostPiece ? 'on' : 'off'),
    line('Colour theme', settings.colorTheme),
    line('Animations', settings.animationMode),
    line('Key repeat', controls.keyRepeatEnabled ? 'on' : `off (${controls.keyRepeatDelay} ms)`),
    ...KEY_ACTIONS.map((action) => line(ACTION_LABELS[action], controls.keyMappings[action].join(', ')))
  ]
}

/** Player preferences kept in `<saveDir>/settings.json`. */
export class SettingsService {
  private readonly filePath: string
  private readonly logger = createLogger('SettingsService')
  private readonly writes = new TaskQueue()

  constructor(saveDir: string) {
    this.filePath = path.join(saveDir, 'settings.json')
  }

  async load(): Promise<UserSettings> {
    let data: unknown
    try {
      data = await readJsonFile(this.filePath)
    } catch (error) {
      if (!(error instanceof StorageError && error.cause instanceof SyntaxError)) throw error
      this.logger.warn('Settings file is not valid JSON, using defaults')
      return createDefaultSettings()
    }
    if (data === null) return createDefaultSettings()
    const settings = parseUserSettings(data)
    if (!settings) {
      this.logger.warn('Settings file has unexpected content, using defaults')
      return createDefaultSettings()
    }
    return settings
  }

  /** Throws InvalidArgumentError for settings that fail validation. */
  save(settings: UserSettings) {
    return this.writes.run(() => this.persist(settings))
  }

  /** Applies a change to the stored settings. */
  update(change: (draft: UserSettings) => void) {
    return this.writes.run(async () => {
      const draft = cloneSettings(await this.load())
      change(draft)
      return this.persist(draft)
    })
  }

  /** Binds keys to an action; a key taken by another action is refused. */
  setKeyMapping(action: KeyAction, keys: string[]) {
    const normalized = keys.map((key) => key.trim().toLowerCase())
    return this.update((draft) => {
      for (const other of KEY_ACTIONS) {
        if (other === action) continue
        const taken = normalized.find((key) => draft.controls.keyMappings[other].includes(key))
        if (taken) throw new InvalidArgumentError(`Key "${taken}" is already bound to ${other}`)
      }
      draft.controls.keyMappings[action] = normalized
    })
  }

  reset() {
    return this.writes.run(() => this.persist(createDefaultSettings()))
  }

  private async persist(settings: UserSettings) {
    const problem = findSettingsProblem(settings)
    if (problem) throw new InvalidArgumentError(`Invalid settings: ${problem}`)
    const saved = { ...cloneSettings(settings), updatedAt: new Date().toISOString() }
    await writeJsonFile(this.filePath, saved)
    this.logger.debug('Settings saved', { theme: saved.colorTheme, ghost: saved.showGhostPiece })
    return saved
  }
}
