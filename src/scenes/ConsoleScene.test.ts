import { describe, expect, it, vi } from 'vitest'
import { InvalidSnapshotError } from '../errors'
import { PieceFactory } from '../pieceFactory'
import { emptyRows, fillRow, makeSnapshot } from '../testHelpers'
import { TetrisEngine } from '../tetrisLogic'
import type { AnimationMode, UserSettings } from '../userSettings'
import { createDefaultSettings } from '../userSettings'
import type { SceneCallbacks } from './ConsoleScene'
import { ConsoleScene, SOFT_DROP_RELEASE_MS, createKeyBindings, resolveKey } from './ConsoleScene'
import { formatControlsHint } from './frame'

const EMPTY_ROW = `║${' .'.repeat(10)}║`

const setup = (callbacks: SceneCallbacks = {}, settings?: UserSettings) => {
  const engine = new TetrisEngine({ factory: new PieceFactory(() => 0) })
  const frames: string[] = []
  const scene = new ConsoleScene(callbacks, { engine, settings, color: false, write: (output) => frames.push(output) })
  // strip cursor-home, erase-line and erase-below sequences
  const lastFrame = () => (frames.at(-1) ?? '').slice(3, -3).split('\n').map((line) => line.slice(0, -3))
  return { engine, scene, frames, lastFrame }
}

describe('resolveKey', () => {
  it('maps keys to commands', () => {
    expect(resolveKey({ name: 'left' })).toBe('moveLeft')
    expect(resolveKey({ name: 'w' })).toBe('rotateCw')
    expect(resolveKey({ name: 'z' })).toBe('rotateCcw')
    expect(resolveKey({ name: 'space' })).toBe('hardDrop')
    expect(resolveKey({ name: 'down' })).toBe('softDropStart')
    expect(resolveKey({ name: 'k' })).toBe('save')
    expect(resolveKey({ sequence: 'P' })).toBe('togglePause')
  })

  it('treats ctrl+c as quit and ignores other chords', () => {
    expect(resolveKey({ name: 'c', ctrl: true })).toBe('quit')
    expect(resolveKey({ name: 'a', ctrl: true })).toBeNull()
    expect(resolveKey({ name: 'f1' })).toBeNull()
    expect(resolveKey({})).toBeNull()
  })

  it('uses the bindings it is given', () => {
    const settings = createDefaultSettings()
    settings.controls.keyMappings.hardDrop = ['return']
    const bindings = createKeyBindings(settings.controls.keyMappings)
    expect(resolveKey({ name: 'return' }, bindings)).toBe('hardDrop')
    expect(resolveKey({ name: 'space' }, bindings)).toBeNull()
    expect(resolveKey({ name: 'c', ctrl: true }, bindings)).toBe('quit')
  })
})

describe('ConsoleScene', () => {
  it('draws a frame when a game starts', () => {
    const { scene, lastFrame } = setup()
    scene.startNewGame({ difficulty: 'hard' })
    const lines = lastFrame()
    expect(lines[0]).toBe(`╔${'══'.repeat(10)}╗  Classic - Hard`)
    expect(lines[22]).toBe('New game ready')
  })

  it('only writes when the frame changes', () => {
    const { scene, frames } = setup()
    scene.startNewGame()
    scene.runCommand('togglePause')
    const written = frames.length
    scene.update(16)
    scene.update(16)
    expect(frames).toHaveLength(written)
  })

  it('routes keys to the engine', () => {
    const { engine, scene } = setup()
    scene.startNewGame()
    expect(scene.handleKey({ name: 'left' })).toBe(true)
    expect(engine.getCurrentPiece()?.x).toBe(2)
    scene.handleKey({ name: 'up' })
    expect(engine.getCurrentPiece()?.rotation).toBe(1)
    scene.handleKey({ name: 'p' })
    expect(engine.isPaused()).toBe(true)
    expect(scene.handleKey({ name: 'f5' })).toBe(false)
  })

  it('releases soft drop once the key stops repeating', () => {
    const { engine, scene } = setup()
    scene.startNewGame()
    scene.handleKey({ name: 'down' })
    expect(engine.isSoftDropActive()).toBe(true)
    scene.update(SOFT_DROP_RELEASE_MS - 30)
    scene.handleKey({ name: 'down' })
    scene.update(SOFT_DROP_RELEASE_MS - 30)
    expect(engine.isSoftDropActive()).toBe(true)
    scene.update(30)
    expect(engine.isSoftDropActive()).toBe(false)
  })

  it('asks the host to save, load, restart and quit', () => {
    const callbacks = {
      onRequestSave: vi.fn(),
      onRequestLoad: vi.fn(),
      onRequestRestart: vi.fn(),
      onRequestQuit: vi.fn()
    }
    const { scene } = setup(callbacks)
    scene.handleKey({ name: 'k' })
    scene.handleKey({ name: 'l' })
    scene.handleKey({ name: 'r' })
    scene.handleKey({ name: 'q' })
    scene.handleKey({ name: 'c', ctrl: true })
    expect(callbacks.onRequestSave).toHaveBeenCalledTimes(1)
    expect(callbacks.onRequestLoad).toHaveBeenCalledTimes(1)
    expect(callbacks.onRequestRestart).toHaveBeenCalledTimes(1)
    expect(callbacks.onRequestQuit).toHaveBeenCalledTimes(2)
  })

  it('reports finished games with whether they were completed', () => {
    const onGameFinished = vi.fn()
    const { scene } = setup({ onGameFinished })
    const board = makeSnapshot().board
    board[2][0] = 'S'
    board[2][1] = 'S'
    scene.restoreGame(makeSnapshot({ board, currentPiece: { kind: 'O', rotation: 0, x: -1, y: 0 } }))
    scene.runCommand('hardDrop')
    expect(onGameFinished).toHaveBeenCalledTimes(1)
    expect(onGameFinished.mock.calls[0][1]).toBe(true)

    scene.startNewGame()
    expect(scene.endGame()).toBe(true)
    expect(onGameFinished).toHaveBeenCalledTimes(2)
    expect(onGameFinished.mock.calls[1][1]).toBe(false)
  })

  it('keeps the current game when a restore fails', () => {
    const onGameFinished = vi.fn()
    const { engine, scene } = setup({ onGameFinished })
    scene.startNewGame()
    expect(() => scene.restoreGame({ version: 99 })).toThrow(InvalidSnapshotError)
    expect(engine.isRunning()).toBe(true)
    expect(onGameFinished).not.toHaveBeenCalled()
  })

  it('records the game in progress as abandoned when a save replaces it', () => {
    const onGameFinished = vi.fn()
    const { engine, scene } = setup({ onGameFinished })
    scene.startNewGame()
    scene.restoreGame(makeSnapshot({ score: 300 }))

    expect(onGameFinished).toHaveBeenCalledTimes(1)
    expect(onGameFinished.mock.calls[0][0]).toMatchObject({ finalScore: 0, difficulty: 'medium' })
    expect(onGameFinished.mock.calls[0][1]).toBe(false)
    expect(engine.isRunning()).toBe(true)
    expect(engine.getScore()).toBe(300)
  })

  it('clears a status message after its duration', () => {
    const { scene, lastFrame } = setup()
    scene.startNewGame()
    scene.runCommand('togglePause')
    scene.showStatus('Progress saved', 500)
    scene.update(499)
    expect(lastFrame()[22]).toBe('Progress saved')
    scene.update(1)
    expect(lastFrame()[22]).toBe('Paused - press P to resume')
  })

  it('announces the resume', () => {
    const { scene, lastFrame } = setup()
    scene.startNewGame()
    scene.runCommand('togglePause')
    scene.runCommand('togglePause')
    expect(lastFrame()[22]).toBe('Resumed')
  })

  it('snapshots the running game', () => {
    const { scene } = setup()
    expect(scene.hasGame()).toBe(false)
    scene.startNewGame({ mode: 'challenge' })
    expect(scene.hasGame()).toBe(true)
    expect(scene.getSnapshot().targetRows).toBe(40)
  })
})

describe('ConsoleScene settings', () => {
  // a single row clear waits under the falling I piece
  const clearOneRow = (totalRowsCleared: number) =>
    makeSnapshot({
      board: fillRow(emptyRows(), 19, 'T', [6, 7, 8, 9]),
      currentPiece: { kind: 'I', rotation: 0, x: 6, y: 18 },
      totalRowsCleared,
      lineClears: { single: totalRowsCleared, double: 0, triple: 0, tetris: 0 }
    })

  const withAnimations = (animationMode: AnimationMode) => {
    const settings = createDefaultSettings()
    settings.animationMode = animationMode
    return settings
  }

  it('follows custom key mappings', () => {
    const settings = createDefaultSettings()
    settings.controls.keyMappings.moveLeft = ['j']
    settings.controls.keyMappings.rotateCw = ['i']
    const { engine, scene, lastFrame } = setup({}, settings)
    scene.startNewGame()

    expect(scene.handleKey({ name: 'left' })).toBe(false)
    expect(scene.handleKey({ name: 'j' })).toBe(true)
    expect(engine.getCurrentPiece()?.x).toBe(2)
    scene.handleKey({ name: 'i' })
    expect(engine.getCurrentPiece()?.rotation).toBe(1)
    expect(lastFrame()[23]).toBe(formatControlsHint(settings.controls.keyMappings))
  })

  it('rebinds keys when settings are applied', () => {
    const { engine, scene } = setup()
    scene.startNewGame()
    const settings = createDefaultSettings()
    settings.controls.keyMappings.moveRight = ['l']
    settings.controls.keyMappings.load = ['o']
    scene.applySettings(settings)

    scene.handleKey({ name: 'l' })
    expect(engine.getCurrentPiece()?.x).toBe(4)
    expect(scene.handleKey({ name: 'right' })).toBe(false)
  })

  it('toggles the ghost piece and reports the change', () => {
    const onSettingsChanged = vi.fn()
    const { scene, lastFrame } = setup({ onSettingsChanged })
    scene.startNewGame()
    expect(lastFrame()[20]).toBe('║ . . .░░░░░░░░ . . .║')

    scene.handleKey({ name: 'g' })
    expect(lastFrame()[20]).toBe(EMPTY_ROW)
    expect(lastFrame()[22]).toBe('Ghost piece off')
    expect(onSettingsChanged).toHaveBeenCalledTimes(1)
    expect(onSettingsChanged.mock.calls[0][0]).toMatchObject({ showGhostPiece: false })
    expect(scene.getSettings().showGhostPiece).toBe(false)
  })

  it('hides the ghost when the settings say so', () => {
    const settings = createDefaultSettings()
    settings.showGhostPiece = false
    const { scene, lastFrame } = setup({}, settings)
    scene.startNewGame()
    expect(lastFrame()[20]).toBe(EMPTY_ROW)
  })

  it('moves once per held key when key repeat is off', () => {
    const settings = createDefaultSettings()
    settings.controls.keyRepeatEnabled = false
    settings.controls.keyRepeatDelay = 200
    const { engine, scene } = setup({}, settings)
    scene.startNewGame()

    scene.handleKey({ name: 'left' })
    scene.update(30)
    expect(scene.handleKey({ name: 'left' })).toBe(true)
    scene.update(30)
    scene.handleKey({ name: 'left' })
    expect(engine.getCurrentPiece()?.x).toBe(2)

    scene.update(250)
    scene.handleKey({ name: 'left' })
    expect(engine.getCurrentPiece()?.x).toBe(1)
    scene.handleKey({ name: 'right' })
    expect(engine.getCurrentPiece()?.x).toBe(2)
  })

  it('lets repeats through when key repeat is on', () => {
    const { engine, scene } = setup()
    scene.startNewGame()
    scene.handleKey({ name: 'left' })
    scene.update(30)
    scene.handleKey({ name: 'left' })
    expect(engine.getCurrentPiece()?.x).toBe(1)
  })

  it('announces every clear with enhanced animations', () => {
    const { scene, lastFrame } = setup({}, withAnimations('enhanced'))
    scene.restoreGame(clearOneRow(0))
    scene.runCommand('hardDrop')
    expect(lastFrame()[22]).toBe('Single! +100')
  })

  it('only announces tetrises with normal animations', () => {
    const { scene, lastFrame } = setup({}, withAnimations('normal'))
    scene.restoreGame(clearOneRow(0))
    scene.runCommand('hardDrop')
    expect(lastFrame()[22]).toBe('Loaded saved game')
  })

  it('keeps level-ups under minimal animations and drops them under none', () => {
    const minimal = setup({}, withAnimations('minimal'))
    minimal.scene.restoreGame(clearOneRow(9))
    minimal.scene.runCommand('hardDrop')
    expect(minimal.lastFrame()[22]).toBe('Level 2')

    const none = setup({}, withAnimations('none'))
    none.scene.restoreGame(clearOneRow(9))
    none.scene.runCommand('hardDrop')
    expect(none.lastFrame()[22]).toBe('Loaded saved game')
  })
})
