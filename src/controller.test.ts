import { describe, expect, it } from 'vitest'
import { PieceController } from './controller'
import { PieceFactory } from './pieceFactory'
import { emptyRows, makeSnapshot } from './testHelpers'
import { TetrisEngine } from './tetrisLogic'

const setup = () => {
  const engine = new TetrisEngine({ factory: new PieceFactory(() => 0) })
  const controller = new PieceController(engine)
  return { engine, controller }
}

describe('PieceController', () => {
  it('forwards movement and rotation to the engine', () => {
    const { engine, controller } = setup()
    engine.start()
    expect(controller.handleAction('moveLeft')).toBe(true)
    expect(controller.handleAction('rotateCw')).toBe(true)
    expect(engine.getCurrentPiece()).toEqual({ kind: 'I', rotation: 1, x: 2, y: 0 })
    expect(controller.handleAction('rotateCcw')).toBe(true)
    expect(controller.handleAction('moveRight')).toBe(true)
    expect(engine.getCurrentPiece()).toEqual({ kind: 'I', rotation: 0, x: 3, y: 0 })
  })

  it('reports rejected commands', () => {
    const { engine, controller } = setup()
    expect(controller.handleAction('moveLeft')).toBe(false)
    expect(controller.handleAction('hardDrop')).toBe(false)
    engine.start()
    engine.pause()
    expect(controller.handleAction('rotateCw')).toBe(false)
    expect(controller.handleAction('hardDrop')).toBe(false)
  })

  it('hard drops the current piece', () => {
    const { engine, controller } = setup()
    engine.start()
    expect(controller.handleAction('hardDrop')).toBe(true)
    expect(engine.getBoard().getCell(3, 19)).toBe('I')
  })

  it('tracks soft drop start and end', () => {
    const { engine, controller } = setup()
    engine.start()
    expect(controller.handleAction('softDropStart')).toBe(true)
    expect(controller.isSoftDropActive()).toBe(true)
    expect(engine.getDropInterval()).toBe(50)
    expect(controller.handleAction('softDropStart')).toBe(false)
    expect(controller.handleAction('softDropEnd')).toBe(true)
    expect(controller.isSoftDropActive()).toBe(false)
    expect(engine.getDropInterval()).toBe(1000)
    expect(controller.handleAction('softDropEnd')).toBe(false)
  })

  it('cannot start soft drop without a running game', () => {
    const { controller } = setup()
    expect(controller.handleAction('softDropStart')).toBe(false)
    expect(controller.isSoftDropActive()).toBe(false)
  })

  it('follows the engine when a game ends during soft drop', () => {
    const { engine, controller } = setup()
    engine.start()
    controller.toggleSoftDrop(true)
    engine.endGame()
    expect(controller.toggleSoftDrop(false)).toBe(false)
    expect(controller.isSoftDropActive()).toBe(false)
  })

  it('picks up soft drop from a restored game', () => {
    const { engine, controller } = setup()
    engine.restoreFromSnapshot(makeSnapshot({ softDrop: true }))
    expect(controller.toggleSoftDrop(false)).toBe(true)
    expect(engine.isSoftDropActive()).toBe(false)
  })

  it('composes the current piece onto a copy of the board', () => {
    const { engine, controller } = setup()
    engine.start()
    const rows = controller.getBoardWithCurrentPiece()
    expect(rows[1]).toEqual([null, null, null, 'I', 'I', 'I', 'I', null, null, null])
    expect(engine.getBoard().toRows()).toEqual(emptyRows())
  })

  it('previews where a hard drop would land', () => {
    const { engine, controller } = setup()
    engine.start()
    const rows = controller.getHardDropPreview()
    expect(rows[19]).toEqual([null, null, null, 'I', 'I', 'I', 'I', null, null, null])
    expect(rows[1].every((cell) => cell === null)).toBe(true)
  })
})
