import { mkdtemp, readFile, rm, writeFile } from 'fs/promises'
import os from 'os'
import path from 'path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { InvalidArgumentError } from './errors'
import {
  DEFAULT_KEY_MAPPINGS,
  SettingsService,
  createDefaultSettings,
  describeSettings,
  findSettingsProblem,
  parseUserSettings
} from './userSettings'

const epoch = new Date('2024-01-01T00:00:00.000Z')

describe('user settings', () => {
  it('starts from the default bindings', () => {
    const settings = createDefaultSettings(epoch)
    expect(settings.showGhostPiece).toBe(true)
    expect(settings.colorTheme).toBe('classic')
    expect(settings.animationMode).toBe('normal')
    expect(settings.controls).toEqual({
      keyMappings: DEFAULT_KEY_MAPPINGS,
      keyRepeatEnabled: true,
      keyRepeatDelay: 150
    })
    expect(settings.createdAt).toBe('2024-01-01T00:00:00.000Z')
    expect(findSettingsProblem(settings)).toBeNull()
  })

  it('does not share binding lists with the defaults', () => {
    const settings = createDefaultSettings()
    settings.controls.keyMappings.moveLeft.push('h')
    expect(DEFAULT_KEY_MAPPINGS.moveLeft).toEqual(['left', 'a'])
  })

  it('finds bindings that cannot work', () => {
    const settings = createDefaultSettings()
    settings.controls.keyMappings.hardDrop = ['q']
    expect(findSettingsProblem(settings)).toBe('key "q" is bound to both hardDrop and quit')

    settings.controls.keyMappings.hardDrop = []
    expect(findSettingsProblem(settings)).toBe('hardDrop has no key')

    settings.controls.keyMappings.hardDrop = ['space']
    settings.controls.keyRepeatDelay = 20
    expect(findSettingsProblem(settings)).toBe('keyRepeatDelay must be between 50 and 1000')
  })

  it('fills fields an older file leaves out', () => {
    const parsed = parseUserSettings({
      showGhostPiece: false,
      controls: { keyMappings: { moveLeft: ['J'] } }
    })
    expect(parsed?.showGhostPiece).toBe(false)
    expect(parsed?.colorTheme).toBe('classic')
    expect(parsed?.controls.keyMappings.moveLeft).toEqual(['j'])
    expect(parsed?.controls.keyMappings.moveRight).toEqual(['right', 'd'])
    expect(parsed?.controls.keyRepeatDelay).toBe(150)
  })

  it('refuses files it cannot trust', () => {
    expect(parseUserSettings('dark')).toBeNull()
    expect(parseUserSettings({ colorTheme: 'sepia' })).toBeNull()
    expect(parseUserSettings({ animationMode: 'fancy' })).toBeNull()
    expect(parseUserSettings({ showGhostPiece: 'yes' })).toBeNull()
    expect(parseUserSettings({ controls: { keyMappings: { teleport: ['t'] } } })).toBeNull()
    expect(parseUserSettings({ controls: { keyMappings: { moveLeft: [1] } } })).toBeNull()
    expect(parseUserSettings({ controls: { keyMappings: { moveLeft: ['q'] } } })).toBeNull()
    expect(parseUserSettings({ controls: { keyRepeatDelay: '150' } })).toBeNull()
  })

  it('describes the settings line by line', () => {
    const settings = createDefaultSettings()
    settings.controls.keyRepeatEnabled = false
    const lines = describeSettings(settings)
    expect(lines.slice(0, 5)).toEqual([
      'Ghost piece         on',
      'Colour theme        classic',
      'Animations          normal',
      'Key repeat          off (150 ms)',
      'Move left           left, a'
    ])
    expect(lines).toHaveLength(16)
    expect(lines[15]).toBe('Quit                q')
  })
})

describe('SettingsService', () => {
  let saveDir: string
  let service: SettingsService

  beforeEach(async () => {
    saveDir = await mkdtemp(path.join(os.tmpdir(), 'tetris-settings-'))
    service = new SettingsService(saveDir)
    vi.spyOn(console, 'warn').mockImplementation(() => undefined)
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    await rm(saveDir, { recursive: true, force: true })
  })

  it('uses defaults until something is saved', async () => {
    const settings = await service.load()
    expect(settings.showGhostPiece).toBe(true)
    expect(settings.controls.keyMappings).toEqual(DEFAULT_KEY_MAPPINGS)
  })

  it('saves settings as a JSON document', async () => {
    const settings = createDefaultSettings()
    settings.colorTheme = 'monochrome'
    settings.showGhostPiece = false
    await service.save(settings)

    const reloaded = await new SettingsService(saveDir).load()
    expect(reloaded.colorTheme).toBe('monochrome')
    expect(reloaded.showGhostPiece).toBe(false)
    const raw: unknown = JSON.parse(await readFile(path.join(saveDir, 'settings.json'), 'utf-8'))
    expect(raw).toMatchObject({ colorTheme: 'monochrome', controls: { keyRepeatDelay: 150 } })
  })

  it('refuses to save invalid settings', async () => {
    const settings = createDefaultSettings()
    settings.controls.keyMappings.pause = ['space']
    await expect(service.save(settings)).rejects.toThrow(InvalidArgumentError)
    await expect(service.save(settings)).rejects.toThrow(
      'Invalid settings: key "space" is bound to both hardDrop and pause'
    )
  })

  it('falls back to defaults when the file is damaged', async () => {
    await writeFile(path.join(saveDir, 'settings.json'), '{ nope', 'utf-8')
    expect((await service.load()).colorTheme).toBe('classic')
    await writeFile(path.join(saveDir, 'settings.json'), JSON.stringify({ colorTheme: 'sepia' }), 'utf-8')
    expect((await service.load()).colorTheme).toBe('classic')
    expect(console.warn).toHaveBeenCalledTimes(2)
  })

  it('rebinds an action unless another one owns the key', async () => {
    const saved = await service.setKeyMapping('hardDrop', ['Return'])
    expect(saved.controls.keyMappings.hardDrop).toEqual(['return'])
    expect((await service.load()).controls.keyMappings.hardDrop).toEqual(['return'])

    await expect(service.setKeyMapping('save', ['q'])).rejects.toThrow('Key "q" is already bound to quit')
    expect((await service.load()).controls.keyMappings.save).toEqual(['k'])
  })

  it('applies overlapping updates in turn', async () => {
    await Promise.all([
      service.update((draft) => {
        draft.colorTheme = 'dark'
      }),
      service.update((draft) => {
        draft.animationMode = 'none'
      }),
      service.setKeyMapping('toggleGhost', ['h'])
    ])

    const settings = await service.load()
    expect(settings.colorTheme).toBe('dark')
    expect(settings.animationMode).toBe('none')
    expect(settings.controls.keyMappings.toggleGhost).toEqual(['h'])
  })

  it('resets to the defaults', async () => {
    await service.update((draft) => {
      draft.showGhostPiece = false
    })
    const settings = await service.reset()
    expect(settings.showGhostPiece).toBe(true)
    expect((await service.load()).showGhostPiece).toBe(true)
  })
})
