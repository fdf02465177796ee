import readline from 'readline'
import { parseArgs } from 'util'
import type { AppConfig } from './config'
import { loadConfig } from './config'
import { InvalidArgumentError } from './errors'
import { createLogger, setDebugLogging } from './logger'
import { SavingService } from './saving'
import type { KeyPress } from './scenes/ConsoleScene'
import { ConsoleScene } from './scenes/ConsoleScene'
import { parseDifficulty, parseGameMode } from './settings'
import { StatisticsService, describeStatistics } from './statistics'
import type { StartOptions } from './tetrisLogic'
import type { UserSettings } from './userSettings'
import { SettingsService, describeSettings } from './userSettings'

const logger = createLogger('main')

const HIDE_CURSOR = '\x1b[?25l'
const SHOW_CURSOR = '\x1b[?25h'
const CLEAR_SCREEN = '\x1b[2J\x1b[H'

async function main() {
  const { values } = parseArgs({
    options: {
      load: { type: 'boolean', default: false },
      stats: { type: 'boolean', default: false },
      'reset-stats': { type: 'boolean', default: false },
      settings: { type: 'boolean', default: false },
      'reset-settings': { type: 'boolean', default: false },
      mode: { type: 'string' },
      difficulty: { type: 'string' }
    }
  })
  const config = loadConfig()
  setDebugLogging(config.debug)
  const statistics = new StatisticsService(config.saveDir)
  const settingsService = new SettingsService(config.saveDir)

  if (values['reset-stats']) {
    await statistics.reset()
    console.log('Statistics reset')
    return
  }
  if (values.stats) {
    console.log(describeStatistics(await statistics.load()).join('\n'))
    return
  }
  if (values['reset-settings']) {
    await settingsService.reset()
    console.log('Settings reset')
    return
  }
  if (values.settings) {
    console.log(describeSettings(await settingsService.load()).join('\n'))
    return
  }
  if (!process.stdin.isTTY) {
    throw new InvalidArgumentError('Terminal Tetris needs an interactive terminal')
  }

  const startOptions: StartOptions = {
    mode: values.mode ? parseGameMode(values.mode) : config.mode,
    difficulty: values.difficulty ? parseDifficulty(values.difficulty) : config.difficulty
  }
  const settings = await settingsService.load()
  await play(config, startOptions, { statistics, settingsService, settings }, values.load)
}

interface Services {
  statistics: StatisticsService
  settingsService: SettingsService
  settings: UserSettings
}

function play(config: AppConfig, startOptions: StartOptions, services: Services, resume: boolean) {
  const { statistics, settingsService } = services
  const savingService = new SavingService(config.saveDir)
  const pendingWrites = new Set<Promise<void>>()
  let saveBusy = false

  return new Promise<void>((resolve) => {
    const scene = new ConsoleScene(
      {
        onGameFinished: (summary, completed) => {
          trackWrite(statistics.recordGame(summary, completed), 'Could not record statistics')
        },
        onSettingsChanged: (settings) => {
          trackWrite(settingsService.save(settings), 'Could not save settings')
        },
        onRequestSave: () => {
          void persistSession()
        },
        onRequestLoad: () => {
          void loadSavedSession()
        },
        onRequestRestart: () => {
          scene.endGame()
          scene.startNewGame(startOptions)
        },
        onRequestQuit: () => {
          void shutdown()
        }
      },
      { settings: services.settings }
    )

    function trackWrite(task: Promise<unknown>, failure: string) {
      const write: Promise<void> = task
        .then(
          () => undefined,
          (error: unknown) => logger.error(failure, error)
        )
        .finally(() => {
          pendingWrites.delete(write)
        })
      pendingWrites.add(write)
    }

    const onKeypress = (_input: string | undefined, key: KeyPress | undefined) => {
      if (key) scene.handleKey(key)
    }
    const onResize = () => {
      process.stdout.write(CLEAR_SCREEN)
      scene.invalidate()
    }

    readline.emitKeypressEvents(process.stdin)
    process.stdin.setRawMode(true)
    process.stdin.on('keypress', onKeypress)
    process.stdin.resume()
    process.stdout.on('resize', onResize)
    process.stdout.write(HIDE_CURSOR + CLEAR_SCREEN)

    let last = performance.now()
    const timer = setInterval(() => {
      const now = performance.now()
      scene.update(now - last)
      last = now
    }, Math.round(1000 / config.frameRate))

    if (resume) {
      void loadSavedSession()
    } else {
      scene.startNewGame(startOptions)
    }

    async function persistSession() {
      if (saveBusy || !scene.hasGame()) return
      saveBusy = true
      scene.showStatus('Saving progress…', 0)
      try {
        const payload = await savingService.save(scene.getSnapshot())
        scene.showStatus(`Progress saved at ${new Date(payload.savedAt).toLocaleTimeString()}`, 2400)
      } catch (error) {
        logger.error('Saving failed', error)
        scene.showStatus('Could not save the game', 3000)
      } finally {
        saveBusy = false
      }
    }

    async function loadSavedSession() {
      let message = 'No saved game found'
      try {
        const payload = await savingService.loadQuickSave()
        if (payload) {
          scene.restoreGame(payload.snapshot)
          return
        }
      } catch (error) {
        logger.error('Loading failed', error)
        message = 'Could not load the saved game'
      }
      if (!scene.hasGame()) scene.startNewGame(startOptions)
      scene.showStatus(message, 3000)
    }

    let stopping = false
    async function shutdown() {
      if (stopping) return
      stopping = true
      scene.endGame()
      clearInterval(timer)
      process.stdin.off('keypress', onKeypress)
      process.stdout.off('resize', onResize)
      process.stdin.setRawMode(false)
      process.stdin.pause()
      process.stdout.write(`${SHOW_CURSOR}\n`)
      await Promise.all(pendingWrites)
      resolve()
    }
  })
}

main().catch((error: unknown) => {
  process.stdout.write(SHOW_CURSOR)
  if (error instanceof InvalidArgumentError) {
    console.error(error.message)
  } else {
    logger.error('Unexpected failure', error)
  }
  process.exitCode = 1
})
