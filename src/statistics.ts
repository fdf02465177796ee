import path from 'path'
import type { GameSummary } from './events'
import { StorageError } from './errors'
import { createLogger } from './logger'
import { isRecord } from './snapshot'
import { TaskQueue, readJsonFile, writeJsonFile } from './storage/jsonFiles'

export interface GameStatistics {
  totalGamesPlayed: number
  totalGamesCompleted: number
  highestScore: number
  totalScore: number
  totalRowsCleared: number
  highestLevel: number
  totalTimePlayedSeconds: number
  singleRowClears: number
  doubleRowClears: number
  tripleRowClears: number
  tetrisRowClears: number
  createdAt: string
  lastUpdated: string
}

type CounterKey = Exclude<keyof GameStatistics, 'createdAt' | 'lastUpdated'>

const COUNTER_KEYS: readonly CounterKey[] = [
  'totalGamesPlayed',
  'totalGamesCompleted',
  'highestScore',
  'totalScore',
  'totalRowsCleared',
  'highestLevel',
  'totalTimePlayedSeconds',
  'singleRowClears',
  'doubleRowClears',
  'tripleRowClears',
  'tetrisRowClears'
]

export function createEmptyStatistics(now = new Date()): GameStatistics {
  const timestamp = now.toISOString()
  return {
    totalGamesPlayed: 0,
    totalGamesCompleted: 0,
    highestScore: 0,
    totalScore: 0,
    totalRowsCleared: 0,
    highestLevel: 0,
    totalTimePlayedSeconds: 0,
    singleRowClears: 0,
    doubleRowClears: 0,
    tripleRowClears: 0,
    tetrisRowClears: 0,
    createdAt: timestamp,
    lastUpdated: timestamp
  }
}

export function applyGameResult(
  stats: GameStatistics,
  summary: GameSummary,
  completed: boolean,
  now = new Date()
): GameStatistics {
  return {
    ...stats,
    totalGamesPlayed: stats.totalGamesPlayed + 1,
    totalGamesCompleted: stats.totalGamesCompleted + (completed ? 1 : 0),
    highestScore: Math.max(stats.highestScore, summary.finalScore),
    totalScore: stats.totalScore + summary.finalScore,
    totalRowsCleared: stats.totalRowsCleared + summary.totalRowsCleared,
    highestLevel: Math.max(stats.highestLevel, summary.finalLevel),
    totalTimePlayedSeconds: stats.totalTimePlayedSeconds + summary.elapsedSeconds,
    singleRowClears: stats.singleRowClears + summary.lineClears.single,
    doubleRowClears: stats.doubleRowClears + summary.lineClears.double,
    tripleRowClears: stats.tripleRowClears + summary.lineClears.triple,
    tetrisRowClears: stats.tetrisRowClears + summary.lineClears.tetris,
    lastUpdated: now.toISOString()
  }
}

const perGame = (stats: GameStatistics, total: number) =>
  stats.totalGamesPlayed > 0 ? total / stats.totalGamesPlayed : 0

export const averageScore = (stats: GameStatistics) => perGame(stats, stats.totalScore)

export const averageTimePerGame = (stats: GameStatistics) => perGame(stats, stats.totalTimePlayedSeconds)

export const averageRowsPerGame = (stats: GameStatistics) => perGame(stats, stats.totalRowsCleared)

export const completionRate = (stats: GameStatistics) => perGame(stats, stats.totalGamesCompleted) * 100

const pad = (value: number) => String(value).padStart(2, '0')

/** `HH:MM:SS`, prefixed with whole days once the total reaches one. */
export function formatPlayTime(totalSeconds: number) {
  const seconds = Math.floor(totalSeconds)
  const days = Math.floor(seconds / 86400)
  const hours = Math.floor((seconds % 86400) / 3600)
  const minutes = Math.floor((seconds % 3600) / 60)
  const clock = `${pad(hours)}:${pad(minutes)}:${pad(seconds % 60)}`
  return days > 0 ? `${days}d ${clock}` : clock
}

const line = (label: string, value: string | number) => `${label.padEnd(20)}${value}`

export function describeStatistics(stats: GameStatistics) {
  return [
    line('Games played', stats.totalGamesPlayed),
    line('Games completed', `${stats.totalGamesCompleted} (${completionRate(stats).toFixed(1)}%)`),
    line('Highest score', stats.highestScore),
    line('Average score', Math.round(averageScore(stats))),
    line('Highest level', stats.highestLevel),
    line('Rows cleared', stats.totalRowsCleared),
    line('Rows per game', averageRowsPerGame(stats).toFixed(1)),
    line('Time played', formatPlayTime(stats.totalTimePlayedSeconds)),
    line('Time per game', formatPlayTime(averageTimePerGame(stats))),
    line('Line clears', [
      `${stats.singleRowClears} single`,
      `${stats.doubleRowClears} double`,
      `${stats.tripleRowClears} triple`,
      `${stats.tetrisRowClears} tetris`
    ].join(', '))
  ]
}

function parseStatistics(data: unknown): GameStatistics | null {
  if (!isRecord(data)) return null
  const stats = createEmptyStatistics()
  for (const key of COUNTER_KEYS) {
    const value = data[key]
    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) return null
    stats[key] = value
  }
  const { createdAt, lastUpdated } = data
  if (typeof createdAt === 'string') stats.createdAt = createdAt
  if (typeof lastUpdated === 'string') stats.lastUpdated = lastUpdated
  return stats
}

/** Lifetime play statistics kept in `<saveDir>/statistics.json`. */
export class StatisticsService {
  private readonly filePath: string
  private readonly logger = createLogger('StatisticsService')
  private readonly writes = new TaskQueue()

  constructor(saveDir: string) {
    this.filePath = path.join(saveDir, 'statistics.json')
  }

  async load(): Promise<GameStatistics> {
    let data: unknown
    try {
      data = await readJsonFile(this.filePath)
    } catch (error) {
      if (!(error instanceof StorageError && error.cause instanceof SyntaxError)) throw error
      this.logger.warn('Statistics file is not valid JSON, starting over')
      return createEmptyStatistics()
    }
    if (data === null) return createEmptyStatistics()
    const stats = parseStatistics(data)
    if (!stats) {
      this.logger.warn('Statistics file has unexpected content, starting over')
      return createEmptyStatistics()
    }
    return stats
  }

  recordGame(summary: GameSummary, completed: boolean) {
    return this.writes.run(async () => {
      const stats = applyGameResult(await this.load(), summary, completed)
      await writeJsonFile(this.filePath, stats)
      this.logger.debug('Recorded game', { score: summary.finalScore, completed })
      return stats
    })
  }

  reset() {
    return this.writes.run(async () => {
      const stats = createEmptyStatistics()
      await writeJsonFile(this.filePath, stats)
      return stats
    })
  }
}
