import { InvalidArgumentError } from './errors'

export type Difficulty = 'easy' | 'medium' | 'hard'

export type GameMode = 'classic' | 'timed' | 'challenge'

export interface DifficultySettings {
  displayName: string
  description: string
  initialFallDelay: number
  delayReductionPerLevel: number
  minFallDelay: number
  scoreMultiplier: number
  timedModeSeconds: number
  challengeRowsTarget: number
}

export const DIFFICULTIES: readonly Difficulty[] = ['easy', 'medium', 'hard']

export const GAME_MODES: readonly GameMode[] = ['classic', 'timed', 'challenge']

const DIFFICULTY_SETTINGS: Record<Difficulty, DifficultySettings> = {
  easy: {
    displayName: 'Easy',
    description: 'Slower falling speed, standard scoring',
    initialFallDelay: 1200,
    delayReductionPerLevel: 40,
    minFallDelay: 150,
    scoreMultiplier: 1,
    timedModeSeconds: 180,
    challengeRowsTarget: 20
  },
  medium: {
    displayName: 'Medium',
    description: 'Standard falling speed, 50% score bonus',
    initialFallDelay: 1000,
    delayReductionPerLevel: 50,
    minFallDelay: 100,
    scoreMultiplier: 1.5,
    timedModeSeconds: 120,
    challengeRowsTarget: 40
  },
  hard: {
    displayName: 'Hard',
    description: 'Faster falling speed, double scoring',
    initialFallDelay: 800,
    delayReductionPerLevel: 60,
    minFallDelay: 80,
    scoreMultiplier: 2,
    timedModeSeconds: 90,
    challengeRowsTarget: 60
  }
}

const MODE_NAMES: Record<GameMode, string> = {
  classic: 'Classic',
  timed: 'Timed',
  challenge: 'Challenge'
}

export const ROWS_PER_LEVEL = 10

export const SOFT_DROP_INTERVAL = 50

// indexed by rows cleared at once
const LINE_CLEAR_POINTS = [0, 100, 300, 500, 800]

export function isDifficulty(value: unknown): value is Difficulty {
  return typeof value === 'string' && DIFFICULTIES.some((difficulty) => difficulty === value)
}

export function isGameMode(value: unknown): value is GameMode {
  return typeof value === 'string' && GAME_MODES.some((mode) => mode === value)
}

export function parseDifficulty(value: string): Difficulty {
  const normalized = value.trim().toLowerCase()
  if (!isDifficulty(normalized)) {
    throw new InvalidArgumentError(`Unknown difficulty "${value}"`)
  }
  return normalized
}

export function parseGameMode(value: string): GameMode {
  const normalized = value.trim().toLowerCase()
  if (!isGameMode(normalized)) {
    throw new InvalidArgumentError(`Unknown game mode "${value}"`)
  }
  return normalized
}

export function getDifficultySettings(difficulty: Difficulty): DifficultySettings {
  return DIFFICULTY_SETTINGS[difficulty]
}

export function getModeDisplayName(mode: GameMode) {
  return MODE_NAMES[mode]
}

export function getLevelForRows(totalRows: number) {
  return Math.floor(totalRows / ROWS_PER_LEVEL) + 1
}

export function getFallDelay(level: number, difficulty: Difficulty) {
  const settings = DIFFICULTY_SETTINGS[difficulty]
  return Math.max(
    settings.initialFallDelay - (level - 1) * settings.delayReductionPerLevel,
    settings.minFallDelay
  )
}

export function getLineClearScore(rows: number, level: number, difficulty: Difficulty) {
  const base = LINE_CLEAR_POINTS[rows] ?? 0
  return Math.floor(base * level * DIFFICULTY_SETTINGS[difficulty].scoreMultiplier)
}

export function getTimedModeMs(difficulty: Difficulty) {
  return DIFFICULTY_SETTINGS[difficulty].timedModeSeconds * 1000
}

export function getChallengeTarget(difficulty: Difficulty) {
  return DIFFICULTY_SETTINGS[difficulty].challengeRowsTarget
}
