import os from 'os'
import path from 'path'
import { InvalidArgumentError } from './errors'
import type { Difficulty, GameMode } from './settings'
import { parseDifficulty, parseGameMode } from './settings'

export interface AppConfig {
  saveDir: string
  mode: GameMode
  difficulty: Difficulty
  frameRate: number
  debug: boolean
}

const DEFAULT_FRAME_RATE = 30

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const frameRate = env.TETRIS_FPS ? Number(env.TETRIS_FPS) : DEFAULT_FRAME_RATE
  if (!Number.isInteger(frameRate) || frameRate < 1 || frameRate > 120) {
    throw new InvalidArgumentError(`TETRIS_FPS must be an integer between 1 and 120, got "${env.TETRIS_FPS}"`)
  }
  return {
    saveDir: path.resolve(env.TETRIS_SAVE_DIR || path.join(os.homedir(), '.terminal-tetris')),
    mode: env.TETRIS_MODE ? parseGameMode(env.TETRIS_MODE) : 'classic',
    difficulty: env.TETRIS_DIFFICULTY ? parseDifficulty(env.TETRIS_DIFFICULTY) : 'medium',
    frameRate,
    debug: env.DEBUG === 'true' || env.NODE_ENV === 'development'
  }
}
