/**
 * Debug output is enabled with DEBUG=true or NODE_ENV=development. Warnings and
 * errors always print.
 */
let debugEnabled = process.env.DEBUG === 'true' || process.env.NODE_ENV === 'development'

export interface Logger {
  debug: (message: string, data?: Record<string, unknown>) => void
  warn: (message: string, data?: Record<string, unknown>) => void
  error: (message: string, error?: unknown) => void
}

export function setDebugLogging(enabled: boolean) {
  debugEnabled = enabled
}

export function createLogger(tag: string): Logger {
  const write = (message: string, data?: Record<string, unknown>) => {
    if (data) {
      console.warn(`[${tag}] ${message}`, JSON.stringify(data, null, 2))
    } else {
      console.warn(`[${tag}] ${message}`)
    }
  }
  return {
    debug: (message, data) => {
      if (debugEnabled) write(message, data)
    },
    warn: write,
    error: (message, error) => {
      console.error(`[${tag}] ${message}`, error instanceof Error ? error.message : error ?? '')
    }
  }
}
