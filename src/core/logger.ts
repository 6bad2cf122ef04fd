import { pino, type LevelWithSilent, type Logger } from 'pino'

export type { Logger }

export function createLogger(level: LevelWithSilent = 'info', name = 'safety-engine'): Logger {
  return pino({ name, level })
}
