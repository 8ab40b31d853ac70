import { pino, type Logger } from 'pino'

export interface LogLine {
  level: number
  msg: string
  [key: string]: unknown
}

/**
 * JSON logger writing into an array instead of stdout
 */
export function memoryLogger(level = 'debug'): { logger: Logger; lines: LogLine[] } {
  const lines: LogLine[] = []
  const logger = pino({ level }, {
    write(msg: string) {
      lines.push(JSON.parse(msg))
    }
  })
  return { logger, lines }
}
