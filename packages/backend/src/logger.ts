import { pino, type Logger } from 'pino'

export interface LoggerOptions {
  level: string
  pretty: boolean
}

export function createLogger(opts: LoggerOptions): Logger {
  return pino({
    level: opts.level,
    transport: opts.pretty
      ? {
          target: 'pino-pretty',
          options: {
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname'
          }
        }
      : undefined
  })
}

export type { Logger }
