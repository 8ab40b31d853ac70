/**
 * Player configuration from environment variables
 */

import {
  isEasingKind,
  isEndBehavior,
  type EasingKind,
  type EndBehavior,
} from '@beatscroll/shared'

export interface PlayerConfig {
  logLevel: string
  /** Pretty-print log lines through pino-pretty */
  logPretty: boolean
  fps: number
  speed: number
  endBehavior: EndBehavior
  lookaheadBeats: number
  lookbehindBeats: number
  easing: EasingKind
  /** Wall-clock limit for a headless run; unset means run to the end */
  maxSeconds?: number
  /** Emit a debug frame line every N frames */
  logEvery: number
}

type Env = Record<string, string | undefined>

function positiveNumber(raw: string | undefined, fallback: number): number {
  const n = parseFloat(raw || '')
  return Number.isFinite(n) && n > 0 ? n : fallback
}

function nonNegativeNumber(raw: string | undefined, fallback: number): number {
  const n = parseFloat(raw || '')
  return Number.isFinite(n) && n >= 0 ? n : fallback
}

export function loadConfig(env: Env = process.env): PlayerConfig {
  const endBehavior = env.PLAYER_END_BEHAVIOR || 'stop'
  if (!isEndBehavior(endBehavior)) {
    throw new Error(`PLAYER_END_BEHAVIOR must be stop, loop or hold (got ${endBehavior})`)
  }

  const easing = env.PLAYER_EASING || 'linear'
  if (!isEasingKind(easing)) {
    throw new Error(`PLAYER_EASING is not a known easing (got ${easing})`)
  }

  const maxSeconds = positiveNumber(env.PLAYER_MAX_SECONDS, 0)

  return {
    logLevel: env.LOG_LEVEL || 'info',
    logPretty: env.LOG_PRETTY !== '0',
    fps: positiveNumber(env.PLAYER_FPS, 60),
    speed: positiveNumber(env.PLAYER_SPEED, 1),
    endBehavior,
    lookaheadBeats: positiveNumber(env.PLAYER_LOOKAHEAD_BEATS, 4),
    lookbehindBeats: nonNegativeNumber(env.PLAYER_LOOKBEHIND_BEATS, 0.5),
    easing,
    maxSeconds: maxSeconds > 0 ? maxSeconds : undefined,
    logEvery: Math.max(1, Math.floor(positiveNumber(env.PLAYER_LOG_EVERY, 30))),
  }
}
