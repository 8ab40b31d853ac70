/**
 * Headless player: drives a PlaybackSession with a fixed frame step and
 * samples every frame, the way a renderer would, without drawing anything.
 */

import {
  FrameSampler,
  PlaybackSession,
  type Chart,
  type EndBehavior,
  type FrameSamplerOptions,
} from '@beatscroll/shared'
import type { Logger } from 'pino'

export interface HeadlessOptions {
  fps: number
  speed: number
  endBehavior: EndBehavior
  sampler?: FrameSamplerOptions
  /** Simulated seconds before giving up; looping runs default to two passes */
  maxSeconds?: number
  /** Debug frame line every N frames */
  logEvery: number
}

export type HeadlessEndReason = 'ended' | 'limit'

export interface HeadlessResult {
  frames: number
  /** Simulated wall-clock time, frames / fps */
  wallSeconds: number
  /** Chart time when the run finished */
  chartTime: number
  endReason: HeadlessEndReason
  loops: number
  /** Most notes visible in any single frame */
  maxVisible: number
  passedCount: number
}

function runLimit(chart: Chart, options: HeadlessOptions): number {
  if (options.maxSeconds !== undefined) return options.maxSeconds
  if (options.endBehavior === 'loop') return (2 * chart.duration) / options.speed
  return Infinity
}

export function runHeadless(chart: Chart, options: HeadlessOptions, logger: Logger): HeadlessResult {
  if (!Number.isFinite(options.fps) || options.fps <= 0) {
    throw new RangeError(`fps must be a finite number > 0 (got ${options.fps})`)
  }
  if (!Number.isInteger(options.logEvery) || options.logEvery < 1) {
    throw new RangeError(`logEvery must be a positive integer (got ${options.logEvery})`)
  }

  const session = new PlaybackSession(chart, {
    endBehavior: options.endBehavior,
    speed: options.speed,
  })
  const sampler = new FrameSampler(options.sampler)
  const dt = 1 / options.fps
  const limit = runLimit(chart, options)

  let frames = 0
  let loops = 0
  let maxVisible = 0
  let passedCount = 0
  let endReason: HeadlessEndReason = 'limit'

  session.play()

  for (;;) {
    const result = session.tick(dt)
    frames++

    const snapshot = sampler.sample(chart, session.state)
    maxVisible = Math.max(maxVisible, snapshot.visibleNotes.length)
    passedCount = snapshot.passedCount

    if (result === 'looped') loops++

    if (frames % options.logEvery === 0) {
      logger.debug({
        frame: frames,
        time: snapshot.time,
        beat: snapshot.beat,
        bpm: snapshot.bpm,
        visible: snapshot.visibleNotes.length,
        passed: snapshot.passedCount
      }, 'frame')
    }

    if (result === 'ended') {
      endReason = 'ended'
      break
    }
    if (frames * dt >= limit) {
      break
    }
  }

  const summary: HeadlessResult = {
    frames,
    wallSeconds: frames * dt,
    chartTime: session.state.currentTime,
    endReason,
    loops,
    maxVisible,
    passedCount,
  }
  logger.info(summary, 'playback finished')
  return summary
}
