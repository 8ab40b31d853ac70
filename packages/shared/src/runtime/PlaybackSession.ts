/**
 * Playback state machine.
 * Stopped -> Playing <-> Paused, plus seek, rate change and end-of-chart
 * handling. Every transition is synchronous; time only moves on tick().
 */

import type { Chart } from '../types/chart.js'
import type { PlaybackState, PlayStatus, TickResult } from '../types/runtime.js'
import type { EndBehavior } from '../constants.js'
import { InvalidSpeedError } from '../errors.js'
import { clamp } from '../math/util.js'

export interface PlaybackOptions {
  /** What happens when playback reaches the chart end (default: 'stop') */
  endBehavior?: EndBehavior
  /** Initial speed multiplier (default: 1.0) */
  speed?: number
}

export interface PlayOptions {
  /** Rewind to 0 before playing */
  fromStart?: boolean
}

export type SeekUnit = 'seconds' | 'beats'

function checkSpeed(multiplier: number): void {
  if (!Number.isFinite(multiplier) || multiplier <= 0) {
    throw new InvalidSpeedError(multiplier)
  }
}

export class PlaybackSession {
  public readonly endBehavior: EndBehavior
  private readonly current: PlaybackState

  constructor(
    public readonly chart: Chart,
    options: PlaybackOptions = {}
  ) {
    const speed = options.speed ?? 1.0
    checkSpeed(speed)

    this.endBehavior = options.endBehavior ?? 'stop'
    this.current = {
      currentTime: 0,
      speed,
      status: 'stopped',
      isPlaying: false,
    }
  }

  /**
   * Live view of the session state; read it, never write it
   */
  get state(): Readonly<PlaybackState> {
    return this.current
  }

  get duration(): number {
    return this.chart.duration
  }

  /**
   * Current position in beats
   */
  get currentBeat(): number {
    return this.chart.tempo.timeToBeat(this.current.currentTime)
  }

  /**
   * Start or resume from the current position. Only `fromStart` rewinds;
   * a session left at the chart end stays there.
   */
  public play(options: PlayOptions = {}): void {
    if (options.fromStart) {
      this.current.currentTime = 0
    }
    this.setStatus('playing')
  }

  /**
   * Pause playback. Pausing twice is the same as pausing once; a stopped
   * session stays stopped.
   */
  public pause(): void {
    if (this.current.status === 'playing') {
      this.setStatus('paused')
    }
  }

  public togglePlay(): void {
    if (this.current.status === 'playing') {
      this.pause()
    } else {
      this.play()
    }
  }

  /**
   * Stop and rewind to the start
   */
  public stop(): void {
    this.current.currentTime = 0
    this.setStatus('stopped')
  }

  /**
   * Rewind to the start without changing the play state
   */
  public reset(): void {
    this.current.currentTime = 0
  }

  /**
   * Jump to `seconds`. Out-of-range targets are clamped to [0, duration]
   * rather than rejected. NaN is ignored.
   */
  public seek(seconds: number): void {
    if (Number.isNaN(seconds)) return
    this.current.currentTime = clamp(seconds, 0, this.duration)
  }

  /**
   * Relative seek; beat offsets are converted through the tempo map
   */
  public seekBy(delta: number, unit: SeekUnit = 'seconds'): void {
    if (unit === 'beats') {
      const tempo = this.chart.tempo
      this.seek(tempo.beatToTime(tempo.timeToBeat(this.current.currentTime) + delta))
    } else {
      this.seek(this.current.currentTime + delta)
    }
  }

  /**
   * Change the playback rate. Throws InvalidSpeedError and keeps the old
   * rate unless `multiplier` is a finite number > 0.
   */
  public setSpeed(multiplier: number): void {
    checkSpeed(multiplier)
    this.current.speed = multiplier
  }

  /**
   * Advance by `deltaWallSeconds` of wall-clock time scaled by the speed.
   * Only moves while playing; non-finite or non-positive deltas are ignored.
   */
  public tick(deltaWallSeconds: number): TickResult {
    if (this.current.status !== 'playing') return 'idle'
    if (!Number.isFinite(deltaWallSeconds) || deltaWallSeconds <= 0) return 'idle'

    const next = this.current.currentTime + deltaWallSeconds * this.current.speed
    const end = this.duration
    if (next < end) {
      this.current.currentTime = next
      return 'advanced'
    }

    switch (this.endBehavior) {
      case 'loop':
        if (end > 0) {
          this.current.currentTime = next % end
          return 'looped'
        }
        this.current.currentTime = end
        this.setStatus('stopped')
        return 'ended'

      case 'hold':
        this.current.currentTime = end
        this.setStatus('paused')
        return 'ended'

      case 'stop':
      default:
        this.current.currentTime = end
        this.setStatus('stopped')
        return 'ended'
    }
  }

  private setStatus(status: PlayStatus): void {
    this.current.status = status
    this.current.isPlaying = status === 'playing'
  }
}
