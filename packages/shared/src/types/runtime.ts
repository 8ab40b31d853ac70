/**
 * Runtime types: playback state and the per-frame render snapshot
 */

import type { NoteEvent } from './chart.js'

export type PlayStatus = 'stopped' | 'playing' | 'paused'

/**
 * Playback position and rate of one session.
 * Only the owning PlaybackSession mutates it.
 */
export interface PlaybackState {
  /** Chart time in seconds */
  currentTime: number
  /** Playback rate multiplier, always > 0 */
  speed: number
  status: PlayStatus
  /** Mirrors status === 'playing' */
  isPlaying: boolean
}

/**
 * Outcome of a single tick
 */
export type TickResult = 'idle' | 'advanced' | 'ended' | 'looped'

/**
 * A note inside the sampling window
 */
export interface VisibleNote {
  /** Back-reference into Chart.notes */
  readonly note: NoteEvent
  /** Position of the note in Chart.notes */
  readonly index: number
  /** Linear distance to the judge position: 0 = now, 1 = lookahead edge, < 0 = past */
  readonly progress: number
  readonly easedProgress: number
  /** Hold tails only */
  readonly tailProgress: number | null
  readonly tailEasedProgress: number | null
  /** Head beat is at or before the current beat */
  readonly passed: boolean
}

/**
 * Everything a renderer needs for one frame. Recomputed every frame.
 */
export interface RenderSnapshot {
  readonly time: number
  readonly beat: number
  readonly bpm: number
  /** Ascending by beat, ties by lane */
  readonly visibleNotes: readonly VisibleNote[]
  /** Notes whose head beat is at or before the current beat */
  readonly passedCount: number
  readonly camera: {
    readonly scale: number
    readonly x: number
  }
}
