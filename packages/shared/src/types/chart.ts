/**
 * Chart data types. A Chart is built once per load by createChart and is
 * read-only afterwards.
 */

import type { TempoEvent, TempoMap } from '../math/tempo.js'
import type { KeyPoint, KeyTrack } from '../math/tracks.js'
import type { NoteKind } from '../constants.js'

/**
 * A timed note on a lane
 */
export interface NoteEvent {
  /** Head position in beats */
  readonly beat: number
  /** Lane index, 0-based */
  readonly lane: number
  readonly kind: NoteKind
  /** Length in beats; only holds have a non-zero duration */
  readonly durationBeats: number
}

export type ChartFormat = 'native' | 'legacy'

export interface ChartMetadata {
  readonly title: string
  readonly artist?: string
  readonly charter?: string
  readonly laneCount: number
  /** Audio offset in seconds, passed through for hosts that play music */
  readonly offset: number
  readonly format: ChartFormat
}

/**
 * Camera keyframe tracks, evaluated per beat
 */
export interface CameraTracks {
  readonly scale: KeyTrack
  readonly x: KeyTrack
}

export interface Chart {
  readonly tempo: TempoMap
  /** Sorted ascending by beat, ties by lane */
  readonly notes: readonly NoteEvent[]
  readonly metadata: ChartMetadata
  /** Playable length in seconds */
  readonly duration: number
  /** Longest hold in beats, used to find holds that started before a window */
  readonly maxHoldBeats: number
  readonly camera: CameraTracks
}

export interface NoteInput {
  beat: number
  lane: number
  kind: NoteKind
  durationBeats?: number
}

/**
 * Unvalidated chart contents as produced by a parser
 */
export interface ChartInput {
  tempo: readonly TempoEvent[]
  notes: readonly NoteInput[]
  metadata?: {
    title?: string
    artist?: string
    charter?: string
    laneCount?: number
    offset?: number
    format?: ChartFormat
  }
  /** Declared length in seconds; the chart is never shorter than its last note */
  duration?: number
  camera?: {
    scale?: readonly KeyPoint[]
    x?: readonly KeyPoint[]
  }
}
