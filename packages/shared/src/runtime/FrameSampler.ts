/**
 * Frame sampler: turns a playback position into the set of notes to draw
 * and how far along their approach each one is.
 */

import type { Chart, NoteEvent } from '../types/chart.js'
import type { PlaybackState, RenderSnapshot, VisibleNote } from '../types/runtime.js'
import { ease, isEasingKind, type EasingKind } from '../math/easing.js'
import { clamp, lowerBound, upperBound } from '../math/util.js'

export interface FrameSamplerOptions {
  /** Beats ahead of the current position at which notes appear (default: 4) */
  lookaheadBeats?: number
  /** Beats behind the current position that notes stay visible (default: 0.5) */
  lookbehindBeats?: number
  /** Easing applied to approach progress (default: 'linear') */
  easing?: EasingKind
  /** Clamp progress to [0, 1] instead of letting past notes go negative (default: false) */
  clampProgress?: boolean
}

export const DEFAULT_SAMPLER_OPTIONS: Required<FrameSamplerOptions> = {
  lookaheadBeats: 4,
  lookbehindBeats: 0.5,
  easing: 'linear',
  clampProgress: false,
}

export class FrameSampler {
  public readonly options: Readonly<Required<FrameSamplerOptions>>

  constructor(options: FrameSamplerOptions = {}) {
    const merged: Required<FrameSamplerOptions> = {
      lookaheadBeats: options.lookaheadBeats ?? DEFAULT_SAMPLER_OPTIONS.lookaheadBeats,
      lookbehindBeats: options.lookbehindBeats ?? DEFAULT_SAMPLER_OPTIONS.lookbehindBeats,
      easing: options.easing ?? DEFAULT_SAMPLER_OPTIONS.easing,
      clampProgress: options.clampProgress ?? DEFAULT_SAMPLER_OPTIONS.clampProgress,
    }

    if (!Number.isFinite(merged.lookaheadBeats) || merged.lookaheadBeats <= 0) {
      throw new RangeError(`lookaheadBeats must be a finite number > 0 (got ${merged.lookaheadBeats})`)
    }
    if (!Number.isFinite(merged.lookbehindBeats) || merged.lookbehindBeats < 0) {
      throw new RangeError(`lookbehindBeats must be a finite number >= 0 (got ${merged.lookbehindBeats})`)
    }
    if (!isEasingKind(merged.easing)) {
      throw new RangeError(`Unknown easing: ${String(merged.easing)}`)
    }

    this.options = Object.freeze(merged)
  }

  /**
   * Sample the chart at the state's current time
   */
  public sample(chart: Chart, state: Readonly<PlaybackState>): RenderSnapshot {
    const { lookaheadBeats, lookbehindBeats } = this.options
    const beat = chart.tempo.timeToBeat(state.currentTime)
    const windowStart = beat - lookbehindBeats
    const windowEnd = beat + lookaheadBeats
    const notes = chart.notes
    const byBeat = (n: NoteEvent) => n.beat

    // Holds that started before the window may still reach into it
    const first = lowerBound(notes, windowStart - chart.maxHoldBeats, byBeat)
    const visibleNotes: VisibleNote[] = []

    for (let i = first; i < notes.length; i++) {
      const note = notes[i]
      if (note.beat > windowEnd) break

      const tailBeat = note.beat + note.durationBeats
      const inWindow = note.beat >= windowStart
      const holdReaching = note.durationBeats > 0 && tailBeat >= windowStart
      if (!inWindow && !holdReaching) continue

      const progress = this.progressOf(note.beat, beat)
      const tailProgress = note.durationBeats > 0 ? this.progressOf(tailBeat, beat) : null

      visibleNotes.push({
        note,
        index: i,
        progress,
        easedProgress: this.easeProgress(progress),
        tailProgress,
        tailEasedProgress: tailProgress === null ? null : this.easeProgress(tailProgress),
        passed: note.beat <= beat,
      })
    }

    return {
      time: state.currentTime,
      beat,
      bpm: chart.tempo.bpmAt(beat),
      visibleNotes,
      passedCount: upperBound(notes, beat, byBeat),
      camera: {
        scale: chart.camera.scale.eval(beat),
        x: chart.camera.x.eval(beat),
      },
    }
  }

  private progressOf(targetBeat: number, beat: number): number {
    const raw = (targetBeat - beat) / this.options.lookaheadBeats
    return this.options.clampProgress ? clamp(raw, 0, 1) : raw
  }

  /**
   * Ease inside [0, 1]; off-screen values pass through unchanged
   */
  private easeProgress(progress: number): number {
    if (progress < 0 || progress > 1) return progress
    return ease(this.options.easing, progress)
  }
}

/**
 * One-off sampling with its own sampler
 */
export function sample(
  chart: Chart,
  state: Readonly<PlaybackState>,
  options?: FrameSamplerOptions
): RenderSnapshot {
  return new FrameSampler(options).sample(chart, state)
}
