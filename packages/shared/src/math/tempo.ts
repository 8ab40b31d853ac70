/**
 * Tempo map: piecewise-constant bpm over beats, used to convert between
 * beat positions and seconds in both directions.
 */

import { InvalidTempoMapError } from '../errors.js'
import { floorIndex } from './util.js'

/**
 * A tempo change taking effect at `beat`
 */
export interface TempoEvent {
  readonly beat: number
  readonly bpm: number
}

/**
 * Tempo segment with the accumulated seconds up to its first beat
 */
interface TempoSeg {
  beat0: number
  bpm: number
  secPrefix: number
}

export class TempoMap {
  private constructor(private readonly segs: readonly TempoSeg[]) {}

  /**
   * Validate tempo events and precompute segment offsets.
   * If the first event starts after beat 0, an origin at its bpm is implied.
   */
  static build(events: readonly TempoEvent[]): TempoMap {
    if (events.length === 0) {
      throw new InvalidTempoMapError('tempo map must contain at least one event')
    }

    let prevBeat = -Infinity
    for (let i = 0; i < events.length; i++) {
      const { beat, bpm } = events[i]
      if (!Number.isFinite(beat) || beat < 0) {
        throw new InvalidTempoMapError(`tempo[${i}]: beat must be a finite number >= 0 (got ${beat})`)
      }
      if (!Number.isFinite(bpm) || bpm <= 0) {
        throw new InvalidTempoMapError(`tempo[${i}]: bpm must be a finite number > 0 (got ${bpm})`)
      }
      if (beat <= prevBeat) {
        throw new InvalidTempoMapError(`tempo[${i}]: beat ${beat} does not follow beat ${prevBeat}`)
      }
      prevBeat = beat
    }

    const items = events[0].beat > 0
      ? [{ beat: 0, bpm: events[0].bpm }, ...events]
      : events

    const segs: TempoSeg[] = []
    let secPrefix = 0.0
    for (let i = 0; i < items.length; i++) {
      const { beat, bpm } = items[i]
      segs.push({ beat0: beat, bpm, secPrefix })
      if (i + 1 < items.length) {
        secPrefix += (items[i + 1].beat - beat) * 60.0 / bpm
      }
    }
    return new TempoMap(segs)
  }

  /**
   * Normalized tempo events, including an implied origin
   */
  get events(): TempoEvent[] {
    return this.segs.map(s => ({ beat: s.beat0, bpm: s.bpm }))
  }

  /**
   * Seconds at which `beat` is reached.
   * Beats before 0 use the first tempo, beats past the last event the last one.
   */
  beatToTime(beat: number): number {
    const s = this.segs[floorIndex(this.segs, beat, seg => seg.beat0)]
    return s.secPrefix + (beat - s.beat0) * 60.0 / s.bpm
  }

  /**
   * Beat position reached after `seconds`; inverse of beatToTime
   */
  timeToBeat(seconds: number): number {
    const s = this.segs[floorIndex(this.segs, seconds, seg => seg.secPrefix)]
    return s.beat0 + (seconds - s.secPrefix) * s.bpm / 60.0
  }

  /**
   * Tempo in effect at `beat`
   */
  bpmAt(beat: number): number {
    return this.segs[floorIndex(this.segs, beat, seg => seg.beat0)].bpm
  }
}
