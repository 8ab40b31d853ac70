/**
 * Keyframe tracks evaluated over beats
 */

import { clamp, floorIndex, lerp } from './util.js'
import type { EasingFunction } from './easing.js'

/**
 * A keyframe: the track reaches `value` at `beat`, and eases towards the
 * next keyframe with `easing`
 */
export interface KeyPoint {
  readonly beat: number
  readonly value: number
  readonly easing: EasingFunction
}

/**
 * Piecewise eased track built from keyframes sorted by beat.
 * Holds the first value before the first keyframe and the last value after
 * the last one.
 */
export class KeyTrack {
  private readonly keys: readonly KeyPoint[]

  constructor(
    keys: readonly KeyPoint[],
    private readonly defaultValue: number = 0.0
  ) {
    this.keys = Object.freeze([...keys].sort((a, b) => a.beat - b.beat))
  }

  get length(): number {
    return this.keys.length
  }

  /**
   * Evaluate the track at `beat`
   */
  eval(beat: number): number {
    if (this.keys.length === 0) {
      return this.defaultValue
    }

    const i = floorIndex(this.keys, beat, k => k.beat)
    const k0 = this.keys[i]
    if (beat <= k0.beat || i + 1 >= this.keys.length) {
      return k0.value
    }

    const k1 = this.keys[i + 1]
    const span = k1.beat - k0.beat
    if (span <= 0) return k1.value

    const p = clamp((beat - k0.beat) / span, 0.0, 1.0)
    return lerp(k0.value, k1.value, k0.easing(p))
  }
}
