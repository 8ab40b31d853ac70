/**
 * Chart model construction: validates parser output once and produces the
 * frozen Chart every later stage reads from.
 */

import { ChartError, InvalidNoteError } from '../errors.js'
import { TempoMap } from '../math/tempo.js'
import { KeyTrack } from '../math/tracks.js'
import type { Chart, ChartInput, NoteEvent, NoteInput } from '../types/chart.js'

function validateNote(n: NoteInput, index: number, laneCount: number | undefined): NoteEvent {
  if (!Number.isFinite(n.beat)) {
    throw new InvalidNoteError(index, `beat must be finite (got ${n.beat})`)
  }
  if (!Number.isInteger(n.lane) || n.lane < 0) {
    throw new InvalidNoteError(index, `lane must be an integer >= 0 (got ${n.lane})`)
  }
  if (laneCount !== undefined && n.lane >= laneCount) {
    throw new InvalidNoteError(index, `lane ${n.lane} is outside ${laneCount} lanes`)
  }

  const durationBeats = n.durationBeats ?? 0
  if (!Number.isFinite(durationBeats) || durationBeats < 0) {
    throw new InvalidNoteError(index, `duration must be a finite number >= 0 (got ${durationBeats})`)
  }
  if (durationBeats > 0 && n.kind !== 'hold') {
    throw new InvalidNoteError(index, `only hold notes can have a duration (got ${n.kind})`)
  }

  return Object.freeze({ beat: n.beat, lane: n.lane, kind: n.kind, durationBeats })
}

/**
 * Build a Chart from parser output.
 * Throws InvalidTempoMapError or InvalidNoteError; nothing is partially loaded.
 */
export function createChart(input: ChartInput): Chart {
  const tempo = TempoMap.build(input.tempo)

  const declaredLanes = input.metadata?.laneCount
  if (declaredLanes !== undefined && (!Number.isInteger(declaredLanes) || declaredLanes < 1)) {
    throw new ChartError('INVALID_NOTE', `laneCount must be a positive integer (got ${declaredLanes})`)
  }

  const notes = input.notes.map((n, i) => validateNote(n, i, declaredLanes))
  notes.sort((a, b) => a.beat - b.beat || a.lane - b.lane)

  let laneCount = declaredLanes ?? 1
  let maxHoldBeats = 0
  let lastEnd = 0
  for (const n of notes) {
    if (declaredLanes === undefined) laneCount = Math.max(laneCount, n.lane + 1)
    maxHoldBeats = Math.max(maxHoldBeats, n.durationBeats)
    lastEnd = Math.max(lastEnd, tempo.beatToTime(n.beat + n.durationBeats))
  }

  const declaredDuration = input.duration ?? 0
  const duration = Number.isFinite(declaredDuration)
    ? Math.max(declaredDuration, lastEnd, 0)
    : lastEnd

  const meta = input.metadata ?? {}

  return Object.freeze({
    tempo,
    notes: Object.freeze(notes),
    metadata: Object.freeze({
      title: meta.title ?? '',
      artist: meta.artist,
      charter: meta.charter,
      laneCount,
      offset: meta.offset ?? 0,
      format: meta.format ?? 'native',
    }),
    duration,
    maxHoldBeats,
    camera: Object.freeze({
      scale: new KeyTrack(input.camera?.scale ?? [], 1.0),
      x: new KeyTrack(input.camera?.x ?? [], 0.0),
    }),
  })
}
