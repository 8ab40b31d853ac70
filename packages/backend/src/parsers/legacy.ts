/**
 * Legacy chart format parser (line-based charts with bpm shifts)
 *
 * Tempo is `bPM` scaled by each shift's `value` from its `time` (in beats).
 * Every line becomes a lane; note types are 0 tap, 1 drag, 2 hold, with the
 * hold end beat in `otherInformations[0]`. Camera keyframes use numeric
 * `easeType` ids.
 */

import {
  createChart,
  easingFromType,
  ParseError,
  type Chart,
  type KeyPoint,
  type NoteInput,
  type NoteKind,
  type TempoEvent,
} from '@beatscroll/shared'
import {
  expectArray,
  expectNumber,
  expectObject,
  isObject,
  optionalArray,
  optionalNumber,
  optionalString,
  type JsonObject,
} from './fields.js'

const LEGACY_NOTE_KINDS: Record<number, NoteKind> = {
  0: 'tap',
  1: 'drag',
  2: 'hold',
}

export function isLegacyFormat(data: unknown): boolean {
  return isObject(data) && 'bPM' in data && Array.isArray(data.lines)
}

function parseTempo(data: JsonObject): TempoEvent[] {
  const baseBpm = expectNumber(data.bPM, 'bPM')
  const shifts = optionalArray(data.bpmShifts, 'bpmShifts').map((raw, i) => {
    const s = expectObject(raw, `bpmShifts[${i}]`)
    return {
      beat: expectNumber(s.time, `bpmShifts[${i}].time`),
      bpm: baseBpm * expectNumber(s.value, `bpmShifts[${i}].value`),
    }
  })

  if (shifts.length === 0) {
    return [{ beat: 0, bpm: baseBpm }]
  }
  return shifts.sort((a, b) => a.beat - b.beat)
}

function parseLineNotes(rawLine: unknown, lane: number): NoteInput[] {
  const path = `lines[${lane}]`
  const line = expectObject(rawLine, path)

  return optionalArray(line.notes, `${path}.notes`).map((raw, i) => {
    const p = `${path}.notes[${i}]`
    const n = expectObject(raw, p)
    const type = expectNumber(n.type, `${p}.type`)
    const kind = LEGACY_NOTE_KINDS[type]
    if (kind === undefined) {
      throw new ParseError(`${p}.type`, `unknown note type ${type}`)
    }

    const beat = expectNumber(n.time, `${p}.time`)
    let durationBeats = 0
    if (kind === 'hold') {
      const info = optionalArray(n.otherInformations, `${p}.otherInformations`)
      if (info.length > 0) {
        const endBeat = expectNumber(info[0], `${p}.otherInformations[0]`)
        durationBeats = Math.max(0, endBeat - beat)
      }
    }

    return { beat, lane, kind, durationBeats }
  })
}

function parseKeyPoints(v: unknown, path: string): KeyPoint[] {
  return optionalArray(v, path).map((raw, i) => {
    const p = `${path}[${i}]`
    const k = expectObject(raw, p)
    return {
      beat: expectNumber(k.time, `${p}.time`),
      value: expectNumber(k.value, `${p}.value`),
      easing: easingFromType(optionalNumber(k.easeType, `${p}.easeType`) ?? 0),
    }
  })
}

/**
 * Load a legacy-format chart
 */
export function loadLegacy(raw: unknown): Chart {
  const data = expectObject(raw, '')
  const lines = expectArray(data.lines, 'lines')
  const camera: JsonObject = data.cameraMove == null ? {} : expectObject(data.cameraMove, 'cameraMove')

  return createChart({
    tempo: parseTempo(data),
    notes: lines.flatMap((line, lane) => parseLineNotes(line, lane)),
    metadata: {
      title: optionalString(data.songsName, 'songsName'),
      laneCount: Math.max(1, lines.length),
      offset: optionalNumber(data.offset, 'offset'),
      format: 'legacy',
    },
    camera: {
      scale: parseKeyPoints(camera.scaleKeyPoints, 'cameraMove.scaleKeyPoints'),
      x: parseKeyPoints(camera.xPositionKeyPoints, 'cameraMove.xPositionKeyPoints'),
    },
  })
}
