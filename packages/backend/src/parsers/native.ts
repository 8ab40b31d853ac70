/**
 * Native chart format parser
 *
 * {
 *   "formatVersion": 1,
 *   "meta": { "title", "artist", "charter", "laneCount", "offset", "duration" },
 *   "tempo": [{ "beat": 0, "bpm": 120 }],
 *   "notes": [{ "beat": [1, 1, 2], "lane": 0, "kind": "tap", "duration": 0 }],
 *   "camera": { "scale": [{ "beat": 0, "value": 1, "easing": "sineOut" }], "x": [] }
 * }
 *
 * Beats accept the fractional notations understood by beatToValue.
 */

import {
  createChart,
  cubicBezierYForX,
  EASINGS,
  isEasingKind,
  isNoteKind,
  ParseError,
  type Chart,
  type EasingFunction,
  type KeyPoint,
  type NoteInput,
  type TempoEvent,
} from '@beatscroll/shared'
import {
  beatToValue,
  expectArray,
  expectNumber,
  expectObject,
  isObject,
  optionalArray,
  optionalNumber,
  optionalString,
  type JsonObject,
} from './fields.js'

export const NATIVE_FORMAT_VERSION = 1

export function isNativeFormat(data: unknown): boolean {
  return isObject(data) && Array.isArray(data.tempo) && Array.isArray(data.notes)
}

/**
 * Resolve a keyframe easing: a named curve or { "bezier": [x1, y1, x2, y2] }
 */
function parseEasing(v: unknown, path: string): EasingFunction {
  if (v == null) return EASINGS.linear
  if (isEasingKind(v)) return EASINGS[v]

  if (isObject(v) && Array.isArray(v.bezier) && v.bezier.length === 4) {
    const [x1, y1, x2, y2] = v.bezier.map((c, i) => expectNumber(c, `${path}.bezier[${i}]`))
    return (p: number) => cubicBezierYForX(x1, y1, x2, y2, p)
  }

  throw new ParseError(path, `unknown easing ${JSON.stringify(v)}`)
}

function parseKeyPoints(v: unknown, path: string): KeyPoint[] {
  return optionalArray(v, path).map((raw, i) => {
    const p = `${path}[${i}]`
    const k = expectObject(raw, p)
    return {
      beat: beatToValue(k.beat, `${p}.beat`),
      value: expectNumber(k.value, `${p}.value`),
      easing: parseEasing(k.easing, `${p}.easing`),
    }
  })
}

function parseTempo(data: JsonObject): TempoEvent[] {
  return expectArray(data.tempo, 'tempo').map((raw, i) => {
    const e = expectObject(raw, `tempo[${i}]`)
    return {
      beat: beatToValue(e.beat, `tempo[${i}].beat`),
      bpm: expectNumber(e.bpm, `tempo[${i}].bpm`),
    }
  })
}

function parseNotes(data: JsonObject): NoteInput[] {
  return expectArray(data.notes, 'notes').map((raw, i) => {
    const p = `notes[${i}]`
    const n = expectObject(raw, p)
    const kind = n.kind ?? 'tap'
    if (!isNoteKind(kind)) {
      throw new ParseError(`${p}.kind`, `unknown note kind ${JSON.stringify(kind)}`)
    }
    return {
      beat: beatToValue(n.beat, `${p}.beat`),
      lane: expectNumber(n.lane, `${p}.lane`),
      kind,
      durationBeats: n.duration == null ? 0 : beatToValue(n.duration, `${p}.duration`),
    }
  })
}

/**
 * Load a native-format chart
 */
export function loadNative(raw: unknown): Chart {
  const data = expectObject(raw, '')

  const version = optionalNumber(data.formatVersion, 'formatVersion') ?? NATIVE_FORMAT_VERSION
  if (version !== NATIVE_FORMAT_VERSION) {
    throw new ParseError('formatVersion', `unsupported version ${version}`)
  }

  const meta: JsonObject = data.meta == null ? {} : expectObject(data.meta, 'meta')
  const camera: JsonObject = data.camera == null ? {} : expectObject(data.camera, 'camera')

  return createChart({
    tempo: parseTempo(data),
    notes: parseNotes(data),
    metadata: {
      title: optionalString(meta.title, 'meta.title'),
      artist: optionalString(meta.artist, 'meta.artist'),
      charter: optionalString(meta.charter, 'meta.charter'),
      laneCount: optionalNumber(meta.laneCount, 'meta.laneCount'),
      offset: optionalNumber(meta.offset, 'meta.offset'),
      format: 'native',
    },
    duration: optionalNumber(meta.duration, 'meta.duration'),
    camera: {
      scale: parseKeyPoints(camera.scale, 'camera.scale'),
      x: parseKeyPoints(camera.x, 'camera.x'),
    },
  })
}
