import { describe, it, expect } from 'vitest'
import { createChart } from './chart/createChart.js'
import { ChartError, InvalidNoteError, InvalidTempoMapError } from './errors.js'
import { linear } from './math/easing.js'

const tempo = [{ beat: 0, bpm: 120 }]

describe('createChart', () => {
  it('sorts notes by beat, then lane', () => {
    const chart = createChart({
      tempo,
      notes: [
        { beat: 4, lane: 0, kind: 'tap' },
        { beat: 1, lane: 2, kind: 'drag' },
        { beat: 1, lane: 0, kind: 'tap' },
      ],
    })

    expect(chart.notes.map(n => [n.beat, n.lane])).toEqual([[1, 0], [1, 2], [4, 0]])
  })

  it('freezes the chart and its notes', () => {
    const chart = createChart({ tempo, notes: [{ beat: 1, lane: 0, kind: 'tap' }] })

    expect(Object.isFrozen(chart)).toBe(true)
    expect(Object.isFrozen(chart.notes)).toBe(true)
    expect(Object.isFrozen(chart.notes[0])).toBe(true)
  })

  it('defaults durations to zero and fills metadata', () => {
    const chart = createChart({ tempo, notes: [{ beat: 1, lane: 3, kind: 'flick' }] })

    expect(chart.notes[0].durationBeats).toBe(0)
    expect(chart.metadata).toEqual({
      title: '',
      artist: undefined,
      charter: undefined,
      laneCount: 4,
      offset: 0,
      format: 'native',
    })
  })

  it('derives the duration from the end of the last note', () => {
    const chart = createChart({
      tempo,
      notes: [
        { beat: 2, lane: 0, kind: 'tap' },
        { beat: 6, lane: 1, kind: 'hold', durationBeats: 2 },
        { beat: 7, lane: 0, kind: 'tap' },
      ],
    })

    // hold ends at beat 8 = 4 s
    expect(chart.duration).toBe(4)
    expect(chart.maxHoldBeats).toBe(2)
  })

  it('keeps a longer declared duration', () => {
    const chart = createChart({ tempo, notes: [{ beat: 2, lane: 0, kind: 'tap' }], duration: 10 })
    expect(chart.duration).toBe(10)
  })

  it('never declares a duration shorter than the notes', () => {
    const chart = createChart({ tempo, notes: [{ beat: 8, lane: 0, kind: 'tap' }], duration: 1 })
    expect(chart.duration).toBe(4)
  })

  it('an empty chart has zero duration', () => {
    const chart = createChart({ tempo, notes: [] })
    expect(chart.duration).toBe(0)
    expect(chart.metadata.laneCount).toBe(1)
  })

  it('builds camera tracks with neutral defaults', () => {
    const plain = createChart({ tempo, notes: [] })
    expect(plain.camera.scale.eval(3)).toBe(1)
    expect(plain.camera.x.eval(3)).toBe(0)

    const zoomed = createChart({
      tempo,
      notes: [],
      camera: {
        scale: [
          { beat: 0, value: 1, easing: linear },
          { beat: 4, value: 2, easing: linear },
        ],
      },
    })
    expect(zoomed.camera.scale.eval(2)).toBe(1.5)
  })

  describe('validation', () => {
    it('propagates tempo map errors', () => {
      expect(() => createChart({ tempo: [{ beat: 0, bpm: 0 }], notes: [] })).toThrow(InvalidTempoMapError)
    })

    it('rejects lanes outside the declared lane count', () => {
      expect(() =>
        createChart({ tempo, notes: [{ beat: 0, lane: 3, kind: 'tap' }], metadata: { laneCount: 2 } })
      ).toThrow('note 0: lane 3 is outside 2 lanes')
    })

    it('rejects fractional and negative lanes', () => {
      expect(() => createChart({ tempo, notes: [{ beat: 0, lane: 1.5, kind: 'tap' }] })).toThrow(InvalidNoteError)
      expect(() => createChart({ tempo, notes: [{ beat: 0, lane: -1, kind: 'tap' }] })).toThrow(InvalidNoteError)
    })

    it('only lets holds have a duration', () => {
      expect(() =>
        createChart({ tempo, notes: [{ beat: 0, lane: 0, kind: 'tap', durationBeats: 1 }] })
      ).toThrow('note 0: only hold notes can have a duration (got tap)')
    })

    it('rejects negative durations and non-finite beats', () => {
      expect(() =>
        createChart({ tempo, notes: [{ beat: 0, lane: 0, kind: 'hold', durationBeats: -1 }] })
      ).toThrow(InvalidNoteError)
      expect(() => createChart({ tempo, notes: [{ beat: Infinity, lane: 0, kind: 'tap' }] })).toThrow(InvalidNoteError)
    })

    it('rejects a non-positive lane count', () => {
      expect(() => createChart({ tempo, notes: [], metadata: { laneCount: 0 } })).toThrow(ChartError)
    })
  })
})
