import { describe, it, expect } from 'vitest'
import { createChart } from './chart/createChart.js'
import { PlaybackSession } from './runtime/PlaybackSession.js'
import { InvalidSpeedError } from './errors.js'
import type { EndBehavior } from './constants.js'

// 120 bpm (0.5 s per beat), 10 seconds long
const chart = createChart({
  tempo: [{ beat: 0, bpm: 120 }],
  notes: [
    { beat: 1, lane: 0, kind: 'tap' },
    { beat: 8, lane: 1, kind: 'hold', durationBeats: 4 },
  ],
  duration: 10,
})

function session(endBehavior?: EndBehavior): PlaybackSession {
  return new PlaybackSession(chart, { endBehavior })
}

describe('PlaybackSession', () => {
  it('starts stopped at time 0 with speed 1', () => {
    expect(session().state).toEqual({
      currentTime: 0,
      speed: 1,
      status: 'stopped',
      isPlaying: false,
    })
  })

  it('plays and advances by wall-clock delta', () => {
    const s = session()
    s.play()
    expect(s.tick(1.0)).toBe('advanced')

    expect(s.state.currentTime).toBe(1.0)
    expect(s.state.isPlaying).toBe(true)
  })

  it('scales ticks by the speed multiplier', () => {
    const s = new PlaybackSession(chart, { speed: 2 })
    s.play()
    s.tick(0.5)
    expect(s.state.currentTime).toBe(1.0)
  })

  it('does not advance while stopped or paused', () => {
    const s = session()
    expect(s.tick(1)).toBe('idle')
    expect(s.state.currentTime).toBe(0)

    s.play()
    s.tick(1)
    s.pause()
    expect(s.tick(1)).toBe('idle')
    expect(s.state.currentTime).toBe(1)
  })

  it('ignores non-positive and non-finite deltas', () => {
    const s = session()
    s.play()
    expect(s.tick(-1)).toBe('idle')
    expect(s.tick(NaN)).toBe('idle')
    expect(s.tick(Infinity)).toBe('idle')
    expect(s.state.currentTime).toBe(0)
  })

  it('reports the current beat through the tempo map', () => {
    const s = session()
    s.seek(1.5)
    expect(s.currentBeat).toBe(3)
  })

  describe('pause', () => {
    it('is idempotent', () => {
      const once = session()
      once.play()
      once.tick(2)
      once.pause()

      const twice = session()
      twice.play()
      twice.tick(2)
      twice.pause()
      twice.pause()

      expect(twice.state).toEqual(once.state)
      expect(twice.state.status).toBe('paused')
    })

    it('leaves a stopped session stopped', () => {
      const s = session()
      s.pause()
      expect(s.state.status).toBe('stopped')
    })

    it('resumes from the paused position', () => {
      const s = session()
      s.play()
      s.tick(3)
      s.pause()
      s.play()
      expect(s.state).toMatchObject({ currentTime: 3, status: 'playing' })
    })
  })

  it('togglePlay switches between playing and paused', () => {
    const s = session()
    s.togglePlay()
    expect(s.state.status).toBe('playing')
    s.togglePlay()
    expect(s.state.status).toBe('paused')
    s.togglePlay()
    expect(s.state.status).toBe('playing')
  })

  it('play can rewind first', () => {
    const s = session()
    s.play()
    s.tick(3)
    s.pause()
    s.play({ fromStart: true })
    expect(s.state).toMatchObject({ currentTime: 0, status: 'playing' })
  })

  it('reset rewinds without changing the play state', () => {
    const s = session()
    s.play()
    s.tick(2)
    s.reset()
    expect(s.state).toMatchObject({ currentTime: 0, status: 'playing' })
  })

  it('stop rewinds and stops', () => {
    const s = session()
    s.play()
    s.tick(2)
    s.stop()
    expect(s.state).toEqual({ currentTime: 0, speed: 1, status: 'stopped', isPlaying: false })
  })

  describe('seek', () => {
    it('clamps below zero to zero', () => {
      const s = session()
      s.seek(-5.0)
      expect(s.state.currentTime).toBe(0.0)
    })

    it('clamps past the end to the chart end', () => {
      const s = session()
      s.seek(100)
      expect(s.state.currentTime).toBe(10)
    })

    it('keeps the play state', () => {
      const s = session()
      s.play()
      s.pause()
      s.seek(4)
      expect(s.state).toMatchObject({ currentTime: 4, status: 'paused' })
    })

    it('ignores NaN', () => {
      const s = session()
      s.seek(4)
      s.seek(NaN)
      expect(s.state.currentTime).toBe(4)
    })

    it('seeks relatively in seconds or beats', () => {
      const s = session()
      s.seek(1)
      s.seekBy(2, 'beats')
      expect(s.state.currentTime).toBe(2)

      s.seekBy(-0.5)
      expect(s.state.currentTime).toBe(1.5)

      s.seekBy(-10, 'beats')
      expect(s.state.currentTime).toBe(0)
    })
  })

  describe('setSpeed', () => {
    it('changes the multiplier', () => {
      const s = session()
      s.setSpeed(1.5)
      expect(s.state.speed).toBe(1.5)
    })

    it('rejects a negative multiplier and keeps the state', () => {
      const s = session()
      s.play()
      s.tick(2)
      const before = { ...s.state }

      expect(() => s.setSpeed(-1.0)).toThrow(InvalidSpeedError)
      expect(s.state).toEqual(before)
    })

    it('rejects zero and non-finite multipliers', () => {
      const s = session()
      expect(() => s.setSpeed(0)).toThrow(InvalidSpeedError)
      expect(() => s.setSpeed(NaN)).toThrow(InvalidSpeedError)
      expect(() => s.setSpeed(Infinity)).toThrow(InvalidSpeedError)
      expect(s.state.speed).toBe(1)
    })

    it('rejects an invalid initial speed', () => {
      expect(() => new PlaybackSession(chart, { speed: 0 })).toThrow(InvalidSpeedError)
    })
  })

  describe('end of chart', () => {
    it('stop: clamps to the end and stops', () => {
      const s = session('stop')
      s.play()
      s.seek(9.5)
      expect(s.tick(1)).toBe('ended')
      expect(s.state).toEqual({ currentTime: 10, speed: 1, status: 'stopped', isPlaying: false })
    })

    it('stop: playing again resumes from the end', () => {
      const s = session('stop')
      s.play()
      s.seek(9.5)
      s.tick(1)
      s.play()
      expect(s.state).toMatchObject({ currentTime: 10, status: 'playing' })
      expect(s.tick(0.016)).toBe('ended')
    })

    it('stop: playing from the start after the end rewinds', () => {
      const s = session('stop')
      s.play()
      s.seek(9.5)
      s.tick(1)
      s.play({ fromStart: true })
      expect(s.state).toMatchObject({ currentTime: 0, status: 'playing' })
    })

    it('play after seeking to the end while stopped keeps the position', () => {
      const s = session()
      s.seek(10)
      s.play()
      expect(s.state).toMatchObject({ currentTime: 10, status: 'playing' })
    })

    it('hold: toggling at the end needs an explicit rewind to restart', () => {
      const s = session('hold')
      s.play()
      s.seek(9.5)
      s.tick(1)

      s.togglePlay()
      expect(s.tick(0.016)).toBe('ended')
      expect(s.state).toMatchObject({ currentTime: 10, status: 'paused' })

      s.play({ fromStart: true })
      expect(s.tick(0.5)).toBe('advanced')
      expect(s.state).toMatchObject({ currentTime: 0.5, status: 'playing' })
    })

    it('hold: clamps to the end and pauses on the last frame', () => {
      const s = session('hold')
      s.play()
      s.seek(9.5)
      expect(s.tick(1)).toBe('ended')
      expect(s.state).toMatchObject({ currentTime: 10, status: 'paused', isPlaying: false })
    })

    it('loop: wraps around and keeps playing', () => {
      const s = session('loop')
      s.play()
      s.seek(9.5)
      expect(s.tick(1)).toBe('looped')
      expect(s.state).toMatchObject({ currentTime: 0.5, status: 'playing' })
    })

    it('loop: a zero-length chart stops instead', () => {
      const empty = createChart({ tempo: [{ beat: 0, bpm: 120 }], notes: [] })
      const s = new PlaybackSession(empty, { endBehavior: 'loop' })
      s.play()
      expect(s.tick(0.1)).toBe('ended')
      expect(s.state).toMatchObject({ currentTime: 0, status: 'stopped' })
    })
  })

  it('every command leaves a defined state from every state', () => {
    const statuses = ['stopped', 'playing', 'paused']
    const setups: Array<(s: PlaybackSession) => void> = [
      () => {},
      s => s.play(),
      s => {
        s.play()
        s.pause()
      },
    ]
    const commands: Array<(s: PlaybackSession) => void> = [
      s => s.play(),
      s => s.pause(),
      s => s.tick(0.25),
      s => s.tick(100),
      s => s.seek(3),
      s => s.seek(-3),
      s => s.setSpeed(2),
      s => s.togglePlay(),
      s => s.reset(),
      s => s.stop(),
    ]

    for (const endBehavior of ['stop', 'loop', 'hold'] as const) {
      for (const setup of setups) {
        for (const command of commands) {
          const s = session(endBehavior)
          setup(s)
          command(s)
          expect(statuses).toContain(s.state.status)
          expect(s.state.isPlaying).toBe(s.state.status === 'playing')
          expect(s.state.currentTime).toBeGreaterThanOrEqual(0)
          expect(s.state.currentTime).toBeLessThanOrEqual(10)
        }
      }
    }
  })
})
