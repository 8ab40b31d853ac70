import { afterEach, describe, it, expect, vi } from 'vitest'
import { createChart, type PlaybackState, type RenderSnapshot } from '@beatscroll/shared'
import { GameLoop, type FrameScheduler, type SnapshotRenderer } from './game/GameLoop.js'

// 60 bpm: one beat per second
const chart = createChart({
  tempo: [{ beat: 0, bpm: 60 }],
  notes: [
    { beat: 2, lane: 0, kind: 'tap' },
    { beat: 5, lane: 1, kind: 'drag' },
  ],
  duration: 10,
})

class FakeRenderer implements SnapshotRenderer {
  frames: Array<{ snapshot: RenderSnapshot; playback: PlaybackState }> = []

  render(snapshot: RenderSnapshot, playback: Readonly<PlaybackState>): void {
    this.frames.push({ snapshot, playback: { ...playback } })
  }
}

class FakeScheduler implements FrameScheduler {
  private nextHandle = 1
  callbacks = new Map<number, (timestampMs: number) => void>()

  request(callback: (timestampMs: number) => void): number {
    const handle = this.nextHandle++
    this.callbacks.set(handle, callback)
    return handle
  }

  cancel(handle: number): void {
    this.callbacks.delete(handle)
  }

  fire(timestampMs: number): void {
    const pending = [...this.callbacks.values()]
    this.callbacks.clear()
    for (const callback of pending) callback(timestampMs)
  }
}

function setup() {
  const renderer = new FakeRenderer()
  const scheduler = new FakeScheduler()
  const loop = new GameLoop(chart, renderer, { scheduler })
  return { renderer, scheduler, loop }
}

afterEach(() => {
  vi.restoreAllMocks()
})

describe('GameLoop', () => {
  it('does not advance on the first frame', () => {
    const { loop, renderer } = setup()
    loop.session.play()

    expect(loop.step(1000)).toBe('idle')
    expect(loop.session.state.currentTime).toBe(0)
    expect(renderer.frames).toHaveLength(1)
  })

  it('advances by wall-clock time between frames', () => {
    const { loop } = setup()
    loop.session.play()

    loop.step(1000)
    expect(loop.step(1200)).toBe('advanced')
    expect(loop.session.state.currentTime).toBeCloseTo(0.2)
  })

  it('caps long gaps between frames', () => {
    const { loop } = setup()
    loop.session.play()

    loop.step(0)
    loop.step(5000)
    expect(loop.session.state.currentTime).toBe(0.25)
  })

  it('ignores timestamps that go backwards', () => {
    const { loop } = setup()
    loop.session.play()

    loop.step(1000)
    expect(loop.step(500)).toBe('idle')
    expect(loop.session.state.currentTime).toBe(0)
  })

  it('applies queued keys before advancing', () => {
    const { loop } = setup()
    loop.step(0)

    loop.input.onKeyDown({ code: 'Space', repeat: false })
    loop.input.onKeyDown({ code: 'ArrowUp', repeat: false })
    loop.step(100)

    expect(loop.session.state.status).toBe('playing')
    expect(loop.session.state.speed).toBeCloseTo(1.1)
    expect(loop.session.state.currentTime).toBeCloseTo(0.11)
  })

  it('renders the sampled snapshot', () => {
    const { loop, renderer } = setup()
    loop.step(0)

    const { snapshot, playback } = renderer.frames[0]
    expect(playback.status).toBe('stopped')
    expect(snapshot.visibleNotes.map(v => [v.index, v.progress])).toEqual([[0, 0.5]])
    expect(loop.lastSnapshot).toBe(snapshot)
  })

  it('reports rejected speed changes without throwing', () => {
    const { loop } = setup()
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})

    loop.dispatch({ type: 'setSpeed', multiplier: 0 })

    expect(loop.session.state.speed).toBe(1)
    expect(warn).toHaveBeenCalledWith('[GameLoop] Speed multiplier must be a finite number > 0 (got 0)')
  })

  it('runs frames from the scheduler until stopped', () => {
    const { loop, scheduler, renderer } = setup()
    loop.session.play()

    loop.start()
    expect(loop.isRunning).toBe(true)
    expect(scheduler.callbacks.size).toBe(1)

    scheduler.fire(0)
    scheduler.fire(200)
    expect(renderer.frames).toHaveLength(2)
    expect(loop.session.state.currentTime).toBe(0.2)

    loop.stop()
    expect(loop.isRunning).toBe(false)
    expect(scheduler.callbacks.size).toBe(0)
  })

  it('restarts without a jump after a stop', () => {
    const { loop, scheduler } = setup()
    loop.session.play()

    loop.start()
    scheduler.fire(0)
    loop.stop()
    loop.start()
    scheduler.fire(10_000)

    expect(loop.session.state.currentTime).toBe(0)
  })

  it('reports every frame', () => {
    const onFrame = vi.fn()
    const loop = new GameLoop(chart, new FakeRenderer(), { scheduler: new FakeScheduler(), onFrame })
    loop.session.play()

    loop.step(0)
    loop.step(100)

    expect(onFrame.mock.calls.map(call => call[0])).toEqual(['idle', 'advanced'])
  })

  it('passes playback options to the session', () => {
    const loop = new GameLoop(chart, new FakeRenderer(), {
      scheduler: new FakeScheduler(),
      playback: { endBehavior: 'loop', speed: 2 },
      sampler: { lookaheadBeats: 8 },
    })

    expect(loop.session.endBehavior).toBe('loop')
    expect(loop.session.state.speed).toBe(2)
    expect(loop.sampler.options.lookaheadBeats).toBe(8)
  })
})
