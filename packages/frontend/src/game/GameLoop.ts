/**
 * Frame loop tying keyboard input, the playback session, the frame sampler
 * and a renderer together. One iteration: apply queued commands, advance
 * the clock, sample, draw.
 */

import {
  applyCommand,
  FrameSampler,
  InvalidSpeedError,
  PlaybackSession,
  type Chart,
  type FrameSamplerOptions,
  type PlaybackCommand,
  type PlaybackOptions,
  type PlaybackState,
  type RenderSnapshot,
  type TickResult,
} from '@beatscroll/shared'
import { InputHandler } from '../runtime/InputHandler.js'

/**
 * Draws one snapshot per frame
 */
export interface SnapshotRenderer {
  render(snapshot: RenderSnapshot, playback: Readonly<PlaybackState>): void
}

/**
 * Source of frame callbacks; requestAnimationFrame in the browser
 */
export interface FrameScheduler {
  request(callback: (timestampMs: number) => void): number
  cancel(handle: number): void
}

export const animationFrameScheduler: FrameScheduler = {
  request: callback => requestAnimationFrame(callback),
  cancel: handle => cancelAnimationFrame(handle),
}

/**
 * Game loop options
 */
export interface GameLoopOptions {
  playback?: PlaybackOptions
  sampler?: FrameSamplerOptions
  input?: InputHandler
  scheduler?: FrameScheduler
  /** Longest wall-clock step a single frame may advance, in seconds (default: 0.25) */
  maxFrameDelta?: number
  /** Called after every frame with the tick outcome */
  onFrame?: (result: TickResult, snapshot: RenderSnapshot) => void
}

/**
 * Main game loop class
 */
export class GameLoop {
  public readonly session: PlaybackSession
  public readonly sampler: FrameSampler
  public readonly input: InputHandler

  private scheduler: FrameScheduler
  private maxFrameDelta: number
  private onFrame?: GameLoopOptions['onFrame']

  private rafId: number | null = null
  private running = false
  private lastTimestampMs: number | null = null
  private snapshot: RenderSnapshot | null = null

  constructor(
    private chart: Chart,
    private renderer: SnapshotRenderer,
    options: GameLoopOptions = {}
  ) {
    this.session = new PlaybackSession(chart, options.playback)
    this.sampler = new FrameSampler(options.sampler)
    this.input = options.input ?? new InputHandler()
    this.scheduler = options.scheduler ?? animationFrameScheduler
    this.maxFrameDelta = options.maxFrameDelta ?? 0.25
    this.onFrame = options.onFrame
  }

  public get isRunning(): boolean {
    return this.running
  }

  /**
   * Most recent snapshot, null before the first frame
   */
  public get lastSnapshot(): RenderSnapshot | null {
    return this.snapshot
  }

  /**
   * Apply a command right away. A rejected speed change is reported and
   * leaves playback untouched.
   */
  public dispatch(command: PlaybackCommand): void {
    try {
      applyCommand(this.session, command)
    } catch (err) {
      if (err instanceof InvalidSpeedError) {
        console.warn(`[GameLoop] ${err.message}`)
        return
      }
      throw err
    }
  }

  /**
   * Run one frame at `timestampMs` (requestAnimationFrame time)
   */
  public step(timestampMs: number): TickResult {
    const last = this.lastTimestampMs
    this.lastTimestampMs = timestampMs
    const dt = last === null ? 0 : Math.min(Math.max(0, (timestampMs - last) / 1000), this.maxFrameDelta)

    for (const command of this.input.drain(this.session.state)) {
      this.dispatch(command)
    }

    const result = this.session.tick(dt)
    const snapshot = this.sampler.sample(this.chart, this.session.state)
    this.snapshot = snapshot
    this.renderer.render(snapshot, this.session.state)
    this.onFrame?.(result, snapshot)
    return result
  }

  private readonly frame = (timestampMs: number): void => {
    this.rafId = null
    if (!this.running) return
    this.step(timestampMs)
    this.rafId = this.scheduler.request(this.frame)
  }

  /**
   * Start requesting frames. Playback itself starts with play().
   */
  public start(): void {
    if (this.running) return
    this.running = true
    this.lastTimestampMs = null
    this.rafId = this.scheduler.request(this.frame)
  }

  /**
   * Stop requesting frames; the session keeps its state
   */
  public stop(): void {
    this.running = false
    if (this.rafId !== null) {
      this.scheduler.cancel(this.rafId)
      this.rafId = null
    }
  }

  public destroy(): void {
    this.stop()
    this.input.detach()
    this.input.clear()
  }
}
