/**
 * Keyboard input for playback control.
 * Key presses are queued as they arrive and turned into playback commands
 * once per frame, against the state the frame starts from.
 */

import {
  SEEK_STEP_SECONDS,
  SPEED_STEP_FACTOR,
  type PlaybackCommand,
  type PlaybackState,
} from '@beatscroll/shared'

/**
 * The parts of a KeyboardEvent the handler reads
 */
export interface KeyInput {
  code: string
  repeat: boolean
  preventDefault?(): void
}

export interface InputHandlerConfig {
  /** Seconds per ArrowLeft/ArrowRight press (default: 0.1) */
  seekStep?: number
  /** Speed factor per ArrowUp/ArrowDown press (default: 1.1) */
  speedStep?: number
}

/**
 * Where keydown events come from; window or any element
 */
export interface KeyEventTarget {
  addEventListener(type: 'keydown', listener: (e: KeyInput) => void): void
  removeEventListener(type: 'keydown', listener: (e: KeyInput) => void): void
}

/** Keys that toggle state and ignore auto-repeat */
const EDGE_KEYS = new Set(['Space', 'KeyR'])
const HANDLED_KEYS = new Set(['Space', 'KeyR', 'ArrowLeft', 'ArrowRight', 'ArrowUp', 'ArrowDown'])

export class InputHandler {
  private queue: string[] = []
  private config: Required<InputHandlerConfig>
  private target: KeyEventTarget | null = null

  constructor(config?: InputHandlerConfig) {
    this.config = {
      seekStep: config?.seekStep ?? SEEK_STEP_SECONDS,
      speedStep: config?.speedStep ?? SPEED_STEP_FACTOR,
    }
  }

  /**
   * Handle a key press. Returns true when the key was taken.
   */
  public onKeyDown(e: KeyInput): boolean {
    if (!HANDLED_KEYS.has(e.code)) return false
    e.preventDefault?.()

    if (e.repeat && EDGE_KEYS.has(e.code)) return true

    this.queue.push(e.code)
    return true
  }

  private readonly listener = (e: KeyInput): void => {
    this.onKeyDown(e)
  }

  /**
   * Listen for keydown on a window or element
   */
  public attach(target: KeyEventTarget): void {
    this.detach()
    target.addEventListener('keydown', this.listener)
    this.target = target
  }

  public detach(): void {
    this.target?.removeEventListener('keydown', this.listener)
    this.target = null
  }

  public get pending(): number {
    return this.queue.length
  }

  /**
   * Convert queued keys into commands and empty the queue.
   * Speed steps compound within a frame.
   */
  public drain(state: Readonly<PlaybackState>): PlaybackCommand[] {
    const commands: PlaybackCommand[] = []
    let speed = state.speed

    for (const code of this.queue) {
      switch (code) {
        case 'Space':
          commands.push({ type: 'togglePlay' })
          break
        case 'KeyR':
          commands.push({ type: 'reset' })
          break
        case 'ArrowLeft':
          commands.push({ type: 'seekRelative', delta: -this.config.seekStep, unit: 'seconds' })
          break
        case 'ArrowRight':
          commands.push({ type: 'seekRelative', delta: this.config.seekStep, unit: 'seconds' })
          break
        case 'ArrowUp':
          speed *= this.config.speedStep
          commands.push({ type: 'setSpeed', multiplier: speed })
          break
        case 'ArrowDown':
          speed /= this.config.speedStep
          commands.push({ type: 'setSpeed', multiplier: speed })
          break
      }
    }

    this.queue = []
    return commands
  }

  public clear(): void {
    this.queue = []
  }
}
