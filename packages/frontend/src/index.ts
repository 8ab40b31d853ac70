/**
 * Browser player: mount a chart onto a canvas with keyboard controls
 */

import type { Chart } from '@beatscroll/shared'
import { GameLoop, type GameLoopOptions } from './game/GameLoop.js'
import { PixiRenderer } from './renderer/PixiRenderer.js'
import type { RendererConfig } from './renderer/types.js'
import { InputHandler, type InputHandlerConfig, type KeyEventTarget } from './runtime/InputHandler.js'

export interface MountOptions extends Omit<GameLoopOptions, 'input'> {
  renderer?: Partial<RendererConfig>
  /** Seek and speed steps for the arrow keys */
  keys?: InputHandlerConfig
  /** Start playing as soon as the renderer is ready */
  autoPlay?: boolean
  /** Where keydown is listened for (default: window) */
  keyTarget?: KeyEventTarget
}

export interface MountedPlayer {
  loop: GameLoop
  renderer: PixiRenderer
  destroy(): void
}

export async function mountPlayer(
  canvas: HTMLCanvasElement,
  chart: Chart,
  options: MountOptions = {}
): Promise<MountedPlayer> {
  const renderer = new PixiRenderer(canvas, chart, {
    width: canvas.clientWidth || 1280,
    height: canvas.clientHeight || 720,
    ...options.renderer,
  })

  console.log('[Player] Initializing renderer...')
  await renderer.init()
  console.log('[Player] Renderer initialized')

  const loop = new GameLoop(chart, renderer, { ...options, input: new InputHandler(options.keys) })
  loop.input.attach(options.keyTarget ?? window)
  if (options.autoPlay) {
    loop.session.play()
  }
  loop.start()

  return {
    loop,
    renderer,
    destroy() {
      loop.destroy()
      renderer.destroy()
    },
  }
}

export * from './game/GameLoop.js'
export * from './runtime/index.js'
export * from './renderer/index.js'
export * from './loaders/ChartLoader.js'
