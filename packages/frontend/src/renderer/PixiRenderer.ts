/**
 * Main PixiJS renderer orchestrating all layers
 */

import { Application } from 'pixi.js'
import type { Chart, PlaybackState, RenderSnapshot } from '@beatscroll/shared'
import type { RendererConfig, FrameState, RenderLayer } from './types.js'
import type { SnapshotRenderer } from '../game/GameLoop.js'
import { computeLaneLayout } from './layout.js'
import { LaneLayer } from './layers/LaneLayer.js'
import { NoteLayer } from './layers/NoteLayer.js'
import { UILayer } from './layers/UILayer.js'

/**
 * PixiJS-based renderer with layered architecture
 */
export class PixiRenderer implements SnapshotRenderer {
  private app: Application
  private layers: RenderLayer[]
  private initialized = false

  constructor(
    private canvas: HTMLCanvasElement,
    private chart: Chart,
    private config: RendererConfig
  ) {
    // Create PixiJS application
    this.app = new Application()

    // Layers in bottom-to-top order
    this.layers = [
      new LaneLayer(),
      new NoteLayer(),
      new UILayer(config.width, chart.metadata.title),
    ]
  }

  /**
   * Initialize renderer and all layers
   */
  public async init(): Promise<void> {
    if (this.initialized) return

    // Initialize PixiJS application
    await this.app.init({
      canvas: this.canvas,
      width: this.config.width,
      height: this.config.height,
      backgroundColor: this.config.backgroundColor ?? 0x0a0a0e,
      antialias: this.config.antialias ?? true,
      resolution: this.config.resolution ?? (window.devicePixelRatio || 1),
      autoDensity: true,
      backgroundAlpha: this.config.backgroundAlpha ?? 1,
    })

    // Add layer containers to stage
    for (const layer of this.layers) {
      this.app.stage.addChild(layer.container)
    }

    // Initialize all layers
    await Promise.all(this.layers.map(layer => layer.init()))

    this.initialized = true
  }

  /**
   * Render a single frame
   */
  public render(snapshot: RenderSnapshot, playback: Readonly<PlaybackState>): void {
    if (!this.initialized) {
      console.warn('[PixiRenderer] render() called before init()')
      return
    }

    const { width, height } = this.config
    const laneCount = this.chart.metadata.laneCount
    const frameState: FrameState = {
      snapshot,
      playback,
      layout: computeLaneLayout(width, height, laneCount, snapshot.camera),
      laneCount,
      duration: this.chart.duration,
      width,
      height,
    }

    // Update all layers
    for (const layer of this.layers) {
      layer.update(frameState)
    }

    // PixiJS automatically renders the stage
  }

  /**
   * Resize renderer
   */
  public resize(width: number, height: number): void {
    this.config.width = width
    this.config.height = height
    if (this.initialized) {
      this.app.renderer.resize(width, height)
    }

    for (const layer of this.layers) {
      layer.resize(width, height)
    }
  }

  /**
   * Destroy renderer and clean up resources
   */
  public destroy(): void {
    for (const layer of this.layers) {
      layer.destroy()
    }
    if (this.initialized) {
      this.app.destroy(true, { children: true, texture: true })
    }
    this.initialized = false
  }
}
