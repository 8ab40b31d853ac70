/**
 * Note layer - draws the sampled notes with pooled Graphics
 */

import { Container, Graphics } from 'pixi.js'
import { NOTE_COLORS, type VisibleNote } from '@beatscroll/shared'
import type { RenderLayer, FrameState } from '../types.js'
import { colorToHex, laneCenterX, progressToY, type LaneLayout } from '../layout.js'

export class NoteLayer implements RenderLayer {
  public container: Container

  private graphicsPool: Graphics[] = []
  private activeGraphics: Graphics[] = []

  private readonly NOTE_HEIGHT = 24
  private readonly PASSED_ALPHA = 0.45

  constructor() {
    this.container = new Container()
    this.container.label = 'NoteLayer'
  }

  public async init(): Promise<void> {
    // Note layer is ready immediately
  }

  private acquireGraphics(): Graphics {
    let graphics = this.graphicsPool.pop()
    if (!graphics) {
      graphics = new Graphics()
      this.container.addChild(graphics)
    }
    graphics.visible = true
    this.activeGraphics.push(graphics)
    return graphics
  }

  public update(state: FrameState): void {
    // Release all graphics from previous frame
    for (const graphics of this.activeGraphics) {
      graphics.clear()
      graphics.visible = false
      this.graphicsPool.push(graphics)
    }
    this.activeGraphics = []

    // Draw back to front so nearer notes end up on top
    const notes = state.snapshot.visibleNotes
    for (let i = notes.length - 1; i >= 0; i--) {
      this.renderNote(notes[i], state.layout)
    }
  }

  private renderNote(v: VisibleNote, layout: LaneLayout): void {
    const graphics = this.acquireGraphics()
    const color = colorToHex(NOTE_COLORS[v.note.kind])
    const alpha = v.passed ? this.PASSED_ALPHA : 1

    const x = laneCenterX(layout, v.note.lane)
    const y = progressToY(layout, v.easedProgress)
    const width = layout.laneWidth * 0.86
    const height = this.NOTE_HEIGHT

    if (v.tailEasedProgress !== null) {
      const tailY = progressToY(layout, v.tailEasedProgress)
      const bodyWidth = width * 0.4
      graphics.rect(x - bodyWidth / 2, tailY, bodyWidth, y - tailY)
      graphics.fill({ color, alpha: alpha * 0.6 })
    }

    graphics.rect(x - width / 2, y - height / 2, width, height)
    graphics.fill({ color, alpha })
    graphics.rect(x - width / 2, y - height / 2, width, height)
    graphics.stroke({ width: 2, color: 0x000000, alpha: alpha * 0.86 })

    if (v.note.kind === 'flick') {
      // Arrow marker
      graphics.poly([x - width / 4, y + 4, x, y - 6, x + width / 4, y + 4])
      graphics.stroke({ width: 3, color: 0xffffff, alpha })
    }
  }

  public resize(_width: number, _height: number): void {
    // Positions are recomputed every frame
  }

  public destroy(): void {
    for (const graphics of [...this.graphicsPool, ...this.activeGraphics]) {
      graphics.destroy()
    }
    this.graphicsPool = []
    this.activeGraphics = []
    this.container.destroy()
  }
}
