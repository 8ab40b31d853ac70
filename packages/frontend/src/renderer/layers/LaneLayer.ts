/**
 * Lane layer - lane guides and the judge line
 */

import { Container, Graphics } from 'pixi.js'
import type { RenderLayer, FrameState } from '../types.js'

export class LaneLayer implements RenderLayer {
  public container: Container

  private graphics: Graphics

  constructor() {
    this.container = new Container()
    this.container.label = 'LaneLayer'

    this.graphics = new Graphics()
    this.container.addChild(this.graphics)
  }

  public async init(): Promise<void> {
    // Lane layer is ready immediately
  }

  public update(state: FrameState): void {
    const { layout, laneCount, height } = state
    const g = this.graphics
    g.clear()

    const right = layout.left + layout.laneWidth * laneCount

    // Lane backdrop
    g.rect(layout.left, 0, right - layout.left, height)
    g.fill({ color: 0x16161c, alpha: 0.85 })

    // Dividers
    for (let i = 0; i <= laneCount; i++) {
      const x = layout.left + i * layout.laneWidth
      g.moveTo(x, 0)
      g.lineTo(x, height)
    }
    g.stroke({ width: 1, color: 0x3a3a46, alpha: 1 })

    // Judge line
    g.moveTo(layout.left, layout.judgeY)
    g.lineTo(right, layout.judgeY)
    g.stroke({ width: 4, color: 0xfeffa9, alpha: 0.9 })
  }

  public resize(_width: number, _height: number): void {
    // Geometry comes from the frame layout
  }

  public destroy(): void {
    this.graphics.destroy()
    this.container.destroy()
  }
}
