/**
 * UI layer - chart title and playback readout
 */

import { Container, Text, TextStyle } from 'pixi.js'
import type { RenderLayer, FrameState } from '../types.js'
import { formatHud } from '../layout.js'

export class UILayer implements RenderLayer {
  public container: Container

  private titleText: Text
  private hudText: Text

  constructor(
    private width: number,
    title: string
  ) {
    this.container = new Container()
    this.container.label = 'UILayer'

    // Title (top center)
    this.titleText = new Text({
      text: title,
      style: new TextStyle({
        fontFamily: 'Arial',
        fontSize: 28,
        fontWeight: 'bold',
        fill: 0xffffff,
        stroke: { color: 0x000000, width: 4 },
      }),
    })
    this.titleText.anchor.set(0.5, 0)
    this.container.addChild(this.titleText)

    // Readout (top left)
    this.hudText = new Text({
      text: '',
      style: new TextStyle({
        fontFamily: 'monospace',
        fontSize: 16,
        fill: 0xd0d0d8,
        stroke: { color: 0x000000, width: 3 },
      }),
    })
    this.container.addChild(this.hudText)

    this.updatePositions()
  }

  public async init(): Promise<void> {
    // UI layer is ready immediately
  }

  private updatePositions(): void {
    this.titleText.x = this.width / 2
    this.titleText.y = 16

    this.hudText.x = 16
    this.hudText.y = 16
  }

  public update(state: FrameState): void {
    this.hudText.text = formatHud(state.snapshot, state.playback, state.duration)

    const status = state.playback.status
    this.hudText.style.fill = status === 'playing' ? 0xd0d0d8 : status === 'paused' ? 0xffd27a : 0x9a9aa6
  }

  public resize(width: number, _height: number): void {
    this.width = width
    this.updatePositions()
  }

  public destroy(): void {
    this.titleText.destroy()
    this.hudText.destroy()
    this.container.destroy()
  }
}
