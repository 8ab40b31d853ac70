/**
 * Renderer types and interfaces
 */

import type { PlaybackState, RenderSnapshot } from '@beatscroll/shared'
import type { Container } from 'pixi.js'
import type { LaneLayout } from './layout.js'

/**
 * Renderer configuration
 */
export interface RendererConfig {
  /** Canvas width */
  width: number
  /** Canvas height */
  height: number
  /** Background color */
  backgroundColor?: number
  /** Antialiasing */
  antialias?: boolean
  /** Resolution multiplier */
  resolution?: number
  /** Transparent background */
  backgroundAlpha?: number
}

/**
 * Renderer state for a single frame
 */
export interface FrameState {
  snapshot: RenderSnapshot
  playback: Readonly<PlaybackState>
  layout: LaneLayout
  laneCount: number
  duration: number
  /** Screen dimensions */
  width: number
  height: number
}

/**
 * Layer interface - all layers implement this
 */
export interface RenderLayer {
  /** Layer container */
  container: Container
  /** Initialize layer resources */
  init(): Promise<void>
  /** Update layer for current frame */
  update(state: FrameState): void
  /** Clean up layer resources */
  destroy(): void
  /** Resize layer to new dimensions */
  resize(width: number, height: number): void
}
