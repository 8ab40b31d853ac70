/**
 * Screen geometry for the lane view: where lanes sit and how approach
 * progress maps to a vertical position.
 */

import type { PlaybackState, RenderSnapshot } from '@beatscroll/shared'

export interface LaneLayout {
  /** x of the left edge of lane 0 */
  left: number
  laneWidth: number
  /** y where notes reach progress 0 */
  judgeY: number
  /** y where notes enter at progress 1 */
  spawnY: number
}

const MAX_LANE_WIDTH = 160
const LANE_AREA_RATIO = 0.8
const JUDGE_LINE_RATIO = 0.85

export function computeLaneLayout(
  width: number,
  height: number,
  laneCount: number,
  camera: RenderSnapshot['camera']
): LaneLayout {
  const scale = camera.scale > 0 ? camera.scale : 1
  const lanes = Math.max(1, laneCount)
  const laneWidth = Math.min((width * LANE_AREA_RATIO) / lanes, MAX_LANE_WIDTH) * scale

  return {
    left: (width - laneWidth * lanes) / 2 + camera.x * width,
    laneWidth,
    judgeY: height * JUDGE_LINE_RATIO,
    spawnY: 0,
  }
}

export function laneCenterX(layout: LaneLayout, lane: number): number {
  return layout.left + (lane + 0.5) * layout.laneWidth
}

/**
 * Progress 0 is the judge line, 1 the spawn edge; negative runs past the line
 */
export function progressToY(layout: LaneLayout, progress: number): number {
  return layout.judgeY - (layout.judgeY - layout.spawnY) * progress
}

export function colorToHex(c: { r: number; g: number; b: number }): number {
  return (c.r << 16) | (c.g << 8) | c.b
}

/**
 * Status line shown in the corner of the player
 */
export function formatHud(snapshot: RenderSnapshot, playback: Readonly<PlaybackState>, duration: number): string {
  return [
    `${playback.status.toUpperCase()}  x${playback.speed.toFixed(2)}`,
    `${snapshot.time.toFixed(2)} / ${duration.toFixed(2)} s`,
    `beat ${snapshot.beat.toFixed(2)}  ${snapshot.bpm.toFixed(1)} bpm`,
    `notes ${snapshot.visibleNotes.length}  passed ${snapshot.passedCount}`,
  ].join('\n')
}
