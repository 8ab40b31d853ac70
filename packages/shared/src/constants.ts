export const NOTE_KINDS = ['tap', 'drag', 'hold', 'flick'] as const

export type NoteKind = typeof NOTE_KINDS[number]

export function isNoteKind(value: unknown): value is NoteKind {
  return typeof value === 'string' && NOTE_KINDS.some(k => k === value)
}

// Note colors by kind
export const NOTE_COLORS: Record<NoteKind, { r: number; g: number; b: number }> = {
  tap: { r: 255, g: 220, b: 120 },    // Orange
  drag: { r: 140, g: 240, b: 255 },   // Cyan
  hold: { r: 120, g: 200, b: 255 },   // Light blue
  flick: { r: 255, g: 140, b: 220 },  // Pink
}

export type EndBehavior = 'stop' | 'loop' | 'hold'

export const END_BEHAVIORS: readonly EndBehavior[] = ['stop', 'loop', 'hold']

export function isEndBehavior(value: unknown): value is EndBehavior {
  return typeof value === 'string' && END_BEHAVIORS.some(b => b === value)
}

// Control steps, as bound to the arrow keys
export const SEEK_STEP_SECONDS = 0.1
export const SPEED_STEP_FACTOR = 1.1
