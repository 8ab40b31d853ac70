/**
 * Discrete control commands, as produced by input or UI collaborators
 */

import type { PlaybackSession, SeekUnit } from './PlaybackSession.js'

export type PlaybackCommand =
  | { type: 'play' }
  | { type: 'pause' }
  | { type: 'togglePlay' }
  | { type: 'reset' }
  | { type: 'seekRelative'; delta: number; unit: SeekUnit }
  | { type: 'setSpeed'; multiplier: number }

/**
 * Apply a command to a session.
 * InvalidSpeedError from setSpeed propagates; the session is unchanged then.
 */
export function applyCommand(session: PlaybackSession, command: PlaybackCommand): void {
  switch (command.type) {
    case 'play':
      session.play()
      break
    case 'pause':
      session.pause()
      break
    case 'togglePlay':
      session.togglePlay()
      break
    case 'reset':
      session.reset()
      break
    case 'seekRelative':
      session.seekBy(command.delta, command.unit)
      break
    case 'setSpeed':
      session.setSpeed(command.multiplier)
      break
  }
}
