/**
 * Error classes raised by chart loading and playback control
 */

export type ChartErrorCode = 'INVALID_TEMPO_MAP' | 'INVALID_NOTE' | 'PARSE_ERROR'

/**
 * Base class for errors that make a chart unloadable.
 * A chart that raises one of these is rejected as a whole.
 */
export class ChartError extends Error {
  constructor(
    public readonly code: ChartErrorCode,
    message: string
  ) {
    super(message)
    this.name = 'ChartError'
  }
}

/**
 * Tempo map is empty, has a non-positive bpm, or beats that do not increase
 */
export class InvalidTempoMapError extends ChartError {
  constructor(message: string) {
    super('INVALID_TEMPO_MAP', message)
    this.name = 'InvalidTempoMapError'
  }
}

export class InvalidNoteError extends ChartError {
  constructor(
    public readonly noteIndex: number,
    message: string
  ) {
    super('INVALID_NOTE', `note ${noteIndex}: ${message}`)
    this.name = 'InvalidNoteError'
  }
}

/**
 * Chart document is malformed. `path` points at the offending field,
 * e.g. `notes[3].lane`.
 */
export class ParseError extends ChartError {
  constructor(
    public readonly path: string,
    message: string
  ) {
    super('PARSE_ERROR', path ? `${path}: ${message}` : message)
    this.name = 'ParseError'
  }
}

/**
 * Speed multiplier was not a finite number above zero.
 * Playback state is left as it was.
 */
export class InvalidSpeedError extends Error {
  constructor(public readonly requested: number) {
    super(`Speed multiplier must be a finite number > 0 (got ${requested})`)
    this.name = 'InvalidSpeedError'
  }
}
