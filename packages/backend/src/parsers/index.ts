/**
 * Universal chart parser
 * Auto-detects format and routes to appropriate parser
 */

import { ParseError, type Chart, type ChartFormat } from '@beatscroll/shared'
import { isNativeFormat, loadNative } from './native.js'
import { isLegacyFormat, loadLegacy } from './legacy.js'

export type DetectedFormat = ChartFormat | 'unknown'

/**
 * Detect chart format from data
 */
export function detectFormat(data: unknown): DetectedFormat {
  if (isNativeFormat(data)) return 'native'
  if (isLegacyFormat(data)) return 'legacy'
  return 'unknown'
}

/**
 * Parse chart data with automatic format detection
 */
export function parseChart(data: unknown): Chart {
  const format = detectFormat(data)

  switch (format) {
    case 'native':
      return loadNative(data)

    case 'legacy':
      return loadLegacy(data)

    default:
      throw new ParseError('', 'Unknown or unsupported chart format')
  }
}

/**
 * Parse chart file contents (JSON text)
 */
export function parseChartText(text: string): Chart {
  let data: unknown
  try {
    data = JSON.parse(text)
  } catch (err) {
    throw new ParseError('', `invalid JSON: ${err instanceof Error ? err.message : String(err)}`)
  }
  return parseChart(data)
}

// Re-export individual parsers
export { loadNative, isNativeFormat, NATIVE_FORMAT_VERSION } from './native.js'
export { loadLegacy, isLegacyFormat } from './legacy.js'
export { beatToValue } from './fields.js'
