import { readFile } from 'node:fs/promises'
import type { Chart } from '@beatscroll/shared'
import type { Logger } from 'pino'
import { parseChartText } from './parsers/index.js'

/**
 * Read and parse a chart file, logging a one-line summary
 */
export async function loadChartFile(path: string, logger: Logger): Promise<Chart> {
  const text = await readFile(path, 'utf8')
  const chart = parseChartText(text)

  logger.info({
    path,
    format: chart.metadata.format,
    title: chart.metadata.title,
    notes: chart.notes.length,
    lanes: chart.metadata.laneCount,
    tempoEvents: chart.tempo.events.length,
    duration: chart.duration
  }, 'chart loaded')

  return chart
}
