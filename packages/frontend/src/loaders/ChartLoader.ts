/**
 * Chart file loader for web
 * Reads a chart file picked by the user (or fetched) and parses it
 */

import type { Chart, ChartFormat } from '@beatscroll/shared'
import { parseChartText } from '@beatscroll/backend/parsers'

/**
 * Anything with a name and text contents; a File qualifies
 */
export interface ChartSource {
  name: string
  text(): Promise<string>
}

/**
 * Loaded chart with metadata
 */
export interface LoadedChart {
  format: ChartFormat
  chart: Chart
  fileName: string
}

/**
 * Load chart from file
 */
export async function loadChart(file: ChartSource): Promise<LoadedChart> {
  const text = await file.text()
  const chart = parseChartText(text)
  return {
    format: chart.metadata.format,
    chart,
    fileName: file.name,
  }
}

/**
 * Load chart from URL (for demos)
 */
export async function loadChartFromURL(url: string): Promise<LoadedChart> {
  const response = await fetch(url)
  if (!response.ok) {
    throw new Error(`Failed to fetch chart ${url}: HTTP ${response.status}`)
  }
  const text = await response.text()
  return loadChart({
    name: url.split('/').pop() || 'chart.json',
    text: async () => text,
  })
}
