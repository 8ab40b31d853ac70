/**
 * Command-line entry: load a chart and play it headlessly
 */

import { loadConfig, type PlayerConfig } from './config.js'
import { createLogger } from './logger.js'
import { loadChartFile } from './loader.js'
import { runHeadless } from './headless.js'

type Env = Record<string, string | undefined>

const USAGE = 'usage: beatscroll-player <chart.json>'

/**
 * Returns the process exit code
 */
export async function main(argv: string[], env: Env = process.env): Promise<number> {
  const [chartPath] = argv
  if (!chartPath) {
    console.error(USAGE)
    return 1
  }

  let config: PlayerConfig
  try {
    config = loadConfig(env)
  } catch (err) {
    console.error(err instanceof Error ? err.message : err)
    return 1
  }

  const logger = createLogger({ level: config.logLevel, pretty: config.logPretty })

  try {
    const chart = await loadChartFile(chartPath, logger)
    runHeadless(chart, {
      fps: config.fps,
      speed: config.speed,
      endBehavior: config.endBehavior,
      maxSeconds: config.maxSeconds,
      logEvery: config.logEvery,
      sampler: {
        lookaheadBeats: config.lookaheadBeats,
        lookbehindBeats: config.lookbehindBeats,
        easing: config.easing,
      },
    }, logger)
    return 0
  } catch (err) {
    logger.error({ err, path: chartPath }, 'failed to play chart')
    return 1
  }
}
