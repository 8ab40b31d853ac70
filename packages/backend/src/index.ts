export * from './parsers/index.js'
export { loadConfig, type PlayerConfig } from './config.js'
export { createLogger, type LoggerOptions } from './logger.js'
export { loadChartFile } from './loader.js'
export { runHeadless, type HeadlessOptions, type HeadlessResult, type HeadlessEndReason } from './headless.js'
export { main } from './main.js'
