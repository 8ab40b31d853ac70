export * from './math/easing.js'
export * from './math/util.js'
export * from './math/tempo.js'
export * from './math/tracks.js'
export * from './types/chart.js'
export * from './types/runtime.js'
export * from './chart/createChart.js'
export * from './runtime/PlaybackSession.js'
export * from './runtime/FrameSampler.js'
export * from './runtime/commands.js'
export * from './constants.js'
export * from './errors.js'
