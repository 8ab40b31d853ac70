/**
 * Renderer module exports
 */

export * from './PixiRenderer.js'
export * from './types.js'
export * from './layout.js'
export * from './layers/LaneLayer.js'
export * from './layers/NoteLayer.js'
export * from './layers/UILayer.js'
