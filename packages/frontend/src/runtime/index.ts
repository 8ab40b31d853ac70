/**
 * Runtime input for the browser player
 */

export * from './InputHandler.js'
