/**
 * Main entry point for test utilities
 */
export * from './types.js'
export * from './ports.js'
export * from './compression.js'
export * from './target-servers.js'
export * from './launchers.js'
