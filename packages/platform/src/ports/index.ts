/**
 * Platform ports
 */

export * from './clock.port.ts'
