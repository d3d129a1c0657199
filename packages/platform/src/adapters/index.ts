/**
 * Platform adapters
 */

export * from './clock.adapter.ts'
