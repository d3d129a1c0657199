/**
 * Configuration-driven layers
 */

export * from './tag-registry.layer.ts'
