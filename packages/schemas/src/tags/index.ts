/**
 * Tag registry
 */

export * from './tag-registry.ts'
