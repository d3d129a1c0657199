/**
 * Shared foundational schemas
 *
 * Temporal value and naming primitives used by the envelope and the tag registry.
 */

export * from './message-tag.schema.ts'
export * from './timestamp.schema.ts'
export * from './type-name.schema.ts'
