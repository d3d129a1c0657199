/**
 * Envelope schemas
 */

export * from './envelope.schema.ts'
