/**
 * Envelope codec: seal opaque payloads with a timestamp and recover them on arrival
 */

export * from './codec/index.ts'
export * from './wire/index.ts'
