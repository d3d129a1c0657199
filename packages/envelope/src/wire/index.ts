export * from './envelope.wire.ts'
