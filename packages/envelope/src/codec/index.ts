export * from './envelope.codec.ts'
