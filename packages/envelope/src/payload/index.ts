export * from './payload.codec.ts'
export * from './tagged.codec.ts'
