export * from './proto-root.ts'
