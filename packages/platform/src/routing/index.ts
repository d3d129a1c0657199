/**
 * Key expression routing
 */

export * from './key-expression.ts'
