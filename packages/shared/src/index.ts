export * from './types.js'
export * from './ir.js'
export { configSchema, irDocumentSchema } from './schema.js'
