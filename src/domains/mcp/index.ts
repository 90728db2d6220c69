// MCP Domain Exports
export * from './server/server.js'
export * from './handlers/knowledge-base.js'
export * from './handlers/query.js'
export * from './handlers/information.js'
export * from './transport/transport-factory.js'
export * from './core/types.js'
