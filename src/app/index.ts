#!/usr/bin/env node
/**
 * Paper Digest RAG MCP Server Entry Point
 */

import 'dotenv/config'
import { MCPServer } from '@/domains/mcp/server/server.js'
import { createRAGService, type RAGServiceOverrides } from '@/domains/rag/index.js'
import { ConfigFactory, type ServerConfig } from '@/shared/config/config-factory.js'
import { logger } from '@/shared/logger/index.js'

/**
 * Build the pipeline and the MCP server around it
 */
export function initializeServices(config: ServerConfig, overrides: RAGServiceOverrides = {}): MCPServer {
  const ragService = createRAGService(config, overrides)

  logger.info('✅ RAG pipeline ready', {
    embeddingProvider: config.embedding.provider,
    chunkingStrategy: config.chunkingStrategy,
    chunkSize: config.chunkSize,
    chunkOverlap: config.chunkOverlap,
    similarityTopK: config.similarityTopK,
    deduplicateFragments: config.deduplicateFragments,
  })

  return new MCPServer(ragService, config)
}

export async function main(): Promise<void> {
  let mcpServer: MCPServer | null = null

  try {
    const config = ConfigFactory.getCurrentConfig()
    logger.setLevel(config.logLevel)
    ConfigFactory.validateConfig(config)

    logger.info('🎯 Starting Paper Digest RAG MCP Server', {
      version: '1.0.0',
      logLevel: logger.level,
      transport: config.mcp.type,
      port: config.mcp.port,
      host: config.mcp.host,
      nodeVersion: process.version,
      pid: process.pid,
    })

    const server = initializeServices(config)
    mcpServer = server

    const gracefulShutdown = async (signal: string, exitCode = 0) => {
      logger.info(`Received ${signal}, starting graceful shutdown...`)
      try {
        await server.shutdown()
      } catch (error) {
        logger.error('Error during MCP server shutdown', error)
      }
      process.exit(exitCode)
    }

    process.on('SIGINT', () => void gracefulShutdown('SIGINT'))
    process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'))

    process.on('uncaughtException', (error) => {
      logger.fatal('Uncaught exception', error)
      void gracefulShutdown('UNCAUGHT_EXCEPTION', 1)
    })

    process.on('unhandledRejection', (reason) => {
      logger.fatal('Unhandled promise rejection', reason)
      void gracefulShutdown('UNHANDLED_REJECTION', 1)
    })

    await server.start()
  } catch (error) {
    logger.fatal('Failed to start Paper Digest RAG MCP Server', error)

    if (mcpServer) {
      try {
        await mcpServer.shutdown()
      } catch (shutdownError) {
        logger.error('Error during emergency shutdown', shutdownError)
      }
    }

    process.exit(1)
  }
}

if (require.main === module) {
  void main()
}
