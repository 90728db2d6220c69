/**
 * Transport Factory for MCP Server
 * Creates appropriate transport instances based on configuration
 */

import { randomUUID } from 'node:crypto'
import cors from '@fastify/cors'
import fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest } from 'fastify'
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js'
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js'
import { isInitializeRequest } from '@modelcontextprotocol/sdk/types.js'
import type { MCPTransportConfig } from '@/shared/config/config-factory.js'
import { ConfigurationError } from '@/shared/errors/index.js'
import { logger } from '@/shared/logger/index.js'

/**
 * Connects a freshly opened session transport to its own protocol server
 */
export type SessionConnector = (transport: StreamableHTTPServerTransport) => Promise<void>

export interface HTTPTransportContext {
  app: FastifyInstance
  transports: Map<string, StreamableHTTPServerTransport>
}

export type TransportSetup =
  | { type: 'stdio'; transport: StdioServerTransport }
  | { type: 'streamable-http'; context: HTTPTransportContext }

function jsonRpcError(code: number, message: string) {
  return { jsonrpc: '2.0', error: { code, message }, id: null }
}

function sessionIdOf(request: FastifyRequest): string | undefined {
  const header = request.headers['mcp-session-id']
  return typeof header === 'string' ? header : undefined
}

export class TransportFactory {
  /**
   * Create transport instance based on configuration
   */
  static async createTransport(config: MCPTransportConfig, connectSession: SessionConnector): Promise<TransportSetup> {
    switch (config.type) {
      case 'stdio':
        return { type: 'stdio', transport: new StdioServerTransport() }

      case 'streamable-http':
        return {
          type: 'streamable-http',
          context: await TransportFactory.createStreamableHTTPApp(config, connectSession),
        }
    }
  }

  /**
   * Fastify app serving one Streamable HTTP transport per MCP session
   */
  static async createStreamableHTTPApp(
    config: MCPTransportConfig,
    connectSession: SessionConnector
  ): Promise<HTTPTransportContext> {
    const app = fastify({
      logger: false, // Use our own logger
      trustProxy: true,
      connectionTimeout: 120000,
      keepAliveTimeout: 65000,
      // Ingestion embeds every fragment before answering
      requestTimeout: 300000,
    })

    if (config.enableCors) {
      await app.register(cors, {
        origin: config.allowedOrigins.includes('*') ? true : config.allowedOrigins,
        exposedHeaders: ['Mcp-Session-Id'],
        allowedHeaders: ['Content-Type', 'mcp-session-id'],
        credentials: true,
      })
    }

    const transports = new Map<string, StreamableHTTPServerTransport>()

    const openSession = async (): Promise<StreamableHTTPServerTransport> => {
      const transport = new StreamableHTTPServerTransport({
        sessionIdGenerator: () => randomUUID(),
        onsessioninitialized: (sessionId) => {
          transports.set(sessionId, transport)
          logger.debug('MCP session initialized', { sessionId, activeSessions: transports.size })
        },
      })

      transport.onclose = () => {
        const { sessionId } = transport
        if (sessionId && transports.delete(sessionId)) {
          logger.debug('MCP session closed', { sessionId, activeSessions: transports.size })
        }
      }

      await connectSession(transport)
      return transport
    }

    const forward = async (
      transport: StreamableHTTPServerTransport,
      request: FastifyRequest,
      reply: FastifyReply,
      body?: unknown
    ): Promise<void> => {
      reply.hijack()
      try {
        await transport.handleRequest(request.raw, reply.raw, body)
      } catch (error) {
        logger.error(`Error handling MCP ${request.method} request`, error)
        if (!reply.raw.headersSent) {
          reply.raw.writeHead(500, { 'Content-Type': 'application/json' })
          reply.raw.end(JSON.stringify(jsonRpcError(-32603, 'Internal server error')))
        }
      }
    }

    // Client-to-server messages; an initialize request without a session opens a new one
    app.post('/mcp', async (request, reply) => {
      const sessionId = sessionIdOf(request)

      if (sessionId === undefined) {
        if (!isInitializeRequest(request.body)) {
          return reply.code(400).send(jsonRpcError(-32000, 'Bad Request: No valid session ID provided'))
        }
        await forward(await openSession(), request, reply, request.body)
        return
      }

      const transport = transports.get(sessionId)
      if (!transport) {
        return reply.code(404).send(jsonRpcError(-32001, 'Session not found'))
      }
      await forward(transport, request, reply, request.body)
    })

    // GET opens the server-to-client stream, DELETE ends the session
    for (const method of ['GET', 'DELETE'] as const) {
      app.route({
        method,
        url: '/mcp',
        handler: async (request, reply) => {
          const sessionId = sessionIdOf(request)
          const transport = sessionId === undefined ? undefined : transports.get(sessionId)
          if (!transport) {
            return reply.code(sessionId === undefined ? 400 : 404).send(
              jsonRpcError(-32000, 'Invalid or missing session ID')
            )
          }
          await forward(transport, request, reply)
        },
      })
    }

    // Health check endpoint
    app.get('/health', async () => {
      return {
        status: 'healthy',
        transport: 'streamable-http',
        activeSessions: transports.size,
        uptime: process.uptime(),
      }
    })

    return { app, transports }
  }

  /**
   * Start HTTP server for HTTP-based transports
   */
  static async startHTTPServer(context: HTTPTransportContext, config: MCPTransportConfig): Promise<void> {
    try {
      await context.app.listen({
        port: config.port,
        host: config.host,
      })

      logger.info(`🚀 MCP ${config.type} server listening`, {
        port: config.port,
        host: config.host,
        cors: config.enableCors,
      })
    } catch (error) {
      logger.error('Failed to start HTTP server', error)
      throw error
    }
  }

  /**
   * Validate transport configuration
   */
  static validateConfig(config: MCPTransportConfig): void {
    const errors: string[] = []

    if (config.type !== 'stdio') {
      if (!Number.isInteger(config.port) || config.port < 1 || config.port > 65535) {
        errors.push('Port must be between 1 and 65535 for HTTP transports')
      }

      if (!config.host) {
        errors.push('Host is required for HTTP transports')
      }
    }

    if (errors.length > 0) {
      throw new ConfigurationError(
        `Transport configuration validation failed:\n${errors.join('\n')}`,
        'mcp',
        errors
      )
    }
  }
}
