import { Server } from '@modelcontextprotocol/sdk/server/index.js'
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js'
import {
  CallToolRequestSchema,
  GetPromptRequestSchema,
  ListPromptsRequestSchema,
  ListToolsRequestSchema,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js'

import type { RAGService } from '@/domains/rag/rag-service.js'
import type { ServerConfig } from '@/shared/config/config-factory.js'
import { logger } from '@/shared/logger/index.js'
import { textResponse, type ToolHandler, type ToolResponse } from '../core/types.js'
import { InformationHandler } from '../handlers/information.js'
import { KnowledgeBaseHandler } from '../handlers/knowledge-base.js'
import { QueryHandler } from '../handlers/query.js'
import { TransportFactory, type HTTPTransportContext } from '../transport/transport-factory.js'

export const SERVER_NAME = 'paper-digest-rag'
export const SERVER_VERSION = '1.0.0'

/**
 * Tool and prompt host. Every connection gets its own protocol server; all of
 * them share one RAG service and therefore one knowledge base.
 */
export class MCPServer {
  private handlers: ToolHandler[]
  private servers = new Set<Server>()
  private httpContext?: HTTPTransportContext

  constructor(
    private ragService: RAGService,
    private config: ServerConfig
  ) {
    this.handlers = [
      new KnowledgeBaseHandler(ragService),
      new QueryHandler(ragService),
      new InformationHandler(ragService),
    ]
  }

  /**
   * Protocol server with the tools and prompts registered
   */
  private createSessionServer(): Server {
    const server = new Server(
      {
        name: SERVER_NAME,
        version: SERVER_VERSION,
      },
      {
        capabilities: {
          tools: {},
          prompts: {},
        },
      }
    )

    this.setupTools(server)
    this.setupPrompts(server)
    return server
  }

  private getTools(): Tool[] {
    return this.handlers.flatMap((handler) => handler.getTools())
  }

  private getAvailableToolNames(): string[] {
    return this.getTools().map((tool) => tool.name)
  }

  private setupTools(server: Server): void {
    server.setRequestHandler(ListToolsRequestSchema, async () => {
      return { tools: this.getTools() }
    })

    server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params
      return this.callTool(name, args)
    })
  }

  async callTool(name: string, args: Record<string, unknown> | undefined): Promise<ToolResponse> {
    const handler = this.handlers.find((candidate) => candidate.handles(name))

    if (!handler) {
      logger.warn('Unknown tool requested', {
        toolName: name,
        availableTools: this.getAvailableToolNames(),
      })
      return textResponse(
        `Unknown tool '${name}'. Available tools: ${this.getAvailableToolNames().join(', ')}`,
        true
      )
    }

    try {
      return await handler.handle(name, args)
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error)
      logger.error('Tool execution failed', error, { toolName: name })
      return textResponse(`Error executing tool ${name}: ${errorMessage}`, true)
    }
  }

  private setupPrompts(server: Server): void {
    server.setRequestHandler(ListPromptsRequestSchema, async () => {
      return {
        prompts: [
          {
            name: 'rag_context',
            description: 'Answer a question using excerpts retrieved from the paper knowledge base',
            arguments: [{ name: 'question', description: 'Question to answer', required: true }],
          },
        ],
      }
    })

    server.setRequestHandler(GetPromptRequestSchema, async (request) => {
      const { name, arguments: args } = request.params

      switch (name) {
        case 'rag_context': {
          const question = args?.['question']
          if (!question) {
            throw new Error('Question is required for rag_context prompt')
          }

          const context = await this.ragService.queryRag(question)
          return {
            messages: [
              {
                role: 'user' as const,
                content: {
                  type: 'text' as const,
                  text: `Based only on the following excerpts from technical papers, answer: "${question}"\n\n**Context:**\n${context}`,
                },
              },
            ],
          }
        }
        default:
          throw new Error(`Unknown prompt: ${name}`)
      }
    })
  }

  /**
   * Serve one connection (stdio, an HTTP session, or an in-memory pair in tests)
   */
  async connect(transport: Transport): Promise<void> {
    const server = this.createSessionServer()
    server.onclose = () => {
      this.servers.delete(server)
    }
    this.servers.add(server)
    await server.connect(transport)
  }

  async start(): Promise<void> {
    TransportFactory.validateConfig(this.config.mcp)

    logger.info(`🔗 Starting MCP server with ${this.config.mcp.type} transport...`)

    const setup = await TransportFactory.createTransport(this.config.mcp, (transport) => this.connect(transport))
    if (setup.type === 'stdio') {
      await this.connect(setup.transport)
    } else {
      this.httpContext = setup.context
      await TransportFactory.startHTTPServer(setup.context, this.config.mcp)
    }

    logger.info(`🎯 MCP Server started and ready for ${this.config.mcp.type} connections`, {
      transport: this.config.mcp.type,
      port: this.config.mcp.port,
      host: this.config.mcp.host,
    })
  }

  async shutdown(): Promise<void> {
    logger.info('🔄 Shutting down MCP Server...')

    try {
      await Promise.all([...this.servers].map((server) => server.close()))
      if (this.httpContext) {
        await this.httpContext.app.close()
      }
      logger.info('✅ MCP Server shutdown completed successfully')
    } catch (error) {
      logger.error('Error during MCP server shutdown', error)
      throw error
    }
  }
}
