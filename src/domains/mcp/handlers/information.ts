import type { Tool } from '@modelcontextprotocol/sdk/types.js'
import type { RAGService } from '@/domains/rag/rag-service.js'
import { logger } from '@/shared/logger/index.js'
import { textResponse, type ToolHandler, type ToolResponse } from '../core/types.js'

export class InformationHandler implements ToolHandler {
  constructor(private ragService: RAGService) {}

  handles(toolName: string): boolean {
    return toolName === 'get_knowledge_base_info'
  }

  async handle(): Promise<ToolResponse> {
    return this.handleKnowledgeBaseInfo()
  }

  async handleKnowledgeBaseInfo(): Promise<ToolResponse> {
    try {
      const info = this.ragService.getKnowledgeBaseInfo()
      return textResponse(JSON.stringify({ knowledge_base_info: info }, null, 2))
    } catch (error) {
      logger.error('Get knowledge base info failed', error)
      return textResponse(
        JSON.stringify(
          {
            error: 'KnowledgeBaseInfoFailed',
            message: error instanceof Error ? error.message : String(error),
          },
          null,
          2
        ),
        true
      )
    }
  }

  getTools(): Tool[] {
    return [
      {
        name: 'get_knowledge_base_info',
        description:
          'Report the state of the knowledge base: number of indexed fragments per source, vector dimension, embedding provider and model, ingestion counters and recent error counts. Use it to check whether update_knowledge_base has run before querying.',
        inputSchema: {
          type: 'object',
          properties: {},
          required: [],
        },
      },
    ]
  }
}
