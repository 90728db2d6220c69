import type { Tool } from '@modelcontextprotocol/sdk/types.js'
import { z } from 'zod'
import type { RAGService } from '@/domains/rag/rag-service.js'
import { textResponse, type ToolHandler, type ToolResponse } from '../core/types.js'
import { parseToolArgs } from '../core/validation.js'

export const QueryRagArgsSchema = z.object({
  question: z.string(),
})

export class QueryHandler implements ToolHandler {
  constructor(private ragService: RAGService) {}

  handles(toolName: string): boolean {
    return toolName === 'query_rag'
  }

  async handle(toolName: string, args: Record<string, unknown> | undefined): Promise<ToolResponse> {
    const parsed = parseToolArgs(QueryRagArgsSchema, args, toolName)
    if (!parsed.success) {
      return textResponse(parsed.message, true)
    }
    return textResponse(await this.ragService.queryRag(parsed.data.question))
  }

  getTools(): Tool[] {
    return [
      {
        name: 'query_rag',
        description:
          'Retrieve the knowledge-base excerpts most relevant to a question. Each excerpt starts with its SOURCE, TITLE, DATE and LINK. Excerpts are separated by "---" lines, most relevant first. Use update_knowledge_base first when the knowledge base is empty.',
        inputSchema: {
          type: 'object',
          properties: {
            question: {
              type: 'string',
              description: 'Natural language question to search the knowledge base for',
            },
          },
          required: ['question'],
        },
      },
    ]
  }
}
