import type { Tool } from '@modelcontextprotocol/sdk/types.js'
import { z } from 'zod'
import { DEFAULT_MAX_PAPERS, DEFAULT_SOURCES, type RAGService } from '@/domains/rag/rag-service.js'
import { logger } from '@/shared/logger/index.js'
import { textResponse, type ToolHandler, type ToolResponse } from '../core/types.js'
import { parseToolArgs } from '../core/validation.js'

export const UpdateKnowledgeBaseArgsSchema = z.object({
  topic: z.string().trim().min(1, 'topic is required'),
  max_papers: z.number().int().min(1).max(1000).default(DEFAULT_MAX_PAPERS),
  sources: z.string().default(DEFAULT_SOURCES),
})

export type UpdateKnowledgeBaseArgs = z.infer<typeof UpdateKnowledgeBaseArgsSchema>

export class KnowledgeBaseHandler implements ToolHandler {
  constructor(private ragService: RAGService) {}

  handles(toolName: string): boolean {
    return toolName === 'update_knowledge_base'
  }

  async handle(toolName: string, args: Record<string, unknown> | undefined): Promise<ToolResponse> {
    const parsed = parseToolArgs(UpdateKnowledgeBaseArgsSchema, args, toolName)
    if (!parsed.success) {
      logger.warn('Rejected update_knowledge_base arguments', { reason: parsed.message })
      return textResponse(parsed.message, true)
    }
    return this.handleUpdate(parsed.data)
  }

  async handleUpdate(args: UpdateKnowledgeBaseArgs): Promise<ToolResponse> {
    const report = await this.ragService.updateKnowledgeBase(args.topic, args.max_papers, args.sources)
    return textResponse(report.message, report.status === 'failed')
  }

  getTools(): Tool[] {
    return [
      {
        name: 'update_knowledge_base',
        description:
          'Search technical paper sources (arXiv, Semantic Scholar) for a topic and add the papers found to the in-memory knowledge base. Call this before query_rag. Returns a status message with the number of papers indexed.',
        inputSchema: {
          type: 'object',
          properties: {
            topic: {
              type: 'string',
              description: 'Research topic or search query, e.g. "retrieval augmented generation"',
            },
            max_papers: {
              type: 'integer',
              description: 'Total number of papers to fetch, split evenly across the sources',
              default: DEFAULT_MAX_PAPERS,
              minimum: 1,
            },
            sources: {
              type: 'string',
              description: 'Comma-separated source ids: arxiv, semantic_scholar',
              default: DEFAULT_SOURCES,
            },
          },
          required: ['topic'],
        },
      },
    ]
  }
}
