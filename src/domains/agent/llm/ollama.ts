import { z } from 'zod'
import { ErrorCode, GenerationError } from '@/shared/errors/index.js'
import { defaultFetch, requestJson, type HttpFetch } from '@/shared/http/client.js'
import { BaseChatModel } from './base.js'

const ChatResponseSchema = z.object({
  message: z.object({ content: z.string() }),
})

// Reasoning models (deepseek-r1) prepend their chain of thought
const THINK_BLOCK = /<think>[\s\S]*?<\/think>/g

export interface OllamaChatOptions {
  baseUrl: string
  model: string
  temperature: number
  timeoutMs?: number
}

export class OllamaChatModel extends BaseChatModel {
  readonly name = 'ollama'
  readonly model: string
  private baseUrl: string

  constructor(
    private options: OllamaChatOptions,
    private httpFetch: HttpFetch = defaultFetch
  ) {
    super()
    this.baseUrl = options.baseUrl.replace(/\/+$/, '')
    this.model = options.model
  }

  async invoke(prompt: string): Promise<string> {
    let payload: unknown
    try {
      payload = await requestJson(this.httpFetch, `${this.baseUrl}/api/chat`, {
        body: {
          model: this.model,
          messages: [{ role: 'user', content: prompt }],
          stream: false,
          options: { temperature: this.options.temperature },
        },
        timeout: this.options.timeoutMs,
      })
    } catch (error) {
      throw this.toGenerationError(error)
    }

    const parsed = ChatResponseSchema.safeParse(payload)
    if (!parsed.success) {
      throw new GenerationError('Unexpected Ollama response format', this.name, ErrorCode.GENERATION_ERROR, parsed.error)
    }

    const text = parsed.data.message.content.replace(THINK_BLOCK, '').trim()
    if (!text) {
      throw this.emptyResponse()
    }
    return text
  }
}
