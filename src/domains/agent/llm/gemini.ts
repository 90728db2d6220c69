import { z } from 'zod'
import { ErrorCode, GenerationError } from '@/shared/errors/index.js'
import { defaultFetch, requestJson, type HttpFetch } from '@/shared/http/client.js'
import { BaseChatModel } from './base.js'

const GEMINI_API_BASE = 'https://generativelanguage.googleapis.com/v1beta'

const GenerateContentResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).default([]),
          })
          .optional(),
      })
    )
    .default([]),
})

export interface GeminiChatOptions {
  apiKey?: string
  model: string
  temperature: number
  timeoutMs?: number
}

/**
 * Gemini generateContent over REST
 */
export class GeminiChatModel extends BaseChatModel {
  readonly name = 'gemini'
  readonly model: string
  private apiKey: string

  constructor(
    private options: GeminiChatOptions,
    private httpFetch: HttpFetch = defaultFetch
  ) {
    super()
    if (!options.apiKey) {
      throw new GenerationError('GOOGLE_API_KEY is required for the Gemini chat model', 'gemini', ErrorCode.CONFIG_ERROR)
    }
    this.apiKey = options.apiKey
    this.model = options.model.replace(/^models\//, '')
  }

  async invoke(prompt: string): Promise<string> {
    let payload: unknown
    try {
      payload = await requestJson(this.httpFetch, `${GEMINI_API_BASE}/models/${this.model}:generateContent`, {
        body: {
          contents: [{ parts: [{ text: prompt }] }],
          generationConfig: { temperature: this.options.temperature },
        },
        headers: { 'x-goog-api-key': this.apiKey },
        timeout: this.options.timeoutMs,
      })
    } catch (error) {
      throw this.toGenerationError(error)
    }

    const parsed = GenerateContentResponseSchema.safeParse(payload)
    if (!parsed.success) {
      throw new GenerationError('Unexpected Gemini response format', this.name, ErrorCode.GENERATION_ERROR, parsed.error)
    }

    const text = (parsed.data.candidates[0]?.content?.parts ?? [])
      .map((part) => part.text ?? '')
      .join('')
      .trim()
    if (!text) {
      throw this.emptyResponse()
    }
    return text
  }
}
