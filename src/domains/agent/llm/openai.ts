import OpenAI, { APIConnectionError, APIConnectionTimeoutError, APIError, RateLimitError } from 'openai'
import { ErrorCode, GenerationError } from '@/shared/errors/index.js'
import { statusToErrorCode } from '@/shared/http/client.js'
import { BaseChatModel } from './base.js'

/**
 * The part of the OpenAI SDK this model calls
 */
export interface OpenAIChatApi {
  chat: {
    completions: {
      create(params: {
        model: string
        temperature: number
        messages: Array<{ role: 'user'; content: string }>
      }): Promise<{ choices: Array<{ message: { content: string | null } }> }>
    }
  }
}

export interface OpenAIChatOptions {
  apiKey?: string
  model: string
  temperature: number
  timeoutMs?: number
}

export class OpenAIChatModel extends BaseChatModel {
  readonly name = 'openai'
  readonly model: string
  private client: OpenAIChatApi
  private temperature: number

  constructor(options: OpenAIChatOptions, client?: OpenAIChatApi) {
    super()
    this.model = options.model
    this.temperature = options.temperature
    if (client) {
      this.client = client
    } else {
      if (!options.apiKey) {
        throw new GenerationError('OPENAI_API_KEY is required for the OpenAI chat model', 'openai', ErrorCode.CONFIG_ERROR)
      }
      this.client = new OpenAI({ apiKey: options.apiKey, timeout: options.timeoutMs, maxRetries: 0 })
    }
  }

  async invoke(prompt: string): Promise<string> {
    let response: Awaited<ReturnType<OpenAIChatApi['chat']['completions']['create']>>
    try {
      response = await this.client.chat.completions.create({
        model: this.model,
        temperature: this.temperature,
        messages: [{ role: 'user', content: prompt }],
      })
    } catch (error) {
      throw this.toGenerationError(error)
    }

    const content = response.choices[0]?.message.content?.trim()
    if (!content) {
      throw this.emptyResponse()
    }
    return content
  }

  protected override classify(error: unknown): ErrorCode {
    if (error instanceof RateLimitError) {
      return error.code === 'insufficient_quota' ? ErrorCode.QUOTA_EXCEEDED : ErrorCode.RATE_LIMIT_ERROR
    }
    if (error instanceof APIConnectionTimeoutError) return ErrorCode.TIMEOUT_ERROR
    if (error instanceof APIConnectionError) return ErrorCode.CONNECTION_ERROR
    if (error instanceof APIError && error.status !== undefined) {
      return statusToErrorCode(error.status)
    }
    return super.classify(error)
  }
}
