import { ErrorCode, ErrorUtils, GenerationError, StructuredError } from '@/shared/errors/index.js'
import type { ChatModel } from './types.js'

const TRANSIENT_GENERATION_CODES: readonly ErrorCode[] = [
  ErrorCode.RATE_LIMIT_ERROR,
  ErrorCode.QUOTA_EXCEEDED,
  ErrorCode.CONNECTION_ERROR,
  ErrorCode.TIMEOUT_ERROR,
  ErrorCode.SERVICE_UNAVAILABLE,
]

export abstract class BaseChatModel implements ChatModel {
  abstract readonly name: string
  abstract readonly model: string

  abstract invoke(prompt: string): Promise<string>

  isTransientError(error: unknown): boolean {
    if (error instanceof StructuredError) {
      return TRANSIENT_GENERATION_CODES.includes(error.code)
    }
    return ErrorUtils.isRetryable(error)
  }

  protected toGenerationError(error: unknown): GenerationError {
    if (error instanceof GenerationError) {
      return error
    }
    const code = error instanceof StructuredError ? error.code : this.classify(error)
    return new GenerationError(`${this.name} generation failed: ${ErrorUtils.describe(error)}`, this.name, code, error)
  }

  protected classify(error: unknown): ErrorCode {
    if (ErrorUtils.isRateLimit(error)) return ErrorCode.RATE_LIMIT_ERROR
    if (ErrorUtils.isRetryable(error)) return ErrorCode.CONNECTION_ERROR
    return ErrorCode.GENERATION_ERROR
  }

  protected emptyResponse(): GenerationError {
    return new GenerationError(`Empty response from ${this.name}`, this.name, ErrorCode.GENERATION_ERROR)
  }
}
