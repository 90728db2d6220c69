/**
 * Structured error classes
 * Every failure the pipeline can report carries an ErrorCode so that retry
 * decisions and user-facing messages never depend on message sniffing alone.
 */

export enum ErrorCode {
  // Paper sources
  SOURCE_ERROR = 'SOURCE_ERROR',
  SOURCE_PARSE_ERROR = 'SOURCE_PARSE_ERROR',

  // Embedding / vector index
  EMBEDDING_ERROR = 'EMBEDDING_ERROR',
  VECTOR_STORE_ERROR = 'VECTOR_STORE_ERROR',
  DIMENSION_MISMATCH = 'DIMENSION_MISMATCH',

  // Network/Service Errors
  CONNECTION_ERROR = 'CONNECTION_ERROR',
  TIMEOUT_ERROR = 'TIMEOUT_ERROR',
  RATE_LIMIT_ERROR = 'RATE_LIMIT_ERROR',
  QUOTA_EXCEEDED = 'QUOTA_EXCEEDED',
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',
  AUTHENTICATION_ERROR = 'AUTHENTICATION_ERROR',
  RETRY_EXHAUSTED = 'RETRY_EXHAUSTED',

  // Delivery / generation outside the core
  GENERATION_ERROR = 'GENERATION_ERROR',
  DELIVERY_ERROR = 'DELIVERY_ERROR',

  // Configuration Errors
  CONFIG_ERROR = 'CONFIG_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',

  // Generic Errors
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

export type ErrorSeverity = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL'

export interface ErrorContext {
  operation?: string
  component?: string
  query?: string
  provider?: string
  sourceId?: string
  timestamp?: Date
  [key: string]: unknown
}

const TRANSIENT_CODES: readonly ErrorCode[] = [
  ErrorCode.CONNECTION_ERROR,
  ErrorCode.TIMEOUT_ERROR,
  ErrorCode.RATE_LIMIT_ERROR,
  ErrorCode.QUOTA_EXCEEDED,
  ErrorCode.SERVICE_UNAVAILABLE,
]

/**
 * Base structured error class
 */
export class StructuredError extends Error {
  public readonly code: ErrorCode
  public readonly severity: ErrorSeverity
  public readonly context: ErrorContext
  public readonly isOperational: boolean
  public readonly timestamp: Date
  public override readonly cause?: unknown

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    severity: ErrorSeverity = 'HIGH',
    context: ErrorContext = {},
    cause?: unknown
  ) {
    super(message)
    this.name = 'StructuredError'
    this.code = code
    this.severity = severity
    this.context = { ...context, timestamp: new Date() }
    this.isOperational = true
    this.timestamp = new Date()
    this.cause = cause

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target)
    }
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.severity,
      context: this.context,
      isOperational: this.isOperational,
      timestamp: this.timestamp,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
      stack: this.stack || undefined,
    }
  }
}

/**
 * A paper source could not be queried or its response could not be read
 */
export class SourceError extends StructuredError {
  constructor(
    message: string,
    sourceId: string,
    code: ErrorCode = ErrorCode.SOURCE_ERROR,
    originalError?: unknown
  ) {
    super(
      message,
      code,
      'MEDIUM',
      { sourceId, originalError: ErrorUtils.describe(originalError) },
      originalError
    )
    this.name = 'SourceError'
  }
}

/**
 * Embedding provider failures. The code decides whether a retry makes sense.
 */
export class EmbeddingError extends StructuredError {
  constructor(
    message: string,
    provider: string,
    code: ErrorCode = ErrorCode.EMBEDDING_ERROR,
    originalError?: unknown,
    context: ErrorContext = {}
  ) {
    super(
      message,
      code,
      'HIGH',
      { ...context, provider, originalError: ErrorUtils.describe(originalError) },
      originalError
    )
    this.name = 'EmbeddingError'
  }
}

/**
 * Chat model failures in the agent client
 */
export class GenerationError extends StructuredError {
  constructor(
    message: string,
    provider: string,
    code: ErrorCode = ErrorCode.GENERATION_ERROR,
    originalError?: unknown
  ) {
    super(
      message,
      code,
      'HIGH',
      { provider, originalError: ErrorUtils.describe(originalError) },
      originalError
    )
    this.name = 'GenerationError'
  }
}

/**
 * Vector index errors
 */
export class VectorStoreError extends StructuredError {
  constructor(
    message: string,
    operation: string,
    code: ErrorCode = ErrorCode.VECTOR_STORE_ERROR,
    context: ErrorContext = {}
  ) {
    super(message, code, 'HIGH', { ...context, operation })
    this.name = 'VectorStoreError'
  }
}

/**
 * Timeout errors
 */
export class TimeoutError extends StructuredError {
  constructor(operation: string, timeoutMs: number, context: ErrorContext = {}) {
    super(
      `Operation '${operation}' timed out after ${timeoutMs}ms`,
      ErrorCode.TIMEOUT_ERROR,
      'MEDIUM',
      { ...context, operation, timeoutMs }
    )
    this.name = 'TimeoutError'
  }
}

/**
 * Raised by the retry wrapper once every attempt failed on a retryable error
 */
export class RetryExhaustedError extends StructuredError {
  public readonly attempts: number
  public readonly lastError: unknown

  constructor(operation: string, attempts: number, lastError: unknown) {
    super(
      `Operation '${operation}' failed after ${attempts} attempts: ${ErrorUtils.describe(lastError)}`,
      ErrorCode.RETRY_EXHAUSTED,
      'HIGH',
      { operation, attempts },
      lastError
    )
    this.name = 'RetryExhaustedError'
    this.attempts = attempts
    this.lastError = lastError
  }
}

/**
 * Configuration related errors
 */
export class ConfigurationError extends StructuredError {
  public readonly problems: string[]

  constructor(message: string, configKey: string, problems: string[] = []) {
    super(message, ErrorCode.CONFIG_ERROR, 'CRITICAL', { configKey, problems })
    this.name = 'ConfigurationError'
    this.problems = problems
  }
}

/**
 * Error utility functions
 */
export class ErrorUtils {
  /**
   * Whether an error is worth retrying
   */
  static isRetryable(error: unknown): boolean {
    if (error instanceof StructuredError) {
      return TRANSIENT_CODES.includes(error.code)
    }

    if (!(error instanceof Error)) {
      return false
    }

    // For general errors, judge based on message
    const retryableMessages = [
      'rate limit',
      '429',
      'quota',
      'timeout',
      'timed out',
      'service unavailable',
      'connection',
      'econnrefused',
      'econnreset',
      'socket hang up',
      'network',
    ]

    const message = error.message.toLowerCase()
    return retryableMessages.some((msg) => message.includes(msg))
  }

  /**
   * Rate-limit or quota failures, including one wrapped by the retry wrapper
   */
  static isRateLimit(error: unknown): boolean {
    const target = error instanceof RetryExhaustedError ? error.lastError : error
    if (target instanceof StructuredError) {
      return target.code === ErrorCode.RATE_LIMIT_ERROR || target.code === ErrorCode.QUOTA_EXCEEDED
    }
    if (target instanceof Error) {
      const message = target.message.toLowerCase()
      return message.includes('rate limit') || message.includes('429') || message.includes('quota')
    }
    return false
  }

  /**
   * Message of any thrown value
   */
  static describe(error: unknown): string | undefined {
    if (error === undefined || error === null) {
      return undefined
    }
    if (error instanceof Error) {
      return error.message
    }
    return String(error)
  }

  /**
   * Normalize any thrown value into an Error
   */
  static toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error))
  }

  /**
   * Remove sensitive information from error
   */
  static sanitize(error: StructuredError): ReturnType<StructuredError['toJSON']> {
    const sanitized = error.toJSON()
    const context = { ...sanitized.context }

    delete context['apiKey']
    delete context['password']
    delete context['token']
    delete context['secret']

    return { ...sanitized, context }
  }
}
