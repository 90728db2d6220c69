/**
 * Structured logging system
 * Pino-based logger. Output always goes to stderr: with the stdio MCP
 * transport, stdout carries the protocol.
 */

import pino, { type Logger as PinoLogger, type StreamEntry, type Level } from 'pino'
import pretty from 'pino-pretty'
import { join } from 'path'
import { ErrorCode, StructuredError, ErrorUtils } from '@/shared/errors/index.js'

export interface LogContext {
  component?: string
  operation?: string
  query?: string
  provider?: string
  sourceId?: string
  duration?: number
  [key: string]: unknown
}

export enum LogLevel {
  TRACE = 'trace',
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  FATAL = 'fatal',
  SILENT = 'silent',
}

export interface ErrorMetric {
  code: ErrorCode
  count: number
  lastOccurred: Date
}

const SERVICE_NAME = 'paper-digest-rag'

function resolveLevel(nodeEnv: string): string {
  if (process.env['LOG_LEVEL']) {
    return process.env['LOG_LEVEL']
  }
  if (nodeEnv === 'test') {
    return LogLevel.SILENT
  }
  return nodeEnv === 'production' ? LogLevel.INFO : LogLevel.DEBUG
}

function buildStreams(nodeEnv: string): StreamEntry[] {
  const level: Level = 'trace'
  const streams: StreamEntry[] = []

  if (nodeEnv === 'development') {
    streams.push({
      level,
      stream: pretty({
        destination: 2,
        colorize: true,
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
        sync: true,
      }),
    })
  } else {
    streams.push({ level, stream: pino.destination({ dest: 2, sync: true }) })
  }

  const logDir = process.env['LOG_DIR']
  if (logDir) {
    streams.push({
      level,
      stream: pino.destination({ dest: join(logDir, `${SERVICE_NAME}.log`), mkdir: true, sync: false }),
    })
    streams.push({
      level: 'error',
      stream: pino.destination({
        dest: join(logDir, `${SERVICE_NAME}-error.log`),
        mkdir: true,
        sync: false,
      }),
    })
  }

  return streams
}

/**
 * Centralized logger class
 */
export class Logger {
  private static instance: Logger
  private pino: PinoLogger
  private errorMetrics: Map<ErrorCode, number> = new Map()
  private lastErrorTime: Map<ErrorCode, Date> = new Map()

  private constructor() {
    const nodeEnv = process.env['NODE_ENV'] || 'development'

    this.pino = pino(
      {
        level: resolveLevel(nodeEnv),
        timestamp: pino.stdTimeFunctions.isoTime,
        base: {
          pid: process.pid,
          service: SERVICE_NAME,
          version: process.env['npm_package_version'] || '1.0.0',
        },
      },
      pino.multistream(buildStreams(nodeEnv))
    )
  }

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger()
    }
    return Logger.instance
  }

  info(message: string, context: LogContext = {}) {
    this.pino.info({ ...context }, message)
  }

  debug(message: string, context: LogContext = {}) {
    this.pino.debug({ ...context }, message)
  }

  warn(message: string, context: LogContext = {}) {
    this.pino.warn({ ...context }, message)
  }

  /**
   * Error log (supports structured errors)
   */
  error(message: string, error?: unknown, context: LogContext = {}) {
    this.pino.error(this.errorPayload(error, context, true), message)
  }

  fatal(message: string, error?: unknown, context: LogContext = {}) {
    this.pino.fatal(this.errorPayload(error, context, false), message)
  }

  /**
   * Start performance measurement; the returned callback logs and returns the duration
   */
  startTiming(operation: string, context: LogContext = {}): () => number {
    const startTime = Date.now()
    this.debug(`Starting operation: ${operation}`, { ...context, operation })

    return () => {
      const duration = Date.now() - startTime
      this.info(`Completed operation: ${operation}`, { ...context, operation, duration })
      return duration
    }
  }

  /**
   * Business event log
   */
  event(event: string, context: LogContext = {}) {
    this.pino.info({ ...context, type: 'business_event', event }, `Business event: ${event}`)
  }

  getErrorMetrics(): ErrorMetric[] {
    const metrics: ErrorMetric[] = []

    for (const [code, count] of this.errorMetrics.entries()) {
      const lastOccurred = this.lastErrorTime.get(code)
      if (!lastOccurred) {
        continue
      }
      metrics.push({ code, count, lastOccurred })
    }

    return metrics.sort((a, b) => b.count - a.count)
  }

  setLevel(level: LogLevel) {
    this.pino.level = level
  }

  get level(): string {
    return this.pino.level
  }

  resetMetrics() {
    this.errorMetrics.clear()
    this.lastErrorTime.clear()
  }

  private errorPayload(error: unknown, context: LogContext, track: boolean): Record<string, unknown> {
    const payload: Record<string, unknown> = { ...context }
    if (error === undefined) {
      return payload
    }

    if (error instanceof StructuredError) {
      payload['error'] = ErrorUtils.sanitize(error)
      payload['errorCode'] = error.code
      payload['isOperational'] = error.isOperational
      if (track) this.updateErrorMetrics(error.code)
    } else {
      const normalized = ErrorUtils.toError(error)
      payload['error'] = {
        name: normalized.name,
        message: normalized.message,
        stack: normalized.stack || undefined,
      }
      payload['errorCode'] = ErrorCode.UNKNOWN_ERROR
      if (track) this.updateErrorMetrics(ErrorCode.UNKNOWN_ERROR)
    }

    return payload
  }

  private updateErrorMetrics(errorCode: ErrorCode) {
    const currentCount = this.errorMetrics.get(errorCode) || 0
    this.errorMetrics.set(errorCode, currentCount + 1)
    this.lastErrorTime.set(errorCode, new Date())
  }
}

// Global logger instance
export const logger = Logger.getInstance()

export const startTiming = (operation: string, context?: LogContext) =>
  logger.startTiming(operation, context)
