/**
 * Narrow HTTP surface shared by the paper sources, the REST embedding and chat
 * providers, and the Telegram sender. node-fetch backs it at run time; tests
 * hand in an in-process function of the same shape.
 */

import fetch, { FetchError } from 'node-fetch'
import { ErrorCode, ErrorUtils, StructuredError } from '@/shared/errors/index.js'

export interface HttpRequestInit {
  method?: string
  headers?: Record<string, string>
  body?: string
  timeout?: number
}

export interface HttpResponse {
  ok: boolean
  status: number
  statusText: string
  json(): Promise<unknown>
  text(): Promise<string>
  arrayBuffer(): Promise<ArrayBuffer>
}

export type HttpFetch = (url: string, init?: HttpRequestInit) => Promise<HttpResponse>

export const defaultFetch: HttpFetch = (url, init) => fetch(url, init)

/**
 * Map an HTTP status onto the error taxonomy
 */
export function statusToErrorCode(status: number): ErrorCode {
  if (status === 429) return ErrorCode.RATE_LIMIT_ERROR
  if (status === 401 || status === 403) return ErrorCode.AUTHENTICATION_ERROR
  if (status === 408) return ErrorCode.TIMEOUT_ERROR
  if (status >= 500) return ErrorCode.SERVICE_UNAVAILABLE
  if (status >= 400) return ErrorCode.VALIDATION_ERROR
  return ErrorCode.UNKNOWN_ERROR
}

/**
 * Classify a rejected fetch call (no response at all)
 */
export function fetchFailureCode(error: unknown): ErrorCode {
  if (error instanceof FetchError && error.type === 'request-timeout') {
    return ErrorCode.TIMEOUT_ERROR
  }
  if (error instanceof Error && error.name === 'AbortError') {
    return ErrorCode.TIMEOUT_ERROR
  }
  return ErrorCode.CONNECTION_ERROR
}

/**
 * Best-effort read of an error body for log and error messages
 */
export async function readErrorBody(response: HttpResponse, maxLength = 500): Promise<string> {
  try {
    const text = await response.text()
    return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text
  } catch {
    return ''
  }
}

export function buildUrl(base: string, path: string, params: Record<string, string | number> = {}): string {
  const url = new URL(path, base.endsWith('/') ? base : `${base}/`)
  for (const [key, value] of Object.entries(params)) {
    url.searchParams.set(key, String(value))
  }
  return url.toString()
}

/**
 * Non-2xx answer from a JSON API
 */
export class HttpStatusError extends StructuredError {
  public readonly status: number
  public readonly body: string

  constructor(status: number, statusText: string, body: string) {
    super(`HTTP ${status} ${statusText}${body ? `: ${body}` : ''}`, classifyStatus(status, body), 'MEDIUM', {
      status,
    })
    this.name = 'HttpStatusError'
    this.status = status
    this.body = body
  }
}

/**
 * Status code plus quota hints some APIs only put in the body
 */
export function classifyStatus(status: number, body = ''): ErrorCode {
  if (/RESOURCE_EXHAUSTED|insufficient_quota|quota/i.test(body) && (status === 429 || status === 403)) {
    return ErrorCode.QUOTA_EXCEEDED
  }
  return statusToErrorCode(status)
}

export interface JsonRequestOptions {
  method?: 'GET' | 'POST'
  headers?: Record<string, string>
  body?: unknown
  timeout?: number
}

/**
 * JSON round trip. Rejects with HttpStatusError on a non-2xx answer and with a
 * StructuredError carrying a connection or timeout code when no answer came.
 */
export async function requestJson(
  httpFetch: HttpFetch,
  url: string,
  options: JsonRequestOptions = {}
): Promise<unknown> {
  const { method = options.body === undefined ? 'GET' : 'POST', headers = {}, body, timeout } = options

  let response: HttpResponse
  try {
    response = await httpFetch(url, {
      method,
      headers: { Accept: 'application/json', ...(body === undefined ? {} : { 'Content-Type': 'application/json' }), ...headers },
      body: body === undefined ? undefined : JSON.stringify(body),
      timeout,
    })
  } catch (error) {
    throw new StructuredError(
      `Request failed: ${ErrorUtils.describe(error)}`,
      fetchFailureCode(error),
      'MEDIUM',
      { method },
      error
    )
  }

  if (!response.ok) {
    throw new HttpStatusError(response.status, response.statusText, await readErrorBody(response))
  }
  return response.json()
}
