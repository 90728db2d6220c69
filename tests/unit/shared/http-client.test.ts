/**
 * Unit tests for the shared HTTP helpers
 */

import { describe, test, expect } from '@jest/globals';
import {
  buildUrl,
  classifyStatus,
  fetchFailureCode,
  HttpStatusError,
  requestJson,
  statusToErrorCode,
} from '@/shared/http/client.js';
import { ErrorCode, StructuredError } from '@/shared/errors/index.js';
import { createFakeFetch, jsonResponse, textResponse } from '../../helpers/test-utils.js';

describe('status classification', () => {
  test('should map statuses onto error codes', () => {
    expect(statusToErrorCode(429)).toBe(ErrorCode.RATE_LIMIT_ERROR);
    expect(statusToErrorCode(401)).toBe(ErrorCode.AUTHENTICATION_ERROR);
    expect(statusToErrorCode(403)).toBe(ErrorCode.AUTHENTICATION_ERROR);
    expect(statusToErrorCode(408)).toBe(ErrorCode.TIMEOUT_ERROR);
    expect(statusToErrorCode(503)).toBe(ErrorCode.SERVICE_UNAVAILABLE);
    expect(statusToErrorCode(400)).toBe(ErrorCode.VALIDATION_ERROR);
    expect(statusToErrorCode(302)).toBe(ErrorCode.UNKNOWN_ERROR);
  });

  test('should detect quota exhaustion from the body', () => {
    expect(classifyStatus(429, '{"error":{"status":"RESOURCE_EXHAUSTED"}}')).toBe(ErrorCode.QUOTA_EXCEEDED);
    expect(classifyStatus(403, 'insufficient_quota')).toBe(ErrorCode.QUOTA_EXCEEDED);
    expect(classifyStatus(500, 'quota')).toBe(ErrorCode.SERVICE_UNAVAILABLE);
    expect(classifyStatus(429)).toBe(ErrorCode.RATE_LIMIT_ERROR);
  });

  test('should classify a missing response as a connection failure', () => {
    expect(fetchFailureCode(new Error('ECONNREFUSED'))).toBe(ErrorCode.CONNECTION_ERROR);
    const aborted = new Error('aborted');
    aborted.name = 'AbortError';
    expect(fetchFailureCode(aborted)).toBe(ErrorCode.TIMEOUT_ERROR);
  });
});

describe('buildUrl', () => {
  test('should join base and path and encode parameters', () => {
    expect(buildUrl('http://arxiv.test', 'api/query', { search_query: 'all:graph networks', start: 0 })).toBe(
      'http://arxiv.test/api/query?search_query=all%3Agraph+networks&start=0'
    );
  });

  test('should keep a path prefix on the base', () => {
    expect(buildUrl('http://host.test/prefix/', 'graph/v1/paper/search')).toBe(
      'http://host.test/prefix/graph/v1/paper/search'
    );
  });
});

describe('requestJson', () => {
  test('should GET with JSON headers when no body is given', async () => {
    const { fetch, requests } = createFakeFetch(() => jsonResponse({ ok: true }));

    await expect(requestJson(fetch, 'http://api.test/x', { timeout: 50 })).resolves.toEqual({ ok: true });
    expect(requests).toEqual([
      {
        url: 'http://api.test/x',
        init: { method: 'GET', headers: { Accept: 'application/json' }, body: undefined, timeout: 50 },
      },
    ]);
  });

  test('should POST a serialized body', async () => {
    const { fetch, requests } = createFakeFetch(() => jsonResponse({}));

    await requestJson(fetch, 'http://api.test/y', { body: { a: 1 }, headers: { 'x-key': 'test-secret' } });

    expect(requests[0]?.init).toEqual({
      method: 'POST',
      headers: { Accept: 'application/json', 'Content-Type': 'application/json', 'x-key': 'test-secret' },
      body: '{"a":1}',
      timeout: undefined,
    });
  });

  test('should reject a non-2xx answer with HttpStatusError', async () => {
    const { fetch } = createFakeFetch(() => textResponse('slow down', 429, 'Too Many Requests'));

    const error = await requestJson(fetch, 'http://api.test/z').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HttpStatusError);
    if (error instanceof HttpStatusError) {
      expect(error.message).toBe('HTTP 429 Too Many Requests: slow down');
      expect(error.code).toBe(ErrorCode.RATE_LIMIT_ERROR);
      expect(error.status).toBe(429);
    }
  });

  test('should wrap a rejected fetch as a connection failure', async () => {
    const { fetch } = createFakeFetch(() => {
      throw new Error('socket hang up');
    });

    const error = await requestJson(fetch, 'http://api.test/down').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StructuredError);
    if (error instanceof StructuredError) {
      expect(error.message).toBe('Request failed: socket hang up');
      expect(error.code).toBe(ErrorCode.CONNECTION_ERROR);
    }
  });
});
