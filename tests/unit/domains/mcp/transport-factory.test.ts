/**
 * Unit tests for transport selection and the HTTP session routes
 */

import { describe, test, expect, beforeEach, afterEach } from '@jest/globals';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { LATEST_PROTOCOL_VERSION } from '@modelcontextprotocol/sdk/types.js';
import { initializeServices } from '@/app/index.js';
import type { MCPServer } from '@/domains/mcp/server/server.js';
import { TransportFactory, type HTTPTransportContext } from '@/domains/mcp/transport/transport-factory.js';
import { ConfigFactory } from '@/shared/config/config-factory.js';
import { ConfigurationError } from '@/shared/errors/index.js';
import { createSourcesFetch, FakeEmbeddingProvider } from '../../../helpers/test-utils.js';

const config = ConfigFactory.createTestConfig({ mcp: { type: 'streamable-http' } });
const mcpConfig = ConfigFactory.createTestConfig().mcp;

const HEADERS = {
  'content-type': 'application/json',
  accept: 'application/json, text/event-stream',
};

function initializeMessage(clientName: string) {
  return {
    jsonrpc: '2.0',
    id: 1,
    method: 'initialize',
    params: {
      protocolVersion: LATEST_PROTOCOL_VERSION,
      capabilities: {},
      clientInfo: { name: clientName, version: '1.0.0' },
    },
  };
}

const LIST_TOOLS = { jsonrpc: '2.0', id: 2, method: 'tools/list', params: {} };

describe('TransportFactory', () => {
  test('should create a stdio transport by default', async () => {
    const setup = await TransportFactory.createTransport(mcpConfig, async () => undefined);

    expect(setup.type).toBe('stdio');
    if (setup.type === 'stdio') {
      expect(setup.transport).toBeInstanceOf(StdioServerTransport);
    }
  });

  test('should validate the HTTP port and host', () => {
    expect(() => TransportFactory.validateConfig(mcpConfig)).not.toThrow();

    let caught: unknown;
    try {
      TransportFactory.validateConfig({ ...mcpConfig, type: 'streamable-http', port: 0, host: '' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    if (caught instanceof ConfigurationError) {
      expect(caught.problems).toEqual([
        'Port must be between 1 and 65535 for HTTP transports',
        'Host is required for HTTP transports',
      ]);
    }
  });

  describe('streamable HTTP sessions', () => {
    let server: MCPServer;
    let context: HTTPTransportContext;

    async function initialize(clientName: string): Promise<string> {
      const response = await context.app.inject({
        method: 'POST',
        url: '/mcp',
        headers: HEADERS,
        payload: initializeMessage(clientName),
      });
      expect(response.statusCode).toBe(200);

      const sessionId = response.headers['mcp-session-id'];
      if (typeof sessionId !== 'string') {
        throw new Error(`No session id for ${clientName}`);
      }
      return sessionId;
    }

    beforeEach(async () => {
      server = initializeServices(config, {
        httpFetch: createSourcesFetch().fetch,
        embeddingProvider: new FakeEmbeddingProvider(),
      });
      context = await TransportFactory.createStreamableHTTPApp(
        { ...config.mcp, enableCors: true },
        (transport) => server.connect(transport)
      );
    });

    afterEach(async () => {
      await server.shutdown();
      await context.app.close();
    });

    test('should report no sessions before any client connects', async () => {
      const response = await context.app.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ status: 'healthy', transport: 'streamable-http', activeSessions: 0 });
    });

    test('should open a separate session for every initializing client', async () => {
      const first = await initialize('first-agent');
      const second = await initialize('second-agent');

      expect(second).not.toBe(first);
      expect([...context.transports.keys()]).toEqual([first, second]);

      const health = await context.app.inject({ method: 'GET', url: '/health' });
      expect(health.json()).toMatchObject({ activeSessions: 2 });
    });

    test('should route requests to the session named in the header', async () => {
      await initialize('first-agent');
      const second = await initialize('second-agent');

      const response = await context.app.inject({
        method: 'POST',
        url: '/mcp',
        headers: { ...HEADERS, 'mcp-session-id': second },
        payload: LIST_TOOLS,
      });

      expect(response.statusCode).toBe(200);
      expect(response.body).toContain('"name":"update_knowledge_base"');
      expect(response.body).toContain('"name":"query_rag"');
    });

    test('should reject requests without a session or with an unknown one', async () => {
      const missing = await context.app.inject({ method: 'POST', url: '/mcp', headers: HEADERS, payload: LIST_TOOLS });
      const unknown = await context.app.inject({
        method: 'POST',
        url: '/mcp',
        headers: { ...HEADERS, 'mcp-session-id': 'no-such-session' },
        payload: LIST_TOOLS,
      });
      const stream = await context.app.inject({ method: 'GET', url: '/mcp', headers: HEADERS });

      expect(missing.statusCode).toBe(400);
      expect(missing.json()).toEqual({
        jsonrpc: '2.0',
        error: { code: -32000, message: 'Bad Request: No valid session ID provided' },
        id: null,
      });
      expect(unknown.statusCode).toBe(404);
      expect(stream.statusCode).toBe(400);
    });

    test('should forget a session once the client ends it', async () => {
      const first = await initialize('first-agent');
      const second = await initialize('second-agent');

      const ended = await context.app.inject({
        method: 'DELETE',
        url: '/mcp',
        headers: { ...HEADERS, 'mcp-session-id': first },
      });

      expect(ended.statusCode).toBe(200);
      expect([...context.transports.keys()]).toEqual([second]);

      const reconnected = await initialize('first-agent');
      expect([...context.transports.keys()]).toEqual([second, reconnected]);
    });
  });
});
