/**
 * Agent flow integration test: the runner drives a real MCP server in process
 */

import { describe, test, expect } from '@jest/globals';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { initializeServices } from '@/app/index.js';
import { AgentRunner } from '@/domains/agent/runner.js';
import { ConfigFactory } from '@/shared/config/config-factory.js';
import { createSourcesFetch, FakeChatModel, FakeEmbeddingProvider } from '../helpers/test-utils.js';

describe('Agent flow', () => {
  test('should rank the excerpts retrieved for the configured topic', async () => {
    const config = ConfigFactory.createTestConfig({
      similarityTopK: 2,
      agent: { topic: 'robot planning', sources: 'arxiv,semantic_scholar', maxPapers: 4, question: 'robot' },
    });
    const { fetch, requests } = createSourcesFetch();
    const server = initializeServices(config, { httpFetch: fetch, embeddingProvider: new FakeEmbeddingProvider() });

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    const client = new Client({ name: 'paper-digest-agent', version: '1.0.0' });
    await client.connect(clientTransport);

    const chatModel = new FakeChatModel().reply('1. Robot Planning with Graph Search (Score 4.8)');
    try {
      const result = await new AgentRunner(config.agent, { client, chatModel }).run();

      expect(result.ingestion).toBe('Success! 4 papers were indexed in the RAG.');
      expect(result.ranking).toBe('1. Robot Planning with Graph Search (Score 4.8)');
      expect(result.context.split('\n---\n').filter((block) => block.length > 0)).toHaveLength(2);
      expect(chatModel.prompts[0]).toContain('TITLE: Robot Planning with Graph Search');
      expect(requests.map((request) => new URL(request.url).host)).toEqual(['arxiv.test', 'semanticscholar.test']);
    } finally {
      await client.close();
      await server.shutdown();
    }
  });
});
