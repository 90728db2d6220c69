/**
 * Unit tests for the agent flow against a scripted tool client
 */

import { describe, test, expect } from '@jest/globals';
import { AgentRunner, extractToolText, type ToolClient } from '@/domains/agent/runner.js';
import { TelegramSender } from '@/domains/agent/delivery/telegram.js';
import { buildRankingPrompt } from '@/domains/agent/prompts/ranking.js';
import { EMPTY_KNOWLEDGE_BASE_MESSAGE } from '@/domains/rag/rag-service.js';
import { ConfigFactory } from '@/shared/config/config-factory.js';
import { ErrorCode, GenerationError, StructuredError } from '@/shared/errors/index.js';
import { createFakeFetch, FakeChatModel, jsonResponse, recordingSleep } from '../../../helpers/test-utils.js';

interface ToolCall {
  name: string;
  arguments?: Record<string, unknown>;
}

class ScriptedToolClient implements ToolClient {
  readonly calls: ToolCall[] = [];

  constructor(private answers: Record<string, string>) {}

  async listTools(): Promise<{ tools: Array<{ name: string }> }> {
    return { tools: [{ name: 'update_knowledge_base' }, { name: 'query_rag' }, { name: 'get_knowledge_base_info' }] };
  }

  async callTool(params: ToolCall): Promise<unknown> {
    this.calls.push(params);
    return { content: [{ type: 'text', text: this.answers[params.name] ?? '' }] };
  }
}

const CONTEXT = '\n---\nSOURCE: ArXiv\nTITLE: Robot Planning\n';

describe('extractToolText', () => {
  test('should read the first text item', () => {
    expect(extractToolText({ content: [{ type: 'image' }, { type: 'text', text: 'hello' }] })).toBe('hello');
    expect(extractToolText({ content: [] })).toBe('');
    expect(extractToolText('not a result')).toBe('');
  });
});

describe('AgentRunner', () => {
  const agentConfig = ConfigFactory.createTestConfig({
    agent: { topic: 'robotics', sources: 'arxiv', maxPapers: 15, question: 'What is new?' },
  }).agent;

  test('should ingest, query, then rank the retrieved context', async () => {
    const client = new ScriptedToolClient({
      update_knowledge_base: 'Success! 3 papers were indexed in the RAG.',
      query_rag: CONTEXT,
    });
    const chatModel = new FakeChatModel().reply('1. Robot Planning (Score 4.5)');

    const result = await new AgentRunner(agentConfig, { client, chatModel }).run();

    expect(client.calls).toEqual([
      { name: 'update_knowledge_base', arguments: { topic: 'robotics', max_papers: 15, sources: 'arxiv' } },
      { name: 'query_rag', arguments: { question: 'What is new?' } },
    ]);
    expect(chatModel.prompts).toEqual([await buildRankingPrompt(CONTEXT)]);
    expect(result).toEqual({
      tools: ['update_knowledge_base', 'query_rag', 'get_knowledge_base_info'],
      ingestion: 'Success! 3 papers were indexed in the RAG.',
      context: CONTEXT,
      ranking: '1. Robot Planning (Score 4.5)',
      delivered: false,
    });
  });

  test('should stop before ranking when the knowledge base is empty', async () => {
    const client = new ScriptedToolClient({
      update_knowledge_base: 'No papers found in the sources arxiv for this topic.',
      query_rag: EMPTY_KNOWLEDGE_BASE_MESSAGE,
    });
    const chatModel = new FakeChatModel();

    const result = await new AgentRunner(agentConfig, { client, chatModel }).run();

    expect(result.stoppedReason).toBe('The knowledge base is empty');
    expect(result.ranking).toBeUndefined();
    expect(chatModel.prompts).toEqual([]);
  });

  test('should stop on an error answer or an empty context', async () => {
    const failing = new ScriptedToolClient({ query_rag: 'Error querying RAG: boom' });
    const silent = new ScriptedToolClient({});

    const failed = await new AgentRunner(agentConfig, { client: failing, chatModel: new FakeChatModel() }).run();
    const empty = await new AgentRunner(agentConfig, { client: silent, chatModel: new FakeChatModel() }).run();

    expect(failed.stoppedReason).toBe('Error querying RAG: boom');
    expect(empty.stoppedReason).toBe('No context was returned by query_rag');
  });

  test('should retry a rate-limited ranking with doubling waits', async () => {
    const { sleep, delays } = recordingSleep();
    const client = new ScriptedToolClient({ query_rag: CONTEXT });
    const chatModel = new FakeChatModel().reply(
      new StructuredError('429', ErrorCode.RATE_LIMIT_ERROR),
      '1. Robot Planning (Score 4.5)'
    );

    const result = await new AgentRunner({ ...agentConfig, retryBaseDelayMs: 2000 }, { client, chatModel, sleep }).run();

    expect(result.ranking).toBe('1. Robot Planning (Score 4.5)');
    expect(chatModel.prompts).toHaveLength(2);
    expect(delays).toEqual([2000]);
  });

  test('should fail with RETRY_EXHAUSTED once every attempt was rate limited', async () => {
    const { sleep } = recordingSleep();
    const client = new ScriptedToolClient({ query_rag: CONTEXT });
    const limited = () => new StructuredError('429', ErrorCode.RATE_LIMIT_ERROR);
    const chatModel = new FakeChatModel().reply(limited(), limited(), limited());

    const error = await new AgentRunner(agentConfig, { client, chatModel, sleep }).run().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GenerationError);
    if (error instanceof GenerationError) expect(error.code).toBe(ErrorCode.RETRY_EXHAUSTED);
  });

  test('should deliver the ranking when a chat id is configured', async () => {
    const { fetch, requests } = createFakeFetch(() => jsonResponse({ ok: true }));
    const client = new ScriptedToolClient({ query_rag: CONTEXT });

    const result = await new AgentRunner(
      { ...agentConfig, telegramChatId: '42' },
      { client, chatModel: new FakeChatModel(), telegram: new TelegramSender('test-token', fetch) }
    ).run();

    expect(result.delivered).toBe(true);
    expect(requests).toHaveLength(1);
    expect(requests[0]?.url).toBe('https://api.telegram.org/bottest-token/sendMessage');
  });
});
