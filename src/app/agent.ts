#!/usr/bin/env node
/**
 * Agent CLI: starts the RAG server over stdio, ingests the configured topic,
 * ranks the retrieved papers with a chat model and prints the ranking.
 */

import 'dotenv/config'
import { join } from 'path'
import { Client } from '@modelcontextprotocol/sdk/client/index.js'
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js'
import { AgentRunner, ChatModelFactory, TelegramSender, type AgentRunResult } from '@/domains/agent/index.js'
import { ConfigFactory, type ServerConfig } from '@/shared/config/config-factory.js'
import { logger } from '@/shared/logger/index.js'

function childEnvironment(): Record<string, string> {
  const env: Record<string, string> = {}
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) env[key] = value
  }
  return env
}

function printResult(result: AgentRunResult, topic: string): void {
  if (!result.ranking) {
    process.stdout.write(`\n${result.ingestion}\n${result.stoppedReason ?? ''}\n`)
    return
  }

  const rule = '='.repeat(50)
  process.stdout.write(`\n${rule}\n🏆 TOP 5 PAPERS: ${topic}\n${rule}\n${result.ranking}\n`)
}

export async function runAgent(config: ServerConfig): Promise<AgentRunResult> {
  const { agent } = config
  const serverArgs = agent.serverArgs.length > 0 ? agent.serverArgs : [join(__dirname, 'index.js')]

  const transport = new StdioClientTransport({
    command: agent.serverCommand,
    args: serverArgs,
    env: childEnvironment(),
  })
  const client = new Client({ name: 'paper-digest-agent', version: '1.0.0' })

  logger.info('🔌 Connecting to the MCP server...', { command: agent.serverCommand, args: serverArgs })
  await client.connect(transport)

  try {
    const runner = new AgentRunner(agent, {
      client,
      chatModel: ChatModelFactory.create(config),
      telegram: agent.telegramChatId ? new TelegramSender(agent.telegramBotToken) : undefined,
    })
    return await runner.run()
  } finally {
    await client.close()
  }
}

export async function main(): Promise<void> {
  try {
    const config = ConfigFactory.getCurrentConfig()
    logger.setLevel(config.logLevel)
    ConfigFactory.validateAgentConfig(config)

    const result = await runAgent(config)
    printResult(result, config.agent.topic)
    process.exit(0)
  } catch (error) {
    logger.fatal('Agent run failed', error)
    process.exit(1)
  }
}

if (require.main === module) {
  void main()
}
